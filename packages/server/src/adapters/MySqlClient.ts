import { readFileSync } from "node:fs";
import {
  createPool,
  type Pool,
  type PoolConnection,
  type PoolOptions,
  type RowDataPacket,
} from "mysql2/promise";

import type { MySqlTlsConfig } from "../config.js";

export type SqlRow = Record<string, unknown>;

export interface SqlSession {
  execute(sql: string, values?: readonly unknown[]): Promise<void>;
  select(sql: string, values?: readonly unknown[]): Promise<SqlRow[]>;
}

export interface SqlClient extends SqlSession {
  /**
   * Runs `work` in one transaction. Aborting `signal` kills the connection,
   * failing the statement in flight, and a transaction whose signal fired is
   * rolled back instead of committed.
   */
  transaction<T>(work: (tx: SqlSession) => Promise<T>, signal?: AbortSignal): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

function connectionSession(connection: PoolConnection): SqlSession {
  return {
    async execute(sql, values = []): Promise<void> {
      await connection.query(sql, [...values]);
    },
    async select(sql, values = []): Promise<SqlRow[]> {
      const [rows] = await connection.query<RowDataPacket[]>(sql, [...values]);
      return rows;
    },
  };
}

export function createMySqlClient(pool: Pool): SqlClient {
  return {
    async execute(sql, values = []): Promise<void> {
      await pool.query(sql, [...values]);
    },

    async select(sql, values = []): Promise<SqlRow[]> {
      const [rows] = await pool.query<RowDataPacket[]>(sql, [...values]);
      return rows;
    },

    async transaction<T>(
      work: (tx: SqlSession) => Promise<T>,
      signal?: AbortSignal,
    ): Promise<T> {
      signal?.throwIfAborted();
      const connection = await pool.getConnection();
      let destroyed = false;
      const onAbort = (): void => {
        destroyed = true;
        connection.destroy();
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      try {
        signal?.throwIfAborted();
        await connection.beginTransaction();
        const result = await work(connectionSession(connection));
        signal?.throwIfAborted();
        await connection.commit();
        return result;
      } catch (error) {
        // a destroyed connection takes its open transaction with it
        if (!destroyed) {
          await connection.rollback();
        }
        throw error;
      } finally {
        signal?.removeEventListener("abort", onAbort);
        if (!destroyed) {
          connection.release();
        }
      }
    },

    async ping(): Promise<void> {
      await pool.query("SELECT 1");
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}

export function buildSslOptions(tls: MySqlTlsConfig): PoolOptions["ssl"] {
  switch (tls.mode) {
    case "none":
      return undefined;
    case "verify":
      return { rejectUnauthorized: true };
    case "skip-verify":
      return { rejectUnauthorized: false };
    case "custom":
      return {
        rejectUnauthorized: true,
        ...(tls.caPath ? { ca: readFileSync(tls.caPath, "utf8") } : {}),
        ...(tls.certPath && tls.keyPath
          ? {
              cert: readFileSync(tls.certPath, "utf8"),
              key: readFileSync(tls.keyPath, "utf8"),
            }
          : {}),
      };
  }
}

export function openMySqlPool(uri: string, tls: MySqlTlsConfig): Pool {
  const ssl = buildSslOptions(tls);
  return createPool({
    uri,
    charset: "utf8mb4",
    connectionLimit: 25,
    maxIdle: 10,
    idleTimeout: 60_000,
    ...(ssl ? { ssl } : {}),
  });
}
