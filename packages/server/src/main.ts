import { serve } from "@hono/node-server";
import type { AddressInfo } from "node:net";

import { createMySqlClient, openMySqlPool } from "./adapters/MySqlClient.js";
import { MySqlPlayerStore } from "./adapters/MySqlPlayerStore.js";
import { createTableApp } from "./app.js";
import { loadServerConfig, type ServerConfig } from "./config.js";
import {
  DisabledPersistenceQueue,
  InMemoryGameStore,
  RetryingPersistenceQueue,
  createTableConfig,
  dispatchCommand,
} from "./core.js";
import type { CommandContext, Logger, PersistenceQueue, PlayerStore } from "./core.js";
import { createConsoleLogger } from "./logger.js";

export async function startServer(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const config = loadServerConfig(env);
  const logger = createConsoleLogger("table-king", env);
  const tableConfig = createTableConfig();
  const store = new InMemoryGameStore({ config: tableConfig });
  const players = await connectPlayerStore(config, createConsoleLogger("db", env));

  const persistence: PersistenceQueue = players
    ? new RetryingPersistenceQueue({
        store: players,
        config: tableConfig,
        logger: createConsoleLogger("dbq", env),
      })
    : new DisabledPersistenceQueue(logger);

  const createContext = (): CommandContext => ({
    store,
    persistence,
    config: tableConfig,
    logger,
  });

  const app = createTableApp({
    logger,
    players,
    createContext,
    dispatch: dispatchCommand,
  });

  serve({ fetch: app.fetch, port: config.port }, (info: AddressInfo) => {
    logger.info?.("Server listening", info);
  });
}

async function connectPlayerStore(
  config: ServerConfig,
  logger: Logger,
): Promise<PlayerStore | undefined> {
  if (!config.mysqlUri) {
    logger.warn?.("MYSQL_DSN not set; persistence disabled");
    return undefined;
  }

  const client = createMySqlClient(openMySqlPool(config.mysqlUri, config.tls));
  try {
    await client.ping();
  } catch (error) {
    logger.error?.("MySQL ping failed; persistence disabled", { error });
    await client.close();
    return undefined;
  }

  logger.info?.("Connected to MySQL", { tls: config.tls.mode });
  return new MySqlPlayerStore({ client });
}

void startServer().catch((error: unknown) => {
  createConsoleLogger("table-king").error?.("Failed to start server", { error });
  process.exit(1);
});
