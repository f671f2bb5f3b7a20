import type { SqlClient, SqlRow, SqlSession } from "./MySqlClient.js";
import type {
  GoalEventRecord,
  PlayerId,
  PlayerRecord,
  PlayerStore,
} from "../core.js";

export interface MySqlPlayerStoreOptions {
  readonly client: SqlClient;
  readonly now?: () => Date;
}

const MAX_SEARCH_LIMIT = 1000;

function uniqueNames(names: readonly PlayerId[]): PlayerId[] {
  return [...new Set(names.map((name) => name.trim()).filter((name) => name !== ""))];
}

function placeholders(count: number): string {
  return Array.from({ length: count }, () => "?").join(",");
}

function toPlayerRecord(row: SqlRow): PlayerRecord {
  return {
    id: Number(row["id"]),
    name: String(row["name"]),
    wins: Number(row["wins"]),
    survives: Number(row["survives"]),
    fullRotations: Number(row["full_rotation"] ?? 0),
  };
}

/**
 * Player catalogue and goal history in MySQL (see schema.sql).
 *
 * A goal counts as a win for both scorers and as a survive for every player
 * still at the table afterwards: the scorers plus the losing forward who
 * dropped into goal.
 */
export class MySqlPlayerStore implements PlayerStore {
  readonly #client: SqlClient;
  readonly #now: () => Date;

  constructor({ client, now = () => new Date() }: MySqlPlayerStoreOptions) {
    this.#client = client;
    this.#now = now;
  }

  async ensurePlayers(names: readonly PlayerId[], signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const unique = uniqueNames(names);
    if (unique.length === 0) {
      return;
    }
    await this.#client.transaction((tx) => this.#upsertPlayers(tx, unique), signal);
  }

  async recordGoal(event: GoalEventRecord, signal?: AbortSignal): Promise<void> {
    const { gameId, team, preRotation, rotation } = event;
    const winners = team === "red" ? preRotation.red : preRotation.blue;
    const losers = team === "red" ? preRotation.blue : preRotation.red;

    await this.#client.transaction(async (tx) => {
      signal?.throwIfAborted();
      await tx.execute("INSERT IGNORE INTO games (id) VALUES (?)", [gameId]);

      const names = uniqueNames([
        preRotation.red.forward,
        preRotation.red.goalkeeper,
        preRotation.blue.forward,
        preRotation.blue.goalkeeper,
        rotation.benched,
        rotation.movedToGoalkeeper,
        rotation.newForward,
      ]);
      await this.#upsertPlayers(tx, names);

      signal?.throwIfAborted();
      const ids = await this.#resolveIds(tx, names);
      const idOf = (name: PlayerId): number => {
        const id = ids.get(name);
        if (id === undefined) {
          throw new Error(`player not found after ensure: ${name}`);
        }
        return id;
      };

      await tx.execute(
        `INSERT INTO goal_events (game_id, scoring_team, red_forward_id, red_goalkeeper_id,
           blue_forward_id, blue_goalkeeper_id, benched_player_id, moved_to_goalkeeper_id,
           new_forward_id, full_rotation)
         VALUES (?,?,?,?,?,?,?,?,?,?)`,
        [
          gameId,
          team,
          idOf(preRotation.red.forward),
          idOf(preRotation.red.goalkeeper),
          idOf(preRotation.blue.forward),
          idOf(preRotation.blue.goalkeeper),
          idOf(rotation.benched),
          idOf(rotation.movedToGoalkeeper),
          idOf(rotation.newForward),
          event.fullRotation ? 1 : 0,
        ],
      );

      const winnerIds = [...new Set([idOf(winners.forward), idOf(winners.goalkeeper)])];
      const survivorIds = [...new Set([...winnerIds, idOf(losers.forward)])];

      signal?.throwIfAborted();
      await this.#increment(tx, "wins", winnerIds);
      await this.#increment(tx, "survives", survivorIds);
      if (event.fullRotation) {
        await this.#increment(tx, "full_rotation", winnerIds);
      }
    }, signal);
  }

  async searchPlayers(query: string, limit: number): Promise<PlayerRecord[]> {
    const bounded = Math.min(Math.max(1, Math.floor(limit)), MAX_SEARCH_LIMIT);
    const rows = await this.#client.select(
      `SELECT id, name, wins, survives, full_rotation FROM players
       WHERE name LIKE ? ORDER BY wins DESC, survives DESC, name ASC LIMIT ?`,
      [`%${query.trim()}%`, bounded],
    );
    return rows.map(toPlayerRecord);
  }

  async #upsertPlayers(session: SqlSession, names: readonly PlayerId[]): Promise<void> {
    if (names.length === 0) {
      return;
    }
    const now = this.#now();
    await session.execute(
      `INSERT INTO players (name, last_seen) VALUES ${names.map(() => "(?, ?)").join(",")}
       ON DUPLICATE KEY UPDATE last_seen=VALUES(last_seen)`,
      names.flatMap((name) => [name, now]),
    );
  }

  async #resolveIds(session: SqlSession, names: readonly PlayerId[]): Promise<Map<PlayerId, number>> {
    const rows = await session.select(
      `SELECT id, name FROM players WHERE name IN (${placeholders(names.length)})`,
      names,
    );
    return new Map(rows.map((row) => [String(row["name"]), Number(row["id"])] as const));
  }

  async #increment(
    session: SqlSession,
    column: "wins" | "survives" | "full_rotation",
    ids: readonly number[],
  ): Promise<void> {
    await session.execute(
      `UPDATE players SET ${column} = ${column} + 1 WHERE id IN (${placeholders(ids.length)})`,
      ids,
    );
  }
}
