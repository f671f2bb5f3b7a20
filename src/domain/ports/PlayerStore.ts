import type { Lineup } from "../entities/GameState.js";
import type { RotationSummary } from "../entities/RotationRules.js";
import type { GameId, PlayerId, Team } from "../typedefs.js";

export interface GoalEventRecord {
  readonly gameId: GameId;
  readonly team: Team;
  /** Lineup before the losing team rotated */
  readonly preRotation: Lineup;
  readonly rotation: RotationSummary;
  readonly fullRotation: boolean;
}

export interface PlayerRecord {
  readonly id: number;
  readonly name: PlayerId;
  readonly wins: number;
  readonly survives: number;
  readonly fullRotations: number;
}

/**
 * External durable store for the player catalogue and goal history.
 * Writes receive an abort signal that fires when the attempt times out; once
 * it fires the write must settle promptly and must not commit afterwards.
 */
export interface PlayerStore {
  ensurePlayers(names: readonly PlayerId[], signal?: AbortSignal): Promise<void>;
  recordGoal(event: GoalEventRecord, signal?: AbortSignal): Promise<void>;
  searchPlayers(query: string, limit: number): Promise<PlayerRecord[]>;
}
