import { WaitingQueue } from "./WaitingQueue.js";
import type { GameId, PlayerId, Team } from "../typedefs.js";

export interface TeamSlot {
  forward: PlayerId;
  goalkeeper: PlayerId;
}

export interface Score {
  red: number;
  blue: number;
}

/** Both teams as they stand at one instant */
export interface Lineup {
  readonly red: Readonly<TeamSlot>;
  readonly blue: Readonly<TeamSlot>;
}

export type PlayerPair = readonly [PlayerId, PlayerId];

/**
 * Run of goals by one pair. `opponentBaseline` is the pair the streak started
 * against; seeing it again on the losing side means a full rotation.
 */
export interface StreakState {
  readonly team: Team;
  readonly pair: PlayerPair;
  readonly opponentBaseline: PlayerPair;
}

export interface GameSnapshot extends Lineup {
  readonly waiting: readonly PlayerId[];
  readonly score: Readonly<Score>;
  readonly started: boolean;
  readonly streak: StreakState | undefined;
}

/**
 * Mutable state of one game. Only the game store hands it out, and only
 * inside a locked read or update window.
 */
export interface GameState {
  red: TeamSlot;
  blue: TeamSlot;
  waiting: WaitingQueue;
  score: Score;
  started: boolean;
  streak: StreakState | undefined;
  history: GameSnapshot[];
}

export interface NewGame {
  readonly red: Readonly<TeamSlot>;
  readonly blue: Readonly<TeamSlot>;
  readonly waiting: readonly PlayerId[];
  readonly started?: boolean;
}

export interface GameView extends Lineup {
  readonly id: GameId;
  readonly waiting: readonly PlayerId[];
  readonly score: Readonly<Score>;
  readonly started: boolean;
}

export interface GameSummary {
  readonly id: GameId;
  readonly started: boolean;
  readonly score: Readonly<Score>;
}

export function createGameState(initial: NewGame, minQueueCapacity = 8): GameState {
  return {
    red: { ...initial.red },
    blue: { ...initial.blue },
    waiting: WaitingQueue.from(initial.waiting, minQueueCapacity),
    score: { red: 0, blue: 0 },
    started: initial.started ?? true,
    streak: undefined,
    history: [],
  };
}

export function lineupOf(state: GameState): Lineup {
  return { red: { ...state.red }, blue: { ...state.blue } };
}

export function snapshotGame(state: GameState): GameSnapshot {
  return Object.freeze({
    ...lineupOf(state),
    waiting: Object.freeze(state.waiting.snapshot()),
    score: { ...state.score },
    started: state.started,
    streak: state.streak,
  });
}

export function restoreSnapshot(
  state: GameState,
  snapshot: GameSnapshot,
  minQueueCapacity = 8,
): void {
  state.red = { ...snapshot.red };
  state.blue = { ...snapshot.blue };
  state.waiting = WaitingQueue.from(snapshot.waiting, minQueueCapacity);
  state.score = { ...snapshot.score };
  state.started = snapshot.started;
  state.streak = snapshot.streak;
}

export function toGameView(id: GameId, state: GameState): GameView {
  return {
    id,
    ...lineupOf(state),
    waiting: state.waiting.snapshot(),
    score: { ...state.score },
    started: state.started,
  };
}

export function toGameSummary(id: GameId, state: GameState): GameSummary {
  return { id, started: state.started, score: { ...state.score } };
}

