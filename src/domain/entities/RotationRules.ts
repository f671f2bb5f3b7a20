import {
  lineupOf,
  restoreSnapshot,
  snapshotGame,
  type GameState,
  type Lineup,
  type PlayerPair,
  type StreakState,
  type TeamSlot,
} from "./GameState.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { InvalidGameStateError } from "../errors/InvalidGameStateError.js";
import { PlayerNotFoundError } from "../errors/PlayerNotFoundError.js";
import { opponentOf, type PlayerId, type Team } from "../typedefs.js";

/**
 * What happened to the losing team. By convention `benched` was its
 * goalkeeper, `movedToGoalkeeper` its forward and `newForward` the head of
 * the waiting queue.
 */
export interface RotationSummary {
  readonly benched: PlayerId;
  readonly movedToGoalkeeper: PlayerId;
  readonly newForward: PlayerId;
}

export interface FullRotationEvent {
  readonly team: Team;
  readonly players: PlayerPair;
}

export interface GoalOutcome {
  readonly rotation: RotationSummary;
  readonly fullRotation: FullRotationEvent | undefined;
  /** Both teams as they stood when the goal was scored */
  readonly preRotation: Lineup;
}

export type PlayerLocation =
  | "waiting"
  | "red.forward"
  | "red.goalkeeper"
  | "blue.forward"
  | "blue.goalkeeper";

const SLOT_SEARCH_ORDER: readonly (readonly [Team, keyof TeamSlot])[] = [
  ["red", "forward"],
  ["red", "goalkeeper"],
  ["blue", "forward"],
  ["blue", "goalkeeper"],
];

export function parseTeam(raw: unknown): Team {
  const team = typeof raw === "string" ? raw.trim().toLowerCase() : "";
  if (team === "red" || team === "blue") {
    return team;
  }
  throw GameCommandInputError.because("InvalidTeam", ["team must be 'red' or 'blue'"]);
}

export function samePair(a: PlayerPair, b: PlayerPair): boolean {
  return (a[0] === b[0] && a[1] === b[1]) || (a[0] === b[1] && a[1] === b[0]);
}

export function findDuplicate(ids: readonly PlayerId[]): PlayerId | undefined {
  const seen = new Set<PlayerId>();
  for (const id of ids) {
    if (id === "") continue;
    if (seen.has(id)) return id;
    seen.add(id);
  }
  return undefined;
}

export function playerExists(state: GameState, id: PlayerId): boolean {
  return (
    SLOT_SEARCH_ORDER.some(([team, position]) => state[team][position] === id) ||
    state.waiting.includes(id)
  );
}

/**
 * Scores a goal for `team` and rotates the other side: the goalkeeper goes to
 * the back of the queue, the forward drops into goal and the head of the queue
 * takes the forward spot.
 */
export function applyGoal(state: GameState, team: Team): GoalOutcome {
  if (!state.started) {
    throw new InvalidGameStateError("NotStarted");
  }
  if (state.waiting.size === 0) {
    throw new InvalidGameStateError("QueueEmpty");
  }

  const loserTeam = opponentOf(team);
  const preRotation = lineupOf(state);
  state.history.push(snapshotGame(state));

  const loser = state[loserTeam];
  const benched = loser.goalkeeper;
  // an emptied goalkeeper slot has nobody to bench
  if (benched !== "") {
    state.waiting.enqueue(benched);
  }
  const movedToGoalkeeper = loser.forward;
  loser.goalkeeper = movedToGoalkeeper;
  const newForward = state.waiting.dequeue() ?? "";
  loser.forward = newForward;

  state.score[team] += 1;

  const streak = trackStreak(state.streak, team, preRotation);
  state.streak = streak;

  const fullRotation = samePair([loser.forward, loser.goalkeeper], streak.opponentBaseline)
    ? { team, players: streak.pair }
    : undefined;

  return {
    rotation: { benched, movedToGoalkeeper, newForward },
    fullRotation,
    preRotation,
  };
}

function trackStreak(
  current: StreakState | undefined,
  team: Team,
  preRotation: Lineup,
): StreakState {
  const scorers = preRotation[team];
  const pair: PlayerPair = [scorers.forward, scorers.goalkeeper];

  if (current && current.team === team && samePair(current.pair, pair)) {
    return current;
  }

  const opponents = preRotation[opponentOf(team)];
  return {
    team,
    pair,
    opponentBaseline: [opponents.forward, opponents.goalkeeper],
  };
}

export function enqueuePlayer(state: GameState, id: PlayerId): void {
  if (playerExists(state, id)) {
    throw GameCommandInputError.because("DuplicateId", [
      `player_id already exists in game: ${id}`,
    ]);
  }
  state.history.push(snapshotGame(state));
  state.waiting.enqueue(id);
}

/**
 * Removes the first match looking at the queue, then red forward, red
 * goalkeeper, blue forward and blue goalkeeper. A vacated slot stays empty.
 */
export function removePlayer(state: GameState, id: PlayerId): PlayerLocation {
  if (state.waiting.includes(id)) {
    state.history.push(snapshotGame(state));
    state.waiting.removeValue(id);
    return "waiting";
  }

  for (const [team, position] of SLOT_SEARCH_ORDER) {
    if (state[team][position] === id) {
      state.history.push(snapshotGame(state));
      state[team][position] = "";
      return `${team}.${position}` as const;
    }
  }

  throw new PlayerNotFoundError(id);
}

export function startGame(state: GameState): void {
  if (state.started) {
    throw new InvalidGameStateError("AlreadyStarted");
  }
  state.history.push(snapshotGame(state));
  state.started = true;
}

/** Restores the state captured before the latest mutation. Not itself undoable. */
export function undo(state: GameState, minQueueCapacity?: number): void {
  const last = state.history.pop();
  if (!last) {
    throw new InvalidGameStateError("NoHistory");
  }
  restoreSnapshot(state, last, minQueueCapacity);
}
