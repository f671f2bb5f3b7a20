/**
 * Core domain typedefs used throughout the engine.
 * These are simple aliases; identifiers are opaque strings validated at the
 * command boundary.
 */

/** Unique identifier of a game in the registry */
export type GameId = string;

/** Identifier of a player; unique within one game */
export type PlayerId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** One side of the table */
export type Team = "red" | "blue";

export function opponentOf(team: Team): Team {
  return team === "red" ? "blue" : "red";
}
