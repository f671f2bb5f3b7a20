import {
  GameCommandInputError,
  type GameCommandInputCode,
} from "../errors/GameCommandInputError.js";
import type { PlayerId } from "../typedefs.js";

export function normalizePlayerId(
  raw: unknown,
  code: GameCommandInputCode,
  issue: string,
): PlayerId {
  const id = typeof raw === "string" ? raw.trim() : "";
  if (id.length === 0) {
    throw GameCommandInputError.because(code, [issue]);
  }
  return id;
}
