export type GameStateConflict = "NotStarted" | "QueueEmpty" | "NoHistory" | "AlreadyStarted";

const MESSAGES: Record<GameStateConflict, string> = {
  NotStarted: "game not started",
  QueueEmpty: "waiting queue empty; cannot rotate losing team",
  NoHistory: "no actions to undo",
  AlreadyStarted: "game already started",
};

export class InvalidGameStateError extends Error {
  constructor(public readonly reason: GameStateConflict) {
    super(MESSAGES[reason]);
    this.name = "InvalidGameStateError";
  }
}
