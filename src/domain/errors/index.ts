export { GameCommandInputError } from "./GameCommandInputError.js";
export type { GameCommandInputCode } from "./GameCommandInputError.js";
export { GameNotFoundError } from "./GameNotFoundError.js";
export { InvalidGameStateError } from "./InvalidGameStateError.js";
export type { GameStateConflict } from "./InvalidGameStateError.js";
export { PlayerNotFoundError } from "./PlayerNotFoundError.js";
export { PersistenceTimeoutError } from "./PersistenceTimeoutError.js";
