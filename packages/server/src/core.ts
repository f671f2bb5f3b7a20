export type {
  Command,
  CommandContext,
} from "@table-king/core/domain/commands/Command.js";
export { CreateGame } from "@table-king/core/domain/commands/CreateGame.js";
export type { CreateGameInput } from "@table-king/core/domain/commands/CreateGame.js";
export { EnqueuePlayer } from "@table-king/core/domain/commands/EnqueuePlayer.js";
export { GetGame } from "@table-king/core/domain/commands/GetGame.js";
export { ListGames } from "@table-king/core/domain/commands/ListGames.js";
export { RegisterPlayer } from "@table-king/core/domain/commands/RegisterPlayer.js";
export { RemovePlayer } from "@table-king/core/domain/commands/RemovePlayer.js";
export { ScoreGoal } from "@table-king/core/domain/commands/ScoreGoal.js";
export type { GoalResult } from "@table-king/core/domain/commands/ScoreGoal.js";
export { StartGame } from "@table-king/core/domain/commands/StartGame.js";
export { UndoLastAction } from "@table-king/core/domain/commands/UndoLastAction.js";
export { dispatchCommand } from "@table-king/core/domain/commands/dispatchCommand.js";
export type {
  GameSummary,
  GameView,
  Lineup,
  TeamSlot,
} from "@table-king/core/domain/entities/GameState.js";
export type {
  FullRotationEvent,
  RotationSummary,
} from "@table-king/core/domain/entities/RotationRules.js";
export {
  GameCommandInputError,
  GameNotFoundError,
  InvalidGameStateError,
  PlayerNotFoundError,
} from "@table-king/core/domain/errors/index.js";
export type { GameStore } from "@table-king/core/domain/ports/GameStore.js";
export type { Logger } from "@table-king/core/domain/ports/Logger.js";
export type {
  PersistenceOp,
  PersistenceQueue,
} from "@table-king/core/domain/ports/PersistenceQueue.js";
export type {
  GoalEventRecord,
  PlayerRecord,
  PlayerStore,
} from "@table-king/core/domain/ports/PlayerStore.js";
export { createTableConfig } from "@table-king/core/domain/TableConfig.js";
export type { TableConfig } from "@table-king/core/domain/TableConfig.js";
export type {
  GameId,
  PlayerId,
  Team,
  TimePoint,
} from "@table-king/core/domain/typedefs.js";
export { InMemoryGameStore } from "@table-king/core/adapters/in-memory/InMemoryGameStore.js";
export { DisabledPersistenceQueue } from "@table-king/core/adapters/persistence/DisabledPersistenceQueue.js";
export { RetryingPersistenceQueue } from "@table-king/core/adapters/persistence/RetryingPersistenceQueue.js";
