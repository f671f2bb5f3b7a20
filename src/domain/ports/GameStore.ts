import type {
  GameState,
  GameSummary,
  GameView,
  NewGame,
} from "../entities/GameState.js";
import type { GameId } from "../typedefs.js";

export interface CreatedGame {
  readonly id: GameId;
  readonly view: GameView;
}

/**
 * Registry owning every live game.
 *
 * The callbacks passed to {@link read} and {@link update} run inside an
 * exclusive-access window: no other update of the same game interleaves with
 * them. They must be synchronous, must not keep a reference to the state after
 * returning, and must return plain copies.
 */
export interface GameStore {
  create(initial: NewGame): Promise<CreatedGame>;
  read<T>(gameId: GameId, reader: (state: Readonly<GameState>, id: GameId) => T): Promise<T>;
  update<T>(gameId: GameId, mutator: (state: GameState, id: GameId) => T): Promise<T>;
  list(): Promise<GameSummary[]>;
}
