import { randomBytes } from "node:crypto";

import { ReadWriteLock } from "./ReadWriteLock.js";
import {
  createGameState,
  toGameSummary,
  toGameView,
  type GameState,
  type GameSummary,
  type NewGame,
} from "../../domain/entities/GameState.js";
import { GameNotFoundError } from "../../domain/errors/index.js";
import type { CreatedGame, GameStore } from "../../domain/ports/GameStore.js";
import { createTableConfig, type TableConfig } from "../../domain/TableConfig.js";
import type { GameId } from "../../domain/typedefs.js";

export interface InMemoryGameStoreOptions {
  readonly generateId?: () => GameId;
  readonly config?: TableConfig;
  /** Lets a caller observe the lock the store serialises on */
  readonly lock?: ReadWriteLock;
}

export function randomGameId(): GameId {
  return randomBytes(12).toString("hex");
}

/**
 * Process-local registry. One coarse lock covers the whole map: reads share
 * it, creation and every game mutation take it exclusively.
 */
export class InMemoryGameStore implements GameStore {
  #games = new Map<GameId, GameState>();
  readonly #lock: ReadWriteLock;
  readonly #generateId: () => GameId;
  readonly #config: TableConfig;

  constructor(options: InMemoryGameStoreOptions = {}) {
    this.#generateId = options.generateId ?? randomGameId;
    this.#lock = options.lock ?? new ReadWriteLock();
    this.#config = options.config ?? createTableConfig();
  }

  get size(): number {
    return this.#games.size;
  }

  async create(initial: NewGame): Promise<CreatedGame> {
    return this.#lock.withWrite(() => {
      const id = this.#newId();
      const state = createGameState(initial, this.#config.minQueueCapacity);
      this.#games.set(id, state);
      return { id, view: toGameView(id, state) };
    });
  }

  async read<T>(
    gameId: GameId,
    reader: (state: Readonly<GameState>, id: GameId) => T,
  ): Promise<T> {
    return this.#lock.withRead(() => reader(this.#require(gameId), gameId));
  }

  async update<T>(gameId: GameId, mutator: (state: GameState, id: GameId) => T): Promise<T> {
    return this.#lock.withWrite(() => mutator(this.#require(gameId), gameId));
  }

  async list(): Promise<GameSummary[]> {
    return this.#lock.withRead(() =>
      Array.from(this.#games, ([id, state]) => toGameSummary(id, state)),
    );
  }

  #require(gameId: GameId): GameState {
    const state = this.#games.get(gameId);
    if (!state) {
      throw new GameNotFoundError(gameId);
    }
    return state;
  }

  #newId(): GameId {
    // the write lock is held by the caller
    let id = this.#generateId();
    while (this.#games.has(id)) {
      id = this.#generateId();
    }
    return id;
  }
}
