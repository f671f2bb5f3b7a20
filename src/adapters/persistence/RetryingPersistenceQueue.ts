import { PersistenceTimeoutError } from "../../domain/errors/index.js";
import type { Logger } from "../../domain/ports/Logger.js";
import type { PersistenceOp, PersistenceQueue } from "../../domain/ports/PersistenceQueue.js";
import type { PlayerStore } from "../../domain/ports/PlayerStore.js";
import { createTableConfig, type TableConfig } from "../../domain/TableConfig.js";

export interface RetryingPersistenceQueueOptions {
  readonly store: PlayerStore;
  readonly config?: TableConfig;
  readonly logger?: Logger;
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Delivery of a single operation: attempt → wait(backoff) → attempt … until
 * an attempt succeeds. Backoff doubles after every wait up to the cap.
 */
export type DeliveryState =
  | { readonly kind: "attempt"; readonly attempt: number; readonly backoffMs: number }
  | {
      readonly kind: "wait";
      readonly attempt: number;
      readonly backoffMs: number;
      readonly error: unknown;
    }
  | { readonly kind: "done"; readonly attempt: number };

export interface InFlight {
  readonly op: PersistenceOp;
  readonly state: DeliveryState;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function nextBackoff(current: number, max: number): number {
  return Math.min(current * 2, max);
}

/**
 * Ordered single-worker queue in front of a {@link PlayerStore}.
 *
 * A failing operation is retried until it succeeds and holds back everything
 * submitted after it; operations are never dropped or reordered.
 */
export class RetryingPersistenceQueue implements PersistenceQueue {
  readonly #store: PlayerStore;
  readonly #config: TableConfig;
  readonly #logger: Logger | undefined;
  readonly #sleep: (ms: number) => Promise<void>;
  readonly #queue: PersistenceOp[] = [];
  #active = false;
  #worker: Promise<void> = Promise.resolve();
  #inFlight: InFlight | undefined;

  constructor(options: RetryingPersistenceQueueOptions) {
    this.#store = options.store;
    this.#config = options.config ?? createTableConfig();
    this.#logger = options.logger;
    this.#sleep = options.sleep ?? defaultSleep;
  }

  /** Operations not yet delivered, including the one in flight. */
  get pending(): number {
    return this.#queue.length;
  }

  get inFlight(): InFlight | undefined {
    return this.#inFlight;
  }

  submit(op: PersistenceOp): void {
    this.#queue.push(op);
    if (this.#active) {
      return;
    }
    this.#active = true;
    this.#worker = this.#run().catch((error: unknown) => {
      this.#logger?.error?.("Persistence worker stopped", { error, pending: this.pending });
    });
  }

  /** Resolves once every submitted operation has been delivered. */
  async drain(): Promise<void> {
    while (this.#active) {
      await this.#worker;
    }
  }

  async #run(): Promise<void> {
    try {
      for (let op = this.#queue[0]; op !== undefined; op = this.#queue[0]) {
        await this.#deliver(op);
        this.#queue.shift();
      }
    } finally {
      this.#active = false;
      this.#inFlight = undefined;
    }
  }

  async #deliver(op: PersistenceOp): Promise<void> {
    let state: DeliveryState = {
      kind: "attempt",
      attempt: 1,
      backoffMs: this.#config.initialBackoffMs,
    };

    while (state.kind !== "done") {
      this.#inFlight = { op, state };
      state = await this.#step(op, state);
    }

    if (state.attempt > 1) {
      this.#logger?.info?.("Persistence operation recovered", {
        type: op.type,
        attempts: state.attempt,
      });
    } else {
      this.#logger?.debug?.("Persistence operation delivered", { type: op.type });
    }
  }

  async #step(
    op: PersistenceOp,
    state: Exclude<DeliveryState, { readonly kind: "done" }>,
  ): Promise<DeliveryState> {
    switch (state.kind) {
      case "attempt":
        try {
          await this.#attempt(op);
          return { kind: "done", attempt: state.attempt };
        } catch (error) {
          return { kind: "wait", attempt: state.attempt, backoffMs: state.backoffMs, error };
        }
      case "wait":
        this.#logger?.warn?.("Persistence operation failed; retrying", {
          type: op.type,
          attempt: state.attempt,
          retryInMs: state.backoffMs,
          error: state.error,
        });
        await this.#sleep(state.backoffMs);
        return {
          kind: "attempt",
          attempt: state.attempt + 1,
          backoffMs: nextBackoff(state.backoffMs, this.#config.maxBackoffMs),
        };
    }
  }

  /**
   * Runs one attempt. On timeout the signal is aborted and the attempt is
   * still awaited: the next try never overlaps a write that may yet commit.
   * An attempt that completes after the abort counts as delivered.
   */
  async #attempt(op: PersistenceOp): Promise<void> {
    const timeoutMs = this.#config.attemptTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new PersistenceTimeoutError(op.type, timeoutMs));
    }, timeoutMs);

    try {
      await this.#perform(op, controller.signal);
    } catch (error) {
      throw controller.signal.aborted ? controller.signal.reason : error;
    } finally {
      clearTimeout(timer);
    }
  }

  #perform(op: PersistenceOp, signal: AbortSignal): Promise<void> {
    switch (op.type) {
      case "EnsurePlayers":
        return this.#store.ensurePlayers(op.names, signal);
      case "RecordGoal":
        return this.#store.recordGoal(
          {
            gameId: op.gameId,
            team: op.team,
            preRotation: op.preRotation,
            rotation: op.rotation,
            fullRotation: op.fullRotation,
          },
          signal,
        );
    }
  }
}
