import type { Logger } from "../../domain/ports/Logger.js";
import type { PersistenceOp, PersistenceQueue } from "../../domain/ports/PersistenceQueue.js";

/** Stand-in used when no external store is configured. */
export class DisabledPersistenceQueue implements PersistenceQueue {
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  submit(op: PersistenceOp): void {
    this.#logger?.debug?.("Persistence disabled; skipping operation", { type: op.type });
  }
}
