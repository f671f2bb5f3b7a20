import type { GameStore } from "../ports/GameStore.js";
import type { Logger } from "../ports/Logger.js";
import type { PersistenceQueue } from "../ports/PersistenceQueue.js";
import type { TableConfig } from "../TableConfig.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly store: GameStore;
  readonly persistence: PersistenceQueue;
  readonly config: TableConfig;
  readonly logger?: Logger;
}

export abstract class Command<TResult = void> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<TResult>;
}
