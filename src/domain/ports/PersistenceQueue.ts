import type { GoalEventRecord } from "./PlayerStore.js";
import type { PlayerId } from "../typedefs.js";

export type PersistenceOp =
  | { readonly type: "EnsurePlayers"; readonly names: readonly PlayerId[] }
  | ({ readonly type: "RecordGoal" } & GoalEventRecord);

/**
 * Fire-and-forget durability. Implementations must deliver operations in
 * submission order and must never make {@link submit} wait on the store.
 */
export interface PersistenceQueue {
  submit(op: PersistenceOp): void;
}
