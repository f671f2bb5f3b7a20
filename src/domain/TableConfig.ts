export interface TableConfig {
  /** Smallest buffer a waiting queue is created or restored with */
  readonly minQueueCapacity: number;
  /** First delay after a failed persistence attempt */
  readonly initialBackoffMs: number;
  /** Upper bound for the persistence retry delay */
  readonly maxBackoffMs: number;
  /** How long a single external-store call may run before it counts as failed */
  readonly attemptTimeoutMs: number;
}

export type TableConfigOverrides = Partial<TableConfig>;

export function createTableConfig(overrides: TableConfigOverrides = {}): TableConfig {
  return {
    minQueueCapacity: overrides.minQueueCapacity ?? 8,
    initialBackoffMs: overrides.initialBackoffMs ?? 1_000,
    maxBackoffMs: overrides.maxBackoffMs ?? 60_000,
    attemptTimeoutMs: overrides.attemptTimeoutMs ?? 10_000,
  };
}
