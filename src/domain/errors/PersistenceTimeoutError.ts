export class PersistenceTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} did not complete within ${timeoutMs}ms`);
    this.name = "PersistenceTimeoutError";
  }
}
