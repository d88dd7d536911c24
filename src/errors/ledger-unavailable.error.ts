/**
 * Storage-layer failure behind the event ledger. Ingestion is idempotent,
 * so the caller may retry the same batch.
 */
export class LedgerUnavailableError extends Error {
  public readonly retryable = true;

  constructor(
    public readonly operation: string,
    public readonly cause: unknown,
  ) {
    super(
      `Event ledger ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = 'LedgerUnavailableError';
  }
}
