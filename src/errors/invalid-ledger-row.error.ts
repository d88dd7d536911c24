export class InvalidLedgerRowError extends Error {
  constructor(
    public readonly runId: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidLedgerRowError';
  }
}
