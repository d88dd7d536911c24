export class InvalidBatchError extends Error {
  constructor(
    public readonly runId: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidBatchError';
  }
}
