export class RunNotFoundError extends Error {
  constructor(public readonly runId: string) {
    super(`Run "${runId}" is not known to the engine or the ledger.`);
    this.name = 'RunNotFoundError';
  }
}
