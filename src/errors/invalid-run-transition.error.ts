import type { RunStatus } from '../interfaces/run.interface';

export class InvalidRunTransitionError extends Error {
  constructor(
    public readonly runId: string,
    public readonly status: RunStatus,
    public readonly transition: string,
  ) {
    super(`Run ${runId} cannot ${transition} from status "${status}".`);
    this.name = 'InvalidRunTransitionError';
  }
}
