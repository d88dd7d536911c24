import { Injectable } from '@nestjs/common';
import { RunNotFoundError } from '../errors/run-not-found.error';
import type { RunRecord, StartRunInput } from '../interfaces/run.interface';
import { EventIngestionService } from './event-ingestion.service';
import { RunRegistry } from './run-registry.service';

/**
 * Start, pause, resume and cancel. Each operation holds the run's lock and
 * works on the run as rebuilt from the ledger, so a restart never hides a
 * stored run from its controls.
 */
@Injectable()
export class RunControlService {
  constructor(
    private readonly ingestion: EventIngestionService,
    private readonly runs: RunRegistry,
  ) {}

  async startRun(input: StartRunInput): Promise<RunRecord> {
    return this.ingestion.withLoadedRun(input.runId, () =>
      this.runs.start(input),
    );
  }

  async pauseRun(runId: string): Promise<RunRecord> {
    return this.ingestion.withLoadedRun(runId, async (known) => {
      if (!known) throw new RunNotFoundError(runId);
      return this.runs.transition(runId, 'pause');
    });
  }

  async resumeRun(runId: string): Promise<RunRecord> {
    return this.ingestion.withLoadedRun(runId, async (known) => {
      if (!known) throw new RunNotFoundError(runId);
      return this.runs.transition(runId, 'resume');
    });
  }

  /**
   * Marks the run cancelled and force-fails its root at `cancelledAt`
   * (default: now).
   */
  async cancelRun(runId: string, cancelledAt?: number): Promise<RunRecord> {
    return this.ingestion.withLoadedRun(runId, async (known) => {
      if (!known) throw new RunNotFoundError(runId);
      return this.runs.cancel(runId, cancelledAt);
    });
  }
}
