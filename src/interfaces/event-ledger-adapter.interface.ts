import type { TelemetryEvent } from './telemetry-event.interface';
import type { RunRecord } from './run.interface';

/**
 * - appended: first time this event id was seen for the run
 * - duplicate: same (runId, eventId) already stored
 * - conflict: another event already holds (runId, sequence)
 */
export type AppendOutcome = 'appended' | 'duplicate' | 'conflict';

export interface ListEventsOptions {
  limit?: number;
  offset?: number;
}

export interface IEventLedgerAdapter {
  /**
   * Append an event to the run's log.
   * Uses ON CONFLICT DO NOTHING, so re-delivery never writes twice.
   */
  appendEvent(event: TelemetryEvent): Promise<AppendOutcome>;

  /**
   * Replay a run's events ordered by sequence.
   */
  listEvents(
    runId: string,
    options?: ListEventsOptions,
  ): Promise<TelemetryEvent[]>;

  countEvents(runId: string): Promise<number>;

  /**
   * Insert or update the run row.
   * Uses ON CONFLICT (run_id) DO UPDATE.
   */
  upsertRun(run: RunRecord): Promise<void>;

  findRun(runId: string): Promise<RunRecord | null>;

  /**
   * Ids of every run holding a row or stored events, ascending. With a
   * workflow id, only runs whose row names that workflow.
   */
  listRunIds(workflowId?: string): Promise<string[]>;
}
