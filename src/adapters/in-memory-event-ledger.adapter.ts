import type {
  AppendOutcome,
  IEventLedgerAdapter,
  ListEventsOptions,
} from '../interfaces/event-ledger-adapter.interface';
import type { RunRecord } from '../interfaces/run.interface';
import type { TelemetryEvent } from '../interfaces/telemetry-event.interface';

interface RunLog {
  bySequence: Map<number, TelemetryEvent>;
  eventIds: Set<string>;
}

function cloneJson<T>(value: T): T {
  return JSON.parse(JSON.stringify(value)) as T;
}

/**
 * Process-local ledger for tests and single-process setups. Stored values are
 * copies, so callers can never mutate what the ledger holds.
 */
export class InMemoryEventLedgerAdapter implements IEventLedgerAdapter {
  private readonly logs = new Map<string, RunLog>();
  private readonly runs = new Map<string, RunRecord>();

  async appendEvent(event: TelemetryEvent): Promise<AppendOutcome> {
    const log = this.getLog(event.runId);
    if (log.eventIds.has(event.eventId)) return 'duplicate';
    if (log.bySequence.has(event.sequence)) return 'conflict';

    log.eventIds.add(event.eventId);
    log.bySequence.set(event.sequence, cloneJson(event));
    return 'appended';
  }

  async listEvents(
    runId: string,
    options: ListEventsOptions = {},
  ): Promise<TelemetryEvent[]> {
    const log = this.logs.get(runId);
    if (!log) return [];

    const ordered = [...log.bySequence.values()].sort(
      (a, b) => a.sequence - b.sequence,
    );
    const offset = options.offset ?? 0;
    const end = options.limit === undefined ? undefined : offset + options.limit;
    return ordered.slice(offset, end).map((event) => cloneJson(event));
  }

  async countEvents(runId: string): Promise<number> {
    return this.logs.get(runId)?.bySequence.size ?? 0;
  }

  async upsertRun(run: RunRecord): Promise<void> {
    this.runs.set(run.runId, cloneJson(run));
  }

  async findRun(runId: string): Promise<RunRecord | null> {
    const run = this.runs.get(runId);
    return run ? cloneJson(run) : null;
  }

  async listRunIds(workflowId?: string): Promise<string[]> {
    if (workflowId !== undefined) {
      return [...this.runs.values()]
        .filter((run) => run.workflowId === workflowId)
        .map((run) => run.runId)
        .sort();
    }
    return [...new Set([...this.runs.keys(), ...this.logs.keys()])].sort();
  }

  private getLog(runId: string): RunLog {
    const log = this.logs.get(runId);
    if (log) return log;

    const next: RunLog = { bySequence: new Map(), eventIds: new Set() };
    this.logs.set(runId, next);
    return next;
  }
}
