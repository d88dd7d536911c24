import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  SequenceOrderingBuffer,
  type BufferRelease,
} from '../engines/sequence-ordering-buffer';
import { InvalidBatchError } from '../errors/invalid-batch.error';
import { LedgerUnavailableError } from '../errors/ledger-unavailable.error';
import { TelemetryEventType } from '../events/telemetry-event-type.enum';
import type {
  EventRejectedEvent,
  GapReleasedEvent,
} from '../events/telemetry-events';
import type {
  AppendOutcome,
  IEventLedgerAdapter,
} from '../interfaces/event-ledger-adapter.interface';
import type {
  GapReleaseSummary,
  IngestOptions,
  IngestResult,
  StoredRunReplaySummary,
} from '../interfaces/ingest-result.interface';
import type {
  EventRejection,
  RejectionReason,
  RunRecord,
} from '../interfaces/run.interface';
import {
  eventPhase,
  type TelemetryEvent,
} from '../interfaces/telemetry-event.interface';
import type { ResolvedTelemetryOptions } from '../interfaces/telemetry-module-options.interface';
import {
  DEFAULT_ERROR_TYPE,
  EVENT_LEDGER_ADAPTER,
  TELEMETRY_MODULE_OPTIONS,
} from '../telemetry.constants';
import { parseTelemetryEvent } from '../utils/telemetry-event.schema';
import { CoverageAggregatorService } from './coverage-aggregator.service';
import { ReliabilityStatsService } from './reliability-stats.service';
import { RunRegistry } from './run-registry.service';
import { TreeReconstructionService } from './tree-reconstruction.service';

interface ApplyTally {
  applied: number;
  rejections: EventRejection[];
  /** Replayed events were validated when first ingested. */
  replaying: boolean;
}

const UNKNOWN_EVENT_ID = '(unknown)';

@Injectable()
export class EventIngestionService implements OnApplicationBootstrap {
  private readonly logger = new Logger(EventIngestionService.name);
  private readonly buffers = new Map<string, SequenceOrderingBuffer>();

  constructor(
    @Inject(EVENT_LEDGER_ADAPTER) private readonly adapter: IEventLedgerAdapter,
    @Inject(TELEMETRY_MODULE_OPTIONS)
    private readonly options: Pick<
      ResolvedTelemetryOptions,
      'maxBatchSize' | 'firstSequence' | 'gapTimeoutMs' | 'replayOnStartup'
    >,
    private readonly runs: RunRegistry,
    private readonly trees: TreeReconstructionService,
    private readonly coverage: CoverageAggregatorService,
    private readonly reliability: ReliabilityStatsService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.options.replayOnStartup) return;

    try {
      const summary = await this.replayStoredRuns();
      this.logger.log(
        `Replayed ${summary.runsReplayed} of ${summary.runsScanned} stored runs`,
      );
    } catch (error) {
      this.logger.error(
        'Failed to replay stored runs on startup; runs will load on first use',
        error instanceof Error ? error.stack : error,
      );
    }
  }

  /**
   * Validates, stores and applies a batch of events for one run. Safe to
   * retry: events the ledger already holds are counted as deduplicated and
   * never applied twice.
   */
  async ingest(
    runId: string,
    batch: readonly unknown[],
    options: IngestOptions = {},
  ): Promise<IngestResult> {
    if (batch.length > this.options.maxBatchSize) {
      throw new InvalidBatchError(
        runId,
        `Batch of ${batch.length} events exceeds the limit of ${this.options.maxBatchSize}`,
      );
    }

    const receivedAt = options.receivedAt ?? Date.now();

    return this.runs.runExclusive(runId, async () => {
      await this.loadLocked(runId, receivedAt);

      const result: IngestResult = {
        runId,
        accepted: 0,
        deduplicated: 0,
        rejected: 0,
        applied: 0,
        pending: 0,
        rejections: [],
      };
      const tally: ApplyTally = { applied: 0, rejections: [], replaying: false };

      const existing = this.buffers.get(runId);
      if (existing) {
        this.applyRelease(
          runId,
          existing,
          existing.releaseExpired(receivedAt),
          tally,
        );
      }

      for (const input of batch) {
        const parsed = parseTelemetryEvent(input);
        if (!parsed.ok) {
          this.reject(runId, tally, {
            eventId: parsed.eventId ?? UNKNOWN_EVENT_ID,
            sequence: parsed.sequence,
            nodeId: null,
            reason: 'invalid_event',
            detail: parsed.detail,
          });
          continue;
        }

        const event = parsed.event;
        if (event.runId !== runId) {
          this.rejectEvent(
            runId,
            tally,
            event,
            'run_mismatch',
            `event belongs to run ${event.runId}`,
          );
          continue;
        }

        const outcome = await this.append(event);
        if (outcome === 'duplicate') {
          result.deduplicated++;
          this.logger.debug(
            `Duplicate event ${event.eventId} (seq ${event.sequence}) for run ${runId} ignored`,
          );
          continue;
        }
        if (outcome === 'conflict') {
          this.rejectEvent(
            runId,
            tally,
            event,
            'sequence_conflict',
            `sequence ${event.sequence} is already held by another event`,
          );
          continue;
        }

        result.accepted++;
        const buffer = this.bufferFor(runId);
        this.applyRelease(runId, buffer, buffer.offer(event, receivedAt), tally);
      }

      await this.runs.flush(runId);

      result.applied = tally.applied;
      result.rejections = tally.rejections;
      result.rejected = tally.rejections.length;
      result.pending = this.buffers.get(runId)?.pendingCount ?? 0;
      return result;
    });
  }

  /**
   * Releases every held gap whose timeout has elapsed, across all runs.
   * A failing run does not stop the others.
   */
  async releaseExpiredGaps(now: number = Date.now()): Promise<GapReleaseSummary> {
    const summary: GapReleaseSummary = {
      runsScanned: 0,
      runsReleased: 0,
      eventsReleased: 0,
      rejected: 0,
      failures: [],
    };

    const holding = [...this.buffers.entries()]
      .filter(([, buffer]) => buffer.pendingCount > 0)
      .map(([runId]) => runId);
    summary.runsScanned = holding.length;

    await Promise.all(
      holding.map(async (runId) => {
        try {
          const released = await this.runs.runExclusive(runId, async () => {
            const buffer = this.buffers.get(runId);
            if (!buffer) return null;

            const release = buffer.releaseExpired(now);
            const tally: ApplyTally = {
              applied: 0,
              rejections: [],
              replaying: false,
            };
            this.applyRelease(runId, buffer, release, tally);
            await this.runs.flush(runId);
            return { count: release.released.length, rejected: tally.rejections.length };
          });

          if (released && released.count > 0) {
            summary.runsReleased++;
            summary.eventsReleased += released.count;
            summary.rejected += released.rejected;
          }
        } catch (error) {
          summary.failures.push({
            runId,
            error: error instanceof Error ? error.message : String(error),
          });
          this.logger.error(
            `Failed to release expired gaps for run ${runId}`,
            error instanceof Error ? error.stack : error,
          );
        }
      }),
    );

    return summary;
  }

  /**
   * Runs `task` under the run's lock once the run is in memory, rebuilding it
   * from the ledger first when needed. `known` is false when neither memory
   * nor the ledger holds the run.
   */
  withLoadedRun<T>(
    runId: string,
    task: (known: boolean) => Promise<T>,
    now: number = Date.now(),
  ): Promise<T> {
    return this.runs.runExclusive(runId, async () =>
      task(await this.loadLocked(runId, now)),
    );
  }

  /**
   * Rebuilds a run that is not in memory from its ledger row and stored
   * events. Returns false when the ledger does not know the run.
   */
  async replayRun(runId: string): Promise<boolean> {
    return this.withLoadedRun(runId, async (known) => known);
  }

  /**
   * Rebuilds every stored run that is not in memory yet, one at a time, so
   * workflow coverage and reliability cover runs from earlier processes.
   */
  async replayStoredRuns(
    now: number = Date.now(),
  ): Promise<StoredRunReplaySummary> {
    let runIds: string[];
    try {
      runIds = await this.adapter.listRunIds();
    } catch (error) {
      throw new LedgerUnavailableError('listRunIds', error);
    }

    const summary: StoredRunReplaySummary = {
      runsScanned: runIds.length,
      runsReplayed: 0,
      failures: [],
    };
    for (const runId of runIds) {
      try {
        const replayed = await this.runs.runExclusive(runId, async () => {
          if (this.runs.has(runId)) return false;
          return this.replayLocked(runId, now);
        });
        if (replayed) summary.runsReplayed++;
      } catch (error) {
        summary.failures.push({
          runId,
          error: error instanceof Error ? error.message : String(error),
        });
        this.logger.error(
          `Failed to replay stored run ${runId}`,
          error instanceof Error ? error.stack : error,
        );
      }
    }
    return summary;
  }

  private async loadLocked(runId: string, now: number): Promise<boolean> {
    if (this.runs.has(runId)) return true;
    return this.replayLocked(runId, now);
  }

  /**
   * Events below the row's stored cursor were handled before and are
   * re-applied as they were then: refused ones skipped, gap releases flagged.
   * Events from the cursor on were stored but never processed, because the
   * row was not written after them, so they go through the buffer as new.
   */
  private async replayLocked(runId: string, now: number): Promise<boolean> {
    let record: RunRecord | null;
    let events: TelemetryEvent[];
    try {
      record = await this.adapter.findRun(runId);
      events = await this.adapter.listEvents(runId);
    } catch (error) {
      throw new LedgerUnavailableError('replay', error);
    }
    if (!record && events.length === 0) return false;

    const cursor = record?.nextSequence ?? this.options.firstSequence;
    const replayed: ApplyTally = { applied: 0, rejections: [], replaying: true };
    if (record) {
      const gapSequences = new Set(record.gapSequences);
      const rejectedSequences = new Set(record.rejectedSequences);
      this.runs.restore(record);
      for (const event of events) {
        if (event.sequence >= cursor) continue;
        if (rejectedSequences.has(event.sequence)) continue;
        this.applyEvent(
          runId,
          event,
          gapSequences.has(event.sequence),
          replayed,
        );
      }
      this.runs.reconcileStatus(record);
    }

    const buffer = this.bufferFor(runId, cursor);
    const unprocessed: ApplyTally = {
      applied: 0,
      rejections: [],
      replaying: false,
    };
    for (const event of events) {
      if (event.sequence < cursor) continue;
      this.applyRelease(runId, buffer, buffer.offer(event, now), unprocessed);
    }
    await this.runs.flush(runId);

    this.logger.log(
      `Replayed run ${runId}: ${events.length} events, ${replayed.applied + unprocessed.applied} applied, ${buffer.pendingCount} held`,
    );
    return true;
  }

  private async append(event: TelemetryEvent): Promise<AppendOutcome> {
    try {
      return await this.adapter.appendEvent(event);
    } catch (error) {
      throw new LedgerUnavailableError('appendEvent', error);
    }
  }

  private bufferFor(
    runId: string,
    firstSequence: number = this.options.firstSequence,
  ): SequenceOrderingBuffer {
    let buffer = this.buffers.get(runId);
    if (!buffer) {
      buffer = new SequenceOrderingBuffer({
        firstSequence,
        gapTimeoutMs: this.options.gapTimeoutMs,
      });
      this.buffers.set(runId, buffer);
      this.runs.ensure(runId);
    }
    return buffer;
  }

  private applyRelease(
    runId: string,
    buffer: SequenceOrderingBuffer,
    release: BufferRelease,
    tally: ApplyTally,
  ): void {
    for (const gap of release.gaps) {
      if (tally.replaying) continue;
      this.logger.warn(
        `Run ${runId}: sequence(s) ${gap.missingSequences.join(', ')} declared missing; released ${gap.releasedSequences.join(', ')}`,
      );
      this.eventEmitter.emit(TelemetryEventType.GAP_RELEASED, {
        runId,
        missingSequences: gap.missingSequences,
        releasedSequences: gap.releasedSequences,
        timestamp: new Date(),
      } satisfies GapReleasedEvent);
    }

    for (const { event, orderingGap } of release.released) {
      const accepted = this.applyEvent(runId, event, orderingGap, tally);
      this.runs.recordOutcome(runId, event.sequence, { orderingGap, accepted });
    }
    this.runs.advanceCursor(runId, buffer.nextExpectedSequence);
  }

  private applyEvent(
    runId: string,
    event: TelemetryEvent,
    orderingGap: boolean,
    tally: ApplyTally,
  ): boolean {
    const phase = eventPhase(event.eventType);
    const cancelled = this.runs.get(runId)?.status === 'cancelled';

    if (cancelled && event.parentNodeId === null && phase !== 'started') {
      this.rejectEvent(
        runId,
        tally,
        event,
        'run_terminated',
        `run ${runId} was cancelled before the root finished`,
      );
      return false;
    }

    const outcome = this.trees.apply(runId, event, { orderingGap });
    if (!outcome.accepted) {
      this.reject(runId, tally, outcome.rejection);
      return false;
    }
    tally.applied++;

    if (outcome.node.isRoot) {
      this.runs.applyRootEvent(runId, event);
      // On replay the stored cancellation time is applied once all events are in.
      if (cancelled && !tally.replaying) {
        this.trees.forceTerminateRoot(runId, 'Run cancelled', event.timestamp);
      }
    }

    this.coverage.observe(runId, event, {
      statesChanged: outcome.statesChanged,
    });

    const node = event.node;
    if (node.type === 'transition' && phase !== 'started') {
      this.reliability.record({
        transitionId: node.transitionId,
        workflowId: this.runs.get(runId)?.workflowId ?? null,
        transitionName: node.name,
        fromState: node.fromState,
        toState: node.toState,
        durationMs: outcome.node.durationMs ?? event.durationMs ?? null,
        success: phase === 'completed',
        errorType:
          phase === 'failed'
            ? (event.error?.type ?? DEFAULT_ERROR_TYPE)
            : undefined,
        timestamp: event.timestamp,
      });
    }
    return true;
  }

  private rejectEvent(
    runId: string,
    tally: ApplyTally,
    event: TelemetryEvent,
    reason: RejectionReason,
    detail: string,
  ): void {
    this.reject(runId, tally, {
      eventId: event.eventId,
      sequence: event.sequence,
      nodeId: event.nodeId,
      reason,
      detail,
    });
  }

  private reject(
    runId: string,
    tally: ApplyTally,
    rejection: EventRejection,
  ): void {
    tally.rejections.push(rejection);
    if (tally.replaying) return;

    this.logger.warn(
      `Rejected event ${rejection.eventId} for run ${runId}: ${rejection.reason} (${rejection.detail})`,
    );
    this.eventEmitter.emit(TelemetryEventType.EVENT_REJECTED, {
      runId,
      rejection,
      timestamp: new Date(),
    } satisfies EventRejectedEvent);
    this.runs.recordViolation(runId, rejection);
  }
}
