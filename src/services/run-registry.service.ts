import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { TelemetryEventType } from '../events/telemetry-event-type.enum';
import type {
  RunInconsistentEvent,
  RunStartedEvent,
  RunStatusChangedEvent,
} from '../events/telemetry-events';
import { InvalidRunTransitionError } from '../errors/invalid-run-transition.error';
import { LedgerUnavailableError } from '../errors/ledger-unavailable.error';
import { RunNotFoundError } from '../errors/run-not-found.error';
import {
  createRunLifecycle,
  type LifecycleStep,
  type RunLifecycleTransition,
  type StatusLifecycle,
} from '../engines/status-lifecycle.engine';
import type { IEventLedgerAdapter } from '../interfaces/event-ledger-adapter.interface';
import {
  CONSISTENCY_VIOLATIONS,
  type EventRejection,
  type RunRecord,
  type RunStatus,
  type StartRunInput,
} from '../interfaces/run.interface';
import type { TelemetryEvent } from '../interfaces/telemetry-event.interface';
import { EVENT_LEDGER_ADAPTER } from '../telemetry.constants';
import { KeyedSerialQueue } from '../utils/keyed-serial-queue';
import { WorkflowCatalog } from './workflow-catalog.service';
import { TreeReconstructionService } from './tree-reconstruction.service';
import { CoverageAggregatorService } from './coverage-aggregator.service';

interface RunState {
  record: Omit<RunRecord, 'status'>;
  lifecycle: StatusLifecycle<RunLifecycleTransition, RunStatus>;
  coverageStarted: boolean;
  dirty: boolean;
}

const TIMEOUT_ERROR_TYPE = 'timeout';

@Injectable()
export class RunRegistry {
  private readonly logger = new Logger(RunRegistry.name);
  private readonly runs = new Map<string, RunState>();
  private readonly queue = new KeyedSerialQueue();

  constructor(
    @Inject(EVENT_LEDGER_ADAPTER) private readonly adapter: IEventLedgerAdapter,
    private readonly catalog: WorkflowCatalog,
    private readonly trees: TreeReconstructionService,
    private readonly coverage: CoverageAggregatorService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Serializes every mutation of one run. Different runs never wait on each
   * other.
   */
  runExclusive<T>(runId: string, task: () => Promise<T>): Promise<T> {
    return this.queue.run(runId, task);
  }

  has(runId: string): boolean {
    return this.runs.has(runId);
  }

  get(runId: string): RunRecord | undefined {
    const state = this.runs.get(runId);
    return state ? this.toRecord(state) : undefined;
  }

  getOrThrow(runId: string): RunRecord {
    const record = this.get(runId);
    if (!record) {
      throw new RunNotFoundError(runId);
    }
    return record;
  }

  /** Run ids whose workflow is known to be `workflowId`. */
  runsOfWorkflow(workflowId: string): string[] {
    const ids: string[] = [];
    for (const [runId, state] of this.runs.entries()) {
      if (state.record.workflowId === workflowId) ids.push(runId);
    }
    return ids;
  }

  /** Registers a run first seen through its events, in pending status. */
  ensure(runId: string): RunRecord {
    return this.toRecord(this.ensureState(runId));
  }

  /**
   * Starts or re-binds a run. This and the other run-control mutators expect
   * the caller to hold the run's lock; `RunControlService` does.
   */
  async start(input: StartRunInput): Promise<RunRecord> {
    const state = this.ensureState(input.runId);
    const status = state.lifecycle.status;
    if (state.lifecycle.isFinal()) {
      throw new InvalidRunTransitionError(input.runId, status, 'start');
    }

    this.bindWorkflow(input.runId, input.workflowId, input.workflowName);
    const initialStateIds =
      input.initialStateIds ??
      this.catalog.get(input.workflowId)?.initialStateIds ??
      [];
    const startedAt = input.startedAt ?? Date.now();
    this.beginRun(state, initialStateIds, startedAt);

    if (status === 'pending') {
      this.fire(input.runId, state, 'start');
    }

    this.eventEmitter.emit(TelemetryEventType.RUN_STARTED, {
      runId: input.runId,
      workflowId: state.record.workflowId,
      timestamp: new Date(),
    } satisfies RunStartedEvent);
    this.logger.log(
      `Run ${input.runId} started for workflow ${input.workflowId}`,
    );

    await this.flush(input.runId);
    return this.toRecord(state);
  }

  async transition(
    runId: string,
    transition: 'pause' | 'resume',
  ): Promise<RunRecord> {
    const state = this.requireState(runId);
    if (!this.fire(runId, state, transition)) {
      throw new InvalidRunTransitionError(
        runId,
        state.lifecycle.status,
        transition,
      );
    }
    await this.flush(runId);
    return this.toRecord(state);
  }

  /**
   * Marks the run cancelled and force-fails its root. Nodes still in flight
   * keep the status they were last seen with.
   */
  async cancel(runId: string, cancelledAt?: number): Promise<RunRecord> {
    const state = this.requireState(runId);
    const timestamp = cancelledAt ?? Date.now();
    if (!this.fire(runId, state, 'cancel')) {
      throw new InvalidRunTransitionError(
        runId,
        state.lifecycle.status,
        'cancel',
      );
    }

    state.record.endedAt = timestamp;
    this.trees.forceTerminateRoot(runId, 'Run cancelled', timestamp);
    this.logger.log(`Run ${runId} cancelled`);

    await this.flush(runId);
    return this.toRecord(state);
  }

  /**
   * Notes how a released event was handled so a rebuild can repeat it:
   * released past a gap, or refused.
   */
  recordOutcome(
    runId: string,
    sequence: number,
    outcome: { orderingGap: boolean; accepted: boolean },
  ): void {
    if (outcome.accepted && !outcome.orderingGap) return;

    const state = this.ensureState(runId);
    const sequences = outcome.accepted
      ? state.record.gapSequences
      : state.record.rejectedSequences;
    if (insertSorted(sequences, sequence)) {
      state.dirty = true;
    }
  }

  /** Stores the ordering buffer's next expected sequence. */
  advanceCursor(runId: string, nextSequence: number): void {
    const state = this.ensureState(runId);
    if (state.record.nextSequence !== nextSequence) {
      state.record.nextSequence = nextSequence;
      state.dirty = true;
    }
  }

  /** Records a workflow id learned from the events, if none is bound yet. */
  bindWorkflow(runId: string, workflowId: string, workflowName?: string): void {
    const state = this.ensureState(runId);
    if (state.record.workflowId === null) {
      state.record.workflowId = workflowId;
      state.dirty = true;
      this.coverage.bindWorkflow(runId, workflowId);
    }
    if (state.record.workflowName === null) {
      state.record.workflowName =
        workflowName ?? this.catalog.get(workflowId)?.workflowName ?? null;
      state.dirty = true;
    }
  }

  isTerminal(runId: string): boolean {
    return this.runs.get(runId)?.lifecycle.isFinal() ?? false;
  }

  /**
   * Moves the run status for an accepted event on the root node.
   */
  applyRootEvent(runId: string, event: TelemetryEvent): void {
    const state = this.ensureState(runId);

    if (event.node.type === 'workflow' && event.node.workflowId) {
      this.bindWorkflow(runId, event.node.workflowId, event.node.name);
    }

    if (event.eventType.endsWith('_started')) {
      this.beginRun(state, event.activeStatesBefore, event.timestamp);
      this.fire(runId, state, 'start');
      return;
    }

    state.record.endedAt = event.timestamp;
    state.dirty = true;
    if (event.eventType.endsWith('_completed')) {
      this.fire(runId, state, 'complete');
    } else if (event.error?.type === TIMEOUT_ERROR_TYPE) {
      this.fire(runId, state, 'expire');
    } else {
      this.fire(runId, state, 'fail');
    }
  }

  recordViolation(runId: string, rejection: EventRejection): void {
    if (!CONSISTENCY_VIOLATIONS.includes(rejection.reason)) {
      return;
    }

    const state = this.ensureState(runId);
    const firstViolation = !state.record.inconsistent;
    state.record.inconsistent = true;
    state.record.violations.push(rejection);
    state.dirty = true;

    if (firstViolation) {
      this.logger.warn(
        `Run ${runId} flagged inconsistent: ${rejection.reason} (${rejection.detail})`,
      );
    }

    this.eventEmitter.emit(TelemetryEventType.RUN_INCONSISTENT, {
      runId,
      violation: rejection,
      timestamp: new Date(),
    } satisfies RunInconsistentEvent);
  }

  /**
   * Restores a run from its ledger row before its events are replayed.
   * Violations come from the row: replay does not record them again.
   */
  restore(record: RunRecord): void {
    this.runs.set(record.runId, {
      record: {
        runId: record.runId,
        workflowId: null,
        workflowName: record.workflowName,
        startedAt: null,
        endedAt: record.endedAt,
        initialStateIds: [],
        inconsistent: record.inconsistent,
        violations: record.violations.map((violation) => ({ ...violation })),
        nextSequence: record.nextSequence,
        gapSequences: [...record.gapSequences],
        rejectedSequences: [...record.rejectedSequences],
      },
      // Root terminal events of a cancelled run were rejected when first seen.
      lifecycle: createRunLifecycle(
        record.status === 'cancelled' ? 'cancelled' : undefined,
      ),
      coverageStarted: false,
      dirty: false,
    });
    this.trees.open(record.runId);
    this.coverage.open(record.runId);

    if (record.workflowId) {
      this.bindWorkflow(
        record.runId,
        record.workflowId,
        record.workflowName ?? undefined,
      );
    }
    const state = this.requireState(record.runId);
    if (record.startedAt !== null) {
      this.beginRun(state, record.initialStateIds, record.startedAt);
    }
    state.dirty = false;
  }

  /**
   * Brings a restored run to the status its ledger row holds once its events
   * have been replayed. Only run-control statuses need this: the others follow
   * from the root's events.
   */
  reconcileStatus(record: RunRecord): void {
    const state = this.requireState(record.runId);

    if (record.status === 'cancelled') {
      this.trees.forceTerminateRoot(
        record.runId,
        'Run cancelled',
        record.endedAt ?? record.startedAt ?? 0,
      );
    } else if (record.status === 'paused' || record.status === 'running') {
      state.lifecycle.fire('start');
      if (record.status === 'paused') state.lifecycle.fire('pause');
    }
    state.dirty = false;
  }

  async flush(runId: string): Promise<void> {
    const state = this.runs.get(runId);
    if (!state || !state.dirty) return;

    try {
      await this.adapter.upsertRun(this.toRecord(state));
    } catch (error) {
      throw new LedgerUnavailableError('upsertRun', error);
    }
    state.dirty = false;
  }

  private beginRun(
    state: RunState,
    initialStateIds: string[],
    startedAt: number,
  ): void {
    if (state.record.startedAt === null) {
      state.record.startedAt = startedAt;
      state.dirty = true;
    }
    if (state.coverageStarted) return;

    state.coverageStarted = true;
    state.record.initialStateIds = [...initialStateIds];
    state.dirty = true;
    this.coverage.beginRun(state.record.runId, initialStateIds, startedAt);
  }

  private fire(
    runId: string,
    state: RunState,
    transition: RunLifecycleTransition,
  ): LifecycleStep<RunStatus> | null {
    const step = state.lifecycle.fire(transition);
    if (!step) return null;

    state.dirty = true;
    this.eventEmitter.emit(TelemetryEventType.RUN_STATUS_CHANGED, {
      runId,
      fromStatus: step.from,
      toStatus: step.to,
      timestamp: new Date(),
    } satisfies RunStatusChangedEvent);
    this.logger.log(`Run ${runId}: ${step.from} -> ${step.to}`);
    return step;
  }

  private ensureState(runId: string): RunState {
    const existing = this.runs.get(runId);
    if (existing) return existing;

    const state: RunState = {
      record: {
        runId,
        workflowId: null,
        workflowName: null,
        startedAt: null,
        endedAt: null,
        initialStateIds: [],
        inconsistent: false,
        violations: [],
        nextSequence: null,
        gapSequences: [],
        rejectedSequences: [],
      },
      lifecycle: createRunLifecycle(),
      coverageStarted: false,
      dirty: true,
    };
    this.runs.set(runId, state);
    this.trees.open(runId);
    this.coverage.open(runId);
    return state;
  }

  private requireState(runId: string): RunState {
    const state = this.runs.get(runId);
    if (!state) {
      throw new RunNotFoundError(runId);
    }
    return state;
  }

  private toRecord(state: RunState): RunRecord {
    return {
      ...state.record,
      status: state.lifecycle.status,
      initialStateIds: [...state.record.initialStateIds],
      violations: state.record.violations.map((violation) => ({
        ...violation,
      })),
      gapSequences: [...state.record.gapSequences],
      rejectedSequences: [...state.record.rejectedSequences],
    };
  }
}

function insertSorted(sequences: number[], sequence: number): boolean {
  let index = sequences.length;
  while (index > 0 && sequences[index - 1] > sequence) index--;
  if (sequences[index - 1] === sequence) return false;
  sequences.splice(index, 0, sequence);
  return true;
}
