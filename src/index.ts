// Module
export { TelemetryModule, resolveTelemetryOptions } from './telemetry.module';

// Services
export { EventIngestionService } from './services/event-ingestion.service';
export { TelemetryQueryService } from './services/telemetry-query.service';
export type { EventPage } from './services/telemetry-query.service';
export { RunRegistry } from './services/run-registry.service';
export { RunControlService } from './services/run-control.service';
export { TreeReconstructionService } from './services/tree-reconstruction.service';
export { CoverageAggregatorService } from './services/coverage-aggregator.service';
export type { ObserveContext } from './services/coverage-aggregator.service';
export {
  ReliabilityStatsService,
  ALL_TRANSITIONS,
} from './services/reliability-stats.service';
export { WorkflowCatalog } from './services/workflow-catalog.service';
export type { RegisteredWorkflow } from './services/workflow-catalog.service';
export { GapSweepService } from './services/gap-sweep.service';
export type {
  GapSweepOptions,
  GapSweepResult,
} from './services/gap-sweep.service';

// Engines
export { ExecutionTree } from './engines/execution-tree';
export type {
  ApplyContext,
  ApplyOutcome,
  AppliedNode,
  TreeMaterialization,
} from './engines/execution-tree';
export { SequenceOrderingBuffer } from './engines/sequence-ordering-buffer';
export type {
  BufferRelease,
  GapDeclaration,
  ReleasedEvent,
  SequenceOrderingBufferOptions,
} from './engines/sequence-ordering-buffer';
export {
  StatusLifecycle,
  NODE_LIFECYCLE,
  RUN_LIFECYCLE,
  createNodeLifecycle,
  createRunLifecycle,
} from './engines/status-lifecycle.engine';
export type {
  LifecycleDefinition,
  LifecycleStep,
  NodeLifecycleTransition,
  RunLifecycleTransition,
} from './engines/status-lifecycle.engine';

// Decorators
export { TrackedWorkflow } from './decorators/tracked-workflow.decorator';

// Interfaces
export type {
  IEventLedgerAdapter,
  AppendOutcome,
  ListEventsOptions,
} from './interfaces/event-ledger-adapter.interface';
export { TREE_EVENT_TYPES } from './interfaces/telemetry-event.interface';
export type {
  TelemetryEvent,
  TreeEventType,
  NodeType,
  NodeStatus,
  EventPhase,
  EventError,
  NodeDescriptor,
  WorkflowNodeDescriptor,
  ActionNodeDescriptor,
  TransitionNodeDescriptor,
} from './interfaces/telemetry-event.interface';
export { CONSISTENCY_VIOLATIONS } from './interfaces/run.interface';
export type {
  RunStatus,
  RunRecord,
  StartRunInput,
  RejectionReason,
  EventRejection,
} from './interfaces/run.interface';
export type {
  DisplayTree,
  DisplayNode,
  NodeFlag,
  PathElement,
  ExecutionStats,
} from './interfaces/display-tree.interface';
export type {
  CoverageScope,
  CoverageSnapshot,
  CoverageGap,
  CoverageGapReport,
  CoverageHeatmap,
  CoverageHeatmapCell,
  GapPriority,
} from './interfaces/coverage.interface';
export type {
  ReliabilitySample,
  ReliabilityStats,
  ReliabilityWindow,
  FailureMode,
  WorkflowReliability,
} from './interfaces/reliability.interface';
export type {
  IngestResult,
  IngestOptions,
  GapReleaseSummary,
  GapReleaseFailure,
  StoredRunReplaySummary,
} from './interfaces/ingest-result.interface';
export type {
  WorkflowMetadata,
  DeclaredState,
  DeclaredTransition,
} from './interfaces/workflow-metadata.interface';
export type {
  TelemetryModuleOptions,
  TelemetryModuleAsyncOptions,
  ResolvedTelemetryOptions,
  ReliabilityWindowOptions,
  CoverageGapThresholds,
} from './interfaces/telemetry-module-options.interface';

// Validation
export {
  telemetryEventSchema,
  parseTelemetryEvent,
} from './utils/telemetry-event.schema';
export type { ParsedEvent } from './utils/telemetry-event.schema';
export { summarizeDurations } from './utils/percentiles';
export type { DurationSummary } from './utils/percentiles';

// Adapters
export { InMemoryEventLedgerAdapter } from './adapters/in-memory-event-ledger.adapter';
export { PgEventLedgerAdapter } from './adapters/pg-event-ledger.adapter';
export type { PgQueryable } from './adapters/pg-event-ledger.adapter';
export { DrizzleEventLedgerAdapter } from './adapters/drizzle-event-ledger.adapter';
export { PrismaEventLedgerAdapter } from './adapters/prisma-event-ledger.adapter';
export type { PrismaRawExecutor } from './adapters/prisma-event-ledger.adapter';

// Errors
export { DuplicateRegistrationError } from './errors/duplicate-registration.error';
export { WorkflowNotRegisteredError } from './errors/workflow-not-registered.error';
export { RunNotFoundError } from './errors/run-not-found.error';
export { InvalidRunTransitionError } from './errors/invalid-run-transition.error';
export { InvalidBatchError } from './errors/invalid-batch.error';
export { InvalidLedgerRowError } from './errors/invalid-ledger-row.error';
export { LedgerUnavailableError } from './errors/ledger-unavailable.error';

// Events
export { TelemetryEventType } from './events/telemetry-event-type.enum';
export type {
  RunStartedEvent,
  RunStatusChangedEvent,
  RunInconsistentEvent,
  EventRejectedEvent,
  GapReleasedEvent,
} from './events/telemetry-events';

// CLI
export { generateMigration } from './cli/generate-migration';

// Constants
export {
  TELEMETRY_MODULE_OPTIONS,
  EVENT_LEDGER_ADAPTER,
  TRACKED_WORKFLOW_METADATA,
  DEFAULT_LEDGER_TABLE,
  DEFAULT_GAP_TIMEOUT_MS,
  DEFAULT_FIRST_SEQUENCE,
  DEFAULT_MAX_PENDING_PLACEHOLDERS,
  DEFAULT_MAX_BATCH_SIZE,
  DEFAULT_GAP_SWEEP_CRON,
  DEFAULT_RELIABILITY_MAX_SAMPLES,
  DEFAULT_RELIABILITY_MAX_AGE_MS,
} from './telemetry.constants';
