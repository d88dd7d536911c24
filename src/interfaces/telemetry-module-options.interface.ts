import type {
  InjectionToken,
  ModuleMetadata,
  OptionalFactoryDependency,
} from '@nestjs/common';
import type { IEventLedgerAdapter } from './event-ledger-adapter.interface';
import type { WorkflowMetadata } from './workflow-metadata.interface';

export interface ReliabilityWindowOptions {
  /** Samples kept per transition. Default: 1000 */
  maxSamples?: number;
  /** Oldest sample age kept, in ms. Default: 30 days */
  maxAgeMs?: number;
}

export interface CoverageGapThresholds {
  /** Run-coverage ratio below which a gap is "high". Default: 0.1 */
  highBelowRatio?: number;
  /** Run-coverage ratio below which a gap is "medium". Default: 0.5 */
  mediumBelowRatio?: number;
}

export interface TelemetryModuleOptions {
  /** Event ledger adapter instance implementing IEventLedgerAdapter */
  adapter: IEventLedgerAdapter;

  /** Wait before a sequence gap is declared missing. Default: 2000 */
  gapTimeoutMs?: number;

  /** Sequence number of a run's first event. Default: 1 */
  firstSequence?: number;

  /** Unfilled placeholder parents tolerated per run. Default: 1 */
  maxPendingPlaceholders?: number;

  /** Largest accepted ingest batch. Default: 100 */
  maxBatchSize?: number;

  /** Cron expression for the gap sweep. Default: every second */
  gapSweepCronExpression?: string;

  /** Enable internal gap sweep registration. Default: true */
  enableGapSweep?: boolean;

  /** Rebuild every run the ledger holds when the application boots. Default: true */
  replayOnStartup?: boolean;

  reliability?: ReliabilityWindowOptions;

  coverageGapThresholds?: CoverageGapThresholds;

  /** Workflows registered up front, in addition to decorated providers. */
  workflows?: WorkflowMetadata[];
}

export interface TelemetryModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory: (
    ...args: any[]
  ) => Promise<TelemetryModuleOptions> | TelemetryModuleOptions;
  inject?: Array<InjectionToken | OptionalFactoryDependency>;
}

export interface ResolvedTelemetryOptions {
  gapTimeoutMs: number;
  firstSequence: number;
  maxPendingPlaceholders: number;
  maxBatchSize: number;
  gapSweepCronExpression: string;
  enableGapSweep: boolean;
  replayOnStartup: boolean;
  reliability: Required<ReliabilityWindowOptions>;
  coverageGapThresholds: Required<CoverageGapThresholds>;
  workflows: WorkflowMetadata[];
}
