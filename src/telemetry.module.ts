import { DynamicModule, Module } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { CoverageAggregatorService } from './services/coverage-aggregator.service';
import { EventIngestionService } from './services/event-ingestion.service';
import { GapSweepService } from './services/gap-sweep.service';
import { ReliabilityStatsService } from './services/reliability-stats.service';
import { RunControlService } from './services/run-control.service';
import { RunRegistry } from './services/run-registry.service';
import { TelemetryQueryService } from './services/telemetry-query.service';
import { TreeReconstructionService } from './services/tree-reconstruction.service';
import { WorkflowCatalog } from './services/workflow-catalog.service';
import {
  ResolvedTelemetryOptions,
  TelemetryModuleAsyncOptions,
  TelemetryModuleOptions,
} from './interfaces/telemetry-module-options.interface';
import {
  TELEMETRY_MODULE_OPTIONS,
  EVENT_LEDGER_ADAPTER,
  DEFAULT_FIRST_SEQUENCE,
  DEFAULT_GAP_SWEEP_CRON,
  DEFAULT_GAP_TIMEOUT_MS,
  DEFAULT_HIGH_GAP_BELOW_RATIO,
  DEFAULT_MAX_BATCH_SIZE,
  DEFAULT_MAX_PENDING_PLACEHOLDERS,
  DEFAULT_MEDIUM_GAP_BELOW_RATIO,
  DEFAULT_RELIABILITY_MAX_AGE_MS,
  DEFAULT_RELIABILITY_MAX_SAMPLES,
} from './telemetry.constants';

export function resolveTelemetryOptions(
  options: TelemetryModuleOptions,
): ResolvedTelemetryOptions {
  return {
    gapTimeoutMs: options.gapTimeoutMs ?? DEFAULT_GAP_TIMEOUT_MS,
    firstSequence: options.firstSequence ?? DEFAULT_FIRST_SEQUENCE,
    maxPendingPlaceholders:
      options.maxPendingPlaceholders ?? DEFAULT_MAX_PENDING_PLACEHOLDERS,
    maxBatchSize: options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE,
    gapSweepCronExpression:
      options.gapSweepCronExpression ?? DEFAULT_GAP_SWEEP_CRON,
    enableGapSweep: options.enableGapSweep ?? true,
    replayOnStartup: options.replayOnStartup ?? true,
    reliability: {
      maxSamples:
        options.reliability?.maxSamples ?? DEFAULT_RELIABILITY_MAX_SAMPLES,
      maxAgeMs: options.reliability?.maxAgeMs ?? DEFAULT_RELIABILITY_MAX_AGE_MS,
    },
    coverageGapThresholds: {
      highBelowRatio:
        options.coverageGapThresholds?.highBelowRatio ??
        DEFAULT_HIGH_GAP_BELOW_RATIO,
      mediumBelowRatio:
        options.coverageGapThresholds?.mediumBelowRatio ??
        DEFAULT_MEDIUM_GAP_BELOW_RATIO,
    },
    workflows: options.workflows ?? [],
  };
}

const SERVICES = [
  WorkflowCatalog,
  TreeReconstructionService,
  CoverageAggregatorService,
  ReliabilityStatsService,
  RunRegistry,
  EventIngestionService,
  RunControlService,
  TelemetryQueryService,
  GapSweepService,
];

const EXPORTED_SERVICES = [
  WorkflowCatalog,
  RunRegistry,
  EventIngestionService,
  RunControlService,
  TelemetryQueryService,
  TreeReconstructionService,
  CoverageAggregatorService,
  ReliabilityStatsService,
];

@Module({})
export class TelemetryModule {
  static forRoot(options: TelemetryModuleOptions): DynamicModule {
    return {
      module: TelemetryModule,
      imports: [
        DiscoveryModule,
        EventEmitterModule.forRoot(),
      ],
      providers: [
        {
          provide: EVENT_LEDGER_ADAPTER,
          useValue: options.adapter,
        },
        {
          provide: TELEMETRY_MODULE_OPTIONS,
          useValue: resolveTelemetryOptions(options),
        },
        ...SERVICES,
      ],
      exports: [...EXPORTED_SERVICES, EVENT_LEDGER_ADAPTER],
      global: true,
    };
  }

  static forRootAsync(options: TelemetryModuleAsyncOptions): DynamicModule {
    return {
      module: TelemetryModule,
      imports: [
        DiscoveryModule,
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: [
        {
          provide: TELEMETRY_MODULE_OPTIONS,
          useFactory: async (...args: any[]) => {
            const opts = await options.useFactory(...args);
            return resolveTelemetryOptions(opts);
          },
          inject: options.inject ?? [],
        },
        {
          provide: EVENT_LEDGER_ADAPTER,
          useFactory: async (...args: any[]) => {
            const opts = await options.useFactory(...args);
            return opts.adapter;
          },
          inject: options.inject ?? [],
        },
        ...SERVICES,
      ],
      exports: [...EXPORTED_SERVICES, EVENT_LEDGER_ADAPTER],
      global: true,
    };
  }
}
