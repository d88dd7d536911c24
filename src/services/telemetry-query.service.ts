import { Inject, Injectable } from '@nestjs/common';
import { LedgerUnavailableError } from '../errors/ledger-unavailable.error';
import { RunNotFoundError } from '../errors/run-not-found.error';
import type {
  CoverageGapReport,
  CoverageHeatmap,
  CoverageSnapshot,
} from '../interfaces/coverage.interface';
import type {
  DisplayTree,
  ExecutionStats,
  PathElement,
} from '../interfaces/display-tree.interface';
import type {
  IEventLedgerAdapter,
  ListEventsOptions,
} from '../interfaces/event-ledger-adapter.interface';
import type {
  ReliabilityStats,
  ReliabilityWindow,
  WorkflowReliability,
} from '../interfaces/reliability.interface';
import type { RunRecord } from '../interfaces/run.interface';
import type { TelemetryEvent } from '../interfaces/telemetry-event.interface';
import { EVENT_LEDGER_ADAPTER } from '../telemetry.constants';
import { CoverageAggregatorService } from './coverage-aggregator.service';
import { EventIngestionService } from './event-ingestion.service';
import { ReliabilityStatsService } from './reliability-stats.service';
import { RunRegistry } from './run-registry.service';
import { TreeReconstructionService } from './tree-reconstruction.service';

export interface EventPage {
  events: TelemetryEvent[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

export const DEFAULT_EVENT_PAGE_SIZE = 100;

/**
 * Read side of the engine. Run-scoped reads of a run that is not in memory
 * rebuild it from the ledger first.
 */
@Injectable()
export class TelemetryQueryService {
  constructor(
    @Inject(EVENT_LEDGER_ADAPTER) private readonly adapter: IEventLedgerAdapter,
    private readonly ingestion: EventIngestionService,
    private readonly runs: RunRegistry,
    private readonly trees: TreeReconstructionService,
    private readonly coverage: CoverageAggregatorService,
    private readonly reliability: ReliabilityStatsService,
  ) {}

  async getRun(runId: string): Promise<RunRecord> {
    await this.load(runId);
    return this.runs.getOrThrow(runId);
  }

  async getTree(runId: string): Promise<DisplayTree> {
    const run = await this.getRun(runId);
    return this.trees.snapshot(run);
  }

  async getExecutionStats(runId: string): Promise<ExecutionStats> {
    await this.load(runId);
    return this.trees.executionStats(runId);
  }

  async getNodePath(runId: string, nodeId: string): Promise<PathElement[]> {
    await this.load(runId);
    return this.trees.nodePath(runId, nodeId);
  }

  async getCoverage(runId: string): Promise<CoverageSnapshot> {
    await this.load(runId);
    return this.coverage.coverage(runId);
  }

  getWorkflowCoverage(workflowId: string): CoverageSnapshot {
    return this.coverage.workflowCoverage(workflowId);
  }

  getCoverageGaps(workflowId: string): CoverageGapReport {
    return this.coverage.coverageGaps(workflowId);
  }

  getCoverageHeatmap(workflowId: string): CoverageHeatmap {
    return this.coverage.heatmap(workflowId);
  }

  getReliability(
    transitionId: string,
    window?: ReliabilityWindow,
  ): ReliabilityStats {
    return this.reliability.stats(transitionId, window);
  }

  getWorkflowReliability(
    workflowId: string,
    window?: ReliabilityWindow,
  ): WorkflowReliability {
    return this.reliability.workflowStats(workflowId, window);
  }

  /** Stored events of the run in sequence order, rejected ones included. */
  async listEvents(
    runId: string,
    options: ListEventsOptions = {},
  ): Promise<EventPage> {
    await this.load(runId);
    const limit = options.limit ?? DEFAULT_EVENT_PAGE_SIZE;
    const offset = options.offset ?? 0;

    try {
      const [events, total] = await Promise.all([
        this.adapter.listEvents(runId, { limit, offset }),
        this.adapter.countEvents(runId),
      ]);
      return {
        events,
        total,
        limit,
        offset,
        hasMore: offset + events.length < total,
      };
    } catch (error) {
      throw new LedgerUnavailableError('listEvents', error);
    }
  }

  private async load(runId: string): Promise<void> {
    if (this.runs.has(runId)) return;
    const found = await this.ingestion.replayRun(runId);
    if (!found) {
      throw new RunNotFoundError(runId);
    }
  }
}
