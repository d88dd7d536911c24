import { Inject, Injectable } from '@nestjs/common';
import {
  ExecutionTree,
  type ApplyContext,
  type ApplyOutcome,
} from '../engines/execution-tree';
import type {
  DisplayTree,
  ExecutionStats,
  PathElement,
} from '../interfaces/display-tree.interface';
import type { RunRecord } from '../interfaces/run.interface';
import type { TelemetryEvent } from '../interfaces/telemetry-event.interface';
import type { ResolvedTelemetryOptions } from '../interfaces/telemetry-module-options.interface';
import { TELEMETRY_MODULE_OPTIONS } from '../telemetry.constants';
import { WorkflowCatalog } from './workflow-catalog.service';

@Injectable()
export class TreeReconstructionService {
  private readonly trees = new Map<string, ExecutionTree>();

  constructor(
    private readonly catalog: WorkflowCatalog,
    @Inject(TELEMETRY_MODULE_OPTIONS)
    private readonly options: Pick<
      ResolvedTelemetryOptions,
      'maxPendingPlaceholders'
    >,
  ) {}

  open(runId: string): ExecutionTree {
    const existing = this.trees.get(runId);
    if (existing) return existing;

    const tree = new ExecutionTree(runId, this.options.maxPendingPlaceholders);
    this.trees.set(runId, tree);
    return tree;
  }

  apply(
    runId: string,
    event: TelemetryEvent,
    context: ApplyContext,
  ): ApplyOutcome {
    return this.open(runId).apply(event, context);
  }

  forceTerminateRoot(runId: string, reason: string, timestamp: number): boolean {
    return this.trees.get(runId)?.forceTerminateRoot(reason, timestamp) ?? false;
  }

  /**
   * Point-in-time copy of the run's tree. Later events never show up in a
   * snapshot already returned.
   */
  snapshot(run: RunRecord): DisplayTree {
    const tree = this.open(run.runId);
    const materialized = tree.materializeTree();

    return {
      runId: run.runId,
      workflowId: run.workflowId,
      workflowName: run.workflowName,
      runStatus: run.status,
      status: materialized.rootStatus,
      durationMs: materialized.durationMs,
      rootNodes: materialized.rootNodes,
      totalEvents: materialized.totalEvents,
      initialStateIds: [...run.initialStateIds],
      stateNameMap: this.catalog.stateNameMap(run.workflowId),
      inconsistent: run.inconsistent,
      violations: run.violations.map((violation) => ({ ...violation })),
    };
  }

  executionStats(runId: string): ExecutionStats {
    return this.open(runId).executionStats();
  }

  /** Empty when the node is not part of the run. */
  nodePath(runId: string, nodeId: string): PathElement[] {
    return this.open(runId).pathTo(nodeId);
  }
}
