import { Inject, Injectable } from '@nestjs/common';
import type {
  FailureMode,
  ReliabilitySample,
  ReliabilityStats,
  ReliabilityWindow,
  WorkflowReliability,
} from '../interfaces/reliability.interface';
import type { ResolvedTelemetryOptions } from '../interfaces/telemetry-module-options.interface';
import {
  DEFAULT_ERROR_TYPE,
  TELEMETRY_MODULE_OPTIONS,
} from '../telemetry.constants';
import { summarizeDurations } from '../utils/percentiles';
import { WorkflowCatalog } from './workflow-catalog.service';

/** Transition id reported on the workflow-wide aggregate. */
export const ALL_TRANSITIONS = '*';

interface TransitionInfo {
  workflowId: string | null;
  transitionName: string | null;
  fromState: string | null;
  toState: string | null;
}

@Injectable()
export class ReliabilityStatsService {
  private readonly windows = new Map<string, ReliabilitySample[]>();
  private readonly transitions = new Map<string, TransitionInfo>();

  constructor(
    private readonly catalog: WorkflowCatalog,
    @Inject(TELEMETRY_MODULE_OPTIONS)
    private readonly options: Pick<ResolvedTelemetryOptions, 'reliability'>,
  ) {}

  /**
   * Adds a sample in timestamp order, then evicts by time, oldest first:
   * samples older than the newest retained one by more than the age bound,
   * and whatever exceeds the size bound.
   */
  record(sample: ReliabilitySample): void {
    const window = this.windows.get(sample.transitionId) ?? [];
    let index = window.length;
    while (index > 0 && window[index - 1].timestamp > sample.timestamp) {
      index--;
    }
    window.splice(index, 0, { ...sample });

    const newest = window[window.length - 1].timestamp;
    const cutoff = newest - this.options.reliability.maxAgeMs;
    const retained = window.filter((item) => item.timestamp >= cutoff);
    const overflow = retained.length - this.options.reliability.maxSamples;
    this.windows.set(
      sample.transitionId,
      overflow > 0 ? retained.slice(overflow) : retained,
    );

    const known = this.transitions.get(sample.transitionId);
    this.transitions.set(sample.transitionId, {
      workflowId: sample.workflowId ?? known?.workflowId ?? null,
      transitionName: sample.transitionName ?? known?.transitionName ?? null,
      fromState: sample.fromState ?? known?.fromState ?? null,
      toState: sample.toState ?? known?.toState ?? null,
    });
  }

  sampleCount(transitionId: string): number {
    return this.windows.get(transitionId)?.length ?? 0;
  }

  stats(transitionId: string, window: ReliabilityWindow = {}): ReliabilityStats {
    const samples = this.select(this.windows.get(transitionId) ?? [], window);
    const info = this.transitions.get(transitionId);
    return summarize(transitionId, samples, {
      transitionName: info?.transitionName ?? null,
      fromState: info?.fromState ?? null,
      toState: info?.toState ?? null,
    });
  }

  /**
   * Per-transition stats for every declared or sampled transition of the
   * workflow, plus an aggregate over all of them.
   */
  workflowStats(
    workflowId: string,
    window: ReliabilityWindow = {},
  ): WorkflowReliability {
    const declared = this.catalog.get(workflowId)?.transitions ?? [];
    const ids = declared.map((transition) => transition.id);
    const sampled = [...this.transitions.entries()]
      .filter(
        ([transitionId, info]) =>
          info.workflowId === workflowId && !ids.includes(transitionId),
      )
      .map(([transitionId]) => transitionId)
      .sort();
    ids.push(...sampled);

    const transitionStats: ReliabilityStats[] = [];
    const everything: ReliabilitySample[] = [];
    for (const transitionId of ids) {
      const samples = this.select(this.windows.get(transitionId) ?? [], window);
      everything.push(...samples);

      const info = this.transitions.get(transitionId);
      const declaration = declared.find((item) => item.id === transitionId);
      transitionStats.push(
        summarize(transitionId, samples, {
          transitionName: declaration?.name ?? info?.transitionName ?? null,
          fromState: declaration?.fromState ?? info?.fromState ?? null,
          toState: declaration?.toState ?? info?.toState ?? null,
        }),
      );
    }

    return {
      workflowId,
      transitionStats,
      overall: summarize(ALL_TRANSITIONS, everything, {
        transitionName: null,
        fromState: null,
        toState: null,
      }),
    };
  }

  /** Copies the retained samples matching the window, oldest first. */
  private select(
    retained: readonly ReliabilitySample[],
    window: ReliabilityWindow,
  ): ReliabilitySample[] {
    const { since, until, limit } = window;
    const selected = retained.filter(
      (sample) =>
        (since === undefined || sample.timestamp >= since) &&
        (until === undefined || sample.timestamp <= until),
    );
    if (limit !== undefined && selected.length > limit) {
      return selected.slice(selected.length - limit);
    }
    return selected;
  }
}

function summarize(
  transitionId: string,
  samples: readonly ReliabilitySample[],
  info: Omit<TransitionInfo, 'workflowId'>,
): ReliabilityStats {
  const successful = samples.filter((sample) => sample.success).length;
  const failed = samples.length - successful;
  const durations = samples.flatMap((sample) =>
    sample.durationMs === null ? [] : [sample.durationMs],
  );
  const summary = summarizeDurations(durations);

  return {
    transitionId,
    transitionName: info.transitionName,
    fromState: info.fromState,
    toState: info.toState,
    totalExecutions: samples.length,
    successfulExecutions: successful,
    failedExecutions: failed,
    successRate: samples.length > 0 ? (successful / samples.length) * 100 : null,
    avgDurationMs: summary?.avg ?? null,
    medianDurationMs: summary?.median ?? null,
    p95DurationMs: summary?.p95 ?? null,
    failureModes: failureModes(samples),
  };
}

function failureModes(samples: readonly ReliabilitySample[]): FailureMode[] {
  const counts = new Map<string, number>();
  for (const sample of samples) {
    if (sample.success) continue;
    const errorType = sample.errorType ?? DEFAULT_ERROR_TYPE;
    counts.set(errorType, (counts.get(errorType) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([errorType, count]) => ({ errorType, count }))
    .sort((a, b) =>
      b.count !== a.count ? b.count - a.count : a.errorType.localeCompare(b.errorType),
    );
}
