import { Inject, Injectable } from '@nestjs/common';
import type {
  CoverageGap,
  CoverageGapReport,
  CoverageHeatmap,
  CoverageSnapshot,
  GapPriority,
} from '../interfaces/coverage.interface';
import type { TelemetryEvent } from '../interfaces/telemetry-event.interface';
import type { ResolvedTelemetryOptions } from '../interfaces/telemetry-module-options.interface';
import type { WorkflowMetadata } from '../interfaces/workflow-metadata.interface';
import { TELEMETRY_MODULE_OPTIONS } from '../telemetry.constants';
import { newlyActiveStates } from '../utils/active-states';
import { WorkflowCatalog } from './workflow-catalog.service';

interface Tally {
  count: number;
  lastAt: number | null;
}

export interface RunCoverage {
  workflowId: string | null;
  states: Map<string, Tally>;
  transitions: Map<string, Tally>;
}

export interface ObserveContext {
  /** Whether the event's active-state sets differ. */
  statesChanged: boolean;
}

const PRIORITY_RANK: Record<GapPriority, number> = {
  critical: 0,
  high: 1,
  medium: 2,
  low: 3,
};

function bump(tallies: Map<string, Tally>, id: string, at: number): void {
  const tally = tallies.get(id);
  if (tally) {
    tally.count += 1;
    tally.lastAt = tally.lastAt === null ? at : Math.max(tally.lastAt, at);
  } else {
    tallies.set(id, { count: 1, lastAt: at });
  }
}

function mergeInto(target: Map<string, Tally>, source: Map<string, Tally>): void {
  for (const [id, tally] of source.entries()) {
    const existing = target.get(id);
    if (!existing) {
      target.set(id, { ...tally });
      continue;
    }
    existing.count += tally.count;
    if (tally.lastAt !== null) {
      existing.lastAt =
        existing.lastAt === null ? tally.lastAt : Math.max(existing.lastAt, tally.lastAt);
    }
  }
}

function toCounts(tallies: Map<string, Tally>): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const [id, tally] of tallies.entries()) {
    counts[id] = tally.count;
  }
  return counts;
}

function percentage(covered: number, total: number): number | null {
  return total > 0 ? (covered / total) * 100 : null;
}

@Injectable()
export class CoverageAggregatorService {
  private readonly runs = new Map<string, RunCoverage>();

  constructor(
    private readonly catalog: WorkflowCatalog,
    @Inject(TELEMETRY_MODULE_OPTIONS)
    private readonly options: Pick<ResolvedTelemetryOptions, 'coverageGapThresholds'>,
  ) {}

  open(runId: string): RunCoverage {
    const existing = this.runs.get(runId);
    if (existing) return existing;

    const run: RunCoverage = {
      workflowId: null,
      states: new Map(),
      transitions: new Map(),
    };
    this.runs.set(runId, run);
    return run;
  }

  bindWorkflow(runId: string, workflowId: string): void {
    const run = this.open(runId);
    if (run.workflowId === null) {
      run.workflowId = workflowId;
    }
  }

  /** The run's initial active states each count one visit. */
  beginRun(runId: string, initialStateIds: readonly string[], startedAt: number): void {
    const run = this.open(runId);
    for (const stateId of new Set(initialStateIds)) {
      bump(run.states, stateId, startedAt);
    }
  }

  /** Counts an event the tree has accepted. */
  observe(runId: string, event: TelemetryEvent, context: ObserveContext): void {
    const run = this.open(runId);

    if (context.statesChanged) {
      for (const stateId of newlyActiveStates(
        event.activeStatesBefore,
        event.activeStatesAfter,
      )) {
        bump(run.states, stateId, event.timestamp);
      }
    }

    const node = event.node;
    if (event.eventType === 'transition_completed' && node.type === 'transition') {
      bump(run.transitions, node.transitionId, event.timestamp);
    }
  }

  coverage(runId: string): CoverageSnapshot {
    const run = this.open(runId);
    return this.buildSnapshot('run', runId, run.workflowId, run.states, run.transitions, 1);
  }

  /** Coverage merged over every observed run of the workflow. */
  workflowCoverage(workflowId: string): CoverageSnapshot {
    const runs = this.runsOf(workflowId);
    const states = new Map<string, Tally>();
    const transitions = new Map<string, Tally>();
    for (const run of runs) {
      mergeInto(states, run.states);
      mergeInto(transitions, run.transitions);
    }
    return this.buildSnapshot(
      'workflow',
      workflowId,
      workflowId,
      states,
      transitions,
      runs.length,
    );
  }

  coverageGaps(workflowId: string): CoverageGapReport {
    const metadata = this.catalog.getOrThrow(workflowId);
    const runs = this.runsOf(workflowId);
    const gaps: CoverageGap[] = [];

    for (const state of metadata.states) {
      const gap = this.gapFor(runs, (run) => run.states.get(state.id));
      if (gap) {
        gaps.push({
          id: state.id,
          name: state.name ?? state.id,
          type: 'state',
          fromState: null,
          toState: null,
          ...gap,
        });
      }
    }

    for (const transition of metadata.transitions) {
      const gap = this.gapFor(runs, (run) => run.transitions.get(transition.id));
      if (gap) {
        gaps.push({
          id: transition.id,
          name: transition.name ?? transition.id,
          type: 'transition',
          fromState: transition.fromState ?? null,
          toState: transition.toState ?? null,
          ...gap,
        });
      }
    }

    // Stable sort keeps declaration order within a priority.
    gaps.sort((a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]);

    return {
      workflowId,
      currentCoverage: this.workflowCoverage(workflowId).coveragePercentage,
      runsObserved: runs.length,
      gaps,
      totalGaps: gaps.length,
      criticalGaps: gaps.filter((gap) => gap.priority === 'critical').length,
      recommendedNext: gaps
        .filter(
          (gap) =>
            gap.type === 'transition' &&
            (gap.priority === 'critical' || gap.priority === 'high'),
        )
        .map((gap) => gap.id),
    };
  }

  heatmap(workflowId: string): CoverageHeatmap {
    const metadata = this.catalog.getOrThrow(workflowId);
    const visits = new Map<string, Tally>();
    for (const run of this.runsOf(workflowId)) {
      mergeInto(visits, run.states);
    }

    const maxVisits = metadata.states.reduce(
      (max, state) => Math.max(max, visits.get(state.id)?.count ?? 0),
      0,
    );

    return {
      workflowId,
      maxVisits,
      cells: metadata.states.map((state) => {
        const tally = visits.get(state.id);
        const visitCount = tally?.count ?? 0;
        return {
          stateId: state.id,
          stateName: state.name ?? state.id,
          visitCount,
          lastVisitedAt: tally?.lastAt ?? null,
          coverageIntensity: maxVisits > 0 ? visitCount / maxVisits : 0,
        };
      }),
    };
  }

  private gapFor(
    runs: RunCoverage[],
    tallyOf: (run: RunCoverage) => Tally | undefined,
  ): Pick<CoverageGap, 'runCoverageRatio' | 'lastCoveredAt' | 'priority'> | null {
    let covering = 0;
    let lastCoveredAt: number | null = null;
    for (const run of runs) {
      const tally = tallyOf(run);
      if (!tally || tally.count === 0) continue;
      covering++;
      if (tally.lastAt !== null) {
        lastCoveredAt =
          lastCoveredAt === null ? tally.lastAt : Math.max(lastCoveredAt, tally.lastAt);
      }
    }

    if (runs.length > 0 && covering === runs.length) {
      return null;
    }

    const ratio = runs.length > 0 ? covering / runs.length : 0;
    const { highBelowRatio, mediumBelowRatio } = this.options.coverageGapThresholds;
    let priority: GapPriority;
    if (covering === 0) priority = 'critical';
    else if (ratio < highBelowRatio) priority = 'high';
    else if (ratio < mediumBelowRatio) priority = 'medium';
    else priority = 'low';

    return { runCoverageRatio: ratio, lastCoveredAt, priority };
  }

  private buildSnapshot(
    scope: CoverageSnapshot['scope'],
    id: string,
    workflowId: string | null,
    states: Map<string, Tally>,
    transitions: Map<string, Tally>,
    runsObserved: number,
  ): CoverageSnapshot {
    const metadata: WorkflowMetadata | undefined = workflowId
      ? this.catalog.get(workflowId)
      : undefined;

    const declaredStates = metadata?.states.map((state) => state.id) ?? [];
    const declaredTransitions =
      metadata?.transitions.map((transition) => transition.id) ?? [];
    const declaredStateSet = new Set(declaredStates);
    const declaredTransitionSet = new Set(declaredTransitions);

    const isCovered = (tallies: Map<string, Tally>) => (id: string) =>
      (tallies.get(id)?.count ?? 0) > 0;
    const statesCovered = declaredStates.filter(isCovered(states)).length;
    const transitionsCovered = declaredTransitions.filter(isCovered(transitions)).length;

    let totalTransitionsExecuted = 0;
    for (const tally of transitions.values()) {
      totalTransitionsExecuted += tally.count;
    }

    return {
      scope,
      id,
      workflowId,
      coveragePercentage: metadata
        ? percentage(
            statesCovered + transitionsCovered,
            declaredStates.length + declaredTransitions.length,
          )
        : null,
      stateCoveragePercentage: metadata
        ? percentage(statesCovered, declaredStates.length)
        : null,
      transitionCoveragePercentage: metadata
        ? percentage(transitionsCovered, declaredTransitions.length)
        : null,
      statesCovered,
      totalStates: metadata ? declaredStates.length : null,
      transitionsCovered,
      totalTransitions: metadata ? declaredTransitions.length : null,
      totalTransitionsExecuted,
      uncoveredStates: declaredStates.filter((stateId) => !isCovered(states)(stateId)),
      uncoveredTransitions: declaredTransitions.filter(
        (transitionId) => !isCovered(transitions)(transitionId),
      ),
      stateVisitCounts: toCounts(states),
      transitionExecutionCounts: toCounts(transitions),
      undeclaredStates: [...states.keys()]
        .filter((stateId) => !declaredStateSet.has(stateId))
        .sort(),
      undeclaredTransitions: [...transitions.keys()]
        .filter((transitionId) => !declaredTransitionSet.has(transitionId))
        .sort(),
      runsObserved,
    };
  }

  private runsOf(workflowId: string): RunCoverage[] {
    return [...this.runs.values()].filter((run) => run.workflowId === workflowId);
  }
}
