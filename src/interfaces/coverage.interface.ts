export type CoverageScope = 'run' | 'workflow';

export interface CoverageSnapshot {
  scope: CoverageScope;
  /** Run id or workflow id, depending on scope. */
  id: string;
  workflowId: string | null;
  /** 0-100, null when the workflow declares nothing or is unknown. */
  coveragePercentage: number | null;
  stateCoveragePercentage: number | null;
  transitionCoveragePercentage: number | null;
  statesCovered: number;
  totalStates: number | null;
  transitionsCovered: number;
  totalTransitions: number | null;
  totalTransitionsExecuted: number;
  uncoveredStates: string[];
  uncoveredTransitions: string[];
  stateVisitCounts: Record<string, number>;
  transitionExecutionCounts: Record<string, number>;
  /** Ids seen in events that the workflow does not declare. */
  undeclaredStates: string[];
  undeclaredTransitions: string[];
  runsObserved: number;
}

export type GapPriority = 'critical' | 'high' | 'medium' | 'low';

export interface CoverageGap {
  id: string;
  name: string;
  type: 'state' | 'transition';
  fromState: string | null;
  toState: string | null;
  /** Share of observed runs that covered this id, 0-1. */
  runCoverageRatio: number;
  lastCoveredAt: number | null;
  priority: GapPriority;
}

export interface CoverageGapReport {
  workflowId: string;
  currentCoverage: number | null;
  runsObserved: number;
  gaps: CoverageGap[];
  totalGaps: number;
  criticalGaps: number;
  recommendedNext: string[];
}

export interface CoverageHeatmapCell {
  stateId: string;
  stateName: string;
  visitCount: number;
  lastVisitedAt: number | null;
  /** visitCount / maxVisits, 0-1. */
  coverageIntensity: number;
}

export interface CoverageHeatmap {
  workflowId: string;
  cells: CoverageHeatmapCell[];
  maxVisits: number;
}
