export interface ReliabilitySample {
  transitionId: string;
  workflowId: string | null;
  transitionName?: string;
  fromState?: string;
  toState?: string;
  /** Null when the execution's duration could not be derived. */
  durationMs: number | null;
  success: boolean;
  errorType?: string;
  /** Epoch milliseconds. */
  timestamp: number;
}

export interface ReliabilityWindow {
  /** Only samples at or after this time. */
  since?: number;
  /** Only samples at or before this time. */
  until?: number;
  /** Only the most recent N samples. */
  limit?: number;
}

export interface FailureMode {
  errorType: string;
  count: number;
}

export interface ReliabilityStats {
  transitionId: string;
  transitionName: string | null;
  fromState: string | null;
  toState: string | null;
  totalExecutions: number;
  successfulExecutions: number;
  failedExecutions: number;
  /** 0-100, null when no samples fall in the window. */
  successRate: number | null;
  avgDurationMs: number | null;
  medianDurationMs: number | null;
  p95DurationMs: number | null;
  failureModes: FailureMode[];
}

export interface WorkflowReliability {
  workflowId: string;
  transitionStats: ReliabilityStats[];
  overall: ReliabilityStats;
}
