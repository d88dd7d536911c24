export type RunStatus =
  | 'pending'
  | 'running'
  | 'completed'
  | 'failed'
  | 'timeout'
  | 'cancelled'
  | 'paused';

export type RejectionReason =
  | 'invalid_event'
  | 'run_mismatch'
  | 'sequence_conflict'
  | 'terminal_status_overwrite'
  | 'duplicate_start'
  | 'orphaned_parent'
  | 'parent_mismatch'
  | 'cycle_detected'
  | 'duplicate_root'
  | 'run_terminated';

/** Reasons that mark the owning run as inconsistent. */
export const CONSISTENCY_VIOLATIONS: readonly RejectionReason[] = [
  'sequence_conflict',
  'terminal_status_overwrite',
  'duplicate_start',
  'orphaned_parent',
  'parent_mismatch',
  'cycle_detected',
  'duplicate_root',
];

export interface EventRejection {
  eventId: string;
  sequence: number | null;
  nodeId: string | null;
  reason: RejectionReason;
  detail: string;
}

export interface RunRecord {
  runId: string;
  workflowId: string | null;
  workflowName: string | null;
  status: RunStatus;
  /** Epoch milliseconds. */
  startedAt: number | null;
  endedAt: number | null;
  initialStateIds: string[];
  inconsistent: boolean;
  violations: EventRejection[];
  /**
   * First sequence the ordering buffer had not released when the row was
   * written. Null until the first event is released.
   */
  nextSequence: number | null;
  /** Sequences applied past a declared gap, ascending. */
  gapSequences: number[];
  /** Stored sequences whose event was refused when applied, ascending. */
  rejectedSequences: number[];
}

export interface StartRunInput {
  runId: string;
  workflowId: string;
  workflowName?: string;
  initialStateIds?: string[];
  startedAt?: number;
}
