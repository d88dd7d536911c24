import type {
  NodeDescriptor,
  NodeStatus,
  NodeType,
} from './telemetry-event.interface';
import type { EventRejection, RunStatus } from './run.interface';

export type NodeFlag = 'ordering_gap';

export interface DisplayNode {
  id: string;
  /** Null while the node is only a placeholder. */
  nodeType: NodeType | null;
  name: string;
  status: NodeStatus;
  descriptor: NodeDescriptor | null;
  startedAt: number | null;
  endedAt: number | null;
  /** Null when either end of the node's lifetime is unknown. */
  durationMs: number | null;
  error: string | null;
  /** Nesting depth, 0 for roots. */
  level: number;
  /** Created from a child's reference, not yet seen through its own event. */
  placeholder: boolean;
  flags: NodeFlag[];
  screenshotRef: string | null;
  children: DisplayNode[];
}

export interface DisplayTree {
  runId: string;
  workflowId: string | null;
  workflowName: string | null;
  runStatus: RunStatus;
  /** Status of the root node, or pending before it is seen. */
  status: NodeStatus;
  /** Root node end minus start; never the sum of its children. */
  durationMs: number | null;
  /** Run root first, then detached placeholder subtrees. */
  rootNodes: DisplayNode[];
  totalEvents: number;
  initialStateIds: string[];
  stateNameMap: Record<string, string>;
  inconsistent: boolean;
  violations: EventRejection[];
}

export interface PathElement {
  id: string;
  name: string;
  nodeType: NodeType | null;
}

export interface ExecutionStats {
  totalActions: number;
  successfulActions: number;
  failedActions: number;
  runningActions: number;
  totalDurationMs: number | null;
  avgActionDurationMs: number | null;
}
