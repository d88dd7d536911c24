export type NodeType = 'workflow' | 'action' | 'transition';

export type NodeStatus = 'pending' | 'running' | 'success' | 'failed';

export type EventPhase = 'started' | 'completed' | 'failed';

export type TreeEventType = `${NodeType}_${EventPhase}`;

export const TREE_EVENT_TYPES = [
  'workflow_started',
  'workflow_completed',
  'workflow_failed',
  'action_started',
  'action_completed',
  'action_failed',
  'transition_started',
  'transition_completed',
  'transition_failed',
] as const satisfies readonly TreeEventType[];

export interface WorkflowNodeDescriptor {
  type: 'workflow';
  name: string;
  /** Catalog id of the workflow this node executes. */
  workflowId?: string;
}

export interface ActionNodeDescriptor {
  type: 'action';
  name: string;
  actionType?: string;
}

export interface TransitionNodeDescriptor {
  type: 'transition';
  name: string;
  /** Catalog id shared by every execution of this transition. */
  transitionId: string;
  fromState?: string;
  toState?: string;
}

export type NodeDescriptor =
  | WorkflowNodeDescriptor
  | ActionNodeDescriptor
  | TransitionNodeDescriptor;

export interface EventError {
  message: string;
  /** Failure-mode tag, e.g. "timeout" or "element_not_found". */
  type?: string;
}

export interface TelemetryEvent {
  eventId: string;
  runId: string;
  sequence: number;
  eventType: TreeEventType;
  nodeId: string;
  node: NodeDescriptor;
  /** Null only for the run's root node. */
  parentNodeId: string | null;
  /** Epoch milliseconds. */
  timestamp: number;
  durationMs?: number;
  error?: EventError;
  activeStatesBefore: string[];
  activeStatesAfter: string[];
  /** Opaque id of a stored screenshot. */
  screenshotRef?: string;
}

const EVENT_SHAPES: Record<TreeEventType, [NodeType, EventPhase]> = {
  workflow_started: ['workflow', 'started'],
  workflow_completed: ['workflow', 'completed'],
  workflow_failed: ['workflow', 'failed'],
  action_started: ['action', 'started'],
  action_completed: ['action', 'completed'],
  action_failed: ['action', 'failed'],
  transition_started: ['transition', 'started'],
  transition_completed: ['transition', 'completed'],
  transition_failed: ['transition', 'failed'],
};

export function eventNodeType(eventType: TreeEventType): NodeType {
  return EVENT_SHAPES[eventType][0];
}

export function eventPhase(eventType: TreeEventType): EventPhase {
  return EVENT_SHAPES[eventType][1];
}
