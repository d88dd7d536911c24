export interface DeclaredState {
  id: string;
  name?: string;
}

export interface DeclaredTransition {
  id: string;
  name?: string;
  fromState?: string;
  toState?: string;
}

/**
 * Declared shape of a workflow. Coverage totals come from here, never from
 * the events a run happens to emit.
 */
export interface WorkflowMetadata {
  workflowId: string;
  workflowName?: string;
  states: DeclaredState[];
  transitions: DeclaredTransition[];
  initialStateIds?: string[];
}
