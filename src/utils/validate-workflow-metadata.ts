import type { WorkflowMetadata } from '../interfaces/workflow-metadata.interface';

function assertUnique(workflowId: string, kind: string, ids: string[]): void {
  const seen = new Set<string>();
  for (const id of ids) {
    if (!id || typeof id !== 'string') {
      throw new Error(
        `Workflow metadata ${workflowId}: ${kind} ids must be non-empty strings`,
      );
    }
    if (seen.has(id)) {
      throw new Error(
        `Workflow metadata ${workflowId}: duplicate ${kind} id "${id}"`,
      );
    }
    seen.add(id);
  }
}

export function validateWorkflowMetadata(metadata: WorkflowMetadata): void {
  if (!metadata.workflowId || typeof metadata.workflowId !== 'string') {
    throw new Error('Workflow metadata workflowId must be a non-empty string');
  }

  const { workflowId } = metadata;
  const stateIds = metadata.states.map((state) => state.id);
  assertUnique(workflowId, 'state', stateIds);
  assertUnique(
    workflowId,
    'transition',
    metadata.transitions.map((transition) => transition.id),
  );

  const declared = new Set(stateIds);
  for (const transition of metadata.transitions) {
    for (const endpoint of [transition.fromState, transition.toState]) {
      if (endpoint !== undefined && !declared.has(endpoint)) {
        throw new Error(
          `Workflow metadata ${workflowId}: transition "${transition.id}" references unknown state "${endpoint}"`,
        );
      }
    }
  }

  for (const initial of metadata.initialStateIds ?? []) {
    if (!declared.has(initial)) {
      throw new Error(
        `Workflow metadata ${workflowId}: initial state "${initial}" does not exist`,
      );
    }
  }
}
