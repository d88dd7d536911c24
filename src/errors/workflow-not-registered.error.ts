export class WorkflowNotRegisteredError extends Error {
  constructor(public readonly workflowId: string) {
    super(`No workflow metadata registered for "${workflowId}".`);
    this.name = 'WorkflowNotRegisteredError';
  }
}
