export class DuplicateRegistrationError extends Error {
  constructor(
    public readonly workflowId: string,
    public readonly source1: string,
    public readonly source2: string,
  ) {
    super(
      `Duplicate workflow id "${workflowId}". ` +
        `Both ${source1} and ${source2} declare the same workflow.`,
    );
    this.name = 'DuplicateRegistrationError';
  }
}
