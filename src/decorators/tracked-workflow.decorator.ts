import { SetMetadata } from '@nestjs/common';
import { TRACKED_WORKFLOW_METADATA } from '../telemetry.constants';
import type { WorkflowMetadata } from '../interfaces/workflow-metadata.interface';

/**
 * Declares the states and transitions of a workflow so coverage can be
 * measured against them. The decorated class must be registered as a provider.
 */
export function TrackedWorkflow(metadata: WorkflowMetadata): ClassDecorator {
  return (target: Function) => {
    SetMetadata(TRACKED_WORKFLOW_METADATA, metadata)(target);
    Reflect.defineMetadata(TRACKED_WORKFLOW_METADATA, metadata, target);
  };
}
