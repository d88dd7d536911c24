import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { DuplicateRegistrationError } from '../errors/duplicate-registration.error';
import { WorkflowNotRegisteredError } from '../errors/workflow-not-registered.error';
import {
  TELEMETRY_MODULE_OPTIONS,
  TRACKED_WORKFLOW_METADATA,
} from '../telemetry.constants';
import type { WorkflowMetadata } from '../interfaces/workflow-metadata.interface';
import type { ResolvedTelemetryOptions } from '../interfaces/telemetry-module-options.interface';
import { validateWorkflowMetadata } from '../utils/validate-workflow-metadata';

export interface RegisteredWorkflow {
  workflowId: string;
  metadata: WorkflowMetadata;
  /** Decorated class name, or "options" for up-front registrations. */
  source: string;
}

@Injectable()
export class WorkflowCatalog implements OnModuleInit {
  private readonly logger = new Logger(WorkflowCatalog.name);
  private readonly registrations = new Map<string, RegisteredWorkflow>();

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
    @Inject(TELEMETRY_MODULE_OPTIONS)
    private readonly options: Pick<ResolvedTelemetryOptions, 'workflows'>,
  ) {}

  onModuleInit(): void {
    for (const metadata of this.options.workflows) {
      this.register(metadata, 'options');
    }

    const providers = this.discoveryService.getProviders();
    for (const wrapper of providers) {
      if (!wrapper.metatype) continue;

      const metadata = this.reflector.get<WorkflowMetadata | undefined>(
        TRACKED_WORKFLOW_METADATA,
        wrapper.metatype,
      );

      if (metadata) {
        this.register(metadata, wrapper.metatype.name);
        this.logger.log(
          `Registered tracked workflow: ${wrapper.metatype.name} -> ${metadata.workflowId}`,
        );
      }
    }
  }

  register(metadata: WorkflowMetadata, source = 'manual'): void {
    const existing = this.registrations.get(metadata.workflowId);
    if (existing) {
      throw new DuplicateRegistrationError(
        metadata.workflowId,
        existing.source,
        source,
      );
    }
    validateWorkflowMetadata(metadata);
    this.registrations.set(metadata.workflowId, {
      workflowId: metadata.workflowId,
      metadata,
      source,
    });
  }

  get(workflowId: string): WorkflowMetadata | undefined {
    return this.registrations.get(workflowId)?.metadata;
  }

  getAll(): RegisteredWorkflow[] {
    return Array.from(this.registrations.values());
  }

  getOrThrow(workflowId: string): WorkflowMetadata {
    const registration = this.registrations.get(workflowId);
    if (!registration) {
      throw new WorkflowNotRegisteredError(workflowId);
    }
    return registration.metadata;
  }

  /** State id to display name, falling back to the id. */
  stateNameMap(workflowId: string | null): Record<string, string> {
    const metadata = workflowId ? this.get(workflowId) : undefined;
    const names: Record<string, string> = {};
    for (const state of metadata?.states ?? []) {
      names[state.id] = state.name ?? state.id;
    }
    return names;
  }
}
