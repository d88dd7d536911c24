import { DiscoveryService, Reflector } from '@nestjs/core';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { InMemoryEventLedgerAdapter } from '../src/adapters/in-memory-event-ledger.adapter';
import type { IEventLedgerAdapter } from '../src/interfaces/event-ledger-adapter.interface';
import type {
  NodeDescriptor,
  TelemetryEvent,
  TreeEventType,
} from '../src/interfaces/telemetry-event.interface';
import type {
  ResolvedTelemetryOptions,
  TelemetryModuleOptions,
} from '../src/interfaces/telemetry-module-options.interface';
import type { WorkflowMetadata } from '../src/interfaces/workflow-metadata.interface';
import { CoverageAggregatorService } from '../src/services/coverage-aggregator.service';
import { EventIngestionService } from '../src/services/event-ingestion.service';
import { ReliabilityStatsService } from '../src/services/reliability-stats.service';
import { RunControlService } from '../src/services/run-control.service';
import { RunRegistry } from '../src/services/run-registry.service';
import { TelemetryQueryService } from '../src/services/telemetry-query.service';
import { TreeReconstructionService } from '../src/services/tree-reconstruction.service';
import { WorkflowCatalog } from '../src/services/workflow-catalog.service';
import { resolveTelemetryOptions } from '../src/telemetry.module';

export const checkoutWorkflow: WorkflowMetadata = {
  workflowId: 'checkout',
  workflowName: 'Checkout',
  states: [
    { id: 'cart', name: 'Cart' },
    { id: 'payment', name: 'Payment' },
    { id: 'confirmation', name: 'Confirmation' },
  ],
  transitions: [
    {
      id: 'to_payment',
      name: 'Go to payment',
      fromState: 'cart',
      toState: 'payment',
    },
    {
      id: 'to_confirmation',
      name: 'Confirm order',
      fromState: 'payment',
      toState: 'confirmation',
    },
  ],
  initialStateIds: ['cart'],
};

export function createCatalog(
  workflows: WorkflowMetadata[] = [],
): WorkflowCatalog {
  const mockDiscovery = {
    getProviders: () => [],
  } as unknown as DiscoveryService;
  const mockReflector = { get: () => undefined } as unknown as Reflector;
  const catalog = new WorkflowCatalog(mockDiscovery, mockReflector, {
    workflows,
  });
  catalog.onModuleInit();
  return catalog;
}

export function createMockAdapter(): jest.Mocked<IEventLedgerAdapter> {
  return {
    appendEvent: jest.fn().mockResolvedValue('appended'),
    listEvents: jest.fn().mockResolvedValue([]),
    countEvents: jest.fn().mockResolvedValue(0),
    upsertRun: jest.fn().mockResolvedValue(undefined),
    findRun: jest.fn().mockResolvedValue(null),
    listRunIds: jest.fn().mockResolvedValue([]),
  };
}

export interface TestEngine {
  adapter: IEventLedgerAdapter;
  options: ResolvedTelemetryOptions;
  emitter: EventEmitter2;
  catalog: WorkflowCatalog;
  trees: TreeReconstructionService;
  coverage: CoverageAggregatorService;
  reliability: ReliabilityStatsService;
  runs: RunRegistry;
  ingestion: EventIngestionService;
  control: RunControlService;
  query: TelemetryQueryService;
}

/** Wires the services by hand, with the checkout workflow registered. */
export function createEngine(
  overrides: Partial<Omit<TelemetryModuleOptions, 'adapter'>> = {},
  adapter: IEventLedgerAdapter = new InMemoryEventLedgerAdapter(),
): TestEngine {
  const options = resolveTelemetryOptions({
    adapter,
    enableGapSweep: false,
    workflows: [checkoutWorkflow],
    ...overrides,
  });
  const emitter = new EventEmitter2();
  const catalog = createCatalog(options.workflows);
  const trees = new TreeReconstructionService(catalog, options);
  const coverage = new CoverageAggregatorService(catalog, options);
  const reliability = new ReliabilityStatsService(catalog, options);
  const runs = new RunRegistry(adapter, catalog, trees, coverage, emitter);
  const ingestion = new EventIngestionService(
    adapter,
    options,
    runs,
    trees,
    coverage,
    reliability,
    emitter,
  );
  const control = new RunControlService(ingestion, runs);
  const query = new TelemetryQueryService(
    adapter,
    ingestion,
    runs,
    trees,
    coverage,
    reliability,
  );

  return {
    adapter,
    options,
    emitter,
    catalog,
    trees,
    coverage,
    reliability,
    runs,
    ingestion,
    control,
    query,
  };
}

export interface EventInput {
  seq: number;
  type: TreeEventType;
  node: string;
  parent: string | null;
  at?: number;
  runId?: string;
  eventId?: string;
  descriptor?: NodeDescriptor;
  before?: string[];
  after?: string[];
  error?: TelemetryEvent['error'];
  durationMs?: number;
  screenshotRef?: string;
}

function defaultDescriptor(type: TreeEventType, node: string): NodeDescriptor {
  if (type.startsWith('workflow_')) {
    return { type: 'workflow', name: node, workflowId: 'checkout' };
  }
  if (type.startsWith('transition_')) {
    return { type: 'transition', name: node, transitionId: node };
  }
  return { type: 'action', name: node };
}

/**
 * Builds a valid event. Defaults: eventId `evt-<seq>`, run `run-1`,
 * timestamp 1000 + seq * 100, no active-state change.
 */
export function buildEvent(input: EventInput): TelemetryEvent {
  const before = input.before ?? [];
  const event: TelemetryEvent = {
    eventId: input.eventId ?? `evt-${input.seq}`,
    runId: input.runId ?? 'run-1',
    sequence: input.seq,
    eventType: input.type,
    nodeId: input.node,
    node: input.descriptor ?? defaultDescriptor(input.type, input.node),
    parentNodeId: input.parent,
    timestamp: input.at ?? 1000 + input.seq * 100,
    activeStatesBefore: before,
    activeStatesAfter: input.after ?? before,
  };
  if (input.error) event.error = input.error;
  if (input.durationMs !== undefined) event.durationMs = input.durationMs;
  if (input.screenshotRef) event.screenshotRef = input.screenshotRef;
  return event;
}

/** Root `w` with one action `a1`, both completed. */
export function nestedRunEvents(runId = 'run-1'): TelemetryEvent[] {
  return [
    buildEvent({ runId, seq: 1, type: 'workflow_started', node: 'w', parent: null, at: 1000 }),
    buildEvent({ runId, seq: 2, type: 'action_started', node: 'a1', parent: 'w', at: 1100 }),
    buildEvent({ runId, seq: 3, type: 'action_completed', node: 'a1', parent: 'w', at: 1400 }),
    buildEvent({ runId, seq: 4, type: 'workflow_completed', node: 'w', parent: null, at: 1500 }),
  ];
}
