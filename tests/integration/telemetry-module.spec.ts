import { Test, TestingModule } from '@nestjs/testing';
import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { TelemetryModule } from '../../src/telemetry.module';
import { TrackedWorkflow } from '../../src/decorators/tracked-workflow.decorator';
import { InMemoryEventLedgerAdapter } from '../../src/adapters/in-memory-event-ledger.adapter';
import { DuplicateRegistrationError } from '../../src/errors/duplicate-registration.error';
import { TelemetryEventType } from '../../src/events/telemetry-event-type.enum';
import type { RunStatusChangedEvent } from '../../src/events/telemetry-events';
import { EventIngestionService } from '../../src/services/event-ingestion.service';
import { GapSweepService } from '../../src/services/gap-sweep.service';
import { RunControlService } from '../../src/services/run-control.service';
import { RunRegistry } from '../../src/services/run-registry.service';
import { TelemetryQueryService } from '../../src/services/telemetry-query.service';
import { WorkflowCatalog } from '../../src/services/workflow-catalog.service';
import { EVENT_LEDGER_ADAPTER } from '../../src/telemetry.constants';
import { checkoutWorkflow, createEngine, nestedRunEvents } from '../helpers';

@TrackedWorkflow({
  workflowId: 'returns',
  workflowName: 'Returns',
  states: [
    { id: 'requested', name: 'Requested' },
    { id: 'refunded', name: 'Refunded' },
  ],
  transitions: [
    { id: 'refund', fromState: 'requested', toState: 'refunded' },
  ],
  initialStateIds: ['requested'],
})
@Injectable()
class ReturnsWorkflow {}

@TrackedWorkflow(checkoutWorkflow)
@Injectable()
class CheckoutWorkflow {}

describe('TelemetryModule integration', () => {
  let module: TestingModule | undefined;

  afterEach(async () => {
    if (module) {
      await module.close();
      module = undefined;
    }
  });

  it('should bootstrap with forRoot and register decorated workflows', async () => {
    module = await Test.createTestingModule({
      imports: [
        TelemetryModule.forRoot({
          adapter: new InMemoryEventLedgerAdapter(),
          enableGapSweep: false,
          workflows: [checkoutWorkflow],
        }),
      ],
      providers: [ReturnsWorkflow],
    }).compile();

    await module.init();

    const catalog = module.get<WorkflowCatalog>(WorkflowCatalog);
    expect(
      catalog.getAll().map((registration) => [registration.workflowId, registration.source]),
    ).toEqual([
      ['checkout', 'options'],
      ['returns', 'ReturnsWorkflow'],
    ]);
    expect(catalog.stateNameMap('returns')).toEqual({
      requested: 'Requested',
      refunded: 'Refunded',
    });
  });

  it('should ingest and query runs through the wired services', async () => {
    module = await Test.createTestingModule({
      imports: [
        TelemetryModule.forRoot({
          adapter: new InMemoryEventLedgerAdapter(),
          enableGapSweep: false,
          workflows: [checkoutWorkflow],
        }),
      ],
    }).compile();
    await module.init();

    const statusChanges: string[] = [];
    module
      .get(EventEmitter2)
      .on(TelemetryEventType.RUN_STATUS_CHANGED, (event: RunStatusChangedEvent) => {
        statusChanges.push(`${event.fromStatus}->${event.toStatus}`);
      });

    const ingestion = module.get(EventIngestionService);
    const result = await ingestion.ingest('run-1', nestedRunEvents());
    expect(result).toMatchObject({ accepted: 4, applied: 4, rejected: 0 });

    const tree = await module.get(TelemetryQueryService).getTree('run-1');
    expect(tree.workflowId).toBe('checkout');
    expect(tree.runStatus).toBe('completed');
    expect(tree.durationMs).toBe(500);
    expect(statusChanges).toEqual(['pending->running', 'running->completed']);
  });

  it('should load stored runs on startup and control them', async () => {
    const adapter = new InMemoryEventLedgerAdapter();
    const earlier = createEngine({}, adapter);
    const [started, actionStarted] = nestedRunEvents();
    await earlier.ingestion.ingest('run-1', [started, actionStarted]);

    module = await Test.createTestingModule({
      imports: [
        TelemetryModule.forRoot({
          adapter,
          enableGapSweep: false,
          workflows: [checkoutWorkflow],
        }),
      ],
    }).compile();
    await module.init();

    expect(module.get(RunRegistry).has('run-1')).toBe(true);
    expect(module.get(TelemetryQueryService).getWorkflowCoverage('checkout')).toEqual(
      earlier.query.getWorkflowCoverage('checkout'),
    );
    await expect(
      module.get(RunControlService).cancelRun('run-1', 5000),
    ).resolves.toMatchObject({ status: 'cancelled', endedAt: 5000 });
  });

  it('should work with forRootAsync', async () => {
    const adapter = new InMemoryEventLedgerAdapter();

    module = await Test.createTestingModule({
      imports: [
        TelemetryModule.forRootAsync({
          useFactory: () => ({
            adapter,
            enableGapSweep: false,
            maxBatchSize: 10,
          }),
        }),
      ],
      providers: [ReturnsWorkflow],
    }).compile();

    await module.init();

    expect(module.get(EVENT_LEDGER_ADAPTER)).toBe(adapter);
    expect(module.get(WorkflowCatalog).get('returns')?.workflowName).toBe('Returns');
    await expect(
      module.get(EventIngestionService).ingest('run-1', new Array(11).fill({})),
    ).rejects.toThrow('Batch of 11 events exceeds the limit of 10');
  });

  it('should schedule the gap sweep by default and stop it on close', async () => {
    const testingModule = await Test.createTestingModule({
      imports: [
        TelemetryModule.forRoot({ adapter: new InMemoryEventLedgerAdapter() }),
      ],
    }).compile();
    await testingModule.init();

    const sweep = testingModule.get(GapSweepService);
    expect(sweep.isScheduled).toBe(true);

    await testingModule.close();
    expect(sweep.isScheduled).toBe(false);
  });

  it('should refuse two registrations of the same workflow', async () => {
    module = await Test.createTestingModule({
      imports: [
        TelemetryModule.forRoot({
          adapter: new InMemoryEventLedgerAdapter(),
          enableGapSweep: false,
          workflows: [checkoutWorkflow],
        }),
      ],
      providers: [CheckoutWorkflow],
    }).compile();

    await expect(module.init()).rejects.toThrow(DuplicateRegistrationError);
  });
});
