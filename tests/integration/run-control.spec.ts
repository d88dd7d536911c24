import { InMemoryEventLedgerAdapter } from '../../src/adapters/in-memory-event-ledger.adapter';
import { RunNotFoundError } from '../../src/errors/run-not-found.error';
import { createEngine, nestedRunEvents, type TestEngine } from '../helpers';

describe('RunControlService', () => {
  let adapter: InMemoryEventLedgerAdapter;
  let restarted: TestEngine;

  /** Stores a running run with two events, then wires a fresh engine on the same ledger. */
  beforeEach(async () => {
    adapter = new InMemoryEventLedgerAdapter();
    const [started, actionStarted] = nestedRunEvents();
    await createEngine({}, adapter).ingestion.ingest('run-1', [started, actionStarted]);
    restarted = createEngine({}, adapter);
  });

  it('should cancel a run known only from the ledger', async () => {
    await expect(restarted.control.cancelRun('run-1', 5000)).resolves.toMatchObject({
      status: 'cancelled',
      endedAt: 5000,
    });

    const tree = await restarted.query.getTree('run-1');
    expect(tree.totalEvents).toBe(2);
    expect(tree.rootNodes[0].error).toBe('Run cancelled');
    await expect(adapter.findRun('run-1')).resolves.toMatchObject({
      status: 'cancelled',
      endedAt: 5000,
    });
  });

  it('should start a stored run without discarding its events', async () => {
    const run = await restarted.control.startRun({ runId: 'run-1', workflowId: 'checkout' });

    expect(run).toMatchObject({ status: 'running', startedAt: 1000, nextSequence: 3 });
    expect((await restarted.query.getTree('run-1')).totalEvents).toBe(2);
    await expect(adapter.findRun('run-1')).resolves.toMatchObject({
      status: 'running',
      nextSequence: 3,
    });
  });

  it('should pause and resume a stored run', async () => {
    await expect(restarted.control.pauseRun('run-1')).resolves.toMatchObject({
      status: 'paused',
    });
    await expect(restarted.control.resumeRun('run-1')).resolves.toMatchObject({
      status: 'running',
    });
  });

  it('should start a run the ledger has never seen', async () => {
    await expect(
      restarted.control.startRun({ runId: 'run-2', workflowId: 'checkout', startedAt: 700 }),
    ).resolves.toMatchObject({ runId: 'run-2', status: 'running', initialStateIds: ['cart'] });
  });

  it('should throw RunNotFoundError when neither memory nor the ledger has the run', async () => {
    await expect(restarted.control.pauseRun('missing')).rejects.toThrow(RunNotFoundError);
    await expect(restarted.control.resumeRun('missing')).rejects.toThrow(RunNotFoundError);
    await expect(restarted.control.cancelRun('missing')).rejects.toThrow(RunNotFoundError);
  });
});
