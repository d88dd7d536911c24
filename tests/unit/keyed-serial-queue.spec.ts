import { KeyedSerialQueue } from '../../src/utils/keyed-serial-queue';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('KeyedSerialQueue', () => {
  it('should run tasks for the same key one at a time, in order', async () => {
    const queue = new KeyedSerialQueue();
    const gate = deferred();
    const log: string[] = [];

    const first = queue.run('run-1', async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
    });
    const second = queue.run('run-1', async () => {
      log.push('second');
    });

    await flushMicrotasks();
    expect(log).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should not make other keys wait', async () => {
    const queue = new KeyedSerialQueue();
    const gate = deferred();
    const log: string[] = [];

    const blocked = queue.run('run-1', async () => {
      await gate.promise;
      log.push('run-1');
    });
    await queue.run('run-2', async () => {
      log.push('run-2');
    });

    expect(log).toEqual(['run-2']);
    gate.resolve();
    await blocked;
    expect(log).toEqual(['run-2', 'run-1']);
  });

  it('should keep going after a task fails', async () => {
    const queue = new KeyedSerialQueue();

    const failing = queue.run('run-1', async () => {
      throw new Error('boom');
    });
    const next = queue.run('run-1', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('should forget keys once their tasks settle', async () => {
    const queue = new KeyedSerialQueue();

    await queue.run('run-1', async () => undefined);
    await flushMicrotasks();

    expect(queue.activeKeys).toBe(0);
  });
});
