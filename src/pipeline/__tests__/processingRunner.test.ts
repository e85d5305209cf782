import { ProcessingRunner } from '../processingRunner';
import { DrainCancelledError, type DrainOptions } from '../articleProcessor';
import type { DrainStats } from '../drainProgress';

type ProcessPending = (batchSize: number, options?: DrainOptions) => Promise<DrainStats>;

const DONE: DrainStats = { total: 4, processed: 4, succeeded: 3, failed: 1 };

function createDeferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('ProcessingRunner', () => {
  it('starts idle', () => {
    const runner = new ProcessingRunner({ processPending: vi.fn<ProcessPending>() });

    expect(runner.snapshot()).toEqual({
      state: 'idle',
      batchSize: null,
      startedAt: null,
      finishedAt: null,
      progress: null,
      error: null
    });
    expect(runner.cancel()).toBe(false);
  });

  it('runs one drain at a time and records the outcome', async () => {
    const gate = createDeferred<DrainStats>();
    const processPending = vi.fn<ProcessPending>(() => gate.promise);
    const runner = new ProcessingRunner({ processPending });

    const first = runner.start(5);
    const second = runner.start(7);

    expect(first.started).toBe(true);
    expect(first.snapshot).toMatchObject({ state: 'running', batchSize: 5 });
    expect(second.started).toBe(false);
    expect(second.snapshot.batchSize).toBe(5);
    expect(processPending).toHaveBeenCalledTimes(1);

    gate.resolve(DONE);
    const settled = await runner.wait();

    expect(settled.state).toBe('completed');
    expect(settled.progress).toEqual(DONE);
    expect(settled.finishedAt).not.toBeNull();

    expect(runner.start(3).started).toBe(true);
  });

  it('publishes progress while running', async () => {
    const gate = createDeferred<DrainStats>();
    const runner = new ProcessingRunner({
      processPending: vi.fn<ProcessPending>((_batchSize, options) => {
        options?.onProgress?.({ total: 4, processed: 2, succeeded: 2, failed: 0 });
        return gate.promise;
      })
    });

    runner.start(4);

    expect(runner.snapshot().progress).toEqual({ total: 4, processed: 2, succeeded: 2, failed: 0 });
    gate.resolve(DONE);
    await runner.wait();
  });

  it('marks a cancelled drain with the counts reached', async () => {
    const partial: DrainStats = { total: 20, processed: 6, succeeded: 6, failed: 0 };
    const runner = new ProcessingRunner({
      processPending: vi.fn<ProcessPending>(
        (_batchSize, options) =>
          new Promise((_resolve, reject) => {
            options?.signal?.addEventListener('abort', () => reject(new DrainCancelledError(partial)));
          })
      )
    });

    runner.start(5);
    expect(runner.cancel()).toBe(true);
    const settled = await runner.wait();

    expect(settled.state).toBe('cancelled');
    expect(settled.progress).toEqual(partial);
    expect(settled.error).toBeNull();
  });

  it('records a failed drain without rejecting wait()', async () => {
    const runner = new ProcessingRunner({
      processPending: vi.fn<ProcessPending>(async () => {
        throw new Error('store unavailable');
      })
    });

    runner.start(5);
    const settled = await runner.wait();

    expect(settled.state).toBe('failed');
    expect(settled.error).toBe('store unavailable');
  });
});
