import { describe, it, expect } from 'vitest';
import { DEFAULT_POOL_DEGREE, WorkerPool } from '../pipeline/pool.js';
import { sleep } from './helpers/fixtures.js';

function deferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('WorkerPool', () => {
  it('defaults to eight workers', () => {
    expect(new WorkerPool().degree).toBe(DEFAULT_POOL_DEGREE);
    expect(DEFAULT_POOL_DEGREE).toBe(8);
  });

  it('rejects a degree below one or a fraction', () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
    expect(() => new WorkerPool(1.5)).toThrow(RangeError);
  });

  it('never runs more than degree tasks at once', async () => {
    const pool = new WorkerPool(3);
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        pool.submit(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await sleep(1 + (i % 3));
          active--;
        }),
      ),
    );

    expect(maxActive).toBe(3);
    await sleep(0);
    expect(pool.inFlight).toBe(0);
    expect(pool.pending).toBe(0);
  });

  it('starts queued tasks in submission order', async () => {
    const pool = new WorkerPool(1);
    const gate = deferred();
    const started: number[] = [];

    const first = pool.submit(async () => {
      started.push(0);
      await gate.promise;
    });
    const rest = [1, 2, 3].map((n) => pool.submit(async () => { started.push(n); }));

    await sleep(0);
    expect(started).toEqual([0]);
    expect(pool.inFlight).toBe(1);
    expect(pool.pending).toBe(3);

    gate.resolve();
    await Promise.all([first, ...rest]);
    expect(started).toEqual([0, 1, 2, 3]);
  });

  it('rejects only the failing task', async () => {
    const pool = new WorkerPool(1);

    const failing = pool.submit(async () => {
      throw new Error('boom');
    });
    const after = pool.submit(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(after).resolves.toBe('ok');
  });

  it('turns a synchronous throw into a rejection', async () => {
    const pool = new WorkerPool(2);
    const task = (): Promise<never> => {
      throw new Error('sync');
    };

    await expect(pool.submit(task)).rejects.toThrow('sync');
    await sleep(0);
    expect(pool.inFlight).toBe(0);
  });
});
