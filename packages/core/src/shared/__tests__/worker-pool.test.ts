import { describe, it, expect } from 'vitest';
import { WorkerPool } from '../worker-pool';
import { sleep } from '../async';

describe('WorkerPool', () => {
  it('never runs more than maxWorkers tasks at once', async () => {
    const pool = new WorkerPool(2, 'test-pool');
    let active = 0;
    let peak = 0;

    const task = async (): Promise<void> => {
      active++;
      peak = Math.max(peak, active);
      await sleep(10);
      active--;
    };

    await Promise.all(Array.from({ length: 6 }, () => pool.execute(task)));

    expect(peak).toBe(2);
    await pool.waitForCompletion();
    expect(pool.getStats()).toEqual({ active: 0, queued: 0, max: 2 });
  });

  it('starts queued tasks in submission order', async () => {
    const pool = new WorkerPool(1);
    const started: number[] = [];

    await Promise.all(
      [1, 2, 3, 4].map((n) =>
        pool.execute(async () => {
          started.push(n);
          await sleep(1);
        }),
      ),
    );

    expect(started).toEqual([1, 2, 3, 4]);
  });

  it('propagates task errors without blocking later work', async () => {
    const pool = new WorkerPool(1);

    await expect(
      pool.execute(() => {
        throw new Error('task failed');
      }),
    ).rejects.toThrow('task failed');
    await expect(pool.execute(() => 42)).resolves.toBe(42);
  });

  it('rejects new work after shutdown', async () => {
    const pool = new WorkerPool(1, 'closed');
    pool.shutdown();
    await expect(pool.execute(() => 1)).rejects.toThrow('[closed] Pool is shut down');
  });

  it('clamps maxWorkers to at least one', () => {
    expect(new WorkerPool(0).getStats().max).toBe(1);
  });
});
