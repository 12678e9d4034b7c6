/**
 * Worker pool bounding concurrent async work.
 *
 * Used with several workers as the global limiter for LLM-backed analysis,
 * and with a single worker as the tree's write lock (see TreeWriter).
 * Tasks start in submission order.
 */

import {
  WORKER_POOL_DEFAULT_MAX_WORKERS,
  WORKER_POOL_MAX_ITERATIONS,
  WORKER_POOL_CHECK_INTERVAL_MS,
  WORKER_POOL_SLOW_TASK_MS,
} from '../config/constants';

export interface WorkerPoolStats {
  active: number;
  queued: number;
  max: number;
}

export class WorkerPool {
  private readonly maxWorkers: number;
  private readonly name: string;
  private activeWorkers = 0;
  private queue: Array<() => void> = [];
  private running = true;

  constructor(maxWorkers: number = WORKER_POOL_DEFAULT_MAX_WORKERS, name = 'WorkerPool') {
    this.maxWorkers = Math.max(1, maxWorkers);
    this.name = name;
  }

  /**
   * Execute a task through the pool. At capacity, the task waits for a free worker.
   */
  execute<T>(task: () => Promise<T> | T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (!this.running) {
        reject(new Error(`[${this.name}] Pool is shut down`));
        return;
      }

      const wrappedTask = (): void => {
        const startTime = Date.now();
        void Promise.resolve()
          .then(task)
          .then(
            (result) => {
              const duration = Date.now() - startTime;
              if (duration > WORKER_POOL_SLOW_TASK_MS) {
                console.warn(`[${this.name}] Task completed slowly after ${duration}ms`);
              }
              resolve(result);
            },
            (error: unknown) => reject(error),
          )
          .finally(() => {
            this.activeWorkers--;
            this.processQueue();
          });
      };

      if (this.activeWorkers < this.maxWorkers) {
        // Increment before starting so simultaneous submissions never exceed maxWorkers
        this.activeWorkers++;
        wrappedTask();
      } else {
        this.queue.push(wrappedTask);
      }
    });
  }

  private processQueue(): void {
    while (this.queue.length > 0 && this.activeWorkers < this.maxWorkers && this.running) {
      const task = this.queue.shift();
      if (task) {
        this.activeWorkers++;
        task();
      }
    }
  }

  getStats(): WorkerPoolStats {
    return {
      active: this.activeWorkers,
      queued: this.queue.length,
      max: this.maxWorkers,
    };
  }

  /**
   * Wait for all active and queued work to complete.
   */
  async waitForCompletion(): Promise<void> {
    let iterations = 0;
    while ((this.activeWorkers > 0 || this.queue.length > 0) && iterations < WORKER_POOL_MAX_ITERATIONS) {
      await new Promise((resolve) => setTimeout(resolve, WORKER_POOL_CHECK_INTERVAL_MS));
      iterations++;
    }
    if (iterations >= WORKER_POOL_MAX_ITERATIONS) {
      console.warn(`[${this.name}] waitForCompletion timeout: ${this.activeWorkers} active, ${this.queue.length} queued`);
    }
  }

  /**
   * Stop starting queued work. Already running tasks finish normally.
   */
  shutdown(): void {
    this.running = false;
  }
}
