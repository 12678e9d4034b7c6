import { WorkerPool } from '../shared/worker-pool';
import type { TaxonomyTree } from './taxonomy-tree';

export type TreeMutation<T> = (tree: TaxonomyTree) => T | Promise<T>;

/**
 * Single-writer lock around a TaxonomyTree.
 *
 * Mutations run one at a time in submission order. Reads go to `tree`
 * directly. `onWrite` fires after every successful mutation.
 */
export class TreeWriter {
  private readonly lock = new WorkerPool(1, 'TreeWriter');
  private listeners: Array<(tree: TaxonomyTree) => void> = [];

  constructor(readonly tree: TaxonomyTree) {}

  async write<T>(mutation: TreeMutation<T>): Promise<T> {
    const result = await this.lock.execute(() => mutation(this.tree));
    for (const listener of this.listeners) {
      try {
        listener(this.tree);
      } catch (error) {
        console.error('[TreeWriter] Write listener failed:', error);
      }
    }
    return result;
  }

  onWrite(listener: (tree: TaxonomyTree) => void): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((existing) => existing !== listener);
    };
  }

  get pendingWrites(): number {
    const stats = this.lock.getStats();
    return stats.active + stats.queued;
  }
}
