import { depthConfig, type DepthConfig } from '../config';
import { DepthConstraintError } from '../errors';
import { isUserEdited } from '../taxonomy/contracts';
import type { TaxonomyTree } from '../taxonomy/taxonomy-tree';

export type DepthViolation =
  | { kind: 'exceedsMaximum'; depth: number; maxDepth: number }
  | { kind: 'nodeExceedsMaximum'; nodeId: string; path: string; depth: number; maxDepth: number };

export type DepthWarning =
  | { kind: 'belowMinimum'; depth: number; minDepth: number }
  | { kind: 'approachingMaximum'; depth: number; maxDepth: number };

export interface DepthValidation {
  isValid: boolean;
  currentMaxDepth: number;
  violations: DepthViolation[];
  warnings: DepthWarning[];
}

export interface DepthEnforcementResult {
  validation: DepthValidation;
  /** Nodes removed by flattening. */
  flattenedNodeIds: string[];
}

export function describeViolation(violation: DepthViolation): string {
  switch (violation.kind) {
    case 'exceedsMaximum':
      return `Taxonomy depth ${violation.depth} exceeds maximum ${violation.maxDepth}`;
    case 'nodeExceedsMaximum':
      return `'${violation.path}' is at depth ${violation.depth} (maximum ${violation.maxDepth})`;
  }
}

/**
 * Validates taxonomy depth against [minDepth, maxDepth] and, in flatten
 * mode, lifts over-depth categories into their parents. A category is not
 * flattened when it or its parent is user-edited.
 */
export class DepthEnforcer {
  constructor(private readonly config: DepthConfig = depthConfig()) {}

  validate(tree: TaxonomyTree): DepthValidation {
    const currentMaxDepth = tree.maxDepth();
    const { minDepth, maxDepth } = this.config;
    const violations: DepthViolation[] = [];
    const warnings: DepthWarning[] = [];

    if (currentMaxDepth > maxDepth) {
      violations.push({ kind: 'exceedsMaximum', depth: currentMaxDepth, maxDepth });
      for (const node of tree.allCategories()) {
        const depth = tree.depthOf(node.id);
        if (depth > maxDepth) {
          violations.push({ kind: 'nodeExceedsMaximum', nodeId: node.id, path: tree.pathString(node.id), depth, maxDepth });
        }
      }
    }

    if (this.config.showDepthWarnings) {
      if (currentMaxDepth > 0 && currentMaxDepth < minDepth) {
        warnings.push({ kind: 'belowMinimum', depth: currentMaxDepth, minDepth });
      } else if (currentMaxDepth === maxDepth) {
        warnings.push({ kind: 'approachingMaximum', depth: currentMaxDepth, maxDepth });
      }
    }

    return { isValid: violations.length === 0, currentMaxDepth, violations, warnings };
  }

  /**
   * Apply the configured mode. Strict throws, advisory only logs, flatten
   * mutates the tree; callers serialize it with other writes.
   */
  enforce(tree: TaxonomyTree): DepthEnforcementResult {
    const validation = this.validate(tree);
    if (validation.isValid) {
      return { validation, flattenedNodeIds: [] };
    }

    const messages = validation.violations.map(describeViolation);
    switch (this.config.mode) {
      case 'strict':
        throw new DepthConstraintError(`Depth constraints violated: ${messages[0]}`, messages);
      case 'advisory':
        console.warn(`[DepthEnforcer] ${messages.length} depth violation(s): ${messages[0]}`);
        return { validation, flattenedNodeIds: [] };
      case 'flatten': {
        const flattenedNodeIds = this.flatten(tree);
        return { validation: this.validate(tree), flattenedNodeIds };
      }
    }
  }

  private flatten(tree: TaxonomyTree): string[] {
    const flattened: string[] = [];
    for (;;) {
      const overDepth = tree
        .allCategories()
        .find((node) => tree.depthOf(node.id) > this.config.maxDepth && this.canFlatten(tree, node.id));
      if (!overDepth) break;
      if (!tree.removeCategoryById(overDepth.id)) break;
      flattened.push(overDepth.id);
    }

    if (flattened.length > 0) {
      console.log(`[DepthEnforcer] Flattened ${flattened.length} categories to depth ${this.config.maxDepth}`);
    }
    const stuck = tree.allCategories().filter((node) => tree.depthOf(node.id) > this.config.maxDepth);
    if (stuck.length > 0) {
      console.warn(`[DepthEnforcer] ${stuck.length} protected categories remain beyond depth ${this.config.maxDepth}`);
    }
    return flattened;
  }

  /** Removing a node changes its parent's children, so both must be unprotected. */
  private canFlatten(tree: TaxonomyTree, nodeId: string): boolean {
    const node = tree.getNode(nodeId);
    const parent = tree.parentOf(nodeId);
    return node !== undefined && !isUserEdited(node) && (parent === undefined || !isUserEdited(parent));
  }
}
