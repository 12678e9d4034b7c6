import { describe, it, expect } from 'vitest';
import { depthConfig } from '../../config';
import { DepthConstraintError } from '../../errors';
import { TaxonomyTree } from '../../taxonomy/taxonomy-tree';
import { DepthEnforcer } from '../depth-enforcer';

function deepTree(): TaxonomyTree {
  const tree = new TaxonomyTree();
  tree.assignFile({ fileId: 'deep', path: '/deep', filename: 'deep.txt' }, ['A', 'B', 'C', 'D'], 0.8);
  return tree;
}

describe('DepthEnforcer', () => {
  it('reports per-node violations beyond the maximum', () => {
    const tree = deepTree();
    const validation = new DepthEnforcer(depthConfig({ maxDepth: 2 })).validate(tree);

    expect(validation.isValid).toBe(false);
    expect(validation.currentMaxDepth).toBe(4);
    expect(validation.violations.map((violation) => violation.kind)).toEqual([
      'exceedsMaximum',
      'nodeExceedsMaximum',
      'nodeExceedsMaximum',
    ]);
  });

  it('warns about shallow and at-limit trees', () => {
    const shallow = new TaxonomyTree();
    shallow.findOrCreate(['A']);
    expect(new DepthEnforcer().validate(shallow).warnings).toEqual([{ kind: 'belowMinimum', depth: 1, minDepth: 2 }]);

    const atLimit = new TaxonomyTree();
    atLimit.findOrCreate(['A', 'B']);
    expect(new DepthEnforcer(depthConfig({ maxDepth: 2 })).validate(atLimit).warnings).toEqual([
      { kind: 'approachingMaximum', depth: 2, maxDepth: 2 },
    ]);

    expect(new DepthEnforcer(depthConfig({ showDepthWarnings: false })).validate(shallow).warnings).toEqual([]);
  });

  it('throws in strict mode', () => {
    const enforcer = new DepthEnforcer(depthConfig({ maxDepth: 2, mode: 'strict' }));
    try {
      enforcer.enforce(deepTree());
      expect.unreachable('enforce should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(DepthConstraintError);
      expect(error instanceof DepthConstraintError && error.violations).toEqual([
        'Taxonomy depth 4 exceeds maximum 2',
        "'A / B / C' is at depth 3 (maximum 2)",
        "'A / B / C / D' is at depth 4 (maximum 2)",
      ]);
    }
  });

  it('leaves the tree alone in advisory mode', () => {
    const tree = deepTree();
    const result = new DepthEnforcer(depthConfig({ maxDepth: 2 })).enforce(tree);
    expect(result.flattenedNodeIds).toEqual([]);
    expect(tree.maxDepth()).toBe(4);
  });

  it('flattens over-depth categories into their ancestors keeping files', () => {
    const tree = deepTree();
    const c = tree.find(['A', 'B', 'C']);
    const d = tree.find(['A', 'B', 'C', 'D']);

    const result = new DepthEnforcer(depthConfig({ maxDepth: 2, mode: 'flatten' })).enforce(tree);

    expect(result.flattenedNodeIds).toEqual([c?.id, d?.id]);
    expect(result.validation.isValid).toBe(true);
    expect(tree.maxDepth()).toBe(2);
    expect(tree.pathString(tree.locateFile('deep')?.id ?? '')).toBe('A / B');
  });

  it('does not flatten user-edited categories', () => {
    const tree = deepTree();
    const c = tree.find(['A', 'B', 'C']);
    if (c) tree.setRefinementState(c.id, 'userEdited');

    const result = new DepthEnforcer(depthConfig({ maxDepth: 2, mode: 'flatten' })).enforce(tree);

    expect(result.flattenedNodeIds).toEqual([]);
    expect(result.validation.isValid).toBe(false);
    expect(tree.find(['A', 'B', 'C', 'D'])).toBeDefined();
  });
});
