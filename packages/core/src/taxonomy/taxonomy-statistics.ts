import { DEEP_ANALYSIS_CONFIDENCE_THRESHOLD } from '../config/constants';
import type { RefinementState } from './contracts';
import type { TaxonomyTree } from './taxonomy-tree';

export interface TaxonomyStatistics {
  categoryCount: number;
  leafCount: number;
  fileCount: number;
  maxDepth: number;
  averageFilesPerLeaf: number;
  uncategorizedCount: number;
  userEditedCount: number;
  refinementStates: Record<RefinementState, number>;
}

/**
 * Summary counts for display and logging. A file is "uncategorized" when it
 * sits directly under the root or below the confidence threshold.
 */
export function computeStatistics(
  tree: TaxonomyTree,
  confidenceThreshold: number = DEEP_ANALYSIS_CONFIDENCE_THRESHOLD,
): TaxonomyStatistics {
  const categories = tree.allCategories();
  const leaves = categories.filter((node) => node.childIds.length === 0);
  const refinementStates: Record<RefinementState, number> = {
    initial: 0,
    refining: 0,
    refined: 0,
    userEdited: 0,
  };
  for (const node of categories) {
    refinementStates[node.refinementState]++;
  }

  const files = tree.allFiles();
  const uncategorizedCount = files.filter(
    (file) => file.categoryId === tree.rootId || file.confidence < confidenceThreshold,
  ).length;
  const filesInLeaves = leaves.reduce((sum, leaf) => sum + leaf.assignedFiles.length, 0);

  return {
    categoryCount: categories.length,
    leafCount: leaves.length,
    fileCount: files.length,
    maxDepth: tree.maxDepth(),
    averageFilesPerLeaf: leaves.length > 0 ? filesInLeaves / leaves.length : 0,
    uncategorizedCount,
    userEditedCount: refinementStates.userEdited,
    refinementStates,
  };
}
