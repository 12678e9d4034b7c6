/**
 * UserEditGuardrails - protection rules for categories a human has touched
 *
 * Automatic paths (refinement, deep-analysis recategorization, depth
 * flattening) ask these checks before mutating. Only an explicit approval
 * through the gatekeeper may override a veto.
 */
import { isUserEdited, type TaxonomyNode } from '../taxonomy/contracts';
import type { TaxonomyTree } from '../taxonomy/taxonomy-tree';

export interface GuardrailCheckResult {
  allowed: boolean;
  requiresApproval: boolean;
  reason: string | null;
  affectedNodeIds: string[];
}

const ALLOWED: GuardrailCheckResult = { allowed: true, requiresApproval: false, reason: null, affectedNodeIds: [] };

function blocked(reason: string, affectedNodeIds: string[], requiresApproval = true): GuardrailCheckResult {
  return { allowed: false, requiresApproval, reason, affectedNodeIds };
}

export class UserEditGuardrails {
  canAutoModify(node: TaxonomyNode): boolean {
    return !isUserEdited(node) && !node.isUserCreated;
  }

  /**
   * A file may move automatically unless a human placed it, or it sits in a
   * user-edited category.
   */
  canAutoReassign(tree: TaxonomyTree, fileId: string): boolean {
    const assignment = tree.assignmentFor(fileId);
    if (!assignment) return true;
    if (assignment.source === 'user') return false;
    const node = tree.getNode(assignment.categoryId);
    return !node || !isUserEdited(node);
  }

  /**
   * One-way: there is no operation that clears the flag.
   */
  markAsUserEdited(tree: TaxonomyTree, nodeId: string): boolean {
    const marked = tree.setRefinementState(nodeId, 'userEdited');
    if (marked) {
      console.log(`[UserEditGuardrails] Category '${tree.pathString(nodeId)}' marked as user-edited`);
    }
    return marked;
  }

  validateMerge(tree: TaxonomyTree, sourceIds: readonly string[], targetId: string | null): GuardrailCheckResult {
    const ids = targetId ? [...sourceIds, targetId] : [...sourceIds];
    const missing = ids.filter((id) => !tree.getNode(id));
    if (missing.length > 0) {
      return blocked(`Categories no longer exist: ${missing.join(', ')}`, missing, false);
    }

    const protectedIds = ids.filter((id) => {
      const node = tree.getNode(id);
      return node !== undefined && !this.canAutoModify(node);
    });
    if (protectedIds.length > 0) {
      const names = protectedIds.map((id) => tree.getNode(id)?.name ?? id);
      return blocked(`Merge touches user-edited categories: ${names.join(', ')}`, protectedIds);
    }

    // Removing a source changes its parent's children, and moves its subtree.
    for (const sourceId of sourceIds) {
      const parentId = tree.getNode(sourceId)?.parentId;
      const parent = parentId ? tree.getNode(parentId) : undefined;
      if (parent && !tree.isRoot(parent.id) && !this.canAutoModify(parent)) {
        return blocked(`Merge changes children of user-edited category '${parent.name}'`, [parent.id]);
      }
      const protectedDescendant = this.findProtectedDescendant(tree, sourceId);
      if (protectedDescendant) {
        return blocked(`Merge moves user-edited category '${protectedDescendant.name}'`, [protectedDescendant.id]);
      }
    }
    return ALLOWED;
  }

  private findProtectedDescendant(tree: TaxonomyTree, nodeId: string): TaxonomyNode | undefined {
    for (const child of tree.children(nodeId)) {
      if (!this.canAutoModify(child)) return child;
      const nested = this.findProtectedDescendant(tree, child.id);
      if (nested) return nested;
    }
    return undefined;
  }

  validateSplit(tree: TaxonomyTree, nodeId: string): GuardrailCheckResult {
    const node = tree.getNode(nodeId);
    if (!node) {
      return blocked(`Category no longer exists: ${nodeId}`, [nodeId], false);
    }
    if (!this.canAutoModify(node)) {
      return blocked(`Split touches user-edited category '${node.name}'`, [nodeId]);
    }
    return ALLOWED;
  }

  /**
   * Checks the file's current category, and the category that would receive
   * it or gain a new child on the way to `targetPath`.
   */
  validateReassign(tree: TaxonomyTree, fileId: string, targetPath: readonly string[]): GuardrailCheckResult {
    if (!this.canAutoReassign(tree, fileId)) {
      const nodeId = tree.locateFile(fileId)?.id;
      return blocked(`File ${fileId} is protected by a user decision`, nodeId ? [nodeId] : []);
    }

    let current: TaxonomyNode = tree.root;
    for (const segment of targetPath.map((part) => part.trim()).filter((part) => part.length > 0)) {
      const next = tree.childNamed(current.id, segment);
      if (!next) break;
      current = next;
    }
    if (isUserEdited(current)) {
      return blocked(`Target category '${current.name}' is user-edited`, [current.id]);
    }
    return ALLOWED;
  }
}
