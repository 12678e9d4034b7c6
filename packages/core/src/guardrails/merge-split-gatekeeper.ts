/**
 * MergeSplitGatekeeper - approval workflow for structural changes
 *
 * Every merge or split is registered as a pending suggestion first.
 * `approveMerge`/`approveSplit` are the only calls that mutate the tree;
 * `autoApplyMerge` is the automatic path and refuses anything the guardrails
 * veto, leaving the suggestion pending for a human.
 */
import { randomUUID } from 'crypto';
import {
  GatekeeperError,
  GatekeeperErrorCode,
  suggestionAlreadyProcessedError,
  suggestionNotFoundError,
} from '../errors';
import { isUserEdited } from '../taxonomy/contracts';
import type { TaxonomyTree } from '../taxonomy/taxonomy-tree';
import type { UserEditGuardrails } from './user-edit-guardrails';

export type SuggestionStatus = 'pending' | 'approved' | 'rejected' | 'applied';

export type MergeTarget =
  | { kind: 'existing'; nodeId: string }
  | { kind: 'new'; parentId: string; name: string };

export interface MergeSuggestion {
  id: string;
  sourceNodeIds: string[];
  sourceNames: string[];
  target: MergeTarget;
  reason: string;
  confidence: number;
  status: SuggestionStatus;
  warnings: string[];
  createdAt: number;
  processedAt: number | null;
  resultNodeId: string | null;
}

export interface SplitChild {
  name: string;
  /** Files moved into the new child on approval. */
  fileIds: string[];
}

export interface SplitSuggestion {
  id: string;
  nodeId: string;
  nodeName: string;
  children: SplitChild[];
  reason: string;
  confidence: number;
  status: SuggestionStatus;
  warnings: string[];
  createdAt: number;
  processedAt: number | null;
  createdNodeIds: string[];
}

export type SuggestionRecord =
  | { kind: 'merge'; suggestion: MergeSuggestion }
  | { kind: 'split'; suggestion: SplitSuggestion };

export interface SuggestMergeInput {
  sourceNodeIds: string[];
  target: MergeTarget;
  reason: string;
  confidence?: number;
}

export interface SuggestSplitInput {
  nodeId: string;
  children: SplitChild[];
  reason: string;
  confidence?: number;
}

export class MergeSplitGatekeeper {
  private merges = new Map<string, MergeSuggestion>();
  private splits = new Map<string, SplitSuggestion>();
  private listeners: Array<(record: SuggestionRecord) => void> = [];

  constructor(private readonly guardrails: UserEditGuardrails) {}

  onChange(listener: (record: SuggestionRecord) => void): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((existing) => existing !== listener);
    };
  }

  // ============================================================================
  // Suggestions
  // ============================================================================

  suggestMerge(tree: TaxonomyTree, input: SuggestMergeInput): MergeSuggestion {
    const warnings: string[] = [];
    const sourceNames: string[] = [];
    for (const id of input.sourceNodeIds) {
      const node = tree.getNode(id);
      if (!node) {
        warnings.push(`Source ${id} not found`);
        continue;
      }
      sourceNames.push(node.name);
      if (isUserEdited(node)) warnings.push(`'${node.name}' was edited by the user`);
    }
    if (input.target.kind === 'existing') {
      const target = tree.getNode(input.target.nodeId);
      if (target && isUserEdited(target)) warnings.push(`Target '${target.name}' was edited by the user`);
    }

    const suggestion: MergeSuggestion = {
      id: randomUUID(),
      sourceNodeIds: [...input.sourceNodeIds],
      sourceNames,
      target: input.target,
      reason: input.reason,
      confidence: input.confidence ?? 0.5,
      status: 'pending',
      warnings,
      createdAt: Date.now(),
      processedAt: null,
      resultNodeId: null,
    };
    this.merges.set(suggestion.id, suggestion);
    this.emit({ kind: 'merge', suggestion });
    return suggestion;
  }

  suggestSplit(tree: TaxonomyTree, input: SuggestSplitInput): SplitSuggestion {
    const node = tree.getNode(input.nodeId);
    const warnings: string[] = [];
    if (!node) warnings.push(`Category ${input.nodeId} not found`);
    else if (isUserEdited(node)) warnings.push(`'${node.name}' was edited by the user`);

    const suggestion: SplitSuggestion = {
      id: randomUUID(),
      nodeId: input.nodeId,
      nodeName: node?.name ?? '',
      children: input.children.map((child) => ({ name: child.name, fileIds: [...child.fileIds] })),
      reason: input.reason,
      confidence: input.confidence ?? 0.5,
      status: 'pending',
      warnings,
      createdAt: Date.now(),
      processedAt: null,
      createdNodeIds: [],
    };
    this.splits.set(suggestion.id, suggestion);
    this.emit({ kind: 'split', suggestion });
    return suggestion;
  }

  getPendingMerges(): MergeSuggestion[] {
    return [...this.merges.values()].filter((suggestion) => suggestion.status === 'pending');
  }

  getPendingSplits(): SplitSuggestion[] {
    return [...this.splits.values()].filter((suggestion) => suggestion.status === 'pending');
  }

  getMerge(id: string): MergeSuggestion | undefined {
    return this.merges.get(id);
  }

  getSplit(id: string): SplitSuggestion | undefined {
    return this.splits.get(id);
  }

  // ============================================================================
  // Approval
  // ============================================================================

  /**
   * Apply a merge on explicit human approval. Guardrails are not consulted.
   * A merge that moves no source ends up rejected with a warning.
   */
  approveMerge(id: string, tree: TaxonomyTree): MergeSuggestion {
    const suggestion = this.pendingMerge(id);
    const createsTarget = suggestion.target.kind === 'new' && !this.existingNewTarget(tree, suggestion);
    const targetId = this.resolveMergeTarget(tree, suggestion);
    suggestion.status = 'approved';

    let merged = 0;
    for (const sourceId of suggestion.sourceNodeIds) {
      if (sourceId === targetId) continue;
      if (tree.mergeCategoriesById(sourceId, targetId)) {
        merged++;
      } else {
        console.warn(`[MergeSplitGatekeeper] Skipped merge source ${sourceId} for suggestion ${id}`);
      }
    }

    suggestion.processedAt = Date.now();
    if (merged === 0) {
      if (createsTarget) tree.removeCategoryById(targetId);
      suggestion.status = 'rejected';
      suggestion.resultNodeId = null;
      suggestion.warnings.push('No source category could be merged');
      console.warn(`[MergeSplitGatekeeper] Merge ${id} moved nothing`);
    } else {
      suggestion.status = 'applied';
      suggestion.resultNodeId = targetId;
    }
    this.emit({ kind: 'merge', suggestion });
    return suggestion;
  }

  /**
   * Automatic path: applies only when the guardrails allow it. A vetoed
   * suggestion stays pending and null is returned.
   */
  autoApplyMerge(id: string, tree: TaxonomyTree): MergeSuggestion | null {
    const suggestion = this.pendingMerge(id);
    const targetId = suggestion.target.kind === 'existing' ? suggestion.target.nodeId : null;
    const check = this.guardrails.validateMerge(tree, suggestion.sourceNodeIds, targetId);
    if (!check.allowed) {
      console.log(`[MergeSplitGatekeeper] Merge ${id} held for approval: ${check.reason}`);
      if (!suggestion.warnings.includes(check.reason ?? '')) {
        suggestion.warnings.push(check.reason ?? 'Blocked by guardrails');
        this.emit({ kind: 'merge', suggestion });
      }
      return null;
    }
    if (suggestion.target.kind === 'new') {
      const parent = tree.getNode(suggestion.target.parentId);
      const sameName = tree.childNamed(suggestion.target.parentId, suggestion.target.name);
      const protectedNode = [parent, sameName].find((node) => node !== undefined && isUserEdited(node));
      if (protectedNode) {
        console.log(`[MergeSplitGatekeeper] Merge ${id} held for approval: '${protectedNode.name}' is user-edited`);
        return null;
      }
    }
    return this.approveMerge(id, tree);
  }

  approveSplit(id: string, tree: TaxonomyTree): SplitSuggestion {
    const suggestion = this.pendingSplit(id);
    if (!tree.getNode(suggestion.nodeId)) {
      throw new GatekeeperError(
        GatekeeperErrorCode.SUGGESTION_NOT_FOUND,
        `Category for split suggestion ${id} no longer exists`,
      );
    }
    suggestion.status = 'approved';

    const created = tree.splitCategoryById(
      suggestion.nodeId,
      suggestion.children.map((child) => child.name),
    );
    suggestion.children.forEach((child, index) => {
      const node = created[index];
      if (!node) return;
      for (const fileId of child.fileIds) {
        if (!tree.moveFileToNode(fileId, node.id)) {
          console.warn(`[MergeSplitGatekeeper] File ${fileId} not found while applying split ${id}`);
        }
      }
    });

    suggestion.status = 'applied';
    suggestion.processedAt = Date.now();
    suggestion.createdNodeIds = created.map((node) => node.id);
    this.emit({ kind: 'split', suggestion });
    return suggestion;
  }

  rejectMerge(id: string, reason?: string): MergeSuggestion {
    const suggestion = this.pendingMerge(id);
    suggestion.status = 'rejected';
    suggestion.processedAt = Date.now();
    if (reason) suggestion.warnings.push(`Rejected: ${reason}`);
    this.emit({ kind: 'merge', suggestion });
    return suggestion;
  }

  rejectSplit(id: string, reason?: string): SplitSuggestion {
    const suggestion = this.pendingSplit(id);
    suggestion.status = 'rejected';
    suggestion.processedAt = Date.now();
    if (reason) suggestion.warnings.push(`Rejected: ${reason}`);
    this.emit({ kind: 'split', suggestion });
    return suggestion;
  }

  /**
   * Drop applied and rejected suggestions from memory.
   */
  clearProcessed(): number {
    let removed = 0;
    for (const [id, suggestion] of this.merges) {
      if (suggestion.status !== 'pending') {
        this.merges.delete(id);
        removed++;
      }
    }
    for (const [id, suggestion] of this.splits) {
      if (suggestion.status !== 'pending') {
        this.splits.delete(id);
        removed++;
      }
    }
    return removed;
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private pendingMerge(id: string): MergeSuggestion {
    const suggestion = this.merges.get(id);
    if (!suggestion) throw suggestionNotFoundError(id);
    if (suggestion.status !== 'pending') throw suggestionAlreadyProcessedError(id);
    return suggestion;
  }

  private pendingSplit(id: string): SplitSuggestion {
    const suggestion = this.splits.get(id);
    if (!suggestion) throw suggestionNotFoundError(id);
    if (suggestion.status !== 'pending') throw suggestionAlreadyProcessedError(id);
    return suggestion;
  }

  private existingNewTarget(tree: TaxonomyTree, suggestion: MergeSuggestion): string | null {
    const target = suggestion.target;
    if (target.kind !== 'new') return null;
    const parentId = tree.getNode(target.parentId) ? target.parentId : tree.rootId;
    return tree.childNamed(parentId, target.name)?.id ?? null;
  }

  private resolveMergeTarget(tree: TaxonomyTree, suggestion: MergeSuggestion): string {
    const target = suggestion.target;
    if (target.kind === 'existing') {
      if (!tree.getNode(target.nodeId)) {
        throw new GatekeeperError(
          GatekeeperErrorCode.SUGGESTION_NOT_FOUND,
          `Merge target ${target.nodeId} no longer exists`,
        );
      }
      return target.nodeId;
    }

    const existing = this.existingNewTarget(tree, suggestion);
    if (existing) return existing;
    const parentId = tree.getNode(target.parentId) ? target.parentId : tree.rootId;
    return tree.createChildOf(parentId, target.name).id;
  }

  private emit(record: SuggestionRecord): void {
    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (error) {
        console.error('[MergeSplitGatekeeper] Change listener failed:', error);
      }
    }
  }
}
