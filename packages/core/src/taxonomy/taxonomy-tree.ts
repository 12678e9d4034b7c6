/**
 * TaxonomyTree - arena of category nodes with file assignments
 *
 * Nodes are stored by id; parent/child links are ids. A fileId -> nodeId index
 * keeps at most one active assignment per file across the whole tree, so
 * reassignment is O(depth) instead of a full scan.
 *
 * Workflow Context:
 * - findOrCreate: used by the builder to materialize clustered paths
 * - reassignFile: used by the task manager when deep analysis recategorizes a file
 * - merge/split/remove: applied by the gatekeeper, depth enforcer and user actions
 *
 * The tree does no locking of its own. Background mutation goes through TreeWriter.
 */
import { randomUUID } from 'crypto';
import { DEFAULT_ROOT_NAME, PATH_SEPARATOR } from '../config/constants';
import { fileNotFoundError, TaxonomyError, TaxonomyErrorCode } from '../errors';
import {
  TaxonomyTreeSnapshotSchema,
  type AssignmentSource,
  type FileAssignment,
  type FileRef,
  type RefinementState,
  type TaxonomyNode,
  type TaxonomyTreeSnapshot,
} from './contracts';

interface NodeRecord {
  id: string;
  name: string;
  suggestedName: string | null;
  parentId: string | null;
  childIds: string[];
  assignedFiles: FileAssignment[];
  confidence: number;
  isUserCreated: boolean;
  refinementState: RefinementState;
  createdAt: number;
}

export interface CreateNodeOptions {
  isUserCreated?: boolean;
  confidence?: number;
  refinementState?: RefinementState;
}

export interface PlaceFileOptions {
  source?: AssignmentSource;
  needsDeepAnalysis?: boolean;
}

export interface ReassignFileOptions extends PlaceFileOptions {
  /** Used when the file is not yet in the tree. */
  file?: FileRef;
}

export interface TaxonomyTreeOptions {
  id?: string;
  rootId?: string;
  createdAt?: number;
  sourceFolderName?: string | null;
}

function cleanSegments(path: readonly string[]): string[] {
  return path.map((segment) => segment.trim()).filter((segment) => segment.length > 0);
}

export class TaxonomyTree {
  readonly id: string;
  readonly rootId: string;
  readonly createdAt: number;
  sourceFolderName: string | null;
  isVerified = false;

  private _modifiedAt: number;
  private nodes = new Map<string, NodeRecord>();
  private fileIndex = new Map<string, string>();

  constructor(rootName: string = DEFAULT_ROOT_NAME, options: TaxonomyTreeOptions = {}) {
    this.id = options.id ?? randomUUID();
    this.rootId = options.rootId ?? randomUUID();
    this.createdAt = options.createdAt ?? Date.now();
    this._modifiedAt = this.createdAt;
    this.sourceFolderName = options.sourceFolderName ?? null;
    this.nodes.set(this.rootId, {
      id: this.rootId,
      name: rootName,
      suggestedName: null,
      parentId: null,
      childIds: [],
      assignedFiles: [],
      confidence: 1,
      isUserCreated: false,
      refinementState: 'initial',
      createdAt: this.createdAt,
    });
  }

  // ============================================================================
  // Queries
  // ============================================================================

  get modifiedAt(): number {
    return this._modifiedAt;
  }

  get root(): TaxonomyNode {
    return this.record(this.rootId);
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  /** Number of files with an active assignment. */
  get fileCount(): number {
    return this.fileIndex.size;
  }

  getNode(id: string): TaxonomyNode | undefined {
    return this.nodes.get(id);
  }

  isRoot(id: string): boolean {
    return id === this.rootId;
  }

  children(id: string): TaxonomyNode[] {
    const node = this.nodes.get(id);
    if (!node) return [];
    return node.childIds.map((childId) => this.record(childId));
  }

  parentOf(id: string): TaxonomyNode | undefined {
    const parentId = this.nodes.get(id)?.parentId;
    return parentId ? this.nodes.get(parentId) : undefined;
  }

  /**
   * Names from the root (inclusive) down to the node.
   */
  pathOf(id: string): string[] {
    const names: string[] = [];
    let current = this.nodes.get(id);
    while (current) {
      names.unshift(current.name);
      current = current.parentId ? this.nodes.get(current.parentId) : undefined;
    }
    return names;
  }

  /**
   * Path below the root, suitable for findOrCreate/reassignFile.
   */
  categoryPath(id: string): string[] {
    return this.pathOf(id).slice(1);
  }

  pathString(id: string): string {
    const path = this.categoryPath(id);
    return path.length > 0 ? path.join(PATH_SEPARATOR) : this.root.name;
  }

  depthOf(id: string): number {
    return Math.max(0, this.pathOf(id).length - 1);
  }

  /** True when `id` lies strictly inside the subtree of `ancestorId`. */
  isDescendant(id: string, ancestorId: string): boolean {
    let current = this.nodes.get(id)?.parentId ?? null;
    while (current) {
      if (current === ancestorId) return true;
      current = this.nodes.get(current)?.parentId ?? null;
    }
    return false;
  }

  childNamed(parentId: string, name: string): TaxonomyNode | undefined {
    return this.children(parentId).find((child) => child.name === name);
  }

  /**
   * Resolve a path without creating anything. A leading root name is accepted.
   */
  find(path: readonly string[]): TaxonomyNode | undefined {
    let segments = cleanSegments(path);
    const rootName = this.root.name;
    if (segments[0] === rootName && !this.childNamed(this.rootId, rootName)) {
      segments = segments.slice(1);
    }

    let current: TaxonomyNode = this.root;
    for (const segment of segments) {
      const next = this.childNamed(current.id, segment);
      if (!next) return undefined;
      current = next;
    }
    return current;
  }

  totalFileCount(id: string = this.rootId): number {
    const node = this.nodes.get(id);
    if (!node) return 0;
    let total = node.assignedFiles.length;
    for (const childId of node.childIds) {
      total += this.totalFileCount(childId);
    }
    return total;
  }

  allFiles(id: string = this.rootId): FileAssignment[] {
    const node = this.nodes.get(id);
    if (!node) return [];
    const files = [...node.assignedFiles];
    for (const childId of node.childIds) {
      files.push(...this.allFiles(childId));
    }
    return files;
  }

  /**
   * Every category except the root, depth-first in child order.
   */
  allCategories(): TaxonomyNode[] {
    const result: TaxonomyNode[] = [];
    const visit = (id: string): void => {
      for (const child of this.children(id)) {
        result.push(child);
        visit(child.id);
      }
    };
    visit(this.rootId);
    return result;
  }

  leafCategories(): TaxonomyNode[] {
    return this.allCategories().filter((node) => node.childIds.length === 0);
  }

  maxDepth(): number {
    let max = 0;
    for (const id of this.nodes.keys()) {
      max = Math.max(max, this.depthOf(id));
    }
    return max;
  }

  locateFile(fileId: string): TaxonomyNode | undefined {
    const nodeId = this.fileIndex.get(fileId);
    return nodeId ? this.nodes.get(nodeId) : undefined;
  }

  assignmentFor(fileId: string): FileAssignment | undefined {
    return this.locateFile(fileId)?.assignedFiles.find((assignment) => assignment.fileId === fileId);
  }

  filesNeedingDeepAnalysis(threshold: number): FileAssignment[] {
    return this.allFiles().filter((file) => file.needsDeepAnalysis || file.confidence < threshold);
  }

  categoryPaths(): string[] {
    return this.allCategories().map((node) => this.pathString(node.id));
  }

  // ============================================================================
  // Category mutation
  // ============================================================================

  /**
   * Create every missing segment of `path` and return the leaf. Idempotent.
   */
  findOrCreate(path: readonly string[], options: CreateNodeOptions = {}): TaxonomyNode {
    let current = this.record(this.rootId);
    for (const segment of cleanSegments(path)) {
      const existing = current.childIds
        .map((childId) => this.record(childId))
        .find((child) => child.name === segment);
      current = existing ?? this.createChild(current, segment, options);
    }
    return current;
  }

  createChildOf(parentId: string, name: string, options: CreateNodeOptions = {}): TaxonomyNode {
    return this.createChild(this.record(parentId), name.trim(), options);
  }

  removeCategory(path: readonly string[]): boolean {
    const node = this.find(path);
    return node ? this.removeCategoryById(node.id) : false;
  }

  /**
   * Detach a category, moving its files and children into its parent.
   * The root is never removed.
   */
  removeCategoryById(id: string): boolean {
    const node = this.nodes.get(id);
    if (!node || !node.parentId) return false;
    const parent = this.record(node.parentId);

    this.moveContents(node, parent);
    parent.childIds = parent.childIds.filter((childId) => childId !== id);
    this.nodes.delete(id);
    this.touch();
    return true;
  }

  renameCategory(path: readonly string[], newName: string): boolean {
    const node = this.find(path);
    return node ? this.renameCategoryById(node.id, newName) : false;
  }

  renameCategoryById(id: string, newName: string): boolean {
    const node = this.nodes.get(id);
    const name = newName.trim();
    if (!node || !name) return false;
    if (node.name !== name) {
      node.name = name;
      this.touch();
    }
    return true;
  }

  mergeCategories(sourcePath: readonly string[], targetPath: readonly string[]): boolean {
    const source = this.find(sourcePath);
    const target = this.find(targetPath);
    if (!source || !target) return false;
    return this.mergeCategoriesById(source.id, target.id);
  }

  /**
   * Move the source's direct files and children into the target, then detach
   * the source. A child whose name the target already uses is merged into
   * that child, recursively. No-op when source and target are the same node.
   */
  mergeCategoriesById(sourceId: string, targetId: string): boolean {
    if (sourceId === targetId) return false;
    const source = this.nodes.get(sourceId);
    const target = this.nodes.get(targetId);
    if (!source || !target || !source.parentId) return false;
    if (this.isDescendant(targetId, sourceId)) {
      console.warn(`[TaxonomyTree] Refusing to merge '${source.name}' into its own descendant '${target.name}'`);
      return false;
    }

    this.moveContents(source, target);
    const parent = this.record(source.parentId);
    parent.childIds = parent.childIds.filter((childId) => childId !== sourceId);
    this.nodes.delete(sourceId);
    this.touch();
    return true;
  }

  moveCategory(path: readonly string[], newParentPath: readonly string[]): boolean {
    const node = this.find(path);
    const newParent = this.find(newParentPath);
    if (!node || !newParent) return false;
    return this.moveCategoryById(node.id, newParent.id);
  }

  moveCategoryById(id: string, newParentId: string): boolean {
    const node = this.nodes.get(id);
    const newParent = this.nodes.get(newParentId);
    if (!node || !newParent || !node.parentId) return false;
    if (id === newParentId || this.isDescendant(newParentId, id)) return false;
    if (node.parentId === newParentId) return true;

    const oldParent = this.record(node.parentId);
    oldParent.childIds = oldParent.childIds.filter((childId) => childId !== id);
    newParent.childIds.push(id);
    node.parentId = newParentId;
    this.touch();
    return true;
  }

  /**
   * Create `names` as user-created children. Existing files are not moved;
   * a name that already exists as a child is reused.
   */
  splitCategory(path: readonly string[], names: readonly string[]): TaxonomyNode[] {
    const node = this.find(path);
    return node ? this.splitCategoryById(node.id, names) : [];
  }

  splitCategoryById(id: string, names: readonly string[]): TaxonomyNode[] {
    const node = this.nodes.get(id);
    if (!node) return [];
    const created: TaxonomyNode[] = [];
    for (const name of cleanSegments(names)) {
      const existing = this.childNamed(id, name);
      created.push(existing ?? this.createChild(node, name, { isUserCreated: true }));
    }
    return created;
  }

  // ============================================================================
  // Node state
  // ============================================================================

  /**
   * `userEdited` is terminal: once set, no other state can replace it.
   */
  setRefinementState(id: string, state: RefinementState): boolean {
    const node = this.nodes.get(id);
    if (!node) return false;
    if (node.refinementState === 'userEdited') return state === 'userEdited';
    if (node.refinementState !== state) {
      node.refinementState = state;
      this.touch();
    }
    return true;
  }

  setSuggestedName(id: string, suggestedName: string | null): boolean {
    const node = this.nodes.get(id);
    if (!node) return false;
    node.suggestedName = suggestedName;
    this.touch();
    return true;
  }

  acceptSuggestedName(id: string): boolean {
    const node = this.nodes.get(id);
    if (!node?.suggestedName) return false;
    const accepted = this.renameCategoryById(id, node.suggestedName);
    node.suggestedName = null;
    return accepted;
  }

  setConfidence(id: string, confidence: number): boolean {
    const node = this.nodes.get(id);
    if (!node) return false;
    node.confidence = Math.min(1, Math.max(0, confidence));
    this.touch();
    return true;
  }

  // ============================================================================
  // File placement
  // ============================================================================

  assignFile(file: FileRef, path: readonly string[], confidence: number, options: PlaceFileOptions = {}): FileAssignment {
    const node = this.findOrCreate(path);
    return this.place(this.record(node.id), file, confidence, options);
  }

  assignFileToNode(nodeId: string, file: FileRef, confidence: number, options: PlaceFileOptions = {}): FileAssignment {
    return this.place(this.record(nodeId), file, confidence, options);
  }

  /**
   * Remove the file's current assignment wherever it is and insert a fresh one
   * at the found-or-created target. Runs synchronously, so readers never
   * observe the file missing or duplicated.
   */
  reassignFile(
    fileId: string,
    newPath: readonly string[],
    confidence: number,
    options: ReassignFileOptions = {},
  ): FileAssignment {
    const prior = this.assignmentFor(fileId);
    const ref: FileRef | undefined = prior
      ? { fileId, path: prior.path, filename: prior.filename }
      : options.file;
    if (!ref) throw fileNotFoundError(fileId);

    const target = this.findOrCreate(newPath);
    return this.place(this.record(target.id), ref, confidence, {
      source: options.source ?? 'content',
      needsDeepAnalysis: options.needsDeepAnalysis ?? false,
    });
  }

  /**
   * Move an assignment to another node keeping its confidence and source.
   */
  moveFileToNode(fileId: string, nodeId: string): boolean {
    const target = this.nodes.get(nodeId);
    const prior = this.assignmentFor(fileId);
    if (!target || !prior) return false;
    if (prior.categoryId === nodeId) return true;

    this.detachFile(fileId);
    target.assignedFiles.push({ ...prior, categoryId: nodeId });
    this.fileIndex.set(fileId, nodeId);
    this.touch();
    return true;
  }

  removeFile(fileId: string): FileAssignment | undefined {
    const removed = this.detachFile(fileId);
    if (removed) this.touch();
    return removed;
  }

  // ============================================================================
  // Snapshots
  // ============================================================================

  toSnapshot(): TaxonomyTreeSnapshot {
    return {
      id: this.id,
      rootId: this.rootId,
      createdAt: this.createdAt,
      modifiedAt: this._modifiedAt,
      sourceFolderName: this.sourceFolderName,
      isVerified: this.isVerified,
      nodes: [...this.nodes.values()].map((node) => ({
        ...node,
        childIds: [...node.childIds],
        assignedFiles: node.assignedFiles.map((file) => ({ ...file })),
      })),
    };
  }

  static fromSnapshot(input: unknown): TaxonomyTree {
    const snapshot = TaxonomyTreeSnapshotSchema.parse(input);
    const rootSnapshot = snapshot.nodes.find((node) => node.id === snapshot.rootId);
    if (!rootSnapshot) {
      throw new TaxonomyError(TaxonomyErrorCode.CATEGORY_NOT_FOUND, `Snapshot root ${snapshot.rootId} is missing`);
    }

    const tree = new TaxonomyTree(rootSnapshot.name, {
      id: snapshot.id,
      rootId: snapshot.rootId,
      createdAt: snapshot.createdAt,
      sourceFolderName: snapshot.sourceFolderName,
    });
    tree.isVerified = snapshot.isVerified;
    tree.nodes.clear();

    for (const node of snapshot.nodes) {
      const files: FileAssignment[] = [];
      for (const file of node.assignedFiles) {
        if (tree.fileIndex.has(file.fileId)) {
          console.warn(`[TaxonomyTree] Dropping duplicate assignment for file ${file.fileId} in snapshot`);
          continue;
        }
        tree.fileIndex.set(file.fileId, node.id);
        files.push({ ...file, categoryId: node.id });
      }
      tree.nodes.set(node.id, { ...node, childIds: [...node.childIds], assignedFiles: files });
    }

    tree._modifiedAt = snapshot.modifiedAt;
    return tree;
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private record(id: string): NodeRecord {
    const node = this.nodes.get(id);
    if (!node) {
      throw new TaxonomyError(TaxonomyErrorCode.CATEGORY_NOT_FOUND, `Category not found: ${id}`);
    }
    return node;
  }

  private createChild(parent: NodeRecord, name: string, options: CreateNodeOptions): NodeRecord {
    const node: NodeRecord = {
      id: randomUUID(),
      name,
      suggestedName: null,
      parentId: parent.id,
      childIds: [],
      assignedFiles: [],
      confidence: options.confidence ?? 1,
      isUserCreated: options.isUserCreated ?? false,
      refinementState: options.refinementState ?? 'initial',
      createdAt: Date.now(),
    };
    this.nodes.set(node.id, node);
    parent.childIds.push(node.id);
    this.touch();
    return node;
  }

  private place(node: NodeRecord, file: FileRef, confidence: number, options: PlaceFileOptions): FileAssignment {
    this.detachFile(file.fileId);
    const assignment: FileAssignment = {
      id: randomUUID(),
      fileId: file.fileId,
      categoryId: node.id,
      path: file.path,
      filename: file.filename,
      confidence: Math.min(1, Math.max(0, confidence)),
      needsDeepAnalysis: options.needsDeepAnalysis ?? false,
      source: options.source ?? 'filename',
      assignedAt: Date.now(),
    };
    node.assignedFiles.push(assignment);
    this.fileIndex.set(file.fileId, node.id);
    this.touch();
    return assignment;
  }

  private detachFile(fileId: string): FileAssignment | undefined {
    const nodeId = this.fileIndex.get(fileId);
    if (!nodeId) return undefined;
    this.fileIndex.delete(fileId);
    const node = this.nodes.get(nodeId);
    if (!node) return undefined;
    const removed = node.assignedFiles.find((file) => file.fileId === fileId);
    node.assignedFiles = node.assignedFiles.filter((file) => file.fileId !== fileId);
    return removed;
  }

  private moveContents(from: NodeRecord, to: NodeRecord): void {
    for (const file of from.assignedFiles) {
      to.assignedFiles.push({ ...file, categoryId: to.id });
      this.fileIndex.set(file.fileId, to.id);
    }
    from.assignedFiles = [];

    const childIds = from.childIds;
    from.childIds = [];
    for (const childId of childIds) {
      const child = this.record(childId);
      // Same-name children are folded together so siblings stay unique.
      const sibling = to.childIds
        .map((id) => this.record(id))
        .find((candidate) => candidate.id !== from.id && candidate.name === child.name);
      if (!sibling) {
        child.parentId = to.id;
        to.childIds.push(childId);
        continue;
      }
      this.moveContents(child, sibling);
      if (child.refinementState === 'userEdited') sibling.refinementState = 'userEdited';
      sibling.isUserCreated = sibling.isUserCreated || child.isUserCreated;
      this.nodes.delete(childId);
    }
  }

  private touch(): void {
    // Strictly increasing even when several mutations land in the same millisecond
    this._modifiedAt = Math.max(Date.now(), this._modifiedAt + 1);
  }
}
