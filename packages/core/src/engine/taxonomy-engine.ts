/**
 * TaxonomyEngine - wires the components together
 *
 * inferTaxonomy() builds the instant tree; startBackgroundWork() launches the
 * LLM refinement pass and queues deep analysis for low-confidence files. All
 * tree mutations after inference go through one TreeWriter. User actions
 * (approvals, edits, moves) are exposed here so they share that lock.
 */
import { DepthEnforcer, type DepthValidation } from '../guardrails/depth-enforcer';
import { MergeSplitGatekeeper, type MergeSuggestion, type SplitSuggestion, type SuggestMergeInput, type SuggestSplitInput, type SuggestionRecord } from '../guardrails/merge-split-gatekeeper';
import { UserEditGuardrails } from '../guardrails/user-edit-guardrails';
import { TaxonomyBuilder, type RefinementHandle, type RefinementOptions } from '../builder/taxonomy-builder';
import { FolderCategorizer, placeFolder, quickCategorizeFolder, type FolderCategoryAssignment } from '../builder/folder-categorizer';
import { DeepAnalyzer, type FileAnalyzer } from '../analysis/deep-analyzer';
import { DeepAnalysisTaskManager } from '../analysis/deep-analysis-task-manager';
import type { AnalysisTask, TaskManagerEvent, TaskPriority } from '../analysis/task-types';
import { KeywordExtractor } from '../clustering/keyword-extractor';
import { SemanticThemeClusterer } from '../clustering/semantic-theme-clusterer';
import { loadEngineConfig, type EngineConfig } from '../config';
import { LEARNED_PATTERN_CONFIDENCE, PATH_SEPARATOR, UNCATEGORIZED_NAME } from '../config/constants';
import { DepthConstraintError, errorMessage, fileNotFoundError } from '../errors';
import { ContentInspector } from '../inspector/content-inspector';
import type { Inspector } from '../inspector/types';
import { createLLMProvider } from '../llm/openai-provider';
import type { LLMProvider } from '../llm/types';
import { SqliteTaxonomyRepository } from '../repository/sqlite-repository';
import { FileScanner, type HierarchyScan } from '../scanner/file-scanner';
import type { StoredSuggestion, TaskLedgerEntry, TaxonomyRepository } from '../repository/types';
import type { EventChannel } from '../shared/event-channel';
import type { FileAssignment, ScannedFile } from '../taxonomy/contracts';
import { computeStatistics, type TaxonomyStatistics } from '../taxonomy/taxonomy-statistics';
import { TaxonomyTree } from '../taxonomy/taxonomy-tree';
import { TreeWriter } from '../taxonomy/tree-writer';

export interface TaxonomyEngineDeps {
  config?: EngineConfig;
  llm?: LLMProvider | null;
  inspector?: Inspector | null;
  /** Replaces the LLM-backed DeepAnalyzer. */
  analyzer?: FileAnalyzer | null;
  repository?: TaxonomyRepository | null;
}

export interface BackgroundWorkOptions {
  refine?: boolean;
  analyze?: boolean;
  onRefinementUpdate?: RefinementOptions['onUpdate'];
}

export interface BackgroundWork {
  refinement: RefinementHandle | null;
  enqueuedTasks: number;
}

export interface DirectoryInferenceOptions {
  /** Place each top-level folder as one unit. Default true. */
  hierarchical?: boolean;
  rootName?: string;
  signal?: AbortSignal;
}

export function toLedgerEntry(task: AnalysisTask): TaskLedgerEntry {
  return {
    id: task.id,
    fileId: task.file.fileId,
    filename: task.file.filename,
    path: task.file.path,
    status: task.status,
    priority: task.priority,
    attempt: task.attempt,
    currentCategoryPath: task.currentCategoryPath,
    currentConfidence: task.currentConfidence,
    resultPath: task.result?.categoryPath ?? null,
    resultConfidence: task.result?.confidence ?? null,
    error: task.error,
    recategorized: task.recategorized,
    enqueuedAt: task.enqueuedAt,
    completedAt: task.completedAt,
  };
}

function describeSuggestion(record: SuggestionRecord): StoredSuggestion {
  if (record.kind === 'merge') {
    const { suggestion } = record;
    const target = suggestion.target.kind === 'new' ? suggestion.target.name : suggestion.target.nodeId;
    return {
      id: suggestion.id,
      kind: 'merge',
      status: suggestion.status,
      description: `${suggestion.sourceNames.join(' + ')} -> ${target}`,
      confidence: suggestion.confidence,
      createdAt: suggestion.createdAt,
      processedAt: suggestion.processedAt,
    };
  }
  const { suggestion } = record;
  return {
    id: suggestion.id,
    kind: 'split',
    status: suggestion.status,
    description: `${suggestion.nodeName} -> ${suggestion.children.map((child) => child.name).join(', ')}`,
    confidence: suggestion.confidence,
    createdAt: suggestion.createdAt,
    processedAt: suggestion.processedAt,
  };
}

export class TaxonomyEngine {
  readonly config: EngineConfig;
  readonly guardrails = new UserEditGuardrails();
  readonly gatekeeper: MergeSplitGatekeeper;
  readonly builder: TaxonomyBuilder;
  readonly depthEnforcer: DepthEnforcer;

  private readonly extractor = new KeywordExtractor();
  private readonly llm: LLMProvider | null;
  private readonly analyzer: FileAnalyzer | null;
  private readonly repository: TaxonomyRepository | null;
  private readonly ownsRepository: boolean;

  private writer: TreeWriter | null = null;
  private unsubscribeWriter: (() => void) | null = null;
  private taskManager: DeepAnalysisTaskManager | null = null;
  private taskEvents: EventChannel<TaskManagerEvent> | null = null;
  private refinement: RefinementHandle | null = null;

  constructor(deps: TaxonomyEngineDeps = {}, ownsRepository = false) {
    this.config = deps.config ?? loadEngineConfig({});
    this.llm = deps.llm ?? null;
    this.repository = deps.repository ?? null;
    this.ownsRepository = ownsRepository;

    this.gatekeeper = new MergeSplitGatekeeper(this.guardrails);
    this.builder = new TaxonomyBuilder({
      llm: this.llm,
      gatekeeper: this.gatekeeper,
      guardrails: this.guardrails,
      config: this.config.builder,
      clusterer: new SemanticThemeClusterer(this.config.clusterer),
      extractor: this.extractor,
    });
    this.depthEnforcer = new DepthEnforcer(this.config.depth);

    if (deps.analyzer !== undefined) {
      this.analyzer = deps.analyzer;
    } else if (this.llm) {
      const inspector = deps.inspector === undefined ? new ContentInspector() : deps.inspector;
      this.analyzer = new DeepAnalyzer(this.llm, inspector, this.config.analyzer);
    } else {
      this.analyzer = null;
    }

    const repository = this.repository;
    if (repository) {
      this.gatekeeper.onChange((record) => {
        try {
          repository.saveSuggestion(describeSuggestion(record));
        } catch (error) {
          console.error('[TaxonomyEngine] Failed to persist suggestion:', error);
        }
      });
    }
  }

  /**
   * Engine configured from environment variables: LLM provider from the API
   * keys, SQLite repository when TAXONOMY_DB_PATH is set.
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): TaxonomyEngine {
    const config = loadEngineConfig(env);
    const repository = config.databasePath ? new SqliteTaxonomyRepository(config.databasePath) : null;
    return new TaxonomyEngine({ config, llm: createLLMProvider(env), repository }, repository !== null);
  }

  get tree(): TaxonomyTree | null {
    return this.writer?.tree ?? null;
  }

  get treeWriter(): TreeWriter | null {
    return this.writer;
  }

  get tasks(): DeepAnalysisTaskManager | null {
    return this.taskManager;
  }

  private requireWriter(): TreeWriter {
    if (!this.writer) throw new Error('No taxonomy inferred yet; call inferTaxonomy() first');
    return this.writer;
  }

  // ============================================================================
  // Inference
  // ============================================================================

  /**
   * Build the instant taxonomy and make it the engine's current tree. Strict
   * depth mode throws DepthConstraintError here.
   */
  inferTaxonomy(files: readonly ScannedFile[], rootName?: string): TaxonomyTree {
    const tree = this.builder.buildInstant(files, rootName);
    return this.adopt(tree, 'inferTaxonomy');
  }

  /**
   * Folder-as-unit inference: loose files go through the instant builder,
   * each top-level folder is placed whole below a category chosen by the LLM
   * (or by name and file-type rules without one).
   */
  async inferHierarchicalTaxonomy(
    hierarchy: HierarchyScan,
    rootName: string = this.config.builder.rootName,
    signal?: AbortSignal,
  ): Promise<TaxonomyTree> {
    if (hierarchy.folders.length === 0) return this.inferTaxonomy(hierarchy.looseFiles, rootName);

    const tree =
      hierarchy.looseFiles.length > 0 ? this.builder.buildInstant(hierarchy.looseFiles, rootName) : new TaxonomyTree(rootName);

    let assignments: FolderCategoryAssignment[];
    if (this.llm) {
      const categorizer = new FolderCategorizer(this.llm, this.config.builder.refinementModel);
      assignments = await categorizer.categorizeBatch(hierarchy.folders, tree.categoryPaths(), signal);
    } else {
      assignments = hierarchy.folders.map(quickCategorizeFolder);
    }

    const threshold = this.config.analyzer.confidenceThreshold;
    hierarchy.folders.forEach((folder, index) => {
      placeFolder(tree, folder, assignments[index], threshold);
    });
    console.log(
      `[TaxonomyEngine] Placed ${hierarchy.folders.length} folders as units, ${hierarchy.looseFiles.length} loose files`,
    );
    return this.adopt(tree, 'inferHierarchicalTaxonomy');
  }

  /**
   * Scan a directory and infer its taxonomy.
   */
  async inferFromDirectory(root: string, options: DirectoryInferenceOptions = {}): Promise<TaxonomyTree> {
    const scanner = new FileScanner(this.config.scanner);
    if (options.hierarchical ?? true) {
      const hierarchy = await scanner.scanHierarchy(root);
      return this.inferHierarchicalTaxonomy(hierarchy, options.rootName, options.signal);
    }
    return this.inferTaxonomy(await scanner.scan(root), options.rootName);
  }

  private adopt(tree: TaxonomyTree, action: string): TaxonomyTree {
    this.applyLearnedPatterns(tree);
    this.depthEnforcer.enforce(tree);

    this.detachCurrentTree();
    this.writer = new TreeWriter(tree);
    this.unsubscribeWriter = this.writer.onWrite((written) => this.persistTree(written));
    this.persistTree(tree);
    this.audit(action, `${tree.fileCount} files, ${tree.allCategories().length} categories`, tree.rootId);
    return tree;
  }

  /**
   * Files left in Uncategorized go where the user has put files with the
   * same keywords before.
   */
  private applyLearnedPatterns(tree: TaxonomyTree): void {
    if (!this.repository) return;
    const uncategorized = tree.childNamed(tree.rootId, UNCATEGORIZED_NAME);
    if (!uncategorized) return;

    let placed = 0;
    for (const assignment of tree.allFiles(uncategorized.id)) {
      const { keywords } = this.extractor.extract(assignment.filename, assignment.fileId);
      const [best] = this.repository.findPatterns(keywords);
      if (!best) continue;
      tree.reassignFile(assignment.fileId, best.categoryPath, LEARNED_PATTERN_CONFIDENCE, {
        source: 'memory',
        needsDeepAnalysis: true,
      });
      placed++;
    }

    if (placed > 0) {
      this.pruneEmpty(tree, uncategorized.id);
      console.log(`[TaxonomyEngine] Placed ${placed} files from learned patterns`);
    }
  }

  /** Removes the node and its descendants that no longer hold any file. */
  private pruneEmpty(tree: TaxonomyTree, nodeId: string): void {
    for (const child of tree.children(nodeId)) this.pruneEmpty(tree, child.id);
    const node = tree.getNode(nodeId);
    if (node && !tree.isRoot(nodeId) && node.assignedFiles.length === 0 && node.childIds.length === 0) {
      tree.removeCategoryById(nodeId);
    }
  }

  // ============================================================================
  // Background work
  // ============================================================================

  startBackgroundWork(options: BackgroundWorkOptions = {}): BackgroundWork {
    const writer = this.requireWriter();
    let refinement: RefinementHandle | null = null;
    if (options.refine ?? true) {
      refinement = this.builder.startRefinement(writer, { onUpdate: options.onRefinementUpdate });
      if (refinement) {
        this.refinement = refinement;
        void refinement.done
          .then(() => this.enforceDepthAfterRefinement(writer))
          .catch((error: unknown) => console.error('[TaxonomyEngine] Refinement failed:', error));
      }
    }

    let enqueuedTasks = 0;
    if ((options.analyze ?? true) && this.analyzer) {
      const tree = writer.tree;
      const flagged = tree.filesNeedingDeepAnalysis(this.config.analyzer.confidenceThreshold);
      const tasks = this.ensureTaskManager(writer).enqueueTasks(
        flagged.map((assignment) => ({
          file: { fileId: assignment.fileId, path: assignment.path, filename: assignment.filename },
          currentCategoryPath: tree.categoryPath(assignment.categoryId),
          currentConfidence: assignment.confidence,
          priority: this.priorityFor(tree, assignment),
          isUserApproved: assignment.source === 'user',
        })),
      );
      enqueuedTasks = tasks.length;
      this.persistQueue();
    }

    return { refinement, enqueuedTasks };
  }

  private priorityFor(tree: TaxonomyTree, assignment: FileAssignment): TaskPriority {
    const node = tree.getNode(assignment.categoryId);
    const inUncategorized = node?.name === UNCATEGORIZED_NAME && node.parentId === tree.rootId;
    return inUncategorized || assignment.categoryId === tree.rootId ? 'high' : 'normal';
  }

  private async enforceDepthAfterRefinement(writer: TreeWriter): Promise<void> {
    try {
      await writer.write((tree) => this.depthEnforcer.enforce(tree));
    } catch (error) {
      if (!(error instanceof DepthConstraintError)) throw error;
      console.warn(`[TaxonomyEngine] Refined taxonomy violates depth constraints: ${error.message}`);
    }
  }

  private ensureTaskManager(writer: TreeWriter): DeepAnalysisTaskManager {
    if (this.taskManager) return this.taskManager;
    if (!this.analyzer) throw new Error('No analyzer configured');

    const manager = new DeepAnalysisTaskManager({
      analyzer: this.analyzer,
      config: this.config.taskManager,
      writer,
      guardrails: this.guardrails,
      deepAnalysisThreshold: this.config.analyzer.confidenceThreshold,
    });
    this.taskManager = manager;
    if (this.repository) {
      const channel = manager.subscribe();
      this.taskEvents = channel;
      void this.recordTaskEvents(channel);
    }
    return manager;
  }

  private async recordTaskEvents(channel: EventChannel<TaskManagerEvent>): Promise<void> {
    for await (const event of channel) {
      try {
        switch (event.type) {
          case 'taskCompleted':
            this.repository?.saveTasks([toLedgerEntry(event.task)]);
            break;
          case 'recategorized':
            this.audit(
              'recategorized',
              `${event.task.file.filename}: ${event.fromPath.join(PATH_SEPARATOR)} -> ${event.toPath.join(PATH_SEPARATOR)}`,
              this.tree?.locateFile(event.task.file.fileId)?.id ?? null,
            );
            break;
          default:
            break;
        }
      } catch (error) {
        console.error('[TaxonomyEngine] Failed to record task event:', error);
      }
    }
  }

  private persistQueue(): void {
    if (!this.repository || !this.taskManager || !this.config.taskManager.persistQueue) return;
    try {
      this.repository.saveTasks(this.taskManager.getQueuedTasks().map(toLedgerEntry));
    } catch (error) {
      console.error('[TaxonomyEngine] Failed to persist task queue:', error);
    }
  }

  /**
   * Queue one file for (re-)analysis at the given priority.
   */
  requeueFile(fileId: string, priority: TaskPriority = 'high'): AnalysisTask | null {
    const writer = this.requireWriter();
    const assignment = writer.tree.assignmentFor(fileId);
    if (!assignment) throw fileNotFoundError(fileId);
    if (!this.analyzer) {
      console.warn('[TaxonomyEngine] No analyzer configured, cannot requeue');
      return null;
    }
    const task = this.ensureTaskManager(writer).enqueueTask({
      file: { fileId, path: assignment.path, filename: assignment.filename },
      currentCategoryPath: writer.tree.categoryPath(assignment.categoryId),
      currentConfidence: assignment.confidence,
      priority,
      isUserApproved: assignment.source === 'user',
    });
    this.persistQueue();
    return task;
  }

  // ============================================================================
  // Suggestions
  // ============================================================================

  suggestMerge(input: SuggestMergeInput): MergeSuggestion {
    return this.gatekeeper.suggestMerge(this.requireWriter().tree, input);
  }

  suggestSplit(input: SuggestSplitInput): SplitSuggestion {
    return this.gatekeeper.suggestSplit(this.requireWriter().tree, input);
  }

  async approveMerge(id: string): Promise<MergeSuggestion> {
    const suggestion = await this.requireWriter().write((tree) => this.gatekeeper.approveMerge(id, tree));
    this.audit('approveMerge', describeSuggestion({ kind: 'merge', suggestion }).description, suggestion.resultNodeId);
    return suggestion;
  }

  rejectMerge(id: string, reason?: string): MergeSuggestion {
    const suggestion = this.gatekeeper.rejectMerge(id, reason);
    this.audit('rejectMerge', describeSuggestion({ kind: 'merge', suggestion }).description);
    return suggestion;
  }

  async approveSplit(id: string): Promise<SplitSuggestion> {
    const suggestion = await this.requireWriter().write((tree) => this.gatekeeper.approveSplit(id, tree));
    this.audit('approveSplit', describeSuggestion({ kind: 'split', suggestion }).description, suggestion.nodeId);
    return suggestion;
  }

  rejectSplit(id: string, reason?: string): SplitSuggestion {
    const suggestion = this.gatekeeper.rejectSplit(id, reason);
    this.audit('rejectSplit', describeSuggestion({ kind: 'split', suggestion }).description, suggestion.nodeId);
    return suggestion;
  }

  // ============================================================================
  // User edits
  // ============================================================================

  async markAsUserEdited(nodeId: string): Promise<boolean> {
    const marked = await this.requireWriter().write((tree) => this.guardrails.markAsUserEdited(tree, nodeId));
    if (marked) this.audit('markAsUserEdited', this.tree?.pathString(nodeId) ?? nodeId, nodeId);
    return marked;
  }

  /**
   * Rename on behalf of the user. The category becomes user-edited.
   */
  async renameCategoryByUser(nodeId: string, newName: string): Promise<boolean> {
    const renamed = await this.requireWriter().write((tree) => {
      if (!tree.renameCategoryById(nodeId, newName)) return false;
      this.guardrails.markAsUserEdited(tree, nodeId);
      return true;
    });
    if (renamed) this.audit('renameCategory', newName, nodeId);
    return renamed;
  }

  /**
   * Place a file where the user put it. The placement is protected from
   * automatic recategorization, pending analysis for the file is cancelled
   * and the file's keywords are remembered for the target path.
   */
  async moveFileByUser(fileId: string, targetPath: readonly string[]): Promise<FileAssignment> {
    const assignment = await this.requireWriter().write((tree) =>
      tree.reassignFile(fileId, targetPath, 1, { source: 'user', needsDeepAnalysis: false }),
    );
    this.taskManager?.removeTasksForFiles([fileId]);

    if (this.repository) {
      const { keywords } = this.extractor.extract(assignment.filename, fileId);
      try {
        for (const keyword of keywords) this.repository.recordPattern(keyword, targetPath);
      } catch (error) {
        console.error('[TaxonomyEngine] Failed to record learned pattern:', error);
      }
    }
    this.audit('moveFile', `${assignment.filename} -> ${targetPath.join(PATH_SEPARATOR)}`, assignment.categoryId);
    return assignment;
  }

  // ============================================================================
  // Inspection
  // ============================================================================

  getStatistics(): TaxonomyStatistics {
    return computeStatistics(this.requireWriter().tree, this.config.analyzer.confidenceThreshold);
  }

  validateDepth(): DepthValidation {
    return this.depthEnforcer.validate(this.requireWriter().tree);
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  async shutdown(): Promise<void> {
    this.builder.cancelRefinement();
    if (this.refinement) {
      await this.refinement.done;
      this.refinement = null;
    }
    if (this.taskManager) {
      this.taskManager.dispose();
      this.repository?.saveTasks(this.taskManager.getCompletedTasks().map(toLedgerEntry));
    }
    if (this.taskEvents) this.taskEvents.close();

    if (this.writer) this.persistTree(this.writer.tree);
    this.detachCurrentTree();
    if (this.repository && this.ownsRepository) this.repository.close();
    console.log('[TaxonomyEngine] Shut down');
  }

  /**
   * Background work is bound to the writer it was started with; a new tree
   * gets a new task manager.
   */
  private detachCurrentTree(): void {
    this.builder.cancelRefinement();
    this.taskManager?.dispose();
    this.taskManager = null;
    this.taskEvents?.close();
    this.taskEvents = null;
    this.unsubscribeWriter?.();
    this.unsubscribeWriter = null;
  }

  private persistTree(tree: TaxonomyTree): void {
    if (!this.repository) return;
    try {
      this.repository.saveTree(tree.toSnapshot());
    } catch (error) {
      console.error(`[TaxonomyEngine] Failed to persist taxonomy: ${errorMessage(error)}`);
    }
  }

  private audit(action: string, detail: string, nodeId: string | null = null): void {
    if (!this.repository) return;
    try {
      this.repository.appendAudit(action, detail, nodeId);
    } catch (error) {
      console.error('[TaxonomyEngine] Failed to write audit record:', error);
    }
  }
}
