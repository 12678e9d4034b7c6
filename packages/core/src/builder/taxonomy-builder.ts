/**
 * TaxonomyBuilder - two-phase taxonomy construction
 *
 * Phase 1 (buildInstant) is synchronous and rule-based: keywords -> themes ->
 * tree. It makes no LLM calls and is always available.
 *
 * Phase 2 (startRefinement) runs in the background against a TreeWriter:
 * - naming: ask the LLM for a better name per category
 * - merging: ask the LLM which small categories belong together and apply
 *   each grouping through the gatekeeper
 * - sub-structure: split a large merged category with one more LLM call
 *
 * Each step fails on its own (logged, skipped). Cancelling stops the
 * remaining steps without undoing completed ones. A user edit always wins a
 * race with a pending refinement.
 */
import * as path from 'path';
import {
  INSTANT_FILE_CONFIDENCE,
  INSTANT_NODE_CONFIDENCE,
  LLM_MERGE_MAX_TOKENS,
  LLM_REFINEMENT_TEMPERATURE,
  LLM_RENAME_MAX_TOKENS,
  LLM_SUBSTRUCTURE_MAX_TOKENS,
  MERGE_CANDIDATE_MAX_FILES,
  MERGE_MAX_SUGGESTIONS,
  MERGE_SAMPLE_FILES,
  REFINEMENT_SAMPLE_FILES,
  SUBSTRUCTURE_MIN_FILES,
  SUBSTRUCTURE_SAMPLE_FILES,
  UNCATEGORIZED_FILE_CONFIDENCE,
} from '../config/constants';
import { builderConfig, type BuilderConfig } from '../config';
import { errorMessage, noFilesProvidedError } from '../errors';
import { KeywordExtractor } from '../clustering/keyword-extractor';
import { SemanticThemeClusterer, type ThemeCluster } from '../clustering/semantic-theme-clusterer';
import type { MergeSplitGatekeeper } from '../guardrails/merge-split-gatekeeper';
import type { UserEditGuardrails } from '../guardrails/user-edit-guardrails';
import { hasMalformedEncoding } from '../llm/json-response';
import type { LLMOptions, LLMProvider } from '../llm/types';
import { sleep } from '../shared/async';
import { fileRefFromScanned, isUserEdited, type ScannedFile, type TaxonomyNode } from '../taxonomy/contracts';
import { TaxonomyTree } from '../taxonomy/taxonomy-tree';
import type { TreeWriter } from '../taxonomy/tree-writer';
import { buildMergePrompt, buildRenamePrompt, buildSubstructurePrompt } from './prompts';
import { cleanSuggestedName, parseMergeSuggestions, parseSubstructure, type ParsedMerge } from './refinement-parsers';

export type RefinementPhase = 'naming' | 'merging' | 'complete' | 'cancelled';

export interface RefinementProgress {
  phase: RefinementPhase;
  totalCategories: number;
  refinedCategories: number;
  currentCategory: string | null;
}

export interface RefinementOutcome {
  renamed: number;
  failedRenames: number;
  mergesApplied: number;
  mergesHeld: number;
  cancelled: boolean;
}

export interface RefinementHandle {
  readonly done: Promise<RefinementOutcome>;
  cancel(): void;
}

export interface RefinementOptions {
  onUpdate?: (progress: RefinementProgress) => void;
  signal?: AbortSignal;
}

export interface TaxonomyBuilderDeps {
  llm?: LLMProvider | null;
  gatekeeper: MergeSplitGatekeeper;
  guardrails: UserEditGuardrails;
  config?: BuilderConfig;
  clusterer?: SemanticThemeClusterer;
  extractor?: KeywordExtractor;
}

/**
 * Minimal scanned-file record for a bare filename.
 */
export function scannedFileFromName(filename: string): ScannedFile {
  const now = Date.now();
  return {
    id: filename,
    filename,
    path: filename,
    extension: path.extname(filename).replace(/^\./, '').toLowerCase(),
    size: 0,
    createdAt: now,
    modifiedAt: now,
  };
}

export class TaxonomyBuilder {
  private readonly llm: LLMProvider | null;
  private readonly gatekeeper: MergeSplitGatekeeper;
  private readonly guardrails: UserEditGuardrails;
  private readonly config: BuilderConfig;
  private readonly clusterer: SemanticThemeClusterer;
  private readonly extractor: KeywordExtractor;
  private active: { controller: AbortController; done: Promise<RefinementOutcome> } | null = null;

  constructor(deps: TaxonomyBuilderDeps) {
    this.llm = deps.llm ?? null;
    this.gatekeeper = deps.gatekeeper;
    this.guardrails = deps.guardrails;
    this.config = deps.config ?? builderConfig();
    this.clusterer = deps.clusterer ?? new SemanticThemeClusterer();
    this.extractor = deps.extractor ?? new KeywordExtractor();
  }

  get isRefining(): boolean {
    return this.active !== null;
  }

  // ============================================================================
  // Phase 1
  // ============================================================================

  buildInstant(files: readonly ScannedFile[], rootName: string = this.config.rootName): TaxonomyTree {
    if (files.length === 0) throw noFilesProvidedError();
    const startTime = Date.now();

    const keywords = this.extractor.extractFiles(files);
    const themes = this.clusterer.cluster(keywords);
    const filesById = new Map(files.map((file) => [file.id, file]));

    const tree = new TaxonomyTree(rootName);
    for (const theme of themes) {
      this.materialize(tree, theme, [], theme.isUncategorized, filesById);
    }

    console.log(
      `[TaxonomyBuilder] Instant taxonomy: ${tree.fileCount} files in ${tree.allCategories().length} categories ` +
        `(${Date.now() - startTime}ms)`,
    );
    return tree;
  }

  buildInstantFromNames(filenames: readonly string[], rootName?: string): TaxonomyTree {
    return this.buildInstant(filenames.map(scannedFileFromName), rootName);
  }

  private materialize(
    tree: TaxonomyTree,
    theme: ThemeCluster,
    parentPath: readonly string[],
    uncategorized: boolean,
    filesById: ReadonlyMap<string, ScannedFile>,
  ): void {
    const themePath = [...parentPath, theme.name];
    tree.findOrCreate(themePath, { confidence: INSTANT_NODE_CONFIDENCE });

    if (theme.subThemes.length > 0) {
      for (const sub of theme.subThemes) {
        this.materialize(tree, sub, themePath, uncategorized, filesById);
      }
      return;
    }

    if (theme.fileTypeGroups.length > 0) {
      for (const group of theme.fileTypeGroups) {
        this.placeFiles(tree, [...themePath, group.displayName], group.files, uncategorized, filesById);
      }
      return;
    }
    this.placeFiles(tree, themePath, theme.files, uncategorized, filesById);
  }

  private placeFiles(
    tree: TaxonomyTree,
    categoryPath: readonly string[],
    files: ThemeCluster['files'],
    uncategorized: boolean,
    filesById: ReadonlyMap<string, ScannedFile>,
  ): void {
    const node = tree.findOrCreate(categoryPath, { confidence: INSTANT_NODE_CONFIDENCE });
    const confidence = uncategorized ? UNCATEGORIZED_FILE_CONFIDENCE : INSTANT_FILE_CONFIDENCE;
    for (const keywords of files) {
      const scanned = filesById.get(keywords.id);
      const ref = scanned
        ? fileRefFromScanned(scanned)
        : { fileId: keywords.id, path: keywords.sourcePath ?? keywords.original, filename: keywords.original };
      tree.assignFileToNode(node.id, ref, confidence, {
        source: 'filename',
        needsDeepAnalysis: confidence < this.config.deepAnalysisThreshold,
      });
    }
  }

  // ============================================================================
  // Phase 2
  // ============================================================================

  /**
   * Start background refinement. Returns null when a pass is already running
   * or no LLM is configured.
   */
  startRefinement(writer: TreeWriter, options: RefinementOptions = {}): RefinementHandle | null {
    if (this.active) {
      console.warn('[TaxonomyBuilder] Refinement already running, ignoring start request');
      return null;
    }
    if (!this.llm) {
      console.log('[TaxonomyBuilder] No LLM provider configured, skipping refinement');
      return null;
    }

    const controller = new AbortController();
    if (options.signal) {
      if (options.signal.aborted) controller.abort();
      else options.signal.addEventListener('abort', () => controller.abort(), { once: true });
    }

    const llm = this.llm;
    const done = this.runRefinement(llm, writer, controller.signal, options.onUpdate ?? (() => undefined)).finally(() => {
      this.active = null;
    });
    this.active = { controller, done };
    return { done, cancel: () => controller.abort() };
  }

  cancelRefinement(): void {
    this.active?.controller.abort();
  }

  private async runRefinement(
    llm: LLMProvider,
    writer: TreeWriter,
    signal: AbortSignal,
    onUpdate: (progress: RefinementProgress) => void,
  ): Promise<RefinementOutcome> {
    const outcome: RefinementOutcome = { renamed: 0, failedRenames: 0, mergesApplied: 0, mergesHeld: 0, cancelled: false };
    const tree = writer.tree;
    const categories = tree.allCategories().filter((node) => this.guardrails.canAutoModify(node));
    const progress: RefinementProgress = {
      phase: 'naming',
      totalCategories: categories.length,
      refinedCategories: 0,
      currentCategory: null,
    };
    const report = (): void => {
      try {
        onUpdate({ ...progress });
      } catch (error) {
        console.error('[TaxonomyBuilder] Refinement update handler failed:', error);
      }
    };

    console.log(`[TaxonomyBuilder] Refining ${categories.length} categories`);
    report();

    for (const category of categories) {
      if (signal.aborted) break;
      progress.currentCategory = category.name;
      report();

      const renamed = await this.refineCategory(llm, writer, category.id, signal);
      if (renamed === 'renamed') outcome.renamed++;
      if (renamed === 'failed') outcome.failedRenames++;
      progress.refinedCategories++;
      report();

      if (!signal.aborted) await sleep(this.config.refinementDelayMs, signal);
    }

    if (!signal.aborted && this.config.enableMerges) {
      progress.phase = 'merging';
      progress.currentCategory = null;
      report();
      await this.suggestMerges(llm, writer, signal, outcome);
    }

    outcome.cancelled = signal.aborted;
    progress.phase = signal.aborted ? 'cancelled' : 'complete';
    progress.currentCategory = null;
    report();
    console.log(
      `[TaxonomyBuilder] Refinement ${progress.phase}: ${outcome.renamed} renamed, ` +
        `${outcome.mergesApplied} merges applied, ${outcome.mergesHeld} held for approval`,
    );
    return outcome;
  }

  private llmOptions(maxTokens: number, signal: AbortSignal): LLMOptions {
    return {
      model: this.config.refinementModel,
      temperature: LLM_REFINEMENT_TEMPERATURE,
      maxTokens,
      signal,
    };
  }

  private async refineCategory(
    llm: LLMProvider,
    writer: TreeWriter,
    nodeId: string,
    signal: AbortSignal,
  ): Promise<'renamed' | 'unchanged' | 'skipped' | 'failed'> {
    const started = await writer.write((tree) => {
      const node = tree.getNode(nodeId);
      if (!node || !this.guardrails.canAutoModify(node)) return null;
      tree.setRefinementState(nodeId, 'refining');
      return node;
    });
    if (!started) return 'skipped';

    try {
      const filenames = writer.tree
        .allFiles(nodeId)
        .slice(0, REFINEMENT_SAMPLE_FILES)
        .map((file) => file.filename);
      const response = await llm.complete(
        buildRenamePrompt(started.name, filenames),
        this.llmOptions(LLM_RENAME_MAX_TOKENS, signal),
      );
      if (hasMalformedEncoding(response)) {
        throw new Error('Rename response contains malformed text encoding');
      }
      const suggestion = cleanSuggestedName(response);

      return await writer.write((tree) => {
        const node = tree.getNode(nodeId);
        // The user may have edited the category while the LLM was thinking
        if (!node || isUserEdited(node)) return 'skipped';
        const changed = suggestion !== null && suggestion !== node.name;
        if (changed) {
          tree.setSuggestedName(nodeId, suggestion);
          if (this.config.applySuggestedNames) tree.acceptSuggestedName(nodeId);
        }
        tree.setRefinementState(nodeId, 'refined');
        return changed ? 'renamed' : 'unchanged';
      });
    } catch (error) {
      if (!signal.aborted) {
        console.warn(`[TaxonomyBuilder] Failed to refine '${started.name}': ${errorMessage(error)}`);
      }
      await writer.write((tree) => {
        if (tree.getNode(nodeId)?.refinementState === 'refining') tree.setRefinementState(nodeId, 'initial');
      });
      return signal.aborted ? 'skipped' : 'failed';
    }
  }

  private mergeCandidates(tree: TaxonomyTree): TaxonomyNode[] {
    return tree
      .allCategories()
      .filter((node) => this.guardrails.canAutoModify(node) && tree.totalFileCount(node.id) < MERGE_CANDIDATE_MAX_FILES);
  }

  private async suggestMerges(
    llm: LLMProvider,
    writer: TreeWriter,
    signal: AbortSignal,
    outcome: RefinementOutcome,
  ): Promise<void> {
    const tree = writer.tree;
    const candidates = this.mergeCandidates(tree);
    if (candidates.length < 2) {
      console.log(`[TaxonomyBuilder] Not enough merge candidates (found ${candidates.length})`);
      return;
    }

    let merges: ParsedMerge[];
    try {
      const prompt = buildMergePrompt(
        candidates.map((node) => ({
          name: node.name,
          fileCount: tree.totalFileCount(node.id),
          sampleFilenames: tree
            .allFiles(node.id)
            .slice(0, MERGE_SAMPLE_FILES)
            .map((file) => file.filename),
        })),
        MERGE_MAX_SUGGESTIONS,
      );
      const response = await llm.complete(prompt, this.llmOptions(LLM_MERGE_MAX_TOKENS, signal));
      merges = parseMergeSuggestions(response, MERGE_MAX_SUGGESTIONS);
    } catch (error) {
      if (!signal.aborted) {
        console.warn(`[TaxonomyBuilder] Failed to get merge suggestions: ${errorMessage(error)}`);
      }
      return;
    }

    for (const merge of merges) {
      if (signal.aborted) return;
      const mergedNodeId = await this.applyMerge(writer, merge);
      if (mergedNodeId === null) {
        outcome.mergesHeld++;
        continue;
      }
      outcome.mergesApplied++;

      if (writer.tree.totalFileCount(mergedNodeId) > SUBSTRUCTURE_MIN_FILES && !signal.aborted) {
        await this.inferSubstructure(llm, writer, mergedNodeId, signal);
      }
      await writer.write((tree) => tree.setRefinementState(mergedNodeId, 'refined'));
    }
  }

  /**
   * Register the grouping with the gatekeeper and apply it on the automatic
   * path. Returns the merged node id, or null when skipped or held.
   */
  private applyMerge(writer: TreeWriter, merge: ParsedMerge): Promise<string | null> {
    return writer.write((tree) => {
      const candidates = this.mergeCandidates(tree);
      const sourceIds: string[] = [];
      for (const name of merge.sources) {
        const match = candidates.find(
          (node) => node.name.toLowerCase() === name.toLowerCase() && !sourceIds.includes(node.id),
        );
        if (match) sourceIds.push(match.id);
      }
      if (sourceIds.length < 2) {
        console.warn(`[TaxonomyBuilder] Could not resolve enough categories for merge -> '${merge.mergedName}'`);
        return null;
      }

      const parentId = tree.getNode(sourceIds[0])?.parentId ?? tree.rootId;
      const suggestion = this.gatekeeper.suggestMerge(tree, {
        sourceNodeIds: sourceIds,
        target: { kind: 'new', parentId, name: merge.mergedName },
        reason: `Suggested during refinement: ${merge.sources.join(' + ')} -> ${merge.mergedName}`,
        confidence: 0.6,
      });
      const applied = this.gatekeeper.autoApplyMerge(suggestion.id, tree);
      if (applied?.status !== 'applied' || !applied.resultNodeId) return null;

      tree.setRefinementState(applied.resultNodeId, 'refining');
      console.log(`[TaxonomyBuilder] Merged ${merge.sources.join(' + ')} -> '${merge.mergedName}'`);
      return applied.resultNodeId;
    });
  }

  private async inferSubstructure(
    llm: LLMProvider,
    writer: TreeWriter,
    nodeId: string,
    signal: AbortSignal,
  ): Promise<void> {
    const node = writer.tree.getNode(nodeId);
    if (!node) return;
    const filenames = writer.tree
      .allFiles(nodeId)
      .slice(0, SUBSTRUCTURE_SAMPLE_FILES)
      .map((file) => file.filename);

    let response: string;
    try {
      response = await llm.completeJSON(
        buildSubstructurePrompt(filenames),
        this.llmOptions(LLM_SUBSTRUCTURE_MAX_TOKENS, signal),
      );
    } catch (error) {
      console.warn(`[TaxonomyBuilder] Sub-structure request failed for '${node.name}': ${errorMessage(error)}`);
      return;
    }

    const parsed = parseSubstructure(response);
    if (!parsed.success) {
      console.warn(`[TaxonomyBuilder] Sub-structure for '${node.name}' unusable (${parsed.error}), keeping files flat`);
      return;
    }

    await writer.write((tree) => {
      const current = tree.getNode(nodeId);
      if (!current || isUserEdited(current)) return;

      const moved = new Set<string>();
      for (const sub of parsed.data.subcategories) {
        const wanted = new Set(sub.files.map((name) => name.toLowerCase()));
        const matches = tree
          .allFiles(nodeId)
          .filter(
            (file) =>
              wanted.has(file.filename.toLowerCase()) &&
              !moved.has(file.fileId) &&
              this.guardrails.canAutoReassign(tree, file.fileId),
          );
        if (matches.length === 0) continue;

        const child =
          tree.childNamed(nodeId, sub.name) ??
          tree.createChildOf(nodeId, sub.name, { confidence: INSTANT_NODE_CONFIDENCE, refinementState: 'refined' });
        if (isUserEdited(child)) continue;
        for (const file of matches) {
          tree.moveFileToNode(file.fileId, child.id);
          moved.add(file.fileId);
        }
      }
      this.pruneEmptied(tree, nodeId);
      console.log(`[TaxonomyBuilder] Sub-structure for '${current.name}': ${moved.size} files regrouped`);
    });
  }

  /** Drops descendants left without files by a regrouping. */
  private pruneEmptied(tree: TaxonomyTree, nodeId: string): void {
    for (const child of tree.children(nodeId)) {
      this.pruneEmptied(tree, child.id);
      const current = tree.getNode(child.id);
      if (!current || !this.guardrails.canAutoModify(current)) continue;
      if (current.childIds.length === 0 && current.assignedFiles.length === 0) tree.removeCategoryById(child.id);
    }
  }
}
