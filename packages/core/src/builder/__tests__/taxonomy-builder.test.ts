import { describe, it, expect } from 'vitest';
import { builderConfig } from '../../config';
import { TaxonomyError, TaxonomyErrorCode } from '../../errors';
import { MergeSplitGatekeeper } from '../../guardrails/merge-split-gatekeeper';
import { UserEditGuardrails } from '../../guardrails/user-edit-guardrails';
import type { LLMProvider } from '../../llm/types';
import { TaxonomyTree } from '../../taxonomy/taxonomy-tree';
import { TreeWriter } from '../../taxonomy/tree-writer';
import { TaxonomyBuilder, scannedFileFromName, type RefinementProgress } from '../taxonomy-builder';

// ============================================================================
// Helpers
// ============================================================================

type Responder = (prompt: string) => string | Promise<string>;

class ScriptedLLM implements LLMProvider {
  readonly id = 'scripted';
  readonly prompts: string[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }

  async completeJSON(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }
}

function currentName(prompt: string): string {
  return prompt.match(/Current name: (.*)/)?.[1] ?? '';
}

function isRenamePrompt(prompt: string): boolean {
  return prompt.startsWith('Suggest a SHORT');
}

function isMergePrompt(prompt: string): boolean {
  return prompt.startsWith('Analyze these small categories');
}

function isSubstructurePrompt(prompt: string): boolean {
  return prompt.startsWith('Group these files');
}

function place(tree: TaxonomyTree, filename: string, categoryPath: string[]): void {
  tree.assignFile({ fileId: filename, path: `/f/${filename}`, filename }, categoryPath, 0.7);
}

function createBuilder(llm: LLMProvider | null, overrides: Parameters<typeof builderConfig>[0] = {}) {
  const guardrails = new UserEditGuardrails();
  const gatekeeper = new MergeSplitGatekeeper(guardrails);
  const builder = new TaxonomyBuilder({
    llm,
    gatekeeper,
    guardrails,
    config: builderConfig({ refinementDelayMs: 0, ...overrides }),
  });
  return { builder, gatekeeper, guardrails };
}

const SAMPLE = ['magic_trick_1.mp4', 'card_trick.pdf', 'recipe_pasta.txt'];

// ============================================================================
// Phase 1
// ============================================================================

describe('TaxonomyBuilder.buildInstant', () => {
  it('materializes themes and file type groups as categories', () => {
    const { builder } = createBuilder(null);
    const tree = builder.buildInstantFromNames(SAMPLE, 'Inbox');

    expect(tree.root.name).toBe('Inbox');
    expect(tree.categoryPaths()).toEqual([
      'Magic',
      'Magic / Documents',
      'Magic / Videos',
      'Uncategorized',
      'Uncategorized / Documents',
    ]);
    expect(tree.fileCount).toBe(3);
  });

  it('gives uncategorized files low confidence and flags everything below the threshold', () => {
    const { builder } = createBuilder(null);
    const tree = builder.buildInstantFromNames(SAMPLE);

    const card = tree.assignmentFor('card_trick.pdf');
    const recipe = tree.assignmentFor('recipe_pasta.txt');
    expect(card?.confidence).toBe(0.7);
    expect(card?.source).toBe('filename');
    expect(recipe?.confidence).toBe(0.3);
    expect(tree.filesNeedingDeepAnalysis(0.75)).toHaveLength(3);
    expect(tree.allFiles().every((file) => file.needsDeepAnalysis)).toBe(true);
  });

  it('does not flag files when the threshold is below instant confidence', () => {
    const { builder } = createBuilder(null, { deepAnalysisThreshold: 0.5 });
    const tree = builder.buildInstantFromNames(SAMPLE);
    expect(tree.allFiles().filter((file) => file.needsDeepAnalysis).map((file) => file.fileId)).toEqual([
      'recipe_pasta.txt',
    ]);
  });

  it('rejects an empty file list', () => {
    const { builder } = createBuilder(null);
    try {
      builder.buildInstant([]);
      expect.unreachable('buildInstant should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(TaxonomyError);
      expect(error instanceof TaxonomyError && error.code).toBe(TaxonomyErrorCode.NO_FILES_PROVIDED);
    }
  });

  it('creates scanned-file records from bare names', () => {
    const file = scannedFileFromName('Report.PDF');
    expect(file.id).toBe('Report.PDF');
    expect(file.extension).toBe('pdf');
    expect(file.size).toBe(0);
  });
});

// ============================================================================
// Phase 2
// ============================================================================

describe('TaxonomyBuilder.startRefinement', () => {
  it('returns null without an LLM', () => {
    const { builder } = createBuilder(null);
    const writer = new TreeWriter(builder.buildInstantFromNames(SAMPLE));
    expect(builder.startRefinement(writer)).toBeNull();
  });

  it('records suggested names and marks categories refined', async () => {
    const llm = new ScriptedLLM((prompt) => (isRenamePrompt(prompt) ? `"${currentName(prompt)} Files"` : 'NO_MERGES'));
    const { builder } = createBuilder(llm);
    const writer = new TreeWriter(builder.buildInstantFromNames(SAMPLE));

    const updates: RefinementProgress[] = [];
    const handle = builder.startRefinement(writer, { onUpdate: (progress) => updates.push(progress) });
    expect(handle).not.toBeNull();
    expect(builder.startRefinement(writer)).toBeNull();

    const outcome = await handle?.done;

    expect(outcome).toEqual({ renamed: 5, failedRenames: 0, mergesApplied: 0, mergesHeld: 0, cancelled: false });
    expect(writer.tree.find(['Magic'])?.suggestedName).toBe('Magic Files');
    expect(writer.tree.find(['Magic'])?.name).toBe('Magic');
    expect(writer.tree.allCategories().every((node) => node.refinementState === 'refined')).toBe(true);
    expect(updates[0]).toEqual({ phase: 'naming', totalCategories: 5, refinedCategories: 0, currentCategory: null });
    expect(updates[updates.length - 1].phase).toBe('complete');
    expect(builder.isRefining).toBe(false);
  });

  it('applies suggested names when configured', async () => {
    const llm = new ScriptedLLM((prompt) => (isRenamePrompt(prompt) ? `${currentName(prompt)} Files` : 'NO_MERGES'));
    const { builder } = createBuilder(llm, { applySuggestedNames: true });
    const writer = new TreeWriter(builder.buildInstantFromNames(SAMPLE));

    await builder.startRefinement(writer)?.done;

    expect(writer.tree.categoryPaths()).toEqual([
      'Magic Files',
      'Magic Files / Documents Files',
      'Magic Files / Videos Files',
      'Uncategorized Files',
      'Uncategorized Files / Documents Files',
    ]);
  });

  it('resets categories whose rename fails and counts the failures', async () => {
    const llm = new ScriptedLLM((prompt) => {
      if (isRenamePrompt(prompt)) throw new Error('model offline');
      return 'NO_MERGES';
    });
    const { builder } = createBuilder(llm);
    const writer = new TreeWriter(builder.buildInstantFromNames(SAMPLE));

    const outcome = await builder.startRefinement(writer)?.done;

    expect(outcome?.failedRenames).toBe(5);
    expect(outcome?.renamed).toBe(0);
    expect(writer.tree.allCategories().every((node) => node.refinementState === 'initial')).toBe(true);
  });

  it('treats a response with malformed encoding as a failed rename', async () => {
    const llm = new ScriptedLLM((prompt) => (isRenamePrompt(prompt) ? 'Bad \uFFFD name' : 'NO_MERGES'));
    const { builder } = createBuilder(llm, { enableMerges: false });
    const writer = new TreeWriter(builder.buildInstantFromNames(SAMPLE));

    const outcome = await builder.startRefinement(writer)?.done;

    expect(outcome?.failedRenames).toBe(5);
    expect(writer.tree.find(['Magic'])?.suggestedName).toBeNull();
  });

  it('applies a suggested merge under a new category', async () => {
    const llm = new ScriptedLLM((prompt) => {
      if (isRenamePrompt(prompt)) return currentName(prompt);
      if (isMergePrompt(prompt)) return 'Documents + Videos -> Magic Media';
      return '{}';
    });
    const { builder, gatekeeper } = createBuilder(llm);
    const writer = new TreeWriter(builder.buildInstantFromNames(SAMPLE));

    const outcome = await builder.startRefinement(writer)?.done;

    expect(outcome?.renamed).toBe(0);
    expect(outcome?.mergesApplied).toBe(1);
    const merged = writer.tree.find(['Magic', 'Magic Media']);
    expect(merged?.assignedFiles.map((file) => file.fileId).sort()).toEqual(['card_trick.pdf', 'magic_trick_1.mp4']);
    expect(merged?.refinementState).toBe('refined');
    expect(writer.tree.find(['Magic', 'Documents'])).toBeUndefined();
    expect(writer.tree.find(['Uncategorized', 'Documents'])).toBeDefined();
    expect(gatekeeper.getPendingMerges()).toEqual([]);
  });

  it('holds a merge whose new parent is user-edited and leaves that parent untouched', async () => {
    const llm = new ScriptedLLM((prompt) => {
      if (isRenamePrompt(prompt)) return `${currentName(prompt)} Files`;
      if (isMergePrompt(prompt)) return 'Documents + Videos -> Media';
      return '{}';
    });
    const { builder, gatekeeper, guardrails } = createBuilder(llm);
    const tree = builder.buildInstantFromNames(SAMPLE);
    const magic = tree.find(['Magic']);
    if (magic) guardrails.markAsUserEdited(tree, magic.id);
    const writer = new TreeWriter(tree);

    const outcome = await builder.startRefinement(writer)?.done;

    expect(outcome?.renamed).toBe(4);
    expect(outcome?.mergesHeld).toBe(1);
    expect(outcome?.mergesApplied).toBe(0);
    expect(tree.find(['Magic'])?.suggestedName).toBeNull();
    expect(tree.find(['Magic'])?.refinementState).toBe('userEdited');
    expect(tree.find(['Magic', 'Documents'])).toBeDefined();
    expect(gatekeeper.getPendingMerges()).toHaveLength(1);
  });

  it('infers sub-structure for a merged category with many direct files', async () => {
    const tree = new TaxonomyTree('Root');
    for (const name of ['card_a.pdf', 'card_b.pdf']) {
      tree.assignFile({ fileId: name, path: `/f/${name}`, filename: name }, ['Cards'], 0.7);
    }
    for (const name of ['coin_a.pdf', 'coin_b.pdf']) {
      tree.assignFile({ fileId: name, path: `/f/${name}`, filename: name }, ['Coins'], 0.7);
    }

    const llm = new ScriptedLLM((prompt) => {
      if (isRenamePrompt(prompt)) return currentName(prompt);
      if (isMergePrompt(prompt)) return '1. Cards + Coins -> Sleight';
      return '```json\n{"subcategories": [{"name": "Card Work", "files": ["CARD_A.pdf", "card_b.pdf"]}]}\n```';
    });
    const { builder } = createBuilder(llm);
    const writer = new TreeWriter(tree);

    const outcome = await builder.startRefinement(writer)?.done;

    expect(outcome?.mergesApplied).toBe(1);
    const sleight = tree.find(['Sleight']);
    expect(sleight?.assignedFiles.map((file) => file.fileId)).toEqual(['coin_a.pdf', 'coin_b.pdf']);
    expect(sleight?.refinementState).toBe('refined');
    const cardWork = tree.find(['Sleight', 'Card Work']);
    expect(cardWork?.assignedFiles.map((file) => file.fileId)).toEqual(['card_a.pdf', 'card_b.pdf']);
    expect(cardWork?.refinementState).toBe('refined');
    expect(tree.fileCount).toBe(4);
  });

  it('holds a merge that would take a child away from a user-edited parent', async () => {
    const tree = new TaxonomyTree('Root');
    place(tree, 'a1.pdf', ['Locked', 'Small']);
    place(tree, 'b1.pdf', ['Other']);
    const llm = new ScriptedLLM((prompt) => {
      if (isRenamePrompt(prompt)) return currentName(prompt);
      if (isMergePrompt(prompt)) return 'Other + Small -> Merged';
      return '{}';
    });
    const { builder, gatekeeper, guardrails } = createBuilder(llm);
    const locked = tree.find(['Locked']);
    if (!locked) throw new Error('fixture category missing');
    guardrails.markAsUserEdited(tree, locked.id);
    const writer = new TreeWriter(tree);

    const outcome = await builder.startRefinement(writer)?.done;

    expect(outcome?.mergesApplied).toBe(0);
    expect(outcome?.mergesHeld).toBe(1);
    expect(tree.categoryPaths()).toEqual(['Locked', 'Locked / Small', 'Other']);
    expect(tree.locateFile('a1.pdf')?.name).toBe('Small');
    const [held] = gatekeeper.getPendingMerges();
    expect(held.warnings).toEqual(["Merge changes children of user-edited category 'Locked'"]);
  });

  it('merges categories with same-name children into one child and regroups the result', async () => {
    const tree = new TaxonomyTree('Root');
    place(tree, 'c1.pdf', ['Cooking', 'Documents']);
    place(tree, 'c2.pdf', ['Cooking', 'Documents']);
    place(tree, 'r1.pdf', ['Recipes', 'Documents']);
    place(tree, 'r2.pdf', ['Recipes', 'Documents']);
    const llm = new ScriptedLLM((prompt) => {
      if (isRenamePrompt(prompt)) return currentName(prompt);
      if (isMergePrompt(prompt)) return 'Cooking + Recipes -> Food';
      return '{"subcategories": [{"name": "Recipe Cards", "files": ["r1.pdf", "r2.pdf"]}]}';
    });
    const { builder } = createBuilder(llm);
    const writer = new TreeWriter(tree);

    const outcome = await builder.startRefinement(writer)?.done;

    expect(outcome?.mergesApplied).toBe(1);
    expect(llm.prompts.filter(isSubstructurePrompt)).toHaveLength(1);
    expect(tree.categoryPaths()).toEqual(['Food', 'Food / Documents', 'Food / Recipe Cards']);
    expect(tree.find(['Food', 'Documents'])?.assignedFiles.map((file) => file.fileId)).toEqual(['c1.pdf', 'c2.pdf']);
    expect(tree.find(['Food', 'Recipe Cards'])?.assignedFiles.map((file) => file.fileId)).toEqual([
      'r1.pdf',
      'r2.pdf',
    ]);
    expect(tree.fileCount).toBe(4);
  });

  it('stops early when cancelled', async () => {
    const llm = new ScriptedLLM((prompt) => (isRenamePrompt(prompt) ? 'Renamed' : 'NO_MERGES'));
    const { builder } = createBuilder(llm);
    const writer = new TreeWriter(builder.buildInstantFromNames(SAMPLE));
    const updates: RefinementProgress[] = [];

    const handle = builder.startRefinement(writer, { onUpdate: (progress) => updates.push(progress) });
    handle?.cancel();
    const outcome = await handle?.done;

    expect(outcome?.cancelled).toBe(true);
    expect(updates[updates.length - 1].phase).toBe('cancelled');
    expect(llm.prompts.filter(isMergePrompt)).toEqual([]);
    expect(builder.isRefining).toBe(false);
  });
});
