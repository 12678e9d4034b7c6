import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { DeepAnalysisResult, FileAnalyzer } from '../../analysis/deep-analyzer';
import { scannedFileFromName } from '../../builder/taxonomy-builder';
import { loadEngineConfig, taskManagerConfig, type EngineConfig } from '../../config';
import type { LLMProvider } from '../../llm/types';
import { SqliteTaxonomyRepository } from '../../repository/sqlite-repository';
import type { ScannedFolder } from '../../scanner/file-scanner';
import { sleep } from '../../shared/async';
import type { FileRef } from '../../taxonomy/contracts';
import { TaxonomyEngine } from '../taxonomy-engine';

// ============================================================================
// Helpers
// ============================================================================

class MappedAnalyzer implements FileAnalyzer {
  readonly calls: string[] = [];

  constructor(private readonly placements: Record<string, { path: string[]; confidence: number }>) {}

  async analyze(file: FileRef): Promise<DeepAnalysisResult> {
    this.calls.push(file.fileId);
    const placement = this.placements[file.fileId] ?? { path: ['Unsorted'], confidence: 0.1 };
    return {
      fileId: file.fileId,
      categoryPath: placement.path,
      confidence: placement.confidence,
      rationale: '',
      contentSummary: '',
      suggestedTags: [],
      signal: null,
      analyzedAt: Date.now(),
    };
  }
}

class FolderLLM implements LLMProvider {
  readonly id = 'folder';
  readonly prompts: string[] = [];

  constructor(private readonly response: string) {}

  async complete(prompt: string): Promise<string> {
    return this.completeJSON(prompt);
  }

  async completeJSON(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.response;
  }
}

function folder(name: string, relativePaths: string[]): ScannedFolder {
  const root = path.join('/scan', name);
  return {
    name,
    path: root,
    files: relativePaths.map((relative) => ({
      ...scannedFileFromName(path.basename(relative)),
      id: `${name}/${relative}`,
      path: path.join(root, relative),
    })),
  };
}

function testConfig(): EngineConfig {
  const config = loadEngineConfig({});
  return { ...config, taskManager: taskManagerConfig({ taskStartDelayMs: 0, idlePollMs: 10 }) };
}

const SAMPLE = ['magic_trick_1.mp4', 'card_trick.pdf', 'recipe_pasta.txt'].map((name) => scannedFileFromName(name));

const ANALYZED = {
  'magic_trick_1.mp4': { path: ['Magic', 'Videos'], confidence: 0.7 },
  'card_trick.pdf': { path: ['Magic', 'Documents'], confidence: 0.7 },
  'recipe_pasta.txt': { path: ['Cooking'], confidence: 0.9 },
};

let repository: SqliteTaxonomyRepository;

beforeEach(() => {
  repository = new SqliteTaxonomyRepository(':memory:');
});

afterEach(() => {
  repository.close();
});

// ============================================================================
// Inference
// ============================================================================

describe('TaxonomyEngine.inferTaxonomy', () => {
  it('builds the instant tree, persists it and records an audit entry', () => {
    const engine = new TaxonomyEngine({ config: testConfig(), repository });
    const tree = engine.inferTaxonomy(SAMPLE, 'Inbox');

    expect(engine.tree).toBe(tree);
    expect(tree.categoryPaths()).toEqual([
      'Magic',
      'Magic / Documents',
      'Magic / Videos',
      'Uncategorized',
      'Uncategorized / Documents',
    ]);
    expect(repository.latestTree()?.id).toBe(tree.id);

    const [audit] = repository.recentAudits(1);
    expect(audit.action).toBe('inferTaxonomy');
    expect(audit.detail).toBe('3 files, 5 categories');
    expect(audit.nodeId).toBe(tree.rootId);
  });

  it('reports statistics for the current tree', () => {
    const engine = new TaxonomyEngine({ config: testConfig() });
    engine.inferTaxonomy(SAMPLE);

    const statistics = engine.getStatistics();
    expect(statistics.categoryCount).toBe(5);
    expect(statistics.leafCount).toBe(3);
    expect(statistics.fileCount).toBe(3);
    expect(statistics.maxDepth).toBe(2);
  });

  it('refuses tree operations before a taxonomy exists', () => {
    const engine = new TaxonomyEngine({ config: testConfig() });

    expect(engine.tree).toBeNull();
    expect(() => engine.getStatistics()).toThrow('No taxonomy inferred yet; call inferTaxonomy() first');
  });

  it('places uncategorized files where the user moved similar files before', async () => {
    const engine = new TaxonomyEngine({ config: testConfig(), repository });
    engine.inferTaxonomy(SAMPLE);
    await engine.moveFileByUser('recipe_pasta.txt', ['Cooking']);

    const next = engine.inferTaxonomy(
      ['magic_trick_1.mp4', 'card_trick.pdf', 'recipe_soup.txt'].map((name) => scannedFileFromName(name)),
    );

    const soup = next.assignmentFor('recipe_soup.txt');
    expect(next.categoryPath(soup?.categoryId ?? '')).toEqual(['Cooking']);
    expect(soup?.source).toBe('memory');
    expect(soup?.confidence).toBe(0.6);
    expect(next.categoryPaths()).toEqual(['Magic', 'Magic / Documents', 'Magic / Videos', 'Cooking']);
  });
});

describe('TaxonomyEngine.inferHierarchicalTaxonomy', () => {
  it('places folders as units by name and file type without an LLM', async () => {
    const engine = new TaxonomyEngine({ config: testConfig(), repository });

    const tree = await engine.inferHierarchicalTaxonomy({
      folders: [folder('Photos 2023', ['beach.jpg', path.join('trip', 'hike.jpg')])],
      looseFiles: [],
    });

    expect(engine.tree).toBe(tree);
    expect(tree.root.name).toBe('Files');
    expect(tree.categoryPaths()).toEqual([
      'Media',
      'Media / Photos',
      'Media / Photos / Photos 2023',
      'Media / Photos / Photos 2023 / trip',
    ]);
    expect(tree.assignmentFor('Photos 2023/beach.jpg')?.confidence).toBe(0.8);
    expect(repository.recentAudits(1)[0].action).toBe('inferHierarchicalTaxonomy');
    expect(repository.recentAudits(1)[0].detail).toBe('2 files, 4 categories');
  });

  it('builds loose files instantly and files unknown folders under Uncategorized', async () => {
    const engine = new TaxonomyEngine({ config: testConfig() });

    const tree = await engine.inferHierarchicalTaxonomy(
      { folders: [folder('Budget', ['q1.xyz'])], looseFiles: SAMPLE },
      'Inbox',
    );

    expect(tree.root.name).toBe('Inbox');
    expect(tree.categoryPaths()).toEqual([
      'Magic',
      'Magic / Documents',
      'Magic / Videos',
      'Uncategorized',
      'Uncategorized / Documents',
      'Uncategorized / Budget',
    ]);
    const budget = tree.assignmentFor('Budget/q1.xyz');
    expect(budget?.confidence).toBe(0.4);
    expect(budget?.needsDeepAnalysis).toBe(true);
  });

  it('asks the LLM for each folder when one is configured', async () => {
    const llm = new FolderLLM('{"categoryPath": ["Finance"], "confidence": 0.9, "rationale": "tax documents"}');
    const engine = new TaxonomyEngine({ config: testConfig(), llm, analyzer: null });

    const tree = await engine.inferHierarchicalTaxonomy({
      folders: [folder('Taxes', ['return.pdf'])],
      looseFiles: [],
    });

    expect(llm.prompts).toHaveLength(1);
    expect(llm.prompts[0]).toContain('FOLDER NAME: Taxes');
    expect(tree.categoryPaths()).toEqual(['Finance', 'Finance / Taxes']);
    expect(tree.assignmentFor('Taxes/return.pdf')?.needsDeepAnalysis).toBe(false);
  });

  it('scans a directory and keeps its top-level folders together', async () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'taxonomy-engine-'));
    try {
      const relatives = [path.join('Docs', 'report.pdf'), path.join('Music', 'song.mp3'), path.join('Music', 'Live', 'concert.mp3')];
      for (const relative of relatives) {
        fs.mkdirSync(path.dirname(path.join(root, relative)), { recursive: true });
        fs.writeFileSync(path.join(root, relative), 'x'.repeat(200));
      }
      const engine = new TaxonomyEngine({ config: testConfig() });

      const tree = await engine.inferFromDirectory(root, { rootName: 'Library' });

      expect(tree.root.name).toBe('Library');
      expect(tree.categoryPaths()).toEqual([
        'Documents',
        'Documents / Docs',
        'Media',
        'Media / Music',
        'Media / Music / Music',
        'Media / Music / Music / Live',
      ]);
      expect(tree.locateFile(tree.allFiles().find((file) => file.filename === 'concert.mp3')?.fileId ?? '')?.name).toBe(
        'Live',
      );
    } finally {
      fs.rmSync(root, { recursive: true, force: true });
    }
  });
});

// ============================================================================
// Background work
// ============================================================================

describe('TaxonomyEngine.startBackgroundWork', () => {
  it('does nothing without an LLM or analyzer', () => {
    const engine = new TaxonomyEngine({ config: testConfig() });
    engine.inferTaxonomy(SAMPLE);

    expect(engine.startBackgroundWork()).toEqual({ refinement: null, enqueuedTasks: 0 });
    expect(engine.requeueFile('card_trick.pdf')).toBeNull();
  });

  it('analyzes low-confidence files and applies better placements', async () => {
    const analyzer = new MappedAnalyzer(ANALYZED);
    const engine = new TaxonomyEngine({ config: testConfig(), analyzer, repository });
    const tree = engine.inferTaxonomy(SAMPLE);

    const work = engine.startBackgroundWork({ refine: false });
    expect(work.enqueuedTasks).toBe(3);
    await engine.tasks?.waitForIdle();
    await sleep(0);

    expect([...analyzer.calls].sort()).toEqual(['card_trick.pdf', 'magic_trick_1.mp4', 'recipe_pasta.txt']);
    const recipe = tree.assignmentFor('recipe_pasta.txt');
    expect(tree.categoryPath(recipe?.categoryId ?? '')).toEqual(['Cooking']);
    expect(recipe?.source).toBe('content');
    expect(recipe?.confidence).toBe(0.9);
    expect(tree.categoryPath(tree.assignmentFor('card_trick.pdf')?.categoryId ?? '')).toEqual(['Magic', 'Documents']);

    const [audit] = repository.recentAudits(1);
    expect(audit.action).toBe('recategorized');
    expect(audit.detail).toBe('recipe_pasta.txt: Uncategorized / Documents -> Cooking');

    await engine.shutdown();
    const ledger = repository.loadTasks('completed');
    expect(ledger.map((entry) => entry.fileId).sort()).toEqual(['card_trick.pdf', 'magic_trick_1.mp4', 'recipe_pasta.txt']);
    const recipeEntry = ledger.find((entry) => entry.fileId === 'recipe_pasta.txt');
    expect(recipeEntry?.recategorized).toBe(true);
    expect(recipeEntry?.resultPath).toEqual(['Cooking']);
  });

  it('keeps a file the user placed away from automatic recategorization', async () => {
    const analyzer = new MappedAnalyzer(ANALYZED);
    const engine = new TaxonomyEngine({ config: testConfig(), analyzer });
    const tree = engine.inferTaxonomy(SAMPLE);
    await engine.moveFileByUser('recipe_pasta.txt', ['Food']);

    const work = engine.startBackgroundWork({ refine: false });
    expect(work.enqueuedTasks).toBe(2);
    await engine.tasks?.waitForIdle();

    const recipe = tree.assignmentFor('recipe_pasta.txt');
    expect(tree.categoryPath(recipe?.categoryId ?? '')).toEqual(['Food']);
    expect(recipe?.source).toBe('user');
    expect(analyzer.calls).not.toContain('recipe_pasta.txt');
    await engine.shutdown();
  });
});

// ============================================================================
// Suggestions & user edits
// ============================================================================

describe('TaxonomyEngine user actions', () => {
  it('persists merge suggestions and applies them on approval', async () => {
    const engine = new TaxonomyEngine({ config: testConfig(), repository });
    const tree = engine.inferTaxonomy(SAMPLE);
    const documents = tree.find(['Magic', 'Documents']);
    const videos = tree.find(['Magic', 'Videos']);
    if (!documents || !videos) throw new Error('fixture categories missing');

    const suggestion = engine.suggestMerge({
      sourceNodeIds: [documents.id],
      target: { kind: 'existing', nodeId: videos.id },
      reason: 'same topic',
    });
    expect(repository.loadSuggestions('pending').map((stored) => stored.id)).toEqual([suggestion.id]);

    const applied = await engine.approveMerge(suggestion.id);

    expect(applied.status).toBe('applied');
    expect(tree.categoryPath(tree.assignmentFor('card_trick.pdf')?.categoryId ?? '')).toEqual(['Magic', 'Videos']);
    expect(repository.loadSuggestions().map((stored) => [stored.id, stored.status])).toEqual([
      [suggestion.id, 'applied'],
    ]);
    expect(repository.loadSuggestions()[0].description).toBe(`Documents -> ${videos.id}`);

    const [audit] = repository.recentAudits(1);
    expect(audit.action).toBe('approveMerge');
    expect(audit.nodeId).toBe(videos.id);
  });

  it('marks a category renamed by the user as user-edited', async () => {
    const engine = new TaxonomyEngine({ config: testConfig(), repository });
    const tree = engine.inferTaxonomy(SAMPLE);
    const magic = tree.find(['Magic']);
    if (!magic) throw new Error('fixture category missing');

    expect(await engine.renameCategoryByUser(magic.id, 'Illusions')).toBe(true);

    expect(tree.getNode(magic.id)?.name).toBe('Illusions');
    expect(tree.getNode(magic.id)?.refinementState).toBe('userEdited');
    expect(repository.recentAudits(1)[0].action).toBe('renameCategory');
    expect(await engine.renameCategoryByUser('missing', 'Nothing')).toBe(false);
  });

  it('records keyword patterns for a user move', async () => {
    const engine = new TaxonomyEngine({ config: testConfig(), repository });
    engine.inferTaxonomy(SAMPLE);

    const assignment = await engine.moveFileByUser('recipe_pasta.txt', ['Cooking']);

    expect(assignment.source).toBe('user');
    expect(assignment.confidence).toBe(1);
    expect(assignment.needsDeepAnalysis).toBe(false);
    expect(repository.findPatterns(['recipe', 'pasta']).map((pattern) => pattern.keyword).sort()).toEqual([
      'pasta',
      'recipe',
    ]);
    expect(repository.recentAudits(1)[0].detail).toBe('recipe_pasta.txt -> Cooking');
  });
});
