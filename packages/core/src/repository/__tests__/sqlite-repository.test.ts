import Database from 'better-sqlite3';
import { z } from 'zod';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { TaxonomyTree } from '../../taxonomy/taxonomy-tree';
import type { TaxonomyTreeSnapshot } from '../../taxonomy/contracts';
import { LATEST_SCHEMA_VERSION, runMigrations } from '../migrations';
import { SqliteTaxonomyRepository } from '../sqlite-repository';
import type { StoredSuggestion, TaskLedgerEntry } from '../types';

// ============================================================================
// Helpers
// ============================================================================

function snapshot(id: string, modifiedAt: number): TaxonomyTreeSnapshot {
  return {
    id,
    rootId: `${id}-root`,
    createdAt: 1000,
    modifiedAt,
    sourceFolderName: null,
    isVerified: false,
    nodes: [
      {
        id: `${id}-root`,
        name: 'Files',
        suggestedName: null,
        parentId: null,
        childIds: [],
        assignedFiles: [],
        confidence: 1,
        isUserCreated: false,
        refinementState: 'initial',
        createdAt: 1000,
      },
    ],
  };
}

function ledgerEntry(id: string, status: TaskLedgerEntry['status']): TaskLedgerEntry {
  return {
    id,
    fileId: `file-${id}`,
    filename: `${id}.txt`,
    path: `/data/${id}.txt`,
    status,
    priority: 'normal',
    attempt: 1,
    currentCategoryPath: ['Documents'],
    currentConfidence: 0.4,
    resultPath: null,
    resultConfidence: null,
    error: null,
    recategorized: false,
    enqueuedAt: 1000,
    completedAt: null,
  };
}

function suggestion(id: string, createdAt: number): StoredSuggestion {
  return {
    id,
    kind: 'merge',
    status: 'pending',
    description: `Merge ${id}`,
    confidence: 0.8,
    createdAt,
    processedAt: null,
  };
}

let repository: SqliteTaxonomyRepository;

beforeEach(() => {
  repository = new SqliteTaxonomyRepository(':memory:');
});

afterEach(() => {
  repository.close();
});

// ============================================================================
// Tests
// ============================================================================

describe('SqliteTaxonomyRepository', () => {
  describe('trees', () => {
    it('round-trips a snapshot produced by a tree', () => {
      const tree = new TaxonomyTree('Files');
      tree.assignFile({ fileId: 'f1', path: '/data/a.pdf', filename: 'a.pdf' }, ['Documents'], 0.8);
      const saved = tree.toSnapshot();

      repository.saveTree(saved);

      expect(repository.loadTree(saved.id)).toEqual(saved);
      expect(TaxonomyTree.fromSnapshot(repository.loadTree(saved.id)).fileCount).toBe(1);
    });

    it('returns null for an unknown tree and when nothing is stored', () => {
      expect(repository.loadTree('missing')).toBeNull();
      expect(repository.latestTree()).toBeNull();
    });

    it('overwrites a tree with the same id', () => {
      repository.saveTree(snapshot('t1', 2000));
      repository.saveTree({ ...snapshot('t1', 3000), isVerified: true });

      expect(repository.loadTree('t1')?.isVerified).toBe(true);
      expect(repository.loadTree('t1')?.modifiedAt).toBe(3000);
    });

    it('picks the most recently modified tree as latest', () => {
      repository.saveTree(snapshot('older', 2000));
      repository.saveTree(snapshot('newer', 5000));
      repository.saveTree(snapshot('middle', 3000));

      expect(repository.latestTree()?.id).toBe('newer');
    });
  });

  describe('task ledger', () => {
    it('upserts entries and filters by status', () => {
      repository.saveTasks([ledgerEntry('a', 'queued'), ledgerEntry('b', 'queued')]);
      repository.saveTasks([{ ...ledgerEntry('a', 'completed'), resultPath: ['Finance'], resultConfidence: 0.9 }]);

      expect(repository.loadTasks().map((entry) => entry.id)).toEqual(['a', 'b']);
      expect(repository.loadTasks('queued').map((entry) => entry.id)).toEqual(['b']);

      const [completed] = repository.loadTasks('completed');
      expect(completed.resultPath).toEqual(['Finance']);
      expect(completed.resultConfidence).toBe(0.9);
    });
  });

  describe('suggestions', () => {
    it('keeps creation order and updates status on conflict', () => {
      repository.saveSuggestion(suggestion('s2', 2000));
      repository.saveSuggestion(suggestion('s1', 1000));
      repository.saveSuggestion({ ...suggestion('s2', 2000), status: 'applied', processedAt: 4000 });

      expect(repository.loadSuggestions().map((stored) => stored.id)).toEqual(['s1', 's2']);
      expect(repository.loadSuggestions('applied')).toEqual([
        { ...suggestion('s2', 2000), status: 'applied', processedAt: 4000 },
      ]);
      expect(repository.loadSuggestions('pending').map((stored) => stored.id)).toEqual(['s1']);
    });
  });

  describe('learned patterns', () => {
    it('normalizes keywords and counts repeated placements', () => {
      repository.recordPattern('Budget', ['Finance']);
      const second = repository.recordPattern('budget', ['Finance']);

      expect(second.keyword).toBe('budget');
      expect(second.categoryPath).toEqual(['Finance']);
      expect(second.hits).toBe(2);
    });

    it('returns matches most used first', () => {
      repository.recordPattern('invoice', ['Finance', 'Invoices']);
      repository.recordPattern('budget', ['Finance']);
      repository.recordPattern('budget', ['Finance']);
      repository.recordPattern('recipe', ['Cooking']);

      const found = repository.findPatterns(['BUDGET', 'invoice', 'unknown']);

      expect(found.map((pattern) => [pattern.keyword, pattern.hits])).toEqual([
        ['budget', 2],
        ['invoice', 1],
      ]);
      expect(found[1].categoryPath).toEqual(['Finance', 'Invoices']);
    });

    it('returns nothing for no keywords', () => {
      repository.recordPattern('budget', ['Finance']);

      expect(repository.findPatterns([])).toEqual([]);
    });
  });

  describe('audit log', () => {
    it('lists the newest records first up to the limit', () => {
      repository.appendAudit('rename', 'Docs -> Documents', 'n1');
      repository.appendAudit('merge', 'Videos into Media');
      repository.appendAudit('split', 'Photos into Travel, Family', 'n3');

      const recent = repository.recentAudits(2);

      expect(recent.map((record) => record.action)).toEqual(['split', 'merge']);
      expect(recent[1].nodeId).toBeNull();
      expect(recent[0].detail).toBe('Photos into Travel, Family');
    });
  });
});

describe('runMigrations', () => {
  it('applies every migration once', () => {
    const db = new Database(':memory:');
    try {
      runMigrations(db);
      runMigrations(db);

      const row = z.object({ count: z.number() }).parse(db.prepare(`SELECT COUNT(*) AS count FROM schema_migrations`).get());
      expect(row.count).toBe(LATEST_SCHEMA_VERSION);
      expect(LATEST_SCHEMA_VERSION).toBe(2);
    } finally {
      db.close();
    }
  });
});
