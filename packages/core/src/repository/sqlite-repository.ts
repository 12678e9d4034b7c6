import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { TaxonomyTreeSnapshotSchema, type TaxonomyTreeSnapshot } from '../taxonomy/contracts';
import { runMigrations } from './migrations';
import {
  StoredSuggestionSchema,
  TaskLedgerEntrySchema,
  type AuditRecord,
  type LearnedPattern,
  type StoredSuggestion,
  type TaskLedgerEntry,
  type TaxonomyRepository,
} from './types';

const IN_MEMORY = ':memory:';

const snapshotRowSchema = z.object({ snapshot: z.string() });
const entryRowSchema = z.object({ entry: z.string() });
const suggestionRowSchema = z.object({
  id: z.string(),
  kind: z.string(),
  status: z.string(),
  description: z.string(),
  confidence: z.number(),
  created_at: z.number(),
  processed_at: z.number().nullable(),
});
const patternRowSchema = z.object({
  keyword: z.string(),
  category_path: z.string(),
  hits: z.number(),
  updated_at: z.number(),
});
const auditRowSchema = z.object({
  id: z.number(),
  action: z.string(),
  detail: z.string(),
  node_id: z.string().nullable(),
  created_at: z.number(),
});

function parseJsonColumn<S extends z.ZodTypeAny>(raw: string, schema: S): z.infer<S> {
  return schema.parse(JSON.parse(raw));
}

function toPattern(row: unknown): LearnedPattern {
  const parsed = patternRowSchema.parse(row);
  return {
    keyword: parsed.keyword,
    categoryPath: parseJsonColumn(parsed.category_path, z.array(z.string())),
    hits: parsed.hits,
    updatedAt: parsed.updated_at,
  };
}

/**
 * better-sqlite3 implementation of TaxonomyRepository. Structured values are
 * stored as JSON columns and validated with zod on the way out.
 */
export class SqliteTaxonomyRepository implements TaxonomyRepository {
  private readonly db: Database.Database;

  constructor(dbPath: string = IN_MEMORY) {
    if (dbPath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    runMigrations(this.db);
  }

  // ============================================================================
  // Trees
  // ============================================================================

  saveTree(snapshot: TaxonomyTreeSnapshot): void {
    this.db
      .prepare(`
        INSERT INTO tree_snapshots (tree_id, snapshot, modified_at)
        VALUES (?, ?, ?)
        ON CONFLICT(tree_id) DO UPDATE SET snapshot = excluded.snapshot, modified_at = excluded.modified_at
      `)
      .run(snapshot.id, JSON.stringify(snapshot), snapshot.modifiedAt);
  }

  loadTree(id: string): TaxonomyTreeSnapshot | null {
    const row = this.db.prepare(`SELECT snapshot FROM tree_snapshots WHERE tree_id = ?`).get(id);
    if (row === undefined) return null;
    return parseJsonColumn(snapshotRowSchema.parse(row).snapshot, TaxonomyTreeSnapshotSchema);
  }

  latestTree(): TaxonomyTreeSnapshot | null {
    const row = this.db.prepare(`SELECT snapshot FROM tree_snapshots ORDER BY modified_at DESC LIMIT 1`).get();
    if (row === undefined) return null;
    return parseJsonColumn(snapshotRowSchema.parse(row).snapshot, TaxonomyTreeSnapshotSchema);
  }

  // ============================================================================
  // Task ledger
  // ============================================================================

  saveTasks(entries: readonly TaskLedgerEntry[]): void {
    const upsert = this.db.prepare(`
      INSERT INTO tasks (id, file_id, status, entry, updated_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET status = excluded.status, entry = excluded.entry, updated_at = excluded.updated_at
    `);
    const now = Date.now();
    this.db.transaction((batch: readonly TaskLedgerEntry[]) => {
      for (const entry of batch) {
        upsert.run(entry.id, entry.fileId, entry.status, JSON.stringify(entry), now);
      }
    })(entries);
  }

  loadTasks(status?: TaskLedgerEntry['status']): TaskLedgerEntry[] {
    const rows = status
      ? this.db.prepare(`SELECT entry FROM tasks WHERE status = ? ORDER BY rowid`).all(status)
      : this.db.prepare(`SELECT entry FROM tasks ORDER BY rowid`).all();
    return rows.map((row) => parseJsonColumn(entryRowSchema.parse(row).entry, TaskLedgerEntrySchema));
  }

  // ============================================================================
  // Suggestions
  // ============================================================================

  saveSuggestion(suggestion: StoredSuggestion): void {
    this.db
      .prepare(`
        INSERT INTO suggestions (id, kind, status, description, confidence, created_at, processed_at)
        VALUES (@id, @kind, @status, @description, @confidence, @createdAt, @processedAt)
        ON CONFLICT(id) DO UPDATE SET status = excluded.status, processed_at = excluded.processed_at
      `)
      .run(suggestion);
  }

  loadSuggestions(status?: StoredSuggestion['status']): StoredSuggestion[] {
    const rows = status
      ? this.db.prepare(`SELECT * FROM suggestions WHERE status = ? ORDER BY created_at`).all(status)
      : this.db.prepare(`SELECT * FROM suggestions ORDER BY created_at`).all();
    return rows.map((row) => {
      const parsed = suggestionRowSchema.parse(row);
      return StoredSuggestionSchema.parse({
        id: parsed.id,
        kind: parsed.kind,
        status: parsed.status,
        description: parsed.description,
        confidence: parsed.confidence,
        createdAt: parsed.created_at,
        processedAt: parsed.processed_at,
      });
    });
  }

  // ============================================================================
  // Learned patterns
  // ============================================================================

  recordPattern(keyword: string, categoryPath: readonly string[]): LearnedPattern {
    const normalized = keyword.toLowerCase();
    const pathJson = JSON.stringify(categoryPath);
    this.db
      .prepare(`
        INSERT INTO patterns (keyword, category_path, hits, updated_at)
        VALUES (?, ?, 1, ?)
        ON CONFLICT(keyword, category_path) DO UPDATE SET hits = hits + 1, updated_at = excluded.updated_at
      `)
      .run(normalized, pathJson, Date.now());
    return toPattern(
      this.db.prepare(`SELECT * FROM patterns WHERE keyword = ? AND category_path = ?`).get(normalized, pathJson),
    );
  }

  /**
   * Patterns for any of the keywords, most used first.
   */
  findPatterns(keywords: readonly string[]): LearnedPattern[] {
    if (keywords.length === 0) return [];
    const normalized = [...new Set(keywords.map((keyword) => keyword.toLowerCase()))];
    const placeholders = normalized.map(() => '?').join(', ');
    return this.db
      .prepare(`SELECT * FROM patterns WHERE keyword IN (${placeholders}) ORDER BY hits DESC, updated_at DESC, keyword`)
      .all(...normalized)
      .map(toPattern);
  }

  // ============================================================================
  // Audit log
  // ============================================================================

  appendAudit(action: string, detail: string, nodeId: string | null = null): void {
    this.db
      .prepare(`INSERT INTO audit_log (action, detail, node_id, created_at) VALUES (?, ?, ?, ?)`)
      .run(action, detail, nodeId, Date.now());
  }

  recentAudits(limit: number = 100): AuditRecord[] {
    return this.db
      .prepare(`SELECT * FROM audit_log ORDER BY id DESC LIMIT ?`)
      .all(limit)
      .map((row) => {
        const parsed = auditRowSchema.parse(row);
        return {
          id: parsed.id,
          action: parsed.action,
          detail: parsed.detail,
          nodeId: parsed.node_id,
          createdAt: parsed.created_at,
        };
      });
  }

  close(): void {
    this.db.close();
  }
}
