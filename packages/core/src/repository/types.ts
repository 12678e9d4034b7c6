import { z } from 'zod';
import type { TaxonomyTreeSnapshot } from '../taxonomy/contracts';

export const TaskLedgerEntrySchema = z.object({
  id: z.string(),
  fileId: z.string(),
  filename: z.string(),
  path: z.string(),
  status: z.enum(['queued', 'running', 'completed', 'failed', 'cancelled']),
  priority: z.enum(['low', 'normal', 'high', 'critical']),
  attempt: z.number().int().min(1),
  currentCategoryPath: z.array(z.string()),
  currentConfidence: z.number(),
  resultPath: z.array(z.string()).nullable(),
  resultConfidence: z.number().nullable(),
  error: z.string().nullable(),
  recategorized: z.boolean(),
  enqueuedAt: z.number(),
  completedAt: z.number().nullable(),
});

export type TaskLedgerEntry = z.infer<typeof TaskLedgerEntrySchema>;

export const StoredSuggestionSchema = z.object({
  id: z.string(),
  kind: z.enum(['merge', 'split']),
  status: z.enum(['pending', 'approved', 'rejected', 'applied']),
  description: z.string(),
  confidence: z.number(),
  createdAt: z.number(),
  processedAt: z.number().nullable(),
});

export type StoredSuggestion = z.infer<typeof StoredSuggestionSchema>;

export interface LearnedPattern {
  keyword: string;
  categoryPath: string[];
  hits: number;
  updatedAt: number;
}

export interface AuditRecord {
  id: number;
  action: string;
  detail: string;
  nodeId: string | null;
  createdAt: number;
}

/**
 * Durable storage for taxonomy state. The engine works in memory and writes
 * through this interface when one is supplied.
 */
export interface TaxonomyRepository {
  saveTree(snapshot: TaxonomyTreeSnapshot): void;
  loadTree(id: string): TaxonomyTreeSnapshot | null;
  latestTree(): TaxonomyTreeSnapshot | null;

  saveTasks(entries: readonly TaskLedgerEntry[]): void;
  loadTasks(status?: TaskLedgerEntry['status']): TaskLedgerEntry[];

  saveSuggestion(suggestion: StoredSuggestion): void;
  loadSuggestions(status?: StoredSuggestion['status']): StoredSuggestion[];

  recordPattern(keyword: string, categoryPath: readonly string[]): LearnedPattern;
  findPatterns(keywords: readonly string[]): LearnedPattern[];

  appendAudit(action: string, detail: string, nodeId?: string | null): void;
  recentAudits(limit?: number): AuditRecord[];

  close(): void;
}
