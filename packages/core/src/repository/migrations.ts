import type Database from 'better-sqlite3';
import { z } from 'zod';

type Connection = Database.Database;

interface Migration {
  version: number;
  name: string;
  up: (db: Connection) => void;
}

const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: (db) => {
      // Tree snapshots - one row per tree, latest write wins
      db.prepare(`
        CREATE TABLE IF NOT EXISTS tree_snapshots (
          tree_id TEXT PRIMARY KEY,
          snapshot TEXT NOT NULL,
          modified_at INTEGER NOT NULL
        )
      `).run();

      // Deep-analysis task ledger
      db.prepare(`
        CREATE TABLE IF NOT EXISTS tasks (
          id TEXT PRIMARY KEY,
          file_id TEXT NOT NULL,
          status TEXT NOT NULL,
          entry TEXT NOT NULL,
          updated_at INTEGER NOT NULL
        )
      `).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status)`).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_tasks_file_id ON tasks(file_id)`).run();

      // Merge/split suggestion state
      db.prepare(`
        CREATE TABLE IF NOT EXISTS suggestions (
          id TEXT PRIMARY KEY,
          kind TEXT NOT NULL,
          status TEXT NOT NULL,
          description TEXT NOT NULL,
          confidence REAL NOT NULL,
          created_at INTEGER NOT NULL,
          processed_at INTEGER
        )
      `).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_suggestions_status ON suggestions(status)`).run();
    },
  },
  {
    version: 2,
    name: 'add_patterns_and_audit_log',
    up: (db) => {
      // Keyword -> category placements learned from user moves
      db.prepare(`
        CREATE TABLE IF NOT EXISTS patterns (
          keyword TEXT NOT NULL,
          category_path TEXT NOT NULL,
          hits INTEGER NOT NULL DEFAULT 1,
          updated_at INTEGER NOT NULL,
          PRIMARY KEY (keyword, category_path)
        )
      `).run();

      db.prepare(`
        CREATE TABLE IF NOT EXISTS audit_log (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          action TEXT NOT NULL,
          detail TEXT NOT NULL,
          node_id TEXT,
          created_at INTEGER NOT NULL
        )
      `).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_audit_log_created_at ON audit_log(created_at)`).run();
    },
  },
];

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1].version;

const appliedRowSchema = z.object({ version: z.number() });

export function runMigrations(db: Connection): void {
  db.prepare(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `).run();

  const applied = new Set(
    db
      .prepare(`SELECT version FROM schema_migrations`)
      .all()
      .map((row) => appliedRowSchema.parse(row).version),
  );

  for (const migration of migrations) {
    if (applied.has(migration.version)) continue;
    console.log(`[Repository] Applying migration ${migration.version}: ${migration.name}`);
    db.transaction(() => {
      migration.up(db);
      db.prepare(`INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)`).run(
        migration.version,
        migration.name,
        Date.now(),
      );
    })();
  }
}
