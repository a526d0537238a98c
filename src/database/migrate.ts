/**
 * Database Migration Runner
 *
 * Applies the embedded SQL migrations in order, tracking which have been
 * applied in the `_migrations` table. Safe to run on every command.
 */

import type Database from 'better-sqlite3';

/**
 * Result of running migrations.
 *
 * Failures are reported instead of thrown so callers decide how to surface them.
 */
export interface MigrationResult {
  /** Names of migrations that were successfully applied */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// ============================================================================
// Embedded Migrations
// ============================================================================

// SQL is embedded as strings so the compiled CLI needs no migration files
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- Skills: one row per Markdown file, identified by path
CREATE TABLE IF NOT EXISTS skills (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  path TEXT NOT NULL UNIQUE,
  category TEXT NOT NULL,
  name TEXT NOT NULL,
  title TEXT,
  description TEXT,
  content TEXT NOT NULL,
  file_hash TEXT NOT NULL,
  size_bytes INTEGER NOT NULL DEFAULT 0,
  token_count INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_skills_category ON skills(category);
CREATE INDEX IF NOT EXISTS idx_skills_name ON skills(name);

-- Prompts: identified by name
CREATE TABLE IF NOT EXISTS prompts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  path TEXT NOT NULL,
  title TEXT,
  author TEXT,
  description TEXT,
  content TEXT NOT NULL,
  file_hash TEXT NOT NULL,
  size_bytes INTEGER NOT NULL DEFAULT 0,
  token_count INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

-- Full-text indexes (external content, kept current by triggers)
CREATE VIRTUAL TABLE IF NOT EXISTS skills_fts USING fts5(
  path, category, name, title, description, content,
  content='skills', content_rowid='id'
);

CREATE TRIGGER IF NOT EXISTS skills_ai AFTER INSERT ON skills BEGIN
  INSERT INTO skills_fts(rowid, path, category, name, title, description, content)
  VALUES (new.id, new.path, new.category, new.name, new.title, new.description, new.content);
END;

CREATE TRIGGER IF NOT EXISTS skills_ad AFTER DELETE ON skills BEGIN
  INSERT INTO skills_fts(skills_fts, rowid, path, category, name, title, description, content)
  VALUES ('delete', old.id, old.path, old.category, old.name, old.title, old.description, old.content);
END;

CREATE TRIGGER IF NOT EXISTS skills_au AFTER UPDATE ON skills BEGIN
  INSERT INTO skills_fts(skills_fts, rowid, path, category, name, title, description, content)
  VALUES ('delete', old.id, old.path, old.category, old.name, old.title, old.description, old.content);
  INSERT INTO skills_fts(rowid, path, category, name, title, description, content)
  VALUES (new.id, new.path, new.category, new.name, new.title, new.description, new.content);
END;

CREATE VIRTUAL TABLE IF NOT EXISTS prompts_fts USING fts5(
  path, name, title, author, description, content,
  content='prompts', content_rowid='id'
);

CREATE TRIGGER IF NOT EXISTS prompts_ai AFTER INSERT ON prompts BEGIN
  INSERT INTO prompts_fts(rowid, path, name, title, author, description, content)
  VALUES (new.id, new.path, new.name, new.title, new.author, new.description, new.content);
END;

CREATE TRIGGER IF NOT EXISTS prompts_ad AFTER DELETE ON prompts BEGIN
  INSERT INTO prompts_fts(prompts_fts, rowid, path, name, title, author, description, content)
  VALUES ('delete', old.id, old.path, old.name, old.title, old.author, old.description, old.content);
END;

CREATE TRIGGER IF NOT EXISTS prompts_au AFTER UPDATE ON prompts BEGIN
  INSERT INTO prompts_fts(prompts_fts, rowid, path, name, title, author, description, content)
  VALUES ('delete', old.id, old.path, old.name, old.title, old.author, old.description, old.content);
  INSERT INTO prompts_fts(rowid, path, name, title, author, description, content)
  VALUES (new.id, new.path, new.name, new.title, new.author, new.description, new.content);
END;

-- Named bundles of skills
CREATE TABLE IF NOT EXISTS prompt_fragments (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  title TEXT NOT NULL,
  description TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS prompt_fragment_skills (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  fragment_id INTEGER NOT NULL,
  skill_id INTEGER NOT NULL,
  position INTEGER NOT NULL,
  UNIQUE (fragment_id, skill_id),
  FOREIGN KEY (fragment_id) REFERENCES prompt_fragments(id) ON DELETE CASCADE,
  FOREIGN KEY (skill_id) REFERENCES skills(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_fragment_skills_fragment ON prompt_fragment_skills(fragment_id, position);

-- Prompt -> prompt/fragment links
CREATE TABLE IF NOT EXISTS prompt_references (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  source_prompt_id INTEGER NOT NULL,
  target_prompt_id INTEGER,
  target_fragment_id INTEGER,
  reference_type TEXT NOT NULL CHECK (reference_type IN ('prompt', 'fragment')),
  position INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  CHECK ((target_prompt_id IS NULL) <> (target_fragment_id IS NULL)),
  FOREIGN KEY (source_prompt_id) REFERENCES prompts(id) ON DELETE CASCADE,
  FOREIGN KEY (target_prompt_id) REFERENCES prompts(id) ON DELETE CASCADE,
  FOREIGN KEY (target_fragment_id) REFERENCES prompt_fragments(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_prompt_references_source ON prompt_references(source_prompt_id, position);

-- Migrations Tracking Table
CREATE TABLE IF NOT EXISTS _migrations (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT UNIQUE NOT NULL,
  applied_at TEXT NOT NULL DEFAULT (datetime('now'))
);
    `.trim(),
  },
  {
    name: '002-reference-class.sql',
    sql: `
-- Explicit embedded/reference discriminator; positions stay 1 and 100+
ALTER TABLE prompt_references ADD COLUMN reference_class TEXT NOT NULL DEFAULT 'embedded'
  CHECK (reference_class IN ('embedded', 'reference'));

UPDATE prompt_references SET reference_class = 'reference' WHERE position >= 100;

CREATE INDEX IF NOT EXISTS idx_prompt_references_class ON prompt_references(source_prompt_id, reference_class);
    `.trim(),
  },
];

/** Tables dropped by resetDatabase, children first */
const RESET_DROP_ORDER = [
  'prompt_references',
  'prompt_fragment_skills',
  'prompt_fragments',
  'skills_fts',
  'prompts_fts',
  'prompts',
  'skills',
  '_migrations',
];

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

/**
 * Get the list of applied migrations, in application order.
 */
export function getAppliedMigrations(db: Database.Database): string[] {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();

  if (!tableExists) {
    return [];
  }

  return db
    .prepare('SELECT name FROM _migrations ORDER BY id')
    .pluck()
    .all()
    .filter((name): name is string => typeof name === 'string');
}

/**
 * Run all pending migrations.
 *
 * Each migration runs in its own transaction. A failed migration does not
 * stop later ones from being attempted.
 *
 * @example
 * ```ts
 * const result = runMigrations(db);
 * for (const { name, error } of result.failed) {
 *   logger.error(`Migration ${name} failed: ${error}`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  ensureMigrationsTable(db);
  const appliedMigrations = new Set(getAppliedMigrations(db));

  for (const migration of MIGRATIONS) {
    if (appliedMigrations.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();

      applied.push(migration.name);
      appliedMigrations.add(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { applied, failed };
}

/**
 * Check if migrations are needed.
 */
export function hasPendingMigrations(db: Database.Database): boolean {
  const applied = new Set(getAppliedMigrations(db));
  return MIGRATIONS.some((m) => !applied.has(m.name));
}

/**
 * Names of every embedded migration, in order.
 */
export function getMigrationNames(): string[] {
  return MIGRATIONS.map((m) => m.name);
}

/**
 * Drop every table (and with them the triggers and FTS shadow tables),
 * then re-apply all migrations.
 */
export function resetDatabase(db: Database.Database): MigrationResult {
  db.transaction(() => {
    for (const table of RESET_DROP_ORDER) {
      db.exec(`DROP TABLE IF EXISTS ${table}`);
    }
  })();

  return runMigrations(db);
}
