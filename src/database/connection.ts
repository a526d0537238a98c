/**
 * Database Connection Module
 *
 * Opens SQLite databases with better-sqlite3. Every CLI invocation opens
 * one handle through `withDatabase` and closes it on every exit path.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { runMigrations, type MigrationResult } from './migrate.js';
import { DatabaseError } from '../errors/index.js';

export type DatabaseHandle = Database.Database;

/**
 * Open (and create if needed) the database at `dbPath`.
 *
 * The parent directory is created on first use.
 *
 * @throws DatabaseError if SQLite cannot open the file
 */
export function openDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  let db: DatabaseHandle;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new DatabaseError(
      `Cannot open database at ${dbPath}`,
      error instanceof Error ? error : undefined,
      'Check the database.path setting or the SKILLBOOK_DB_PATH variable'
    );
  }

  // Enable foreign keys (OFF by default in SQLite!)
  db.pragma('foreign_keys = ON');

  // WAL keeps readers unblocked while a sync writes
  db.pragma('journal_mode = WAL');

  return db;
}

/**
 * Close a database handle. Safe to call on a closed handle.
 */
export function closeDatabase(db: DatabaseHandle): void {
  if (db.open) {
    db.close();
  }
}

/**
 * Names of the migrations a run applied.
 *
 * @throws DatabaseError naming the first migration that failed
 */
export function assertMigrated(result: MigrationResult): string[] {
  const firstFailure = result.failed[0];
  if (firstFailure) {
    throw new DatabaseError(
      `Migration ${firstFailure.name} failed: ${firstFailure.error}`,
      undefined,
      'Run: skillbook db reset --force  to rebuild the database'
    );
  }
  return result.applied;
}

export interface WithDatabaseOptions {
  /** Apply pending migrations before running `fn` (default: true) */
  migrate?: boolean;
}

/**
 * Open the database, run `fn`, and always close the handle afterwards.
 *
 * @throws DatabaseError if a migration fails
 *
 * @example
 * ```ts
 * const stats = withDatabase(dbPath, (db) => getStats(db));
 * ```
 */
export function withDatabase<T>(
  dbPath: string,
  fn: (db: DatabaseHandle) => T,
  options: WithDatabaseOptions = {}
): T {
  const db = openDatabase(dbPath);

  try {
    if (options.migrate ?? true) {
      assertMigrated(runMigrations(db));
    }
    return fn(db);
  } finally {
    closeDatabase(db);
  }
}
