/**
 * Catalog Statistics
 */

import type Database from 'better-sqlite3';
import { CountRowSchema, TotalsRowSchema, validateRow } from '../database/index.js';
import { listCategories } from './catalog.js';
import type { CatalogStats } from './types.js';

function count(db: Database.Database, table: 'skills' | 'prompts'): number {
  return validateRow(CountRowSchema, db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get(), table).count;
}

/**
 * Counts, combined size and token totals, and skills per category.
 */
export function getStats(db: Database.Database): CatalogStats {
  const totals = validateRow(
    TotalsRowSchema,
    db
      .prepare(
        `SELECT SUM(size_bytes) AS total_size, SUM(token_count) AS total_tokens
         FROM (
           SELECT size_bytes, token_count FROM skills
           UNION ALL
           SELECT size_bytes, token_count FROM prompts
         )`
      )
      .get(),
    'totals'
  );
  const categoryBreakdown = listCategories(db);

  return {
    skills: count(db, 'skills'),
    prompts: count(db, 'prompts'),
    categories: categoryBreakdown.length,
    totalSizeBytes: totals.total_size ?? 0,
    totalTokens: totals.total_tokens ?? 0,
    categoryBreakdown,
  };
}
