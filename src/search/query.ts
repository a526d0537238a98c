/**
 * Full-Text Search
 *
 * Keyword search over the FTS5 indexes. Ranking and snippet extraction
 * are FTS5's own: lower `rank` is a better match, matched terms are
 * wrapped in [brackets].
 */

import type Database from 'better-sqlite3';
import {
  PromptSearchRowSchema,
  SkillSearchRowSchema,
  validateRows,
  type PromptSearchRow,
  type SkillSearchRow,
} from '../database/index.js';
import { ValidationError } from '../errors/index.js';
import {
  DEFAULT_MAX_RESULTS,
  DEFAULT_SNIPPET_TOKENS,
  MAX_SNIPPET_TOKENS,
  type SearchAllResult,
  type SearchOptions,
  type SkillSearchOptions,
} from './types.js';

// Column 5 is `content` in both FTS tables
const SNIPPET_COLUMN = 5;

const QUERY_HINT = 'Wrap terms containing punctuation in double quotes, e.g. "data-validation"';

/**
 * Reject blank queries before they reach FTS5.
 *
 * @throws ValidationError if the query is empty or whitespace
 */
export function validateQuery(query: string): string {
  if (query.trim().length === 0) {
    throw new ValidationError('Search query cannot be empty', [], 'Provide one or more search terms');
  }
  return query;
}

function snippetTokens(options: SearchOptions): number {
  const tokens = Math.trunc(options.snippetTokens ?? DEFAULT_SNIPPET_TOKENS);
  return Math.min(Math.max(tokens, 1), MAX_SNIPPET_TOKENS);
}

function isQuerySyntaxError(error: unknown): error is Error {
  return (
    error instanceof Error &&
    /fts5|syntax error|no such column|unterminated string|unknown special query/i.test(error.message)
  );
}

/**
 * Run a MATCH query, turning FTS5 parse failures into ValidationError.
 */
function runMatch(db: Database.Database, sql: string, params: unknown[], query: string): unknown[] {
  try {
    return db.prepare(sql).all(...params);
  } catch (error) {
    if (isQuerySyntaxError(error)) {
      throw new ValidationError(`Invalid search query: ${query}`, [error.message], QUERY_HINT);
    }
    throw error;
  }
}

/**
 * Search skills, optionally within one category.
 *
 * @example
 * ```ts
 * const hits = searchSkills(db, 'validation', { category: 'libraries', maxResults: 5 });
 * hits[0]?.snippet; // "...[validation] at the boundary..."
 * ```
 */
export function searchSkills(
  db: Database.Database,
  query: string,
  options: SkillSearchOptions = {}
): SkillSearchRow[] {
  validateQuery(query);

  const params: unknown[] = [snippetTokens(options), query];
  let sql = `
    SELECT s.*,
           snippet(skills_fts, ${SNIPPET_COLUMN}, '[', ']', '...', ?) AS snippet,
           rank
    FROM skills_fts
    JOIN skills s ON skills_fts.rowid = s.id
    WHERE skills_fts MATCH ?`;

  if (options.category !== undefined) {
    sql += ' AND s.category = ?';
    params.push(options.category);
  }

  sql += ' ORDER BY rank LIMIT ?';
  params.push(options.maxResults ?? DEFAULT_MAX_RESULTS);

  return validateRows(SkillSearchRowSchema, runMatch(db, sql, params, query), 'skill search');
}

export function searchPrompts(
  db: Database.Database,
  query: string,
  options: SearchOptions = {}
): PromptSearchRow[] {
  validateQuery(query);

  const sql = `
    SELECT p.*,
           snippet(prompts_fts, ${SNIPPET_COLUMN}, '[', ']', '...', ?) AS snippet,
           rank
    FROM prompts_fts
    JOIN prompts p ON prompts_fts.rowid = p.id
    WHERE prompts_fts MATCH ?
    ORDER BY rank
    LIMIT ?`;
  const params = [snippetTokens(options), query, options.maxResults ?? DEFAULT_MAX_RESULTS];

  return validateRows(PromptSearchRowSchema, runMatch(db, sql, params, query), 'prompt search');
}

/**
 * Search both kinds. The category filter applies to skills only.
 */
export function searchAll(
  db: Database.Database,
  query: string,
  options: SkillSearchOptions = {}
): SearchAllResult {
  return {
    skills: searchSkills(db, query, options),
    prompts: searchPrompts(db, query, options),
  };
}
