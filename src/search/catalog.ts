/**
 * Catalog Queries
 *
 * Listing and lookups by name. No ranking: order is (category, name) for
 * skills and name for prompts so pages are stable.
 */

import type Database from 'better-sqlite3';
import {
  CategoryCountRowSchema,
  DatabaseOperations,
  PromptRowSchema,
  SkillRowSchema,
  validateRow,
  validateRows,
  type CategoryCountRow,
  type PromptRow,
  type ReferencedSkillRow,
  type SkillRow,
} from '../database/index.js';
import {
  DEFAULT_LIST_LIMIT,
  type ListSkillsOptions,
  type PageOptions,
  type PromptSkillEntry,
  type PromptWithSkills,
} from './types.js';

export function listSkills(db: Database.Database, options: ListSkillsOptions = {}): SkillRow[] {
  const params: unknown[] = [];
  let sql = 'SELECT * FROM skills';

  if (options.category !== undefined) {
    sql += ' WHERE category = ?';
    params.push(options.category);
  }

  sql += ' ORDER BY category, name LIMIT ? OFFSET ?';
  params.push(options.limit ?? DEFAULT_LIST_LIMIT, options.offset ?? 0);

  return validateRows(SkillRowSchema, db.prepare(sql).all(...params), 'skills');
}

export function listPrompts(db: Database.Database, options: PageOptions = {}): PromptRow[] {
  const rows = db
    .prepare('SELECT * FROM prompts ORDER BY name LIMIT ? OFFSET ?')
    .all(options.limit ?? DEFAULT_LIST_LIMIT, options.offset ?? 0);
  return validateRows(PromptRowSchema, rows, 'prompts');
}

/** Distinct skill categories with their skill counts */
export function listCategories(db: Database.Database): CategoryCountRow[] {
  const rows = db
    .prepare('SELECT category, COUNT(*) AS count FROM skills GROUP BY category ORDER BY category')
    .all();
  return validateRows(CategoryCountRowSchema, rows, 'skills.category');
}

/**
 * Find a skill by name. Names repeat across categories; without a
 * category the first match by (category, name) wins.
 */
export function getSkillByName(
  db: Database.Database,
  name: string,
  category?: string
): SkillRow | undefined {
  const row =
    category === undefined
      ? db.prepare('SELECT * FROM skills WHERE name = ? ORDER BY category LIMIT 1').get(name)
      : db.prepare('SELECT * FROM skills WHERE name = ? AND category = ?').get(name, category);

  return row ? validateRow(SkillRowSchema, row, `skills.name=${name}`) : undefined;
}

export function getPromptByName(db: Database.Database, name: string): PromptRow | undefined {
  const row = db.prepare('SELECT * FROM prompts WHERE name = ?').get(name);
  return row ? validateRow(PromptRowSchema, row, `prompts.name=${name}`) : undefined;
}

function toEntries(rows: ReferencedSkillRow[]): PromptSkillEntry[] {
  return rows.map((row, index) => ({
    position: index + 1,
    name: row.name,
    category: row.category,
    title: row.title,
    path: row.path,
    fragment: row.fragment,
  }));
}

/**
 * A prompt with the skills it embeds and the skills it references.
 */
export function getPromptWithSkills(
  db: Database.Database,
  name: string
): PromptWithSkills | undefined {
  const prompt = getPromptByName(db, name);
  if (!prompt) {
    return undefined;
  }

  const linked = new DatabaseOperations(db).getReferencedSkills(prompt.id);

  return {
    ...prompt,
    embedded: toEntries(linked.filter((row) => row.reference_class === 'embedded')),
    references: toEntries(linked.filter((row) => row.reference_class === 'reference')),
  };
}
