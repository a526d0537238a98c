/**
 * Database Operations
 *
 * Typed reads and writes for the sync pipeline. Every read goes through
 * the zod row schemas in validation.ts.
 *
 * Timestamps are ISO strings from an injectable clock so tests can pin them.
 */

import type Database from 'better-sqlite3';
import type {
  FragmentInput,
  PromptInput,
  PromptReferenceInput,
  ReferenceClass,
  SkillInput,
} from './schema.js';
import {
  FragmentRowSchema,
  PromptReferenceRowSchema,
  PromptRowSchema,
  ReferencedSkillRowSchema,
  SkillRowSchema,
  validateRow,
  validateRows,
  type FragmentRow,
  type PromptReferenceRow,
  type PromptRow,
  type ReferencedSkillRow,
  type SkillRow,
} from './validation.js';

export type Clock = () => string;

const systemClock: Clock = () => new Date().toISOString();

export class DatabaseOperations {
  constructor(
    private readonly db: Database.Database,
    private readonly now: Clock = systemClock
  ) {}

  /**
   * Run `fn` inside a single SQLite transaction.
   * Nested calls become savepoints.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ==========================================================================
  // Skills
  // ==========================================================================

  getSkillByPath(path: string): SkillRow | undefined {
    const row = this.db.prepare('SELECT * FROM skills WHERE path = ?').get(path);
    return row ? validateRow(SkillRowSchema, row, `skills.path=${path}`) : undefined;
  }

  insertSkill(input: SkillInput): number {
    const timestamp = this.now();
    const result = this.db
      .prepare(
        `INSERT INTO skills (path, category, name, title, description, content,
           file_hash, size_bytes, token_count, created_at, updated_at)
         VALUES (@path, @category, @name, @title, @description, @content,
           @file_hash, @size_bytes, @token_count, @created_at, @updated_at)`
      )
      .run({ ...input, created_at: timestamp, updated_at: timestamp });
    return Number(result.lastInsertRowid);
  }

  /** Overwrite every content column. created_at is kept. */
  updateSkill(id: number, input: SkillInput): void {
    this.db
      .prepare(
        `UPDATE skills SET path = @path, category = @category, name = @name,
           title = @title, description = @description, content = @content,
           file_hash = @file_hash, size_bytes = @size_bytes,
           token_count = @token_count, updated_at = @updated_at
         WHERE id = @id`
      )
      .run({ ...input, id, updated_at: this.now() });
  }

  // ==========================================================================
  // Prompts
  // ==========================================================================

  getPromptByName(name: string): PromptRow | undefined {
    const row = this.db.prepare('SELECT * FROM prompts WHERE name = ?').get(name);
    return row ? validateRow(PromptRowSchema, row, `prompts.name=${name}`) : undefined;
  }

  insertPrompt(input: PromptInput): number {
    const timestamp = this.now();
    const result = this.db
      .prepare(
        `INSERT INTO prompts (name, path, title, author, description, content,
           file_hash, size_bytes, token_count, created_at, updated_at)
         VALUES (@name, @path, @title, @author, @description, @content,
           @file_hash, @size_bytes, @token_count, @created_at, @updated_at)`
      )
      .run({ ...input, created_at: timestamp, updated_at: timestamp });
    return Number(result.lastInsertRowid);
  }

  updatePrompt(id: number, input: PromptInput): void {
    this.db
      .prepare(
        `UPDATE prompts SET name = @name, path = @path, title = @title,
           author = @author, description = @description, content = @content,
           file_hash = @file_hash, size_bytes = @size_bytes,
           token_count = @token_count, updated_at = @updated_at
         WHERE id = @id`
      )
      .run({ ...input, id, updated_at: this.now() });
  }

  // ==========================================================================
  // Fragments
  // ==========================================================================

  getFragmentByName(name: string): FragmentRow | undefined {
    const row = this.db.prepare('SELECT * FROM prompt_fragments WHERE name = ?').get(name);
    return row ? validateRow(FragmentRowSchema, row, `prompt_fragments.name=${name}`) : undefined;
  }

  /**
   * Get the fragment by name, creating it when missing.
   * An existing fragment gets the new title and description.
   */
  ensureFragment(input: FragmentInput): FragmentRow {
    const existing = this.getFragmentByName(input.name);

    if (existing) {
      this.db
        .prepare('UPDATE prompt_fragments SET title = ?, description = ? WHERE id = ?')
        .run(input.title, input.description, existing.id);
      return { ...existing, title: input.title, description: input.description };
    }

    this.db
      .prepare(
        'INSERT INTO prompt_fragments (name, title, description, created_at) VALUES (?, ?, ?, ?)'
      )
      .run(input.name, input.title, input.description, this.now());

    const created = this.getFragmentByName(input.name);
    if (!created) {
      throw new Error(`Fragment ${input.name} missing after insert`);
    }
    return created;
  }

  /** Remove every skill membership of a fragment. Returns rows deleted. */
  clearFragmentSkills(fragmentId: number): number {
    return this.db
      .prepare('DELETE FROM prompt_fragment_skills WHERE fragment_id = ?')
      .run(fragmentId).changes;
  }

  /**
   * Add a skill to a fragment. A skill already in the fragment keeps its
   * first position.
   *
   * @returns true when a row was inserted
   */
  addFragmentSkill(fragmentId: number, skillId: number, position: number): boolean {
    const result = this.db
      .prepare(
        'INSERT OR IGNORE INTO prompt_fragment_skills (fragment_id, skill_id, position) VALUES (?, ?, ?)'
      )
      .run(fragmentId, skillId, position);
    return result.changes > 0;
  }

  /** Skill ids of a fragment in position order */
  getFragmentSkillIds(fragmentId: number): number[] {
    return this.db
      .prepare('SELECT skill_id FROM prompt_fragment_skills WHERE fragment_id = ? ORDER BY position, id')
      .pluck()
      .all(fragmentId)
      .filter((id): id is number => typeof id === 'number');
  }

  // ==========================================================================
  // Prompt References
  // ==========================================================================

  deletePromptReferences(promptId: number, referenceClass: ReferenceClass): number {
    return this.db
      .prepare('DELETE FROM prompt_references WHERE source_prompt_id = ? AND reference_class = ?')
      .run(promptId, referenceClass).changes;
  }

  addFragmentReference(input: PromptReferenceInput): number {
    const result = this.db
      .prepare(
        `INSERT INTO prompt_references
           (source_prompt_id, target_fragment_id, reference_type, reference_class, position, created_at)
         VALUES (?, ?, 'fragment', ?, ?, ?)`
      )
      .run(input.sourcePromptId, input.targetFragmentId, input.referenceClass, input.position, this.now());
    return Number(result.lastInsertRowid);
  }

  getPromptReferences(promptId: number): PromptReferenceRow[] {
    const rows = this.db
      .prepare('SELECT * FROM prompt_references WHERE source_prompt_id = ? ORDER BY position, id')
      .all(promptId);
    return validateRows(PromptReferenceRowSchema, rows, `prompt_references.source=${promptId}`);
  }

  /**
   * Skills a prompt reaches through its fragment references, ordered by
   * reference position then position inside the fragment.
   */
  getReferencedSkills(promptId: number): ReferencedSkillRow[] {
    const rows = this.db
      .prepare(
        `SELECT pr.reference_class AS reference_class,
                pr.position AS reference_position,
                pfs.position AS skill_position,
                pf.name AS fragment,
                s.id AS skill_id,
                s.path AS path,
                s.category AS category,
                s.name AS name,
                s.title AS title
         FROM prompt_references pr
         JOIN prompt_fragments pf ON pf.id = pr.target_fragment_id
         JOIN prompt_fragment_skills pfs ON pfs.fragment_id = pf.id
         JOIN skills s ON s.id = pfs.skill_id
         WHERE pr.source_prompt_id = ?
         ORDER BY pr.position, pfs.position, pfs.id`
      )
      .all(promptId);
    return validateRows(ReferencedSkillRowSchema, rows, `prompt_references.source=${promptId}`);
  }
}
