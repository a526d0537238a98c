/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. better-sqlite3
 * returns `unknown` rows; validating them here keeps casts out of the
 * query code and turns schema drift into a clear error.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM skills WHERE path = ?').get(path);
 * return row ? validateRow(SkillRowSchema, row, `skills.path=${path}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Table Schemas
// ============================================================================

export const SkillRowSchema = z.object({
  id: z.number().int(),
  path: z.string(),
  category: z.string(),
  name: z.string(),
  title: z.string().nullable(),
  description: z.string().nullable(),
  content: z.string(),
  file_hash: z.string(),
  size_bytes: z.number().int().nonnegative(),
  token_count: z.number().int().nonnegative(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type SkillRow = z.infer<typeof SkillRowSchema>;

export const PromptRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  path: z.string(),
  title: z.string().nullable(),
  author: z.string().nullable(),
  description: z.string().nullable(),
  content: z.string(),
  file_hash: z.string(),
  size_bytes: z.number().int().nonnegative(),
  token_count: z.number().int().nonnegative(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type PromptRow = z.infer<typeof PromptRowSchema>;

export const FragmentRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  created_at: z.string(),
});

export type FragmentRow = z.infer<typeof FragmentRowSchema>;

export const PromptReferenceRowSchema = z.object({
  id: z.number().int(),
  source_prompt_id: z.number().int(),
  target_prompt_id: z.number().int().nullable(),
  target_fragment_id: z.number().int().nullable(),
  reference_type: z.enum(['prompt', 'fragment']),
  reference_class: z.enum(['embedded', 'reference']),
  position: z.number().int(),
  created_at: z.string(),
});

export type PromptReferenceRow = z.infer<typeof PromptReferenceRowSchema>;

// ============================================================================
// Query Result Schemas
// ============================================================================

/** A skill reached through a prompt reference and fragment */
export const ReferencedSkillRowSchema = z.object({
  reference_class: z.enum(['embedded', 'reference']),
  reference_position: z.number().int(),
  skill_position: z.number().int(),
  fragment: z.string(),
  skill_id: z.number().int(),
  path: z.string(),
  category: z.string(),
  name: z.string(),
  title: z.string().nullable(),
});

export type ReferencedSkillRow = z.infer<typeof ReferencedSkillRowSchema>;

/** Skill search hit: the full row plus FTS5 snippet and rank */
export const SkillSearchRowSchema = SkillRowSchema.extend({
  snippet: z.string().nullable(),
  rank: z.number(),
});

export type SkillSearchRow = z.infer<typeof SkillSearchRowSchema>;

export const PromptSearchRowSchema = PromptRowSchema.extend({
  snippet: z.string().nullable(),
  rank: z.number(),
});

export type PromptSearchRow = z.infer<typeof PromptSearchRowSchema>;

export const CategoryCountRowSchema = z.object({
  category: z.string(),
  count: z.number().int().nonnegative(),
});

export type CategoryCountRow = z.infer<typeof CategoryCountRowSchema>;

export const CountRowSchema = z.object({
  count: z.number().int().nonnegative(),
});

/** SUM() over an empty table is NULL */
export const TotalsRowSchema = z.object({
  total_size: z.number().int().nullable(),
  total_tokens: z.number().int().nullable(),
});

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails schema validation.
 *
 * Usually a database written by a different version of the CLI.
 * Exit code 5, same as DatabaseError.
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThe database may have been written by another version.\n` +
      `Try: skillbook db reset --force  and sync again`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Where the row came from, for the error message (e.g. "skills.path=/x.md")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of database rows. Throws on the first invalid row.
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      throw new SchemaValidationError(
        `Database schema mismatch in ${context}[${i}]`,
        result.error.issues
      );
    }
    return result.data;
  });
}
