/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js hands every option value over as a string; these schemas
 * coerce and range-check them before a command touches the database.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

// ============================================================================
// SHARED FIELDS
// ============================================================================

const CategorySchema = z.string().trim().min(1, 'Category cannot be empty');

const MaxResultsSchema = z.coerce
  .number()
  .int('max-results must be a whole number')
  .min(1, 'max-results must be at least 1')
  .max(1000, 'max-results must be at most 1000');

const LimitSchema = z.coerce
  .number()
  .int('limit must be a whole number')
  .min(1, 'limit must be at least 1');

const OffsetSchema = z.coerce
  .number()
  .int('offset must be a whole number')
  .min(0, 'offset cannot be negative');

// ============================================================================
// SKILL COMMAND SCHEMAS
// ============================================================================

export const SkillSearchOptionsSchema = z.object({
  category: CategorySchema.optional(),
  maxResults: MaxResultsSchema.optional(),
});

export const SkillListOptionsSchema = z.object({
  category: CategorySchema.optional(),
  limit: LimitSchema.optional(),
  offset: OffsetSchema.optional(),
});

export const SkillShowOptionsSchema = z.object({
  category: CategorySchema.optional(),
});

// ============================================================================
// PROMPT COMMAND SCHEMAS
// ============================================================================

export const PromptSearchOptionsSchema = z.object({
  maxResults: MaxResultsSchema.optional(),
});

export const PromptListOptionsSchema = z.object({
  limit: LimitSchema.optional(),
  offset: OffsetSchema.optional(),
});

// ============================================================================
// SEARCH COMMAND SCHEMA
// ============================================================================

export const SearchOptionsSchema = z.object({
  target: z.enum(['skills', 'prompts', 'all'], {
    errorMap: () => ({ message: 'target must be one of: skills, prompts, all' }),
  }),
  category: CategorySchema.optional(),
  maxResults: MaxResultsSchema.optional(),
});

// ============================================================================
// DB COMMAND SCHEMA
// ============================================================================

export const ResetOptionsSchema = z.object({
  force: z.boolean().default(false),
});

// ============================================================================
// VALIDATION HELPERS
// ============================================================================

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 */
export function validateInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; issues: string[] } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  return { success: false, issues };
}

/**
 * Validate command options, throwing on bad input.
 *
 * @throws ValidationError listing every issue
 *
 * @example
 * ```ts
 * const options = parseOptions(SkillListOptionsSchema, cmdOptions);
 * listSkills(db, { limit: options.limit });
 * ```
 */
export function parseOptions<T extends z.ZodSchema>(schema: T, input: unknown): z.output<T> {
  const result = validateInput(schema, input);
  if (!result.success) {
    throw new ValidationError('Invalid options', result.issues);
  }
  return result.data;
}
