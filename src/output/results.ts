/**
 * Command Result Shapes
 *
 * Every command returns a plain object tagged with `type`. These schemas
 * describe what the built-in formatters expect for each tag; the JSON
 * output is the object itself.
 */

import { z } from 'zod';
import {
  CategoryCountRowSchema,
  PromptRowSchema,
  PromptSearchRowSchema,
  SkillRowSchema,
  SkillSearchRowSchema,
} from '../database/index.js';
import { OutputFormatSchema } from '../config/index.js';

// ============================================================================
// Skills
// ============================================================================

export const SkillResultSchema = z.object({
  type: z.literal('skill'),
  data: SkillRowSchema,
});
export type SkillResult = z.infer<typeof SkillResultSchema>;

export const SkillListResultSchema = z.object({
  type: z.literal('skill-list'),
  count: z.number().int(),
  category: z.string().nullable(),
  skills: z.array(SkillRowSchema),
});
export type SkillListResult = z.infer<typeof SkillListResultSchema>;

export const SkillSearchResultsSchema = z.object({
  type: z.literal('skill-search-results'),
  query: z.string(),
  category: z.string().nullable(),
  count: z.number().int(),
  skills: z.array(SkillSearchRowSchema),
});
export type SkillSearchResults = z.infer<typeof SkillSearchResultsSchema>;

// ============================================================================
// Prompts
// ============================================================================

export const PromptSkillEntrySchema = z.object({
  position: z.number().int(),
  name: z.string(),
  category: z.string(),
  title: z.string().nullable(),
  path: z.string(),
  fragment: z.string(),
});

export const PromptResultSchema = z.object({
  type: z.literal('prompt'),
  data: PromptRowSchema.extend({
    embedded: z.array(PromptSkillEntrySchema),
    references: z.array(PromptSkillEntrySchema),
  }),
});
export type PromptResult = z.infer<typeof PromptResultSchema>;

export const PromptListResultSchema = z.object({
  type: z.literal('prompt-list'),
  count: z.number().int(),
  prompts: z.array(PromptRowSchema),
});
export type PromptListResult = z.infer<typeof PromptListResultSchema>;

export const PromptSearchResultsSchema = z.object({
  type: z.literal('prompt-search-results'),
  query: z.string(),
  count: z.number().int(),
  prompts: z.array(PromptSearchRowSchema),
});
export type PromptSearchResults = z.infer<typeof PromptSearchResultsSchema>;

// ============================================================================
// Combined search
// ============================================================================

export const SearchResultsSchema = z.object({
  type: z.literal('search-results'),
  query: z.string(),
  target: z.enum(['skills', 'prompts', 'all']),
  category: z.string().nullable(),
  skills: z.array(SkillSearchRowSchema),
  prompts: z.array(PromptSearchRowSchema),
});
export type SearchResults = z.infer<typeof SearchResultsSchema>;

// ============================================================================
// Database commands
// ============================================================================

export const StatsResultSchema = z.object({
  type: z.literal('stats'),
  configuration: z.object({
    databasePath: z.string(),
    projectRoot: z.string(),
    skillsDir: z.string(),
    promptsDir: z.string(),
    promptConfigsDir: z.string(),
    autoMigrate: z.boolean(),
    maxResults: z.number().int(),
    outputFormat: OutputFormatSchema,
  }),
  database: z.object({
    skills: z.number().int(),
    prompts: z.number().int(),
    categories: z.number().int(),
    totalSizeBytes: z.number().int(),
    totalTokens: z.number().int(),
  }),
  categoryBreakdown: z.array(CategoryCountRowSchema),
});
export type StatsResult = z.infer<typeof StatsResultSchema>;

const OutcomeCountsSchema = z.object({
  inserted: z.number().int(),
  updated: z.number().int(),
  skipped: z.number().int(),
  error: z.number().int(),
  total: z.number().int(),
});

export const SyncSummaryResultSchema = z.object({
  type: z.literal('sync-summary'),
  projectRoot: z.string(),
  skills: OutcomeCountsSchema,
  prompts: OutcomeCountsSchema,
  fragments: z.object({
    configs: z.number().int(),
    embedded: z.number().int(),
    references: z.number().int(),
    missing: z.number().int(),
  }),
  errors: z.array(z.string()),
  durationMs: z.number(),
});
export type SyncSummaryResult = z.infer<typeof SyncSummaryResultSchema>;

export const DbInitResultSchema = z.object({
  type: z.literal('db-init'),
  databasePath: z.string(),
  configPath: z.string(),
  configCreated: z.boolean(),
  migrationsApplied: z.array(z.string()),
});
export type DbInitResult = z.infer<typeof DbInitResultSchema>;

export const DbResetResultSchema = z.object({
  type: z.literal('db-reset'),
  databasePath: z.string(),
  migrationsApplied: z.array(z.string()),
});
export type DbResetResult = z.infer<typeof DbResetResultSchema>;
