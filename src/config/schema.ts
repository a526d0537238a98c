/**
 * Configuration Schema
 *
 * Defines the shape of config.toml (global and project-local) using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Output formats the dispatcher can render
 */
export const OutputFormatSchema = z.enum(['json', 'human']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * Database location and migration behavior
 */
export const DatabaseConfigSchema = z.object({
  path: z.string().min(1).describe('SQLite database file (~ is expanded)'),
  auto_migrate: z.boolean().describe('Apply pending migrations when a command opens the database'),
});

/**
 * Where skills, prompts and prompt configs live
 */
export const ProjectConfigSchema = z.object({
  root: z
    .string()
    .min(1)
    .nullable()
    .describe('Project root; null means the current working directory'),
  skills_dir: z.string().min(1).describe('Skills directory, relative to the root'),
  prompts_dir: z.string().min(1).describe('Prompt Markdown directory, relative to the root'),
  prompt_configs_dir: z.string().min(1).describe('Prompt YAML descriptor directory, relative to the root'),
});

/**
 * Search configuration
 */
export const SearchConfigSchema = z.object({
  max_results: z.number().int().min(1).max(1000).describe('Default result cap for search'),
  snippet_tokens: z
    .number()
    .int()
    .min(1)
    .max(64)
    .describe('Tokens of context in each search snippet (FTS5 allows at most 64)'),
});

/**
 * Output configuration
 */
export const OutputConfigSchema = z.object({
  format: OutputFormatSchema.describe('Output format when neither --json nor --human is given'),
  color: z.boolean().describe('Colorize human output'),
});

/**
 * Root configuration schema
 */
export const ConfigSchema = z.object({
  database: DatabaseConfigSchema,
  project: ProjectConfigSchema,
  search: SearchConfigSchema,
  output: OutputConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for a single layer (config file or environment).
 * Every field becomes optional, allowing sparse config files.
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
