/**
 * Environment Variable Handler
 *
 * Reads the environment overrides for the database path and project root.
 * Supports .env files for local development via dotenv.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { PartialConfig } from './schema.js';
import { ConfigError } from '../errors/index.js';

// Load .env file (no-op if it doesn't exist)
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/** Empty strings count as unset */
const optionalPath = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

export const EnvSchema = z.object({
  SKILLBOOK_DB_PATH: optionalPath,
  SKILLBOOK_PROJECT_ROOT: optionalPath,
  XDG_CONFIG_HOME: optionalPath,
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Parse the variables this tool reads from an environment.
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvVars {
  const result = EnvSchema.safeParse({
    SKILLBOOK_DB_PATH: env['SKILLBOOK_DB_PATH'],
    SKILLBOOK_PROJECT_ROOT: env['SKILLBOOK_PROJECT_ROOT'],
    XDG_CONFIG_HOME: env['XDG_CONFIG_HOME'],
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment:\n  ${issues.join('\n  ')}`);
  }

  return result.data;
}

/**
 * The environment as a configuration layer.
 * Only variables that are set appear in the result.
 */
export function getEnvOverrides(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const vars = loadEnv(env);
  const overrides: PartialConfig = {};

  if (vars.SKILLBOOK_DB_PATH !== undefined) {
    overrides.database = { path: vars.SKILLBOOK_DB_PATH };
  }
  if (vars.SKILLBOOK_PROJECT_ROOT !== undefined) {
    overrides.project = { root: vars.SKILLBOOK_PROJECT_ROOT };
  }

  return overrides;
}
