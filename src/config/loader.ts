/**
 * Configuration Loader
 *
 * Builds the effective configuration from an ordered list of layers:
 * 1. Built-in defaults
 * 2. Global config.toml ($XDG_CONFIG_HOME/skillbook/config.toml)
 * 3. Project-local .skillbook.toml in the working directory
 * 4. Environment variables
 *
 * Layers are folded left-to-right with a deep merge, so each layer only
 * overrides the keys it sets.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { createDefaultConfig, CONFIG_TEMPLATE } from './defaults.js';
import { getEnvOverrides } from './env.js';
import { expandHome, getConfigPath, getProjectConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

/**
 * One partial configuration layer and where it came from
 */
export interface ConfigSource {
  /** Display name ("global", "project", "env") */
  name: string;
  /** File the layer was read from, if any */
  path?: string;
  values: PartialConfig;
}

export interface LoadConfigOptions {
  /** Environment to read overrides and XDG paths from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory searched for the project-local config (default: process.cwd()) */
  cwd?: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Nested objects merge key by key; arrays and primitives replace.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Read and validate one TOML config file.
 *
 * @returns The partial config, or null when the file does not exist
 * @throws ConfigError if the file has invalid TOML or invalid values
 */
export function readConfigFile(configPath: string): PartialConfig | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath}`
    );
  }

  const validationResult = PartialConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration in ${configPath}:\n${formatIssues(validationResult.error.issues)}`,
      `Fix the values in ${configPath}`
    );
  }

  return validationResult.data;
}

/**
 * Collect the configuration layers above the defaults, lowest precedence first.
 */
export function getConfigSources(options: LoadConfigOptions = {}): ConfigSource[] {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const sources: ConfigSource[] = [];

  const globalPath = getConfigPath(env);
  const globalValues = readConfigFile(globalPath);
  if (globalValues) {
    sources.push({ name: 'global', path: globalPath, values: globalValues });
  }

  const projectPath = getProjectConfigPath(cwd);
  // The project file can be the global file when cwd is the config dir
  if (path.resolve(projectPath) !== path.resolve(globalPath)) {
    const projectValues = readConfigFile(projectPath);
    if (projectValues) {
      sources.push({ name: 'project', path: projectPath, values: projectValues });
    }
  }

  sources.push({ name: 'env', values: getEnvOverrides(env) });

  return sources;
}

/**
 * Fold configuration layers onto a base config and validate the result.
 */
export function mergeConfigSources(base: Config, sources: ConfigSource[]): Config {
  const merged = sources.reduce<Record<string, unknown>>(
    (acc, source) => deepMerge(acc, source.values),
    { ...base }
  );

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error.issues)}`);
  }

  return result.data;
}

/**
 * Load the effective configuration.
 *
 * @throws ConfigError if any layer is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  return mergeConfigSources(createDefaultConfig(env), getConfigSources(options));
}

/**
 * Write the commented config template to the global config path.
 * An existing file is left untouched.
 */
export function writeConfigTemplate(env: NodeJS.ProcessEnv = process.env): { path: string; created: boolean } {
  const configPath = getConfigPath(env);

  if (fs.existsSync(configPath)) {
    return { path: configPath, created: false };
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return { path: configPath, created: true };
}

/**
 * Absolute database path with ~ expanded
 */
export function resolveDatabasePath(config: Config): string {
  return path.resolve(expandHome(config.database.path));
}

/**
 * Absolute project root: the configured root, or the working directory
 */
export function resolveProjectRoot(config: Config, cwd: string = process.cwd()): string {
  return path.resolve(cwd, expandHome(config.project.root ?? cwd));
}
