/**
 * Config Module
 *
 * Exports for programmatic config access.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  DatabaseConfigSchema,
  ProjectConfigSchema,
  SearchConfigSchema,
  OutputConfigSchema,
  OutputFormatSchema,
} from './schema.js';
export type { Config, PartialConfig, OutputFormat } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE, createDefaultConfig } from './defaults.js';

// Loader functions
export {
  loadConfig,
  readConfigFile,
  getConfigSources,
  mergeConfigSources,
  deepMerge,
  writeConfigTemplate,
  resolveDatabasePath,
  resolveProjectRoot,
} from './loader.js';
export type { ConfigSource, LoadConfigOptions } from './loader.js';

// Paths
export {
  APP_NAME,
  PROJECT_CONFIG_FILENAME,
  getConfigHome,
  getConfigDir,
  getConfigPath,
  getDefaultDbPath,
  getProjectConfigPath,
  expandHome,
} from './paths.js';

// Environment variables
export { loadEnv, getEnvOverrides, EnvSchema } from './env.js';
export type { EnvVars } from './env.js';
