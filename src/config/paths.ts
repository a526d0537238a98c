/**
 * Centralized Path Definitions
 *
 * Directory structure (XDG layout):
 * $XDG_CONFIG_HOME/skillbook/     (default ~/.config/skillbook)
 * ├── skillbook.db    (SQLite database)
 * └── config.toml     (Global configuration)
 *
 * <cwd>/.skillbook.toml           (Project-local configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const APP_NAME = 'skillbook';
export const CONFIG_FILENAME = 'config.toml';
export const DB_FILENAME = 'skillbook.db';
export const PROJECT_CONFIG_FILENAME = '.skillbook.toml';

/**
 * Base config directory: $XDG_CONFIG_HOME, falling back to ~/.config
 */
export function getConfigHome(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env['XDG_CONFIG_HOME'];
  return xdg && xdg.trim() !== '' ? xdg : join(homedir(), '.config');
}

/**
 * Get the application config directory
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigHome(env), APP_NAME);
}

/**
 * Get the global config file path
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigDir(env), CONFIG_FILENAME);
}

/**
 * Get the default database path (used when no layer sets database.path)
 */
export function getDefaultDbPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigDir(env), DB_FILENAME);
}

/**
 * Get the project-local config path for a working directory
 */
export function getProjectConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, PROJECT_CONFIG_FILENAME);
}

/**
 * Expand a leading ~ to the home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}
