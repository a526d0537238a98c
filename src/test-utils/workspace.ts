/**
 * Test Utilities - Temporary Workspaces
 *
 * Every test that touches the filesystem or SQLite gets its own temp
 * directory: a project root plus a database path beside it.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { loadConfig, type Config } from '../config/index.js';

export interface TestWorkspace {
  /** Temp directory holding everything */
  root: string;
  /** Project root with skills/, prompts/ and prompt_configs/ */
  projectRoot: string;
  /** SQLite file path (not created until opened) */
  dbPath: string;
  /** Environment pointing config at this workspace */
  env: NodeJS.ProcessEnv;
  /** Write a file relative to the project root, returning its absolute path */
  write(relativePath: string, content: string): string;
  /** Effective config for this workspace (no config files, env overrides only) */
  config(): Config;
  cleanup(): void;
}

export function createTestWorkspace(prefix = 'skillbook-test-'): TestWorkspace {
  const root = mkdtempSync(join(tmpdir(), prefix));
  const projectRoot = join(root, 'project');
  const dbPath = join(root, 'data', 'skillbook.db');
  mkdirSync(projectRoot, { recursive: true });

  const env: NodeJS.ProcessEnv = {
    XDG_CONFIG_HOME: join(root, 'config'),
    SKILLBOOK_DB_PATH: dbPath,
    SKILLBOOK_PROJECT_ROOT: projectRoot,
  };

  return {
    root,
    projectRoot,
    dbPath,
    env,
    write(relativePath, content) {
      const filePath = join(projectRoot, relativePath);
      mkdirSync(dirname(filePath), { recursive: true });
      writeFileSync(filePath, content, 'utf-8');
      return filePath;
    },
    config() {
      return loadConfig({ env, cwd: root });
    },
    cleanup() {
      rmSync(root, { recursive: true, force: true });
    },
  };
}
