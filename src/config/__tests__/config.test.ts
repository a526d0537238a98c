/**
 * Config Module Tests
 *
 * Tests the configuration layers, validation, and merging logic.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { CONFIG_TEMPLATE, createDefaultConfig } from '../defaults.js';
import {
  deepMerge,
  getConfigSources,
  loadConfig,
  readConfigFile,
  resolveDatabasePath,
  resolveProjectRoot,
  writeConfigTemplate,
} from '../loader.js';
import { expandHome, getConfigPath, getDefaultDbPath } from '../paths.js';
import { ConfigError } from '../../errors/index.js';

describe('Config Schema', () => {
  it('validates the defaults', () => {
    expect(ConfigSchema.safeParse(createDefaultConfig({})).success).toBe(true);
  });

  it('rejects an unknown output format', () => {
    const config = createDefaultConfig({});
    const invalid = { ...config, output: { ...config.output, format: 'table' } };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('rejects snippet_tokens above the FTS5 limit', () => {
    const config = createDefaultConfig({});
    const invalid = { ...config, search: { ...config.search, snippet_tokens: 65 } };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('allows deeply partial config', () => {
    const result = PartialConfigSchema.safeParse({ search: { max_results: 5 } });
    expect(result.success).toBe(true);
  });
});

describe('Config Defaults', () => {
  it('uses the XDG config home for the database', () => {
    const config = createDefaultConfig({ XDG_CONFIG_HOME: '/tmp/xdg' });

    expect(config.database.path).toBe(path.join('/tmp/xdg', 'skillbook', 'skillbook.db'));
    expect(config.database.auto_migrate).toBe(true);
  });

  it('falls back to ~/.config without XDG_CONFIG_HOME', () => {
    expect(getDefaultDbPath({})).toBe(path.join(os.homedir(), '.config', 'skillbook', 'skillbook.db'));
  });

  it('has the expected project layout and output defaults', () => {
    const config = createDefaultConfig({});

    expect(config.project).toEqual({
      root: null,
      skills_dir: 'skills',
      prompts_dir: 'prompts',
      prompt_configs_dir: 'prompt_configs',
    });
    expect(config.search).toEqual({ max_results: 50, snippet_tokens: 30 });
    expect(config.output).toEqual({ format: 'json', color: true });
  });

  it('template parses back into a valid partial config', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'skillbook-template-'));
    const file = path.join(dir, 'config.toml');
    fs.writeFileSync(file, CONFIG_TEMPLATE);

    expect(readConfigFile(file)).toEqual({
      database: { auto_migrate: true },
      project: { skills_dir: 'skills', prompts_dir: 'prompts', prompt_configs_dir: 'prompt_configs' },
      search: { max_results: 50, snippet_tokens: 30 },
      output: { format: 'json', color: true },
    });

    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe('deepMerge', () => {
  it('overrides nested keys and keeps siblings', () => {
    const merged = deepMerge({ a: 1, nested: { b: 2, c: 3 } }, { nested: { b: 20 } });
    expect(merged).toEqual({ a: 1, nested: { b: 20, c: 3 } });
  });

  it('replaces arrays instead of merging them', () => {
    expect(deepMerge({ list: [1, 2] }, { list: [3] })).toEqual({ list: [3] });
  });

  it('ignores undefined source values', () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });

  it('lets null override a value', () => {
    expect(deepMerge({ root: '/x' }, { root: null })).toEqual({ root: null });
  });
});

describe('Config Loading', () => {
  let testDir: string;
  let xdgHome: string;
  let projectDir: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'skillbook-config-'));
    xdgHome = path.join(testDir, 'xdg');
    projectDir = path.join(testDir, 'project');
    fs.mkdirSync(projectDir, { recursive: true });
    env = { XDG_CONFIG_HOME: xdgHome };
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  function writeGlobal(content: string): void {
    const file = getConfigPath(env);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }

  it('returns defaults when no config file exists', () => {
    const config = loadConfig({ env, cwd: projectDir });
    expect(config).toEqual(createDefaultConfig(env));
  });

  it('applies the global file over defaults', () => {
    writeGlobal('[search]\nmax_results = 10\n');

    const config = loadConfig({ env, cwd: projectDir });

    expect(config.search.max_results).toBe(10);
    expect(config.search.snippet_tokens).toBe(30);
  });

  it('applies the project file over the global file', () => {
    writeGlobal('[search]\nmax_results = 10\n[output]\nformat = "human"\n');
    fs.writeFileSync(path.join(projectDir, '.skillbook.toml'), '[search]\nmax_results = 7\n');

    const config = loadConfig({ env, cwd: projectDir });

    expect(config.search.max_results).toBe(7);
    expect(config.output.format).toBe('human');
  });

  it('applies environment variables over every file', () => {
    fs.writeFileSync(
      path.join(projectDir, '.skillbook.toml'),
      '[database]\npath = "/from/project.db"\n[project]\nroot = "/from/project"\n'
    );

    const config = loadConfig({
      env: { ...env, SKILLBOOK_DB_PATH: '/from/env.db', SKILLBOOK_PROJECT_ROOT: '/from/env' },
      cwd: projectDir,
    });

    expect(config.database.path).toBe('/from/env.db');
    expect(config.project.root).toBe('/from/env');
  });

  it('treats empty environment variables as unset', () => {
    const config = loadConfig({ env: { ...env, SKILLBOOK_DB_PATH: '' }, cwd: projectDir });
    expect(config.database.path).toBe(getDefaultDbPath(env));
  });

  it('lists sources lowest precedence first', () => {
    writeGlobal('[search]\nmax_results = 10\n');
    fs.writeFileSync(path.join(projectDir, '.skillbook.toml'), '[search]\nmax_results = 7\n');

    const names = getConfigSources({ env, cwd: projectDir }).map((source) => source.name);

    expect(names).toEqual(['global', 'project', 'env']);
  });

  it('throws ConfigError on invalid TOML', () => {
    writeGlobal('[search\nmax_results = ');
    expect(() => loadConfig({ env, cwd: projectDir })).toThrow(ConfigError);
  });

  it('throws ConfigError on values outside the schema', () => {
    writeGlobal('[output]\nformat = "xml"\n');
    expect(() => loadConfig({ env, cwd: projectDir })).toThrow(/Invalid configuration/);
  });

  it('writes the template once', () => {
    const first = writeConfigTemplate(env);
    const second = writeConfigTemplate(env);

    expect(first.created).toBe(true);
    expect(second).toEqual({ path: first.path, created: false });
    expect(fs.readFileSync(first.path, 'utf-8')).toBe(CONFIG_TEMPLATE);
  });
});

describe('Path resolution', () => {
  it('expands ~ in paths', () => {
    expect(expandHome('~/skills')).toBe(path.join(os.homedir(), 'skills'));
    expect(expandHome('/abs/path')).toBe('/abs/path');
  });

  it('resolves the database path', () => {
    const config = { ...createDefaultConfig({}), database: { path: '~/db/test.db', auto_migrate: true } };
    expect(resolveDatabasePath(config)).toBe(path.join(os.homedir(), 'db', 'test.db'));
  });

  it('uses the working directory when no root is configured', () => {
    expect(resolveProjectRoot(createDefaultConfig({}), '/work/here')).toBe('/work/here');
  });

  it('resolves a relative root against the working directory', () => {
    const base = createDefaultConfig({});
    const config = { ...base, project: { ...base.project, root: 'corpus' } };
    expect(resolveProjectRoot(config, '/work')).toBe('/work/corpus');
  });
});
