/**
 * Environment Variable Handler Tests
 */

import { describe, it, expect } from 'vitest';
import { loadEnv, getEnvOverrides } from '../env.js';

describe('loadEnv()', () => {
  it('reads the variables this tool uses', () => {
    const vars = loadEnv({
      SKILLBOOK_DB_PATH: '/tmp/skills.db',
      SKILLBOOK_PROJECT_ROOT: '/tmp/corpus',
      XDG_CONFIG_HOME: '/tmp/xdg',
      UNRELATED: 'ignored',
    });

    expect(vars).toEqual({
      SKILLBOOK_DB_PATH: '/tmp/skills.db',
      SKILLBOOK_PROJECT_ROOT: '/tmp/corpus',
      XDG_CONFIG_HOME: '/tmp/xdg',
    });
  });

  it('treats blank values as unset', () => {
    expect(loadEnv({ SKILLBOOK_DB_PATH: '   ' }).SKILLBOOK_DB_PATH).toBeUndefined();
  });
});

describe('getEnvOverrides()', () => {
  it('returns an empty layer when nothing is set', () => {
    expect(getEnvOverrides({})).toEqual({});
  });

  it('maps the database path', () => {
    expect(getEnvOverrides({ SKILLBOOK_DB_PATH: '/tmp/skills.db' })).toEqual({
      database: { path: '/tmp/skills.db' },
    });
  });

  it('maps the project root', () => {
    expect(getEnvOverrides({ SKILLBOOK_PROJECT_ROOT: '/tmp/corpus' })).toEqual({
      project: { root: '/tmp/corpus' },
    });
  });
});
