/**
 * Tests for the combined search command
 */

import { existsSync } from 'node:fs';
import { createSearchCommand } from '../search.js';
import type { CommandContext } from '../../types.js';
import {
  createSampleProject,
  createTestWorkspace,
  runCli,
  runCliJson,
  type TestWorkspace,
} from '../../../test-utils/index.js';
import { SearchResultsSchema } from '../../../output/index.js';
import { ValidationError } from '../../../errors/index.js';

describe('search command', () => {
  let workspace: TestWorkspace;

  beforeEach(async () => {
    workspace = createTestWorkspace();
    createSampleProject(workspace);
    await runCli(workspace, ['db', 'sync']);
  });

  afterEach(() => {
    workspace.cleanup();
  });

  it('defaults the target to all', () => {
    const getContext = (): CommandContext => {
      throw new Error('not called');
    };
    const option = createSearchCommand(getContext).options.find((opt) => opt.long === '--target');

    expect(option?.defaultValue).toBe('all');
  });

  it('rejects an empty query before creating the database', async () => {
    const fresh = createTestWorkspace();
    try {
      await expect(runCli(fresh, ['search', ' ', '-t', 'skills'])).rejects.toThrow('Search query cannot be empty');
      expect(existsSync(fresh.dbPath)).toBe(false);
    } finally {
      fresh.cleanup();
    }
  });

  it('searches skills and prompts together', async () => {
    const result = await runCliJson(workspace, ['search', 'pipelines OR careful'], SearchResultsSchema);

    expect(result.target).toBe('all');
    expect(result.skills.map((skill) => skill.name)).toEqual(['arrows']);
    expect(result.prompts.map((prompt) => prompt.name)).toEqual(['reviewer']);
  });

  it('searches only prompts with -t prompts', async () => {
    const result = await runCliJson(workspace, ['search', 'pipelines OR careful', '-t', 'prompts'], SearchResultsSchema);

    expect(result.skills).toEqual([]);
    expect(result.prompts.map((prompt) => prompt.name)).toEqual(['reviewer']);
  });

  it('searches only skills with -t skills and a category', async () => {
    const result = await runCliJson(
      workspace,
      ['search', 'pipelines OR validate', '-t', 'skills', '-c', 'language'],
      SearchResultsSchema
    );

    expect(result.category).toBe('language');
    expect(result.skills.map((skill) => skill.name)).toEqual(['arrows']);
    expect(result.prompts).toEqual([]);
  });

  it('rejects an unknown target', async () => {
    await expect(runCli(workspace, ['search', 'pipelines', '-t', 'plans'])).rejects.toThrow(ValidationError);
  });

  it('turns FTS5 syntax errors into validation errors', async () => {
    await expect(runCli(workspace, ['search', '"unterminated'])).rejects.toThrow('Invalid search query: "unterminated');
  });
});
