/**
 * Tests for the skill command group
 */

import { existsSync } from 'node:fs';
import chalk from 'chalk';
import {
  createSampleProject,
  createTestWorkspace,
  runCli,
  runCliJson,
  type TestWorkspace,
} from '../../../test-utils/index.js';
import { SkillListResultSchema, SkillResultSchema, SkillSearchResultsSchema } from '../../../output/index.js';
import { NotFoundError, ValidationError } from '../../../errors/index.js';

describe('skill command', () => {
  let workspace: TestWorkspace;

  beforeEach(async () => {
    workspace = createTestWorkspace();
    createSampleProject(workspace);
    await runCli(workspace, ['db', 'sync']);
  });

  afterEach(() => {
    workspace.cleanup();
  });

  describe('skill search', () => {
    it('finds skills by content with a highlighted snippet', async () => {
      const result = await runCliJson(workspace, ['skill', 'search', 'pipelines'], SkillSearchResultsSchema);

      expect(result.query).toBe('pipelines');
      expect(result.category).toBeNull();
      expect(result.count).toBe(1);
      expect(result.skills[0]?.name).toBe('arrows');
      expect(result.skills[0]?.snippet).toContain('[pipelines]');
    });

    it('restricts matches to a category', async () => {
      const result = await runCliJson(
        workspace,
        ['skill', 'search', 'pipelines', '-c', 'libraries/data_validation'],
        SkillSearchResultsSchema
      );

      expect(result.category).toBe('libraries/data_validation');
      expect(result.count).toBe(0);
    });

    it('caps results with --max-results', async () => {
      const result = await runCliJson(workspace, ['skill', 'search', 'validate OR pipelines', '-n', '1'], SkillSearchResultsSchema);

      expect(result.count).toBe(1);
    });

    it('rejects a non-positive --max-results', async () => {
      await expect(runCli(workspace, ['skill', 'search', 'pipelines', '-n', '0'])).rejects.toThrow(ValidationError);
    });

    it('rejects an empty query', async () => {
      await expect(runCli(workspace, ['skill', 'search', '  '])).rejects.toThrow('Search query cannot be empty');
    });

    it('rejects an empty query before creating the database', async () => {
      const fresh = createTestWorkspace();
      try {
        await expect(runCli(fresh, ['skill', 'search', '  '])).rejects.toThrow(ValidationError);
        expect(existsSync(fresh.dbPath)).toBe(false);
      } finally {
        fresh.cleanup();
      }
    });
  });

  describe('skill list', () => {
    it('lists every skill ordered by category and name', async () => {
      const result = await runCliJson(workspace, ['skill', 'list'], SkillListResultSchema);

      expect(result.count).toBe(3);
      expect(result.skills.map((skill) => skill.name)).toEqual(['arrows', 'schemas', 'testing']);
    });

    it('filters by category', async () => {
      const result = await runCliJson(workspace, ['skill', 'list', '-c', 'language'], SkillListResultSchema);

      expect(result.category).toBe('language');
      expect(result.skills.map((skill) => skill.name)).toEqual(['arrows']);
    });

    it('pages with --limit and --offset', async () => {
      const result = await runCliJson(workspace, ['skill', 'list', '--limit', '1', '--offset', '1'], SkillListResultSchema);

      expect(result.skills.map((skill) => skill.name)).toEqual(['schemas']);
    });

    it('accepts the ls alias', async () => {
      const result = await runCliJson(workspace, ['skill', 'ls'], SkillListResultSchema);

      expect(result.count).toBe(3);
    });
  });

  describe('skill show', () => {
    it('returns the full skill row', async () => {
      const result = await runCliJson(workspace, ['skill', 'show', 'arrows'], SkillResultSchema);

      expect(result.data.title).toBe('Threading Arrows');
      expect(result.data.category).toBe('language');
      expect(result.data.content).toBe('# Threading\n\nUse the thread-first macro to build data pipelines.\n');
    });

    it('fails for an unknown skill', async () => {
      await expect(runCli(workspace, ['skill', 'show', 'nothing'])).rejects.toThrow(NotFoundError);
    });

    it('fails when the category does not match', async () => {
      await expect(runCli(workspace, ['skill', 'show', 'arrows', '-c', 'testing'])).rejects.toThrow(
        'Skill not found: arrows in category testing'
      );
    });

    it('prints the skill in human mode', async () => {
      const level = chalk.level;
      chalk.level = 0;
      try {
        const { stdout } = await runCli(workspace, ['skill', 'show', 'arrows', '--human']);

        expect(stdout.split('\n').slice(0, 5)).toEqual(['', 'arrows', 'Threading Arrows', '', 'Category: language']);
      } finally {
        chalk.level = level;
      }
    });
  });
});
