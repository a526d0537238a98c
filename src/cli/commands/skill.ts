/**
 * Skill Commands
 *
 *   skillbook skill search <query> [-c category] [-n max]
 *   skillbook skill list [-c category] [--limit n] [--offset n]
 *   skillbook skill show <name> [-c category]
 */

import { Command } from 'commander';
import type { CommandContext } from '../types.js';
import {
  parseOptions,
  SkillListOptionsSchema,
  SkillSearchOptionsSchema,
  SkillShowOptionsSchema,
} from '../validation.js';
import { withCommandDatabase } from '../utils/database.js';
import { getSkillByName, listSkills, searchSkills, validateQuery } from '../../search/index.js';
import { NotFoundError } from '../../errors/index.js';
import type { SkillListResult, SkillResult, SkillSearchResults } from '../../output/index.js';

function createSkillSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'FTS5 query (words, "phrases", prefix*, AND/OR/NOT)')
    .description('Full-text search over skills')
    .option('-c, --category <category>', 'Only match skills in this category')
    .option('-n, --max-results <n>', 'Maximum number of results')
    .action((query: string, cmdOptions: Record<string, unknown>) => {
      const context = getContext();
      const options = parseOptions(SkillSearchOptionsSchema, cmdOptions);
      validateQuery(query);

      const skills = withCommandDatabase(context, (db) =>
        searchSkills(db, query, {
          category: options.category,
          maxResults: options.maxResults ?? context.config.search.max_results,
          snippetTokens: context.config.search.snippet_tokens,
        })
      );
      context.logger.debug(`Found ${skills.length} skills`, { query });

      const result: SkillSearchResults = {
        type: 'skill-search-results',
        query,
        category: options.category ?? null,
        count: skills.length,
        skills,
      };
      context.output(result);
    });
}

function createSkillListCommand(getContext: () => CommandContext): Command {
  return new Command('list')
    .alias('ls')
    .description('List skills ordered by category and name')
    .option('-c, --category <category>', 'Only list skills in this category')
    .option('--limit <n>', 'Maximum number of skills (default: 100)')
    .option('--offset <n>', 'Skip this many skills')
    .action((cmdOptions: Record<string, unknown>) => {
      const context = getContext();
      const options = parseOptions(SkillListOptionsSchema, cmdOptions);

      const skills = withCommandDatabase(context, (db) => listSkills(db, options));

      const result: SkillListResult = {
        type: 'skill-list',
        count: skills.length,
        category: options.category ?? null,
        skills,
      };
      context.output(result);
    });
}

function createSkillShowCommand(getContext: () => CommandContext): Command {
  return new Command('show')
    .argument('<name>', 'Skill name (file name without .md)')
    .description('Show a skill with its full content')
    .option('-c, --category <category>', 'Category, when the name exists in several')
    .action((name: string, cmdOptions: Record<string, unknown>) => {
      const context = getContext();
      const options = parseOptions(SkillShowOptionsSchema, cmdOptions);

      const skill = withCommandDatabase(context, (db) => getSkillByName(db, name, options.category));
      if (!skill) {
        throw new NotFoundError('skill', name, options.category);
      }

      const result: SkillResult = { type: 'skill', data: skill };
      context.output(result);
    });
}

/**
 * Create the skill command group
 */
export function createSkillCommand(getContext: () => CommandContext): Command {
  return new Command('skill')
    .description('Search, list and show skills')
    .addCommand(createSkillSearchCommand(getContext))
    .addCommand(createSkillListCommand(getContext))
    .addCommand(createSkillShowCommand(getContext));
}
