/**
 * Prompt Commands
 *
 *   skillbook prompt search <query> [-n max]
 *   skillbook prompt list [--limit n] [--offset n]
 *   skillbook prompt show <name>
 */

import { Command } from 'commander';
import type { CommandContext } from '../types.js';
import { parseOptions, PromptListOptionsSchema, PromptSearchOptionsSchema } from '../validation.js';
import { withCommandDatabase } from '../utils/database.js';
import { getPromptWithSkills, listPrompts, searchPrompts, validateQuery } from '../../search/index.js';
import { NotFoundError } from '../../errors/index.js';
import type { PromptListResult, PromptResult, PromptSearchResults } from '../../output/index.js';

function createPromptSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'FTS5 query')
    .description('Full-text search over prompts')
    .option('-n, --max-results <n>', 'Maximum number of results')
    .action((query: string, cmdOptions: Record<string, unknown>) => {
      const context = getContext();
      const options = parseOptions(PromptSearchOptionsSchema, cmdOptions);
      validateQuery(query);

      const prompts = withCommandDatabase(context, (db) =>
        searchPrompts(db, query, {
          maxResults: options.maxResults ?? context.config.search.max_results,
          snippetTokens: context.config.search.snippet_tokens,
        })
      );

      const result: PromptSearchResults = {
        type: 'prompt-search-results',
        query,
        count: prompts.length,
        prompts,
      };
      context.output(result);
    });
}

function createPromptListCommand(getContext: () => CommandContext): Command {
  return new Command('list')
    .alias('ls')
    .description('List prompts ordered by name')
    .option('--limit <n>', 'Maximum number of prompts (default: 100)')
    .option('--offset <n>', 'Skip this many prompts')
    .action((cmdOptions: Record<string, unknown>) => {
      const context = getContext();
      const options = parseOptions(PromptListOptionsSchema, cmdOptions);

      const prompts = withCommandDatabase(context, (db) => listPrompts(db, options));

      const result: PromptListResult = { type: 'prompt-list', count: prompts.length, prompts };
      context.output(result);
    });
}

function createPromptShowCommand(getContext: () => CommandContext): Command {
  return new Command('show')
    .argument('<name>', 'Prompt name')
    .description('Show a prompt with its embedded and referenced skills')
    .action((name: string) => {
      const context = getContext();

      const prompt = withCommandDatabase(context, (db) => getPromptWithSkills(db, name));
      if (!prompt) {
        throw new NotFoundError('prompt', name);
      }

      const result: PromptResult = { type: 'prompt', data: prompt };
      context.output(result);
    });
}

/**
 * Create the prompt command group
 */
export function createPromptCommand(getContext: () => CommandContext): Command {
  return new Command('prompt')
    .description('Search, list and show prompts')
    .addCommand(createPromptSearchCommand(getContext))
    .addCommand(createPromptListCommand(getContext))
    .addCommand(createPromptShowCommand(getContext));
}
