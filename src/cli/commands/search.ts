/**
 * Search Command
 *
 * Searches skills and prompts in one call:
 *   skillbook search "pipelines"                 Both kinds
 *   skillbook search "pipe*" -t skills -c language
 *   skillbook search "review" -t prompts -n 5
 */

import { Command } from 'commander';
import type { CommandContext } from '../types.js';
import { parseOptions, SearchOptionsSchema } from '../validation.js';
import { withCommandDatabase } from '../utils/database.js';
import { searchAll, searchPrompts, searchSkills, validateQuery, type SearchAllResult } from '../../search/index.js';
import type { SearchResults } from '../../output/index.js';

/**
 * Create the search command
 */
export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'FTS5 query')
    .description('Search skills and prompts')
    .option('-t, --target <target>', 'What to search: skills, prompts or all', 'all')
    .option('-c, --category <category>', 'Only match skills in this category')
    .option('-n, --max-results <n>', 'Maximum number of results per kind')
    .action((query: string, cmdOptions: Record<string, unknown>) => {
      const context = getContext();
      const options = parseOptions(SearchOptionsSchema, cmdOptions);
      validateQuery(query);

      const searchOptions = {
        maxResults: options.maxResults ?? context.config.search.max_results,
        snippetTokens: context.config.search.snippet_tokens,
      };
      const skillOptions = { ...searchOptions, category: options.category };

      const found = withCommandDatabase(context, (db): SearchAllResult => {
        switch (options.target) {
          case 'skills':
            return { skills: searchSkills(db, query, skillOptions), prompts: [] };
          case 'prompts':
            return { skills: [], prompts: searchPrompts(db, query, searchOptions) };
          case 'all':
            return searchAll(db, query, skillOptions);
        }
      });
      context.logger.debug(`Found ${found.skills.length} skills and ${found.prompts.length} prompts`, {
        query,
        target: options.target,
      });

      const result: SearchResults = {
        type: 'search-results',
        query,
        target: options.target,
        category: options.category ?? null,
        ...found,
      };
      context.output(result);
    });
}
