/**
 * Search Module
 *
 * FTS5 search, catalog listing and statistics over the synced database.
 *
 * @example
 * ```ts
 * import { searchSkills, getStats } from './search/index.js';
 *
 * const hits = searchSkills(db, 'schemas', { maxResults: 10 });
 * const { skills, prompts } = getStats(db);
 * ```
 */

export { searchSkills, searchPrompts, searchAll, validateQuery } from './query.js';

export {
  listSkills,
  listPrompts,
  listCategories,
  getSkillByName,
  getPromptByName,
  getPromptWithSkills,
} from './catalog.js';

export { getStats } from './stats.js';

export {
  DEFAULT_MAX_RESULTS,
  DEFAULT_SNIPPET_TOKENS,
  DEFAULT_LIST_LIMIT,
  MAX_SNIPPET_TOKENS,
} from './types.js';

export type {
  SearchOptions,
  SkillSearchOptions,
  PageOptions,
  ListSkillsOptions,
  SearchTarget,
  SearchAllResult,
  PromptSkillEntry,
  PromptWithSkills,
  CatalogStats,
} from './types.js';
