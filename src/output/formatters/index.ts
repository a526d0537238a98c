/**
 * Built-in Formatters
 */

import type { OutputRegistry } from '../registry.js';
import {
  DbInitResultSchema,
  DbResetResultSchema,
  PromptListResultSchema,
  PromptResultSchema,
  PromptSearchResultsSchema,
  SearchResultsSchema,
  SkillListResultSchema,
  SkillResultSchema,
  SkillSearchResultsSchema,
  StatsResultSchema,
  SyncSummaryResultSchema,
} from '../results.js';
import { formatSkill, formatSkillList, formatSkillSearchResults } from './skills.js';
import { formatPrompt, formatPromptList, formatPromptSearchResults } from './prompts.js';
import { formatSearchResults, formatStats } from './catalog.js';
import { formatDbInit, formatDbReset, formatSyncSummary } from './database.js';

export { formatSkill, formatSkillList, formatSkillSearchResults } from './skills.js';
export { formatPrompt, formatPromptList, formatPromptSearchResults, CONTENT_PREVIEW_LENGTH } from './prompts.js';
export { formatSearchResults, formatStats } from './catalog.js';
export { formatDbInit, formatDbReset, formatSyncSummary } from './database.js';

/**
 * Register the human formatters for every result the CLI produces.
 */
export function registerBuiltinFormatters(registry: OutputRegistry): OutputRegistry {
  return registry
    .register('skill', { schema: SkillResultSchema, human: formatSkill })
    .register('skill-list', { schema: SkillListResultSchema, human: formatSkillList })
    .register('skill-search-results', { schema: SkillSearchResultsSchema, human: formatSkillSearchResults })
    .register('prompt', { schema: PromptResultSchema, human: formatPrompt })
    .register('prompt-list', { schema: PromptListResultSchema, human: formatPromptList })
    .register('prompt-search-results', { schema: PromptSearchResultsSchema, human: formatPromptSearchResults })
    .register('search-results', { schema: SearchResultsSchema, human: formatSearchResults })
    .register('stats', { schema: StatsResultSchema, human: formatStats })
    .register('sync-summary', { schema: SyncSummaryResultSchema, human: formatSyncSummary })
    .register('db-init', { schema: DbInitResultSchema, human: formatDbInit })
    .register('db-reset', { schema: DbResetResultSchema, human: formatDbReset });
}
