/**
 * Search Module Types
 */

import type {
  CategoryCountRow,
  PromptRow,
  PromptSearchRow,
  SkillSearchRow,
} from '../database/index.js';

export const DEFAULT_MAX_RESULTS = 50;
export const DEFAULT_SNIPPET_TOKENS = 30;
export const DEFAULT_LIST_LIMIT = 100;

/** FTS5 refuses snippets longer than this */
export const MAX_SNIPPET_TOKENS = 64;

export interface SearchOptions {
  /** Result cap (default: 50) */
  maxResults?: number;
  /** Tokens of context in each snippet (default: 30) */
  snippetTokens?: number;
}

export interface SkillSearchOptions extends SearchOptions {
  /** Exact category to restrict matches to */
  category?: string;
}

export interface PageOptions {
  limit?: number;
  offset?: number;
}

export interface ListSkillsOptions extends PageOptions {
  category?: string;
}

export type SearchTarget = 'skills' | 'prompts' | 'all';

export interface SearchAllResult {
  skills: SkillSearchRow[];
  prompts: PromptSearchRow[];
}

/**
 * A skill attached to a prompt through a fragment.
 * `position` is the 1-based place in its list.
 */
export interface PromptSkillEntry {
  position: number;
  name: string;
  category: string;
  title: string | null;
  path: string;
  /** Fragment the skill was reached through */
  fragment: string;
}

export interface PromptWithSkills extends PromptRow {
  embedded: PromptSkillEntry[];
  references: PromptSkillEntry[];
}

export interface CatalogStats {
  skills: number;
  prompts: number;
  categories: number;
  totalSizeBytes: number;
  totalTokens: number;
  categoryBreakdown: CategoryCountRow[];
}
