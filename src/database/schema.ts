/**
 * Database Schema Types
 *
 * TypeScript shapes of the SQLite tables created by migrate.ts.
 * Row types are inferred from the zod schemas in validation.ts; this file
 * holds the write-side inputs.
 */

/** How a prompt reference was produced */
export type ReferenceClass = 'embedded' | 'reference';

/** What a prompt reference points at */
export type ReferenceType = 'prompt' | 'fragment';

/**
 * Columns written when a skill is inserted or updated.
 * id and timestamps are managed by the operations layer.
 */
export interface SkillInput {
  path: string;
  category: string;
  name: string;
  title: string | null;
  description: string | null;
  content: string;
  file_hash: string;
  size_bytes: number;
  token_count: number;
}

/**
 * Columns written when a prompt is inserted or updated.
 */
export interface PromptInput {
  name: string;
  path: string;
  title: string | null;
  author: string | null;
  description: string | null;
  content: string;
  file_hash: string;
  size_bytes: number;
  token_count: number;
}

export interface FragmentInput {
  name: string;
  title: string;
  description: string | null;
}

export interface PromptReferenceInput {
  sourcePromptId: number;
  targetFragmentId: number;
  referenceClass: ReferenceClass;
  position: number;
}
