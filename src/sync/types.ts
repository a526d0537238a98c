/**
 * Sync Types
 *
 * Shared types for the file-to-database sync pipeline.
 */

export type DocumentKind = 'skill' | 'prompt';

export type SyncStatus = 'inserted' | 'updated' | 'skipped' | 'error';

/**
 * Result of syncing one document. Errors are values, not exceptions.
 */
export interface SyncOutcome {
  status: SyncStatus;
  kind: DocumentKind;
  /** Identity key: path for skills, name for prompts */
  key: string;
  /** File the document was read from */
  path: string;
  error?: string;
}

export interface OutcomeCounts {
  inserted: number;
  updated: number;
  skipped: number;
  error: number;
  total: number;
}

/**
 * Absolute locations the orchestrator reads from.
 */
export interface SyncPaths {
  projectRoot: string;
  skillsDir: string;
  promptsDir: string;
  promptConfigsDir: string;
}

/**
 * A parsed prompt configuration descriptor (`prompt_configs/<file>.yaml`).
 */
export interface PromptConfig {
  path: string;
  /** Config filename without the .yaml extension */
  fileName: string;
  /** `name` key, falling back to fileName */
  name: string;
  title: string | null;
  description: string | null;
  author: string | null;
  date: string | null;
  /** Skill paths relative to the project root, inlined into the prompt */
  fragments: string[];
  /** Skill paths relative to the project root, listed as "see also" */
  references: string[];
  /** Raw YAML text */
  raw: string;
}

export interface FragmentSyncResult {
  prompt: string;
  /** Skills placed in the embedded fragment */
  embedded: number;
  /** Reference fragments written */
  references: number;
  /** Skill paths with no synced skill row */
  missing: number;
  errors: string[];
}

export interface SyncSummary {
  type: 'sync-summary';
  projectRoot: string;
  skills: OutcomeCounts;
  prompts: OutcomeCounts;
  fragments: {
    configs: number;
    embedded: number;
    references: number;
    missing: number;
  };
  /** One line per failed document or association */
  errors: string[];
  durationMs: number;
}
