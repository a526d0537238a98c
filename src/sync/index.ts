/**
 * Sync Module
 *
 * File-to-database synchronization for skills, prompts and prompt fragments.
 */

export {
  computeHash,
  extractFrontmatter,
  frontmatterString,
  classifyPath,
  estimateTokens,
  FRONTMATTER_DELIMITER,
  UNCATEGORIZED,
  type Frontmatter,
  type FrontmatterResult,
  type PathClassification,
} from './metadata.js';

export { scanFiles, scanSkillFiles, scanPromptFiles, scanPromptConfigFiles } from './scanner.js';

export {
  parseSkillFile,
  parsePromptConfigFile,
  parsePromptFromConfig,
  parsePromptFile,
  type SkillParseOptions,
} from './parser.js';

export { upsertDocument, syncSkill, syncPromptFromConfig, syncPromptFile } from './upsert.js';

export {
  syncPromptFragments,
  embeddedFragmentName,
  referenceFragmentName,
  EMBEDDED_REFERENCE_POSITION,
  REFERENCE_POSITION_BASE,
} from './fragments.js';

export { syncAll, resolveSyncPaths, countOutcomes, type SyncOptions } from './orchestrator.js';

export type {
  DocumentKind,
  SyncStatus,
  SyncOutcome,
  OutcomeCounts,
  SyncPaths,
  PromptConfig,
  FragmentSyncResult,
  SyncSummary,
} from './types.js';
