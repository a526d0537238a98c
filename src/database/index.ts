/**
 * Database Module
 *
 * SQLite storage for skills, prompts, fragments and their full-text indexes.
 *
 * @example
 * ```ts
 * import { withDatabase, DatabaseOperations } from './database/index.js';
 *
 * withDatabase(dbPath, (db) => {
 *   const ops = new DatabaseOperations(db);
 *   return ops.getPromptByName('reviewer');
 * });
 * ```
 */

export {
  openDatabase,
  closeDatabase,
  withDatabase,
  assertMigrated,
  type DatabaseHandle,
  type WithDatabaseOptions,
} from './connection.js';

export {
  runMigrations,
  hasPendingMigrations,
  getAppliedMigrations,
  getMigrationNames,
  resetDatabase,
  type MigrationResult,
} from './migrate.js';

export type {
  ReferenceClass,
  ReferenceType,
  SkillInput,
  PromptInput,
  FragmentInput,
  PromptReferenceInput,
} from './schema.js';

export {
  SkillRowSchema,
  PromptRowSchema,
  FragmentRowSchema,
  PromptReferenceRowSchema,
  ReferencedSkillRowSchema,
  SkillSearchRowSchema,
  PromptSearchRowSchema,
  CategoryCountRowSchema,
  CountRowSchema,
  TotalsRowSchema,
  type SkillRow,
  type PromptRow,
  type FragmentRow,
  type PromptReferenceRow,
  type ReferencedSkillRow,
  type SkillSearchRow,
  type PromptSearchRow,
  type CategoryCountRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';

export { DatabaseOperations, type Clock } from './operations.js';
