/**
 * Change-Detecting Upserter
 *
 * Writes a document only when its hash differs from the stored one.
 * Skills are keyed by path, prompts by name.
 */

import { basename, extname } from 'node:path';
import {
  parsePromptFile,
  parsePromptFromConfig,
  parseSkillFile,
  type SkillParseOptions,
} from './parser.js';
import type { DocumentKind, PromptConfig, SyncOutcome, SyncStatus } from './types.js';
import type { DatabaseOperations, PromptInput, SkillInput } from '../database/index.js';
import type { Logger } from '../utils/logger.js';

type WriteStatus = Exclude<SyncStatus, 'error'>;

interface StoredDocument {
  id: number;
  file_hash: string;
}

const STATUS_LABELS: Record<WriteStatus, string> = {
  inserted: 'Inserted',
  updated: 'Updated',
  skipped: 'Skipped (unchanged)',
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Insert when missing, update when the hash changed, otherwise do nothing.
 */
export function upsertDocument<T extends { file_hash: string }>(
  existing: StoredDocument | undefined,
  input: T,
  write: { insert: (input: T) => number; update: (id: number, input: T) => void }
): WriteStatus {
  if (!existing) {
    write.insert(input);
    return 'inserted';
  }

  if (existing.file_hash === input.file_hash) {
    return 'skipped';
  }

  write.update(existing.id, input);
  return 'updated';
}

/**
 * Run one document sync, converting any exception into an `error` outcome.
 */
function runSync(
  kind: DocumentKind,
  key: string,
  path: string,
  logger: Logger,
  sync: () => WriteStatus
): SyncOutcome {
  try {
    const status = sync();
    logger.event(
      'sync.document',
      status === 'skipped' ? 'debug' : 'info',
      `  ${STATUS_LABELS[status]}: ${kind === 'skill' ? path : key}`,
      { kind, key, path, status }
    );
    return { status, kind, key, path };
  } catch (error) {
    const message = errorMessage(error);
    logger.event('sync.document', 'error', `Failed to sync ${kind} ${path}: ${message}`, {
      kind,
      key,
      path,
      status: 'error',
    });
    return { status: 'error', kind, key, path, error: message };
  }
}

function writeSkill(ops: DatabaseOperations, input: SkillInput): WriteStatus {
  return upsertDocument(ops.getSkillByPath(input.path), input, {
    insert: (row) => ops.insertSkill(row),
    update: (id, row) => ops.updateSkill(id, row),
  });
}

function writePrompt(ops: DatabaseOperations, input: PromptInput): WriteStatus {
  return upsertDocument(ops.getPromptByName(input.name), input, {
    insert: (row) => ops.insertPrompt(row),
    update: (id, row) => ops.updatePrompt(id, row),
  });
}

export function syncSkill(
  ops: DatabaseOperations,
  filePath: string,
  options: SkillParseOptions,
  logger: Logger
): SyncOutcome {
  return runSync('skill', filePath, filePath, logger, () =>
    writeSkill(ops, parseSkillFile(filePath, options))
  );
}

export function syncPromptFromConfig(
  ops: DatabaseOperations,
  config: PromptConfig,
  promptsDir: string,
  logger: Logger
): SyncOutcome {
  return runSync('prompt', config.name, config.path, logger, () =>
    writePrompt(ops, parsePromptFromConfig(config, promptsDir))
  );
}

export function syncPromptFile(
  ops: DatabaseOperations,
  filePath: string,
  logger: Logger
): SyncOutcome {
  const name = basename(filePath, extname(filePath));
  return runSync('prompt', name, filePath, logger, () => writePrompt(ops, parsePromptFile(filePath)));
}
