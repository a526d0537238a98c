/**
 * Test Utilities - Sample Project
 *
 * A small skills/prompts tree used by sync, search and CLI tests.
 *
 * After a sync of this project:
 * - skills: language/arrows, libraries/data_validation/schemas,
 *   uncategorized/testing
 * - prompts: reviewer (from prompt_configs/reviewer.yaml) and scratch
 *   (standalone file)
 * - reviewer embeds arrows and schemas, references testing, and lists one
 *   missing skill path
 */

import type { TestWorkspace } from './workspace.js';
import { openDatabase, runMigrations, type DatabaseHandle } from '../database/index.js';
import { syncAll } from '../sync/index.js';
import { createSilentLogger } from '../utils/logger.js';

export const SAMPLE_FILES: Record<string, string> = {
  'skills/language/arrows.md': [
    '---',
    'title: Threading Arrows',
    'description: Pipeline helpers',
    '---',
    '# Threading',
    '',
    'Use the thread-first macro to build data pipelines.',
    '',
  ].join('\n'),
  'skills/libraries/data_validation/schemas.md': [
    '---',
    'title: Schema Validation',
    'description: Validate maps at boundaries',
    '---',
    '# Schemas',
    '',
    'Describe maps with schemas and validate incoming payloads.',
    '',
  ].join('\n'),
  'skills/testing.md': ['# Testing', '', 'Write small tests around pure functions.', ''].join('\n'),
  'prompts/reviewer.md': ['You are a careful code reviewer.', 'Point out risky changes.', ''].join('\n'),
  'prompts/scratch.md': [
    '---',
    'title: Scratch Pad',
    'author: Test Author',
    'description: Standalone prompt',
    '---',
    'A standalone prompt for experiments.',
    '',
  ].join('\n'),
  'prompt_configs/reviewer.yaml': [
    'name: reviewer',
    'title: Code Reviewer',
    'description: Reviews pull requests',
    'author: Test Author',
    'fragments:',
    '  - skills/language/arrows.md',
    '  - skills/libraries/data_validation/schemas.md',
    '  - skills/missing.md',
    'references:',
    '  - skills/testing.md',
    '',
  ].join('\n'),
};

/**
 * Write the sample project into the workspace's project root.
 */
export function createSampleProject(workspace: TestWorkspace): void {
  for (const [relativePath, content] of Object.entries(SAMPLE_FILES)) {
    workspace.write(relativePath, content);
  }
}

/**
 * Write the sample project, sync it, and return the open database.
 * The caller closes the handle.
 */
export function createSyncedDatabase(workspace: TestWorkspace): DatabaseHandle {
  createSampleProject(workspace);
  const db = openDatabase(workspace.dbPath);
  runMigrations(db);
  syncAll(db, workspace.config(), createSilentLogger());
  return db;
}
