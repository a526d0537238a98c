/**
 * Sync Orchestrator
 *
 * Drives the three sync phases:
 * 1. skills from `<root>/<skills_dir>`
 * 2. prompts from `<root>/<prompt_configs_dir>/*.yaml` (content in
 *    `<root>/<prompts_dir>/<name>.md`), then standalone prompt files no
 *    config claims; a name already synced in the run is an error
 * 3. fragments and references declared by each prompt config
 *
 * A failing document or config never stops the remaining work.
 */

import { basename, extname, resolve } from 'node:path';
import { syncPromptFragments } from './fragments.js';
import { parsePromptConfigFile } from './parser.js';
import { scanPromptConfigFiles, scanPromptFiles, scanSkillFiles } from './scanner.js';
import { syncPromptFile, syncPromptFromConfig, syncSkill } from './upsert.js';
import type { OutcomeCounts, PromptConfig, SyncOutcome, SyncPaths, SyncSummary } from './types.js';
import { resolveProjectRoot, type Config } from '../config/index.js';
import { DatabaseOperations, type Clock, type DatabaseHandle } from '../database/index.js';
import type { Logger } from '../utils/logger.js';

export interface SyncOptions {
  /** Directory used when `project.root` is not configured */
  cwd?: string;
  /** Clock for created_at/updated_at */
  now?: Clock;
}

/**
 * Absolute directories the sync reads, from config.
 */
export function resolveSyncPaths(config: Config, cwd: string = process.cwd()): SyncPaths {
  const projectRoot = resolveProjectRoot(config, cwd);

  return {
    projectRoot,
    skillsDir: resolve(projectRoot, config.project.skills_dir),
    promptsDir: resolve(projectRoot, config.project.prompts_dir),
    promptConfigsDir: resolve(projectRoot, config.project.prompt_configs_dir),
  };
}

export function countOutcomes(outcomes: SyncOutcome[]): OutcomeCounts {
  const counts: OutcomeCounts = { inserted: 0, updated: 0, skipped: 0, error: 0, total: 0 };

  for (const outcome of outcomes) {
    counts[outcome.status]++;
    counts.total++;
  }

  return counts;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function loadPromptConfigs(
  configPaths: string[],
  logger: Logger
): { configs: PromptConfig[]; failures: SyncOutcome[] } {
  const configs: PromptConfig[] = [];
  const failures: SyncOutcome[] = [];

  for (const configPath of configPaths) {
    try {
      configs.push(parsePromptConfigFile(configPath));
    } catch (error) {
      const message = errorMessage(error);
      logger.event('sync.document', 'error', `Failed to read prompt config ${configPath}: ${message}`, {
        kind: 'prompt',
        path: configPath,
        status: 'error',
      });
      failures.push({
        status: 'error',
        kind: 'prompt',
        key: basename(configPath, extname(configPath)),
        path: configPath,
        error: message,
      });
    }
  }

  return { configs, failures };
}

function duplicatePrompt(name: string, path: string, firstPath: string, logger: Logger): SyncOutcome {
  const message = `duplicate prompt name, already synced from ${firstPath}`;
  logger.event('sync.document', 'error', `Failed to sync prompt ${path}: ${message}`, {
    kind: 'prompt',
    key: name,
    path,
    status: 'error',
  });
  return { status: 'error', kind: 'prompt', key: name, path, error: message };
}

/**
 * Sync every skill, prompt and prompt fragment under the project root.
 *
 * @example
 * ```ts
 * const summary = withDatabase(dbPath, (db) => syncAll(db, config, logger));
 * console.log(summary.skills.inserted);
 * ```
 */
export function syncAll(
  db: DatabaseHandle,
  config: Config,
  logger: Logger,
  options: SyncOptions = {}
): SyncSummary {
  const startTime = performance.now();
  const ops = new DatabaseOperations(db, options.now);
  const paths = resolveSyncPaths(config, options.cwd);
  const skillOptions = { projectRoot: paths.projectRoot, skillsDir: paths.skillsDir };

  // Phase 1: skills
  const skillFiles = scanSkillFiles(paths.skillsDir);
  logger.info(`Syncing ${skillFiles.length} skills from ${paths.skillsDir}...`, {
    phase: 'skills',
    count: skillFiles.length,
  });
  const skillOutcomes = skillFiles.map((file) => syncSkill(ops, file, skillOptions, logger));

  // Phase 2: prompts
  const configFiles = scanPromptConfigFiles(paths.promptConfigsDir);
  logger.info(`Syncing ${configFiles.length} prompt configs from ${paths.promptConfigsDir}...`, {
    phase: 'prompts',
    count: configFiles.length,
  });
  const loaded = loadPromptConfigs(configFiles, logger);
  const promptOutcomes = [...loaded.failures];

  // Prompts are keyed by name; the first file to claim a name wins
  const syncedFrom = new Map<string, string>();
  const configs: PromptConfig[] = [];
  for (const promptConfig of loaded.configs) {
    const firstPath = syncedFrom.get(promptConfig.name);
    if (firstPath !== undefined) {
      promptOutcomes.push(duplicatePrompt(promptConfig.name, promptConfig.path, firstPath, logger));
      continue;
    }
    syncedFrom.set(promptConfig.name, promptConfig.path);
    configs.push(promptConfig);
    promptOutcomes.push(syncPromptFromConfig(ops, promptConfig, paths.promptsDir, logger));
  }

  const claimed = new Set(configs.map((promptConfig) => promptConfig.name));
  const standalone = scanPromptFiles(paths.promptsDir).filter(
    (file) => !claimed.has(basename(file, extname(file)))
  );
  if (standalone.length > 0) {
    logger.info(`Syncing ${standalone.length} standalone prompts from ${paths.promptsDir}...`, {
      phase: 'prompts',
      count: standalone.length,
    });
  }
  for (const file of standalone) {
    const name = basename(file, extname(file));
    const firstPath = syncedFrom.get(name);
    if (firstPath !== undefined) {
      promptOutcomes.push(duplicatePrompt(name, file, firstPath, logger));
      continue;
    }
    syncedFrom.set(name, file);
    promptOutcomes.push(syncPromptFile(ops, file, logger));
  }

  // Phase 3: fragments and references
  const fragments = { configs: configs.length, embedded: 0, references: 0, missing: 0 };
  const fragmentErrors: string[] = [];
  for (const promptConfig of configs) {
    const result = syncPromptFragments(ops, promptConfig, paths.projectRoot, logger);
    fragments.embedded += result.embedded;
    fragments.references += result.references;
    fragments.missing += result.missing;
    fragmentErrors.push(...result.errors);
  }

  const errors = [
    ...[...skillOutcomes, ...promptOutcomes]
      .filter((outcome) => outcome.status === 'error')
      .map((outcome) => `${outcome.path}: ${outcome.error ?? 'unknown error'}`),
    ...fragmentErrors,
  ];

  const summary: SyncSummary = {
    type: 'sync-summary',
    projectRoot: paths.projectRoot,
    skills: countOutcomes(skillOutcomes),
    prompts: countOutcomes(promptOutcomes),
    fragments,
    errors,
    durationMs: Math.round(performance.now() - startTime),
  };

  logger.event('sync.complete', 'success', 'Sync complete', {
    skills: summary.skills.total,
    prompts: summary.prompts.total,
    errors: errors.length,
  });

  return summary;
}
