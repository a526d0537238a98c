/**
 * Fragment & Reference Sync
 *
 * Rebuilds the prompt -> fragment -> skill links declared by a prompt config.
 * Both phases delete the rows they own and write them again, so running
 * them twice gives the same result.
 *
 * Layout written for prompt `reviewer`:
 * - fragment `reviewer-embedded` with the `fragments` skills at 0..n,
 *   linked from the prompt at position 1 (class `embedded`)
 * - one fragment `reviewer-ref-<category>/<skill>` per `references` entry,
 *   linked at position 100 + index (class `reference`)
 */

import { resolve } from 'node:path';
import type { FragmentSyncResult, PromptConfig } from './types.js';
import type { DatabaseOperations, PromptRow, SkillRow } from '../database/index.js';
import type { Logger } from '../utils/logger.js';

/** Position of the embedded-fragment reference */
export const EMBEDDED_REFERENCE_POSITION = 1;

/** First position of reference-only fragments */
export const REFERENCE_POSITION_BASE = 100;

export function embeddedFragmentName(promptName: string): string {
  return `${promptName}-embedded`;
}

/** Skill names repeat across categories, so the category is part of the name */
export function referenceFragmentName(promptName: string, skill: Pick<SkillRow, 'category' | 'name'>): string {
  return `${promptName}-ref-${skill.category}/${skill.name}`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function findSkill(
  ops: DatabaseOperations,
  projectRoot: string,
  relativePath: string
): SkillRow | undefined {
  return ops.getSkillByPath(resolve(projectRoot, relativePath));
}

function syncEmbedded(
  ops: DatabaseOperations,
  config: PromptConfig,
  prompt: PromptRow,
  projectRoot: string,
  logger: Logger,
  result: FragmentSyncResult
): void {
  const fragment = ops.ensureFragment({
    name: embeddedFragmentName(config.name),
    title: `${config.title ?? config.name} Embedded Skills`,
    description: `Embedded skills for ${config.name} prompt`,
  });

  ops.clearFragmentSkills(fragment.id);

  config.fragments.forEach((skillPath, index) => {
    const skill = findSkill(ops, projectRoot, skillPath);
    if (!skill) {
      result.missing++;
      logger.warn(`Skill not found: ${skillPath}`, { prompt: config.name, skillPath });
      return;
    }

    if (ops.addFragmentSkill(fragment.id, skill.id, index)) {
      result.embedded++;
    }
    logger.debug(`  Associated skill: ${config.name} -> ${skill.name} (position ${index})`);
  });

  ops.deletePromptReferences(prompt.id, 'embedded');
  ops.addFragmentReference({
    sourcePromptId: prompt.id,
    targetFragmentId: fragment.id,
    referenceClass: 'embedded',
    position: EMBEDDED_REFERENCE_POSITION,
  });
}

function syncReferences(
  ops: DatabaseOperations,
  config: PromptConfig,
  prompt: PromptRow,
  projectRoot: string,
  logger: Logger,
  result: FragmentSyncResult
): void {
  // Removed entries must disappear, so this runs even for an empty list
  ops.deletePromptReferences(prompt.id, 'reference');

  config.references.forEach((skillPath, index) => {
    const skill = findSkill(ops, projectRoot, skillPath);
    if (!skill) {
      result.missing++;
      logger.warn(`Referenced skill not found: ${skillPath}`, { prompt: config.name, skillPath });
      return;
    }

    const fragment = ops.ensureFragment({
      name: referenceFragmentName(config.name, skill),
      title: `Reference: ${skill.name}`,
      description: `Reference skill for ${config.name} prompt`,
    });

    ops.clearFragmentSkills(fragment.id);
    ops.addFragmentSkill(fragment.id, skill.id, 0);

    const position = REFERENCE_POSITION_BASE + index;
    ops.addFragmentReference({
      sourcePromptId: prompt.id,
      targetFragmentId: fragment.id,
      referenceClass: 'reference',
      position,
    });
    result.references++;
    logger.debug(`  Referenced skill: ${config.name} -> ${skill.name} (position ${position})`);
  });
}

/**
 * Rebuild the embedded fragment and reference fragments of one prompt.
 *
 * The prompt must already be synced; otherwise a warning is logged and
 * nothing is written. Each phase catches its own errors.
 */
export function syncPromptFragments(
  ops: DatabaseOperations,
  config: PromptConfig,
  projectRoot: string,
  logger: Logger
): FragmentSyncResult {
  const result: FragmentSyncResult = {
    prompt: config.name,
    embedded: 0,
    references: 0,
    missing: 0,
    errors: [],
  };

  const prompt = ops.getPromptByName(config.name);
  if (!prompt) {
    logger.warn(`Prompt '${config.name}' not found in database, skipping its fragments`, {
      prompt: config.name,
    });
    return result;
  }

  const phases = [
    { label: 'fragments', run: syncEmbedded },
    { label: 'references', run: syncReferences },
  ];

  for (const phase of phases) {
    try {
      phase.run(ops, config, prompt, projectRoot, logger, result);
    } catch (error) {
      const message = `Failed to sync ${phase.label} for prompt ${config.name}: ${errorMessage(error)}`;
      result.errors.push(message);
      logger.error(message, { prompt: config.name, configPath: config.path });
    }
  }

  logger.info(
    `  Synced fragments for prompt: ${config.name} (${result.embedded} embedded, ${result.references} references)`,
    { prompt: config.name }
  );

  return result;
}
