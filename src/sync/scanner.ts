/**
 * File Scanner
 *
 * Finds candidate documents with fast-glob. Results are sorted so repeated
 * syncs visit files in the same order.
 */

import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import fg from 'fast-glob';

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Recursively list regular files with `extension` under `directory`.
 *
 * @param extension - With or without the leading dot ("md", ".yaml")
 * @returns Absolute paths in lexicographic order; [] when the directory is missing
 */
export function scanFiles(directory: string, extension: string): string[] {
  const root = resolve(directory);

  if (!isDirectory(root)) {
    return [];
  }

  const ext = extension.startsWith('.') ? extension.slice(1) : extension;

  const entries = fg.sync(`**/*.${ext}`, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: false,
    suppressErrors: true,
  });

  return entries.sort();
}

export function scanSkillFiles(skillsDir: string): string[] {
  return scanFiles(skillsDir, 'md');
}

export function scanPromptFiles(promptsDir: string): string[] {
  return scanFiles(promptsDir, 'md');
}

export function scanPromptConfigFiles(configsDir: string): string[] {
  return scanFiles(configsDir, 'yaml');
}
