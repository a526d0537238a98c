/**
 * Hashing & Metadata Extraction
 *
 * Pure helpers: content fingerprints, YAML frontmatter, path classification
 * and the token estimate.
 */

import { createHash } from 'node:crypto';
import { basename, extname } from 'node:path';
import { parse as parseYaml } from 'yaml';

export const FRONTMATTER_DELIMITER = '---';

/** Category of a skill with no directory between the root and the file */
export const UNCATEGORIZED = 'uncategorized';

export type Frontmatter = Record<string, unknown>;

export interface FrontmatterResult {
  /** Parsed block, or null when there is none or it is not a YAML mapping */
  frontmatter: Frontmatter | null;
  /** Content after the closing delimiter, or the whole input */
  body: string;
}

export interface PathClassification {
  category: string;
  name: string;
}

/**
 * SHA-256 of the content as lowercase hex. Strings are hashed as UTF-8.
 */
export function computeHash(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

function isDelimiter(line: string | undefined): boolean {
  return line !== undefined && line.replace(/\r$/, '') === FRONTMATTER_DELIMITER;
}

function isMapping(value: unknown): value is Frontmatter {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Split a Markdown document into its frontmatter block and body.
 *
 * The first line must be exactly `---` and a later line must close the
 * block. A block that is not valid YAML, or not a mapping, counts as no
 * frontmatter and the content is returned unchanged.
 *
 * @example
 * ```ts
 * extractFrontmatter('---\ntitle: Intro\n---\nBody');
 * // { frontmatter: { title: 'Intro' }, body: 'Body' }
 * ```
 */
export function extractFrontmatter(content: string): FrontmatterResult {
  const lines = content.split('\n');

  if (!isDelimiter(lines[0])) {
    return { frontmatter: null, body: content };
  }

  const closingIndex = lines.findIndex((line, i) => i > 0 && isDelimiter(line));
  if (closingIndex === -1) {
    return { frontmatter: null, body: content };
  }

  const block = lines.slice(1, closingIndex).join('\n');
  const body = lines.slice(closingIndex + 1).join('\n');

  let parsed: unknown;
  try {
    parsed = parseYaml(block);
  } catch {
    return { frontmatter: null, body: content };
  }

  // An empty block parses to null
  if (parsed === null || parsed === undefined) {
    return { frontmatter: {}, body };
  }

  if (!isMapping(parsed)) {
    return { frontmatter: null, body: content };
  }

  return { frontmatter: parsed, body };
}

/**
 * Read a frontmatter field as text. Numbers and booleans are stringified,
 * anything else is null.
 */
export function frontmatterString(frontmatter: Frontmatter | null, key: string): string | null {
  const value = frontmatter?.[key];

  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

/**
 * Derive category and name from a skill path.
 *
 * The category is the directories strictly between the first `rootMarker`
 * segment and the filename.
 *
 * @example
 * ```ts
 * classifyPath('skills/libraries/data_validation/schemas.md', 'skills');
 * // { category: 'libraries/data_validation', name: 'schemas' }
 * ```
 */
export function classifyPath(filePath: string, rootMarker = 'skills'): PathClassification {
  const segments = filePath.split(/[\\/]/).filter((segment) => segment.length > 0);
  const fileName = segments[segments.length - 1] ?? '';
  const name = basename(fileName, extname(fileName));

  const directories = segments.slice(0, -1);
  const markerIndex = directories.indexOf(rootMarker);

  if (markerIndex === -1) {
    return { category: UNCATEGORIZED, name };
  }

  const categorySegments = directories.slice(markerIndex + 1);
  return {
    category: categorySegments.length > 0 ? categorySegments.join('/') : UNCATEGORIZED,
    name,
  };
}

/**
 * Rough token count: one token per four characters.
 * Not a tokenizer; stored counts depend on this exact divisor.
 */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}
