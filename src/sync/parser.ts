/**
 * Document Parsers
 *
 * Turn files on disk into rows ready for the upserter. Parsers throw on
 * unreadable files; the upserter turns that into an `error` outcome.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { basename, extname, join, relative } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  classifyPath,
  computeHash,
  estimateTokens,
  extractFrontmatter,
  frontmatterString,
} from './metadata.js';
import type { PromptConfig } from './types.js';
import type { PromptInput, SkillInput } from '../database/index.js';
import { FileNotFoundError, ValidationError } from '../errors/index.js';

export interface SkillParseOptions {
  /** Absolute project root; categories are derived relative to it */
  projectRoot: string;
  /** Absolute skills directory; its basename is the category marker */
  skillsDir: string;
}

/**
 * Parse a skill file. The stored content is the body without frontmatter;
 * the hash covers the raw file.
 */
export function parseSkillFile(filePath: string, options: SkillParseOptions): SkillInput {
  const raw = readFileSync(filePath);
  const { frontmatter, body } = extractFrontmatter(raw.toString('utf-8'));
  const { category, name } = classifyPath(
    relative(options.projectRoot, filePath),
    basename(options.skillsDir)
  );

  return {
    path: filePath,
    category,
    name,
    title: frontmatterString(frontmatter, 'title'),
    description: frontmatterString(frontmatter, 'description'),
    content: body,
    file_hash: computeHash(raw),
    size_bytes: raw.length,
    token_count: estimateTokens(body),
  };
}

// ============================================================================
// Prompt Configs
// ============================================================================

/** Scalars YAML may produce for a text field; stored as strings */
const TextFieldSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

const PathListSchema = z.array(z.string()).nullish();

const PromptConfigFileSchema = z.object({
  name: TextFieldSchema,
  title: TextFieldSchema,
  description: TextFieldSchema,
  author: TextFieldSchema,
  date: TextFieldSchema,
  fragments: PathListSchema,
  /** Older configs list embedded skills under `skills` */
  skills: PathListSchema,
  references: PathListSchema,
});

/**
 * Parse and validate a prompt configuration descriptor.
 *
 * @throws ValidationError if the YAML is malformed or has the wrong shape
 */
export function parsePromptConfigFile(configPath: string): PromptConfig {
  const raw = readFileSync(configPath, 'utf-8');
  const fileName = basename(configPath, extname(configPath));

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid YAML in ${configPath}: ${message}`);
  }

  const result = PromptConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ValidationError(
      `Invalid prompt config ${configPath}`,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const config = result.data;
  return {
    path: configPath,
    fileName,
    name: config.name ?? fileName,
    title: config.title,
    description: config.description,
    author: config.author,
    date: config.date,
    fragments: config.fragments ?? config.skills ?? [],
    references: config.references ?? [],
    raw,
  };
}

/**
 * Build the prompt row for a config. Content comes from
 * `<promptsDir>/<name>.md`; the hash covers both files.
 *
 * @throws FileNotFoundError if the Markdown file is missing
 */
export function parsePromptFromConfig(config: PromptConfig, promptsDir: string): PromptInput {
  const contentPath = join(promptsDir, `${config.name}.md`);

  if (!existsSync(contentPath)) {
    throw new FileNotFoundError(contentPath);
  }

  const content = readFileSync(contentPath, 'utf-8');

  return {
    name: config.name,
    path: contentPath,
    title: config.title,
    author: config.author,
    description: config.description,
    content,
    file_hash: computeHash(`${config.raw}\n---\n${content}`),
    size_bytes: statSync(config.path).size + statSync(contentPath).size,
    token_count: estimateTokens(content),
  };
}

/**
 * Parse a standalone prompt file (no config). Metadata comes from
 * frontmatter; the full file is stored as content.
 */
export function parsePromptFile(filePath: string): PromptInput {
  const raw = readFileSync(filePath);
  const content = raw.toString('utf-8');
  const { frontmatter } = extractFrontmatter(content);

  return {
    name: basename(filePath, extname(filePath)),
    path: filePath,
    title: frontmatterString(frontmatter, 'title'),
    author: frontmatterString(frontmatter, 'author'),
    description: frontmatterString(frontmatter, 'description'),
    content,
    file_hash: computeHash(raw),
    size_bytes: raw.length,
    token_count: estimateTokens(content),
  };
}
