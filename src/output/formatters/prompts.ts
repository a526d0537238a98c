/**
 * Prompt Formatters
 */

import chalk from 'chalk';
import { formatTable, type Column } from '../../utils/table.js';
import { formatKilobytes, preview } from '../../utils/format.js';
import type { PromptListResult, PromptResult, PromptSearchResults } from '../results.js';

/** Characters of prompt content shown by `prompt show` */
export const CONTENT_PREVIEW_LENGTH = 500;

const PROMPT_LIST_COLUMNS: Column[] = [
  { header: 'Name', key: 'name' },
  { header: 'Title', key: 'title', maxWidth: 40 },
  { header: 'Size (KB)', key: 'sizeKb', align: 'right' },
  { header: 'Tokens', key: 'tokens', align: 'right' },
];

type PromptSkill = PromptResult['data']['embedded'][number];

function formatSkillEntries(heading: string, entries: PromptSkill[]): string[] {
  if (entries.length === 0) {
    return [];
  }
  return [
    '',
    chalk.underline(heading),
    ...entries.map((entry) => `  ${entry.position}. ${chalk.dim(`[${entry.category}]`)} ${entry.name}`),
  ];
}

export function formatPromptSearchResults(result: PromptSearchResults): string {
  const lines = ['', chalk.bold(`Found ${result.count} prompts matching "${result.query}"`), ''];

  for (const prompt of result.prompts) {
    lines.push(chalk.bold(`• ${prompt.name}`) + (prompt.title ? chalk.dim(` (${prompt.title})`) : ''));
    if (prompt.snippet) {
      lines.push(`  ${prompt.snippet}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function formatPromptList(result: PromptListResult): string {
  const lines = ['', chalk.bold(`Total: ${result.count} prompts`)];

  if (result.prompts.length > 0) {
    const rows = result.prompts.map((prompt) => ({
      name: prompt.name,
      title: prompt.title,
      sizeKb: formatKilobytes(prompt.size_bytes),
      tokens: prompt.token_count,
    }));
    lines.push('', formatTable(PROMPT_LIST_COLUMNS, rows));
  }

  return lines.join('\n');
}

export function formatPrompt(result: PromptResult): string {
  const prompt = result.data;
  const lines = ['', chalk.bold(prompt.name)];

  if (prompt.title) {
    lines.push(chalk.italic(prompt.title));
  }
  lines.push('');
  if (prompt.author) {
    lines.push(`Author: ${prompt.author}`);
  }
  if (prompt.description) {
    lines.push(`Description: ${prompt.description}`);
  }
  lines.push(
    `Size: ${formatKilobytes(prompt.size_bytes)} KB`,
    `Tokens: ${prompt.token_count}`,
    `Updated: ${prompt.updated_at}`
  );

  lines.push(...formatSkillEntries('Embedded Skills:', prompt.embedded));
  lines.push(...formatSkillEntries('References:', prompt.references));

  lines.push('', chalk.underline('Content Preview:'), preview(prompt.content, CONTENT_PREVIEW_LENGTH));

  return lines.join('\n');
}
