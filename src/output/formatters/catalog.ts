/**
 * Stats and Combined Search Formatters
 */

import chalk from 'chalk';
import { formatTable, type Column } from '../../utils/table.js';
import { formatKilobytes } from '../../utils/format.js';
import type { SearchResults, StatsResult } from '../results.js';

const CATEGORY_COLUMNS: Column[] = [
  { header: 'Category', key: 'category' },
  { header: 'Count', key: 'count', align: 'right' },
];

const SKILL_HIT_COLUMNS: Column[] = [
  { header: 'Name', key: 'name' },
  { header: 'Category', key: 'category' },
  { header: 'Snippet', key: 'snippet', maxWidth: 60 },
];

const PROMPT_HIT_COLUMNS: Column[] = [
  { header: 'Name', key: 'name' },
  { header: 'Snippet', key: 'snippet', maxWidth: 60 },
];

/** Snippets span lines; a table cell cannot */
function flatten(text: string | null): string {
  return text === null ? '' : text.replace(/\s+/g, ' ').trim();
}

export function formatStats(result: StatsResult): string {
  const { configuration: cfg, database: db } = result;

  const lines = [
    '',
    chalk.bold('Database Statistics'),
    '',
    chalk.underline('Configuration:'),
    `  Database: ${cfg.databasePath}`,
    `  Project root: ${cfg.projectRoot}`,
    `  Skills directory: ${cfg.skillsDir}`,
    `  Prompts directory: ${cfg.promptsDir}`,
    `  Prompt configs directory: ${cfg.promptConfigsDir}`,
    `  Auto-migrate: ${cfg.autoMigrate}`,
    `  Max results: ${cfg.maxResults}`,
    `  Output format: ${cfg.outputFormat}`,
    '',
    chalk.underline('Database:'),
    `  Skills: ${db.skills}`,
    `  Prompts: ${db.prompts}`,
    `  Categories: ${db.categories}`,
    `  Total size: ${formatKilobytes(db.totalSizeBytes)} KB`,
    `  Total tokens: ${db.totalTokens}`,
  ];

  if (result.categoryBreakdown.length > 0) {
    lines.push('', chalk.underline('Skills by Category:'), formatTable(CATEGORY_COLUMNS, result.categoryBreakdown));
  }

  return lines.join('\n');
}

export function formatSearchResults(result: SearchResults): string {
  const lines = ['', chalk.bold(`Search results for "${result.query}"`)];

  if (result.target !== 'prompts') {
    lines.push('', chalk.underline(`Skills (${result.skills.length}):`));
    if (result.skills.length > 0) {
      const rows = result.skills.map((skill) => ({
        name: skill.name,
        category: skill.category,
        snippet: flatten(skill.snippet),
      }));
      lines.push(formatTable(SKILL_HIT_COLUMNS, rows));
    }
  }

  if (result.target !== 'skills') {
    lines.push('', chalk.underline(`Prompts (${result.prompts.length}):`));
    if (result.prompts.length > 0) {
      const rows = result.prompts.map((prompt) => ({
        name: prompt.name,
        snippet: flatten(prompt.snippet),
      }));
      lines.push(formatTable(PROMPT_HIT_COLUMNS, rows));
    }
  }

  return lines.join('\n');
}
