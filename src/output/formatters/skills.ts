/**
 * Skill Formatters
 */

import chalk from 'chalk';
import { formatTable, type Column } from '../../utils/table.js';
import { formatKilobytes } from '../../utils/format.js';
import type { SkillListResult, SkillResult, SkillSearchResults } from '../results.js';

const SKILL_LIST_COLUMNS: Column[] = [
  { header: 'Name', key: 'name' },
  { header: 'Category', key: 'category' },
  { header: 'Size (KB)', key: 'sizeKb', align: 'right' },
  { header: 'Tokens', key: 'tokens', align: 'right' },
];

export function formatSkillSearchResults(result: SkillSearchResults): string {
  const lines = ['', chalk.bold(`Found ${result.count} skills matching "${result.query}"`), ''];

  for (const skill of result.skills) {
    lines.push(chalk.bold(`• ${skill.name}`) + chalk.dim(` (${skill.category})`));
    if (skill.snippet) {
      lines.push(`  ${skill.snippet}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function formatSkillList(result: SkillListResult): string {
  const lines = ['', chalk.bold(`Total: ${result.count} skills`)];

  if (result.skills.length > 0) {
    const rows = result.skills.map((skill) => ({
      name: skill.name,
      category: skill.category,
      sizeKb: formatKilobytes(skill.size_bytes),
      tokens: skill.token_count,
    }));
    lines.push('', formatTable(SKILL_LIST_COLUMNS, rows));
  }

  return lines.join('\n');
}

export function formatSkill(result: SkillResult): string {
  const skill = result.data;
  const lines = ['', chalk.bold(skill.name)];

  if (skill.title) {
    lines.push(chalk.italic(skill.title));
  }

  lines.push(
    '',
    `Category: ${skill.category}`,
    `Size: ${formatKilobytes(skill.size_bytes)} KB`,
    `Tokens: ${skill.token_count}`
  );

  if (skill.description) {
    lines.push('', chalk.underline('Description:'), skill.description);
  }

  lines.push('', chalk.underline('Content:'), skill.content);

  return lines.join('\n');
}
