/**
 * Database Command Formatters
 */

import chalk from 'chalk';
import type { DbInitResult, DbResetResult, SyncSummaryResult } from '../results.js';

type Counts = SyncSummaryResult['skills'];

function formatCounts(label: string, counts: Counts): string {
  return (
    `${label}: ${counts.inserted} inserted, ${counts.updated} updated, ` +
    `${counts.skipped} unchanged, ${counts.error} failed (${counts.total} total)`
  );
}

function formatMigrations(applied: string[]): string {
  return applied.length > 0 ? `Applied migrations: ${applied.join(', ')}` : 'Schema is up to date';
}

export function formatSyncSummary(result: SyncSummaryResult): string {
  const { fragments } = result;
  const lines = [
    '',
    chalk.bold('Sync complete'),
    `Project root: ${result.projectRoot}`,
    '',
    formatCounts('Skills', result.skills),
    formatCounts('Prompts', result.prompts),
    `Fragments: ${fragments.configs} configs, ${fragments.embedded} embedded, ` +
      `${fragments.references} references, ${fragments.missing} missing`,
  ];

  if (result.errors.length > 0) {
    lines.push('', chalk.red.underline(`Errors (${result.errors.length}):`));
    lines.push(...result.errors.map((error) => chalk.red(`  - ${error}`)));
  }

  lines.push('', chalk.dim(`Completed in ${result.durationMs}ms`));

  return lines.join('\n');
}

export function formatDbInit(result: DbInitResult): string {
  const lines = [`${chalk.green('✓')} Database ready: ${result.databasePath}`, formatMigrations(result.migrationsApplied)];

  if (result.configCreated) {
    lines.push(`Created config file: ${result.configPath}`);
  }

  return lines.join('\n');
}

export function formatDbReset(result: DbResetResult): string {
  return [
    `${chalk.green('✓')} Database reset: ${result.databasePath}`,
    formatMigrations(result.migrationsApplied),
  ].join('\n');
}
