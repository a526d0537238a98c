/**
 * Database Commands
 *
 *   skillbook db init             Write the config template, create and migrate the database
 *   skillbook db sync             Sync skills, prompts and prompt configs into the database
 *   skillbook db reset --force    Drop every table and re-run migrations
 *   skillbook db stats            Counts, sizes and the active configuration
 */

import { Command } from 'commander';
import type { CommandContext } from '../types.js';
import { parseOptions, ResetOptionsSchema } from '../validation.js';
import { withCommandDatabase } from '../utils/database.js';
import {
  assertMigrated,
  resetDatabase,
  runMigrations,
  withDatabase,
} from '../../database/index.js';
import { resolveDatabasePath, writeConfigTemplate } from '../../config/index.js';
import { resolveSyncPaths, syncAll } from '../../sync/index.js';
import { getStats } from '../../search/index.js';
import { ValidationError } from '../../errors/index.js';
import type { DbInitResult, DbResetResult, StatsResult } from '../../output/index.js';

function createInitCommand(getContext: () => CommandContext): Command {
  return new Command('init')
    .description('Create the config file and database, applying all migrations')
    .action(() => {
      const context = getContext();
      const databasePath = resolveDatabasePath(context.config);

      const configFile = writeConfigTemplate(context.env);
      context.logger.debug(
        configFile.created ? `Wrote config template to ${configFile.path}` : `Config file exists: ${configFile.path}`
      );

      // Migrations run here regardless of database.auto_migrate
      const migrationsApplied = withDatabase(databasePath, (db) => assertMigrated(runMigrations(db)), {
        migrate: false,
      });

      const result: DbInitResult = {
        type: 'db-init',
        databasePath,
        configPath: configFile.path,
        configCreated: configFile.created,
        migrationsApplied,
      };
      context.output(result);
    });
}

function createSyncCommand(getContext: () => CommandContext): Command {
  return new Command('sync')
    .description('Sync skills, prompts and prompt configs into the database')
    .action(() => {
      const context = getContext();
      const summary = withCommandDatabase(context, (db) => syncAll(db, context.config, context.logger, { cwd: context.cwd }));
      context.output(summary);
    });
}

function createResetCommand(getContext: () => CommandContext): Command {
  return new Command('reset')
    .description('Drop all tables and recreate the schema')
    .option('--force', 'Confirm deleting every synced document', false)
    .action((cmdOptions: { force?: boolean }) => {
      const context = getContext();
      const options = parseOptions(ResetOptionsSchema, cmdOptions);
      const databasePath = resolveDatabasePath(context.config);

      if (!options.force) {
        context.logger.warn(`This deletes everything in ${databasePath}. Re-run with --force to confirm.`);
        throw new ValidationError('Refusing to reset the database without --force', [], 'Run: skillbook db reset --force');
      }

      const migrationsApplied = withDatabase(databasePath, (db) => assertMigrated(resetDatabase(db)), {
        migrate: false,
      });
      context.logger.debug(`Reset ${databasePath}`, { migrations: migrationsApplied.length });

      const result: DbResetResult = { type: 'db-reset', databasePath, migrationsApplied };
      context.output(result);
    });
}

function createStatsCommand(getContext: () => CommandContext): Command {
  return new Command('stats')
    .description('Show document counts, sizes and the active configuration')
    .action(() => {
      const context = getContext();
      const { config } = context;
      const stats = withCommandDatabase(context, (db) => getStats(db));
      const paths = resolveSyncPaths(config, context.cwd);

      const result: StatsResult = {
        type: 'stats',
        configuration: {
          databasePath: resolveDatabasePath(config),
          projectRoot: paths.projectRoot,
          skillsDir: paths.skillsDir,
          promptsDir: paths.promptsDir,
          promptConfigsDir: paths.promptConfigsDir,
          autoMigrate: config.database.auto_migrate,
          maxResults: config.search.max_results,
          outputFormat: config.output.format,
        },
        database: {
          skills: stats.skills,
          prompts: stats.prompts,
          categories: stats.categories,
          totalSizeBytes: stats.totalSizeBytes,
          totalTokens: stats.totalTokens,
        },
        categoryBreakdown: stats.categoryBreakdown,
      };
      context.output(result);
    });
}

/**
 * Create the db command group
 */
export function createDbCommand(getContext: () => CommandContext): Command {
  return new Command('db')
    .description('Manage the skills database')
    .addCommand(createInitCommand(getContext))
    .addCommand(createSyncCommand(getContext))
    .addCommand(createResetCommand(getContext))
    .addCommand(createStatsCommand(getContext));
}
