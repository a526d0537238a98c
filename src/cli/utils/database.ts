/**
 * Database access for commands
 */

import {
  hasPendingMigrations,
  withDatabase,
  type DatabaseHandle,
} from '../../database/index.js';
import { resolveDatabasePath } from '../../config/index.js';
import { DatabaseError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Run `fn` against the configured database.
 *
 * Pending migrations are applied when `database.auto_migrate` is on;
 * with it off, an outdated schema is an error instead.
 */
export function withCommandDatabase<T>(context: CommandContext, fn: (db: DatabaseHandle) => T): T {
  const dbPath = resolveDatabasePath(context.config);
  const autoMigrate = context.config.database.auto_migrate;
  context.logger.debug(`Opening database ${dbPath}`, { autoMigrate });

  return withDatabase(
    dbPath,
    (db) => {
      if (!autoMigrate && hasPendingMigrations(db)) {
        throw new DatabaseError(
          `Database schema at ${dbPath} is out of date`,
          undefined,
          'Run: skillbook db init  to apply pending migrations'
        );
      }
      return fn(db);
    },
    { migrate: autoMigrate }
  );
}
