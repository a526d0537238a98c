/**
 * skillbook - Library Entry Point
 *
 * The CLI (`skillbook`) covers everyday use:
 * ```bash
 * skillbook db init
 * skillbook db sync
 * skillbook skill search "pipelines" --human
 * ```
 *
 * This module exports the same building blocks for scripts that sync or
 * query a skills database directly.
 *
 * @example
 * ```typescript
 * import { loadConfig, resolveDatabasePath, withDatabase, syncAll, searchSkills, createSilentLogger } from 'skillbook';
 *
 * const config = loadConfig();
 * const hits = withDatabase(resolveDatabasePath(config), (db) => {
 *   syncAll(db, config, createSilentLogger());
 *   return searchSkills(db, 'validation', { maxResults: 5 });
 * });
 * ```
 */

export * from './database/index.js';
export * from './sync/index.js';
export * from './search/index.js';
export * from './output/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export {
  LogHandle,
  createConsoleSink,
  createMemorySink,
  createSilentLogger,
  type Logger,
  type LogEvent,
  type LogLevel,
  type LogSink,
  type LogData,
  type ConsoleSinkOptions,
} from './utils/logger.js';
