import type { Config } from '../config/index.js';
import type { Logger } from '../utils/logger.js';
import type { OutputMode, TaggedResult } from '../output/index.js';

/**
 * Global CLI options available to all commands
 * These are parsed at the root level and passed down to subcommands
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose: boolean;
  /** Force JSON output */
  json: boolean;
  /** Force human-readable output */
  human: boolean;
}

/**
 * Context passed to all command handlers
 * Built when a command runs, after flags are parsed and config is loaded
 */
export interface CommandContext {
  options: GlobalOptions;
  /** Effective configuration */
  config: Config;
  /** Output mode after flags and config */
  mode: OutputMode;
  logger: Logger;
  /** Directory relative paths resolve against */
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Print a command result in the active output mode */
  output: (result: TaggedResult) => void;
}
