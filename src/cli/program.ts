/**
 * skillbook program
 *
 * Builds the Commander program with global options and every command.
 * The entry point (index.ts) adds process handling; tests drive the
 * program directly with their own environment, directory and log sink.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { readVersion } from './version.js';
import { createDbCommand } from './commands/db.js';
import { createSkillCommand } from './commands/skill.js';
import { createPromptCommand } from './commands/prompt.js';
import { createSearchCommand } from './commands/search.js';
import { loadConfig } from '../config/index.js';
import { CLIError, type ErrorHandlerOptions } from '../errors/index.js';
import {
  defaultRegistry,
  printResult,
  resolveOutputMode,
  type OutputRegistry,
} from '../output/index.js';
import { createConsoleSink, LogHandle, type ConsoleSinkOptions, type LogSink } from '../utils/logger.js';

export interface CliOptions {
  /** Environment for config lookup (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Working directory (default: process.cwd()) */
  cwd?: string;
  /** Log sink (default: the console sink) */
  sink?: LogSink;
  /** Formatter registry (default: the built-in formatters) */
  registry?: OutputRegistry;
}

export interface Cli {
  program: Command;
  /** Not started; the caller owns its lifecycle */
  logger: LogHandle;
  /** Options for reporting an error in the current output mode */
  errorOptions: () => ErrorHandlerOptions;
}

export function createCli(options: CliOptions = {}): Cli {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const registry = options.registry ?? defaultRegistry;

  // Refined in preAction (flags) and again once config is loaded
  const sinkOptions: ConsoleSinkOptions = { mode: 'json', verbose: false };
  const logger = new LogHandle(options.sink ?? createConsoleSink(() => sinkOptions));

  const program = new Command();

  program
    .name('skillbook')
    .description('Sync Markdown skills and prompts into SQLite and search them')
    .version(readVersion(), '-v, --version', 'Display version number')

    // Global options - available to ALL subcommands
    .option('--verbose', 'Enable verbose output for debugging', false)
    .option('--json', 'Output results as JSON', false)
    .option('--human', 'Output results as formatted text', false)

    .addHelpText(
      'after',
      `
${chalk.dim('Examples:')}
  ${chalk.cyan('skillbook db init')}                       Create the config file and database
  ${chalk.cyan('skillbook db sync')}                       Sync ./skills, ./prompts and ./prompt_configs
  ${chalk.cyan('skillbook skill search "pipeline"')}       Full-text search over skills
  ${chalk.cyan('skillbook prompt show reviewer --human')}  Show a prompt and its skills
  ${chalk.cyan('skillbook db stats --human')}              Counts and the active configuration
`
    );

  const getGlobalOptions = (): GlobalOptions => {
    const opts = program.opts<Partial<GlobalOptions>>();
    return {
      verbose: opts.verbose ?? false,
      json: opts.json ?? false,
      human: opts.human ?? false,
    };
  };

  const getContext = (): CommandContext => {
    const globals = getGlobalOptions();
    const config = loadConfig({ env, cwd });

    if (!config.output.color) {
      chalk.level = 0;
    }

    const mode = resolveOutputMode(globals, config.output.format);
    sinkOptions.mode = mode;

    return {
      options: globals,
      config,
      mode,
      logger,
      cwd,
      env,
      output: (result) => printResult(result, mode, registry),
    };
  };

  program.addCommand(createDbCommand(getContext));
  program.addCommand(createSkillCommand(getContext));
  program.addCommand(createPromptCommand(getContext));
  program.addCommand(createSearchCommand(getContext));

  // Unknown commands
  program.on('command:*', (operands: string[]) => {
    throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: skillbook --help  to see available commands');
  });

  // Flags are known before config; errors from config loading use them
  program.hook('preAction', () => {
    const globals = getGlobalOptions();
    sinkOptions.verbose = globals.verbose;
    sinkOptions.mode = resolveOutputMode(globals);
  });

  return {
    program,
    logger,
    errorOptions: () => ({ verbose: sinkOptions.verbose, json: sinkOptions.mode === 'json' }),
  };
}
