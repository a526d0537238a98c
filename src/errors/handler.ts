/**
 * Error reporting for the CLI
 *
 * Every thrown value is first reduced to an `ErrorOutput`, then rendered
 * either as colored terminal lines or as one JSON object on stderr.
 */

import chalk from 'chalk';
import { CLIError, NotFoundError, ValidationError, type Lookup } from './types.js';

export interface ErrorHandlerOptions {
  /** Include the stack trace */
  verbose?: boolean;
  /** Render as JSON */
  json?: boolean;
}

/**
 * What gets reported for an error, in both output modes
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** One line per rejected option or argument */
  issues?: string[];
  /** The skill or prompt that was looked up */
  lookup?: Lookup;
  stack?: string;
}

/**
 * CLIError carries its own exit code, everything else exits 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

export function describeError(error: unknown, verbose = false): ErrorOutput {
  if (!(error instanceof Error)) {
    return { error: String(error), code: 1 };
  }

  const output: ErrorOutput = { error: error.message, code: getExitCode(error) };

  if (error instanceof CLIError) {
    output.hint = error.hint;
  } else if (!verbose) {
    // Unexpected failures only explain themselves with the stack
    output.hint = 'Run with --verbose for more details';
  }
  if (error instanceof ValidationError && error.issues.length > 0) {
    output.issues = [...error.issues];
  }
  if (error instanceof NotFoundError) {
    output.lookup = error.lookup;
  }
  if (verbose && error.stack) {
    output.stack = error.stack;
  }

  return output;
}

function renderText(output: ErrorOutput): string {
  const lines = [chalk.red('Error: ') + output.error];

  for (const issue of output.issues ?? []) {
    lines.push(`  ${chalk.yellow('-')} ${issue}`);
  }
  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  }
  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}

/**
 * Format an error for display without exiting.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const output = describeError(error, options.verbose ?? false);
  return options.json ? JSON.stringify(output, null, 2) : renderText(output);
}

/**
 * Print the formatted error to stderr and exit with its code.
 *
 * `onExit` runs first so the caller can stop the log handle.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {},
  onExit?: () => void
): never {
  console.error(formatError(error, options));
  onExit?.();
  process.exit(getExitCode(error));
}

/**
 * Handler for `uncaughtException` / `unhandledRejection`. Options are read
 * when the error arrives, after flags have been parsed.
 */
export function createGlobalErrorHandler(
  getOptions: () => ErrorHandlerOptions,
  onExit?: () => void
): (error: unknown) => never {
  return (error: unknown) => handleError(error, getOptions(), onExit);
}
