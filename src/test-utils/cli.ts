/**
 * Test Utilities - Running the CLI in-process
 */

import { vi } from 'vitest';
import type { Command } from 'commander';
import type { z } from 'zod';
import { createCli } from '../cli/program.js';
import { createMemorySink, type LogEvent } from '../utils/logger.js';
import type { TestWorkspace } from './workspace.js';

export interface CliRun {
  /** Everything printed with console.log, one entry per call */
  stdout: string;
  events: LogEvent[];
}

/** addCommand does not pass exitOverride down, so set it on every command */
function overrideExits(command: Command): void {
  command.exitOverride();
  command.configureOutput({ writeOut: () => {}, writeErr: () => {} });
  command.commands.forEach(overrideExits);
}

/**
 * Run `skillbook <args>` against a workspace.
 *
 * The working directory is the workspace root, so a `.skillbook.toml`
 * written there acts as the project-local config.
 */
export async function runCli(workspace: TestWorkspace, args: string[]): Promise<CliRun> {
  const memory = createMemorySink();
  const { program, logger } = createCli({ env: workspace.env, cwd: workspace.root, sink: memory.sink });
  overrideExits(program);

  const lines: string[] = [];
  const logSpy = vi.spyOn(console, 'log').mockImplementation((...data: unknown[]) => {
    lines.push(data.map(String).join(' '));
  });

  logger.start();
  try {
    await program.parseAsync(args, { from: 'user' });
  } finally {
    logger.stop();
    logSpy.mockRestore();
  }

  return { stdout: lines.join('\n'), events: memory.events };
}

/**
 * Run a command in the default JSON mode and validate its output
 * against the result schema for its tag.
 */
export async function runCliJson<T>(
  workspace: TestWorkspace,
  args: string[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const { stdout } = await runCli(workspace, args);
  const parsed: unknown = JSON.parse(stdout);
  return schema.parse(parsed);
}
