/**
 * Output Module
 *
 * Commands return tagged results; this module turns them into text.
 */

import { OutputRegistry } from './registry.js';
import { registerBuiltinFormatters } from './formatters/index.js';
import type { OutputMode, TaggedResult } from './types.js';

export { OutputRegistry, formatJson } from './registry.js';
export { resolveOutputMode } from './mode.js';
export type { OutputFlags } from './mode.js';
export type { OutputFormatter, OutputMode, TaggedResult } from './types.js';
export * from './results.js';
export * from './formatters/index.js';

/**
 * A registry with every built-in formatter
 */
export function createOutputRegistry(): OutputRegistry {
  return registerBuiltinFormatters(new OutputRegistry());
}

export const defaultRegistry = createOutputRegistry();

/**
 * Format a result and write it to stdout
 */
export function printResult(
  result: TaggedResult,
  mode: OutputMode,
  registry: OutputRegistry = defaultRegistry
): void {
  console.log(registry.format(result, mode));
}
