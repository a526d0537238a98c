/**
 * Output Mode Selection
 */

import type { OutputMode } from './types.js';

export interface OutputFlags {
  json?: boolean;
  human?: boolean;
}

/**
 * Pick the output mode.
 *
 * Precedence: `--json`, then `--human`, then the configured format, then JSON.
 */
export function resolveOutputMode(flags: OutputFlags, configured?: OutputMode): OutputMode {
  if (flags.json === true) {
    return 'json';
  }
  if (flags.human === true) {
    return 'human';
  }
  return configured ?? 'json';
}
