/**
 * Output Types
 */

import type { z } from 'zod';
import type { OutputFormat } from '../config/index.js';

export type OutputMode = OutputFormat;

/**
 * Any command result. The `type` tag selects the formatter.
 */
export interface TaggedResult {
  type: string;
}

/**
 * Formatters for one result tag.
 *
 * `schema` narrows the untyped result before a formatter sees it; a result
 * that does not match is printed as JSON.
 */
export interface OutputFormatter<T> {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Overrides the default pretty JSON */
  json?: (result: T) => string;
  human?: (result: T) => string;
}
