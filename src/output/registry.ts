/**
 * Output Registry
 *
 * Maps result `type` tags to formatters. Adding a tag is one `register`
 * call; `format` itself never changes.
 *
 * Every result can be printed: JSON is the default for unknown tags, for
 * tags without a human formatter, and for results that fail their schema.
 */

import type { OutputFormatter, OutputMode, TaggedResult } from './types.js';

type Render = (result: TaggedResult, mode: OutputMode) => string | undefined;

/**
 * Pretty-printed JSON of the whole result
 */
export function formatJson(result: unknown): string {
  return JSON.stringify(result, null, 2);
}

export class OutputRegistry {
  private readonly renderers = new Map<string, Render>();

  /**
   * Register formatters for a tag, replacing any earlier registration.
   *
   * @example
   * ```ts
   * registry.register('skill', {
   *   schema: SkillResultSchema,
   *   human: (result) => result.data.name,
   * });
   * ```
   */
  register<T>(tag: string, formatter: OutputFormatter<T>): this {
    this.renderers.set(tag, (result, mode) => {
      const render = mode === 'human' ? formatter.human : formatter.json;
      if (!render) {
        return undefined;
      }

      const parsed = formatter.schema.safeParse(result);
      return parsed.success ? render(parsed.data) : undefined;
    });
    return this;
  }

  has(tag: string): boolean {
    return this.renderers.has(tag);
  }

  /** Registered tags in registration order */
  tags(): string[] {
    return [...this.renderers.keys()];
  }

  /**
   * Render a result in the requested mode, falling back to JSON.
   */
  format(result: TaggedResult, mode: OutputMode): string {
    const render = this.renderers.get(result.type);
    return render?.(result, mode) ?? formatJson(result);
  }
}
