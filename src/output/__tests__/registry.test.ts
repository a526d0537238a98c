/**
 * Tests for the output registry and mode selection
 */

import { z } from 'zod';
import { OutputRegistry, formatJson } from '../registry.js';
import { resolveOutputMode } from '../mode.js';
import { createOutputRegistry } from '../index.js';

const GreetingSchema = z.object({
  type: z.literal('greeting'),
  name: z.string(),
});

describe('OutputRegistry', () => {
  it('falls back to pretty JSON for an unknown tag', () => {
    const registry = new OutputRegistry();
    const result = { type: 'mystery', value: 1 };

    expect(registry.format(result, 'human')).toBe(JSON.stringify(result, null, 2));
    expect(registry.format(result, 'json')).toBe(formatJson(result));
  });

  it('uses the human formatter in human mode only', () => {
    const registry = new OutputRegistry().register('greeting', {
      schema: GreetingSchema,
      human: (result) => `Hello, ${result.name}`,
    });
    const result = { type: 'greeting', name: 'reader' };

    expect(registry.format(result, 'human')).toBe('Hello, reader');
    expect(registry.format(result, 'json')).toBe('{\n  "type": "greeting",\n  "name": "reader"\n}');
  });

  it('uses a custom JSON formatter when one is registered', () => {
    const registry = new OutputRegistry().register('greeting', {
      schema: GreetingSchema,
      json: (result) => JSON.stringify({ greeting: result.name }),
    });

    const result = { type: 'greeting', name: 'reader' };

    expect(registry.format(result, 'json')).toBe('{"greeting":"reader"}');
  });

  it('falls back to JSON when there is no human formatter', () => {
    const registry = new OutputRegistry().register('greeting', { schema: GreetingSchema });
    const result = { type: 'greeting', name: 'reader' };

    expect(registry.format(result, 'human')).toBe(formatJson(result));
  });

  it('falls back to JSON when the result does not match the schema', () => {
    const registry = new OutputRegistry().register('greeting', {
      schema: GreetingSchema,
      human: (result) => `Hello, ${result.name}`,
    });
    const result = { type: 'greeting', name: 42 };

    expect(registry.format(result, 'human')).toBe(formatJson(result));
  });

  it('replaces an earlier registration for the same tag', () => {
    const registry = new OutputRegistry()
      .register('greeting', { schema: GreetingSchema, human: () => 'first' })
      .register('greeting', { schema: GreetingSchema, human: () => 'second' });

    const result = { type: 'greeting', name: 'x' };

    expect(registry.format(result, 'human')).toBe('second');
    expect(registry.tags()).toEqual(['greeting']);
  });

  it('registers every built-in result tag', () => {
    const registry = createOutputRegistry();

    expect(registry.tags()).toEqual([
      'skill',
      'skill-list',
      'skill-search-results',
      'prompt',
      'prompt-list',
      'prompt-search-results',
      'search-results',
      'stats',
      'sync-summary',
      'db-init',
      'db-reset',
    ]);
    expect(registry.has('skill')).toBe(true);
    expect(registry.has('mystery')).toBe(false);
  });
});

describe('resolveOutputMode', () => {
  it('prefers --json over everything', () => {
    expect(resolveOutputMode({ json: true, human: true }, 'human')).toBe('json');
  });

  it('uses --human over the configured format', () => {
    expect(resolveOutputMode({ human: true }, 'json')).toBe('human');
  });

  it('uses the configured format without flags', () => {
    expect(resolveOutputMode({}, 'human')).toBe('human');
  });

  it('defaults to JSON', () => {
    expect(resolveOutputMode({})).toBe('json');
    expect(resolveOutputMode({ json: false, human: false })).toBe('json');
  });
});
