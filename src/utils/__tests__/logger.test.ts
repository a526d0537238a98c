/**
 * Tests for the structured logging handle and sinks
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  LogHandle,
  createConsoleSink,
  createMemorySink,
  createSilentLogger,
  type ConsoleSinkOptions,
} from '../logger.js';

describe('LogHandle', () => {
  it('drops events before start', () => {
    const { sink, events } = createMemorySink();
    const logger = new LogHandle(sink);

    logger.info('too early');

    expect(events).toHaveLength(0);
    expect(logger.isStarted).toBe(false);
  });

  it('delivers events with level, name, payload and context', () => {
    const { sink, events } = createMemorySink();
    const logger = new LogHandle(sink, () => 1234);

    logger.start({ app: 'skillbook' });
    logger.warn('Skill not found', { path: 'skills/x.md' });

    expect(events).toEqual([
      {
        event: 'warning-message',
        level: 'warning',
        message: 'Skill not found',
        data: { app: 'skillbook', path: 'skills/x.md' },
        timestamp: 1234,
      },
    ]);
  });

  it('lets event payload override context keys', () => {
    const { sink, events } = createMemorySink();
    const logger = new LogHandle(sink);

    logger.start({ phase: 'global' });
    logger.event('sync.skill', 'info', 'Synced', { phase: 'skills' });

    expect(events[0]?.event).toBe('sync.skill');
    expect(events[0]?.data).toEqual({ phase: 'skills' });
  });

  it('drops events after stop', () => {
    const { sink, events } = createMemorySink();
    const logger = new LogHandle(sink);

    logger.start();
    logger.success('one');
    logger.stop();
    logger.success('two');

    expect(events.map((e) => e.message)).toEqual(['one']);
  });

  it('maps each level to its default event name', () => {
    const { sink, events } = createMemorySink();
    const logger = new LogHandle(sink);
    logger.start();

    logger.debug('d');
    logger.info('i');
    logger.success('s');
    logger.warn('w');
    logger.error('e');

    expect(events.map((e) => `${e.level}:${e.event}`)).toEqual([
      'debug:debug-message',
      'info:info-message',
      'success:success-message',
      'warning:warning-message',
      'error:error-message',
    ]);
  });

  it('silent logger is started and swallows events', () => {
    const logger = createSilentLogger();
    expect(logger.isStarted).toBe(true);
    expect(() => logger.error('ignored')).not.toThrow();
  });
});

describe('createConsoleSink', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function setup(options: ConsoleSinkOptions) {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new LogHandle(createConsoleSink(() => options));
    logger.start();
    return { logger, log, warn, error };
  }

  it('prints info on stdout in human mode', () => {
    const { logger, log } = setup({ mode: 'human', verbose: false });

    logger.info('Syncing skills');

    expect(log).toHaveBeenCalledWith('Syncing skills');
  });

  it('hides debug unless verbose', () => {
    const { logger, log } = setup({ mode: 'human', verbose: false });

    logger.debug('hidden');

    expect(log).not.toHaveBeenCalled();
  });

  it('prints warnings on stderr in human mode', () => {
    const { logger, warn } = setup({ mode: 'human', verbose: false });

    logger.warn('careful');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toContain('Warning: careful');
  });

  it('keeps stdout clean in json mode', () => {
    const { logger, log, error } = setup({ mode: 'json', verbose: false });

    logger.info('quiet');
    logger.success('quiet too');
    logger.warn('loud');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    const parsed = JSON.parse(String(error.mock.calls[0]?.[0]));
    expect(parsed.level).toBe('warning');
    expect(parsed.message).toBe('loud');
  });

  it('emits every event as NDJSON in verbose json mode', () => {
    const { logger, error } = setup({ mode: 'json', verbose: true });

    logger.info('one');
    logger.debug('two');

    expect(error).toHaveBeenCalledTimes(2);
  });
});
