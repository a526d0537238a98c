/**
 * Tests for the error hierarchy and formatter
 */

import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import chalk from 'chalk';
import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  DatabaseError,
  ValidationError,
  NotFoundError,
  formatError,
  getExitCode,
  handleError,
} from '../index.js';

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('creates error with message only', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('keeps hint and custom exit code', () => {
      const error = new CLIError('Critical failure', 'Reboot', 99);

      expect(error.hint).toBe('Reboot');
      expect(error.code).toBe(99);
    });

    it('is instanceof Error', () => {
      const error = new CLIError('test');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
    });
  });

  it('FileNotFoundError uses exit code 3', () => {
    const error = new FileNotFoundError('/path/to/skills');

    expect(error.message).toBe('Path does not exist: /path/to/skills');
    expect(error.code).toBe(3);
    expect(error).toBeInstanceOf(CLIError);
  });

  describe('ConfigError', () => {
    it('points at the stats command by default', () => {
      const error = new ConfigError('Invalid option');

      expect(error.hint).toBe('Run: skillbook db stats --human  to see the active configuration');
      expect(error.code).toBe(2);
      expect(error.name).toBe('ConfigError');
    });

    it('accepts a custom hint', () => {
      expect(new ConfigError('Invalid option', 'Custom hint').hint).toBe('Custom hint');
    });
  });

  describe('DatabaseError', () => {
    it('defaults to the init hint', () => {
      const error = new DatabaseError('Connection failed');

      expect(error.hint).toBe('Try running: skillbook db init  to create or migrate the database');
      expect(error.code).toBe(5);
    });

    it('stores cause error', () => {
      const cause = new Error('SQLITE_BUSY');
      const error = new DatabaseError('Database locked', cause);

      expect(error.cause).toBe(cause);
    });
  });

  describe('ValidationError', () => {
    it('keeps issues apart from the hint', () => {
      const error = new ValidationError('Invalid input', ['query: Required', 'max-results: Must be positive']);

      expect(error.hint).toBe('Check your input and try again');
      expect(error.issues).toEqual(['query: Required', 'max-results: Must be positive']);
      expect(error.code).toBe(1);
    });

    it('prefers an explicit hint', () => {
      expect(new ValidationError('Bad query', [], 'Quote the term').hint).toBe('Quote the term');
    });
  });

  describe('NotFoundError', () => {
    it('names the skill and category', () => {
      const error = new NotFoundError('skill', 'malli', 'libraries');

      expect(error.message).toBe('Skill not found: malli in category libraries');
      expect(error.hint).toBe('Run: skillbook skill list -c libraries  to see what is indexed');
      expect(error.lookup).toEqual({ kind: 'skill', name: 'malli', category: 'libraries' });
    });

    it('names the prompt', () => {
      const error = new NotFoundError('prompt', 'builder');

      expect(error.message).toBe('Prompt not found: builder');
      expect(error.hint).toBe('Run: skillbook prompt list  to see what is indexed');
      expect(error.lookup).toEqual({ kind: 'prompt', name: 'builder' });
    });
  });
});

describe('formatError', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  describe('text output', () => {
    it('formats CLIError with hint', () => {
      expect(formatError(new CLIError('Failed', 'Try again'))).toBe('Error: Failed\nHint: Try again');
    });

    it('lists validation issues above the hint', () => {
      const output = formatError(new ValidationError('Invalid options', ['maxResults: Too small', 'offset: Required']));

      expect(output.split('\n')).toEqual([
        'Error: Invalid options',
        '  - maxResults: Too small',
        '  - offset: Required',
        'Hint: Check your input and try again',
      ]);
    });

    it('omits the hint line when there is none', () => {
      const output = formatError(new CLIError('Failed'));

      expect(output).toContain('Error:');
      expect(output).not.toContain('Hint:');
    });

    it('suggests --verbose for plain errors', () => {
      const output = formatError(new Error('Something broke'));

      expect(output).toContain('Something broke');
      expect(output).toContain('--verbose');
    });

    it('shows stack trace in verbose mode', () => {
      const output = formatError(new CLIError('Failed', 'Try again'), { verbose: true });

      expect(output).toContain('Stack trace:');
    });

    it('formats unknown error types', () => {
      expect(formatError('string error')).toContain('string error');
    });
  });

  describe('JSON output', () => {
    it('formats CLIError as JSON', () => {
      const parsed = JSON.parse(formatError(new ConfigError('Bad config', 'Fix it'), { json: true }));

      expect(parsed).toEqual({ error: 'Bad config', code: 2, hint: 'Fix it' });
    });

    it('carries validation issues as an array', () => {
      const parsed = JSON.parse(formatError(new ValidationError('Invalid options', ['limit: Required']), { json: true }));

      expect(parsed).toEqual({
        error: 'Invalid options',
        code: 1,
        hint: 'Check your input and try again',
        issues: ['limit: Required'],
      });
    });

    it('carries the failed lookup', () => {
      const parsed = JSON.parse(formatError(new NotFoundError('skill', 'arrows', 'language'), { json: true }));

      expect(parsed.lookup).toEqual({ kind: 'skill', name: 'arrows', category: 'language' });
    });

    it('includes stack in JSON verbose mode', () => {
      const parsed = JSON.parse(formatError(new CLIError('Failed'), { json: true, verbose: true }));

      expect(typeof parsed.stack).toBe('string');
    });

    it('formats unknown error as JSON', () => {
      expect(JSON.parse(formatError(42, { json: true }))).toEqual({ error: '42', code: 1 });
    });
  });
});

describe('getExitCode', () => {
  it('returns code from CLIError', () => {
    expect(getExitCode(new CLIError('test', undefined, 42))).toBe(42);
    expect(getExitCode(new FileNotFoundError('/x'))).toBe(3);
    expect(getExitCode(new ConfigError('bad'))).toBe(2);
    expect(getExitCode(new DatabaseError('locked'))).toBe(5);
  });

  it('returns 1 for anything else', () => {
    expect(getExitCode(new Error('test'))).toBe(1);
    expect(getExitCode('string')).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints, runs the exit hook, then exits with the error code', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never);
    const onExit = vi.fn();

    handleError(new ConfigError('Bad config', 'Fix it'), { json: true }, onExit);

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(onExit).toHaveBeenCalledTimes(1);
    expect(exitSpy).toHaveBeenCalledWith(2);
  });
});
