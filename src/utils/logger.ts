/**
 * Structured Logging
 *
 * Library code (sync, database) accepts the small `Logger` interface via
 * dependency injection. The CLI entry point constructs one `LogHandle`,
 * starts it before parsing arguments and stops it on every exit path.
 *
 * Every log call becomes a `LogEvent` (name, level, message, key-value
 * payload) delivered to a sink. Sinks decide presentation:
 * - createConsoleSink: terminal output (chalk) or NDJSON on stderr
 * - createMemorySink: collects events for tests
 */

import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'success' | 'warning' | 'error';

export type LogData = Record<string, unknown>;

export interface LogEvent {
  /** Event name, e.g. "sync.skill" */
  event: string;
  level: LogLevel;
  message: string;
  /** Event payload merged over the handle's global context */
  data: LogData;
  /** Milliseconds since the epoch */
  timestamp: number;
}

export type LogSink = (entry: LogEvent) => void;

/**
 * Generic logger interface for library code
 */
export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  success(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  /** Emit a named event with an explicit level */
  event(name: string, level: LogLevel, message: string, data?: LogData): void;
}

// ============================================================================
// LogHandle
// ============================================================================

const DEFAULT_EVENT_NAMES: Record<LogLevel, string> = {
  debug: 'debug-message',
  info: 'info-message',
  success: 'success-message',
  warning: 'warning-message',
  error: 'error-message',
};

/**
 * A logger with an explicit lifecycle.
 *
 * Events logged before `start()` or after `stop()` are dropped.
 *
 * @example
 * ```ts
 * const logger = new LogHandle(createConsoleSink(() => ({ mode: 'human', verbose: false })));
 * logger.start({ app: 'skillbook' });
 * try {
 *   syncAll(db, config, logger);
 * } finally {
 *   logger.stop();
 * }
 * ```
 */
export class LogHandle implements Logger {
  private started = false;
  private context: LogData = {};

  constructor(
    private readonly sink: LogSink,
    private readonly clock: () => number = Date.now
  ) {}

  /**
   * Start delivering events. `context` is attached to every event.
   * Calling start on a running handle only replaces the context.
   */
  start(context: LogData = {}): void {
    this.context = { ...context };
    this.started = true;
  }

  /** Stop delivering events. Safe to call more than once. */
  stop(): void {
    this.started = false;
  }

  get isStarted(): boolean {
    return this.started;
  }

  debug(message: string, data?: LogData): void {
    this.event(DEFAULT_EVENT_NAMES.debug, 'debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.event(DEFAULT_EVENT_NAMES.info, 'info', message, data);
  }

  success(message: string, data?: LogData): void {
    this.event(DEFAULT_EVENT_NAMES.success, 'success', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.event(DEFAULT_EVENT_NAMES.warning, 'warning', message, data);
  }

  error(message: string, data?: LogData): void {
    this.event(DEFAULT_EVENT_NAMES.error, 'error', message, data);
  }

  event(name: string, level: LogLevel, message: string, data: LogData = {}): void {
    if (!this.started) {
      return;
    }
    this.sink({
      event: name,
      level,
      message,
      data: { ...this.context, ...data },
      timestamp: this.clock(),
    });
  }
}

// ============================================================================
// Sinks
// ============================================================================

export interface ConsoleSinkOptions {
  /** 'json' emits warnings/errors as NDJSON on stderr, nothing else */
  mode: 'json' | 'human';
  /** Show debug events */
  verbose: boolean;
}

/**
 * Terminal sink. Options are read per event so the CLI can switch modes
 * after the handle is created (flags are parsed after start()).
 *
 * Human mode: info/success on stdout, warnings/errors on stderr.
 * JSON mode: stdout is reserved for the command result.
 */
export function createConsoleSink(getOptions: () => ConsoleSinkOptions): LogSink {
  return (entry: LogEvent) => {
    const { mode, verbose } = getOptions();

    if (entry.level === 'debug' && !verbose) {
      return;
    }

    if (mode === 'json') {
      if (entry.level === 'warning' || entry.level === 'error' || verbose) {
        console.error(JSON.stringify(entry));
      }
      return;
    }

    switch (entry.level) {
      case 'debug':
        console.log(chalk.dim(`[debug] ${entry.message}`));
        break;
      case 'info':
        console.log(entry.message);
        break;
      case 'success':
        console.log(`${chalk.green('✓')} ${entry.message}`);
        break;
      case 'warning':
        console.warn(chalk.yellow(`Warning: ${entry.message}`));
        break;
      case 'error':
        console.error(chalk.red(`Error: ${entry.message}`));
        break;
    }
  };
}

/**
 * Sink that keeps every event in an array, for assertions in tests.
 */
export function createMemorySink(): { sink: LogSink; events: LogEvent[] } {
  const events: LogEvent[] = [];
  return { sink: (entry) => events.push(entry), events };
}

/**
 * A started handle that discards everything.
 */
export function createSilentLogger(): LogHandle {
  const handle = new LogHandle(() => {});
  handle.start();
  return handle;
}
