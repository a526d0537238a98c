/**
 * Error type definitions for the skillbook CLI
 *
 * Every error the CLI raises on purpose carries:
 * - a message naming what went wrong
 * - an optional hint naming the command or flag that fixes it
 * - an exit code scripts can branch on
 */

/**
 * Base class for all CLI errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration problems: bad TOML, values outside the schema,
 * environment overrides that fail validation.
 *
 * Exit code 2
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: skillbook db stats --human  to see the active configuration',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when SQLite cannot be opened, migrated or queried.
 *
 * Exit code 5
 */
export class DatabaseError extends CLIError {
  /** The original database error for debugging */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error, hint?: string) {
    super(
      message,
      hint ?? 'Try running: skillbook db init  to create or migrate the database',
      5
    );
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when user input fails validation (empty query, missing --force, ...).
 *
 * Exit code 1
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], hint?: string) {
    super(message, hint ?? 'Check your input and try again', 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A skill or prompt lookup by name
 */
export interface Lookup {
  kind: 'skill' | 'prompt';
  name: string;
  category?: string;
}

/**
 * Thrown when a named skill or prompt is not in the database.
 *
 * Exit code 1
 */
export class NotFoundError extends CLIError {
  public readonly lookup: Lookup;

  constructor(kind: 'skill' | 'prompt', name: string, category?: string) {
    const where = category ? ` in category ${category}` : '';
    const listCommand = category ? `skillbook skill list -c ${category}` : `skillbook ${kind} list`;
    super(
      `${kind === 'skill' ? 'Skill' : 'Prompt'} not found: ${name}${where}`,
      `Run: ${listCommand}  to see what is indexed`,
      1
    );
    this.name = 'NotFoundError';
    this.lookup = category ? { kind, name, category } : { kind, name };
  }
}
