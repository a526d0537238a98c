/**
 * Error handling module
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  DatabaseError,
  ValidationError,
  NotFoundError,
  type Lookup,
} from './types.js';

// Error handling utilities
export {
  formatError,
  describeError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
