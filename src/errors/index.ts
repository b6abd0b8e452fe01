/**
 * Error handling module
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: sectionpick config list');
 */

// Error types
export {
  CLIError,
  ConfigError,
  FileNotFoundError,
  ValidationError,
  TerminalError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  formatZodIssues,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
