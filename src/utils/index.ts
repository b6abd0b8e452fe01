/**
 * Utilities Module
 *
 * Shared helpers used across the codebase.
 */

export { formatTable, type Column, type Alignment, type Row } from './table.js';
export {
  consoleLogger,
  silentLogger,
  createDeferredLogger,
  type Logger,
  type DeferredLogger,
} from './logger.js';
