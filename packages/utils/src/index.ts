/**
 * @torrent-relay/utils
 * 
 * Shared utilities package containing:
 * - Structured logging
 * - Type guards
 */

// Type guards
export {
  isString,
  isNonEmptyString,
  isDefined,
} from './guards.js';

// Logger
export {
  logger,
  createLogger,
  createRootLogger,
  type Logger,
  type LoggerOptions,
} from './logger.js';
