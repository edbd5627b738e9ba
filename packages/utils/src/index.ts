/**
 * @adprep/utils - Shared utilities package
 *
 * Exports only:
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 */

export { logger, Logger, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export * from './config/index.js';

export * from './errors.js';
