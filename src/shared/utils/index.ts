/**
 * Shared Utilities
 */

export { logger, Logger, LogLevel, type LogMeta } from './logger';
export { generateId } from './uuid';
