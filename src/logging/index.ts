/**
 * Logging Module
 * @module logging
 */

export {
  createLogger,
  getLogger,
  setLogger,
  getModuleLogger,
  type LogContext,
  type LoggerConfig,
  type DomainLogMethods,
  type StructuredLogger,
} from './logger.js';
