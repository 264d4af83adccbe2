/**
 * Utility Functions
 *
 * - Logging utilities
 * - Configuration management
 */

// Logging utilities
export {
  LoggerFactory,
  createLoggerFactory,
  createModuleLogger,
  logError,
  logger,
} from './utils/logger.js';

// Configuration
export * from './utils/config.js';
