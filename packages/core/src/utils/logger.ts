import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { extractErrorDetails } from '../errors/base.js';
import { type AppConfig, cfg } from './config.js';

/**
 * Logger configuration and setup for lattice-tree
 *
 * Pretty-printed output in development, structured JSON otherwise; tests only
 * see warnings and errors. Output always goes to stderr.
 */

/**
 * Logger factory for creating configured logger instances
 */
export class LoggerFactory {
  private readonly appConfig: AppConfig;
  private readonly mainLogger: Logger;

  constructor(appConfig: AppConfig) {
    this.appConfig = appConfig;
    const options = this.createLoggerOptions();
    // pino refuses a destination stream alongside a transport
    this.mainLogger = options.transport ? pino(options) : pino(options, process.stderr);
  }

  /**
   * Create logger options based on environment
   */
  private createLoggerOptions(): LoggerOptions {
    const isDevelopment = this.appConfig.NODE_ENV === 'development';
    const isTest = this.appConfig.NODE_ENV === 'test';

    const baseOptions: LoggerOptions = {
      level: isTest ? 'warn' : this.appConfig.LOG_LEVEL,
      base: {
        pid: process.pid,
        hostname: process.env.HOSTNAME || 'unknown',
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    };

    // Development: pretty printing
    if (isDevelopment) {
      return {
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
            singleLine: false,
            destination: 2, // stderr
          },
        },
      };
    }

    return baseOptions;
  }

  getLogger(): Logger {
    return this.mainLogger;
  }

  /**
   * Create a module-specific logger
   *
   * @param moduleName - Name of the module/component
   */
  createModuleLogger(moduleName: string): Logger {
    return this.mainLogger.child({ module: moduleName });
  }
}

// Default factory instance using global config
const defaultFactory = new LoggerFactory(cfg);

export function createLoggerFactory(appConfig: AppConfig): LoggerFactory {
  return new LoggerFactory(appConfig);
}

/**
 * Main library logger instance
 */
export const logger = defaultFactory.getLogger();

export function createModuleLogger(moduleName: string): Logger {
  return defaultFactory.createModuleLogger(moduleName);
}

/**
 * Error logging utility with stack trace handling
 *
 * @param logger - Logger instance to use
 * @param error - Error object or message
 * @param context - Additional context about the error
 */
export function logError(
  logger: Logger,
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  if (typeof error === 'string') {
    logger.error(context, error);
    return;
  }

  const details = extractErrorDetails(error);
  logger.error({ ...context, error: details }, details.message);
}

export default logger;
