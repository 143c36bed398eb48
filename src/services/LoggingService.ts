/**
 * Centralized logging service using Winston
 * Console output for humans, optional JSON file for later inspection
 */

import winston from 'winston';
import { LogLevel } from '../domain/models/types';

export interface LoggerOptions {
  /** Path to a JSON log file; omitted means console only */
  logFile?: string;
  /** Minimum logging level (default: 'info') */
  level?: LogLevel;
  /** Discard all output (tests) */
  silent?: boolean;
}

/**
 * LoggingService provides centralized, structured logging
 * for all application and error messages
 */
export class LoggingService {
  private logger: winston.Logger;
  private context: string;
  private options: LoggerOptions;

  /**
   * Creates a new LoggingService instance
   * @param context - The context/module name for log messages
   * @param options - File, level and silence settings
   */
  constructor(context: string, options: LoggerOptions = {}) {
    this.context = context;
    this.options = options;

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ level, message, context, timestamp }) => {
            return `${timestamp} [${context}] ${level}: ${message}`;
          })
        ),
      }),
    ];

    if (options.logFile) {
      transports.push(
        new winston.transports.File({
          filename: options.logFile,
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.json()
          ),
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.splat()
      ),
      defaultMeta: { context: this.context },
      transports,
    });
  }

  /**
   * Log an informational message
   */
  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  /**
   * Log a warning message
   */
  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  /**
   * Log an error message
   * @param message - The error message
   * @param error - The error object (optional)
   * @param meta - Additional metadata
   */
  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    this.logger.error(message, {
      ...meta,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : error,
    });
  }

  /**
   * Log a debug message
   */
  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * Create a child logger with additional context
   * @param childContext - Additional context to append
   * @returns A new LoggingService instance sharing this one's settings
   */
  child(childContext: string): LoggingService {
    return new LoggingService(`${this.context}:${childContext}`, this.options);
  }

  /**
   * Close the logger and flush any pending writes
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.on('finish', resolve);
      this.logger.end();
    });
  }
}

/**
 * Factory function to create a logger instance
 * @param context - The context/module name
 * @param options - File, level and silence settings
 */
export function createLogger(context: string, options: LoggerOptions = {}): LoggingService {
  return new LoggingService(context, options);
}
