/**
 * Unified logging
 * Structured winston logger with per-module child loggers.
 */

import { createLogger as createWinstonLogger, format, transports, Logger } from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { CrawlError } from '../core/errors';

const logFormat = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  format.errors({ stack: true }),
  format.splat(),
  format.json(),
);

const consoleFormat = format.combine(
  format.colorize(),
  format.timestamp({ format: 'HH:mm:ss' }),
  format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  }),
);

export const logger: Logger = createWinstonLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'qna-crawl-client' },
  transports: [
    new transports.Console({
      format: consoleFormat,
      silent: process.env.NODE_ENV === 'test',
    }),
  ],
});

/**
 * Adds rotating file transports under `logDir`. Off unless asked for, so that
 * importing the library never writes to the working directory.
 */
let fileLoggingDir: string | null = null;

export function enableFileLogging(logDir: string = path.join(process.cwd(), 'logs')): void {
  if (fileLoggingDir !== null) return;
  fileLoggingDir = logDir;
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  logger.add(
    new transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5,
    }),
  );
  logger.add(
    new transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5,
    }),
  );
}

if (process.env.LOG_TO_FILE === 'true') {
  enableFileLogging(process.env.LOG_DIR || undefined);
}

export interface LoggingSettings {
  level: 'debug' | 'info' | 'warn' | 'error';
  enableFileLogging: boolean;
  logDir: string;
}

/**
 * Applies the `logging` section of the app config.
 */
export function configureLogging(settings: LoggingSettings): void {
  setLogLevel(settings.level);
  if (settings.enableFileLogging) {
    enableFileLogging(settings.logDir);
  }
}

export interface LogContext {
  [key: string]: unknown;
}

export interface ModuleLogger {
  info: (message: string, meta?: LogContext) => void;
  warn: (message: string, meta?: LogContext) => void;
  error: (message: string, error?: unknown, meta?: LogContext) => void;
  debug: (message: string, meta?: LogContext) => void;
  verbose: (message: string, meta?: LogContext) => void;
}

export function describeError(error: unknown): LogContext {
  if (error instanceof CrawlError) {
    const meta: LogContext = {
      errorCode: error.code,
      errorMessage: error.message,
      retryable: error.retryable,
      errorContext: error.context,
    };
    if (error.originalError) {
      meta.originalError = {
        name: error.originalError.name,
        message: error.originalError.message,
      };
    }
    return meta;
  }
  if (error instanceof Error) {
    return { errorName: error.name, errorMessage: error.message };
  }
  return error === undefined ? {} : { errorMessage: String(error) };
}

export function createModuleLogger(module: string): ModuleLogger {
  return {
    info: (message: string, meta: LogContext = {}) => logger.info(message, { module, ...meta }),
    warn: (message: string, meta: LogContext = {}) => logger.warn(message, { module, ...meta }),
    error: (message: string, error?: unknown, meta: LogContext = {}) => {
      logger.error(message, { module, ...meta, ...describeError(error) });
    },
    debug: (message: string, meta: LogContext = {}) => logger.debug(message, { module, ...meta }),
    verbose: (message: string, meta: LogContext = {}) => logger.verbose(message, { module, ...meta }),
  };
}

/**
 * Module logger with sticky context and operation timing.
 */
export class EnhancedLogger {
  private baseLogger: ModuleLogger;
  private context: LogContext = {};

  constructor(module: string) {
    this.baseLogger = createModuleLogger(module);
  }

  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  info(message: string, meta?: LogContext): void {
    this.baseLogger.info(message, { ...this.context, ...meta });
  }

  warn(message: string, meta?: LogContext): void {
    this.baseLogger.warn(message, { ...this.context, ...meta });
  }

  error(message: string, error?: unknown, meta?: LogContext): void {
    this.baseLogger.error(message, error, { ...this.context, ...meta });
  }

  debug(message: string, meta?: LogContext): void {
    this.baseLogger.debug(message, { ...this.context, ...meta });
  }

  performance(operation: string, duration: number, metadata?: LogContext): void {
    this.baseLogger.info(`[PERF] ${operation}`, {
      ...this.context,
      ...metadata,
      duration,
      operation,
      type: 'performance',
    });
  }

  async trackAsync<T>(operation: string, fn: () => Promise<T>, metadata?: LogContext): Promise<T> {
    const startTime = Date.now();
    this.debug(`[START] ${operation}`, metadata);
    try {
      const result = await fn();
      this.performance(operation, Date.now() - startTime, metadata);
      return result;
    } catch (error: unknown) {
      this.performance(operation, Date.now() - startTime, metadata);
      this.error(`[FAILED] ${operation}`, error, metadata);
      throw error;
    }
  }
}

export function createEnhancedLogger(module: string): EnhancedLogger {
  return new EnhancedLogger(module);
}

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug',
  VERBOSE: 'verbose',
} as const;

export function setLogLevel(level: (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS]): void {
  logger.level = level;
}

export async function closeLogger(): Promise<void> {
  await new Promise<void>((resolve) => {
    logger.on('finish', resolve);
    logger.end();
  });
}
