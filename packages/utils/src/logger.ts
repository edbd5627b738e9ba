/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output, log rotation,
 * and context propagation.
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

// Log context interface
export interface LogContext {
  category?: string;
  phase?: string;
  bucket?: string;
  path?: string;
  [key: string]: unknown;
}

// Logger configuration interface
interface LoggerConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || 'info',
  enableConsole: process.env.LOG_CONSOLE !== 'false',
  enableFile: process.env.LOG_FILE !== 'false' && process.env.NODE_ENV !== 'test',
  logDir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
  maxFiles: process.env.LOG_MAX_FILES || '14d',
  maxSize: process.env.LOG_MAX_SIZE || '20m',
};

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

const transports: winston.transport[] = [];

if (defaultConfig.enableConsole) {
  // Console goes to stderr so generated output on stdout stays pipeable
  transports.push(
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      level: defaultConfig.level,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    })
  );
}

if (defaultConfig.enableFile) {
  try {
    if (!fs.existsSync(defaultConfig.logDir)) {
      fs.mkdirSync(defaultConfig.logDir, { recursive: true });
    }

    transports.push(
      new DailyRotateFile({
        filename: path.join(defaultConfig.logDir, 'error-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        format: structuredFormat,
        maxSize: defaultConfig.maxSize,
        maxFiles: defaultConfig.maxFiles,
        zippedArchive: true,
      })
    );

    transports.push(
      new DailyRotateFile({
        filename: path.join(defaultConfig.logDir, 'combined-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        format: structuredFormat,
        maxSize: defaultConfig.maxSize,
        maxFiles: defaultConfig.maxFiles,
        zippedArchive: true,
      })
    );
  } catch (error) {
    console.error('Failed to initialize file transports:', error);
  }
}

if (transports.length === 0) {
  // winston complains about writes with no transports
  transports.push(new winston.transports.Console({ silent: true }));
}

const winstonLogger = winston.createLogger({
  level: defaultConfig.level,
  format: structuredFormat,
  defaultMeta: { service: 'adprep' },
  transports,
  exitOnError: false,
});

/**
 * Logger with persistent context and package namespacing
 */
class Logger {
  private context: LogContext = {};
  private namespace: string = 'adprep';

  constructor(namespace?: string) {
    if (namespace) {
      this.namespace = namespace;
    }
  }

  /**
   * Set context that will be included in all subsequent log messages
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...this.context,
      ...additionalContext,
    };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }

  /**
   * Create a child logger with persistent context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.namespace);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }
}

export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export const logger = new Logger('adprep');

export { Logger };

export { winstonLogger };
