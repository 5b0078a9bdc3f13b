/**
 * Logger Configuration
 * Centralized logging system using Winston
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'debug';
export type LogMetadata = Record<string, unknown>;

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
};

winston.addColors(logColors);

// <timestamp> - <category> - <LEVEL> - <message> <metadata>
const lineFormat = winston.format.printf(({ timestamp, level, message, category, ...metadata }) => {
  let msg = `${timestamp} - ${category ?? 'app'} - ${level.toUpperCase()} - ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss,SSS' }),
  winston.format.errors({ stack: true }),
  lineFormat
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, category }) => {
    return `${timestamp} ${category ?? 'app'} ${level}: ${message}`;
  }),
  winston.format.colorize({ all: true })
);

const consoleTransport = new winston.transports.Console({
  format: consoleFormat,
  level: isProduction ? 'warn' : 'debug',
  silent: isTest,
});

const logger = winston.createLogger({
  levels: logLevels,
  level: 'info',
  transports: [consoleTransport],
  exitOnError: false,
});

const LEVEL_ALIASES: Record<string, LogLevel> = {
  DEBUG: 'debug',
  INFO: 'info',
  HTTP: 'http',
  WARN: 'warn',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'error',
  FATAL: 'error',
};

/**
 * Map a level name as written in .env (INFO, WARNING, CRITICAL...) to a winston level.
 * Returns null for names winston cannot express.
 */
export const normalizeLogLevel = (raw: string): LogLevel | null => {
  return LEVEL_ALIASES[raw.trim().toUpperCase()] ?? null;
};

export interface LoggerOptions {
  level: LogLevel;
  file: string;
  errorLogDir?: string;
}

/**
 * Apply the runtime configuration: level, the appended call log file and a
 * rotated error log.
 */
export const configureLogger = (options: LoggerOptions): void => {
  logger.level = options.level;
  consoleTransport.level = options.level;

  if (isTest) {
    return;
  }

  logger.add(new winston.transports.File({
    filename: path.resolve(options.file),
    format: fileFormat,
    level: options.level,
  }));

  logger.add(new DailyRotateFile({
    filename: path.join(options.errorLogDir ?? 'logs', '%DATE%-error.log'),
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles: '30d',
    format: fileFormat,
    level: 'error',
  }));
};

// Stream for Morgan HTTP logger
export const stream = {
  write: (message: string) => {
    logger.http(message.trim(), { category: 'http' });
  }
};

export interface CategoryLogger {
  debug: (message: string, metadata?: LogMetadata) => void;
  info: (message: string, metadata?: LogMetadata) => void;
  warn: (message: string, metadata?: LogMetadata) => void;
  error: (message: string, metadata?: LogMetadata) => void;
}

const createCategoryLogger = (category: string): CategoryLogger => ({
  debug: (message, metadata) => logger.debug(message, { ...metadata, category }),
  info: (message, metadata) => logger.info(message, { ...metadata, category }),
  warn: (message, metadata) => logger.warn(message, { ...metadata, category }),
  error: (message, metadata) => logger.error(message, { ...metadata, category }),
});

export const loggers = {
  system: createCategoryLogger('system'),
  api: createCategoryLogger('api_routes'),
  call: createCategoryLogger('call_flow'),
  llm: createCategoryLogger('llm_service'),
  database: createCategoryLogger('database_service'),
  twilio: createCategoryLogger('twilio_service'),
};

/**
 * Flatten an unknown thrown value for log metadata.
 */
export const describeError = (error: unknown): LogMetadata => {
  if (error instanceof Error) {
    return { error: error.message, name: error.name, stack: error.stack };
  }
  return { error: String(error) };
};

export default logger;
