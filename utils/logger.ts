/**
 * Logging Utility
 * 
 * Centralized logging using Winston for structured, level-based logging.
 */

import winston from 'winston';
import path from 'path';
import config from '../config/env';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

export type LogLevel = keyof typeof levels;

const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'key', 'authorization', 'apikey'];

const isSensitiveKey = (key: string): boolean => {
  const lowered = key.toLowerCase().replace(/[-_]/g, '');
  return SENSITIVE_KEYS.some(k => lowered.includes(k));
};

function redactValue(value: unknown, seen: WeakSet<object>): unknown {
  if (!value || typeof value !== 'object' || value instanceof Error || value instanceof Date) {
    return value;
  }
  if (seen.has(value)) return '[Circular]';
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map(item => redactValue(item, seen));
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveKey(key) ? '***REDACTED***' : redactValue(nested, seen);
  }
  return redacted;
}

// Redaction format for secrets. Mutates in place so winston's symbol keys survive.
export const redactSecrets = winston.format((info) => {
  const seen = new WeakSet<object>();
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') continue;
    info[key] = isSensitiveKey(key) ? '***REDACTED***' : redactValue(info[key], seen);
  }
  return info;
});

const logFormat = winston.format.combine(
  redactSecrets(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.printf(
    (info) => `${info.timestamp} ${info.level}: ${info.message}`
  )
);

const consoleFormat = winston.format.combine(
  redactSecrets(),
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.printf(
    (info) => `${info.timestamp} ${info.level}: ${info.message}`
  )
);

const logger = winston.createLogger({
  level: config.logLevel,
  levels,
  format: logFormat,
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      silent: config.env === 'test',
    }),
  ],
  exitOnError: false
});

if (config.enableFileLogging) {
  const logDir = config.logDir;

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
    })
  );

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'all.log'),
    })
  );
}

logger.debug(`Logger initialized at level: ${config.logLevel}`, {
  environment: config.env
});

function logWithContext(level: LogLevel, message: string, meta: Record<string, unknown> = {}): void {
  logger.log(level, message, meta);
}

export interface LoggerInterface {
  debug: (message: string, ...meta: unknown[]) => void;
  info: (message: string, ...meta: unknown[]) => void;
  warn: (message: string, ...meta: unknown[]) => void;
  error: (message: string, ...meta: unknown[]) => void;
  debugWithContext: (message: string, meta?: Record<string, unknown>) => void;
  infoWithContext: (message: string, meta?: Record<string, unknown>) => void;
  warnWithContext: (message: string, meta?: Record<string, unknown>) => void;
  errorWithContext: (message: string, meta?: Record<string, unknown>) => void;
  logger: winston.Logger;
}

const loggerExport: LoggerInterface = {
  debug: logger.debug.bind(logger),
  info: logger.info.bind(logger),
  warn: logger.warn.bind(logger),
  error: logger.error.bind(logger),

  debugWithContext: (message: string, meta?: Record<string, unknown>) => logWithContext('debug', message, meta),
  infoWithContext: (message: string, meta?: Record<string, unknown>) => logWithContext('info', message, meta),
  warnWithContext: (message: string, meta?: Record<string, unknown>) => logWithContext('warn', message, meta),
  errorWithContext: (message: string, meta?: Record<string, unknown>) => logWithContext('error', message, meta),

  // Raw logger instance (for advanced usage)
  logger
};

export default loggerExport;
