import winston from 'winston';
import path from 'path';
import { config } from '../config';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Keys whose values are live network objects and never worth printing
const OMITTED_KEYS = new Set(['socket', 'connection', 'agent', 'request', 'response', 'body']);

// JSON stringify that survives circular references and Error instances
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (key, value: unknown) => {
    if (OMITTED_KEYS.has(key)) {
      return '[Omitted]';
    }

    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular Reference]';
      }
      seen.add(value);
    }

    return value;
  });
}

const logFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  let log = `${timestamp} [${level}]: ${message}`;

  if (Object.keys(metadata).length > 0) {
    try {
      log += ` ${safeStringify(metadata)}`;
    } catch (error) {
      log += ` [Error stringifying metadata: ${error instanceof Error ? error.message : 'Unknown error'}]`;
    }
  }

  if (stack) {
    log += `\n${stack}`;
  }

  return log;
});

export const logger = winston.createLogger({
  level: config.logging.level,
  format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), logFormat),
  transports: [
    new winston.transports.Console({
      // Tests assert on responses, not on log output
      silent: config.isTest,
      format: combine(
        colorize(),
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
      ),
    }),
  ],
});

if (config.isProduction) {
  logger.add(
    new winston.transports.File({
      filename: path.join('logs', 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: path.join('logs', 'combined.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

/** Formats an unknown thrown value for log metadata. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default logger;
