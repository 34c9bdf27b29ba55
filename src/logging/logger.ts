/**
 * Gateway Logger
 * Winston-based structured logging
 */

import winston from 'winston';
import type { Logger } from './types';

export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: string;
  format?: LogFormat;
  service?: string;
  silent?: boolean;
}

// Custom format for pretty printing
const prettyFormat = winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const format = options.format ?? 'json';

  return winston.createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service: options.service ?? 'drone-gateway' },
    transports: [
      new winston.transports.Console({
        format: format === 'pretty'
          ? winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp({ format: 'HH:mm:ss' }),
            prettyFormat
          )
          : winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.json()
          ),
      }),
    ],
  });
}

/**
 * Error details for log context
 */
export function errorContext(error: unknown): { error: string; errorName?: string } {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}

export type { Logger };
