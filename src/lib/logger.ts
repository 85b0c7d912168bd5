/* eslint-disable @typescript-eslint/no-base-to-string */
import winston from 'winston';
import { config } from './config.js';
import type { TransformableInfo } from 'logform';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

// Human-readable format for development
const humanFormat = combine(
  colorize(),
  timestamp({ format: 'HH:mm:ss' }),
  errors({ stack: true }),
  printf((info: TransformableInfo) => {
    const { level, message, timestamp: ts, namespace, stack, ...meta } = info;

    const ns = typeof namespace === 'string' ? `[${namespace}]` : '';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';

    if (typeof stack === 'string') {
      return `${String(ts)} ${level} ${ns}: ${String(message)}\n${stack}${metaStr}`;
    }

    return `${String(ts)} ${level} ${ns}: ${String(message)}${metaStr}`;
  }),
);

// JSON format for production
const jsonFormat = combine(timestamp(), errors({ stack: true }), json());

const mainLogger = winston.createLogger({
  level: config.LOG_LEVEL === 'none' ? 'error' : config.LOG_LEVEL,
  format: config.LOG_FORMAT === 'json' ? jsonFormat : humanFormat,
  transports: [new winston.transports.Console()],
  silent: config.LOG_LEVEL === 'none',
});

export type Logger = winston.Logger;

export function logger(namespace?: string, meta?: Record<string, unknown>): Logger {
  return mainLogger.child({ namespace, ...meta });
}

export const rootLogger = mainLogger;
