/**
 * shared/logger.ts — Structured logging via Pino
 *
 * Development: pino-pretty (colorized, human-readable)
 * Production:  JSON lines (machine-parseable, ELK/Datadog/CloudWatch compatible)
 *
 * Every pipeline stage logs through a child logger bound to `stage`,
 * so a run can be followed end to end by filtering on that field.
 */
import pino from 'pino';
import { env } from '../config/env.ts';

export const logger = pino({
  level: env.LOG_LEVEL,
  transport: env.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' } }
    : undefined, // JSON in production
  base: {
    service: 'occupancy-facts',
    version: process.env.npm_package_version || '1.0.0',
    env: env.NODE_ENV,
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  redact: {
    paths: ['databaseUrl', '*.databaseUrl', '*.password'],
    censor: '[REDACTED]',
  },
});

export type Logger = pino.Logger;

/**
 * Create a child logger with additional context.
 * Usage: const log = childLogger({ stage: 'capacity', variant });
 */
export function childLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
