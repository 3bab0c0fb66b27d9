/**
 * config/sentry.ts — Sentry error tracking (opt-in)
 *
 * Enable by setting SENTRY_DSN in environment.
 * When disabled, all functions are no-ops.
 */
import { env } from './env.ts';
import { childLogger } from '../shared/logger.ts';

type SentryModule = typeof import('@sentry/node');

const log = childLogger({ stage: 'sentry' });
let Sentry: SentryModule | null = null;

/**
 * Initialize Sentry. Call once before the pipeline starts.
 * No-op if SENTRY_DSN is not set.
 */
export async function initSentry(): Promise<void> {
  const dsn = env.SENTRY_DSN;
  if (!dsn) {
    log.debug('Sentry disabled (no SENTRY_DSN)');
    return;
  }

  const mod = await import('@sentry/node');
  mod.init({
    dsn,
    environment: env.NODE_ENV,
    release: process.env.npm_package_version || 'unknown',
    tracesSampleRate: 0,
  });
  Sentry = mod;
  log.info('Sentry initialized');
}

/**
 * Capture an exception manually.
 */
export function captureException(err: unknown, context?: Record<string, unknown>): void {
  const sentry = Sentry;
  if (!sentry) return;
  if (context) {
    sentry.withScope((scope) => {
      Object.entries(context).forEach(([key, value]) => {
        scope.setExtra(key, value);
      });
      sentry.captureException(err);
    });
  } else {
    sentry.captureException(err);
  }
}

/**
 * Flush pending events before exit.
 */
export async function flushSentry(timeout = 2000): Promise<void> {
  if (!Sentry) return;
  await Sentry.flush(timeout);
}
