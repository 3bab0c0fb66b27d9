/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if a variable is malformed.
 * Provides typed access to all config values.
 */
import 'dotenv/config';
import { z } from 'zod';
import { parseIsoDate } from '../services/helpers.ts';

const isoDate = z.string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
  .refine(v => parseIsoDate(v) !== null, 'Not a calendar date');

// z.coerce.boolean() treats "false" as true
const flag = z.enum(['true', 'false', '1', '0']).default('false').transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // ── File layout ──
  DIMENSIONS_DIR: z.string().min(1).default('dimensions'),
  CLEANED_DATA_DIR: z.string().min(1).default('cleaned_data'),
  FACTS_DIR: z.string().min(1).default('facts'),
  REPORTS_DIR: z.string().min(1).default('reports'),

  // ── Horizon ──
  HORIZON_START: isoDate.optional(),
  HORIZON_END: isoDate.optional(),
  HORIZON_END_POLICY: z.enum(['snapshot-date', 'snapshot-month-end']).default('snapshot-date'),

  // ── PostgreSQL (publish only) ──
  ENABLE_DB: flag,
  DATABASE_URL: z.string().url().startsWith('postgres').optional().describe('PostgreSQL connection string'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(1),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(4),
  DB_SSL: flag,
  PUBLISH_MODE: z.enum(['overwrite', 'append']).default('overwrite'),

  // ── Metrics ──
  METRICS_FILE: z.string().min(1).optional(),

  // ── Error Tracking ──
  SENTRY_DSN: z.string().url().optional(),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  // Empty strings in .env mean "unset"
  const raw = Object.fromEntries(
    Object.entries(process.env).filter(([, v]) => v !== undefined && v !== ''),
  );

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    console.error('❌ Environment validation failed:');
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  if (result.data.ENABLE_DB && !result.data.DATABASE_URL) {
    console.error('❌ Environment validation failed:');
    console.error('   DATABASE_URL: required when ENABLE_DB=true');
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
