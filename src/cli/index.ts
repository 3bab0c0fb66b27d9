#!/usr/bin/env tsx
// ═══════════════════════════════════════════════════════
// occupancy-facts — build and publish the occupancy fact tables
//
//   occupancy-facts [run|validate|publish|all] [--variant by-lob|aggregated|both]
//                   [--start YYYY-MM-DD] [--end YYYY-MM-DD] [--out DIR] [--dry-run]
//
// Exit codes: 0 ok, 1 unexpected failure, 2 pipeline error, 64 usage error
// ═══════════════════════════════════════════════════════
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { env } from '../config/env.ts';
import { closeDb } from '../config/database.ts';
import { initSentry, captureException, flushSentry } from '../config/sentry.ts';
import { logger } from '../shared/logger.ts';
import { isPipelineError } from '../shared/errors.ts';
import { writeMetricsFile } from '../shared/metrics.ts';
import { CliOptionsSchema, type CliOptions } from '../schemas.ts';
import { configFromEnv, planRun, runFacts, runPublish, runValidation, type PipelineConfig } from '../services/pipeline.ts';
import { getFlagValue, hasFlag, missingValues, positionals, unknownFlags } from './argv.ts';

export const USAGE = `Usage: occupancy-facts [run|validate|publish|all] [options]

Commands:
  run        Build the fact tables and write them as CSV
  validate   Write the data-quality report for the current fact CSVs
  publish    Load the fact CSVs into PostgreSQL (ENABLE_DB=true)
  all        run, then validate (default)

Options:
  --variant <by-lob|aggregated|both>   Fact tables to build or publish (default: both)
  --start <YYYY-MM-DD>                 Horizon start (overrides HORIZON_START)
  --end <YYYY-MM-DD>                   Horizon cutoff (overrides HORIZON_END)
  --out <dir>                          Fact output directory (overrides FACTS_DIR)
  --dry-run                            Print the plan without writing anything
  --help                               Show this message`;

const VALUE_FLAGS = ['--variant', '--start', '--end', '--out'] as const;
const KNOWN_FLAGS = [...VALUE_FLAGS, '--dry-run', '--help'] as const;

export const EXIT = { ok: 0, failure: 1, pipeline: 2, usage: 64 } as const;

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'options'; options: CliOptions }
  | { kind: 'usage-error'; errors: string[] };

export function parseCliArgs(argv: string[]): ParsedArgs {
  if (hasFlag(argv, '--help')) return { kind: 'help' };

  const errors = unknownFlags(argv, KNOWN_FLAGS).map(f => `Unknown option ${f}`);
  errors.push(...missingValues(argv, VALUE_FLAGS).map(f => `Option ${f} needs a value`));
  const args = positionals(argv, VALUE_FLAGS);
  if (args.length > 1) errors.push(`Unexpected arguments: ${args.slice(1).join(' ')}`);
  if (errors.length) return { kind: 'usage-error', errors };

  const result = CliOptionsSchema.safeParse({
    command: args[0],
    variant: getFlagValue(argv, '--variant') ?? undefined,
    start: getFlagValue(argv, '--start') ?? undefined,
    end: getFlagValue(argv, '--end') ?? undefined,
    out: getFlagValue(argv, '--out') ?? undefined,
    dryRun: hasFlag(argv, '--dry-run'),
  });
  if (!result.success) {
    return {
      kind: 'usage-error',
      errors: result.error.issues.map(i => `${i.path.join('.') || 'arguments'}: ${i.message}`),
    };
  }
  return { kind: 'options', options: result.data };
}

// ── Commands ──

async function printPlan(config: PipelineConfig, options: CliOptions): Promise<void> {
  const plan = await planRun(config);
  const lines = [
    `Command:  ${options.command}`,
    `Horizon:  ${plan.horizon.start} to ${plan.horizon.cutoff} (${config.policy})`,
    `Inputs:   ${Object.entries(plan.inputs).map(([k, n]) => `${k}=${n}`).join(', ')}`,
    `Variants: ${plan.variants.join(', ')}`,
  ];
  if (options.command !== 'validate') lines.push(...plan.outputs.map(p => `Writes:   ${p}`));
  if (options.command === 'validate' || options.command === 'all') lines.push(`Report:   ${config.reportsDir}`);
  if (options.command === 'publish') lines.push(`Publish:  ${config.publishMode} (ENABLE_DB=${env.ENABLE_DB})`);
  console.log(lines.join('\n'));
}

async function execute(options: CliOptions): Promise<void> {
  const config = configFromEnv(options);
  if (options.dryRun) {
    await printPlan(config, options);
    return;
  }

  switch (options.command) {
    case 'run':
      await runFacts(config);
      break;
    case 'validate':
      await runValidation(config);
      break;
    case 'publish':
      await runPublish(config);
      break;
    case 'all':
      await runFacts(config);
      // the report compares both tables
      if (config.variant === 'both') await runValidation(config);
      else logger.info({ variant: config.variant }, 'Validation skipped (needs both variants)');
      break;
  }
}

async function cleanup(): Promise<void> {
  try {
    if (env.METRICS_FILE) await writeMetricsFile(env.METRICS_FILE);
    await flushSentry(2000);
    await closeDb();
  } catch (err) { logger.warn({ err }, 'Cleanup error'); }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed.kind === 'help') {
    console.log(USAGE);
    return EXIT.ok;
  }
  if (parsed.kind === 'usage-error') {
    for (const e of parsed.errors) console.error(e);
    console.error(`\n${USAGE}`);
    return EXIT.usage;
  }

  const { options } = parsed;
  await initSentry();
  const t0 = Date.now();
  try {
    await execute(options);
    logger.info({ command: options.command, ms: Date.now() - t0 }, 'Done');
    return EXIT.ok;
  } catch (err) {
    captureException(err, { command: options.command, variant: options.variant });
    if (isPipelineError(err)) {
      logger.error({ code: err.code, details: err.details }, err.message);
      return EXIT.pipeline;
    }
    logger.fatal({ err }, 'Unexpected failure');
    return EXIT.failure;
  } finally {
    await cleanup();
  }
}

// Only run when executed directly (not when imported by tests)
const thisFile = fileURLToPath(import.meta.url);
const entryFile = resolve(process.argv[1] ?? '');
if (thisFile === entryFile) {
  main().then((code) => {
    process.exitCode = code;
  }).catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exitCode = EXIT.failure;
  });
}
