/**
 * services/pipeline.ts — Command orchestration
 *
 * run:      load inputs → resolve horizon → build variants → write CSVs
 * validate: read fact CSVs + cleaned inputs → data-quality report
 * publish:  read fact CSVs → PostgreSQL
 */
import { env } from '../config/env.ts';
import { getDb } from '../config/database.ts';
import { childLogger } from '../shared/logger.ts';
import {
  assertInputsExist, factPath, inputPaths, loadInputs, parseCsv,
  readAggregatedFacts, readLobFacts, writeAggregatedFacts, writeLobFacts,
  type DatasetDirs,
} from './dataset.ts';
import { AttendanceEventSchema, CapacitySnapshotSchema } from '../schemas.ts';
import { buildFactTable, resolveHorizon } from './fact-builder.ts';
import { buildValidationReport, writeValidationReport, type ValidationReport } from './validation.ts';
import { publishAggregatedFacts, publishLobFacts, type PublishMode } from './publish.ts';
import type { FactRow, FactVariant, Horizon, HorizonEndPolicy, IsoDate, LobFactRow } from '../types.ts';

const log = childLogger({ stage: 'pipeline' });

export type VariantSelection = FactVariant | 'both';

export interface PipelineConfig {
  dirs: DatasetDirs;
  reportsDir: string;
  variant: VariantSelection;
  start?: IsoDate;
  end?: IsoDate;
  policy: HorizonEndPolicy;
  publishMode: PublishMode;
}

export interface ConfigOverrides {
  variant?: VariantSelection;
  start?: IsoDate;
  end?: IsoDate;
  out?: string;
}

/** Defaults from env; CLI flags override. */
export function configFromEnv(overrides: ConfigOverrides = {}): PipelineConfig {
  return {
    dirs: {
      dimensionsDir: env.DIMENSIONS_DIR,
      cleanedDataDir: env.CLEANED_DATA_DIR,
      factsDir: overrides.out ?? env.FACTS_DIR,
    },
    reportsDir: env.REPORTS_DIR,
    variant: overrides.variant ?? 'both',
    start: overrides.start ?? env.HORIZON_START,
    end: overrides.end ?? env.HORIZON_END,
    policy: env.HORIZON_END_POLICY,
    publishMode: env.PUBLISH_MODE,
  };
}

export function selectedVariants(selection: VariantSelection): FactVariant[] {
  return selection === 'both' ? ['by-lob', 'aggregated'] : [selection];
}

// ── run ──

export interface RunPlan {
  horizon: Horizon;
  variants: FactVariant[];
  inputs: Record<string, number>;
  outputs: string[];
}

/** Load and validate inputs, resolve the horizon, and report what `run` would write */
export async function planRun(config: PipelineConfig): Promise<RunPlan> {
  const variants = selectedVariants(config.variant);
  const inputs = await loadInputs(config.dirs, { withLob: variants.includes('by-lob') });
  return {
    horizon: resolveHorizon(inputs, { start: config.start, end: config.end, policy: config.policy }),
    variants,
    inputs: {
      dates: inputs.dates.length,
      locations: inputs.locations.length,
      lobs: inputs.lobs.length,
      events: inputs.events.length,
      snapshots: inputs.snapshots.length,
    },
    outputs: variants.map(v => factPath(config.dirs.factsDir, v)),
  };
}

export interface RunResult {
  horizon: Horizon;
  byLob: LobFactRow[] | null;
  aggregated: FactRow[] | null;
  written: string[];
}

export async function runFacts(config: PipelineConfig): Promise<RunResult> {
  const variants = selectedVariants(config.variant);
  const inputs = await loadInputs(config.dirs, { withLob: variants.includes('by-lob') });
  const horizon = resolveHorizon(inputs, { start: config.start, end: config.end, policy: config.policy });
  log.info({ ...horizon, policy: config.policy, variants }, 'Horizon resolved');

  const result: RunResult = { horizon, byLob: null, aggregated: null, written: [] };

  if (variants.includes('by-lob')) {
    result.byLob = buildFactTable(inputs, horizon, 'by-lob');
    const path = factPath(config.dirs.factsDir, 'by-lob');
    await writeLobFacts(path, result.byLob);
    result.written.push(path);
  }
  if (variants.includes('aggregated')) {
    result.aggregated = buildFactTable(inputs, horizon, 'aggregated');
    const path = factPath(config.dirs.factsDir, 'aggregated');
    await writeAggregatedFacts(path, result.aggregated);
    result.written.push(path);
  }
  return result;
}

// ── validate ──

export async function runValidation(config: PipelineConfig): Promise<ValidationReport> {
  assertInputsExist(config.dirs, ['events', 'snapshots']);
  const byLob = await readLobFacts(factPath(config.dirs.factsDir, 'by-lob'));
  const aggregated = await readAggregatedFacts(factPath(config.dirs.factsDir, 'aggregated'));

  const paths = inputPaths(config.dirs);
  const events = await parseCsv(paths.events, AttendanceEventSchema);
  const snapshots = await parseCsv(paths.snapshots, CapacitySnapshotSchema);

  const report = buildValidationReport({ byLob, aggregated }, { events, snapshots });
  await writeValidationReport(config.reportsDir, report);
  return report;
}

// ── publish ──

export async function runPublish(config: PipelineConfig): Promise<Record<FactVariant, number>> {
  const variants = selectedVariants(config.variant);
  const published: Record<FactVariant, number> = { 'by-lob': 0, aggregated: 0 };
  const db = getDb();

  if (variants.includes('by-lob')) {
    const rows = await readLobFacts(factPath(config.dirs.factsDir, 'by-lob'));
    published['by-lob'] = await publishLobFacts(db, rows, config.publishMode);
  }
  if (variants.includes('aggregated')) {
    const rows = await readAggregatedFacts(factPath(config.dirs.factsDir, 'aggregated'));
    published.aggregated = await publishAggregatedFacts(db, rows, config.publishMode);
  }
  return published;
}
