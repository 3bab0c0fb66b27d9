/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * A batch run has no scrape endpoint, so the registry is dumped in text
 * exposition format to METRICS_FILE at the end of a run (node_exporter
 * textfile collector layout).
 *
 * Metrics:
 *   occupancy_stage_duration_seconds  — Histogram by stage/variant
 *   occupancy_input_records_total     — Counter by dataset
 *   occupancy_fact_rows               — Gauge by variant
 *   occupancy_unresolved_capacity_rows — Gauge by variant
 *   occupancy_hybrid_rows             — Gauge by variant
 */
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export const registry = new Registry();

// ── Pipeline Metrics ──

export const stageDuration = new Histogram({
  name: 'occupancy_stage_duration_seconds',
  help: 'Pipeline stage duration in seconds',
  labelNames: ['stage', 'variant'] as const,
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2.5, 5, 10, 30, 60],
  registers: [registry],
});

export const inputRecords = new Counter({
  name: 'occupancy_input_records_total',
  help: 'Records read from upstream datasets',
  labelNames: ['dataset'] as const,
  registers: [registry],
});

// ── Output Metrics ──

export const factRows = new Gauge({
  name: 'occupancy_fact_rows',
  help: 'Rows in the emitted fact table',
  labelNames: ['variant'] as const,
  registers: [registry],
});

export const unresolvedCapacityRows = new Gauge({
  name: 'occupancy_unresolved_capacity_rows',
  help: 'Fact rows with no valid capacity',
  labelNames: ['variant'] as const,
  registers: [registry],
});

export const hybridRows = new Gauge({
  name: 'occupancy_hybrid_rows',
  help: 'Fact rows flagged as hybrid anchor days',
  labelNames: ['variant'] as const,
  registers: [registry],
});

/**
 * Time a synchronous stage. Usage:
 *   const grid = timeStage('expand', variant, () => expandGrid(...));
 */
export function timeStage<T>(stage: string, variant: string, fn: () => T): T {
  const end = stageDuration.startTimer({ stage, variant });
  try {
    return fn();
  } finally {
    end();
  }
}

export async function writeMetricsFile(path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, await registry.metrics(), 'utf-8');
}
