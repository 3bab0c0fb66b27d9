/**
 * services/validation.ts — Data-quality report over the fact tables
 *
 * Conditions that are expected in real data (no capacity yet, more people
 * than desks) are not pipeline failures; they are counted here so analysts
 * can see how much of the occupancy picture they affect.
 *
 * Output files (under REPORTS_DIR):
 *   validation_summary.txt       — console summary
 *   by_location_summary.csv      — weekday quality per office
 *   unresolved_capacity_rows.csv — attendance > 0 with no capacity (only if any)
 *   over_capacity_days.csv       — occupancy_rate > 1 (only if any)
 */
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { childLogger } from '../shared/logger.ts';
import { writeCsv } from './dataset.ts';
import { compareOrdinal, daysBetween, safeDiv } from './helpers.ts';
import type { FactRow, FactTables, LobFactRow, PipelineInputs, IsoDate } from '../types.ts';

const log = childLogger({ stage: 'validate' });

export interface LocationQuality {
  location: string;
  rows: number;
  meanOccupancyRate: number | null;
  unresolvedCapacity: number;
  overCapacity: number;
}

export interface DateRange {
  first: IsoDate;
  last: IsoDate;
}

export interface ValidationReport {
  factRows: number;
  aggregatedRows: number;
  factDateRange: DateRange | null;
  aggregatedDateRange: DateRange | null;
  locations: number;
  lobs: number;
  meanWeekdayRate: number | null;
  meanWeekendRate: number | null;
  unresolvedCapacity: LobFactRow[];
  overCapacity: LobFactRow[];
  latestEventDate: IsoDate | null;
  latestSnapshotDate: IsoDate | null;
  recencyGapDays: number | null;
  hybridRows: number;
  aggregatedHybridRows: number;
  byLocation: LocationQuality[];
}

export const pct = (n: number, d: number): string => (d ? `${(n / d * 100).toFixed(1)}%` : 'n/a');

const fmt = (n: number): string => n.toLocaleString('en-US');

/** Mean of non-null rates, rounded to 4 places; null when there are none */
export function meanRate(rows: FactRow[]): number | null {
  let sum = 0, n = 0;
  for (const r of rows) {
    if (r.occupancyRate !== null) { sum += r.occupancyRate; n++; }
  }
  return n ? safeDiv(sum, n, 4) : null;
}

function dateRange(rows: FactRow[]): DateRange | null {
  if (!rows.length) return null;
  let first = rows[0]?.date ?? '', last = first;
  for (const r of rows) {
    if (r.date < first) first = r.date;
    if (r.date > last) last = r.date;
  }
  return { first, last };
}

function latest(values: IsoDate[]): IsoDate | null {
  let out: IsoDate | null = null;
  for (const v of values) if (out === null || v > out) out = v;
  return out;
}

const isUnresolved = (r: FactRow): boolean => r.attendanceCount > 0 && r.capacity === null;
const isOverCapacity = (r: FactRow): boolean => r.occupancyRate !== null && r.occupancyRate > 1;

function byLocationSummary(rows: LobFactRow[]): LocationQuality[] {
  const groups = new Map<string, LobFactRow[]>();
  for (const r of rows) {
    if (r.isWeekend) continue;
    const g = groups.get(r.locationName);
    if (g) g.push(r);
    else groups.set(r.locationName, [r]);
  }

  const out: LocationQuality[] = [];
  for (const [location, g] of groups) {
    out.push({
      location,
      rows: g.length,
      meanOccupancyRate: meanRate(g),
      unresolvedCapacity: g.filter(isUnresolved).length,
      overCapacity: g.filter(isOverCapacity).length,
    });
  }

  // worst first: unresolved desc, over capacity desc, mean rate asc (unknown last)
  return out.sort((a, b) =>
    b.unresolvedCapacity - a.unresolvedCapacity
    || b.overCapacity - a.overCapacity
    || (a.meanOccupancyRate ?? Infinity) - (b.meanOccupancyRate ?? Infinity)
    || compareOrdinal(a.location, b.location));
}

export function buildValidationReport(
  facts: FactTables,
  inputs: Pick<PipelineInputs, 'events' | 'snapshots'>,
): ValidationReport {
  const { byLob, aggregated } = facts;
  const latestEventDate = latest(inputs.events.map(e => e.date));
  const latestSnapshotDate = latest(inputs.snapshots.map(s => s.effectiveDate));

  return {
    factRows: byLob.length,
    aggregatedRows: aggregated.length,
    factDateRange: dateRange(byLob),
    aggregatedDateRange: dateRange(aggregated),
    locations: new Set(byLob.map(r => r.locationName)).size,
    lobs: new Set(byLob.map(r => r.lobName)).size,
    meanWeekdayRate: meanRate(byLob.filter(r => !r.isWeekend)),
    meanWeekendRate: meanRate(byLob.filter(r => r.isWeekend)),
    unresolvedCapacity: byLob.filter(isUnresolved),
    overCapacity: byLob.filter(isOverCapacity),
    latestEventDate,
    latestSnapshotDate,
    recencyGapDays: latestEventDate && latestSnapshotDate ? daysBetween(latestSnapshotDate, latestEventDate) : null,
    hybridRows: byLob.filter(r => r.isHybridDay).length,
    aggregatedHybridRows: aggregated.filter(r => r.isHybridDay).length,
    byLocation: byLocationSummary(byLob),
  };
}

export function formatSummary(report: ValidationReport): string[] {
  const range = (r: DateRange | null) => (r ? `${r.first} to ${r.last}` : 'n/a');
  const rate = (r: number | null) => (r === null ? 'n/a' : r.toFixed(3));

  return [
    '== Summary ==',
    `Fact rows: ${fmt(report.factRows)}; Agg rows: ${fmt(report.aggregatedRows)}`,
    `Fact date range: ${range(report.factDateRange)}`,
    `Agg date range: ${range(report.aggregatedDateRange)}`,
    `Locations: ${report.locations}`,
    `LOBs: ${report.lobs}`,
    `Mean occupancy (weekday): ${rate(report.meanWeekdayRate)}; (weekend): ${rate(report.meanWeekendRate)}`,
    `Rows with attendance>0 and no capacity: ${fmt(report.unresolvedCapacity.length)} (${pct(report.unresolvedCapacity.length, report.factRows)})`,
    `Rows with occupancy_rate > 1.0: ${fmt(report.overCapacity.length)} (${pct(report.overCapacity.length, report.factRows)})`,
    `Latest attendance: ${report.latestEventDate ?? 'n/a'}, latest capacity snapshot: ${report.latestSnapshotDate ?? 'n/a'}, gap: ${report.recencyGapDays ?? 'n/a'} days`,
    `Hybrid rows: ${fmt(report.hybridRows)} (per-LOB); ${fmt(report.aggregatedHybridRows)} (aggregated)`,
  ];
}

const DETAIL_COLUMNS = ['date', 'location_name', 'lob_name', 'attendance_count', 'capacity', 'occupancy_rate'];

const detailCells = (r: LobFactRow) => [r.date, r.locationName, r.lobName, r.attendanceCount, r.capacity, r.occupancyRate];

const byLocationThenDate = (a: LobFactRow, b: LobFactRow): number =>
  compareOrdinal(a.locationName, b.locationName) || compareOrdinal(a.date, b.date);

/** Write the report files; returns the paths written */
export async function writeValidationReport(dir: string, report: ValidationReport): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const written: string[] = [];

  const summary = formatSummary(report);
  const summaryPath = join(dir, 'validation_summary.txt');
  await writeFile(summaryPath, summary.join('\n'), 'utf-8');
  written.push(summaryPath);

  const byLocPath = join(dir, 'by_location_summary.csv');
  await writeCsv(
    byLocPath,
    ['office_location', 'rows', 'mean_occupancy_rate', 'unresolved_capacity', 'over_capacity_days'],
    report.byLocation.map(l => [l.location, l.rows, l.meanOccupancyRate, l.unresolvedCapacity, l.overCapacity]),
  );
  written.push(byLocPath);

  if (report.unresolvedCapacity.length) {
    const p = join(dir, 'unresolved_capacity_rows.csv');
    await writeCsv(p, DETAIL_COLUMNS, [...report.unresolvedCapacity].sort(byLocationThenDate).map(detailCells));
    written.push(p);
  }
  if (report.overCapacity.length) {
    const p = join(dir, 'over_capacity_days.csv');
    await writeCsv(p, DETAIL_COLUMNS, [...report.overCapacity].sort(byLocationThenDate).map(detailCells));
    written.push(p);
  }

  for (const line of summary) log.info(line);
  log.info({ files: written }, 'Validation report written');
  return written;
}
