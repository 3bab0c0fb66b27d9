import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { buildValidationReport, formatSummary, meanRate, pct, writeValidationReport } from '../services/validation.ts';
import { factRow, snapshot, events } from './fixtures.ts';
import type { FactRow, LobFactRow } from '../types.ts';

const austinOps = factRow({
  date: '2025-03-03', locationName: 'Austin', lobName: 'Ops', attendanceCount: 5, capacity: 10, occupancyRate: 0.5, isHybridDay: true,
});
const austinSales = factRow({
  date: '2025-03-03', locationName: 'Austin', lobName: 'Sales', attendanceCount: 12, capacity: 10, occupancyRate: 1.2, isHybridDay: true,
});
const bostonOps = factRow({ date: '2025-03-03', locationName: 'Boston', lobName: 'Ops', attendanceCount: 3 });
const bostonWeekend = factRow({ date: '2025-03-08', locationName: 'Boston', lobName: 'Sales', capacity: 20, occupancyRate: 0 });

const byLob: LobFactRow[] = [austinOps, austinSales, bostonOps, bostonWeekend];

const aggregated: FactRow[] = [
  { ...austinOps, attendanceCount: 17, occupancyRate: 1.7 },
  { ...bostonOps, isHybridDay: false },
];

const inputs = {
  events: [...events('2025-03-03', 'Austin', 'Ops', 1), ...events('2025-03-08', 'Boston', 'Sales', 1)],
  snapshots: [snapshot('Austin', '2025-03-01', 10)],
};

describe('buildValidationReport', () => {
  const report = buildValidationReport({ byLob, aggregated }, inputs);

  it('summarizes size and coverage', () => {
    expect(report).toMatchObject({
      factRows: 4,
      aggregatedRows: 2,
      factDateRange: { first: '2025-03-03', last: '2025-03-08' },
      locations: 2,
      lobs: 2,
      hybridRows: 2,
      aggregatedHybridRows: 1,
    });
  });

  it('splits mean occupancy by weekday and weekend', () => {
    expect(report.meanWeekdayRate).toBe(0.85);
    expect(report.meanWeekendRate).toBe(0);
  });

  it('lists unresolved and over-capacity rows', () => {
    expect(report.unresolvedCapacity.map(r => `${r.locationName} ${r.lobName}`)).toEqual(['Boston Ops']);
    expect(report.overCapacity.map(r => `${r.locationName} ${r.lobName}`)).toEqual(['Austin Sales']);
  });

  it('measures the gap between attendance and capacity recency', () => {
    expect(report.latestEventDate).toBe('2025-03-08');
    expect(report.latestSnapshotDate).toBe('2025-03-01');
    expect(report.recencyGapDays).toBe(7);
  });

  it('ranks offices worst first on weekday rows only', () => {
    expect(report.byLocation).toEqual([
      { location: 'Boston', rows: 1, meanOccupancyRate: null, unresolvedCapacity: 1, overCapacity: 0 },
      { location: 'Austin', rows: 2, meanOccupancyRate: 0.85, unresolvedCapacity: 0, overCapacity: 1 },
    ]);
  });

  it('formats the console summary', () => {
    const lines = formatSummary(report);
    expect(lines[0]).toBe('== Summary ==');
    expect(lines[1]).toBe('Fact rows: 4; Agg rows: 2');
    expect(lines[6]).toBe('Mean occupancy (weekday): 0.850; (weekend): 0.000');
    expect(lines[7]).toBe('Rows with attendance>0 and no capacity: 1 (25.0%)');
    expect(lines[9]).toBe('Latest attendance: 2025-03-08, latest capacity snapshot: 2025-03-01, gap: 7 days');
  });

  it('handles empty tables', () => {
    const empty = buildValidationReport({ byLob: [], aggregated: [] }, { events: [], snapshots: [] });
    expect(empty.factDateRange).toBeNull();
    expect(empty.meanWeekdayRate).toBeNull();
    expect(empty.recencyGapDays).toBeNull();
    expect(formatSummary(empty)[7]).toBe('Rows with attendance>0 and no capacity: 0 (n/a)');
  });
});

describe('report helpers', () => {
  it('formats percentages', () => {
    expect(pct(1, 4)).toBe('25.0%');
    expect(pct(1, 0)).toBe('n/a');
  });

  it('averages only known rates', () => {
    expect(meanRate(byLob)).toBe(0.5667);
    expect(meanRate([])).toBeNull();
  });
});

describe('writeValidationReport', () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it('writes detail files only when there is something to list', async () => {
    dir = await mkdtemp(join(tmpdir(), 'occupancy-report-'));
    const full = await writeValidationReport(join(dir, 'full'), buildValidationReport({ byLob, aggregated }, inputs));
    expect(full.map(p => basename(p))).toEqual([
      'validation_summary.txt', 'by_location_summary.csv', 'unresolved_capacity_rows.csv', 'over_capacity_days.csv',
    ]);

    const clean = byLob.slice(0, 1);
    const partial = await writeValidationReport(join(dir, 'clean'), buildValidationReport({ byLob: clean, aggregated }, inputs));
    expect(partial.map(p => basename(p))).toEqual(['validation_summary.txt', 'by_location_summary.csv']);
  });

  it('writes the per-office summary as CSV', async () => {
    dir = await mkdtemp(join(tmpdir(), 'occupancy-report-'));
    await writeValidationReport(dir, buildValidationReport({ byLob, aggregated }, inputs));
    const lines = (await readFile(join(dir, 'by_location_summary.csv'), 'utf-8')).trim().split('\n');
    expect(lines).toEqual([
      'office_location,rows,mean_occupancy_rate,unresolved_capacity,over_capacity_days',
      'Boston,1,,1,0',
      'Austin,2,0.85,0,1',
    ]);
  });
});
