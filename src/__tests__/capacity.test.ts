import { describe, it, expect } from 'vitest';
import { resolveCapacity, isValidCapacity } from '../services/capacity.ts';
import { applyOccupancy } from '../services/occupancy.ts';
import { expandGrid } from '../services/grid.ts';
import { dateRow, location, snapshot } from './fixtures.ts';
import type { FilledCell, IsoDate } from '../types.ts';

const austin = location(1, 'Austin');
const boston = location(2, 'Boston');

function cells(dates: IsoDate[], attendance: number[] = []): FilledCell[] {
  return expandGrid(dates.map(dateRow), [austin]).map((c, i) => ({ ...c, attendanceCount: attendance[i] ?? 0 }));
}

const capacities = (rows: Array<{ capacity: number | null }>) => rows.map(r => r.capacity);

describe('isValidCapacity', () => {
  it('accepts positive finite numbers only', () => {
    expect(isValidCapacity(120)).toBe(true);
    expect(isValidCapacity(0)).toBe(false);
    expect(isValidCapacity(-5)).toBe(false);
    expect(isValidCapacity(null)).toBe(false);
    expect(isValidCapacity(Number.NaN)).toBe(false);
  });
});

describe('resolveCapacity', () => {
  const snaps = [snapshot('Austin', '2025-01-01', 100), snapshot('Austin', '2025-03-01', 120)];

  it('uses the latest snapshot on or before each date', () => {
    const out = resolveCapacity(cells(['2024-12-31', '2025-02-15', '2025-03-01', '2025-03-15']), snaps);
    expect(capacities(out)).toEqual([null, 100, 120, 120]);
  });

  it('feeds occupancy from the as-of capacity', () => {
    const out = applyOccupancy(resolveCapacity(cells(['2025-02-15', '2025-03-15'], [80, 90]), snaps));
    expect(out.map(c => c.occupancyRate)).toEqual([0.8, 0.75]);
  });

  it('does not depend on snapshot input order', () => {
    const out = resolveCapacity(cells(['2025-02-15', '2025-03-15']), [...snaps].reverse());
    expect(capacities(out)).toEqual([100, 120]);
  });

  it('takes the last snapshot of a repeated date', () => {
    const out = resolveCapacity(cells(['2025-01-02']), [
      snapshot('Austin', '2025-01-01', 50),
      snapshot('Austin', '2025-01-01', 60),
    ]);
    expect(capacities(out)).toEqual([60]);
  });

  it('skips invalid snapshots instead of resetting to unknown', () => {
    const out = resolveCapacity(cells(['2025-02-15']), [
      snapshot('Austin', '2025-01-01', 100),
      snapshot('Austin', '2025-02-01', 0),
      snapshot('Austin', '2025-02-10', null),
      snapshot('Austin', '2025-02-12', -5),
    ]);
    expect(capacities(out)).toEqual([100]);
  });

  it('leaves locations without snapshots unresolved', () => {
    const grid = expandGrid([dateRow('2025-02-15')], [austin, boston]).map(c => ({ ...c, attendanceCount: 3 }));
    const out = resolveCapacity(grid, [...snaps, snapshot('Denver', '2025-01-01', 40)]);
    expect(out.map(c => [c.location.officeLocationName, c.capacity])).toEqual([['Austin', 100], ['Boston', null]]);
  });

  it('returns cells in input order', () => {
    const out = resolveCapacity(cells(['2025-03-15', '2024-12-31', '2025-02-15']), snaps);
    expect(out.map(c => c.date.date)).toEqual(['2025-03-15', '2024-12-31', '2025-02-15']);
    expect(capacities(out)).toEqual([120, null, 100]);
  });
});
