/**
 * services/grid.ts — Grid Expander + Grid Filler
 *
 * The grid is the fact table's key space: every date × location (× LOB)
 * combination inside the horizon, exactly once. Attendance counts are
 * left-joined onto it and absent combinations become 0.
 */
import { EmptyDimensionError, InconsistentKeyError } from '../shared/errors.ts';
import { compositeKey } from './helpers.ts';
import type { AttendanceCounts } from './aggregator.ts';
import type { DateRow, LocationRow, LineOfBusinessRow, GridCell, FilledCell } from '../types.ts';

function assertUnique<T>(rows: T[], keyOf: (row: T) => string, dimension: string): void {
  const seen = new Set<string>();
  for (const row of rows) {
    const key = keyOf(row);
    if (seen.has(key)) {
      throw new InconsistentKeyError(`Duplicate ${dimension} key "${key}"`, { dimension, key });
    }
    seen.add(key);
  }
}

/**
 * Cartesian product of the dimensions, in input order (date-major).
 * Pass `lobs` for the per-LOB variant, omit it for the aggregated one.
 * Dates are expected to be restricted to the horizon already.
 */
export function expandGrid(
  dates: DateRow[],
  locations: LocationRow[],
  lobs?: LineOfBusinessRow[],
): GridCell[] {
  if (!dates.length) throw new EmptyDimensionError('date');
  if (!locations.length) throw new EmptyDimensionError('location');
  if (lobs && !lobs.length) throw new EmptyDimensionError('line_of_business');

  assertUnique(dates, d => d.date, 'date');
  assertUnique(locations, l => l.officeLocationName, 'location');
  if (lobs) assertUnique(lobs, l => l.lineOfBusinessName, 'line_of_business');

  const lobAxis: Array<LineOfBusinessRow | null> = lobs ?? [null];
  const cells: GridCell[] = [];
  for (const date of dates) {
    for (const location of locations) {
      for (const lob of lobAxis) {
        cells.push({ date, location, lob });
      }
    }
  }
  return cells;
}

/** Join key shared by the grid and the attendance buckets */
export function cellKey(date: string, location: string, lob: string | null): string {
  return lob === null ? compositeKey(date, location) : compositeKey(date, location, lob);
}

/**
 * Left-join counts onto the grid, 0 where nothing was observed.
 * Every count must land on exactly one cell; an orphan means the
 * dimensions and the events disagree, and is raised rather than dropped.
 */
export function fillGrid(grid: GridCell[], counts: AttendanceCounts): FilledCell[] {
  const matched = new Set<string>();

  const filled = grid.map((cell): FilledCell => {
    const key = cellKey(cell.date.date, cell.location.officeLocationName, cell.lob?.lineOfBusinessName ?? null);
    if (matched.has(key)) {
      throw new InconsistentKeyError('Grid cell appears twice', { key });
    }
    matched.add(key);
    return { ...cell, attendanceCount: counts.get(key) ?? 0 };
  });

  for (const key of counts.keys()) {
    if (!matched.has(key)) {
      const [date, location, lob] = key.split('\u001f');
      throw new InconsistentKeyError(
        `Attendance for ${location ?? '?'}${lob ? ` / ${lob}` : ''} on ${date ?? '?'} has no grid cell`,
        { date, location, lob },
      );
    }
  }

  return filled;
}
