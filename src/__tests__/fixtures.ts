// Shared builders for test inputs
import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { DatasetDirs } from '../services/dataset.ts';
import { addDays, isWeekday, toDateKey } from '../services/helpers.ts';
import { expandGrid } from '../services/grid.ts';
import type {
  AttendanceEvent, CapacitySnapshot, DateRow, IsoDate, LineOfBusinessRow, LocationRow,
  LobFactRow, OccupancyCell,
} from '../types.ts';

export function dateRow(date: IsoDate): DateRow {
  return {
    date,
    dateKey: toDateKey(date),
    year: Number(date.slice(0, 4)),
    month: Number(date.slice(5, 7)),
    isWeekend: !isWeekday(date),
  };
}

/** Inclusive range of date rows */
export function dateRows(first: IsoDate, last: IsoDate): DateRow[] {
  const out: DateRow[] = [];
  for (let d = first; d <= last; d = addDays(d, 1)) out.push(dateRow(d));
  return out;
}

export const location = (locationKey: number, officeLocationName: string): LocationRow =>
  ({ locationKey, officeLocationName });

export const lob = (lobKey: number, lineOfBusinessName: string): LineOfBusinessRow =>
  ({ lobKey, lineOfBusinessName });

export function events(date: IsoDate, officeLocation: string, lineOfBusiness: string, n: number): AttendanceEvent[] {
  return Array.from({ length: n }, () => ({ date, officeLocation, lineOfBusiness }));
}

export const snapshot = (officeLocation: string, effectiveDate: IsoDate, capacity: number | null): CapacitySnapshot =>
  ({ officeLocation, effectiveDate, capacity });

/** Grid cells ready for hybrid classification; attendance comes from `count` */
export function occupancyCells(
  dates: DateRow[],
  locations: LocationRow[],
  lobs: LineOfBusinessRow[] | undefined,
  count: (date: IsoDate, location: string, lob: string | null) => number,
): OccupancyCell[] {
  return expandGrid(dates, locations, lobs).map(c => ({
    ...c,
    attendanceCount: count(c.date.date, c.location.officeLocationName, c.lob?.lineOfBusinessName ?? null),
    capacity: null,
    occupancyRate: null,
  }));
}

export function factRow(overrides: Partial<LobFactRow> & Pick<LobFactRow, 'date' | 'locationName' | 'lobName'>): LobFactRow {
  const d = dateRow(overrides.date);
  return {
    dateKey: d.dateKey,
    locationKey: 1,
    lobKey: 1,
    year: d.year,
    month: d.month,
    isWeekend: d.isWeekend,
    attendanceCount: 0,
    capacity: null,
    occupancyRate: null,
    isHybridDay: false,
    ...overrides,
  };
}

// ── On-disk datasets ──

export const INPUT_FILES = {
  'dimensions/DimDate.csv': [
    '\uFEFFdate_key,date,year,month,is_weekend',
    ...dateRows('2025-03-03', '2025-03-09').map(d => `${d.dateKey},${d.date},${d.year},${d.month},${d.isWeekend}`),
  ].join('\n'),
  'dimensions/DimLocation.csv': 'location_key,office_location\n1,Austin\n2,Boston',
  'dimensions/DimLineOfBusiness.csv': 'lob_key,line_of_business\n1,Ops\n2,Sales',
  'cleaned_data/Occupancy_cleaned.csv': [
    'logon_date,office_location,line_of_business',
    '2025-03-03 08:01:00,Austin,Sales',
    '2025-03-03 08:05:00,Austin,Sales',
    '2025-03-03 09:12:00,Austin,Ops',
    '2025-03-05 10:00:00,Boston,Sales',
  ].join('\n'),
  'cleaned_data/Deskcount_cleaned.csv': 'office_location,deskcount,date\nAustin,100,2025-01-01\nBoston,,2025-02-01\nBoston,50.0,2025-03-05\n',
};

export async function writeInputs(root: string, files: Record<string, string> = INPUT_FILES): Promise<DatasetDirs> {
  for (const [rel, content] of Object.entries(files)) {
    const path = join(root, rel);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  }
  return {
    dimensionsDir: join(root, 'dimensions'),
    cleanedDataDir: join(root, 'cleaned_data'),
    factsDir: join(root, 'facts'),
  };
}
