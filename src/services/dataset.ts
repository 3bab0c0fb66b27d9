/**
 * services/dataset.ts — Tabular file I/O
 *
 * Reads the dimension and cleaned-data CSVs into validated domain rows and
 * writes/reads the fact tables. CSV parsing and formatting go through
 * ExcelJS's CSV support; every row is validated with the zod schemas in
 * schemas.ts and the first bad row aborts the load.
 *
 * Layout (directories come from env):
 *   {DIMENSIONS_DIR}/DimDate.csv, DimLocation.csv, DimLineOfBusiness.csv
 *   {CLEANED_DATA_DIR}/Occupancy_cleaned.csv, Deskcount_cleaned.csv
 *   {FACTS_DIR}/FactOccupancy.csv, FactOccupancyAggregated.csv
 */
import ExcelJS from 'exceljs';
import type { CellValue, Row } from 'exceljs';
import { existsSync } from 'fs';
import { mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import type { z } from 'zod';
import { MissingInputError, InvalidRecordError } from '../shared/errors.ts';
import { inputRecords } from '../shared/metrics.ts';
import { childLogger } from '../shared/logger.ts';
import {
  DateDimRowSchema, LocationDimRowSchema, LobDimRowSchema,
  AttendanceEventSchema, CapacitySnapshotSchema, FactRowSchema, LobFactRowSchema,
} from '../schemas.ts';
import type { PipelineInputs, FactRow, LobFactRow, FactVariant } from '../types.ts';

const log = childLogger({ stage: 'dataset' });

export interface DatasetDirs {
  dimensionsDir: string;
  cleanedDataDir: string;
  factsDir: string;
}

export type InputName = 'dates' | 'locations' | 'lobs' | 'events' | 'snapshots';

export function inputPaths(dirs: DatasetDirs): Record<InputName, string> {
  return {
    dates: join(dirs.dimensionsDir, 'DimDate.csv'),
    locations: join(dirs.dimensionsDir, 'DimLocation.csv'),
    lobs: join(dirs.dimensionsDir, 'DimLineOfBusiness.csv'),
    events: join(dirs.cleanedDataDir, 'Occupancy_cleaned.csv'),
    snapshots: join(dirs.cleanedDataDir, 'Deskcount_cleaned.csv'),
  };
}

export function factPath(factsDir: string, variant: FactVariant): string {
  return join(factsDir, variant === 'by-lob' ? 'FactOccupancy.csv' : 'FactOccupancyAggregated.csv');
}

// ── CSV primitives ──

type CsvCell = string | number | boolean | null;

function cellText(v: CellValue | undefined): string {
  if (v === null || v === undefined) return '';
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  if (v instanceof Date) return v.toISOString();
  return '';
}

function rowCells(row: Row): string[] {
  const values = row.values;
  if (!Array.isArray(values)) return [];
  // ExcelJS rows are 1-based; index 0 is always empty
  return Array.from(values.slice(1), cellText);
}

/** Header-keyed records, all cells as raw strings */
export async function readCsv(path: string): Promise<Record<string, string>[]> {
  const wb = new ExcelJS.Workbook();
  // identity map keeps cells as strings (the default map guesses numbers and dates)
  const ws = await wb.csv.readFile(path, { map: (value: string) => value });

  let header: string[] = [];
  const records: Record<string, string>[] = [];
  ws.eachRow((row, rowNumber) => {
    const cells = rowCells(row);
    if (rowNumber === 1) {
      header = cells.map(h => h.replace(/^\uFEFF/, '').trim());
      return;
    }
    if (cells.every(c => c.trim() === '')) return;
    const rec: Record<string, string> = {};
    header.forEach((col, i) => { rec[col] = cells[i] ?? ''; });
    records.push(rec);
  });
  return records;
}

export async function parseCsv<S extends z.ZodTypeAny>(path: string, schema: S): Promise<Array<z.output<S>>> {
  const records = await readCsv(path);
  return records.map((rec, i) => {
    const parsed = schema.safeParse(rec);
    // +2: header is line 1, records are 0-based
    if (!parsed.success) throw new InvalidRecordError(path, i + 2, parsed.error.issues);
    return parsed.data;
  });
}

export async function writeCsv(path: string, header: string[], rows: CsvCell[][]): Promise<void> {
  const wb = new ExcelJS.Workbook();
  const ws = wb.addWorksheet('data');
  ws.addRow(header);
  for (const row of rows) ws.addRow(row.map(c => (c === null ? '' : c)));
  await mkdir(dirname(path), { recursive: true });
  await wb.csv.writeFile(path);
}

// ── Inputs ──

/**
 * Check every required file before reading any of them, so a missing
 * dataset fails the run before a single stage starts.
 */
export function assertInputsExist(dirs: DatasetDirs, needed: InputName[]): void {
  const paths = inputPaths(dirs);
  for (const name of needed) {
    if (!existsSync(paths[name])) {
      throw new MissingInputError(paths[name], 'Run the upstream cleaning and dimension steps first');
    }
  }
}

export async function loadInputs(dirs: DatasetDirs, opts: { withLob: boolean } = { withLob: true }): Promise<PipelineInputs> {
  const needed: InputName[] = ['dates', 'locations', 'events', 'snapshots'];
  if (opts.withLob) needed.push('lobs');
  assertInputsExist(dirs, needed);

  const paths = inputPaths(dirs);
  const dates = await parseCsv(paths.dates, DateDimRowSchema);
  const locations = await parseCsv(paths.locations, LocationDimRowSchema);
  const lobs = opts.withLob ? await parseCsv(paths.lobs, LobDimRowSchema) : [];
  const events = await parseCsv(paths.events, AttendanceEventSchema);
  const snapshots = await parseCsv(paths.snapshots, CapacitySnapshotSchema);

  const counts = { dates: dates.length, locations: locations.length, lobs: lobs.length, events: events.length, snapshots: snapshots.length };
  for (const [dataset, n] of Object.entries(counts)) inputRecords.inc({ dataset }, n);
  log.info(counts, 'Inputs loaded');

  return { dates, locations, lobs, events, snapshots };
}

// ── Fact tables ──

export const FACT_COLUMNS = [
  'date_key', 'location_key', 'date', 'location_name', 'year', 'month',
  'is_weekend', 'attendance_count', 'capacity', 'occupancy_rate', 'is_hybrid_day',
] as const;

export const LOB_FACT_COLUMNS = [
  'date_key', 'location_key', 'lob_key', 'date', 'location_name', 'lob_name', 'year', 'month',
  'is_weekend', 'attendance_count', 'capacity', 'occupancy_rate', 'is_hybrid_day',
] as const;

function factCells(r: FactRow): CsvCell[] {
  return [r.dateKey, r.locationKey, r.date, r.locationName, r.year, r.month,
    r.isWeekend, r.attendanceCount, r.capacity, r.occupancyRate, r.isHybridDay];
}

function lobFactCells(r: LobFactRow): CsvCell[] {
  return [r.dateKey, r.locationKey, r.lobKey, r.date, r.locationName, r.lobName, r.year, r.month,
    r.isWeekend, r.attendanceCount, r.capacity, r.occupancyRate, r.isHybridDay];
}

export async function writeLobFacts(path: string, rows: LobFactRow[]): Promise<void> {
  await writeCsv(path, [...LOB_FACT_COLUMNS], rows.map(lobFactCells));
  log.info({ path, rows: rows.length }, 'Per-LOB fact written');
}

export async function writeAggregatedFacts(path: string, rows: FactRow[]): Promise<void> {
  await writeCsv(path, [...FACT_COLUMNS], rows.map(factCells));
  log.info({ path, rows: rows.length }, 'Aggregated fact written');
}

export async function readLobFacts(path: string): Promise<LobFactRow[]> {
  if (!existsSync(path)) throw new MissingInputError(path, 'Run the pipeline first');
  return parseCsv(path, LobFactRowSchema);
}

export async function readAggregatedFacts(path: string): Promise<FactRow[]> {
  if (!existsSync(path)) throw new MissingInputError(path, 'Run the pipeline first');
  return parseCsv(path, FactRowSchema);
}
