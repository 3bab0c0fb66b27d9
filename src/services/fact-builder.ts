/**
 * services/fact-builder.ts — Fact assembly
 *
 * Runs the stages in order, each fully materialized before the next:
 *   horizon → expand grid → aggregate → fill → capacity → occupancy → hybrid → assemble
 *
 * Both variants go through the same code path; the aggregated one simply
 * omits the LOB axis from the grid and from the attendance buckets.
 */
import { childLogger, type Logger } from '../shared/logger.ts';
import { EmptyDimensionError, InconsistentKeyError, MissingInputError } from '../shared/errors.ts';
import { timeStage, factRows, unresolvedCapacityRows, hybridRows } from '../shared/metrics.ts';
import { compareOrdinal, endOfMonth, minDate } from './helpers.ts';
import { expandGrid, fillGrid } from './grid.ts';
import { AttendanceAgg } from './aggregator.ts';
import { resolveCapacity } from './capacity.ts';
import { applyOccupancy } from './occupancy.ts';
import { classifyHybridDays } from './hybrid.ts';
import type {
  PipelineInputs, DateRow, AttendanceEvent, ClassifiedCell, FactRow, LobFactRow,
  FactTables, FactVariant, Horizon, HorizonEndPolicy, IsoDate,
} from '../types.ts';

// ── Horizon ──

export interface HorizonOptions {
  start?: IsoDate;
  end?: IsoDate;
  policy: HorizonEndPolicy;
}

function extent(values: IsoDate[]): { first: IsoDate; last: IsoDate } | null {
  let first: IsoDate | null = null;
  let last: IsoDate | null = null;
  for (const v of values) {
    if (first === null || v < first) first = v;
    if (last === null || v > last) last = v;
  }
  return first !== null && last !== null ? { first, last } : null;
}

/**
 * Start: override, else the first attendance event, else the first date row.
 * Cutoff: override, else the latest snapshot date; under `snapshot-month-end`
 * the end of that snapshot's month, capped at the last attendance event.
 */
export function resolveHorizon(
  inputs: Pick<PipelineInputs, 'dates' | 'events' | 'snapshots'>,
  opts: HorizonOptions,
): Horizon {
  const events = extent(inputs.events.map(e => e.date));
  const snaps = extent(inputs.snapshots.map(s => s.effectiveDate));
  const dates = extent(inputs.dates.map(d => d.date));

  const start = opts.start ?? events?.first ?? dates?.first;
  if (!start) throw new EmptyDimensionError('date');

  let cutoff = opts.end;
  if (!cutoff) {
    if (!snaps) {
      throw new MissingInputError('capacity snapshots', 'No snapshot dates to derive the capacity cutoff from; set HORIZON_END');
    }
    cutoff = opts.policy === 'snapshot-month-end'
      ? (events ? minDate(events.last, endOfMonth(snaps.last)) : endOfMonth(snaps.last))
      : snaps.last;
  }

  if (start > cutoff) throw new EmptyDimensionError('date');
  return { start, cutoff };
}

export function restrictDates(dates: DateRow[], horizon: Horizon): DateRow[] {
  return dates.filter(d => d.date >= horizon.start && d.date <= horizon.cutoff);
}

export function restrictEvents(events: AttendanceEvent[], horizon: Horizon): AttendanceEvent[] {
  return events.filter(e => e.date >= horizon.start && e.date <= horizon.cutoff);
}

// ── Assembly ──

function toFactRow(c: ClassifiedCell): FactRow {
  return {
    dateKey: c.date.dateKey,
    locationKey: c.location.locationKey,
    date: c.date.date,
    locationName: c.location.officeLocationName,
    year: c.date.year,
    month: c.date.month,
    isWeekend: c.date.isWeekend,
    attendanceCount: c.attendanceCount,
    capacity: c.capacity,
    occupancyRate: c.occupancyRate,
    isHybridDay: c.isHybridDay,
  };
}

function toLobFactRow(c: ClassifiedCell): LobFactRow {
  if (!c.lob) {
    throw new InconsistentKeyError('Per-LOB fact row without a line of business', {
      date: c.date.date, location: c.location.officeLocationName,
    });
  }
  return { ...toFactRow(c), lobKey: c.lob.lobKey, lobName: c.lob.lineOfBusinessName };
}

/** Deterministic output order: (date_key, location_name[, lob_name]) */
export function compareFactRows(a: FactRow | LobFactRow, b: FactRow | LobFactRow): number {
  return a.dateKey - b.dateKey
    || compareOrdinal(a.locationName, b.locationName)
    || compareOrdinal('lobName' in a ? a.lobName : '', 'lobName' in b ? b.lobName : '');
}

export function assembleFacts(cells: ClassifiedCell[], variant: 'by-lob'): LobFactRow[];
export function assembleFacts(cells: ClassifiedCell[], variant: 'aggregated'): FactRow[];
export function assembleFacts(cells: ClassifiedCell[], variant: FactVariant): FactRow[] | LobFactRow[] {
  if (variant === 'by-lob') return cells.map(toLobFactRow).sort(compareFactRows);
  return cells.map(toFactRow).sort(compareFactRows);
}

// ── Pipeline ──

function classify(inputs: PipelineInputs, horizon: Horizon, variant: FactVariant, log: Logger): ClassifiedCell[] {
  const byLob = variant === 'by-lob';
  const dates = restrictDates(inputs.dates, horizon);

  const grid = timeStage('expand', variant, () =>
    expandGrid(dates, inputs.locations, byLob ? inputs.lobs : undefined));
  log.debug({ cells: grid.length, dates: dates.length }, 'Grid expanded');

  const events = restrictEvents(inputs.events, horizon);
  if (events.length < inputs.events.length) {
    log.info({ excluded: inputs.events.length - events.length }, 'Events outside the horizon excluded');
  }
  const agg = timeStage('aggregate', variant, () => new AttendanceAgg({ byLob }).addAll(events));
  log.debug({ events: agg.total, buckets: agg.counts.size, first: agg.firstDate, last: agg.lastDate }, 'Attendance aggregated');

  const filled = timeStage('fill', variant, () => fillGrid(grid, agg.result()));
  const withCapacity = timeStage('capacity', variant, () => resolveCapacity(filled, inputs.snapshots));
  const withRate = timeStage('occupancy', variant, () => applyOccupancy(withCapacity));
  return timeStage('hybrid', variant, () => classifyHybridDays(withRate));
}

function record(variant: FactVariant, rows: FactRow[], log: Logger): void {
  const unresolved = rows.filter(r => r.capacity === null).length;
  const hybrid = rows.filter(r => r.isHybridDay).length;
  factRows.set({ variant }, rows.length);
  unresolvedCapacityRows.set({ variant }, unresolved);
  hybridRows.set({ variant }, hybrid);
  if (unresolved) log.warn({ unresolved }, `${unresolved} rows have no valid capacity`);
  log.info({ rows: rows.length, hybrid }, 'Fact table assembled');
}

export function buildFactTable(inputs: PipelineInputs, horizon: Horizon, variant: 'by-lob'): LobFactRow[];
export function buildFactTable(inputs: PipelineInputs, horizon: Horizon, variant: 'aggregated'): FactRow[];
export function buildFactTable(inputs: PipelineInputs, horizon: Horizon, variant: FactVariant): FactRow[] | LobFactRow[] {
  const log = childLogger({ stage: 'fact', variant, start: horizon.start, cutoff: horizon.cutoff });
  const cells = classify(inputs, horizon, variant, log);
  const rows = variant === 'by-lob'
    ? timeStage('assemble', variant, () => assembleFacts(cells, 'by-lob'))
    : timeStage('assemble', variant, () => assembleFacts(cells, 'aggregated'));
  record(variant, rows, log);
  return rows;
}

export function buildFacts(inputs: PipelineInputs, horizon: Horizon): FactTables {
  return {
    byLob: buildFactTable(inputs, horizon, 'by-lob'),
    aggregated: buildFactTable(inputs, horizon, 'aggregated'),
  };
}
