// ═══════════════════════════════════════════════════════
// Office Occupancy — Core Type Definitions
// Every data shape that flows through the fact pipeline.
// ═══════════════════════════════════════════════════════

/** Calendar date as an ISO string, e.g. "2025-03-15" */
export type IsoDate = string;

// ── Dimensions (read-only reference rows) ──

export interface DateRow {
  date: IsoDate;
  dateKey: number;        // YYYYMMDD
  year: number;
  month: number;          // 1-12
  isWeekend: boolean;
}

export interface LocationRow {
  locationKey: number;
  officeLocationName: string;
}

export interface LineOfBusinessRow {
  lobKey: number;
  lineOfBusinessName: string;
}

// ── Cleaned upstream inputs ──

export interface AttendanceEvent {
  date: IsoDate;
  officeLocation: string;
  lineOfBusiness: string;
}

export interface CapacitySnapshot {
  officeLocation: string;
  effectiveDate: IsoDate;
  capacity: number | null;  // null / ≤0 = no valid capacity
}

export interface PipelineInputs {
  dates: DateRow[];
  locations: LocationRow[];
  lobs: LineOfBusinessRow[];
  events: AttendanceEvent[];
  snapshots: CapacitySnapshot[];
}

// ── Grid ──

export type FactVariant = 'by-lob' | 'aggregated';

export interface GridCell {
  date: DateRow;
  location: LocationRow;
  lob: LineOfBusinessRow | null;  // null in the aggregated variant
}

export interface FilledCell extends GridCell {
  attendanceCount: number;
}

export interface CapacityCell extends FilledCell {
  capacity: number | null;
}

export interface OccupancyCell extends CapacityCell {
  occupancyRate: number | null;
}

export interface ClassifiedCell extends OccupancyCell {
  isHybridDay: boolean;
}

// ── Output ──

export interface FactRow {
  dateKey: number;
  locationKey: number;
  date: IsoDate;
  locationName: string;
  year: number;
  month: number;
  isWeekend: boolean;
  attendanceCount: number;
  capacity: number | null;
  occupancyRate: number | null;
  isHybridDay: boolean;
}

export interface LobFactRow extends FactRow {
  lobKey: number;
  lobName: string;
}

export interface FactTables {
  byLob: LobFactRow[];
  aggregated: FactRow[];
}

// ── Horizon ──

export type HorizonEndPolicy = 'snapshot-date' | 'snapshot-month-end';

export interface Horizon {
  start: IsoDate;
  cutoff: IsoDate;
}

// ── Hybrid classification ──

export interface IsoWeek {
  weekYear: number;
  week: number;
}

export interface DateEligibility {
  date: IsoDate;
  isoWeek: IsoWeek;
  isWeekday: boolean;
  monthWeekdaysInWeek: number;   // weekdays of this date's month inside its ISO week
  eligible: boolean;
}
