// ═══════════════════════════════════════════════════════
// Zod Schemas — Validation for every CSV row and CLI input
// CSV cells arrive as strings; schemas trim, coerce and map
// them onto the domain types in types.ts.
// ═══════════════════════════════════════════════════════
import { z } from 'zod';
import { normalizeDateCell, parseIsoDate, toDateKey } from './services/helpers.ts';
import type {
  DateRow, LocationRow, LineOfBusinessRow, AttendanceEvent, CapacitySnapshot, FactRow, LobFactRow,
} from './types.ts';

// ── Cell coercions ──

const text = z.string().trim().min(1, 'Required');

const dateCell = z.string().transform((v, ctx) => {
  const d = normalizeDateCell(v);
  if (!d) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date "${v}"` });
    return z.NEVER;
  }
  return d;
});

// upstream cleaning writes integer columns that had gaps as floats ("120.0")
const intCell = z.string().trim().regex(/^-?\d+(\.0+)?$/, 'Expected an integer').transform(v => parseInt(v, 10));

const numberCell = z.string().trim().regex(/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/, 'Expected a number').transform(Number);

const nullableNumberCell = z.string().trim().transform((v, ctx) => {
  if (v === '' || v.toLowerCase() === 'nan' || v.toLowerCase() === 'null') return null;
  const parsed = numberCell.safeParse(v);
  if (!parsed.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a number or empty, got "${v}"` });
    return z.NEVER;
  }
  return parsed.data;
});

const nullableIntCell = nullableNumberCell.refine(v => v === null || Number.isInteger(v), 'Expected an integer or empty');

const boolCell = z.string().trim().transform(v => v.toLowerCase()).pipe(z.enum(['true', 'false', '1', '0']))
  .transform(v => v === 'true' || v === '1');

// ── Dimensions ──

export const DateDimRowSchema = z.object({
  date_key: intCell,
  date: dateCell,
  year: intCell,
  month: intCell.pipe(z.number().min(1).max(12)),
  is_weekend: boolCell,
})
  .refine(r => r.date_key === toDateKey(r.date), { message: 'date_key does not match date', path: ['date_key'] })
  .transform((r): DateRow => ({
    date: r.date, dateKey: r.date_key, year: r.year, month: r.month, isWeekend: r.is_weekend,
  }));

export const LocationDimRowSchema = z.object({
  location_key: intCell,
  office_location: text,
}).transform((r): LocationRow => ({ locationKey: r.location_key, officeLocationName: r.office_location }));

export const LobDimRowSchema = z.object({
  lob_key: intCell,
  line_of_business: text,
}).transform((r): LineOfBusinessRow => ({ lobKey: r.lob_key, lineOfBusinessName: r.line_of_business }));

// ── Cleaned inputs ──

export const AttendanceEventSchema = z.object({
  logon_date: dateCell,
  office_location: text,
  line_of_business: text,
}).transform((r): AttendanceEvent => ({
  date: r.logon_date, officeLocation: r.office_location, lineOfBusiness: r.line_of_business,
}));

export const CapacitySnapshotSchema = z.object({
  office_location: text,
  deskcount: nullableIntCell,
  date: dateCell,
}).transform((r): CapacitySnapshot => ({
  officeLocation: r.office_location, effectiveDate: r.date, capacity: r.deskcount,
}));

// ── Fact tables (read back for validate / publish) ──

const factColumns = {
  date_key: intCell,
  location_key: intCell,
  date: dateCell,
  location_name: text,
  year: intCell,
  month: intCell,
  is_weekend: boolCell,
  attendance_count: intCell.pipe(z.number().int().min(0)),
  capacity: nullableIntCell,
  occupancy_rate: nullableNumberCell,
  is_hybrid_day: boolCell,
};

type FactColumns = z.infer<z.ZodObject<typeof factColumns>>;

function toFact(r: FactColumns): FactRow {
  return {
    dateKey: r.date_key, locationKey: r.location_key, date: r.date, locationName: r.location_name,
    year: r.year, month: r.month, isWeekend: r.is_weekend, attendanceCount: r.attendance_count,
    capacity: r.capacity, occupancyRate: r.occupancy_rate, isHybridDay: r.is_hybrid_day,
  };
}

export const FactRowSchema = z.object(factColumns).transform(toFact);

export const LobFactRowSchema = z.object({ ...factColumns, lob_key: intCell, lob_name: text })
  .transform((r): LobFactRow => ({ ...toFact(r), lobKey: r.lob_key, lobName: r.lob_name }));

// ── CLI ──

export const CommandEnum = z.enum(['run', 'validate', 'publish', 'all']);
export const VariantEnum = z.enum(['by-lob', 'aggregated', 'both']);

const isoDateArg = z.string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
  .refine(v => parseIsoDate(v) !== null, v => ({ message: `Not a calendar date: ${v}` }));

export const CliOptionsSchema = z.object({
  command: CommandEnum.default('all'),
  variant: VariantEnum.default('both'),
  start: isoDateArg.optional(),
  end: isoDateArg.optional(),
  out: z.string().min(1).optional(),
  dryRun: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;
