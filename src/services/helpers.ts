// ═══════════════════════════════════════════════════════
// helpers.ts — Pure utility functions (zero dependencies)
// All calendar math is done in UTC on "YYYY-MM-DD" strings.
// ═══════════════════════════════════════════════════════
import type { IsoDate, IsoWeek } from '../types.ts';

const DAY_MS = 86_400_000;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** "2025-03-15" → UTC midnight Date, or null when not a real calendar date */
export function parseIsoDate(value: string): Date | null {
  const m = ISO_DATE_RE.exec(value);
  if (!m) return null;
  const y = Number(m[1]), mo = Number(m[2]), d = Number(m[3]);
  const dt = new Date(Date.UTC(y, mo - 1, d));
  if (dt.getUTCFullYear() !== y || dt.getUTCMonth() !== mo - 1 || dt.getUTCDate() !== d) return null;
  return dt;
}

function toUtc(date: IsoDate): Date {
  const dt = parseIsoDate(date);
  if (!dt) throw new RangeError(`Invalid ISO date: ${date}`);
  return dt;
}

export function formatIsoDate(dt: Date): IsoDate {
  return dt.toISOString().slice(0, 10);
}

/**
 * Normalize the date cells produced by upstream tools:
 * "2025-01-02", "2025-01-02 00:00:00", "2025-01-02T00:00:00Z" → "2025-01-02"
 */
export function normalizeDateCell(raw: string): IsoDate | null {
  const head = raw.trim().slice(0, 10);
  return parseIsoDate(head) ? head : null;
}

/** "2025-03-15" → 20250315 */
export function toDateKey(date: IsoDate): number {
  return Number(date.replace(/-/g, ''));
}

export function addDays(date: IsoDate, n: number): IsoDate {
  return formatIsoDate(new Date(toUtc(date).getTime() + n * DAY_MS));
}

/** Whole days from a to b (b - a) */
export function daysBetween(a: IsoDate, b: IsoDate): number {
  return Math.round((toUtc(b).getTime() - toUtc(a).getTime()) / DAY_MS);
}

/** 0 = Monday … 6 = Sunday */
export function dayOfWeek(date: IsoDate): number {
  return (toUtc(date).getUTCDay() + 6) % 7;
}

export const isWeekday = (date: IsoDate): boolean => dayOfWeek(date) < 5;

export const monthOf = (date: IsoDate): number => Number(date.slice(5, 7));

/** Last calendar day of the date's month */
export function endOfMonth(date: IsoDate): IsoDate {
  const dt = toUtc(date);
  return formatIsoDate(new Date(Date.UTC(dt.getUTCFullYear(), dt.getUTCMonth() + 1, 0)));
}

/**
 * ISO 8601 week. The week belongs to the year of its Thursday, so
 * 2024-12-30 is week 1 of 2025 and 2027-01-01 is week 53 of 2026.
 */
export function isoWeek(date: IsoDate): IsoWeek {
  const dt = toUtc(date);
  const thursday = new Date(dt.getTime() + (3 - dayOfWeek(date)) * DAY_MS);
  const weekYear = thursday.getUTCFullYear();
  const dayOfYear = Math.round((thursday.getTime() - Date.UTC(weekYear, 0, 1)) / DAY_MS) + 1;
  return { weekYear, week: Math.floor((dayOfYear - 1) / 7) + 1 };
}

/** "2025-W05" */
export function isoWeekLabel(w: IsoWeek): string {
  return `${w.weekYear}-W${String(w.week).padStart(2, '0')}`;
}

export const minDate = (a: IsoDate, b: IsoDate): IsoDate => (a <= b ? a : b);

/** Code-unit string comparison (locale-independent, stable across machines) */
export function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Composite map key; unit separator never appears in office or LOB names */
export const compositeKey = (...parts: Array<string | number>): string => parts.join('\u001f');

/** Safe division with configurable decimal places */
export function safeDiv(num: number, den: number, decimals = 2): number {
  if (den === 0) return 0;
  return +((num / den).toFixed(decimals));
}

/**
 * Bounded top-N sorted collection.
 * Insertion order breaks ties: an item equal to the current last
 * entry does not displace it.
 */
export class TopN<T> {
  private items: T[] = [];
  private readonly max: number;
  private readonly cmp: (a: T, b: T) => number;

  constructor(max: number, cmp: (a: T, b: T) => number) {
    this.max = max;
    this.cmp = cmp;
  }

  add(item: T): void {
    if (this.max <= 0) return;
    const last = this.items[this.items.length - 1];
    if (this.items.length < this.max) {
      this.items.push(item);
      this.items.sort(this.cmp);
    } else if (last !== undefined && this.cmp(item, last) < 0) {
      this.items[this.items.length - 1] = item;
      this.items.sort(this.cmp);
    }
  }

  result(): T[] { return this.items; }
}
