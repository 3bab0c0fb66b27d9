/**
 * services/hybrid.ts — Hybrid anchor-day classification
 *
 * Per office and ISO week, flag up to three days that carry the bulk of
 * in-office attendance.
 *
 *   1. Eligibility is a property of the date alone: a weekday whose calendar
 *      month contributes at least 3 weekdays to the date's ISO week. Weeks
 *      that straddle a month end only anchor on the majority month. Counts
 *      use the distinct dates present in the grid, so a week cut short by the
 *      horizon can end up with no eligible dates.
 *   2. Daily totals are summed across lines of business; the flag is a
 *      per-day attribute shared by every LOB row of that office and date.
 *   3. Eligible dates are ranked by total desc, then date asc, and the top 3
 *      per (office, week) are selected. Zero-attendance days are valid
 *      candidates.
 *   4. The eligibility guard is applied again when flags are written.
 */
import { TopN, compareOrdinal, compositeKey, isWeekday, isoWeek, isoWeekLabel, monthOf } from './helpers.ts';
import type { DateEligibility, IsoDate, OccupancyCell, ClassifiedCell } from '../types.ts';

export const HYBRID_DAYS_PER_WEEK = 3;
export const MIN_MONTH_WEEKDAYS_IN_WEEK = 3;

export interface DailyTotal {
  location: string;
  date: IsoDate;
  week: string;       // "2025-W05"
  total: number;
}

/** Eligibility for every distinct date, independent of location and attendance */
export function computeDateEligibility(dates: Iterable<IsoDate>): Map<IsoDate, DateEligibility> {
  const distinct = [...new Set(dates)];

  // weekday count per (ISO week, calendar month)
  const weekMonthCounts = new Map<string, number>();
  const info = distinct.map(date => {
    const w = isoWeek(date);
    const key = compositeKey(isoWeekLabel(w), monthOf(date));
    const weekday = isWeekday(date);
    if (weekday) weekMonthCounts.set(key, (weekMonthCounts.get(key) ?? 0) + 1);
    return { date, w, key, weekday };
  });

  const out = new Map<IsoDate, DateEligibility>();
  for (const { date, w, key, weekday } of info) {
    const monthWeekdaysInWeek = weekMonthCounts.get(key) ?? 0;
    out.set(date, {
      date,
      isoWeek: w,
      isWeekday: weekday,
      monthWeekdaysInWeek,
      eligible: weekday && monthWeekdaysInWeek >= MIN_MONTH_WEEKDAYS_IN_WEEK,
    });
  }
  return out;
}

/** Attendance per (location, date) summed across LOB rows, in first-seen order */
export function dailyTotals(cells: OccupancyCell[]): DailyTotal[] {
  const byKey = new Map<string, DailyTotal>();
  for (const c of cells) {
    const key = compositeKey(c.location.officeLocationName, c.date.date);
    const existing = byKey.get(key);
    if (existing) {
      existing.total += c.attendanceCount;
    } else {
      byKey.set(key, {
        location: c.location.officeLocationName,
        date: c.date.date,
        week: isoWeekLabel(isoWeek(c.date.date)),
        total: c.attendanceCount,
      });
    }
  }
  return [...byKey.values()];
}

const byAttendanceThenDate = (a: DailyTotal, b: DailyTotal): number =>
  b.total - a.total || compareOrdinal(a.date, b.date);

/**
 * Top-N eligible days per (location, ISO week).
 * Returns compositeKey(location, date) for every selected day.
 */
export function selectHybridDays(
  totals: DailyTotal[],
  eligibility: Map<IsoDate, DateEligibility>,
  perWeek = HYBRID_DAYS_PER_WEEK,
): Set<string> {
  const weeks = new Map<string, TopN<DailyTotal>>();
  for (const t of totals) {
    if (!eligibility.get(t.date)?.eligible) continue;
    const weekKey = compositeKey(t.location, t.week);
    let top = weeks.get(weekKey);
    if (!top) {
      top = new TopN(perWeek, byAttendanceThenDate);
      weeks.set(weekKey, top);
    }
    top.add(t);
  }

  const selected = new Set<string>();
  for (const top of weeks.values()) {
    for (const t of top.result()) selected.add(compositeKey(t.location, t.date));
  }
  return selected;
}

export function classifyHybridDays(cells: OccupancyCell[]): ClassifiedCell[] {
  const eligibility = computeDateEligibility(cells.map(c => c.date.date));
  const selected = selectHybridDays(dailyTotals(cells), eligibility);

  return cells.map(c => {
    const picked = selected.has(compositeKey(c.location.officeLocationName, c.date.date));
    const eligible = eligibility.get(c.date.date)?.eligible ?? false;
    return { ...c, isHybridDay: picked && eligible };
  });
}
