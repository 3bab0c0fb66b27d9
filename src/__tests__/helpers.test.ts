import { describe, it, expect } from 'vitest';
import {
  parseIsoDate, normalizeDateCell, toDateKey, addDays, daysBetween, dayOfWeek, isWeekday,
  endOfMonth, isoWeek, isoWeekLabel, minDate, compareOrdinal, compositeKey, safeDiv, TopN,
} from '../services/helpers.ts';

describe('calendar helpers', () => {
  it('rejects impossible dates', () => {
    expect(parseIsoDate('2025-02-30')).toBeNull();
    expect(parseIsoDate('2025-13-01')).toBeNull();
    expect(parseIsoDate('2024-02-29')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });

  it('normalizes timestamp-shaped date cells', () => {
    expect(normalizeDateCell('2025-01-02 00:00:00')).toBe('2025-01-02');
    expect(normalizeDateCell('  2025-01-02T08:30:00Z')).toBe('2025-01-02');
    expect(normalizeDateCell('01/02/2025')).toBeNull();
  });

  it('does day arithmetic across month ends', () => {
    expect(toDateKey('2025-03-15')).toBe(20250315);
    expect(addDays('2025-02-27', 2)).toBe('2025-03-01');
    expect(daysBetween('2025-03-01', '2025-03-31')).toBe(30);
    expect(endOfMonth('2024-02-10')).toBe('2024-02-29');
    expect(minDate('2025-03-12', '2025-03-31')).toBe('2025-03-12');
  });

  it('numbers days Monday-first', () => {
    expect(dayOfWeek('2025-01-01')).toBe(2); // Wednesday
    expect(dayOfWeek('2025-03-09')).toBe(6); // Sunday
    expect(isWeekday('2025-01-03')).toBe(true);
    expect(isWeekday('2025-01-04')).toBe(false);
  });
});

describe('isoWeek', () => {
  it('assigns late-December dates to the next week-year', () => {
    expect(isoWeek('2024-12-30')).toEqual({ weekYear: 2025, week: 1 });
  });

  it('assigns early-January dates to the previous week-year', () => {
    expect(isoWeek('2027-01-01')).toEqual({ weekYear: 2026, week: 53 });
  });

  it('keeps a Monday-to-Sunday week together', () => {
    expect(isoWeek('2025-04-28')).toEqual({ weekYear: 2025, week: 18 });
    expect(isoWeek('2025-05-04')).toEqual({ weekYear: 2025, week: 18 });
    expect(isoWeek('2025-05-05')).toEqual({ weekYear: 2025, week: 19 });
  });

  it('formats labels with a padded week', () => {
    expect(isoWeekLabel({ weekYear: 2025, week: 5 })).toBe('2025-W05');
  });
});

describe('misc', () => {
  it('compares by code unit', () => {
    expect(compareOrdinal('Zurich', 'austin')).toBe(-1);
    expect(compareOrdinal('a', 'a')).toBe(0);
  });

  it('joins composite keys with the unit separator', () => {
    expect(compositeKey('Austin', 3)).toBe('Austin\u001f3');
  });

  it('divides safely', () => {
    expect(safeDiv(1, 3)).toBe(0.33);
    expect(safeDiv(2, 3, 4)).toBe(0.6667);
    expect(safeDiv(5, 0)).toBe(0);
  });
});

describe('TopN', () => {
  it('keeps the best items in order', () => {
    const top = new TopN<number>(2, (a, b) => b - a);
    [1, 5, 3, 4].forEach(n => top.add(n));
    expect(top.result()).toEqual([5, 4]);
  });

  it('does not displace an equal item', () => {
    const top = new TopN<{ v: number; id: string }>(1, (a, b) => b.v - a.v);
    top.add({ v: 2, id: 'first' });
    top.add({ v: 2, id: 'second' });
    expect(top.result()).toEqual([{ v: 2, id: 'first' }]);
  });

  it('holds nothing when max is zero', () => {
    const top = new TopN<number>(0, (a, b) => b - a);
    top.add(1);
    expect(top.result()).toEqual([]);
  });
});
