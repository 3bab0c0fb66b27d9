/**
 * services/aggregator.ts — Attendance aggregation
 * The AttendanceAgg class folds cleaned attendance events into one count
 * per observed (date, location[, lob]). It never creates zero buckets;
 * zero-filling belongs to the grid.
 */
import { cellKey } from './grid.ts';
import type { AttendanceEvent } from '../types.ts';

/** cellKey → number of events */
export type AttendanceCounts = Map<string, number>;

export interface AggregateOptions {
  byLob: boolean;
}

export class AttendanceAgg {
  total: number;
  counts: AttendanceCounts;
  firstDate: string | null;
  lastDate: string | null;
  private readonly byLob: boolean;

  constructor(opts: AggregateOptions) {
    this.byLob = opts.byLob;
    this.total = 0;
    this.counts = new Map();
    this.firstDate = null;
    this.lastDate = null;
  }

  add(ev: AttendanceEvent): void {
    const key = cellKey(ev.date, ev.officeLocation, this.byLob ? ev.lineOfBusiness : null);
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
    this.total++;
    if (this.firstDate === null || ev.date < this.firstDate) this.firstDate = ev.date;
    if (this.lastDate === null || ev.date > this.lastDate) this.lastDate = ev.date;
  }

  addAll(events: Iterable<AttendanceEvent>): this {
    for (const ev of events) this.add(ev);
    return this;
  }

  result(): AttendanceCounts { return this.counts; }
}

export function aggregateAttendance(events: Iterable<AttendanceEvent>, opts: AggregateOptions): AttendanceCounts {
  return new AttendanceAgg(opts).addAll(events).result();
}
