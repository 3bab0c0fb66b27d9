/**
 * services/capacity.ts — As-of capacity resolution
 *
 * For every grid cell, attach the capacity of the latest valid snapshot for
 * the same location whose effective date is on or before the cell's date.
 * Implemented as a forward merge sweep per location: snapshots and cells are
 * both walked in date order, and the per-location state only ever moves
 * from unknown to known(value) to a newer known(value).
 */
import { compareOrdinal } from './helpers.ts';
import type { CapacitySnapshot, FilledCell, CapacityCell, IsoDate } from '../types.ts';

type CapacityState =
  | { kind: 'unknown' }
  | { kind: 'known'; value: number };

interface ValidSnapshot {
  effectiveDate: IsoDate;
  capacity: number;
}

interface IndexedCell {
  index: number;
  date: IsoDate;
}

/** Null, zero, negative and non-finite capacities carry no information */
export function isValidCapacity(capacity: number | null): capacity is number {
  return capacity !== null && Number.isFinite(capacity) && capacity > 0;
}

function pushTo<T>(groups: Map<string, T[]>, key: string, item: T): void {
  const list = groups.get(key);
  if (list) list.push(item);
  else groups.set(key, [item]);
}

/**
 * Returns the cells in their input order with `capacity` attached.
 * Same-date snapshots for one location resolve to the last one in input
 * order: the sort is stable, and the sweep applies every snapshot whose
 * date has been reached, so the last of equal dates is applied last.
 */
export function resolveCapacity(cells: FilledCell[], snapshots: CapacitySnapshot[]): CapacityCell[] {
  const snapsByLocation = new Map<string, ValidSnapshot[]>();
  for (const s of snapshots) {
    if (isValidCapacity(s.capacity)) {
      pushTo(snapsByLocation, s.officeLocation, { effectiveDate: s.effectiveDate, capacity: s.capacity });
    }
  }

  const cellsByLocation = new Map<string, IndexedCell[]>();
  cells.forEach((cell, index) => {
    pushTo(cellsByLocation, cell.location.officeLocationName, { index, date: cell.date.date });
  });

  const resolved = new Array<number | null>(cells.length).fill(null);

  for (const [location, locCells] of cellsByLocation) {
    const snaps = (snapsByLocation.get(location) ?? [])
      .slice()
      .sort((a, b) => compareOrdinal(a.effectiveDate, b.effectiveDate));
    locCells.sort((a, b) => compareOrdinal(a.date, b.date));

    let state: CapacityState = { kind: 'unknown' };
    let next = 0;
    for (const cell of locCells) {
      let snap = snaps[next];
      while (snap && snap.effectiveDate <= cell.date) {
        state = { kind: 'known', value: snap.capacity };
        snap = snaps[++next];
      }
      resolved[cell.index] = state.kind === 'known' ? state.value : null;
    }
  }

  return cells.map((cell, i) => ({ ...cell, capacity: resolved[i] ?? null }));
}
