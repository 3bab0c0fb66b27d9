// ═══════════════════════════════════════════════════════
// occupancy.ts — Occupancy rate under the missing-capacity policy
// Unknown capacity stays unknown: the rate is null, never 0 or 1.
// ═══════════════════════════════════════════════════════
import type { CapacityCell, OccupancyCell } from '../types.ts';

export function occupancyRate(attendanceCount: number, capacity: number | null): number | null {
  return capacity !== null && capacity > 0 ? attendanceCount / capacity : null;
}

export function applyOccupancy(cells: CapacityCell[]): OccupancyCell[] {
  return cells.map(c => ({ ...c, occupancyRate: occupancyRate(c.attendanceCount, c.capacity) }));
}
