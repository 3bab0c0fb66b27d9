/**
 * services/publish.ts — Push fact tables to PostgreSQL
 *
 * overwrite: delete existing rows, then insert, all in one transaction
 * append:    insert only; a duplicate key fails the whole transaction
 *
 * Inserts go in batches of 500 rows to stay under the pg parameter limit.
 */
import { factOccupancy, factOccupancyAggregated } from '../db/schema.ts';
import type { NewFactOccupancyRecord, NewFactOccupancyAggregatedRecord } from '../db/schema.ts';
import type { Database } from '../config/database.ts';
import { childLogger } from '../shared/logger.ts';
import type { FactRow, LobFactRow } from '../types.ts';

const BATCH_SIZE = 500;
const log = childLogger({ stage: 'publish' });

export type PublishMode = 'overwrite' | 'append';

export function toAggregatedRecord(r: FactRow): NewFactOccupancyAggregatedRecord {
  return {
    dateKey: r.dateKey,
    locationKey: r.locationKey,
    date: r.date,
    locationName: r.locationName,
    year: r.year,
    month: r.month,
    isWeekend: r.isWeekend,
    attendanceCount: r.attendanceCount,
    capacity: r.capacity,
    occupancyRate: r.occupancyRate,
    isHybridDay: r.isHybridDay,
  };
}

export function toLobRecord(r: LobFactRow): NewFactOccupancyRecord {
  return { ...toAggregatedRecord(r), lobKey: r.lobKey, lobName: r.lobName };
}

export function batches<T>(rows: T[], size = BATCH_SIZE): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < rows.length; i += size) out.push(rows.slice(i, i + size));
  return out;
}

export async function publishLobFacts(db: Database, rows: LobFactRow[], mode: PublishMode): Promise<number> {
  const records = rows.map(toLobRecord);
  await db.transaction(async (tx) => {
    if (mode === 'overwrite') await tx.delete(factOccupancy);
    for (const batch of batches(records)) {
      await tx.insert(factOccupancy).values(batch);
    }
  });
  log.info({ table: 'fact_occupancy', rows: records.length, mode }, 'Published');
  return records.length;
}

export async function publishAggregatedFacts(db: Database, rows: FactRow[], mode: PublishMode): Promise<number> {
  const records = rows.map(toAggregatedRecord);
  await db.transaction(async (tx) => {
    if (mode === 'overwrite') await tx.delete(factOccupancyAggregated);
    for (const batch of batches(records)) {
      await tx.insert(factOccupancyAggregated).values(batch);
    }
  });
  log.info({ table: 'fact_occupancy_aggregated', rows: records.length, mode }, 'Published');
  return records.length;
}
