/**
 * db/schema.ts — Drizzle ORM schema definitions
 *
 * Warehouse copies of the two fact tables, published by `occupancy-facts publish`.
 * Column names match the CSV headers so reporting tools can switch between
 * the files and the tables without remapping.
 *
 * Tables:
 *   fact_occupancy             — per (date, office, line of business)
 *   fact_occupancy_aggregated  — per (date, office), all LOBs combined
 */
import {
  pgTable, integer, text, date, boolean, doublePrecision, timestamp, primaryKey, index,
} from 'drizzle-orm/pg-core';

export const factOccupancy = pgTable('fact_occupancy', {
  dateKey: integer('date_key').notNull(),
  locationKey: integer('location_key').notNull(),
  lobKey: integer('lob_key').notNull(),
  date: date('date', { mode: 'string' }).notNull(),
  locationName: text('location_name').notNull(),
  lobName: text('lob_name').notNull(),
  year: integer('year').notNull(),
  month: integer('month').notNull(),
  isWeekend: boolean('is_weekend').notNull(),
  attendanceCount: integer('attendance_count').notNull(),
  capacity: integer('capacity'),                     // null = no valid capacity
  occupancyRate: doublePrecision('occupancy_rate'),  // null when capacity is null
  isHybridDay: boolean('is_hybrid_day').notNull(),
  publishedAt: timestamp('published_at', { withTimezone: true }).defaultNow(),
}, (table) => ({
  pk: primaryKey({ columns: [table.dateKey, table.locationKey, table.lobKey] }),
  locationDateIdx: index('idx_fact_occ_location_date').on(table.locationKey, table.dateKey),
}));

export const factOccupancyAggregated = pgTable('fact_occupancy_aggregated', {
  dateKey: integer('date_key').notNull(),
  locationKey: integer('location_key').notNull(),
  date: date('date', { mode: 'string' }).notNull(),
  locationName: text('location_name').notNull(),
  year: integer('year').notNull(),
  month: integer('month').notNull(),
  isWeekend: boolean('is_weekend').notNull(),
  attendanceCount: integer('attendance_count').notNull(),
  capacity: integer('capacity'),
  occupancyRate: doublePrecision('occupancy_rate'),
  isHybridDay: boolean('is_hybrid_day').notNull(),
  publishedAt: timestamp('published_at', { withTimezone: true }).defaultNow(),
}, (table) => ({
  pk: primaryKey({ columns: [table.dateKey, table.locationKey] }),
  hybridIdx: index('idx_fact_occ_agg_hybrid').on(table.locationKey, table.isHybridDay),
}));

// ── Inferred types ──

export type NewFactOccupancyRecord = typeof factOccupancy.$inferInsert;
export type NewFactOccupancyAggregatedRecord = typeof factOccupancyAggregated.$inferInsert;
