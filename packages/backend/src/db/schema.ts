import {
  pgTable,
  varchar,
  text,
  timestamp,
  integer,
  boolean,
  numeric,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

// Venues table
export const venues = pgTable('venues', {
  internalVenueId: varchar('internal_venue_id', { length: 100 }).primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  city: varchar('city', { length: 100 }),
  stateProvince: varchar('state_province', { length: 100 }),
  countryCode: varchar('country_code', { length: 2 }),
  timezone: varchar('timezone', { length: 64 }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

// Events table
export const events = pgTable('events', {
  internalEventId: varchar('internal_event_id', { length: 100 }).primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

// Performances table (one dated showing of an event at a venue)
export const performances = pgTable('performances', {
  internalPerformanceId: varchar('internal_performance_id', { length: 100 }).primaryKey(),
  eventId: varchar('event_id', { length: 100 })
    .notNull()
    .references(() => events.internalEventId, { onDelete: 'cascade' }),
  venueId: varchar('venue_id', { length: 100 })
    .notNull()
    .references(() => venues.internalVenueId, { onDelete: 'cascade' }),
  name: varchar('name', { length: 255 }),
  performanceDatetimeUtc: timestamp('performance_datetime_utc', { withTimezone: true }),
  posEnabled: boolean('pos_enabled').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

// Seat packs table
// pos_status keeps its stored values pending | active | inactive | synced;
// synced_to_pos is true while the vendor still holds a listing
export const seatPacks = pgTable(
  'seat_packs',
  {
    internalPackId: varchar('internal_pack_id', { length: 200 }).primaryKey(),
    performanceId: varchar('performance_id', { length: 100 })
      .notNull()
      .references(() => performances.internalPerformanceId, { onDelete: 'cascade' }),
    sourceWebsite: varchar('source_website', { length: 100 }).notNull(),
    zoneId: varchar('zone_id', { length: 100 }).notNull(),
    levelId: varchar('level_id', { length: 100 }),
    sectionId: varchar('section_id', { length: 100 }),
    rowLabel: varchar('row_label', { length: 50 }).notNull(),
    startSeatNumber: varchar('start_seat_number', { length: 20 }).notNull(),
    endSeatNumber: varchar('end_seat_number', { length: 20 }).notNull(),
    packSize: integer('pack_size').notNull(),
    packPrice: numeric('pack_price', { precision: 10, scale: 2 }).notNull(),
    totalPrice: numeric('total_price', { precision: 12, scale: 2 }).notNull(),
    seatKeys: jsonb('seat_keys').$type<string[]>().notNull(),
    sourcePackIds: jsonb('source_pack_ids').$type<string[]>().notNull(),
    packStatus: varchar('pack_status', { length: 20 }).notNull().default('active'),
    delistReason: varchar('delist_reason', { length: 30 }),
    delistedAt: timestamp('delisted_at', { withTimezone: true }),
    packState: varchar('pack_state', { length: 20 }).notNull().default('create'),
    posStatus: varchar('pos_status', { length: 20 }).notNull().default('pending'),
    syncedToPos: boolean('synced_to_pos').notNull().default(false),
    posInventoryId: varchar('pos_inventory_id', { length: 100 }),
    posSyncAttempts: integer('pos_sync_attempts').notNull().default(0),
    posLastError: text('pos_last_error'),
    manualDelistedBy: varchar('manual_delisted_by', { length: 255 }),
    manualDelistedAt: timestamp('manual_delisted_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    performanceStatusIdx: index('idx_seat_packs_performance_status').on(
      table.performanceId,
      table.packStatus
    ),
    posStatusIdx: index('idx_seat_packs_pos_status').on(table.posStatus, table.syncedToPos),
  })
);

// Relations
export const performancesRelations = relations(performances, ({ one, many }) => ({
  event: one(events, {
    fields: [performances.eventId],
    references: [events.internalEventId],
  }),
  venue: one(venues, {
    fields: [performances.venueId],
    references: [venues.internalVenueId],
  }),
  seatPacks: many(seatPacks),
}));

export const seatPacksRelations = relations(seatPacks, ({ one }) => ({
  performance: one(performances, {
    fields: [seatPacks.performanceId],
    references: [performances.internalPerformanceId],
  }),
}));

// Type exports
export type Venue = typeof venues.$inferSelect;
export type Event = typeof events.$inferSelect;
export type Performance = typeof performances.$inferSelect;
export type SeatPackRow = typeof seatPacks.$inferSelect;
export type NewSeatPackRow = typeof seatPacks.$inferInsert;
