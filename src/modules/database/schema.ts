import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  boolean,
  date,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

// =============================================================================
// SETTINGS TABLE
// =============================================================================
/**
 * Workflow configuration (weekly schedule, planner instructions, video options).
 * Stores key-value pairs with flexible JSON values.
 */
export const settings = pgTable(
  'settings',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    key: varchar('key', { length: 100 }).notNull().unique(),
    value: jsonb('value').notNull(),
    description: text('description'),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    // Unique index on key for fast lookups
    uniqueIndex('settings_key_unique_idx').on(table.key),
  ]
);

// =============================================================================
// UPLOAD LEDGER TABLE
// =============================================================================
/**
 * One row per local calendar date that had a successful publish.
 * Consulted before every scheduled run to prevent a second upload that day.
 */
export const uploadLedger = pgTable(
  'upload_ledger',
  {
    publishDate: date('publish_date', { mode: 'string' }).primaryKey(),
    published: boolean('published').notNull().default(true),
    videoId: varchar('video_id', { length: 64 }).notNull(),
    title: text('title').notNull(),
    weekday: varchar('weekday', { length: 9 }).notNull(),
    url: text('url'),
    publishedAt: timestamp('published_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    // Index for upload history listing
    index('upload_ledger_published_at_idx').on(table.publishedAt),
  ]
);

// =============================================================================
// TYPE EXPORTS
// =============================================================================
export type Setting = typeof settings.$inferSelect;
export type NewSetting = typeof settings.$inferInsert;

export type UploadLedgerRow = typeof uploadLedger.$inferSelect;
export type NewUploadLedgerRow = typeof uploadLedger.$inferInsert;
