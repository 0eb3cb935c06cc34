import { index, integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core'
import { LOCATIONS } from './locations'

/**
 * One row per person per day. Column names are the ones the table has always
 * had (`user_name`, `client`) so older databases only gain columns.
 */
export const entries = sqliteTable(
  'entry',
  {
    id: integer('id').primaryKey(),
    displayName: text('user_name').notNull(),
    userKey: text('user_key').notNull(),
    date: text('date').notNull(),
    location: text('location', { enum: LOCATIONS }).notNull(),
    clientDescription: text('client'),
    notes: text('notes'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (t) => ({
    userKeyDateUnique: uniqueIndex('uniq_entries_userkey_date').on(t.userKey, t.date),
    dateIdx: index('ix_entry_date').on(t.date),
  })
)

export const MIGRATION_PHASES = [
  'not-started',
  'backfilling-keys',
  'deduplicating',
  'constraint-applied',
  'done',
] as const

export type MigrationPhase = (typeof MIGRATION_PHASES)[number]

export const migrationStatus = sqliteTable('migration_status', {
  id: integer('id').primaryKey(),
  phase: text('phase', { enum: MIGRATION_PHASES }).notNull(),
  lastError: text('last_error'),
  updatedAt: text('updated_at').notNull(),
})

export const schema = { entries, migrationStatus }

export type Entry = typeof entries.$inferSelect
export type MigrationStatusRow = typeof migrationStatus.$inferSelect
