import { and, asc, desc, eq, gte, lte, type SQL } from 'drizzle-orm'
import { entries, type Entry } from './db-schema'
import { EntryError, StorageUnavailableError } from './errors'
import type { Location } from './locations'
import type { EntryDatabase } from './sqlite'

export interface EntryWrite {
  userKey: string
  displayName: string
  date: string
  location: Location
  clientDescription: string | null
  notes: string | null
}

export type UpsertOutcome = 'inserted' | 'updated'

export interface UpsertResult {
  entry: Entry
  outcome: UpsertOutcome
}

function dateRange(from?: string, to?: string): SQL[] {
  const conditions: SQL[] = []
  if (from) conditions.push(gte(entries.date, from))
  if (to) conditions.push(lte(entries.date, to))
  return conditions
}

// Strictly after `previous`, so a rewrite within the same millisecond still moves updated_at
function nextTimestamp(timestamp: string, previous: string): string {
  const floor = Date.parse(previous) + 1
  return Date.parse(timestamp) >= floor ? timestamp : new Date(floor).toISOString()
}

function compareDisplayNames(a: string, b: string): number {
  return a.toLowerCase().localeCompare(b.toLowerCase()) || a.localeCompare(b)
}

/**
 * Owns every read and write of `entry` rows. All lookups go through
 * `user_key`, never the typed name.
 */
export class EntryStore {
  constructor(private readonly db: EntryDatabase) {}

  /**
   * Runs `work` inside one IMMEDIATE transaction, so concurrent writers
   * queue on the database lock. Anything that is not already an entry error
   * rolls the transaction back and surfaces as `StorageUnavailableError`.
   */
  transaction<T>(work: (store: EntryStore) => T): T {
    try {
      return this.db.transaction((tx) => work(new EntryStore(tx)), { behavior: 'immediate' })
    } catch (error) {
      if (error instanceof EntryError) throw error
      throw new StorageUnavailableError('Could not commit entries, retry the whole submission', {
        cause: error,
      })
    }
  }

  getByUserAndDateRange(userKey: string, from: string, to: string): Entry[] {
    return this.access('read', () =>
      this.db
        .select()
        .from(entries)
        .where(and(eq(entries.userKey, userKey), ...dateRange(from, to)))
        .orderBy(asc(entries.date))
        .all()
    )
  }

  getByKeyAndDate(userKey: string, date: string): Entry | undefined {
    return this.access('read', () =>
      this.db
        .select()
        .from(entries)
        .where(and(eq(entries.userKey, userKey), eq(entries.date, date)))
        .get()
    )
  }

  getById(id: number): Entry | undefined {
    return this.access('read', () => this.db.select().from(entries).where(eq(entries.id, id)).get())
  }

  listInRange(from?: string, to?: string): Entry[] {
    return this.access('read', () =>
      this.db
        .select()
        .from(entries)
        .where(and(...dateRange(from, to)))
        .orderBy(asc(entries.date), asc(entries.userKey))
        .all()
    )
  }

  /**
   * One display name per user key: the name on that person's most recently
   * updated row in the range (ties go to the higher id).
   */
  listDistinctUsersInRange(from?: string, to?: string): string[] {
    const rows = this.access('read', () =>
      this.db
        .select({ userKey: entries.userKey, displayName: entries.displayName })
        .from(entries)
        .where(and(...dateRange(from, to)))
        .orderBy(desc(entries.updatedAt), desc(entries.id))
        .all()
    )

    const latestNames = new Map<string, string>()
    for (const row of rows) {
      if (!latestNames.has(row.userKey)) {
        latestNames.set(row.userKey, row.displayName)
      }
    }
    return [...latestNames.values()].sort(compareDisplayNames)
  }

  /**
   * Insert-or-update keyed by `(user_key, date)`. The conflict is resolved by
   * the unique index, so two writers for the same pair can never both insert.
   * On update `id` and `created_at` are left alone and `updated_at` always
   * moves forward, even when `timestamp` is not later than the stored one.
   */
  upsertOne(write: EntryWrite, timestamp: string): UpsertResult {
    const existing = this.getByKeyAndDate(write.userKey, write.date)
    const updatedAt = existing ? nextTimestamp(timestamp, existing.updatedAt) : timestamp

    const entry = this.access('write', () =>
      this.db
        .insert(entries)
        .values({ ...write, createdAt: timestamp, updatedAt })
        .onConflictDoUpdate({
          target: [entries.userKey, entries.date],
          set: {
            displayName: write.displayName,
            location: write.location,
            clientDescription: write.clientDescription,
            notes: write.notes,
            updatedAt,
          },
        })
        .returning()
        .get()
    )

    return { entry, outcome: existing ? 'updated' : 'inserted' }
  }

  deleteById(id: number): boolean {
    const result = this.access('write', () => this.db.delete(entries).where(eq(entries.id, id)).run())
    return result.changes > 0
  }

  private access<T>(mode: 'read' | 'write', query: () => T): T {
    try {
      return query()
    } catch (error) {
      if (error instanceof EntryError) throw error
      throw new StorageUnavailableError(
        mode === 'read' ? 'Could not read entries, retry the request' : 'Could not write entries, retry the request',
        { cause: error }
      )
    }
  }
}
