import { eq, inArray, sql, type SQL } from 'drizzle-orm'
import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core'
import { z } from 'zod'
import { toIsoTimestamp } from './dates'
import { MIGRATION_PHASES, migrationStatus, type MigrationPhase } from './db-schema'
import { InvalidIdentityError, MigrationFailedError } from './errors'
import { normalizeUserKey } from './identity'
import { isLocation, requiresQualifier, resolveLocationAlias, type Location } from './locations'
import type { EntryDatabase } from './sqlite'

export const UNIQUE_INDEX_NAME = 'uniq_entries_userkey_date'

// The `entry` table as older databases hold it: no key, maybe no updated_at,
// free-text locations.
const legacyEntries = sqliteTable('entry', {
  id: integer('id').primaryKey(),
  userName: text('user_name').notNull(),
  userKey: text('user_key'),
  date: text('date').notNull(),
  location: text('location').notNull(),
  client: text('client'),
  notes: text('notes'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at'),
})

type LegacyEntryUpdate = Partial<typeof legacyEntries.$inferInsert>

const nameRowsSchema = z.array(z.object({ name: z.string() }).passthrough())
const countRowsSchema = z.array(z.object({ count: z.number() }))

export type MigrationState = MigrationPhase | 'failed'

export interface MigrationReport {
  /** Last phase the status marker recorded before this run. */
  startedFrom: MigrationPhase
  backfilledKeys: number
  backfilledTimestamps: number
  remappedLocations: number
  /** Rows whose client text was filled in, or moved to notes, to match their location. */
  repairedQualifiers: number
  duplicatesRemoved: number
  constraintCreated: boolean
}

export interface MigrationStatus {
  phase: MigrationPhase
  lastError: string | null
  updatedAt: string | null
}

export interface MigrationRunnerOptions {
  now?: () => Date
  /** Re-run every phase even when the marker says they are finished. */
  force?: boolean
}

function phaseIndex(phase: MigrationPhase): number {
  return MIGRATION_PHASES.indexOf(phase)
}

function columnNames(db: EntryDatabase, table: string): Set<string> {
  const rows = nameRowsSchema.parse(db.all(sql`SELECT name FROM pragma_table_info(${table})`))
  return new Set(rows.map((row) => row.name))
}

function indexExists(db: EntryDatabase, name: string): boolean {
  const rows = nameRowsSchema.parse(
    db.all(sql`SELECT name FROM sqlite_master WHERE type = 'index' AND name = ${name}`)
  )
  return rows.length > 0
}

function countOf(db: EntryDatabase, query: SQL): number {
  const [row] = countRowsSchema.parse(db.all(query))
  return row ? row.count : 0
}

interface ClientPlacement {
  client: string | null
  notes: string | null
}

// Qualified locations must carry client text and the others must carry none;
// stray client text on an unqualified row is kept in its notes.
function placeClientText(
  location: Location,
  row: { location: string; client: string | null; notes: string | null }
): ClientPlacement {
  const client = row.client?.trim() || null
  if (requiresQualifier(location)) {
    return { client: client ?? (row.location.trim() || location), notes: row.notes }
  }
  if (!client) return { client: null, notes: row.notes }
  const notes = row.notes?.trim()
  return { client: null, notes: notes ? `${notes} (${client})` : client }
}

export function ensureStatusTable(db: EntryDatabase) {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS migration_status (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      phase TEXT NOT NULL,
      last_error TEXT,
      updated_at TEXT NOT NULL
    )
  `)
}

export function readMigrationStatus(db: EntryDatabase): MigrationStatus {
  const row = db.select().from(migrationStatus).where(eq(migrationStatus.id, 1)).get()
  if (!row) {
    return { phase: 'not-started', lastError: null, updatedAt: null }
  }
  return { phase: row.phase, lastError: row.lastError, updatedAt: row.updatedAt }
}

/**
 * Brings an older `entry` table up to the keyed schema before the app takes
 * traffic: backfill keys and timestamps, drop duplicate (user_key, date) rows,
 * then add the unique index. Each phase commits on its own and is recorded in
 * `migration_status`, so a restart resumes after the last finished phase.
 *
 * Duplicates keep the row with the latest `updated_at`, then the highest id.
 * The survivor is kept whole; nothing is merged in from the rows removed.
 */
export class MigrationRunner {
  private currentState: MigrationState = 'not-started'
  private completedPhase: MigrationPhase = 'not-started'
  private readonly now: () => Date

  constructor(
    private readonly db: EntryDatabase,
    private readonly options: MigrationRunnerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date())
  }

  get state(): MigrationState {
    return this.currentState
  }

  run(): MigrationReport {
    let marker: MigrationStatus
    try {
      ensureStatusTable(this.db)
      marker = readMigrationStatus(this.db)
    } catch (error) {
      throw this.fail('not-started', error)
    }
    const report: MigrationReport = {
      startedFrom: marker.phase,
      backfilledKeys: 0,
      backfilledTimestamps: 0,
      remappedLocations: 0,
      repairedQualifiers: 0,
      duplicatesRemoved: 0,
      constraintCreated: false,
    }

    this.completedPhase = marker.phase
    if (this.completedPhase === 'done' && !indexExists(this.db, UNIQUE_INDEX_NAME)) {
      console.log(`Migration marked done but ${UNIQUE_INDEX_NAME} is missing, starting over`)
      this.completedPhase = 'not-started'
    }
    if (this.options.force) {
      this.completedPhase = 'not-started'
    }

    if (this.completedPhase === 'done') {
      this.currentState = 'done'
      console.log('Entry migration already complete')
      return report
    }

    const steps: [MigrationPhase, (tx: EntryDatabase) => void][] = [
      ['backfilling-keys', (tx) => this.backfillKeys(tx, report)],
      ['deduplicating', (tx) => this.deduplicate(tx, report)],
      ['constraint-applied', (tx) => this.applyConstraint(tx, report)],
    ]

    for (const [phase, step] of steps) {
      if (phaseIndex(phase) <= phaseIndex(this.completedPhase)) continue

      this.currentState = phase
      try {
        this.db.transaction(
          (tx) => {
            step(tx)
            this.writeStatus(tx, phase, null)
          },
          { behavior: 'immediate' }
        )
      } catch (error) {
        throw this.fail(phase, error)
      }
      this.completedPhase = phase
    }

    try {
      this.writeStatus(this.db, 'done', null)
    } catch (error) {
      throw this.fail('done', error)
    }
    this.completedPhase = 'done'
    this.currentState = 'done'
    console.log(
      `Entry migration complete: ${report.backfilledKeys} keys backfilled, ` +
        `${report.remappedLocations} locations remapped, ${report.repairedQualifiers} client fields repaired, ` +
        `${report.duplicatesRemoved} duplicates removed`
    )
    return report
  }

  private backfillKeys(tx: EntryDatabase, report: MigrationReport) {
    tx.run(sql`
      CREATE TABLE IF NOT EXISTS entry (
        id INTEGER PRIMARY KEY,
        user_name TEXT NOT NULL,
        date TEXT NOT NULL,
        location TEXT NOT NULL,
        client TEXT,
        notes TEXT,
        created_at TEXT NOT NULL
      )
    `)

    const columns = columnNames(tx, 'entry')
    if (!columns.has('user_key')) {
      console.log('Adding user_key column...')
      tx.run(sql`ALTER TABLE entry ADD COLUMN user_key TEXT`)
    }
    if (!columns.has('updated_at')) {
      console.log('Adding updated_at column...')
      tx.run(sql`ALTER TABLE entry ADD COLUMN updated_at TEXT`)
    }
    tx.run(sql`CREATE INDEX IF NOT EXISTS ix_entry_date ON entry (date)`)

    for (const row of tx.select().from(legacyEntries).all()) {
      const update: LegacyEntryUpdate = {}

      if (!row.userKey) {
        try {
          update.userKey = normalizeUserKey(row.userName)
        } catch (error) {
          if (error instanceof InvalidIdentityError) {
            throw new MigrationFailedError('backfilling-keys', `entry ${row.id} has an empty name`)
          }
          throw error
        }
        report.backfilledKeys += 1
      }

      const stamp = row.updatedAt ?? row.createdAt
      const updatedAt = toIsoTimestamp(stamp)
      if (!updatedAt) {
        throw new MigrationFailedError('backfilling-keys', `entry ${row.id} has an unreadable timestamp "${stamp}"`)
      }
      if (updatedAt !== row.updatedAt) {
        update.updatedAt = updatedAt
        report.backfilledTimestamps += 1
      }

      let location: Location
      if (isLocation(row.location)) {
        location = row.location
      } else {
        const resolved = resolveLocationAlias(row.location)
        location = isLocation(resolved) ? resolved : 'other'
        update.location = location
        report.remappedLocations += 1
      }

      const placement = placeClientText(location, row)
      if (placement.client !== row.client || placement.notes !== row.notes) {
        update.client = placement.client
        update.notes = placement.notes
        report.repairedQualifiers += 1
      }

      if (Object.keys(update).length > 0) {
        tx.update(legacyEntries).set(update).where(eq(legacyEntries.id, row.id)).run()
      }
    }

    console.log(
      `Backfilled ${report.backfilledKeys} user keys and ${report.backfilledTimestamps} timestamps`
    )
  }

  private deduplicate(tx: EntryDatabase, report: MigrationReport) {
    const rows = tx
      .select({
        id: legacyEntries.id,
        userKey: legacyEntries.userKey,
        date: legacyEntries.date,
        updatedAt: legacyEntries.updatedAt,
      })
      .from(legacyEntries)
      .all()

    const groups = new Map<string, { id: number; updatedAt: number }[]>()
    for (const row of rows) {
      if (!row.userKey || !row.updatedAt) {
        throw new MigrationFailedError('deduplicating', `entry ${row.id} was not backfilled`)
      }
      const groupKey = JSON.stringify([row.userKey, row.date])
      const group = groups.get(groupKey) ?? []
      group.push({ id: row.id, updatedAt: Date.parse(row.updatedAt) })
      groups.set(groupKey, group)
    }

    const losers: number[] = []
    for (const group of groups.values()) {
      if (group.length < 2) continue
      group.sort((a, b) => b.updatedAt - a.updatedAt || b.id - a.id)
      losers.push(...group.slice(1).map((row) => row.id))
    }

    if (losers.length > 0) {
      tx.delete(legacyEntries).where(inArray(legacyEntries.id, losers)).run()
    }
    report.duplicatesRemoved = losers.length
    console.log(`Removed ${losers.length} duplicate entries`)
  }

  private applyConstraint(tx: EntryDatabase, report: MigrationReport) {
    if (indexExists(tx, UNIQUE_INDEX_NAME)) {
      console.log(`${UNIQUE_INDEX_NAME} already present`)
      return
    }

    const unkeyed = countOf(
      tx,
      sql`SELECT COUNT(*) AS count FROM entry WHERE user_key IS NULL OR user_key = ''`
    )
    if (unkeyed > 0) {
      throw new MigrationFailedError('constraint-applied', `${unkeyed} entries have no user_key`)
    }

    const duplicated = countOf(
      tx,
      sql`SELECT COUNT(*) AS count FROM (
        SELECT 1 FROM entry GROUP BY user_key, date HAVING COUNT(*) > 1
      )`
    )
    if (duplicated > 0) {
      throw new MigrationFailedError(
        'constraint-applied',
        `${duplicated} (user_key, date) pairs are still duplicated`
      )
    }

    console.log(`Creating unique index ${UNIQUE_INDEX_NAME} on (user_key, date)...`)
    tx.run(sql.raw(`CREATE UNIQUE INDEX ${UNIQUE_INDEX_NAME} ON entry (user_key, date)`))
    report.constraintCreated = true
  }

  private writeStatus(db: EntryDatabase, phase: MigrationPhase, lastError: string | null) {
    const row = { id: 1, phase, lastError, updatedAt: this.now().toISOString() }
    db.insert(migrationStatus)
      .values(row)
      .onConflictDoUpdate({ target: migrationStatus.id, set: { phase, lastError, updatedAt: row.updatedAt } })
      .run()
  }

  private fail(phase: MigrationPhase, error: unknown): MigrationFailedError {
    this.currentState = 'failed'
    const failure =
      error instanceof MigrationFailedError
        ? error
        : new MigrationFailedError(phase, error instanceof Error ? error.message : String(error), {
            cause: error,
          })

    console.error('Entry migration failed:', failure)
    try {
      this.writeStatus(this.db, this.completedPhase, failure.message)
    } catch (statusError) {
      console.error('Could not record migration failure:', statusError)
    }
    return failure
  }
}
