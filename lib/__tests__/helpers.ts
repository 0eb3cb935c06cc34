import { sql } from 'drizzle-orm'
import { MigrationRunner } from '../migrate'
import { openDatabase, type DatabaseConnection, type EntryDatabase } from '../sqlite'

/** In-memory database with the current schema in place. */
export function openMigratedDatabase(): DatabaseConnection {
  const connection = openDatabase(':memory:')
  new MigrationRunner(connection.db, { now: () => new Date('2025-01-01T00:00:00.000Z') }).run()
  return connection
}

/** A clock that moves forward one minute every time it is read. */
export function steppingClock(start: string, stepMs = 60_000): () => Date {
  let current = Date.parse(start)
  return () => {
    const reading = new Date(current)
    current += stepMs
    return reading
  }
}

export function silenceConsole() {
  jest.spyOn(console, 'log').mockImplementation(() => undefined)
  jest.spyOn(console, 'error').mockImplementation(() => undefined)
}

// The table as it looked before user_key and updated_at existed
export function createLegacyTable(db: EntryDatabase) {
  db.run(sql`
    CREATE TABLE entry (
      id INTEGER NOT NULL,
      user_name VARCHAR NOT NULL,
      date VARCHAR NOT NULL,
      location VARCHAR NOT NULL,
      client VARCHAR,
      notes VARCHAR,
      created_at DATETIME NOT NULL,
      PRIMARY KEY (id)
    )
  `)
}

export interface LegacyRow {
  id: number
  userName: string
  date: string
  location: string
  client?: string
  notes?: string
  createdAt: string
}

export function insertLegacyRow(db: EntryDatabase, row: LegacyRow) {
  db.run(sql`
    INSERT INTO entry (id, user_name, date, location, client, notes, created_at)
    VALUES (${row.id}, ${row.userName}, ${row.date}, ${row.location}, ${row.client ?? null}, ${row.notes ?? null}, ${row.createdAt})
  `)
}
