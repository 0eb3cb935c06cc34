import Database from 'better-sqlite3'
import { drizzle } from 'drizzle-orm/better-sqlite3'
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core'
import { schema } from './db-schema'

/** Either the root connection or an open transaction on it. */
export type EntryDatabase = BaseSQLiteDatabase<'sync', Database.RunResult, typeof schema>

export interface DatabaseConnection {
  db: EntryDatabase
  close: () => void
}

export interface OpenDatabaseOptions {
  busyTimeoutMs?: number
}

export function openDatabase(path: string, options: OpenDatabaseOptions = {}): DatabaseConnection {
  const sqlite = new Database(path)
  sqlite.pragma('journal_mode = WAL')
  sqlite.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`)

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  }
}
