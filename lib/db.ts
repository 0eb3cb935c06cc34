import { getConfig } from './config'
import { createEntryService, type EntryService } from './entry-service'
import { MigrationRunner } from './migrate'
import { openDatabase, type DatabaseConnection } from './sqlite'

interface RunningService {
  connection: DatabaseConnection
  service: EntryService
}

declare global {
  // Survives module reloads in `next dev`
  var entryServicePromise: Promise<RunningService> | undefined
}

async function startEntryService(): Promise<RunningService> {
  const config = getConfig()
  const connection = openDatabase(config.databasePath, { busyTimeoutMs: config.busyTimeoutMs })
  try {
    new MigrationRunner(connection.db).run()
  } catch (error) {
    connection.close()
    throw error
  }
  return { connection, service: createEntryService(connection.db) }
}

/**
 * The entry service, available only once the migration has finished. A failed
 * migration rejects every caller; the app never runs against an unmigrated store.
 */
export async function getEntryService(): Promise<EntryService> {
  if (!globalThis.entryServicePromise) {
    globalThis.entryServicePromise = startEntryService()
  }
  const { service } = await globalThis.entryServicePromise
  return service
}

export async function closeEntryService() {
  const pending = globalThis.entryServicePromise
  globalThis.entryServicePromise = undefined
  if (!pending) return

  try {
    const { connection } = await pending
    connection.close()
  } catch (error) {
    console.error('Entry service never started:', error)
  }
}
