import { businessWeekRange, previousWeekStart, type DateRange } from './dates'
import { tallyOfficeDays } from './attendance'
import { EntryStore } from './entry-store'
import { EntryNotFoundError } from './errors'
import { readMigrationStatus } from './migrate'
import {
  checkExistingEntries,
  getWeekForUser,
  getWeekSummary,
  listEntries,
  listKnownUsers,
} from './queries'
import type { DayRecordInput } from './schemas'
import type { EntryDatabase } from './sqlite'
import { submitWeek } from './upsert'

export interface EntryServiceOptions {
  now?: () => Date
}

/**
 * The operations the route handlers call. Holds no per-user state: every call
 * names the person it acts for.
 */
export function createEntryService(db: EntryDatabase, options: EntryServiceOptions = {}) {
  const store = new EntryStore(db)
  const now = options.now ?? (() => new Date())

  return {
    submitWeek: (displayName: string, entries: readonly DayRecordInput[]) =>
      submitWeek(store, displayName, entries, now()),

    getWeekForUser: (displayName: string, weekStart: string) =>
      getWeekForUser(store, displayName, weekStart),

    getWeekSummary: (weekStart: string) => getWeekSummary(store, weekStart),

    listKnownUsers: (weekStart?: string) => listKnownUsers(store, weekStart),

    checkExistingEntries: (displayName: string, weekStart: string) =>
      checkExistingEntries(store, displayName, weekStart),

    listEntries: (range?: Partial<DateRange>) => listEntries(store, range),

    deleteEntry: (id: number) => {
      if (!store.deleteById(id)) {
        throw new EntryNotFoundError(id)
      }
      console.log(`Deleted entry ${id}`)
    },

    getAttendance: (weekStart: string = previousWeekStart(now())) => {
      const lines = tallyOfficeDays(getWeekSummary(store, weekStart))
      return { weekStart, weekEnd: businessWeekRange(weekStart).to, lines }
    },

    getMigrationStatus: () => readMigrationStatus(db),
  }
}

export type EntryService = ReturnType<typeof createEntryService>
