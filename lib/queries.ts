import { businessWeekRange, isIsoDate, type DateRange } from './dates'
import type { Entry } from './db-schema'
import type { EntryStore } from './entry-store'
import { ValidationFailedError } from './errors'
import { normalizeUserKey } from './identity'

function weekRange(weekStart: string): DateRange {
  if (!isIsoDate(weekStart)) {
    throw new ValidationFailedError([
      { field: 'week_start', message: 'Date must be a calendar day in YYYY-MM-DD format' },
    ])
  }
  return businessWeekRange(weekStart)
}

/** One person's days in the business week starting at `weekStart`, oldest first. */
export function getWeekForUser(store: EntryStore, displayName: string, weekStart: string): Entry[] {
  const userKey = normalizeUserKey(displayName)
  const { from, to } = weekRange(weekStart)
  return store.getByUserAndDateRange(userKey, from, to)
}

export function getWeekSummary(store: EntryStore, weekStart: string): Entry[] {
  const { from, to } = weekRange(weekStart)
  return store.listInRange(from, to)
}

/** Everyone who has entries, or only those with entries in the given week. */
export function listKnownUsers(store: EntryStore, weekStart?: string): string[] {
  if (weekStart === undefined) {
    return store.listDistinctUsersInRange()
  }
  const { from, to } = weekRange(weekStart)
  return store.listDistinctUsersInRange(from, to)
}

export interface ExistingEntries {
  exists: boolean
  count: number
  entries: Entry[]
}

export function checkExistingEntries(
  store: EntryStore,
  displayName: string,
  weekStart: string
): ExistingEntries {
  const entries = getWeekForUser(store, displayName, weekStart)
  return { exists: entries.length > 0, count: entries.length, entries }
}

export function listEntries(store: EntryStore, range: Partial<DateRange> = {}): Entry[] {
  return store.listInRange(range.from, range.to)
}
