import type { Entry } from './db-schema'
import { OFFICE_LOCATIONS } from './locations'

export interface AttendanceLine {
  userName: string
  officeDays: number
}

/**
 * Days each person spent on-site or at a client in the given entries.
 * Everyone with an entry gets a line, labelled with their latest display name.
 */
export function tallyOfficeDays(entries: readonly Entry[]): AttendanceLine[] {
  const byUser = new Map<string, { latest: Entry; officeDays: number }>()

  for (const entry of entries) {
    const current = byUser.get(entry.userKey)
    const officeDay = OFFICE_LOCATIONS.has(entry.location) ? 1 : 0
    if (!current) {
      byUser.set(entry.userKey, { latest: entry, officeDays: officeDay })
      continue
    }

    current.officeDays += officeDay
    if (
      entry.updatedAt > current.latest.updatedAt ||
      (entry.updatedAt === current.latest.updatedAt && entry.id > current.latest.id)
    ) {
      current.latest = entry
    }
  }

  return [...byUser.values()]
    .map(({ latest, officeDays }) => ({ userName: latest.displayName, officeDays }))
    .sort((a, b) => a.userName.toLowerCase().localeCompare(b.userName.toLowerCase()))
}
