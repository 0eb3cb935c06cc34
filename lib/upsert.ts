import type { EntryStore } from './entry-store'
import { ValidationFailedError } from './errors'
import { normalizeUserKey } from './identity'
import { dayRecordsSchema, toValidationIssues, type DayRecord, type DayRecordInput } from './schemas'

export interface SubmitWeekResult {
  acceptedCount: number
  inserted: number
  updated: number
}

/** Validates a batch of days; throws `ValidationFailedError` naming every bad day. */
export function parseDayRecords(inputs: readonly DayRecordInput[]): DayRecord[] {
  const result = dayRecordsSchema.safeParse(inputs)
  if (!result.success) {
    const dates = inputs.map((input) => input.date)
    throw new ValidationFailedError(toValidationIssues(result.error, dates))
  }
  return result.data
}

/**
 * Makes the store hold exactly the submitted days for this person. Each day is
 * upserted by `(user_key, date)` inside a single transaction: either every day
 * lands or none does, and days not in the batch are never touched.
 */
export function submitWeek(
  store: EntryStore,
  displayName: string,
  inputs: readonly DayRecordInput[],
  now: Date
): SubmitWeekResult {
  const userKey = normalizeUserKey(displayName)
  const records = parseDayRecords(inputs)
  const timestamp = now.toISOString()

  const result = store.transaction((tx) => {
    let inserted = 0
    for (const record of records) {
      const { outcome } = tx.upsertOne({ userKey, displayName, ...record }, timestamp)
      if (outcome === 'inserted') inserted += 1
    }
    return { acceptedCount: records.length, inserted, updated: records.length - inserted }
  })

  console.log(
    `Saved ${result.acceptedCount} entries for ${displayName} (${result.inserted} new, ${result.updated} updated)`
  )
  return result
}
