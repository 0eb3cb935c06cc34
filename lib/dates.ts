/**
 * Calendar-day helpers. Days travel as `YYYY-MM-DD` strings and all
 * arithmetic happens in UTC so the server's timezone never shifts a day.
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2})?)(\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/

export const BUSINESS_DAYS_PER_WEEK = 5

const MS_PER_DAY = 24 * 60 * 60 * 1000

export function isIsoDate(value: string): boolean {
  const match = value.match(ISO_DATE_PATTERN)
  if (!match) return false

  const [, year, month, day] = match
  const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
  return (
    parsed.getUTCFullYear() === Number(year) &&
    parsed.getUTCMonth() === Number(month) - 1 &&
    parsed.getUTCDate() === Number(day)
  )
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10)
}

function parseIsoDate(value: string): Date {
  if (!isIsoDate(value)) {
    throw new RangeError(`Invalid calendar date: ${value}`)
  }
  return new Date(`${value}T00:00:00.000Z`)
}

export function addDays(isoDate: string, days: number): string {
  const date = parseIsoDate(isoDate)
  return formatIsoDate(new Date(date.getTime() + days * MS_PER_DAY))
}

/** The five consecutive days starting at `weekStart`. */
export function businessWeek(weekStart: string): string[] {
  return Array.from({ length: BUSINESS_DAYS_PER_WEEK }, (_, offset) => addDays(weekStart, offset))
}

export interface DateRange {
  from: string
  to: string
}

export function businessWeekRange(weekStart: string): DateRange {
  return { from: weekStart, to: addDays(weekStart, BUSINESS_DAYS_PER_WEEK - 1) }
}

/** Monday of the week before the one containing `today` (UTC). */
export function previousWeekStart(today: Date): string {
  const daysSinceMonday = (today.getUTCDay() + 6) % 7
  const currentMonday = addDays(formatIsoDate(today), -daysSinceMonday)
  return addDays(currentMonday, -7)
}

/**
 * Normalizes a stored timestamp to ISO-8601 UTC. Accepts the space-separated,
 * zone-less form older rows were written with (read as UTC) and microsecond
 * precision. Returns null when the value is not a timestamp at all.
 */
export function toIsoTimestamp(raw: string): string | null {
  const match = raw.trim().match(TIMESTAMP_PATTERN)
  if (!match) return null

  const [, day, clock, fraction, zone] = match
  const seconds = clock.length === 5 ? `${clock}:00` : clock
  const millis = fraction ? fraction.slice(0, 4) : ''
  let offset = zone ?? 'Z'
  if (/^[+-]\d{4}$/.test(offset)) {
    offset = `${offset.slice(0, 3)}:${offset.slice(3)}`
  }

  const time = Date.parse(`${day}T${seconds}${millis}${offset}`)
  if (Number.isNaN(time)) return null
  return new Date(time).toISOString()
}
