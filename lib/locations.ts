export const LOCATIONS = ['on-site', 'remote', 'client-site', 'leave', 'abroad', 'other'] as const

export type Location = (typeof LOCATIONS)[number]

/** Locations that need a client name or description alongside them. */
export const QUALIFIED_LOCATIONS: ReadonlySet<Location> = new Set<Location>(['client-site', 'other'])

/** Locations counted as "in the office" by the attendance tally. */
export const OFFICE_LOCATIONS: ReadonlySet<Location> = new Set<Location>(['on-site', 'client-site'])

// Names the form and the database used before the enumeration existed
const LEGACY_LOCATION_NAMES = new Map<string, Location>([
  ['Neal Street', 'on-site'],
  ['Office', 'on-site'],
  ['WFH', 'remote'],
  ['Client Office', 'client-site'],
  ['Client', 'client-site'],
  ['Holiday', 'leave'],
  ['Off', 'leave'],
  ['PTO', 'leave'],
  ['Working From Abroad', 'abroad'],
  ['Other', 'other'],
])

export function isLocation(value: string): value is Location {
  return LOCATIONS.some((location) => location === value)
}

/** Maps a legacy display name onto the enumeration; anything else comes back unchanged. */
export function resolveLocationAlias(value: string): string {
  return LEGACY_LOCATION_NAMES.get(value) ?? value
}

export function requiresQualifier(location: Location): boolean {
  return QUALIFIED_LOCATIONS.has(location)
}
