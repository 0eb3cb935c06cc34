import { InvalidIdentityError } from './errors'

/**
 * Canonical user key for a typed name: `lowercase(trim(name))`.
 * Internal whitespace is kept as typed, so "Jo  Smith" and "Jo Smith" are
 * different people.
 */
export function normalizeUserKey(rawName: string): string {
  const userKey = rawName.trim().toLowerCase()
  if (!userKey) {
    throw new InvalidIdentityError(rawName)
  }
  return userKey
}
