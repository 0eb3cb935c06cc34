/**
 * Error taxonomy for the entry core. Route handlers map these to HTTP
 * responses in `lib/http.ts`; everything else treats them as plain errors.
 */

export type EntryErrorCode =
  | 'INVALID_IDENTITY'
  | 'VALIDATION_FAILED'
  | 'STORAGE_UNAVAILABLE'
  | 'MIGRATION_FAILED'
  | 'ENTRY_NOT_FOUND'

export abstract class EntryError extends Error {
  abstract readonly code: EntryErrorCode
  readonly retryable: boolean = false

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

export class InvalidIdentityError extends EntryError {
  readonly code = 'INVALID_IDENTITY'

  constructor(readonly rawName: string) {
    super('Name must not be empty')
  }
}

/** One problem with a submitted day. `index` is the day's position in the batch. */
export interface ValidationIssue {
  index?: number
  date?: string
  field: string
  message: string
}

export class ValidationFailedError extends EntryError {
  readonly code = 'VALIDATION_FAILED'

  constructor(readonly issues: ValidationIssue[]) {
    super(issues.map(describeIssue).join('; ') || 'Invalid input')
  }
}

export class StorageUnavailableError extends EntryError {
  readonly code = 'STORAGE_UNAVAILABLE'
  override readonly retryable = true
}

export class MigrationFailedError extends EntryError {
  readonly code = 'MIGRATION_FAILED'

  constructor(readonly phase: string, message: string, options?: ErrorOptions) {
    super(`Migration failed during ${phase}: ${message}`, options)
  }
}

export class EntryNotFoundError extends EntryError {
  readonly code = 'ENTRY_NOT_FOUND'

  constructor(readonly entryId: number) {
    super(`Entry ${entryId} not found`)
  }
}

function describeIssue(issue: ValidationIssue): string {
  if (issue.index === undefined) {
    return `${issue.field}: ${issue.message}`
  }
  const day = issue.date ? `day ${issue.index + 1} (${issue.date})` : `day ${issue.index + 1}`
  return `${day} ${issue.field}: ${issue.message}`
}
