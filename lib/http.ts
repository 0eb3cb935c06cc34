import { NextResponse } from 'next/server'
import type { z } from 'zod'
import { EntryError, ValidationFailedError } from './errors'
import { toValidationIssues } from './schemas'

const STATUS_BY_CODE: Record<EntryError['code'], number> = {
  INVALID_IDENTITY: 400,
  VALIDATION_FAILED: 400,
  ENTRY_NOT_FOUND: 404,
  STORAGE_UNAVAILABLE: 503,
  MIGRATION_FAILED: 503,
}

export function toErrorResponse(error: unknown) {
  if (error instanceof ValidationFailedError) {
    return NextResponse.json(
      { error: error.message, code: error.code, issues: error.issues },
      { status: STATUS_BY_CODE[error.code] }
    )
  }
  if (error instanceof EntryError) {
    return NextResponse.json(
      { error: error.message, code: error.code, retryable: error.retryable },
      { status: STATUS_BY_CODE[error.code] }
    )
  }
  return NextResponse.json({ error: 'Internal server error' }, { status: 500 })
}

/** Parses query parameters, throwing `ValidationFailedError` on a bad value. */
export function parseSearchParams<T extends z.ZodTypeAny>(schema: T, params: URLSearchParams): z.output<T> {
  const raw: Record<string, string> = {}
  for (const [key, value] of params) {
    raw[key] = value
  }
  const result = schema.safeParse(raw)
  if (!result.success) {
    throw new ValidationFailedError(toValidationIssues(result.error))
  }
  return result.data
}

export async function parseJsonBody<T extends z.ZodTypeAny>(schema: T, request: Request): Promise<z.output<T>> {
  let body: unknown
  try {
    body = await request.json()
  } catch {
    throw new ValidationFailedError([{ field: 'body', message: 'Request body must be JSON' }])
  }
  const result = schema.safeParse(body)
  if (!result.success) {
    throw new ValidationFailedError(toValidationIssues(result.error))
  }
  return result.data
}
