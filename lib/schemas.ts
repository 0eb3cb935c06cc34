import { z } from 'zod'
import { isIsoDate } from './dates'
import type { ValidationIssue } from './errors'
import { LOCATIONS, requiresQualifier, resolveLocationAlias } from './locations'

export const isoDateSchema = z
  .string()
  .refine(isIsoDate, { message: 'Date must be a calendar day in YYYY-MM-DD format' })

export const locationSchema = z
  .string()
  .transform(resolveLocationAlias)
  .pipe(z.enum(LOCATIONS))

// Shape of a day as it arrives over the wire, before any rule is applied
export const dayRecordInputSchema = z.object({
  date: z.string(),
  location: z.string(),
  client: z.string().max(200).nullish(),
  notes: z.string().max(1000).nullish(),
})

export const dayRecordSchema = z
  .object({
    date: isoDateSchema,
    location: locationSchema,
    client: z.string().max(200).nullish(),
    notes: z.string().max(1000).nullish(),
  })
  .superRefine((record, ctx) => {
    const qualifier = record.client?.trim() ?? ''
    if (requiresQualifier(record.location) && !qualifier) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['client'],
        message:
          record.location === 'client-site'
            ? 'Client name is required when location is client-site'
            : 'Location description is required when location is other',
      })
    }
    if (!requiresQualifier(record.location) && qualifier) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['client'],
        message: `Client must be empty when location is ${record.location}`,
      })
    }
  })
  .transform((record) => ({
    date: record.date,
    location: record.location,
    clientDescription: requiresQualifier(record.location) ? (record.client?.trim() ?? null) : null,
    notes: record.notes?.trim() || null,
  }))

export const dayRecordsSchema = z
  .array(dayRecordSchema)
  .min(1, 'At least one day entry is required')
  .superRefine((records, ctx) => {
    const seen = new Set<string>()
    records.forEach((record, index) => {
      if (seen.has(record.date)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'date'],
          message: 'Date appears more than once in the submission',
        })
      }
      seen.add(record.date)
    })
  })

export const bulkUpsertRequestSchema = z.object({
  user_name: z.string().max(200),
  entries: z.array(dayRecordInputSchema),
})

export const weekStartQuerySchema = z.object({
  week_start: isoDateSchema,
})

export const optionalWeekStartQuerySchema = z.object({
  week_start: isoDateSchema.optional(),
})

export const userWeekQuerySchema = z.object({
  user_name: z.string(),
  week_start: isoDateSchema,
})

export const dateRangeQuerySchema = z.object({
  date_from: isoDateSchema.optional(),
  date_to: isoDateSchema.optional(),
})

export const entryIdSchema = z.coerce.number().int().positive()

// Type exports
export type DayRecordInput = z.input<typeof dayRecordInputSchema>
export type DayRecord = z.output<typeof dayRecordSchema>
export type BulkUpsertRequest = z.infer<typeof bulkUpsertRequestSchema>

/**
 * Flattens zod issues into entry validation issues. The first numeric path
 * segment is taken as the day's index; `dates` lets the message name the day.
 */
export function toValidationIssues(error: z.ZodError, dates: readonly string[] = []): ValidationIssue[] {
  return error.issues.map((issue) => {
    const indexAt = issue.path.findIndex((segment) => typeof segment === 'number')
    if (indexAt === -1) {
      return { field: issue.path.join('.') || 'entries', message: issue.message }
    }

    const index = Number(issue.path[indexAt])
    const field = issue.path.slice(indexAt + 1).join('.') || 'entry'
    const date = dates[index]
    return date ? { index, date, field, message: issue.message } : { index, field, message: issue.message }
  })
}
