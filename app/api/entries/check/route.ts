import { NextRequest, NextResponse } from 'next/server'
import { getEntryService } from '@/lib/db'
import { parseSearchParams, toErrorResponse } from '@/lib/http'
import { userWeekQuerySchema } from '@/lib/schemas'
import { toSummaryRow } from '@/lib/transforms'

export async function GET(request: NextRequest) {
  try {
    const service = await getEntryService()
    const { user_name, week_start } = parseSearchParams(userWeekQuerySchema, request.nextUrl.searchParams)

    const existing = service.checkExistingEntries(user_name, week_start)

    return NextResponse.json({
      exists: existing.exists,
      count: existing.count,
      entries: existing.entries.map(toSummaryRow),
    })
  } catch (error) {
    console.error('Error checking entries:', error)
    return toErrorResponse(error)
  }
}
