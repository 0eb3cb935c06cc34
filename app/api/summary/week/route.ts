import { NextRequest, NextResponse } from 'next/server'
import { getEntryService } from '@/lib/db'
import { parseSearchParams, toErrorResponse } from '@/lib/http'
import { weekStartQuerySchema } from '@/lib/schemas'
import { toSummaryRow } from '@/lib/transforms'

export async function GET(request: NextRequest) {
  try {
    const service = await getEntryService()
    const { week_start } = parseSearchParams(weekStartQuerySchema, request.nextUrl.searchParams)

    const entries = service.getWeekSummary(week_start)

    return NextResponse.json({ entries: entries.map(toSummaryRow) })
  } catch (error) {
    console.error('Error fetching week summary:', error)
    return toErrorResponse(error)
  }
}
