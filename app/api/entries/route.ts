import { NextRequest, NextResponse } from 'next/server'
import { getEntryService } from '@/lib/db'
import { parseSearchParams, toErrorResponse } from '@/lib/http'
import { dateRangeQuerySchema } from '@/lib/schemas'
import { toEntryResponse } from '@/lib/transforms'

export async function GET(request: NextRequest) {
  try {
    const service = await getEntryService()
    const { date_from, date_to } = parseSearchParams(dateRangeQuerySchema, request.nextUrl.searchParams)

    const entries = service.listEntries({ from: date_from, to: date_to })

    return NextResponse.json(entries.map(toEntryResponse))
  } catch (error) {
    console.error('Error fetching entries:', error)
    return toErrorResponse(error)
  }
}
