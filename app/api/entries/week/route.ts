import { NextRequest, NextResponse } from 'next/server'
import { getEntryService } from '@/lib/db'
import { parseSearchParams, toErrorResponse } from '@/lib/http'
import { userWeekQuerySchema } from '@/lib/schemas'
import { toEntryResponse } from '@/lib/transforms'

export async function GET(request: NextRequest) {
  try {
    const service = await getEntryService()
    const { user_name, week_start } = parseSearchParams(userWeekQuerySchema, request.nextUrl.searchParams)

    const entries = service.getWeekForUser(user_name, week_start)

    return NextResponse.json({ entries: entries.map(toEntryResponse) })
  } catch (error) {
    console.error('Error fetching week for user:', error)
    return toErrorResponse(error)
  }
}
