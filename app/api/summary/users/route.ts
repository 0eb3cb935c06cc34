import { NextRequest, NextResponse } from 'next/server'
import { getEntryService } from '@/lib/db'
import { parseSearchParams, toErrorResponse } from '@/lib/http'
import { weekStartQuerySchema } from '@/lib/schemas'

export async function GET(request: NextRequest) {
  try {
    const service = await getEntryService()
    const { week_start } = parseSearchParams(weekStartQuerySchema, request.nextUrl.searchParams)

    return NextResponse.json({ users: service.listKnownUsers(week_start) })
  } catch (error) {
    console.error('Error fetching users for week:', error)
    return toErrorResponse(error)
  }
}
