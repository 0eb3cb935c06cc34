import { NextRequest, NextResponse } from 'next/server'
import { getEntryService } from '@/lib/db'
import { parseSearchParams, toErrorResponse } from '@/lib/http'
import { optionalWeekStartQuerySchema } from '@/lib/schemas'

/**
 * Office days per person for a business week; defaults to last week, which is
 * what the Monday report asks for.
 */
export async function GET(request: NextRequest) {
  try {
    const service = await getEntryService()
    const { week_start } = parseSearchParams(optionalWeekStartQuerySchema, request.nextUrl.searchParams)

    const attendance = service.getAttendance(week_start)

    return NextResponse.json({
      week_start: attendance.weekStart,
      week_end: attendance.weekEnd,
      users: attendance.lines.map((line) => ({ user_name: line.userName, office_days: line.officeDays })),
    })
  } catch (error) {
    console.error('Error building attendance summary:', error)
    return toErrorResponse(error)
  }
}
