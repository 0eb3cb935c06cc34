import { NextRequest, NextResponse } from 'next/server'
import { getEntryService } from '@/lib/db'
import { parseJsonBody, toErrorResponse } from '@/lib/http'
import { bulkUpsertRequestSchema } from '@/lib/schemas'

export async function POST(request: NextRequest) {
  try {
    const service = await getEntryService()
    const { user_name, entries } = await parseJsonBody(bulkUpsertRequestSchema, request)

    const result = service.submitWeek(user_name, entries)

    return NextResponse.json({
      ok: true,
      count: result.acceptedCount,
      inserted: result.inserted,
      updated: result.updated,
    })
  } catch (error) {
    console.error('Error saving entries:', error)
    return toErrorResponse(error)
  }
}
