import { NextResponse } from 'next/server'
import { getEntryService } from '@/lib/db'
import { toErrorResponse } from '@/lib/http'

export const dynamic = 'force-dynamic'

export async function GET() {
  try {
    const service = await getEntryService()
    const status = service.getMigrationStatus()

    return NextResponse.json({
      phase: status.phase,
      last_error: status.lastError,
      updated_at: status.updatedAt,
    })
  } catch (error) {
    console.error('Error reading migration status:', error)
    return toErrorResponse(error)
  }
}
