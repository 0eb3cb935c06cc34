import { NextResponse } from 'next/server'
import { getEntryService } from '@/lib/db'
import { toErrorResponse } from '@/lib/http'

export const dynamic = 'force-dynamic'

export async function GET() {
  try {
    const service = await getEntryService()

    return NextResponse.json({ users: service.listKnownUsers() })
  } catch (error) {
    console.error('Error fetching all users:', error)
    return toErrorResponse(error)
  }
}
