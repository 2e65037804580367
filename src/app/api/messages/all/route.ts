import { NextRequest } from 'next/server'
import { toErrorResponse } from '@/lib/errors'
import { readPage } from '@/lib/http'
import { getJourneyRuntime } from '@/lib/journey/runtime'
import { DEFAULT_ALL_MESSAGES_LIMIT } from '@/lib/journey/store'

export async function GET(request: NextRequest) {
  try {
    const page = readPage(new URL(request.url), { limit: DEFAULT_ALL_MESSAGES_LIMIT })
    return Response.json(await getJourneyRuntime().store.listMessages({ ...page, order: 'desc' }))
  } catch (error) {
    return toErrorResponse(error, '[MESSAGES] List all')
  }
}
