import { NextRequest } from 'next/server'
import { z } from 'zod'
import { toErrorResponse } from '@/lib/errors'
import { readJson } from '@/lib/http'
import { getJourneyRuntime } from '@/lib/journey/runtime'
import { startSession } from '@/services/journeys'

const sessionSchema = z.object({
  user_id: z.number().int().positive().optional(),
  first_name: z.string().trim().max(100).nullable().optional(),
  last_name: z.string().trim().max(100).nullable().optional(),
})

export async function POST(request: NextRequest) {
  try {
    const input = await readJson(request, sessionSchema)
    const session = await startSession(getJourneyRuntime().store, input)
    return Response.json(session)
  } catch (error) {
    return toErrorResponse(error, '[SESSIONS] Start')
  }
}
