import { NextRequest } from 'next/server'
import { toErrorResponse } from '@/lib/errors'
import { readJson } from '@/lib/http'
import { getJourneyRuntime } from '@/lib/journey/runtime'
import { createJourneyForUser } from '@/services/journeys'
import { createJourneySchema } from './schema'

export async function GET() {
  try {
    return Response.json(await getJourneyRuntime().store.listJourneys())
  } catch (error) {
    return toErrorResponse(error, '[JOURNEY] List')
  }
}

export async function POST(request: NextRequest) {
  try {
    const { user_id } = await readJson(request, createJourneySchema)
    const { journey, created } = await createJourneyForUser(getJourneyRuntime().store, user_id)
    return Response.json(journey, { status: created ? 201 : 200 })
  } catch (error) {
    return toErrorResponse(error, '[JOURNEY] Create')
  }
}
