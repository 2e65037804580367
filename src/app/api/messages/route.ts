import { NextRequest } from 'next/server'
import { z } from 'zod'
import { toErrorResponse } from '@/lib/errors'
import { readJson } from '@/lib/http'
import { getJourneyRuntime } from '@/lib/journey/runtime'

const messageSchema = z.object({
  user_id: z.number().int().positive(),
  journey_id: z.number().int().positive(),
  content: z.string().trim().min(1, 'Message cannot be empty').max(4000),
})

const FAILURE_STATUS = { not_found: 404, forbidden: 403, database: 500 } as const

export async function POST(request: NextRequest) {
  try {
    const { user_id, journey_id, content } = await readJson(request, messageSchema)
    const result = await getJourneyRuntime().handler.processMessage(user_id, journey_id, content)

    if (!result.ok) {
      return Response.json(
        { error: result.error, response_text: result.response_text },
        { status: FAILURE_STATUS[result.reason] }
      )
    }

    return Response.json({
      message: result.assistant_message,
      journey_state: result.journey_state,
      extraction_outcome: result.extraction_outcome,
    })
  } catch (error) {
    return toErrorResponse(error, '[MESSAGES] Send')
  }
}
