import { z } from 'zod'
import { CHECKPOINT_NAMES } from './types'

const checkpointValue = z.string().nullable()

export const journeySchema = z.object({
  id: z.number(),
  user_id: z.number(),
  current_milestone: z.number(),
  status: z.enum(['in_progress', 'completed', 'abandoned']),
  room: checkpointValue,
  renovation_purpose: checkpointValue,
  budget_range: checkpointValue,
  timeline: checkpointValue,
  style_preference: checkpointValue,
  priority_feature: checkpointValue,
  milestone1_completed: z.boolean(),
  milestone2_completed: z.boolean(),
  milestone3_completed: z.boolean(),
  milestone1_completed_at: z.string().nullable(),
  milestone2_completed_at: z.string().nullable(),
  milestone3_completed_at: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
})

export const messageSchema = z.object({
  id: z.number(),
  user_id: z.number(),
  journey_id: z.number(),
  speaker: z.enum(['user', 'assistant']),
  content: z.string(),
  current_milestone: z.number(),
  timestamp: z.string(),
})

const sessionSchema = z.object({
  user_id: z.number(),
  journey_id: z.number(),
  current_milestone: z.number(),
  status: z.enum(['in_progress', 'completed', 'abandoned']),
})

const sendResultSchema = z.object({
  message: messageSchema,
  journey_state: z.object({
    milestone: z.number(),
    completed_checkpoints: z.array(z.enum(CHECKPOINT_NAMES)),
    status: z.enum(['in_progress', 'completed', 'abandoned']),
  }),
})

const errorBodySchema = z.object({
  error: z.string().optional(),
  response_text: z.string().optional(),
})

export type ClientJourney = z.infer<typeof journeySchema>
export type ClientMessage = z.infer<typeof messageSchema>
export type SessionInfo = z.infer<typeof sessionSchema>
export type SendResult = z.infer<typeof sendResultSchema>

export class ApiRequestError extends Error {
  constructor(message: string, readonly status: number) {
    super(message)
    this.name = 'ApiRequestError'
  }
}

async function request<S extends z.ZodTypeAny>(path: string, schema: S, init?: RequestInit): Promise<z.infer<S>> {
  const response = await fetch(path, {
    ...init,
    headers: { 'Content-Type': 'application/json', ...init?.headers },
  })
  const body: unknown = await response.json().catch(() => null)

  if (!response.ok) {
    const parsed = errorBodySchema.safeParse(body)
    const message = parsed.success
      ? parsed.data.response_text ?? parsed.data.error ?? response.statusText
      : response.statusText
    throw new ApiRequestError(message, response.status)
  }

  return schema.parse(body)
}

export const journeyApi = {
  startSession: (input: { user_id?: number; first_name?: string; last_name?: string }) =>
    request('/api/sessions', sessionSchema, { method: 'POST', body: JSON.stringify(input) }),

  getJourney: (journeyId: number) => request(`/api/journeys/${journeyId}`, journeySchema),

  listJourneys: () => request('/api/journeys', z.array(journeySchema)),

  advance: (journeyId: number) =>
    request(`/api/journeys/${journeyId}/advance`, journeySchema, { method: 'POST' }),

  getMessages: (journeyId: number) => request(`/api/messages/${journeyId}`, z.array(messageSchema)),

  listAllMessages: (limit = 100) => request(`/api/messages/all?limit=${limit}`, z.array(messageSchema)),

  sendMessage: (input: { user_id: number; journey_id: number; content: string }) =>
    request('/api/messages', sendResultSchema, { method: 'POST', body: JSON.stringify(input) }),
}
