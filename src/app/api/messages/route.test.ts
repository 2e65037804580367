import { describe, it, expect, afterEach } from 'vitest'
import { NextRequest } from 'next/server'
import { POST } from './route'
import { loadConfig } from '@/lib/config'
import { createJourneyRuntime, setJourneyRuntime } from '@/lib/journey/runtime'
import { StubLlm, seedJourney } from '@/test/fakes'

function postMessage(body: unknown) {
  return POST(
    new NextRequest('http://localhost/api/messages', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    })
  )
}

async function useRuntime(llm = new StubLlm()) {
  const seeded = await seedJourney()
  setJourneyRuntime(createJourneyRuntime(loadConfig({ JOURNEY_STORE: 'memory' }), { store: seeded.store, llm }))
  return seeded
}

describe('POST /api/messages', () => {
  afterEach(() => {
    setJourneyRuntime(null)
  })

  it('returns the assistant message and journey state', async () => {
    const { journey, userId } = await useRuntime(
      new StubLlm({
        reply: 'Which part of the bathroom bothers you most?',
        toolInputs: [{ journey_id: 1, checkpoint_name: 'room', value: 'bathroom' }],
      })
    )

    const response = await postMessage({ user_id: userId, journey_id: journey.id, content: 'My bathroom' })
    const body = await response.json()

    expect(response.status).toBe(200)
    expect(body.message).toMatchObject({
      speaker: 'assistant',
      content: 'Which part of the bathroom bothers you most?',
      journey_id: journey.id,
    })
    expect(body.journey_state).toEqual({ milestone: 1, completed_checkpoints: ['room'], status: 'in_progress' })
    expect(body.extraction_outcome.status).toBe('updated')
  })

  it('maps ownership failures to 403', async () => {
    const { store, journey } = await useRuntime()
    const other = await store.createUser({ first_name: 'Other' })

    const response = await postMessage({ user_id: other.id, journey_id: journey.id, content: 'hello' })

    expect(response.status).toBe(403)
    expect(await response.json()).toEqual({ error: `Journey ${journey.id} does not belong to user ${other.id}` })
  })

  it('maps unknown journeys to 404', async () => {
    const { userId } = await useRuntime()

    const response = await postMessage({ user_id: userId, journey_id: 9, content: 'hello' })

    expect(response.status).toBe(404)
    expect(await response.json()).toEqual({ error: 'Journey 9 not found' })
  })

  it('validates the request body', async () => {
    const { journey, userId } = await useRuntime()

    const empty = await postMessage({ user_id: userId, journey_id: journey.id, content: '   ' })
    expect(empty.status).toBe(400)
    expect(await empty.json()).toEqual({ error: 'Invalid request', issues: ['content: Message cannot be empty'] })

    const malformed = await postMessage('{not json')
    expect(malformed.status).toBe(400)
    expect((await malformed.json()).error).toBe('Request body must be valid JSON')
  })
})
