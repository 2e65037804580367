import { describe, it, expect } from 'vitest'
import { EMPTY_RESPONSE_TEXT, JourneyHandler } from './handler'
import { MemoryJourneyStore } from '@/lib/journey/memory-store'
import type { MessageInsert, Message } from '@/lib/journey/types'
import { DATABASE_ERROR_MESSAGE, PersistenceError } from '@/lib/errors'
import { StubLlm, seedJourney } from '@/test/fakes'

function createHandler(store: MemoryJourneyStore, llm: StubLlm) {
  return new JourneyHandler({ store, llm, responseModel: 'response-model', sentinelModel: 'sentinel-model' })
}

class BrokenMessageStore extends MemoryJourneyStore {
  async createMessage(_input: MessageInsert): Promise<Message> {
    throw new PersistenceError('connection lost')
  }
}

describe('JourneyHandler.processMessage', () => {
  it('extracts the room and answers with the model reply', async () => {
    const { store, journey, userId } = await seedJourney()
    const llm = new StubLlm({
      reply: 'A kitchen, lovely. What is driving the project?',
      toolInputs: [{ journey_id: journey.id, checkpoint_name: 'room', value: 'kitchen' }],
    })

    const result = await createHandler(store, llm).processMessage(userId, journey.id, 'I want to redo my kitchen')

    if (!result.ok) throw new Error(result.error)
    expect(result.response_text).toBe('A kitchen, lovely. What is driving the project?')
    expect(result.source).toBe('llm')
    expect(result.journey_state).toEqual({ milestone: 1, completed_checkpoints: ['room'], status: 'in_progress' })
    expect(result.extraction_outcome.status).toBe('updated')
    expect(result.assistant_message).toMatchObject({ speaker: 'assistant', current_milestone: 1 })

    expect(llm.completeCalls).toHaveLength(1)
    expect(llm.completeCalls[0].model).toBe('response-model')
    expect(llm.completeCalls[0].systemPrompt).toContain('they want to renovate their kitchen.')
    expect(llm.completeCalls[0].messages).toEqual([
      { role: 'user', content: 'I want to redo my kitchen' },
      { role: 'user', content: 'I want to redo my kitchen' },
    ])

    const stored = await store.getMessages(journey.id)
    expect(stored.map(message => [message.speaker, message.content])).toEqual([
      ['user', 'I want to redo my kitchen'],
      ['assistant', 'A kitchen, lovely. What is driving the project?'],
    ])
  })

  it('stores the user message with the milestone it was sent in', async () => {
    const { store, journey, userId } = await seedJourney({ room: 'kitchen' })
    const llm = new StubLlm({
      toolInputs: [{ journey_id: journey.id, checkpoint_name: 'renovation_purpose', value: 'the sink is broken' }],
    })

    const result = await createHandler(store, llm).processMessage(userId, journey.id, 'The sink is broken')

    if (!result.ok) throw new Error(result.error)
    expect(result.journey_state).toEqual({ milestone: 2, completed_checkpoints: [], status: 'in_progress' })

    const stored = await store.getMessages(journey.id)
    expect(stored.map(message => message.current_milestone)).toEqual([1, 2])
    expect(llm.completeCalls[0].systemPrompt).toContain("You're currently in Milestone 2: Budget and Timeline.")
  })

  it('completes the journey over two turns of milestone 3', async () => {
    const { store, journey, userId } = await seedJourney({
      current_milestone: 3,
      room: 'kitchen',
      renovation_purpose: 'functional',
      budget_range: 'medium',
      timeline: 'months',
      milestone1_completed: true,
      milestone2_completed: true,
    })
    const llm = new StubLlm({
      toolInputs: prompt => {
        if (prompt.includes('- Checkpoint: style_preference')) {
          return [{ journey_id: journey.id, checkpoint_name: 'style_preference', value: 'farmhouse' }]
        }
        return [{ journey_id: journey.id, checkpoint_name: 'priority_feature', value: 'storage' }]
      },
    })
    const handler = createHandler(store, llm)

    const first = await handler.processMessage(userId, journey.id, 'I love a farmhouse look')
    if (!first.ok) throw new Error(first.error)
    expect(first.journey_state).toEqual({
      milestone: 3,
      completed_checkpoints: ['style_preference'],
      status: 'in_progress',
    })

    const second = await handler.processMessage(userId, journey.id, 'Storage matters most')
    if (!second.ok) throw new Error(second.error)
    expect(second.journey_state).toEqual({
      milestone: 3,
      completed_checkpoints: ['style_preference', 'priority_feature'],
      status: 'completed',
    })
    expect(llm.completeCalls[1].systemPrompt).toContain('The user has completed their renovation journey!')

    expect(await store.getJourney(journey.id)).toMatchObject({
      style_preference: 'rustic',
      priority_feature: 'storage',
      milestone3_completed: true,
    })
  })

  it('falls back to keyword extraction when the reply fails', async () => {
    const { store, journey, userId } = await seedJourney()
    const llm = new StubLlm({ reply: new Error('overloaded') })

    const result = await createHandler(store, llm).processMessage(userId, journey.id, 'Thinking about the kitchen')

    if (!result.ok) throw new Error(result.error)
    expect(result.source).toBe('fallback')
    expect(result.extraction_outcome.status).toBe('unchanged')
    expect(result.response_text).toBe(
      "Thanks for your message! I'm helping you plan your renovation. Let's start by figuring out the basic details of your project. What's the main purpose of renovating your kitchen?"
    )
    expect(result.journey_state.completed_checkpoints).toEqual(['room'])
  })

  it('uses a stock reply when the model returns no text', async () => {
    const { store, journey, userId } = await seedJourney()

    const result = await createHandler(store, new StubLlm({ reply: null })).processMessage(userId, journey.id, 'hi')

    if (!result.ok) throw new Error(result.error)
    expect(result.response_text).toBe(EMPTY_RESPONSE_TEXT)
  })

  it('rejects unknown users and journeys', async () => {
    const { store, journey, userId } = await seedJourney()
    const handler = createHandler(store, new StubLlm())

    expect(await handler.processMessage(99, journey.id, 'hi')).toEqual({
      ok: false,
      reason: 'not_found',
      error: 'User 99 not found',
    })
    expect(await handler.processMessage(userId, 42, 'hi')).toEqual({
      ok: false,
      reason: 'not_found',
      error: 'Journey 42 not found',
    })
  })

  it("refuses to post into another user's journey", async () => {
    const { store, journey } = await seedJourney()
    const intruder = await store.createUser({ first_name: 'Eve' })
    const llm = new StubLlm()

    const result = await createHandler(store, llm).processMessage(intruder.id, journey.id, 'hi')

    expect(result).toEqual({
      ok: false,
      reason: 'forbidden',
      error: `Journey ${journey.id} does not belong to user ${intruder.id}`,
    })
    expect(await store.getMessages(journey.id)).toEqual([])
    expect(llm.toolCalls).toEqual([])
  })

  it('reports store failures as a database error', async () => {
    const { store, journey, userId } = await seedJourney({}, new BrokenMessageStore())

    const result = await createHandler(store, new StubLlm()).processMessage(userId, journey.id, 'hi')

    expect(result).toEqual({
      ok: false,
      reason: 'database',
      error: 'connection lost',
      response_text: DATABASE_ERROR_MESSAGE,
    })
  })
})
