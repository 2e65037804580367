import { describe, it, expect, beforeEach } from 'vitest'
import { MemoryJourneyStore } from './memory-store'
import type { Journey } from './types'

describe('MemoryJourneyStore', () => {
  let store: MemoryJourneyStore
  let journey: Journey

  beforeEach(async () => {
    store = new MemoryJourneyStore(() => new Date('2026-03-01T10:00:00.000Z'))
    const user = await store.createUser({ first_name: 'Ada' })
    journey = await store.createJourney(user.id)
  })

  it('creates journeys at milestone 1 with nothing filled', () => {
    expect(journey).toMatchObject({
      id: 1,
      user_id: 1,
      current_milestone: 1,
      status: 'in_progress',
      room: null,
      milestone1_completed: false,
      created_at: '2026-03-01T10:00:00.000Z',
    })
  })

  it('returns copies rather than live rows', async () => {
    const fetched = await store.getJourney(journey.id)
    if (!fetched) throw new Error('journey missing')
    fetched.room = 'garage'

    expect((await store.getJourney(journey.id))?.room).toBeNull()
  })

  it('sets a checkpoint only while it is empty', async () => {
    const first = await store.setCheckpointIfEmpty(journey.id, 'room', 'kitchen')
    const second = await store.setCheckpointIfEmpty(journey.id, 'room', 'bathroom')

    expect(first?.room).toBe('kitchen')
    expect(second).toBeNull()
    expect((await store.getJourney(journey.id))?.room).toBe('kitchen')
    expect(await store.setCheckpointIfEmpty(99, 'room', 'kitchen')).toBeNull()
  })

  it('picks the newest in-progress journey as active', async () => {
    await store.updateJourney(journey.id, { status: 'completed' })
    expect(await store.getActiveJourney(journey.user_id)).toBeNull()

    const next = await store.createJourney(journey.user_id)
    expect((await store.getActiveJourney(journey.user_id))?.id).toBe(next.id)
  })

  it('orders and pages messages', async () => {
    for (const content of ['one', 'two', 'three']) {
      await store.createMessage({
        user_id: journey.user_id,
        journey_id: journey.id,
        speaker: 'user',
        content,
        current_milestone: 1,
      })
    }

    const ascending = await store.getMessages(journey.id)
    expect(ascending.map(message => message.content)).toEqual(['one', 'two', 'three'])

    const latestTwo = await store.getMessages(journey.id, { limit: 2, order: 'desc' })
    expect(latestTwo.map(message => message.content)).toEqual(['three', 'two'])

    const all = await store.listMessages({ offset: 1 })
    expect(all.map(message => message.content)).toEqual(['two', 'one'])
  })

  it('deletes a user with their journeys and messages', async () => {
    await store.createMessage({
      user_id: journey.user_id,
      journey_id: journey.id,
      speaker: 'assistant',
      content: 'hello',
      current_milestone: 1,
    })

    expect(await store.deleteUser(journey.user_id)).toBe(true)
    expect(await store.getJourney(journey.id)).toBeNull()
    expect(await store.listMessages()).toEqual([])
    expect(await store.deleteUser(journey.user_id)).toBe(false)
  })
})
