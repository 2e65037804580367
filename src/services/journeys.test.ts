import { describe, it, expect } from 'vitest'
import {
  advanceMilestone,
  completeJourney,
  createJourneyForUser,
  getActiveJourneyForUser,
  getJourneyProgress,
  getSession,
  saveCheckpoint,
  startSession,
} from './journeys'
import { MemoryJourneyStore } from '@/lib/journey/memory-store'
import { NotFoundError, ValidationError } from '@/lib/errors'
import { seedJourney } from '@/test/fakes'

describe('startSession', () => {
  it('registers a new user with a fresh journey', async () => {
    const store = new MemoryJourneyStore()

    expect(await startSession(store, { first_name: 'Ada' })).toEqual({
      user_id: 1,
      journey_id: 1,
      current_milestone: 1,
      status: 'in_progress',
    })
    expect((await store.getUser(1))?.first_name).toBe('Ada')
  })

  it('resumes the active journey of a returning user', async () => {
    const { store, journey, userId } = await seedJourney({ current_milestone: 2 })

    expect(await startSession(store, { user_id: userId })).toEqual({
      user_id: userId,
      journey_id: journey.id,
      current_milestone: 2,
      status: 'in_progress',
    })
  })

  it('treats an unknown id as a first visit', async () => {
    const store = new MemoryJourneyStore()
    const session = await startSession(store, { user_id: 77 })

    expect(session.user_id).toBe(1)
    expect(await store.listUsers()).toHaveLength(1)
  })
})

describe('getSession', () => {
  it('returns the ten most recent messages, newest first', async () => {
    const { store, journey, userId } = await seedJourney()
    for (let i = 1; i <= 12; i++) {
      await store.createMessage({
        user_id: userId,
        journey_id: journey.id,
        speaker: 'user',
        content: `message ${i}`,
        current_milestone: 1,
      })
    }

    const session = await getSession(store, userId)
    expect(session.recent_messages).toHaveLength(10)
    expect(session.recent_messages[0].content).toBe('message 12')
    expect(session.recent_messages[9].content).toBe('message 3')
  })

  it('starts a new journey when the last one is finished', async () => {
    const { store, journey, userId } = await seedJourney({ status: 'completed' })

    const session = await getSession(store, userId)
    expect(session.journey_id).not.toBe(journey.id)
    expect(session.current_milestone).toBe(1)
  })

  it('rejects unknown users', async () => {
    await expect(getSession(new MemoryJourneyStore(), 5)).rejects.toThrow(NotFoundError)
  })
})

describe('journey lookups', () => {
  it('reports when a user has no active journey', async () => {
    const { store, userId } = await seedJourney({ status: 'abandoned' })

    await expect(getActiveJourneyForUser(store, userId)).rejects.toThrow(`No active journey for user ${userId}`)
    expect(await getJourneyProgress(store, userId)).toEqual({
      has_journey: false,
      milestone: null,
      completed_checkpoints: [],
      milestone_completed: false,
    })
  })

  it('reuses an in-progress journey instead of creating another', async () => {
    const { store, journey, userId } = await seedJourney()

    const result = await createJourneyForUser(store, userId)
    expect(result.created).toBe(false)
    expect(result.journey.id).toBe(journey.id)
  })

  it('summarises progress on the current milestone', async () => {
    const { store, userId } = await seedJourney({ room: 'kitchen', renovation_purpose: 'repair' })

    expect(await getJourneyProgress(store, userId)).toEqual({
      has_journey: true,
      milestone: 1,
      completed_checkpoints: ['room', 'renovation_purpose'],
      milestone_completed: true,
    })
  })
})

describe('explicit journey updates', () => {
  it('overwrites a checkpoint and completes the milestone', async () => {
    const { store, journey } = await seedJourney({ room: 'bathroom' })

    await saveCheckpoint(store, journey.id, 'room', 'kitchen')
    const updated = await saveCheckpoint(store, journey.id, 'renovation_purpose', 'functional')

    expect(updated).toMatchObject({
      room: 'kitchen',
      renovation_purpose: 'functional',
      milestone1_completed: true,
      milestone1_completed_at: '2026-03-01T10:00:00.000Z',
      current_milestone: 1,
    })
  })

  it('rejects unknown checkpoints', async () => {
    const { store, journey } = await seedJourney()
    await expect(saveCheckpoint(store, journey.id, 'garden', 'roses')).rejects.toThrow(
      new ValidationError('Invalid checkpoint: garden')
    )
  })

  it('advances one milestone at a time up to the last', async () => {
    const { store, journey } = await seedJourney({ current_milestone: 2 })

    expect((await advanceMilestone(store, journey.id)).current_milestone).toBe(3)
    await expect(advanceMilestone(store, journey.id)).rejects.toThrow('Journey is already at the final milestone')
  })

  it('marks a journey completed', async () => {
    const { store, journey } = await seedJourney()

    expect((await completeJourney(store, journey.id)).status).toBe('completed')
    await expect(completeJourney(store, 404)).rejects.toThrow('Journey 404 not found')
  })
})
