import { describe, it, expect } from 'vitest'
import { UPDATE_JOURNEY_TOOL, createUpdateJourneyHandler } from './sentinel-tool'
import { seedJourney } from '@/test/fakes'
import type { CheckpointName, JourneyUpdate } from '@/lib/journey/types'

async function setup(target: CheckpointName, update: JourneyUpdate = {}) {
  const seeded = await seedJourney(update)
  const handler = createUpdateJourneyHandler({ store: seeded.store, journeyId: seeded.journey.id, target })
  return { ...seeded, handler }
}

describe('UPDATE_JOURNEY_TOOL', () => {
  it('declares every checkpoint name and requires all three arguments', () => {
    expect(UPDATE_JOURNEY_TOOL.name).toBe('update_journey')
    expect(UPDATE_JOURNEY_TOOL.input_schema.required).toEqual(['journey_id', 'checkpoint_name', 'value'])
    expect(UPDATE_JOURNEY_TOOL.input_schema.properties).toMatchObject({
      checkpoint_name: {
        enum: ['room', 'renovation_purpose', 'budget_range', 'timeline', 'style_preference', 'priority_feature'],
      },
    })
  })
})

describe('createUpdateJourneyHandler', () => {
  it('writes the normalized value for the target checkpoint', async () => {
    const { store, journey, handler } = await setup('budget_range', { current_milestone: 2 })

    const result = await handler('update_journey', {
      journey_id: journey.id,
      checkpoint_name: 'budget_range',
      value: 'very affordable',
    })

    expect(result).toEqual({ success: true, message: "Updated budget_range to 'low'", journey_id: journey.id })
    expect((await store.getJourney(journey.id))?.budget_range).toBe('low')
  })

  it('reports missing arguments', async () => {
    const { journey, handler } = await setup('room')

    expect(await handler('update_journey', { checkpoint_name: 'room', value: 'kitchen' })).toEqual({
      error: 'Missing journey_id',
    })
    expect(await handler('update_journey', { journey_id: journey.id, checkpoint_name: 'room', value: '  ' })).toEqual({
      error: 'Both checkpoint_name and value must be provided',
    })
    expect(await handler('update_journey', 'not an object')).toEqual({ error: 'Missing journey_id' })
  })

  it('rejects unknown checkpoint names with the valid list', async () => {
    const { journey, handler } = await setup('room')

    expect(await handler('update_journey', { journey_id: journey.id, checkpoint_name: 'garden', value: 'roses' })).toEqual({
      error: 'Invalid checkpoint_name: garden',
      valid_checkpoints: ['room', 'renovation_purpose', 'budget_range', 'timeline', 'style_preference', 'priority_feature'],
    })
  })

  it('only writes the journey under analysis', async () => {
    const { store, journey, handler } = await setup('room')
    const other = await store.createJourney(journey.user_id)

    expect(await handler('update_journey', { journey_id: other.id, checkpoint_name: 'room', value: 'kitchen' })).toEqual({
      error: `Journey ${other.id} is not the journey under analysis (${journey.id})`,
    })
    expect((await store.getJourney(other.id))?.room).toBeNull()
  })

  it('rejects checkpoints other than the target', async () => {
    const { store, journey, handler } = await setup('room')

    expect(
      await handler('update_journey', { journey_id: journey.id, checkpoint_name: 'timeline', value: 'weeks' })
    ).toEqual({ error: 'Checkpoint timeline is not the current target (room)' })
    expect((await store.getJourney(journey.id))?.timeline).toBeNull()
  })

  it('keeps the first value written', async () => {
    const { store, journey, handler } = await setup('room')
    await store.setCheckpointIfEmpty(journey.id, 'room', 'bathroom')

    expect(await handler('update_journey', { journey_id: journey.id, checkpoint_name: 'room', value: 'kitchen' })).toEqual({
      error: 'Checkpoint room already has a value',
    })
    expect((await store.getJourney(journey.id))?.room).toBe('bathroom')
  })

  it('accepts a numeric string id', async () => {
    const { journey, handler } = await setup('room')

    const result = await handler('update_journey', {
      journey_id: String(journey.id),
      checkpoint_name: 'room',
      value: 'Kitchen',
    })
    expect(result).toEqual({ success: true, message: "Updated room to 'kitchen'", journey_id: journey.id })
  })

  it('advances the milestone when the write fills it', async () => {
    const { store, journey, handler } = await setup('renovation_purpose', { room: 'kitchen' })

    await handler('update_journey', {
      journey_id: journey.id,
      checkpoint_name: 'renovation_purpose',
      value: 'I want it to look nicer',
    })

    expect(await store.getJourney(journey.id)).toMatchObject({
      renovation_purpose: 'aesthetic',
      milestone1_completed: true,
      milestone1_completed_at: '2026-03-01T10:00:00.000Z',
      current_milestone: 2,
    })
  })

  it('reports a missing journey', async () => {
    const { store, journey } = await seedJourney()
    const handler = createUpdateJourneyHandler({ store, journeyId: journey.id + 10, target: 'room' })

    expect(
      await handler('update_journey', { journey_id: journey.id + 10, checkpoint_name: 'room', value: 'kitchen' })
    ).toEqual({ error: `Journey ${journey.id + 10} not found` })
  })
})
