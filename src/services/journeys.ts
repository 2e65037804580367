import { NotFoundError, ValidationError } from '@/lib/errors'
import { getCompletedCheckpoints, isMilestoneFilled } from '@/lib/journey/checkpoints'
import { applyMilestoneCompletion, isMilestoneFlagged } from '@/lib/journey/completion'
import type { JourneyStore } from '@/lib/journey/store'
import { checkpointUpdate, isCheckpointName, isMilestoneNumber } from '@/lib/journey/types'
import type { CheckpointName, Journey, JourneyStatus, Message, User } from '@/lib/journey/types'

export interface SessionSummary {
  user_id: number
  journey_id: number
  current_milestone: number
  status: JourneyStatus
}

export interface SessionDetails extends SessionSummary {
  recent_messages: Message[]
}

export interface JourneyProgressState {
  has_journey: boolean
  milestone: number | null
  completed_checkpoints: CheckpointName[]
  milestone_completed: boolean
}

interface StartSessionInput {
  user_id?: number
  first_name?: string | null
  last_name?: string | null
}

function summarize(journey: Journey): SessionSummary {
  return {
    user_id: journey.user_id,
    journey_id: journey.id,
    current_milestone: journey.current_milestone,
    status: journey.status,
  }
}

async function requireUser(store: JourneyStore, userId: number): Promise<User> {
  const user = await store.getUser(userId)
  if (!user) throw new NotFoundError(`User ${userId} not found`)
  return user
}

export async function requireJourney(store: JourneyStore, journeyId: number): Promise<Journey> {
  const journey = await store.getJourney(journeyId)
  if (!journey) throw new NotFoundError(`Journey ${journeyId} not found`)
  return journey
}

/** Active journey for the user, created when none is in progress. */
export async function ensureActiveJourney(
  store: JourneyStore,
  userId: number
): Promise<{ journey: Journey; created: boolean }> {
  const active = await store.getActiveJourney(userId)
  if (active) return { journey: active, created: false }

  const journey = await store.createJourney(userId)
  console.log(`[JOURNEY] Created journey ${journey.id} for user ${userId}`)
  return { journey, created: true }
}

/**
 * Resume a returning user or register a new one. An id that does not resolve
 * is treated like a first visit.
 */
export async function startSession(store: JourneyStore, input: StartSessionInput): Promise<SessionSummary> {
  let user = input.user_id !== undefined ? await store.getUser(input.user_id) : null
  if (!user) {
    user = await store.createUser({ first_name: input.first_name ?? null, last_name: input.last_name ?? null })
    console.log(`[JOURNEY] Registered user ${user.id}`)
  }

  const { journey } = await ensureActiveJourney(store, user.id)
  return summarize(journey)
}

export async function getSession(store: JourneyStore, userId: number): Promise<SessionDetails> {
  await requireUser(store, userId)
  const { journey } = await ensureActiveJourney(store, userId)
  const recent = await store.getMessages(journey.id, { limit: 10, order: 'desc' })
  return { ...summarize(journey), recent_messages: recent }
}

export async function getActiveJourneyForUser(store: JourneyStore, userId: number): Promise<Journey> {
  await requireUser(store, userId)
  const journey = await store.getActiveJourney(userId)
  if (!journey) throw new NotFoundError(`No active journey for user ${userId}`)
  return journey
}

export async function createJourneyForUser(
  store: JourneyStore,
  userId: number
): Promise<{ journey: Journey; created: boolean }> {
  await requireUser(store, userId)
  return ensureActiveJourney(store, userId)
}

/** Explicit checkpoint write. Overwrites any existing value. */
export async function saveCheckpoint(
  store: JourneyStore,
  journeyId: number,
  checkpoint: string,
  value: string
): Promise<Journey> {
  if (!isCheckpointName(checkpoint)) {
    throw new ValidationError(`Invalid checkpoint: ${checkpoint}`)
  }

  await requireJourney(store, journeyId)
  const updated = await store.updateJourney(journeyId, checkpointUpdate(checkpoint, value))
  if (!updated) throw new NotFoundError(`Journey ${journeyId} not found`)

  console.log(`[JOURNEY] Journey ${journeyId}: ${checkpoint} set to ${value}`)
  return applyMilestoneCompletion(store, updated, new Date(updated.updated_at))
}

export async function advanceMilestone(store: JourneyStore, journeyId: number): Promise<Journey> {
  const journey = await requireJourney(store, journeyId)
  if (journey.current_milestone >= 3) {
    throw new ValidationError('Journey is already at the final milestone')
  }

  const updated = await store.updateJourney(journeyId, { current_milestone: journey.current_milestone + 1 })
  if (!updated) throw new NotFoundError(`Journey ${journeyId} not found`)

  console.log(`[JOURNEY] Journey ${journeyId} advanced to milestone ${updated.current_milestone}`)
  return updated
}

export async function completeJourney(store: JourneyStore, journeyId: number): Promise<Journey> {
  await requireJourney(store, journeyId)
  const updated = await store.updateJourney(journeyId, { status: 'completed' })
  if (!updated) throw new NotFoundError(`Journey ${journeyId} not found`)

  console.log(`[JOURNEY] Journey ${journeyId} marked completed`)
  return updated
}

export async function getJourneyProgress(store: JourneyStore, userId: number): Promise<JourneyProgressState> {
  await requireUser(store, userId)
  const journey = await store.getActiveJourney(userId)
  if (!journey) {
    return { has_journey: false, milestone: null, completed_checkpoints: [], milestone_completed: false }
  }

  const milestone = journey.current_milestone
  return {
    has_journey: true,
    milestone,
    completed_checkpoints: getCompletedCheckpoints(journey),
    milestone_completed: isMilestoneNumber(milestone)
      ? isMilestoneFlagged(journey, milestone) || isMilestoneFilled(journey, milestone)
      : false,
  }
}
