import { isMilestoneFilled } from './checkpoints'
import type { Journey, JourneyUpdate, MilestoneNumber } from './types'
import type { JourneyStore } from './store'

const COMPLETION_FIELDS = {
  1: { flag: 'milestone1_completed', at: 'milestone1_completed_at' },
  2: { flag: 'milestone2_completed', at: 'milestone2_completed_at' },
  3: { flag: 'milestone3_completed', at: 'milestone3_completed_at' },
} as const satisfies Record<MilestoneNumber, { flag: keyof Journey; at: keyof Journey }>

const MILESTONES: readonly MilestoneNumber[] = [1, 2, 3]

export function isMilestoneFlagged(journey: Journey, milestone: MilestoneNumber): boolean {
  return journey[COMPLETION_FIELDS[milestone].flag]
}

function markCompleted(update: JourneyUpdate, milestone: MilestoneNumber, timestamp: string) {
  const fields = COMPLETION_FIELDS[milestone]
  update[fields.flag] = true
  update[fields.at] = timestamp
  if (milestone === 3) {
    update.status = 'completed'
  }
}

/**
 * Completion check for the journey's current milestone only. Returns the
 * fields to write, or an empty object when nothing changes.
 */
export function evaluateCurrentMilestone(journey: Journey, now: Date = new Date()): JourneyUpdate {
  const update: JourneyUpdate = {}
  const milestone = journey.current_milestone

  if (milestone !== 1 && milestone !== 2 && milestone !== 3) return update
  if (isMilestoneFlagged(journey, milestone)) return update
  if (!isMilestoneFilled(journey, milestone)) return update

  markCompleted(update, milestone, now.toISOString())
  return update
}

/**
 * Checks all three milestones and raises current_milestone to one past the
 * highest filled milestone (capped at 3). current_milestone is never lowered.
 */
export function reconcileMilestones(journey: Journey, now: Date = new Date()): JourneyUpdate {
  const update: JourneyUpdate = {}
  const timestamp = now.toISOString()
  let highestCompleted = 0

  for (const milestone of MILESTONES) {
    if (!isMilestoneFilled(journey, milestone)) continue
    highestCompleted = milestone
    if (!isMilestoneFlagged(journey, milestone)) {
      markCompleted(update, milestone, timestamp)
    }
  }

  const target = Math.min(3, highestCompleted + 1)
  if (journey.current_milestone < target) {
    update.current_milestone = target
  }

  return update
}

async function applyUpdate(
  store: JourneyStore,
  journey: Journey,
  update: JourneyUpdate,
  scope: string
): Promise<Journey> {
  if (Object.keys(update).length === 0) return journey

  console.log(`[JOURNEY] ${scope} for journey ${journey.id}:`, update)
  const updated = await store.updateJourney(journey.id, update)
  return updated ?? { ...journey, ...update }
}

/** Completion stamps use `now`; callers pass the time of the write that filled the milestone. */
export function applyMilestoneCompletion(store: JourneyStore, journey: Journey, now: Date = new Date()): Promise<Journey> {
  return applyUpdate(store, journey, evaluateCurrentMilestone(journey, now), 'Milestone completion')
}

export function applyMilestoneReconciliation(
  store: JourneyStore,
  journey: Journey,
  now: Date = new Date()
): Promise<Journey> {
  return applyUpdate(store, journey, reconcileMilestones(journey, now), 'Milestone reconciliation')
}
