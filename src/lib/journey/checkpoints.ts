import type { CheckpointName, CheckpointValues, Journey, MilestoneNumber } from './types'

type KeywordRule = readonly [canonical: string, keywords: readonly string[]]

export interface CheckpointDefinition {
  name: CheckpointName
  milestone: MilestoneNumber
  label: string
  question: string
  // Free-text checkpoints only: tried in order as substrings before any keyword rule
  canonicalValues: readonly string[]
  // Category groups, checked in order; a group matches on any of its substrings
  keywordRules: readonly KeywordRule[]
  // null keeps the cleaned free text when nothing matches
  defaultValue: string | null
}

export const MILESTONE_TITLES: Record<MilestoneNumber, string> = {
  1: 'Project Basics',
  2: 'Budget and Timeline',
  3: 'Style Preferences and Plan',
}

const CHECKPOINTS: Record<CheckpointName, CheckpointDefinition> = {
  room: {
    name: 'room',
    milestone: 1,
    label: 'Room',
    question: 'Which room do you want to renovate?',
    canonicalValues: [
      'kitchen',
      'bathroom',
      'bedroom',
      'living room',
      'dining room',
      'basement',
      'attic',
      'office',
      'master bedroom',
      'guest bedroom',
      'den',
      'family room',
      'laundry room',
      'utility room',
      'garage',
    ],
    keywordRules: [],
    defaultValue: null,
  },
  renovation_purpose: {
    name: 'renovation_purpose',
    milestone: 1,
    label: 'Purpose',
    question: 'What is the main purpose of your renovation?',
    canonicalValues: ['aesthetic', 'functional', 'repair', 'modernize', 'expand space'],
    keywordRules: [
      ['aesthetic', ['look', 'appearanc', 'beaut']],
      ['functional', ['use', 'practi', 'utili']],
      ['repair', ['fix', 'broke', 'damage']],
      ['modernize', ['updat', 'renew', 'fresh']],
      ['expand space', ['more room', 'bigger', 'larger']],
    ],
    defaultValue: null,
  },
  budget_range: {
    name: 'budget_range',
    milestone: 2,
    label: 'Budget',
    question: 'What kind of budget do you have in mind for this renovation?',
    canonicalValues: [],
    keywordRules: [
      ['low', ['low', 'cheap', 'afford', 'budget', 'inexpens']],
      ['medium', ['medium', 'moderate', 'reasonable', 'mid']],
      ['high', ['high', 'expens', 'premium', 'luxury']],
    ],
    defaultValue: 'medium',
  },
  timeline: {
    name: 'timeline',
    milestone: 2,
    label: 'Timeline',
    question: 'How quickly are you hoping to complete this renovation?',
    canonicalValues: [],
    keywordRules: [
      ['weeks', ['quick', 'fast', 'soon', 'week', 'day', 'asap']],
      ['months', ['slow', 'month', 'time', 'no rush', 'not urgent']],
    ],
    defaultValue: 'months',
  },
  style_preference: {
    name: 'style_preference',
    milestone: 3,
    label: 'Style',
    question: 'What style are you going for in this renovation?',
    canonicalValues: [],
    keywordRules: [
      ['modern', ['modern', 'contemporary', 'sleek', 'clean']],
      ['traditional', ['tradition', 'classic', 'conventional']],
      ['rustic', ['rustic', 'country', 'farmhouse', 'cabin', 'wood']],
      ['minimalist', ['minimal', 'simple', 'clean']],
      ['contemporary', ['contemp', 'current']],
    ],
    defaultValue: 'modern',
  },
  priority_feature: {
    name: 'priority_feature',
    milestone: 3,
    label: 'Priority Feature',
    question: "What's the most important feature you want in your renovation?",
    canonicalValues: [],
    keywordRules: [
      ['storage', ['storage', 'cabinet', 'space', 'organization']],
      ['lighting', ['light', 'bright', 'dark', 'window']],
      ['space', ['space', 'room', 'area', 'open']],
      ['energy efficiency', ['energy', 'efficient', 'eco', 'green']],
      ['smart features', ['smart', 'tech', 'automation', 'device']],
    ],
    defaultValue: 'space',
  },
}

const MILESTONE_CHECKPOINTS: Record<MilestoneNumber, readonly [CheckpointName, CheckpointName]> = {
  1: ['room', 'renovation_purpose'],
  2: ['budget_range', 'timeline'],
  3: ['style_preference', 'priority_feature'],
}

export function getMilestoneCheckpoints(milestone: number): readonly CheckpointName[] {
  if (milestone === 1 || milestone === 2 || milestone === 3) {
    return MILESTONE_CHECKPOINTS[milestone]
  }
  return []
}

export function getCheckpoint(name: string): CheckpointDefinition | undefined {
  return Object.values(CHECKPOINTS).find(checkpoint => checkpoint.name === name)
}

export function listCheckpoints(): CheckpointDefinition[] {
  return [1, 2, 3].flatMap(milestone =>
    getMilestoneCheckpoints(milestone).map(name => CHECKPOINTS[name])
  )
}

/**
 * Map free text onto a checkpoint's canonical vocabulary.
 *
 * Free-text checkpoints try their canonical values first. Keyword groups are
 * then checked in declaration order and the first matching group wins, so a
 * word listed in two groups resolves to the earlier one. Constrained
 * checkpoints fall back to their default, free-text ones keep the cleaned input.
 */
export function normalizeCheckpointValue(name: CheckpointName, raw: string): string {
  const value = raw.trim().toLowerCase()
  const checkpoint = CHECKPOINTS[name]

  const canonical = checkpoint.canonicalValues.find(candidate => value.includes(candidate))
  if (canonical) return canonical

  for (const [target, keywords] of checkpoint.keywordRules) {
    if (keywords.some(keyword => value.includes(keyword))) {
      return target
    }
  }

  return checkpoint.defaultValue ?? value
}

export function isMilestoneFilled(values: CheckpointValues, milestone: number): boolean {
  const names = getMilestoneCheckpoints(milestone)
  return names.length > 0 && names.every(name => Boolean(values[name]))
}

/** First unfilled checkpoint of the journey's current milestone, if any. */
export function getNextCheckpoint(journey: Journey): CheckpointDefinition | null {
  const next = getMilestoneCheckpoints(journey.current_milestone).find(name => !journey[name])
  return next ? CHECKPOINTS[next] : null
}

/** Checkpoints of the current milestone that already hold a value. */
export function getCompletedCheckpoints(journey: Journey): CheckpointName[] {
  return getMilestoneCheckpoints(journey.current_milestone).filter(name => Boolean(journey[name]))
}
