export type MilestoneNumber = 1 | 2 | 3

export type JourneyStatus = 'in_progress' | 'completed' | 'abandoned'

export type Speaker = 'user' | 'assistant'

export const CHECKPOINT_NAMES = [
  'room',
  'renovation_purpose',
  'budget_range',
  'timeline',
  'style_preference',
  'priority_feature',
] as const

export type CheckpointName = (typeof CHECKPOINT_NAMES)[number]

export type CheckpointValues = Record<CheckpointName, string | null>

export interface User {
  id: number
  first_name: string | null
  last_name: string | null
  created_at: string
}

export interface Journey extends CheckpointValues {
  id: number
  user_id: number
  // Stored as an integer column; well-formed rows stay within 1..3
  current_milestone: number
  status: JourneyStatus

  milestone1_completed: boolean
  milestone2_completed: boolean
  milestone3_completed: boolean
  milestone1_completed_at: string | null
  milestone2_completed_at: string | null
  milestone3_completed_at: string | null

  created_at: string
  updated_at: string
}

export type JourneyUpdate = Partial<Omit<Journey, 'id' | 'user_id' | 'created_at' | 'updated_at'>>

export interface Message {
  id: number
  user_id: number
  journey_id: number
  speaker: Speaker
  content: string
  current_milestone: number
  timestamp: string
}

export interface MessageInsert {
  user_id: number
  journey_id: number
  speaker: Speaker
  content: string
  current_milestone: number
}

export interface JourneyState {
  milestone: number
  completed_checkpoints: CheckpointName[]
  status: JourneyStatus
}

export type UserUpdate = Partial<Pick<User, 'first_name' | 'last_name'>>

const CHECKPOINT_NAME_SET: ReadonlySet<string> = new Set(CHECKPOINT_NAMES)

export function isCheckpointName(value: unknown): value is CheckpointName {
  return typeof value === 'string' && CHECKPOINT_NAME_SET.has(value)
}

export function isMilestoneNumber(value: number): value is MilestoneNumber {
  return value === 1 || value === 2 || value === 3
}

export function checkpointUpdate(name: CheckpointName, value: string): JourneyUpdate {
  const update: JourneyUpdate = {}
  update[name] = value
  return update
}
