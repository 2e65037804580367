import { z } from 'zod'

const checkpointField = z.string().trim().min(1).max(200).nullable().optional()
const timestampField = z.string().datetime({ offset: true }).nullable().optional()

export const createJourneySchema = z.object({
  user_id: z.number().int().positive(),
})

/** Explicit update. Unlike extraction, it may overwrite checkpoint values. */
export const journeyUpdateSchema = z
  .object({
    current_milestone: z.number().int().min(1).max(3).optional(),
    status: z.enum(['in_progress', 'completed', 'abandoned']).optional(),
    room: checkpointField,
    renovation_purpose: checkpointField,
    budget_range: checkpointField,
    timeline: checkpointField,
    style_preference: checkpointField,
    priority_feature: checkpointField,
    milestone1_completed: z.boolean().optional(),
    milestone2_completed: z.boolean().optional(),
    milestone3_completed: z.boolean().optional(),
    milestone1_completed_at: timestampField,
    milestone2_completed_at: timestampField,
    milestone3_completed_at: timestampField,
  })
  .strict()

export const checkpointValueSchema = z.object({
  value: z.string().trim().min(1).max(200),
})
