import { z } from 'zod'
import type { ToolHandler, ToolResult, ToolSpec } from '@/lib/ai/llm'
import { normalizeCheckpointValue } from '@/lib/journey/checkpoints'
import { applyMilestoneReconciliation } from '@/lib/journey/completion'
import type { JourneyStore } from '@/lib/journey/store'
import { CHECKPOINT_NAMES, isCheckpointName } from '@/lib/journey/types'
import type { CheckpointName } from '@/lib/journey/types'
import { errorMessage } from '@/lib/errors'

export const UPDATE_JOURNEY_TOOL: ToolSpec = {
  name: 'update_journey',
  description:
    "Update the user's renovation journey with extracted information. Only one field can be updated at a time.",
  input_schema: {
    type: 'object',
    properties: {
      journey_id: {
        type: 'integer',
        description: 'The ID of the journey to update',
      },
      checkpoint_name: {
        type: 'string',
        description: 'The specific checkpoint to update',
        enum: [...CHECKPOINT_NAMES],
      },
      value: {
        type: 'string',
        description: "The value extracted from the user's message for the specified checkpoint",
      },
    },
    required: ['journey_id', 'checkpoint_name', 'value'],
    additionalProperties: false,
  },
}

// Loose on purpose: each missing piece maps to its own error result below
const toolArgsSchema = z
  .object({
    journey_id: z.unknown(),
    checkpoint_name: z.unknown(),
    value: z.unknown(),
  })
  .partial()

interface UpdateJourneyOptions {
  store: JourneyStore
  journeyId: number
  target: CheckpointName
}

/**
 * Tool handler for one Sentinel pass. Only the target checkpoint of the
 * journey under analysis is writable, and only while it is still empty.
 * Every rejection comes back as an `{ error }` result.
 */
export function createUpdateJourneyHandler({ store, journeyId, target }: UpdateJourneyOptions): ToolHandler {
  return async (_name, input) => {
    const parsed = toolArgsSchema.safeParse(input)
    const args = parsed.success ? parsed.data : {}

    console.log('[SENTINEL] update_journey called:', args)

    const requestedId = typeof args.journey_id === 'number' ? args.journey_id : Number(args.journey_id)
    if (!args.journey_id || !Number.isInteger(requestedId)) {
      return { error: 'Missing journey_id' }
    }

    const checkpointName = args.checkpoint_name
    const value = typeof args.value === 'string' ? args.value.trim() : ''
    if (!checkpointName || !value) {
      return { error: 'Both checkpoint_name and value must be provided' }
    }

    if (!isCheckpointName(checkpointName)) {
      return {
        error: `Invalid checkpoint_name: ${String(checkpointName)}`,
        valid_checkpoints: [...CHECKPOINT_NAMES],
      }
    }

    if (requestedId !== journeyId) {
      return { error: `Journey ${requestedId} is not the journey under analysis (${journeyId})` }
    }

    if (checkpointName !== target) {
      return { error: `Checkpoint ${checkpointName} is not the current target (${target})` }
    }

    return writeCheckpoint(store, journeyId, checkpointName, value)
  }
}

async function writeCheckpoint(
  store: JourneyStore,
  journeyId: number,
  checkpoint: CheckpointName,
  raw: string
): Promise<ToolResult> {
  try {
    const journey = await store.getJourney(journeyId)
    if (!journey) {
      return { error: `Journey ${journeyId} not found` }
    }

    const value = normalizeCheckpointValue(checkpoint, raw)
    const updated = await store.setCheckpointIfEmpty(journeyId, checkpoint, value)
    if (!updated) {
      return { error: `Checkpoint ${checkpoint} already has a value` }
    }

    console.log(`[SENTINEL] Journey ${journeyId}: ${checkpoint} = ${value} (raw: ${raw})`)
    await applyMilestoneReconciliation(store, updated, new Date(updated.updated_at))

    return {
      success: true,
      message: `Updated ${checkpoint} to '${value}'`,
      journey_id: journeyId,
    }
  } catch (error) {
    console.error('[SENTINEL] update_journey failed:', error)
    return { error: errorMessage(error) }
  }
}
