import type { ToolCaller, ToolResult } from '@/lib/ai/llm'
import { getNextCheckpoint } from '@/lib/journey/checkpoints'
import type { CheckpointDefinition } from '@/lib/journey/checkpoints'
import type { JourneyStore } from '@/lib/journey/store'
import { CHECKPOINT_NAMES } from '@/lib/journey/types'
import type { CheckpointName, Journey, Message } from '@/lib/journey/types'
import { errorMessage } from '@/lib/errors'
import { UPDATE_JOURNEY_TOOL, createUpdateJourneyHandler } from './sentinel-tool'
import type { SentinelResult } from './types'

const CHECKPOINT_GUIDANCE: Record<CheckpointName, string> = {
  room: `ROOM GUIDELINES:
- Look for mentions of specific rooms (kitchen, bathroom, bedroom, etc.)
- Extract just the room name (e.g., "kitchen", "bathroom", "master bedroom")
- Examples: "I want to renovate my kitchen", "My bathroom needs work", "The living room is outdated"
- Valid values include: kitchen, bathroom, bedroom, living room, dining room, basement, attic, office, etc.`,
  renovation_purpose: `RENOVATION PURPOSE GUIDELINES:
- Look for why the user wants to renovate
- Categorize as one of: aesthetic, functional, repair, modernize, expand space
- Examples: "I want it to look better" (aesthetic), "I need more counter space" (functional), "The pipes are leaking" (repair)
- The purpose should be a single word or short phrase from the standard categories`,
  budget_range: `BUDGET RANGE GUIDELINES:
- Look for mentions of budget or cost expectations
- Categorize as: low, medium, or high
- Examples: "I want to keep costs down" (low), "I have a reasonable budget" (medium), "Money is no object" (high)
- The budget should be one of the three standard categories: low, medium, high`,
  timeline: `TIMELINE GUIDELINES:
- Look for mentions of timing or scheduling expectations
- Categorize as: weeks or months
- Examples: "I need this done ASAP" (weeks), "I'm not in a rush" (months), "Before summer" (months)
- The timeline should be one of the two standard categories: weeks, months`,
  style_preference: `STYLE PREFERENCE GUIDELINES:
- Look for mentions of design style or aesthetic preferences
- Categorize as: modern, traditional, rustic, minimalist, contemporary
- Examples: "I like clean lines" (modern), "I prefer classic designs" (traditional), "I want a cabin feel" (rustic)
- The style should be one of the standard categories mentioned above`,
  priority_feature: `PRIORITY FEATURE GUIDELINES:
- Look for mentions of what features are most important to the user
- Categorize as: storage, lighting, space, energy efficiency, smart features
- Examples: "I need more cabinet space" (storage), "The room is too dark" (lighting), "I want eco-friendly appliances" (energy efficiency)
- The priority feature should be one of the standard categories mentioned above`,
}

const TRACKED_FIELDS = [
  ...CHECKPOINT_NAMES,
  'milestone1_completed',
  'milestone2_completed',
  'milestone3_completed',
  'current_milestone',
  'status',
] as const satisfies readonly (keyof Journey)[]

/** True when any checkpoint, completion flag, milestone or status differs. */
export function journeyChanged(before: Journey, after: Journey): boolean {
  return TRACKED_FIELDS.some(field => before[field] !== after[field])
}

export function formatJourneyDetails(journey: Journey): string {
  return [
    `  User ID: ${journey.user_id}`,
    `  Current milestone: ${journey.current_milestone}`,
    `  Status: ${journey.status}`,
    `  Room: ${journey.room}`,
    `  Renovation purpose: ${journey.renovation_purpose}`,
    `  Budget range: ${journey.budget_range}`,
    `  Timeline: ${journey.timeline}`,
    `  Style preference: ${journey.style_preference}`,
    `  Priority feature: ${journey.priority_feature}`,
    `  Milestone 1 completed: ${journey.milestone1_completed}`,
    `  Milestone 2 completed: ${journey.milestone2_completed}`,
    `  Milestone 3 completed: ${journey.milestone3_completed}`,
  ].join('\n')
}

function describeCompleted(journey: Journey): string {
  const filled = CHECKPOINT_NAMES.flatMap(name => {
    const value = journey[name]
    return value ? [`${name}: ${value}`] : []
  })
  return filled.length > 0 ? filled.join(', ') : 'None'
}

export function buildSentinelPrompt(journey: Journey, recentMessages: Message[], target: CheckpointDefinition): string {
  const history = recentMessages
    .map(message => `${message.speaker === 'user' ? 'User' : 'Assistant'}: ${message.content}`)
    .join('\n')

  return `You are a Journey Sentinel that analyzes conversations to extract information about a user's renovation project.

CURRENT JOURNEY STATE:
- User ID: ${journey.user_id}
- Journey ID: ${journey.id}
- Current Milestone: ${journey.current_milestone}
- Completed checkpoints: ${describeCompleted(journey)}

NEXT INFORMATION NEEDED:
- Checkpoint: ${target.name}
- Question: ${target.question}

Your task is to analyze the conversation and determine if the user has provided information about their renovation journey. If you find relevant information, use the update_journey tool to save it.
Here is the conversation history to analyze:

${history}

GUIDELINES:
1. Focus ONLY on extracting information for the CURRENT checkpoint (${target.name})
2. Be conservative - only extract information if you are confident it directly answers the needed question
3. Do not make assumptions or extract unrelated information
4. If no relevant information is found, do not call any tools

TOOL USAGE:
- Call update_journey at most once, with three parameters:
  - journey_id: ${journey.id} (always use this exact ID)
  - checkpoint_name: ${target.name}
  - value: The value you extracted from the conversation
- Only call this tool when you've identified a clear answer to the current checkpoint question

${CHECKPOINT_GUIDANCE[target.name]}`
}

interface SentinelOptions {
  store: JourneyStore
  llm: ToolCaller
  model: string
}

/**
 * Lightweight extraction pass. Looks only for the next unfilled checkpoint of
 * the current milestone and lets the model record it through update_journey.
 */
export class Sentinel {
  private readonly store: JourneyStore
  private readonly llm: ToolCaller
  private readonly model: string

  constructor({ store, llm, model }: SentinelOptions) {
    this.store = store
    this.llm = llm
    this.model = model
  }

  async analyze(journey: Journey, recentMessages: Message[]): Promise<SentinelResult> {
    const target = getNextCheckpoint(journey)
    if (!target) {
      console.log(`[SENTINEL] Journey ${journey.id}: no pending checkpoint for milestone ${journey.current_milestone}`)
      return { journey, outcome: { target: null, status: 'no_target', tool_results: [] } }
    }

    console.log(`[SENTINEL] Analyzing journey ${journey.id} for ${target.name}\n${formatJourneyDetails(journey)}`)

    let toolResults: ToolResult[] = []
    try {
      const outcome = await this.llm.callWithTool(
        buildSentinelPrompt(journey, recentMessages, target),
        UPDATE_JOURNEY_TOOL,
        createUpdateJourneyHandler({ store: this.store, journeyId: journey.id, target: target.name }),
        this.model
      )
      toolResults = outcome.results
    } catch (error) {
      console.error(`[SENTINEL] Extraction call failed for journey ${journey.id}, continuing:`, errorMessage(error))
      return { journey, outcome: { target: target.name, status: 'failed', tool_results: [] } }
    }

    const refreshed = await this.store.getJourney(journey.id)
    if (refreshed && journeyChanged(journey, refreshed)) {
      console.log(`[SENTINEL] Updated journey ${journey.id}\n${formatJourneyDetails(refreshed)}`)
      return { journey: refreshed, outcome: { target: target.name, status: 'updated', tool_results: toolResults } }
    }

    console.log(`[SENTINEL] Journey ${journey.id} unchanged`)
    return { journey, outcome: { target: target.name, status: 'unchanged', tool_results: toolResults } }
  }
}
