import type { ToolResult } from '@/lib/ai/llm'
import type { CheckpointName, Journey, JourneyState, Message } from '@/lib/journey/types'

/** What the assistant is told about the journey; only fields of milestones up to the current one. */
export type PromptContext = Partial<Record<CheckpointName, string>> & {
  milestone: number
  completed_checkpoints: CheckpointName[]
}

export type ExtractionStatus = 'updated' | 'unchanged' | 'no_target' | 'failed'

export interface ExtractionOutcome {
  target: CheckpointName | null
  status: ExtractionStatus
  tool_results: ToolResult[]
}

export interface SentinelResult {
  journey: Journey
  outcome: ExtractionOutcome
}

export type ResponseSource = 'llm' | 'fallback'

export type TurnResult =
  | {
      ok: true
      response_text: string
      journey_state: JourneyState
      extraction_outcome: ExtractionOutcome
      assistant_message: Message
      source: ResponseSource
    }
  | {
      ok: false
      reason: 'not_found' | 'forbidden' | 'database'
      error: string
      response_text?: string
    }
