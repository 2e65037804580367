import type { ChatTurn, TextCompletion, ToolCaller } from '@/lib/ai/llm'
import { getCompletedCheckpoints } from '@/lib/journey/checkpoints'
import type { JourneyStore } from '@/lib/journey/store'
import type { Journey, JourneyState, Speaker } from '@/lib/journey/types'
import { DATABASE_ERROR_MESSAGE, PersistenceError, errorMessage } from '@/lib/errors'
import { FALLBACK_APOLOGY, applyFallbackExtraction, buildFallbackResponse } from './fallback'
import { buildPromptContext, selectPrompt } from './prompt'
import { Sentinel, formatJourneyDetails } from './sentinel'
import type { ResponseSource, TurnResult } from './types'

export const EMPTY_RESPONSE_TEXT = "I'm sorry, I couldn't generate a response."

const EXTRACTION_WINDOW = 5
const HISTORY_WINDOW = 10

export interface JourneyHandlerOptions {
  store: JourneyStore
  llm: TextCompletion & ToolCaller
  responseModel: string
  sentinelModel: string
}

function journeyState(journey: Journey): JourneyState {
  return {
    milestone: journey.current_milestone,
    completed_checkpoints: getCompletedCheckpoints(journey),
    status: journey.status,
  }
}

/**
 * Runs one conversation turn: persist the user's message, let the Sentinel
 * extract, answer with the prompt for the refreshed journey, persist the reply.
 * A failed reply falls back to keyword extraction and a templated answer.
 */
export class JourneyHandler {
  private readonly store: JourneyStore
  private readonly llm: TextCompletion & ToolCaller
  private readonly responseModel: string
  private readonly sentinel: Sentinel

  constructor({ store, llm, responseModel, sentinelModel }: JourneyHandlerOptions) {
    this.store = store
    this.llm = llm
    this.responseModel = responseModel
    this.sentinel = new Sentinel({ store, llm, model: sentinelModel })
  }

  async processMessage(userId: number, journeyId: number, text: string): Promise<TurnResult> {
    try {
      return await this.runTurn(userId, journeyId, text)
    } catch (error) {
      if (error instanceof PersistenceError) {
        console.error(`[MESSAGES] Database error for journey ${journeyId}:`, error)
        return { ok: false, reason: 'database', error: error.message, response_text: DATABASE_ERROR_MESSAGE }
      }
      throw error
    }
  }

  private async runTurn(userId: number, journeyId: number, text: string): Promise<TurnResult> {
    const user = await this.store.getUser(userId)
    if (!user) return { ok: false, reason: 'not_found', error: `User ${userId} not found` }

    const initial = await this.store.getJourney(journeyId)
    if (!initial) return { ok: false, reason: 'not_found', error: `Journey ${journeyId} not found` }
    if (initial.user_id !== userId) {
      return { ok: false, reason: 'forbidden', error: `Journey ${journeyId} does not belong to user ${userId}` }
    }

    console.log(`[MESSAGES] User ${userId} -> journey ${journeyId}: ${text}`)
    await this.store.createMessage({
      user_id: userId,
      journey_id: journeyId,
      speaker: 'user',
      content: text,
      current_milestone: initial.current_milestone,
    })

    const recent = await this.store.getMessages(journeyId, { limit: EXTRACTION_WINDOW, order: 'desc' })
    const { outcome } = await this.sentinel.analyze(initial, recent.reverse())

    const journey = (await this.store.getJourney(journeyId)) ?? initial
    console.log(`[MESSAGES] Journey after extraction:\n${formatJourneyDetails(journey)}`)

    let responseText: string
    let answered = journey
    let source: ResponseSource = 'llm'
    try {
      responseText = await this.generateResponse(journey, text)
    } catch (error) {
      if (error instanceof PersistenceError) throw error
      console.error(`[MESSAGES] Response generation failed for journey ${journeyId}, using fallback:`, errorMessage(error))
      source = 'fallback'
      answered = await applyFallbackExtraction(this.store, journey, text)
      responseText = this.fallbackText(answered)
    }

    const assistantMessage = await this.saveMessage(userId, journeyId, 'assistant', responseText, answered)

    return {
      ok: true,
      response_text: responseText,
      journey_state: journeyState(answered),
      extraction_outcome: outcome,
      assistant_message: assistantMessage,
      source,
    }
  }

  private async generateResponse(journey: Journey, text: string): Promise<string> {
    const completed = getCompletedCheckpoints(journey)
    const context = buildPromptContext(journey, completed)
    const { variant, prompt } = selectPrompt(journey, context, completed)
    console.log(`[MESSAGES] Prompt variant for journey ${journey.id}:`, variant)

    const history = await this.store.getMessages(journey.id, { limit: HISTORY_WINDOW, order: 'desc' })
    const turns: ChatTurn[] = history.reverse().map((message): ChatTurn => ({
      role: message.speaker === 'user' ? 'user' : 'assistant',
      content: message.content,
    }))
    turns.push({ role: 'user', content: text })

    // The conversation must open with a user turn
    while (turns.length > 0 && turns[0].role === 'assistant') turns.shift()

    const reply = await this.llm.complete(prompt, turns, this.responseModel)
    return reply ?? EMPTY_RESPONSE_TEXT
  }

  private fallbackText(journey: Journey): string {
    try {
      return buildFallbackResponse(journey) || FALLBACK_APOLOGY
    } catch (error) {
      console.error('[MESSAGES] Fallback response failed:', errorMessage(error))
      return FALLBACK_APOLOGY
    }
  }

  private saveMessage(userId: number, journeyId: number, speaker: Speaker, content: string, journey: Journey) {
    return this.store.createMessage({
      user_id: userId,
      journey_id: journeyId,
      speaker,
      content,
      current_milestone: journey.current_milestone,
    })
  }
}
