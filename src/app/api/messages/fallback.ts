import { getCompletedCheckpoints, getNextCheckpoint } from '@/lib/journey/checkpoints'
import { applyMilestoneCompletion } from '@/lib/journey/completion'
import type { JourneyStore } from '@/lib/journey/store'
import type { CheckpointName, Journey } from '@/lib/journey/types'

// First matching keyword wins. Values are stored as-is, without normalization.
const FALLBACK_KEYWORDS: Record<CheckpointName, ReadonlyArray<readonly [keyword: string, value: string]>> = {
  room: [
    ['kitchen', 'kitchen'],
    ['bathroom', 'bathroom'],
    ['bedroom', 'bedroom'],
    ['living room', 'living room'],
    ['basement', 'basement'],
  ],
  renovation_purpose: [
    ['aesthetic', 'aesthetic'],
    ['functional', 'functional'],
    ['repair', 'repair'],
    ['expand', 'expand space'],
    ['modern', 'modernize'],
  ],
  budget_range: [
    ['cheap', 'low'],
    ['affordable', 'low'],
    ['reasonable', 'medium'],
    ['mid', 'medium'],
    ['expensive', 'high'],
    ['luxury', 'high'],
  ],
  timeline: [
    ['quick', 'weeks'],
    ['fast', 'weeks'],
    ['soon', 'weeks'],
    ['month', 'months'],
    ['long', 'months'],
  ],
  style_preference: [
    ['modern', 'modern'],
    ['traditional', 'traditional'],
    ['rustic', 'rustic'],
    ['minimalist', 'minimalist'],
    ['contemporary', 'contemporary'],
  ],
  priority_feature: [
    ['storage', 'increased storage'],
    ['light', 'natural lighting'],
    ['space', 'open space'],
    ['energy', 'energy efficiency'],
    ['smart', 'smart home features'],
  ],
}

export const FALLBACK_APOLOGY = "I'm sorry, I couldn't process your message."

export function matchFallbackKeyword(
  journey: Journey,
  message: string
): { checkpoint: CheckpointName; value: string } | null {
  const target = getNextCheckpoint(journey)
  if (!target) return null

  const text = message.toLowerCase()
  const hit = FALLBACK_KEYWORDS[target.name].find(([keyword]) => text.includes(keyword))
  return hit ? { checkpoint: target.name, value: hit[1] } : null
}

/** Keyword extraction used when response generation fails. Writes at most one checkpoint. */
export async function applyFallbackExtraction(store: JourneyStore, journey: Journey, message: string): Promise<Journey> {
  const match = matchFallbackKeyword(journey, message)
  if (!match) return journey

  const updated = await store.setCheckpointIfEmpty(journey.id, match.checkpoint, match.value)
  if (!updated) return journey

  console.log(`[FALLBACK] Journey ${journey.id}: ${match.checkpoint} = ${match.value}`)
  return applyMilestoneCompletion(store, updated, new Date(updated.updated_at))
}

export function buildFallbackResponse(journey: Journey): string {
  const { room, renovation_purpose: purpose, budget_range: budget, timeline } = journey
  const { style_preference: style, priority_feature: feature } = journey

  if (journey.status === 'completed') {
    return `Your renovation plan is complete! To summarize: A ${style} ${room} renovation focusing on ${purpose} with ${feature} as a key feature. Your budget is in the ${budget} range with a timeline of ${timeline}. Thank you for using our service!`
  }

  const completed = getCompletedCheckpoints(journey)
  let response = "Thanks for your message! I'm helping you plan your renovation."

  switch (journey.current_milestone) {
    case 1:
      response += " Let's start by figuring out the basic details of your project."
      if (!completed.includes('room')) {
        response += ' Which room are you planning to renovate?'
      } else if (!completed.includes('renovation_purpose')) {
        response += ` What's the main purpose of renovating your ${room}?`
      } else if (journey.milestone1_completed) {
        response += ` Great! We've established that you want to renovate your ${room} for ${purpose}. Let's move on to budget and timeline considerations.`
      }
      break
    case 2:
      response += " Now let's talk about your budget and timeline."
      if (!completed.includes('budget_range')) {
        response += ' What kind of budget do you have in mind? (low, medium, high)'
      } else if (!completed.includes('timeline')) {
        response += ` How quickly are you hoping to complete this ${room} renovation?`
      } else if (journey.milestone2_completed) {
        response += ` Perfect! You're looking at a ${budget} budget with a timeline of ${timeline}. Let's discuss your style preferences next.`
      }
      break
    case 3:
      response += " Finally, let's talk about style and specific features."
      if (!completed.includes('style_preference')) {
        response += ' What style are you going for? (modern, traditional, etc.)'
      } else if (!completed.includes('priority_feature')) {
        response += ` What's the most important feature you want in your ${style} ${room}?`
      } else if (journey.milestone3_completed) {
        response += ` Excellent! I now have a complete picture of your renovation plans. You want a ${style} ${room} with ${feature} as a priority feature, on a ${budget} budget, completing in ${timeline}. Your renovation journey is complete!`
      }
      break
  }

  return response
}
