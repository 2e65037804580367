import { getMilestoneCheckpoints } from '@/lib/journey/checkpoints'
import { isMilestoneFlagged } from '@/lib/journey/completion'
import type { CheckpointName, Journey, MilestoneNumber } from '@/lib/journey/types'
import type { PromptContext } from './types'

export type PromptVariant =
  | { kind: 'journey_complete' }
  | { kind: 'milestone_complete'; milestone: MilestoneNumber }
  | { kind: 'first_known'; milestone: MilestoneNumber }
  | { kind: 'second_known'; milestone: MilestoneNumber }
  | { kind: 'intro'; milestone: MilestoneNumber }
  | { kind: 'default' }

const ADVISOR = 'You are a renovation advisor helping a client plan their renovation project.'

type Values = Record<CheckpointName, string>

interface MilestoneTemplates {
  intro: (v: Values) => string
  firstKnown: (v: Values) => string
  secondKnown: (v: Values) => string
  complete: (v: Values) => string
}

function valuesOf(journey: Journey): Values {
  const show = (value: string | null) => value ?? 'not yet known'
  return {
    room: show(journey.room),
    renovation_purpose: show(journey.renovation_purpose),
    budget_range: show(journey.budget_range),
    timeline: show(journey.timeline),
    style_preference: show(journey.style_preference),
    priority_feature: show(journey.priority_feature),
  }
}

const TEMPLATES: Record<MilestoneNumber, MilestoneTemplates> = {
  1: {
    intro: () => `${ADVISOR}

You're currently in Milestone 1: Project Basics. Your goal is to help the user define:
1. Which room they want to renovate
2. The main purpose of their renovation (aesthetic, functional, repair)

You should be friendly, helpful, and conversational. Ask one question at a time and acknowledge
the user's answers before moving on. When both the room and purpose have been identified,
suggest moving to the next milestone for budget and timeline discussions.

Be specific in your questions. For example, if they've told you the room but not the purpose,
focus on getting the purpose. If they've told you the purpose but not the room, focus on
identifying the specific room.`,
    firstKnown: v => `${ADVISOR}

You're currently in Milestone 1: Project Basics. The user has already told you they want to renovate their ${v.room}.
Now you need to understand the main purpose of their renovation (aesthetic, functional, repair).

Ask about their goals for the renovation. Are they looking to:
- Make it more beautiful (aesthetic)?
- Improve how it works or add new features (functional)?
- Fix problems or update old features (repair)?

Be conversational and acknowledge their answers. When you have a clear understanding of both
the room and purpose, suggest moving to the next milestone for budget and timeline discussions.`,
    secondKnown: v => `${ADVISOR}

You're currently in Milestone 1: Project Basics. The user has already told you their renovation purpose is ${v.renovation_purpose}.
Now you need to identify which specific room they want to renovate.

Ask which room they're planning to renovate. Common options include kitchen, bathroom, bedroom,
living room, basement, or another area of their home.

Be conversational and acknowledge their answers. When you have a clear understanding of both
the room and purpose, suggest moving to the next milestone for budget and timeline discussions.`,
    complete: v => `${ADVISOR}

You're currently in Milestone 1: Project Basics, which is now complete. You know the user wants to renovate
their ${v.room} for ${v.renovation_purpose} purposes.

Summarize what you've learned so far and explain that you'll now help them think about budget and timeline.
Let them know they can move on to Milestone 2: Budget and Timeline.`,
  },
  2: {
    intro: v => `${ADVISOR}

You're currently in Milestone 2: Budget and Timeline. Your goal is to help the user determine:
1. Their budget range for the ${v.room} renovation (low, medium, high)
2. Their timeline expectations (weeks, months)

Remember they're renovating their ${v.room} for ${v.renovation_purpose} purposes.

Ask one question at a time and acknowledge the user's answers before moving on. When both the budget
and timeline have been identified, suggest moving to the next milestone for style preferences.`,
    firstKnown: v => `${ADVISOR}

You're currently in Milestone 2: Budget and Timeline. The user has already told you their budget is in the ${v.budget_range} range
for their ${v.room} renovation. Now you need to understand their timeline expectations.

Ask about when they're hoping to complete the renovation. Are they looking at:
- A quick renovation (weeks)?
- A longer project (months)?

Be conversational and acknowledge their answers. When you have a clear understanding of both
the budget and timeline, suggest moving to the next milestone for style preferences.`,
    secondKnown: v => `${ADVISOR}

You're currently in Milestone 2: Budget and Timeline. The user has already told you their timeline expectation is ${v.timeline}
for their ${v.room} renovation. Now you need to understand their budget range.

Ask about their budget expectations. Are they looking at:
- A low-budget renovation (economical, DIY)
- A medium-budget renovation (mid-range, some professional work)
- A high-budget renovation (premium, fully professional)

Be conversational and acknowledge their answers. When you have a clear understanding of both
the budget and timeline, suggest moving to the next milestone for style preferences.`,
    complete: v => `${ADVISOR}

You're currently in Milestone 2: Budget and Timeline, which is now complete. You know the user has a ${v.budget_range} budget
for their ${v.room} renovation with a timeline of ${v.timeline}.

Summarize what you've learned so far and explain that you'll now help them think about style preferences
and priority features. Let them know they can move on to Milestone 3: Style Preferences and Plan.`,
  },
  3: {
    intro: v => `${ADVISOR}

You're currently in Milestone 3: Style Preferences and Plan. Your goal is to help the user identify:
1. Their style preference for the ${v.room} renovation (modern, traditional, rustic, etc.)
2. Their priority feature(s) for the renovation

Remember they're renovating their ${v.room} for ${v.renovation_purpose} purposes with a ${v.budget_range} budget
and a timeline of ${v.timeline}.

Ask one question at a time and acknowledge the user's answers before moving on. When both the style
preference and priority feature have been identified, let them know their renovation journey is complete.`,
    firstKnown: v => `${ADVISOR}

You're currently in Milestone 3: Style Preferences and Plan. The user has already told you they prefer a ${v.style_preference} style
for their ${v.room} renovation. Now you need to understand their priority feature(s).

Ask about what's most important to them in the renovation. This could be:
- Storage solutions
- Natural lighting
- Open space
- Energy efficiency
- Smart home features
- Other specific features

Be conversational and acknowledge their answers. When you have a clear understanding of both
the style and priority features, let them know their renovation journey is complete.`,
    secondKnown: v => `${ADVISOR}

You're currently in Milestone 3: Style Preferences and Plan. The user has already told you their priority feature is ${v.priority_feature}
for their ${v.room} renovation. Now you need to understand their style preference.

Ask about what style they prefer for their renovation. Common options include:
- Modern/Contemporary
- Traditional
- Rustic/Farmhouse
- Minimalist
- Industrial
- Other specific styles

Be conversational and acknowledge their answers. When you have a clear understanding of both
the style and priority features, let them know their renovation journey is complete.`,
    complete: v => `${ADVISOR}

You're currently in Milestone 3: Style Preferences and Plan, which is now complete. You know the user wants a ${v.style_preference} style
for their ${v.room} renovation with ${v.priority_feature} as a priority feature.

Summarize their complete renovation plan:
${planSummary(v)}

Congratulate them on completing their renovation journey and ask if they have any final questions.`,
  },
}

function planSummary(v: Values): string {
  return [
    `- Room: ${v.room}`,
    `- Purpose: ${v.renovation_purpose}`,
    `- Budget: ${v.budget_range}`,
    `- Timeline: ${v.timeline}`,
    `- Style: ${v.style_preference}`,
    `- Priority Feature: ${v.priority_feature}`,
  ].join('\n')
}

/**
 * Decide which template applies. Completed journeys win; otherwise the
 * current milestone's flag, then which of its two checkpoints is known.
 */
export function resolvePromptVariant(journey: Journey, completedCheckpoints: readonly CheckpointName[]): PromptVariant {
  if (journey.status === 'completed') return { kind: 'journey_complete' }

  const milestone = journey.current_milestone
  if (milestone !== 1 && milestone !== 2 && milestone !== 3) return { kind: 'default' }

  if (isMilestoneFlagged(journey, milestone)) return { kind: 'milestone_complete', milestone }

  const [first, second] = getMilestoneCheckpoints(milestone)
  const knowsFirst = completedCheckpoints.includes(first)
  const knowsSecond = completedCheckpoints.includes(second)

  if (knowsFirst && !knowsSecond) return { kind: 'first_known', milestone }
  if (knowsSecond && !knowsFirst) return { kind: 'second_known', milestone }
  return { kind: 'intro', milestone }
}

export function renderPrompt(
  variant: PromptVariant,
  journey: Journey,
  context: PromptContext,
  completedCheckpoints: readonly CheckpointName[]
): string {
  const values = valuesOf(journey)
  const contextLine = `Current user information: ${JSON.stringify(context)}`
  const completedLine = `Completed checkpoints: ${JSON.stringify(completedCheckpoints)}`

  switch (variant.kind) {
    case 'journey_complete':
      return `${ADVISOR}

The user has completed their renovation journey! Here's their complete plan:
${planSummary(values)}

Be friendly and helpful as you discuss their completed plan. If they ask for more information or have questions,
provide helpful advice based on their plan details.

Thank them for using the renovation planner and remind them they can start a new journey if they want to
plan another renovation project.

${contextLine}
`
    case 'default':
      return `${ADVISOR}

Please help the user with their renovation planning needs. The journey state seems to be in an unexpected
state. Focus on being helpful and understanding their requirements.

${contextLine}
`
    case 'milestone_complete':
      return `${TEMPLATES[variant.milestone].complete(values)}\n\n${contextLine}\n\n${completedLine}\n`
    case 'first_known':
      return `${TEMPLATES[variant.milestone].firstKnown(values)}\n\n${contextLine}\n\n${completedLine}\n`
    case 'second_known':
      return `${TEMPLATES[variant.milestone].secondKnown(values)}\n\n${contextLine}\n\n${completedLine}\n`
    case 'intro':
      return `${TEMPLATES[variant.milestone].intro(values)}\n\n${contextLine}\n\n${completedLine}\n`
  }
}

export function selectPrompt(
  journey: Journey,
  context: PromptContext,
  completedCheckpoints: readonly CheckpointName[]
): { variant: PromptVariant; prompt: string } {
  const variant = resolvePromptVariant(journey, completedCheckpoints)
  return { variant, prompt: renderPrompt(variant, journey, context, completedCheckpoints) }
}

/** Context for the response model. Later milestones' fields stay hidden even when set. */
export function buildPromptContext(journey: Journey, completedCheckpoints: CheckpointName[]): PromptContext {
  const context: PromptContext = {
    milestone: journey.current_milestone,
    completed_checkpoints: completedCheckpoints,
  }

  for (let milestone = 1; milestone <= Math.min(journey.current_milestone, 3); milestone++) {
    for (const name of getMilestoneCheckpoints(milestone)) {
      const value = journey[name]
      if (value) context[name] = value
    }
  }

  return context
}
