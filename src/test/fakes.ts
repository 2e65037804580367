import type { ChatTurn, TextCompletion, ToolCallOutcome, ToolCaller, ToolHandler, ToolResult, ToolSpec } from '@/lib/ai/llm'
import { MemoryJourneyStore } from '@/lib/journey/memory-store'
import type { Journey, JourneyUpdate } from '@/lib/journey/types'

export interface CompleteCall {
  systemPrompt: string
  messages: ChatTurn[]
  model: string
}

export interface ToolCall {
  systemPrompt: string
  tool: ToolSpec
  model: string
}

interface StubLlmOptions {
  /** Text returned by complete(); an Error is thrown instead. */
  reply?: string | null | Error
  /** Tool inputs the stubbed model emits, dispatched in order. An Error is thrown instead. */
  toolInputs?: unknown[] | Error | ((systemPrompt: string) => unknown[])
}

/** Deterministic stand-in for both LLM interfaces. */
export class StubLlm implements TextCompletion, ToolCaller {
  readonly completeCalls: CompleteCall[] = []
  readonly toolCalls: ToolCall[] = []

  constructor(private readonly options: StubLlmOptions = {}) {}

  async complete(systemPrompt: string, messages: ChatTurn[], model: string): Promise<string | null> {
    this.completeCalls.push({ systemPrompt, messages, model })
    const { reply = 'Sounds good!' } = this.options
    if (reply instanceof Error) throw reply
    return reply
  }

  async callWithTool(systemPrompt: string, tool: ToolSpec, handler: ToolHandler, model: string): Promise<ToolCallOutcome> {
    this.toolCalls.push({ systemPrompt, tool, model })
    const { toolInputs = [] } = this.options
    if (toolInputs instanceof Error) throw toolInputs

    const inputs = typeof toolInputs === 'function' ? toolInputs(systemPrompt) : toolInputs
    const results: ToolResult[] = []
    for (const input of inputs) {
      results.push(await handler(tool.name, input))
    }
    return { calls: inputs.length, results }
  }
}

/** Store with one user and one fresh journey, optionally pre-filled. */
export async function seedJourney(
  update: JourneyUpdate = {},
  store = new MemoryJourneyStore(() => new Date('2026-03-01T10:00:00.000Z'))
): Promise<{ store: MemoryJourneyStore; journey: Journey; userId: number }> {
  const user = await store.createUser({ first_name: 'Test', last_name: 'User' })
  const created = await store.createJourney(user.id)
  const journey = Object.keys(update).length > 0 ? await store.updateJourney(created.id, update) : created
  if (!journey) throw new Error('seeded journey missing')
  return { store, journey, userId: user.id }
}
