import Anthropic from '@anthropic-ai/sdk'
import type { AppConfig } from '@/lib/config'
import { RESPONSE_MAX_TOKENS, SENTINEL_MAX_TOKENS } from '@/lib/ai/model-config'

export interface ChatTurn {
  role: 'user' | 'assistant'
  content: string
}

export interface ToolSpec {
  name: string
  description: string
  input_schema: Anthropic.Tool.InputSchema
}

export type ToolResult = Record<string, unknown>

export type ToolHandler = (name: string, input: unknown) => Promise<ToolResult>

export interface ToolCallOutcome {
  calls: number
  results: ToolResult[]
}

/** Plain completion, used for the assistant's reply. Resolves null when the model returns no text. */
export interface TextCompletion {
  complete(systemPrompt: string, messages: ChatTurn[], model: string): Promise<string | null>
}

/** One request offering a single tool; every tool_use block in the reply goes through the handler. */
export interface ToolCaller {
  callWithTool(systemPrompt: string, tool: ToolSpec, handler: ToolHandler, model: string): Promise<ToolCallOutcome>
}

const TOOL_KICKOFF = 'Review the conversation above and record the requested information if the user has provided it.'

export class AnthropicJourneyLlm implements TextCompletion, ToolCaller {
  constructor(private readonly anthropic: Anthropic) {}

  async complete(systemPrompt: string, messages: ChatTurn[], model: string): Promise<string | null> {
    const response = await this.anthropic.messages.create({
      model,
      max_tokens: RESPONSE_MAX_TOKENS,
      system: systemPrompt,
      messages,
    })

    const text = response.content.find((block): block is Anthropic.TextBlock => block.type === 'text')
    return text?.text.trim() || null
  }

  async callWithTool(systemPrompt: string, tool: ToolSpec, handler: ToolHandler, model: string): Promise<ToolCallOutcome> {
    const response = await this.anthropic.messages.create({
      model,
      max_tokens: SENTINEL_MAX_TOKENS,
      system: systemPrompt,
      messages: [{ role: 'user', content: TOOL_KICKOFF }],
      tools: [tool],
      tool_choice: { type: 'auto' },
    })

    const toolUses = response.content.filter(
      (block): block is Anthropic.ToolUseBlock => block.type === 'tool_use' && block.name === tool.name
    )

    const results: ToolResult[] = []
    for (const use of toolUses) {
      results.push(await handler(use.name, use.input))
    }
    return { calls: toolUses.length, results }
  }
}

export function createJourneyLlm(config: AppConfig): AnthropicJourneyLlm {
  return new AnthropicJourneyLlm(
    new Anthropic({
      apiKey: config.anthropicApiKey ?? null,
      timeout: config.llmTimeoutMs,
      maxRetries: config.llmMaxRetries,
    })
  )
}
