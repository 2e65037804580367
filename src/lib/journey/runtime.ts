import { JourneyHandler } from '@/app/api/messages/handler'
import { createJourneyLlm } from '@/lib/ai/llm'
import type { TextCompletion, ToolCaller } from '@/lib/ai/llm'
import { loadConfig } from '@/lib/config'
import type { AppConfig } from '@/lib/config'
import { createClient } from '@/lib/supabase/server'
import { MemoryJourneyStore } from './memory-store'
import type { JourneyStore } from './store'
import { SupabaseJourneyStore } from './supabase-store'

export interface JourneyRuntime {
  store: JourneyStore
  handler: JourneyHandler
}

interface RuntimeOverrides {
  store?: JourneyStore
  llm?: TextCompletion & ToolCaller
}

export function createJourneyRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): JourneyRuntime {
  const store =
    overrides.store ??
    (config.store.kind === 'supabase'
      ? new SupabaseJourneyStore(createClient(config.store.url, config.store.serviceRoleKey))
      : new MemoryJourneyStore())

  const handler = new JourneyHandler({
    store,
    llm: overrides.llm ?? createJourneyLlm(config),
    responseModel: config.responseModel,
    sentinelModel: config.sentinelModel,
  })

  return { store, handler }
}

let runtime: JourneyRuntime | null = null

/** Process-wide runtime built from the environment on first use. */
export function getJourneyRuntime(): JourneyRuntime {
  if (!runtime) {
    runtime = createJourneyRuntime(loadConfig())
  }
  return runtime
}

export function setJourneyRuntime(next: JourneyRuntime | null): void {
  runtime = next
}
