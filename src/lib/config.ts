import { z } from 'zod'
import { ConfigError, formatZodIssues } from '@/lib/errors'
import { DEFAULT_RESPONSE_MODEL, DEFAULT_SENTINEL_MODEL } from '@/lib/ai/model-config'

const optionalText = z
  .string()
  .trim()
  .transform(value => (value.length > 0 ? value : undefined))
  .optional()

const configSchema = z
  .object({
    ANTHROPIC_API_KEY: optionalText,
    JOURNEY_RESPONSE_MODEL: z.string().trim().min(1).default(DEFAULT_RESPONSE_MODEL),
    JOURNEY_SENTINEL_MODEL: z.string().trim().min(1).default(DEFAULT_SENTINEL_MODEL),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
    JOURNEY_STORE: z.enum(['supabase', 'memory']).default('supabase'),
    SUPABASE_URL: optionalText,
    SUPABASE_SERVICE_ROLE_KEY: optionalText,
  })
  .superRefine((env, ctx) => {
    if (env.JOURNEY_STORE !== 'supabase') return
    for (const key of ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY'] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'Required when JOURNEY_STORE=supabase',
        })
      }
    }
  })

export interface AppConfig {
  anthropicApiKey: string | undefined
  responseModel: string
  sentinelModel: string
  llmTimeoutMs: number
  llmMaxRetries: number
  store:
    | { kind: 'memory' }
    | { kind: 'supabase'; url: string; serviceRoleKey: string }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = configSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration:\n${formatZodIssues(parsed.error).join('\n')}`)
  }

  const values = parsed.data
  const store: AppConfig['store'] =
    values.JOURNEY_STORE === 'supabase' && values.SUPABASE_URL && values.SUPABASE_SERVICE_ROLE_KEY
      ? { kind: 'supabase', url: values.SUPABASE_URL, serviceRoleKey: values.SUPABASE_SERVICE_ROLE_KEY }
      : { kind: 'memory' }

  return {
    anthropicApiKey: values.ANTHROPIC_API_KEY,
    responseModel: values.JOURNEY_RESPONSE_MODEL,
    sentinelModel: values.JOURNEY_SENTINEL_MODEL,
    llmTimeoutMs: values.LLM_TIMEOUT_MS,
    llmMaxRetries: values.LLM_MAX_RETRIES,
    store,
  }
}
