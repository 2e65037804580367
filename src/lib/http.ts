import { z } from 'zod'
import { ValidationError } from '@/lib/errors'

const idSchema = z.coerce.number().int().positive()

export function parseId(raw: string, label: string): number {
  const parsed = idSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${label}: ${raw}`)
  }
  return parsed.data
}

export async function readJson<S extends z.ZodTypeAny>(request: Request, schema: S): Promise<z.infer<S>> {
  let body: unknown
  try {
    body = await request.json()
  } catch {
    throw new ValidationError('Request body must be valid JSON')
  }
  return schema.parse(body)
}

const pageSchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional(),
})

/** limit/offset from the query string, with per-route defaults. */
export function readPage(url: URL, defaults: { limit: number; offset?: number }): { limit: number; offset: number } {
  const parsed = pageSchema.parse({
    limit: url.searchParams.get('limit') ?? undefined,
    offset: url.searchParams.get('offset') ?? undefined,
  })
  return { limit: parsed.limit ?? defaults.limit, offset: parsed.offset ?? defaults.offset ?? 0 }
}
