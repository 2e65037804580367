import { createClient as createSupabaseClient, type SupabaseClient } from '@supabase/supabase-js'
import type { Database } from './schema'

export type JourneyDbClient = SupabaseClient<Database>

// Server-only client. The service role key bypasses RLS, so it never reaches the browser.
export function createClient(url: string, serviceRoleKey: string): JourneyDbClient {
  return createSupabaseClient<Database>(url, serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  })
}
