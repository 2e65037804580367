import type { PostgrestError } from '@supabase/supabase-js'
import { PersistenceError } from '@/lib/errors'
import type { JourneyDbClient } from '@/lib/supabase/server'
import type { JourneyStore, MessageQuery, NewUser } from './store'
import { checkpointUpdate } from './types'
import type {
  CheckpointName,
  Journey,
  JourneyUpdate,
  Message,
  MessageInsert,
  User,
  UserUpdate,
} from './types'

function fail(scope: string, error: PostgrestError): never {
  throw new PersistenceError(`${scope}: ${error.message}`, error.code)
}

/**
 * JourneyStore backed by the Supabase tables in supabase/migrations.
 * Messages are ordered by timestamp, with id as the tiebreaker.
 */
export class SupabaseJourneyStore implements JourneyStore {
  constructor(private readonly db: JourneyDbClient) {}

  async createUser(input: NewUser): Promise<User> {
    const { data, error } = await this.db
      .from('users')
      .insert({ first_name: input.first_name ?? null, last_name: input.last_name ?? null })
      .select()
      .single()

    if (error) fail('createUser', error)
    return data
  }

  async getUser(id: number): Promise<User | null> {
    const { data, error } = await this.db.from('users').select('*').eq('id', id).maybeSingle()
    if (error) fail('getUser', error)
    return data
  }

  async listUsers(): Promise<User[]> {
    const { data, error } = await this.db
      .from('users')
      .select('*')
      .order('created_at', { ascending: false })

    if (error) fail('listUsers', error)
    return data
  }

  async updateUser(id: number, input: UserUpdate): Promise<User | null> {
    const { data, error } = await this.db
      .from('users')
      .update(input)
      .eq('id', id)
      .select()
      .maybeSingle()

    if (error) fail('updateUser', error)
    return data
  }

  async deleteUser(id: number): Promise<boolean> {
    // journeys and messages cascade on the foreign keys
    const { data, error } = await this.db.from('users').delete().eq('id', id).select('id')
    if (error) fail('deleteUser', error)
    return data.length > 0
  }

  async createJourney(userId: number): Promise<Journey> {
    const { data, error } = await this.db
      .from('journeys')
      .insert({ user_id: userId })
      .select()
      .single()

    if (error) fail('createJourney', error)
    return data
  }

  async getJourney(id: number): Promise<Journey | null> {
    const { data, error } = await this.db.from('journeys').select('*').eq('id', id).maybeSingle()
    if (error) fail('getJourney', error)
    return data
  }

  async listJourneys(): Promise<Journey[]> {
    const { data, error } = await this.db
      .from('journeys')
      .select('*')
      .order('created_at', { ascending: false })

    if (error) fail('listJourneys', error)
    return data
  }

  async getActiveJourney(userId: number): Promise<Journey | null> {
    const { data, error } = await this.db
      .from('journeys')
      .select('*')
      .eq('user_id', userId)
      .eq('status', 'in_progress')
      .order('created_at', { ascending: false })
      .limit(1)
      .maybeSingle()

    if (error) fail('getActiveJourney', error)
    return data
  }

  async updateJourney(id: number, update: JourneyUpdate): Promise<Journey | null> {
    const { data, error } = await this.db
      .from('journeys')
      .update({ ...update, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select()
      .maybeSingle()

    if (error) fail('updateJourney', error)
    return data
  }

  async setCheckpointIfEmpty(id: number, checkpoint: CheckpointName, value: string): Promise<Journey | null> {
    const { data, error } = await this.db
      .from('journeys')
      .update({ ...checkpointUpdate(checkpoint, value), updated_at: new Date().toISOString() })
      .eq('id', id)
      .is(checkpoint, null)
      .select()
      .maybeSingle()

    if (error) fail('setCheckpointIfEmpty', error)
    return data
  }

  async createMessage(input: MessageInsert): Promise<Message> {
    const { data, error } = await this.db.from('messages').insert(input).select().single()
    if (error) fail('createMessage', error)
    return data
  }

  async getMessages(journeyId: number, query: MessageQuery = {}): Promise<Message[]> {
    const { limit, offset = 0, order = 'asc' } = query
    const ascending = order === 'asc'

    let request = this.db
      .from('messages')
      .select('*')
      .eq('journey_id', journeyId)
      .order('timestamp', { ascending })
      .order('id', { ascending })

    if (limit !== undefined) {
      request = request.range(offset, offset + limit - 1)
    }

    const { data, error } = await request
    if (error) fail('getMessages', error)
    return data
  }

  async listMessages(query: MessageQuery = {}): Promise<Message[]> {
    const { limit, offset = 0, order = 'desc' } = query
    const ascending = order === 'asc'

    let request = this.db
      .from('messages')
      .select('*')
      .order('timestamp', { ascending })
      .order('id', { ascending })

    if (limit !== undefined) {
      request = request.range(offset, offset + limit - 1)
    }

    const { data, error } = await request
    if (error) fail('listMessages', error)
    return data
  }
}
