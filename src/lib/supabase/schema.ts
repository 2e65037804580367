import type { Journey, JourneyUpdate, Message, MessageInsert, User } from '@/lib/journey/types'

// Mapped so the row shapes get the implicit index signature PostgREST typing expects
type Columns<T> = { [K in keyof T]: T[K] }

type Table<Row, Insert, Update> = {
  Row: Columns<Row>
  Insert: Columns<Insert>
  Update: Columns<Update>
  Relationships: []
}

/** Mirrors supabase/migrations/0001_renovation_journey.sql */
export type Database = {
  public: {
    Tables: {
      users: Table<
        User,
        Partial<Pick<User, 'first_name' | 'last_name'>>,
        Partial<Pick<User, 'first_name' | 'last_name'>>
      >
      journeys: Table<
        Journey,
        Pick<Journey, 'user_id'> & JourneyUpdate,
        JourneyUpdate & { updated_at?: string }
      >
      messages: Table<Message, MessageInsert, Partial<MessageInsert>>
    }
    Views: { [_ in never]: never }
    Functions: { [_ in never]: never }
    Enums: { [_ in never]: never }
    CompositeTypes: { [_ in never]: never }
  }
}
