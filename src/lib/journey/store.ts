import type {
  CheckpointName,
  Journey,
  JourneyUpdate,
  Message,
  MessageInsert,
  User,
  UserUpdate,
} from './types'

export type MessageOrder = 'asc' | 'desc'

export interface MessageQuery {
  limit?: number
  offset?: number
  order?: MessageOrder
}

export interface NewUser {
  first_name?: string | null
  last_name?: string | null
}

/**
 * Persistence boundary for users, journeys and messages. Implementations
 * throw PersistenceError for store-level failures and return null for
 * missing rows.
 */
export interface JourneyStore {
  createUser(input: NewUser): Promise<User>
  getUser(id: number): Promise<User | null>
  listUsers(): Promise<User[]>
  updateUser(id: number, input: UserUpdate): Promise<User | null>
  /** Deletes the user with every journey and message they own. */
  deleteUser(id: number): Promise<boolean>

  createJourney(userId: number): Promise<Journey>
  getJourney(id: number): Promise<Journey | null>
  listJourneys(): Promise<Journey[]>
  getActiveJourney(userId: number): Promise<Journey | null>
  updateJourney(id: number, update: JourneyUpdate): Promise<Journey | null>
  /**
   * Conditional write: sets the checkpoint only while it is still null.
   * Returns the updated journey, or null when the row is missing or the
   * field already holds a value.
   */
  setCheckpointIfEmpty(id: number, checkpoint: CheckpointName, value: string): Promise<Journey | null>

  createMessage(input: MessageInsert): Promise<Message>
  getMessages(journeyId: number, query?: MessageQuery): Promise<Message[]>
  listMessages(query?: MessageQuery): Promise<Message[]>
}

export const DEFAULT_JOURNEY_MESSAGE_LIMIT = 50
export const DEFAULT_ALL_MESSAGES_LIMIT = 100
