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

function newestFirst<T extends { id: number }>(a: T, b: T): number {
  return b.id - a.id
}

/**
 * In-process store used by tests and by `JOURNEY_STORE=memory`. Ids are
 * sequential per table, so id order matches insertion order.
 */
export class MemoryJourneyStore implements JourneyStore {
  private users = new Map<number, User>()
  private journeys = new Map<number, Journey>()
  private messages: Message[] = []
  private nextIds = { user: 1, journey: 1, message: 1 }

  constructor(private readonly now: () => Date = () => new Date()) {}

  private timestamp(): string {
    return this.now().toISOString()
  }

  async createUser(input: NewUser): Promise<User> {
    const user: User = {
      id: this.nextIds.user++,
      first_name: input.first_name ?? null,
      last_name: input.last_name ?? null,
      created_at: this.timestamp(),
    }
    this.users.set(user.id, user)
    return { ...user }
  }

  async getUser(id: number): Promise<User | null> {
    const user = this.users.get(id)
    return user ? { ...user } : null
  }

  async listUsers(): Promise<User[]> {
    return [...this.users.values()].sort(newestFirst).map(user => ({ ...user }))
  }

  async updateUser(id: number, input: UserUpdate): Promise<User | null> {
    const user = this.users.get(id)
    if (!user) return null
    const updated = { ...user, ...input }
    this.users.set(id, updated)
    return { ...updated }
  }

  async deleteUser(id: number): Promise<boolean> {
    if (!this.users.delete(id)) return false
    for (const journey of [...this.journeys.values()]) {
      if (journey.user_id === id) this.journeys.delete(journey.id)
    }
    this.messages = this.messages.filter(message => message.user_id !== id)
    return true
  }

  async createJourney(userId: number): Promise<Journey> {
    const createdAt = this.timestamp()
    const journey: Journey = {
      id: this.nextIds.journey++,
      user_id: userId,
      current_milestone: 1,
      status: 'in_progress',
      room: null,
      renovation_purpose: null,
      budget_range: null,
      timeline: null,
      style_preference: null,
      priority_feature: null,
      milestone1_completed: false,
      milestone2_completed: false,
      milestone3_completed: false,
      milestone1_completed_at: null,
      milestone2_completed_at: null,
      milestone3_completed_at: null,
      created_at: createdAt,
      updated_at: createdAt,
    }
    this.journeys.set(journey.id, journey)
    return { ...journey }
  }

  async getJourney(id: number): Promise<Journey | null> {
    const journey = this.journeys.get(id)
    return journey ? { ...journey } : null
  }

  async listJourneys(): Promise<Journey[]> {
    return [...this.journeys.values()].sort(newestFirst).map(journey => ({ ...journey }))
  }

  async getActiveJourney(userId: number): Promise<Journey | null> {
    const active = [...this.journeys.values()]
      .filter(journey => journey.user_id === userId && journey.status === 'in_progress')
      .sort(newestFirst)[0]
    return active ? { ...active } : null
  }

  async updateJourney(id: number, update: JourneyUpdate): Promise<Journey | null> {
    const journey = this.journeys.get(id)
    if (!journey) return null
    const updated: Journey = { ...journey, ...update, updated_at: this.timestamp() }
    this.journeys.set(id, updated)
    return { ...updated }
  }

  async setCheckpointIfEmpty(id: number, checkpoint: CheckpointName, value: string): Promise<Journey | null> {
    const journey = this.journeys.get(id)
    if (!journey || journey[checkpoint] !== null) return null
    return this.updateJourney(id, checkpointUpdate(checkpoint, value))
  }

  async createMessage(input: MessageInsert): Promise<Message> {
    const message: Message = {
      ...input,
      id: this.nextIds.message++,
      timestamp: this.timestamp(),
    }
    this.messages.push(message)
    return { ...message }
  }

  async getMessages(journeyId: number, query: MessageQuery = {}): Promise<Message[]> {
    return this.page(
      this.messages.filter(message => message.journey_id === journeyId),
      query
    )
  }

  async listMessages(query: MessageQuery = {}): Promise<Message[]> {
    return this.page(this.messages, { order: 'desc', ...query })
  }

  private page(rows: Message[], { limit, offset = 0, order = 'asc' }: MessageQuery): Message[] {
    const ordered = order === 'desc' ? [...rows].reverse() : [...rows]
    const end = limit === undefined ? undefined : offset + limit
    return ordered.slice(offset, end).map(message => ({ ...message }))
  }
}
