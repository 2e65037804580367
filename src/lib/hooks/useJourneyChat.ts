'use client'

import { useCallback, useEffect, useState } from 'react'
import { ApiRequestError, journeyApi } from '@/lib/journey/api-client'
import type { ClientJourney, ClientMessage } from '@/lib/journey/api-client'

export const SESSION_STORAGE_KEY = 'renovation-journey-session'

export interface StoredSession {
  userId: number
  journeyId: number
}

export function readStoredSession(): StoredSession | null {
  if (typeof window === 'undefined') return null
  const raw = window.localStorage.getItem(SESSION_STORAGE_KEY)
  if (!raw) return null

  const [userId, journeyId] = raw.split(':').map(Number)
  return Number.isInteger(userId) && Number.isInteger(journeyId) ? { userId, journeyId } : null
}

export function storeSession(session: StoredSession | null) {
  if (session) {
    window.localStorage.setItem(SESSION_STORAGE_KEY, `${session.userId}:${session.journeyId}`)
  } else {
    window.localStorage.removeItem(SESSION_STORAGE_KEY)
  }
}

export function useJourneyChat(session: StoredSession | null) {
  const [journey, setJourney] = useState<ClientJourney | null>(null)
  const [messages, setMessages] = useState<ClientMessage[]>([])
  const [loading, setLoading] = useState(true)
  const [sending, setSending] = useState(false)
  const [error, setError] = useState<string | null>(null)

  const refresh = useCallback(async () => {
    if (!session) {
      setLoading(false)
      return
    }

    try {
      const [nextJourney, history] = await Promise.all([
        journeyApi.getJourney(session.journeyId),
        journeyApi.getMessages(session.journeyId),
      ])
      setJourney(nextJourney)
      setMessages(history)
      setError(null)
    } catch (err) {
      console.error('Error loading journey:', err)
      setError(err instanceof ApiRequestError ? err.message : 'Could not load your journey.')
    } finally {
      setLoading(false)
    }
  }, [session])

  useEffect(() => {
    void refresh()
  }, [refresh])

  const send = useCallback(
    async (content: string) => {
      const text = content.trim()
      if (!session || !text || sending) return

      const pending: ClientMessage = {
        id: -Date.now(),
        user_id: session.userId,
        journey_id: session.journeyId,
        speaker: 'user',
        content: text,
        current_milestone: journey?.current_milestone ?? 1,
        timestamp: new Date().toISOString(),
      }
      setMessages(prev => [...prev, pending])
      setSending(true)

      try {
        await journeyApi.sendMessage({ user_id: session.userId, journey_id: session.journeyId, content: text })
        await refresh()
      } catch (err) {
        console.error('Error sending message:', err)
        setMessages(prev => prev.filter(message => message.id !== pending.id))
        setError(err instanceof ApiRequestError ? err.message : "Couldn't reach the server. Try again.")
      } finally {
        setSending(false)
      }
    },
    [journey, refresh, sending, session]
  )

  const advance = useCallback(async () => {
    if (!session) return
    try {
      setJourney(await journeyApi.advance(session.journeyId))
    } catch (err) {
      console.error('Error advancing milestone:', err)
      setError(err instanceof ApiRequestError ? err.message : 'Could not advance the journey.')
    }
  }, [session])

  return { journey, messages, loading, sending, error, send, advance, refresh }
}
