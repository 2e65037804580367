'use client'

import { useEffect, useState } from 'react'
import Link from 'next/link'
import { useRouter } from 'next/navigation'
import { Loader2, RotateCcw } from 'lucide-react'
import { Button } from '@/components/ui/Button'
import { Conversation } from '@/components/journey/Conversation'
import { JourneyProgress } from '@/components/journey/JourneyProgress'
import { readStoredSession, storeSession, useJourneyChat } from '@/lib/hooks/useJourneyChat'
import type { StoredSession } from '@/lib/hooks/useJourneyChat'

export default function JourneyPage() {
  const router = useRouter()
  const [session, setSession] = useState<StoredSession | null>(null)
  const [ready, setReady] = useState(false)

  useEffect(() => {
    setSession(readStoredSession())
    setReady(true)
  }, [])

  const { journey, messages, loading, sending, error, send, advance } = useJourneyChat(session)

  const startOver = () => {
    storeSession(null)
    router.push('/')
  }

  if (!ready || (session && loading)) {
    return (
      <div className="flex justify-center py-24 text-slate-400">
        <Loader2 className="w-6 h-6 animate-spin" />
      </div>
    )
  }

  if (!session) {
    return (
      <div className="text-center py-24 space-y-4">
        <p className="text-slate-400">No active session.</p>
        <Link href="/" className="text-teal-400 hover:underline">
          Start a renovation journey
        </Link>
      </div>
    )
  }

  return (
    <div className="space-y-4">
      <div className="flex items-center justify-between">
        <h1 className="text-2xl font-semibold">Renovation planner</h1>
        <Button variant="ghost" size="sm" onClick={startOver}>
          <RotateCcw className="w-4 h-4 mr-2" />
          Start over
        </Button>
      </div>

      {error && <p className="rounded-xl bg-red-500/10 border border-red-500/30 px-4 py-2 text-sm text-red-300">{error}</p>}

      <div className="grid gap-6 md:grid-cols-[1fr_320px]">
        <Conversation
          messages={messages}
          sending={sending}
          disabled={journey?.status === 'completed'}
          onSend={send}
        />
        {journey && <JourneyProgress journey={journey} onAdvance={advance} />}
      </div>
    </div>
  )
}
