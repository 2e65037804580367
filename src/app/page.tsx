'use client'

import { useRouter } from 'next/navigation'
import { SessionStartForm } from '@/components/journey/SessionStartForm'
import { storeSession } from '@/lib/hooks/useJourneyChat'
import type { SessionInfo } from '@/lib/journey/api-client'

export default function HomePage() {
  const router = useRouter()

  const handleStarted = (session: SessionInfo) => {
    storeSession({ userId: session.user_id, journeyId: session.journey_id })
    router.push('/journey')
  }

  return (
    <div className="flex justify-center pt-12">
      <SessionStartForm onStarted={handleStarted} />
    </div>
  )
}
