'use client'

import { useState, type FormEvent } from 'react'
import { motion } from 'framer-motion'
import { Hammer, UserPlus, History } from 'lucide-react'
import { Button } from '@/components/ui/Button'
import { Card } from '@/components/ui/Card'
import type { SessionInfo } from '@/lib/journey/api-client'
import { ApiRequestError, journeyApi } from '@/lib/journey/api-client'

type FormMode = 'new' | 'existing'

interface SessionStartFormProps {
  onStarted: (session: SessionInfo) => void
}

const inputClass =
  'w-full rounded-xl bg-slate-900 border border-slate-700 px-4 py-2.5 text-slate-100 placeholder:text-slate-500 focus:outline-none focus:ring-2 focus:ring-teal-500'

export function SessionStartForm({ onStarted }: SessionStartFormProps) {
  const [mode, setMode] = useState<FormMode>('new')
  const [firstName, setFirstName] = useState('')
  const [lastName, setLastName] = useState('')
  const [userId, setUserId] = useState('')
  const [submitting, setSubmitting] = useState(false)
  const [error, setError] = useState<string | null>(null)

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault()
    setSubmitting(true)
    setError(null)

    try {
      const existingId = Number(userId)
      const session = await journeyApi.startSession(
        mode === 'existing' && Number.isInteger(existingId) && existingId > 0
          ? { user_id: existingId }
          : { first_name: firstName.trim() || undefined, last_name: lastName.trim() || undefined }
      )
      onStarted(session)
    } catch (err) {
      console.error('Error starting session:', err)
      setError(err instanceof ApiRequestError ? err.message : 'Could not start a session.')
    } finally {
      setSubmitting(false)
    }
  }

  return (
    <Card elevated className="max-w-md w-full">
      <div className="flex items-center gap-3 mb-6">
        <div className="w-10 h-10 rounded-xl bg-teal-500/20 flex items-center justify-center">
          <Hammer className="w-5 h-5 text-teal-400" />
        </div>
        <div>
          <h2 className="text-xl font-semibold">Plan your renovation</h2>
          <p className="text-sm text-slate-400">Three short milestones, one conversation.</p>
        </div>
      </div>

      <div className="grid grid-cols-2 gap-2 mb-6">
        <Button variant={mode === 'new' ? 'primary' : 'secondary'} size="sm" onClick={() => setMode('new')}>
          <UserPlus className="w-4 h-4 mr-2" />
          New user
        </Button>
        <Button variant={mode === 'existing' ? 'primary' : 'secondary'} size="sm" onClick={() => setMode('existing')}>
          <History className="w-4 h-4 mr-2" />
          Returning
        </Button>
      </div>

      <form onSubmit={handleSubmit} className="space-y-4">
        {mode === 'new' ? (
          <motion.div initial={{ opacity: 0 }} animate={{ opacity: 1 }} className="space-y-4">
            <label className="block text-sm text-slate-300">
              First name
              <input className={`${inputClass} mt-1`} value={firstName} onChange={e => setFirstName(e.target.value)} />
            </label>
            <label className="block text-sm text-slate-300">
              Last name
              <input className={`${inputClass} mt-1`} value={lastName} onChange={e => setLastName(e.target.value)} />
            </label>
          </motion.div>
        ) : (
          <motion.label initial={{ opacity: 0 }} animate={{ opacity: 1 }} className="block text-sm text-slate-300">
            User ID
            <input
              className={`${inputClass} mt-1`}
              inputMode="numeric"
              value={userId}
              onChange={e => setUserId(e.target.value.replace(/\D/g, ''))}
            />
          </motion.label>
        )}

        {error && <p className="text-sm text-red-400">{error}</p>}

        <Button type="submit" className="w-full" isLoading={submitting} loadingText="Starting session">
          {mode === 'new' ? 'Start journey' : 'Resume journey'}
        </Button>
      </form>
    </Card>
  )
}
