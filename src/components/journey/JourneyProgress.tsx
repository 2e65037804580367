'use client'

import { motion } from 'framer-motion'
import { CheckCircle2, Circle, ArrowRight, Trophy } from 'lucide-react'
import { format } from 'date-fns'
import { Button } from '@/components/ui/Button'
import { Card } from '@/components/ui/Card'
import { MILESTONE_TITLES, getCheckpoint, getMilestoneCheckpoints, isMilestoneFilled } from '@/lib/journey/checkpoints'
import type { ClientJourney } from '@/lib/journey/api-client'
import type { MilestoneNumber } from '@/lib/journey/types'

const MILESTONES: MilestoneNumber[] = [1, 2, 3]

const COMPLETED_AT = {
  1: 'milestone1_completed_at',
  2: 'milestone2_completed_at',
  3: 'milestone3_completed_at',
} as const

interface JourneyProgressProps {
  journey: ClientJourney
  onAdvance: () => Promise<void>
}

export function JourneyProgress({ journey, onAdvance }: JourneyProgressProps) {
  const finished = journey.status === 'completed'
  const current = journey.current_milestone
  const canAdvance = !finished && current < 3 && isMilestoneFilled(journey, current)

  return (
    <Card className="space-y-5">
      <div className="flex items-center justify-between">
        <h2 className="text-lg font-semibold">Your journey</h2>
        {finished && (
          <span className="flex items-center gap-1 text-sm text-amber-300">
            <Trophy className="w-4 h-4" /> Complete
          </span>
        )}
      </div>

      <ol className="space-y-4">
        {MILESTONES.map(milestone => {
          const completedAt = journey[COMPLETED_AT[milestone]]
          const active = milestone === current && !finished
          return (
            <motion.li
              key={milestone}
              initial={{ opacity: 0, x: -8 }}
              animate={{ opacity: 1, x: 0 }}
              transition={{ delay: milestone * 0.05 }}
              className={`rounded-xl p-3 border ${active ? 'border-teal-500/60 bg-teal-500/5' : 'border-slate-700/50'}`}
            >
              <div className="flex items-center justify-between">
                <p className="font-medium">
                  {milestone}. {MILESTONE_TITLES[milestone]}
                </p>
                {completedAt && <span className="text-xs text-slate-500">{format(new Date(completedAt), 'MMM d')}</span>}
              </div>
              <ul className="mt-2 space-y-1">
                {getMilestoneCheckpoints(milestone).map(name => {
                  const value = journey[name]
                  return (
                    <li key={name} className="flex items-center gap-2 text-sm">
                      {value ? (
                        <CheckCircle2 className="w-4 h-4 text-teal-400" />
                      ) : (
                        <Circle className="w-4 h-4 text-slate-600" />
                      )}
                      <span className="text-slate-400">{getCheckpoint(name)?.label}:</span>
                      <span className={value ? 'text-slate-100' : 'text-slate-600'}>{value ?? 'not yet'}</span>
                    </li>
                  )
                })}
              </ul>
            </motion.li>
          )
        })}
      </ol>

      {canAdvance && (
        <Button className="w-full" onClick={() => void onAdvance()}>
          Continue to {MILESTONE_TITLES[current === 1 ? 2 : 3]}
          <ArrowRight className="w-4 h-4 ml-2" />
        </Button>
      )}
    </Card>
  )
}
