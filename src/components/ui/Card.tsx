'use client'

import type { ReactNode } from 'react'
import { motion } from 'framer-motion'

interface CardProps {
  elevated?: boolean
  title?: string
  className?: string
  children?: ReactNode
}

export function Card({ elevated = false, title, className = '', children }: CardProps) {
  const surface = elevated
    ? 'bg-slate-800 border border-slate-700 shadow-lg shadow-black/20'
    : 'bg-slate-800/50 border border-slate-700/50'

  return (
    <motion.section
      initial={{ opacity: 0, y: 10 }}
      animate={{ opacity: 1, y: 0 }}
      className={`rounded-2xl p-6 ${surface} ${className}`}
    >
      {title && <h2 className="text-lg font-semibold mb-4">{title}</h2>}
      {children}
    </motion.section>
  )
}
