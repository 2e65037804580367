'use client'

import type { MouseEventHandler, ReactNode } from 'react'
import { motion } from 'framer-motion'
import { Loader2 } from 'lucide-react'

type ButtonVariant = 'primary' | 'secondary' | 'ghost'
type ButtonSize = 'sm' | 'md'

interface ButtonProps {
  variant?: ButtonVariant
  size?: ButtonSize
  isLoading?: boolean
  /** Announced instead of the label while loading. */
  loadingText?: string
  disabled?: boolean
  type?: 'button' | 'submit'
  onClick?: MouseEventHandler<HTMLButtonElement>
  className?: string
  children?: ReactNode
}

const VARIANT_CLASSES: Record<ButtonVariant, string> = {
  primary: 'bg-teal-500 hover:bg-teal-400 text-white focus:ring-teal-500',
  secondary: 'bg-slate-700 hover:bg-slate-600 text-slate-100 focus:ring-slate-500',
  ghost: 'bg-transparent hover:bg-slate-800 text-slate-300 focus:ring-slate-500',
}

const SIZE_CLASSES: Record<ButtonSize, string> = {
  sm: 'px-3 py-1.5 text-sm min-h-[36px]',
  md: 'px-4 py-2 text-base min-h-[44px]',
}

export function Button({
  variant = 'primary',
  size = 'md',
  isLoading = false,
  loadingText,
  disabled = false,
  type = 'button',
  onClick,
  className = '',
  children,
}: ButtonProps) {
  const inactive = disabled || isLoading

  return (
    <motion.button
      type={type}
      onClick={onClick}
      disabled={inactive}
      whileTap={inactive ? undefined : { scale: 0.98 }}
      aria-busy={isLoading}
      aria-label={isLoading ? loadingText : undefined}
      className={`inline-flex items-center justify-center rounded-xl font-medium transition-colors focus:outline-none focus:ring-2 disabled:opacity-50 disabled:cursor-not-allowed ${VARIANT_CLASSES[variant]} ${SIZE_CLASSES[size]} ${className}`}
    >
      {isLoading && <Loader2 className="w-4 h-4 mr-2 animate-spin" aria-hidden="true" />}
      {children}
    </motion.button>
  )
}
