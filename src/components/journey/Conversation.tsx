'use client'

import { useEffect, useRef, useState, type FormEvent, type KeyboardEvent } from 'react'
import { motion, AnimatePresence } from 'framer-motion'
import { Bot, Loader2, Send, User } from 'lucide-react'
import { format } from 'date-fns'
import type { ClientMessage } from '@/lib/journey/api-client'

interface ConversationProps {
  messages: ClientMessage[]
  sending: boolean
  disabled?: boolean
  onSend: (content: string) => Promise<void>
}

export function Conversation({ messages, sending, disabled, onSend }: ConversationProps) {
  const [input, setInput] = useState('')
  const endRef = useRef<HTMLDivElement>(null)

  useEffect(() => {
    endRef.current?.scrollIntoView({ behavior: 'smooth' })
  }, [messages, sending])

  const submit = async (e?: FormEvent) => {
    e?.preventDefault()
    const text = input.trim()
    if (!text || sending) return
    setInput('')
    await onSend(text)
  }

  const handleKeyDown = (e: KeyboardEvent<HTMLTextAreaElement>) => {
    if (e.key === 'Enter' && !e.shiftKey) {
      e.preventDefault()
      void submit()
    }
  }

  return (
    <div className="flex flex-col h-full min-h-[480px] rounded-2xl bg-slate-800/50 border border-slate-700/50">
      <div className="flex-1 overflow-y-auto p-4 space-y-4">
        {messages.length === 0 && !sending && (
          <p className="text-center text-slate-400 text-sm py-12">
            Tell me which room you&apos;d like to renovate to get started.
          </p>
        )}

        <AnimatePresence initial={false}>
          {messages.map(message => {
            const fromUser = message.speaker === 'user'
            return (
              <motion.div
                key={message.id}
                initial={{ opacity: 0, y: 8 }}
                animate={{ opacity: 1, y: 0 }}
                className={`flex gap-3 ${fromUser ? 'flex-row-reverse' : ''}`}
              >
                <div
                  className={`w-8 h-8 shrink-0 rounded-full flex items-center justify-center ${
                    fromUser ? 'bg-teal-500/20 text-teal-300' : 'bg-slate-700 text-slate-300'
                  }`}
                >
                  {fromUser ? <User className="w-4 h-4" /> : <Bot className="w-4 h-4" />}
                </div>
                <div className={`max-w-[80%] ${fromUser ? 'text-right' : ''}`}>
                  <div
                    className={`inline-block rounded-2xl px-4 py-2.5 text-left whitespace-pre-wrap ${
                      fromUser ? 'bg-teal-500 text-white' : 'bg-slate-700/70 text-slate-100'
                    }`}
                  >
                    {message.content}
                  </div>
                  <p className="text-xs text-slate-500 mt-1">{format(new Date(message.timestamp), 'p')}</p>
                </div>
              </motion.div>
            )
          })}
        </AnimatePresence>

        {sending && (
          <div className="flex items-center gap-2 text-slate-400 text-sm">
            <Loader2 className="w-4 h-4 animate-spin" />
            Thinking...
          </div>
        )}
        <div ref={endRef} />
      </div>

      <form onSubmit={submit} className="border-t border-slate-700/50 p-3 flex gap-2">
        <textarea
          value={input}
          onChange={e => setInput(e.target.value)}
          onKeyDown={handleKeyDown}
          rows={1}
          disabled={disabled}
          placeholder={disabled ? 'This journey is complete' : 'Type your message...'}
          className="flex-1 resize-none rounded-xl bg-slate-900 border border-slate-700 px-4 py-2.5 text-slate-100 placeholder:text-slate-500 focus:outline-none focus:ring-2 focus:ring-teal-500"
        />
        <button
          type="submit"
          disabled={disabled || sending || !input.trim()}
          aria-label="Send message"
          className="w-11 h-11 rounded-xl bg-teal-500 hover:bg-teal-400 disabled:opacity-50 flex items-center justify-center"
        >
          <Send className="w-4 h-4 text-white" />
        </button>
      </form>
    </div>
  )
}
