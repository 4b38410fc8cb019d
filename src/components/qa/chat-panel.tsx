'use client'

import { useEffect, useRef, useState } from 'react'
import { Bot, Eraser, Info, Loader2, Send, User } from 'lucide-react'
import ReactMarkdown from 'react-markdown'
import { toast } from 'sonner'
import { cn } from '@/lib/utils'
import { askQuestion, clearHistory, parseReferences, type ReferenceLine } from '@/lib/client/qa-api'

export interface Message {
  id: string
  role: 'user' | 'assistant' | 'system'
  content: string
  references?: ReferenceLine[]
}

interface ChatPanelProps {
  sessionId: string | null
  documents: string[]
  messages: Message[]
  setMessages: React.Dispatch<React.SetStateAction<Message[]>>
}

function newMessageId() {
  return `${Date.now().toString(36)}-${Math.random().toString(16).slice(2)}`
}

export function ChatPanel({ sessionId, documents, messages, setMessages }: ChatPanelProps) {
  const scrollContainerRef = useRef<HTMLDivElement>(null)
  const [input, setInput] = useState('')
  const [source, setSource] = useState('')
  const [isLoading, setIsLoading] = useState(false)

  const canAsk = !!sessionId && documents.length > 0 && !isLoading

  useEffect(() => {
    if (scrollContainerRef.current) {
      scrollContainerRef.current.scrollTop = scrollContainerRef.current.scrollHeight
    }
  }, [messages, isLoading])

  useEffect(() => {
    if (source && !documents.includes(source)) setSource('')
  }, [documents, source])

  const onSubmit = async (e: React.SyntheticEvent) => {
    e.preventDefault()
    const question = input.trim()
    if (!question || !sessionId || !canAsk) return

    setInput('')
    setMessages((prev) => [...prev, { id: newMessageId(), role: 'user', content: question }])
    setIsLoading(true)

    try {
      const res = await askQuestion(sessionId, question, source || undefined)
      setMessages((prev) => [
        ...prev,
        { id: newMessageId(), role: 'assistant', content: res.answer, references: parseReferences(res.references) },
      ])
    } catch (error) {
      console.error('Question failed:', error)
      const errorMsg = error instanceof Error ? error.message : 'Unknown error'
      setMessages((prev) => [...prev, { id: newMessageId(), role: 'assistant', content: `⚠️ ${errorMsg}` }])
    } finally {
      setIsLoading(false)
    }
  }

  const onClearChat = async () => {
    if (!sessionId) return
    try {
      await clearHistory(sessionId)
      setMessages([{ id: newMessageId(), role: 'system', content: 'Chat cleared. Your documents are still available.' }])
    } catch (error) {
      console.error('Failed to clear chat:', error)
      toast.error('Failed to clear chat history.')
    }
  }

  return (
    <div className="h-full flex flex-col">
      <div className="flex items-center justify-between gap-3 px-4 py-3 border-b border-zinc-800 shrink-0">
        <select
          value={source}
          onChange={(e) => setSource(e.target.value)}
          disabled={!documents.length || isLoading}
          className="h-8 rounded-md bg-zinc-800/50 border border-zinc-700 px-2 text-xs text-zinc-300 focus:border-emerald-500 outline-none"
        >
          <option value="">All documents</option>
          {documents.map((doc) => (
            <option key={doc} value={doc}>{doc}</option>
          ))}
        </select>
        <button
          type="button"
          onClick={() => void onClearChat()}
          disabled={!sessionId || isLoading}
          className="h-8 inline-flex items-center gap-1.5 rounded-md px-2.5 text-xs text-zinc-400 hover:bg-zinc-800 hover:text-zinc-200 disabled:opacity-50"
        >
          <Eraser className="w-3.5 h-3.5" />
          Clear chat
        </button>
      </div>

      <div ref={scrollContainerRef} className="flex-1 overflow-y-auto">
        <div className="p-4 space-y-4">
          {messages.length === 0 ? (
            <div className="py-16 text-center text-zinc-500">
              <h2 className="text-lg font-medium text-zinc-300 mb-2">Welcome!</h2>
              <p className="text-sm">Upload PDF documents and start asking questions.</p>
              <p className="text-sm">Answers cite the source pages they were drawn from.</p>
            </div>
          ) : (
            messages.map((message) =>
              message.role === 'system' ? (
                <div
                  key={message.id}
                  className="flex items-center gap-2 rounded-xl border border-emerald-500/20 bg-emerald-500/5 px-3 py-2 text-xs text-emerald-300"
                >
                  <Info className="w-3.5 h-3.5 shrink-0" />
                  {message.content}
                </div>
              ) : (
                <div key={message.id} className={cn('flex gap-3', message.role === 'user' ? 'flex-row-reverse' : '')}>
                  <div className={cn(
                    'shrink-0 w-7 h-7 rounded-lg flex items-center justify-center',
                    message.role === 'user' ? 'bg-emerald-500/20' : 'bg-zinc-800'
                  )}>
                    {message.role === 'user' ? (
                      <User className="w-4 h-4 text-emerald-400" />
                    ) : (
                      <Bot className="w-4 h-4 text-zinc-400" />
                    )}
                  </div>

                  <div className={cn(
                    'flex-1 rounded-xl px-3.5 py-2.5 max-w-[85%]',
                    message.role === 'user' ? 'bg-emerald-600/20 text-zinc-200 ml-auto' : 'bg-zinc-800/50 text-zinc-300'
                  )}>
                    <ReactMarkdown
                      components={{
                        p: ({ children }) => <p className="text-sm leading-relaxed mb-2 last:mb-0">{children}</p>,
                        code: ({ children }) => (
                          <code className="text-emerald-400 bg-zinc-900/50 px-1 py-0.5 rounded text-xs">{children}</code>
                        ),
                        ul: ({ children }) => <ul className="space-y-1 my-2 text-sm">{children}</ul>,
                      }}
                    >
                      {message.content}
                    </ReactMarkdown>

                    {message.references && message.references.length > 0 && (
                      <div className="mt-3 border-t border-zinc-700/50 pt-2">
                        <p className="text-xs font-medium text-zinc-400 mb-1">References</p>
                        <ol className="space-y-0.5 text-xs text-zinc-500">
                          {message.references.map((ref) => (
                            <li key={ref.number}>
                              <span className="text-emerald-500">[{ref.number}]</span> {ref.label}
                            </li>
                          ))}
                        </ol>
                      </div>
                    )}
                  </div>
                </div>
              )
            )
          )}

          {isLoading && (
            <div className="flex gap-3">
              <div className="w-7 h-7 rounded-lg bg-zinc-800 flex items-center justify-center">
                <Bot className="w-4 h-4 text-zinc-400" />
              </div>
              <div className="bg-zinc-800/50 rounded-xl px-4 py-3 flex items-center gap-2 text-xs text-zinc-400">
                <Loader2 className="w-4 h-4 animate-spin" />
                Thinking...
              </div>
            </div>
          )}
        </div>
      </div>

      <div className="p-4 border-t border-zinc-800 shrink-0">
        <form onSubmit={(e) => void onSubmit(e)} className="flex gap-2">
          <textarea
            value={input}
            onChange={(e) => setInput(e.target.value)}
            placeholder={documents.length ? 'Ask a question about your documents...' : 'Upload a document first'}
            rows={1}
            disabled={!canAsk}
            className="flex-1 resize-none rounded-md border bg-zinc-800/50 border-zinc-700 px-3 py-2.5 text-sm text-zinc-100 placeholder:text-zinc-500 focus:border-emerald-500 outline-none min-h-[44px] max-h-[120px] disabled:opacity-50"
            onKeyDown={(e) => {
              // Enter may be confirming an IME composition rather than sending.
              if (e.nativeEvent.isComposing) return
              if (e.key === 'Enter' && !e.shiftKey) {
                e.preventDefault()
                void onSubmit(e)
              }
            }}
          />
          <button
            type="submit"
            disabled={!canAsk || !input.trim()}
            className="h-11 w-11 shrink-0 inline-flex items-center justify-center rounded-md bg-emerald-600 hover:bg-emerald-500 text-white disabled:opacity-50"
          >
            {isLoading ? <Loader2 className="w-4 h-4 animate-spin" /> : <Send className="w-4 h-4" />}
          </button>
        </form>
      </div>
    </div>
  )
}
