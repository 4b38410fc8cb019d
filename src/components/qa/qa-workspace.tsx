'use client'

import { useCallback, useEffect, useRef, useState } from 'react'
import { BookOpenText, Loader2, LogOut } from 'lucide-react'
import { toast } from 'sonner'
import { createSession, endSession, type UploadSummary } from '@/lib/client/qa-api'
import { ChatPanel, type Message } from './chat-panel'
import { UploadPanel } from './upload-panel'

export function QaWorkspace() {
  const [sessionId, setSessionId] = useState<string | null>(null)
  const [documents, setDocuments] = useState<string[]>([])
  const [messages, setMessages] = useState<Message[]>([])
  const [ending, setEnding] = useState(false)
  const sessionRef = useRef<string | null>(null)

  const startSession = useCallback(async () => {
    try {
      const id = await createSession()
      sessionRef.current = id
      setSessionId(id)
    } catch (error) {
      console.error('Failed to create session:', error)
      toast.error('Failed to initialize session. Please refresh the page.')
    }
  }, [])

  useEffect(() => {
    void startSession()

    const onUnload = () => {
      const id = sessionRef.current
      if (id) endSession(id, { keepalive: true }).catch((e: unknown) => console.warn('Session cleanup on unload failed:', e))
    }
    window.addEventListener('beforeunload', onUnload)
    return () => window.removeEventListener('beforeunload', onUnload)
  }, [startSession])

  const onUploaded = useCallback((summary: UploadSummary, fileCount: number) => {
    setDocuments(summary.documents)
    setMessages((prev) => [
      ...prev,
      {
        id: `upload-${Date.now()}`,
        role: 'system',
        content: `Uploaded ${fileCount} document(s). Created ${summary.totalChunks} chunks. You can now ask questions!`,
      },
    ])
  }, [])

  const onEndSession = async () => {
    if (!sessionId || ending) return
    if (!window.confirm('This will delete all uploaded documents and chat history. Continue?')) return

    setEnding(true)
    try {
      await endSession(sessionId)
      sessionRef.current = null
      setSessionId(null)
      setDocuments([])
      setMessages([])
      await startSession()
      toast.success('Session ended')
    } catch (error) {
      console.error('Failed to end session:', error)
      toast.error('Failed to end session.')
    } finally {
      setEnding(false)
    }
  }

  return (
    <div className="h-screen flex flex-col bg-zinc-950 text-zinc-100">
      <header className="flex items-center justify-between px-6 py-3 border-b border-zinc-800 shrink-0">
        <div className="flex items-center gap-2">
          <BookOpenText className="w-5 h-5 text-emerald-500" />
          <h1 className="text-sm font-semibold">Document QA</h1>
        </div>
        <button
          type="button"
          onClick={() => void onEndSession()}
          disabled={!sessionId || ending}
          className="h-8 inline-flex items-center gap-1.5 rounded-md px-3 text-xs text-zinc-400 border border-zinc-800 hover:bg-zinc-800 hover:text-zinc-200 disabled:opacity-50"
        >
          {ending ? <Loader2 className="w-3.5 h-3.5 animate-spin" /> : <LogOut className="w-3.5 h-3.5" />}
          End session
        </button>
      </header>

      <main className="flex-1 min-h-0 grid grid-cols-1 md:grid-cols-[320px_1fr]">
        <aside className="p-4 border-b md:border-b-0 md:border-r border-zinc-800 overflow-y-auto">
          <UploadPanel sessionId={sessionId} documents={documents} onUploaded={onUploaded} />
        </aside>
        <section className="min-h-0">
          <ChatPanel sessionId={sessionId} documents={documents} messages={messages} setMessages={setMessages} />
        </section>
      </main>
    </div>
  )
}
