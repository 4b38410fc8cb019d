'use client'

import { useCallback, useRef, useState } from 'react'
import { FileText, FileUp, Loader2 } from 'lucide-react'
import { toast } from 'sonner'
import { cn } from '@/lib/utils'
import { uploadDocuments, type UploadSummary } from '@/lib/client/qa-api'

interface UploadPanelProps {
  sessionId: string | null
  documents: string[]
  onUploaded: (summary: UploadSummary, fileCount: number) => void
}

export function UploadPanel({ sessionId, documents, onUploaded }: UploadPanelProps) {
  const [isDragging, setIsDragging] = useState(false)
  const [uploading, setUploading] = useState(false)
  const fileInputRef = useRef<HTMLInputElement>(null)

  const isBusy = uploading || !sessionId

  const processFiles = useCallback(async (list: FileList | null | undefined) => {
    if (!sessionId) {
      toast.error('No active session. Please refresh the page.')
      return
    }
    const files = Array.from(list ?? [])
    if (!files.length) return

    const rejected = files.filter((f) => !f.name.toLowerCase().endsWith('.pdf'))
    if (rejected.length) {
      toast.error(`Only PDF files are allowed: ${rejected.map((f) => f.name).join(', ')}`)
      return
    }

    setUploading(true)
    try {
      const summary = await uploadDocuments(sessionId, files)
      onUploaded(summary, files.length)
      if (summary.skipped.length) {
        toast.warning(`Could not read: ${summary.skipped.join(', ')}`)
      }
    } catch (error) {
      console.error('Upload failed:', error)
      toast.error(error instanceof Error ? error.message : 'Upload failed')
    } finally {
      setUploading(false)
      if (fileInputRef.current) fileInputRef.current.value = ''
    }
  }, [sessionId, onUploaded])

  const handleDragOver = useCallback((e: React.DragEvent) => {
    if (isBusy) return
    e.preventDefault()
    e.stopPropagation()
    setIsDragging(true)
  }, [isBusy])

  const handleDragLeave = useCallback((e: React.DragEvent) => {
    e.preventDefault()
    e.stopPropagation()
    setIsDragging(false)
  }, [])

  const handleDrop = useCallback((e: React.DragEvent) => {
    e.preventDefault()
    e.stopPropagation()
    setIsDragging(false)
    if (isBusy) return
    void processFiles(e.dataTransfer.files)
  }, [isBusy, processFiles])

  return (
    <div className="space-y-4">
      <div
        className={cn(
          'border-2 border-dashed rounded-xl p-6 text-center transition-all cursor-pointer',
          isBusy && 'cursor-not-allowed opacity-60',
          isDragging
            ? 'border-emerald-500 bg-emerald-500/10 scale-[1.02]'
            : 'border-zinc-700 hover:border-zinc-600 hover:bg-zinc-800/50'
        )}
        onClick={() => {
          if (isBusy) return
          fileInputRef.current?.click()
        }}
        onDragOver={handleDragOver}
        onDragLeave={handleDragLeave}
        onDrop={handleDrop}
      >
        <input
          ref={fileInputRef}
          type="file"
          accept=".pdf,application/pdf"
          multiple
          onChange={(e) => void processFiles(e.target.files)}
          disabled={isBusy}
          className="hidden"
        />
        <div className="flex flex-col items-center gap-2">
          <div className={cn(
            'w-12 h-12 rounded-xl flex items-center justify-center transition-colors',
            isDragging ? 'bg-emerald-500/20' : 'bg-zinc-800'
          )}>
            {uploading ? (
              <Loader2 className="w-6 h-6 text-emerald-500 animate-spin" />
            ) : (
              <FileUp className={cn('w-6 h-6 transition-colors', isDragging ? 'text-emerald-400' : 'text-zinc-500')} />
            )}
          </div>
          <p className={cn('text-sm transition-colors', isDragging ? 'text-emerald-400' : 'text-zinc-400')}>
            {uploading ? 'Processing documents...' : isDragging ? 'Drop files to upload' : 'Click or drag PDF files here'}
          </p>
          <p className="text-xs text-zinc-600">PDF only, several files at once</p>
        </div>
      </div>

      <div>
        <h2 className="text-xs font-medium uppercase tracking-wide text-zinc-500 mb-2">Documents</h2>
        {documents.length === 0 ? (
          <p className="text-sm text-zinc-600">No documents uploaded</p>
        ) : (
          <ul className="space-y-1.5">
            {documents.map((doc) => (
              <li key={doc} className="flex items-center gap-2 text-sm text-zinc-300">
                <FileText className="w-4 h-4 text-emerald-500 shrink-0" />
                <span className="truncate">{doc}</span>
              </li>
            ))}
          </ul>
        )}
      </div>
    </div>
  )
}
