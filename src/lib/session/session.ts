import fs from 'node:fs/promises'
import path from 'node:path'
import type { AppConfig } from '@/lib/config'
import type { DocumentLoader } from '@/lib/pdf/loader'
import type { CitationAnswerer } from '@/lib/rag/answer'
import { DocumentIngestion } from '@/lib/rag/ingestion'
import { NotFoundError } from '@/lib/rag/errors'
import { RagConversation, type AskOptions } from '@/lib/rag/pipeline'
import { HybridRetriever } from '@/lib/rag/retrieval'
import type { ConversationTurn, FormattedResponse, SemanticIndex } from '@/lib/rag/types'
import type { KeyedLock } from './keyed-lock'

export const UPLOAD_FIRST_ANSWER = 'Please upload documents first.'

export type SessionDeps = {
  config: AppConfig
  loader: DocumentLoader
  createIndex: () => SemanticIndex
  answerer: Pick<CitationAnswerer, 'generate'>
  lock: KeyedLock
}

export type UploadedFile = {
  /** Already sanitized basename */
  name: string
  bytes: Uint8Array
}

export type AddDocumentsResult = {
  documents: string[]
  totalChunks: number
  failed: Array<{ path: string; error: string }>
}

export type SessionInfo = {
  session_id: string
  created_at: string
  documents: string[]
  has_qa_chain: boolean
  chat_history_length: number
  total_chunks: number
}

export class Session {
  readonly createdAt = new Date()
  readonly uploadDir: string
  private readonly ingestion: DocumentIngestion
  private conversation: RagConversation | null = null
  private documents: string[] = []
  private closed = false

  constructor(
    readonly id: string,
    private readonly deps: SessionDeps
  ) {
    this.uploadDir = path.join(deps.config.uploadDir, id)
    this.ingestion = new DocumentIngestion({
      loader: deps.loader,
      createIndex: deps.createIndex,
      chunkSize: deps.config.chunkSize,
      chunkOverlap: deps.config.chunkOverlap,
    })
    console.log('[session]', JSON.stringify({ sessionId: id, stage: 'created' }))
  }

  private exclusive<T>(task: () => Promise<T>) {
    return this.deps.lock.run(this.id, task)
  }

  private assertOpen() {
    if (this.closed) throw new NotFoundError(`Session not found: ${this.id}`)
  }

  /**
   * Write uploaded files into this session's directory and ingest them.\n
   * Saving and ingesting hold the session lock together, so a delete either
   * runs before any file lands or after ingestion finishes.
   */
  upload(files: UploadedFile[]): Promise<AddDocumentsResult> {
    return this.exclusive(async () => {
      this.assertOpen()
      await fs.mkdir(this.uploadDir, { recursive: true })
      const saved: string[] = []
      for (const file of files) {
        const filePath = path.join(this.uploadDir, file.name)
        await fs.writeFile(filePath, file.bytes)
        saved.push(filePath)
      }
      console.log('[session]', JSON.stringify({ sessionId: this.id, stage: 'saved_uploads', files: files.map((f) => f.name) }))
      return this.ingest(saved)
    })
  }

  /** Ingest documents already on disk. */
  addDocuments(filePaths: string[]): Promise<AddDocumentsResult> {
    return this.exclusive(async () => {
      this.assertOpen()
      return this.ingest(filePaths)
    })
  }

  // Rebuilds the retriever over every chunk seen so far; history survives the rebuild.
  private async ingest(filePaths: string[]): Promise<AddDocumentsResult> {
    const { index, chunks, loaded, failed } = await this.ingestion.processPdfs(filePaths)
    const { config, answerer } = this.deps

    const retriever = new HybridRetriever(index, {
      chunks,
      distanceThreshold: config.distanceThreshold,
      semanticWeight: config.semanticWeight,
      defaultK: config.topK,
    })
    this.conversation = new RagConversation(retriever, answerer, this.conversation?.getHistory() ?? [])

    for (const p of loaded) {
      const name = path.basename(p)
      if (!this.documents.includes(name)) this.documents.push(name)
    }

    console.log(
      '[session]',
      JSON.stringify({ sessionId: this.id, stage: 'documents_added', added: loaded.length, totalChunks: chunks.length })
    )
    return { documents: [...this.documents], totalChunks: chunks.length, failed }
  }

  ask(question: string, opts: Omit<AskOptions, 'sessionId'> = {}): Promise<FormattedResponse> {
    return this.exclusive(async () => {
      this.assertOpen()
      if (!this.conversation) {
        return { answer: UPLOAD_FIRST_ANSWER, references: '', chunksUsed: 0, sources: [] }
      }
      return this.conversation.ask(question, { ...opts, sessionId: this.id })
    })
  }

  getDocuments(): string[] {
    return [...this.documents]
  }

  getChatHistory(): ConversationTurn[] {
    return this.conversation?.getHistory() ?? []
  }

  clearChat(): Promise<void> {
    return this.exclusive(async () => {
      this.assertOpen()
      if (this.conversation) {
        this.conversation.clearMemory()
        console.log('[session]', JSON.stringify({ sessionId: this.id, stage: 'history_cleared' }))
      }
    })
  }

  info(): SessionInfo {
    return {
      session_id: this.id,
      created_at: this.createdAt.toISOString(),
      documents: this.getDocuments(),
      has_qa_chain: this.conversation !== null,
      chat_history_length: this.getChatHistory().length,
      total_chunks: this.ingestion.getChunks().length,
    }
  }

  /**
   * Drop chunks, indexes, history and uploaded files together.\n
   * The session is closed first: later operations fail with NotFoundError
   * even if removing the directory fails.
   */
  cleanup(): Promise<void> {
    return this.exclusive(async () => {
      this.closed = true
      this.ingestion.clear()
      this.conversation = null
      this.documents = []
      await fs.rm(this.uploadDir, { recursive: true, force: true })
      console.log('[session]', JSON.stringify({ sessionId: this.id, stage: 'cleanup_complete' }))
    })
  }
}
