import type { ConversationTurn, FormattedResponse, ScoredChunk } from './types'
import type { HybridRetriever } from './retrieval'
import type { CitationAnswerer } from './answer'
import { findUnknownCitations } from './answer'
import { formatResponse } from './references'
import { errorMessage } from './errors'
import { createProgressEmitter, type RagProgressListener } from './progress'

export const INVALID_QUESTION_ANSWER = 'Please provide a valid question.'
export const NO_RELEVANT_INFO_ANSWER = "I couldn't find relevant information in the uploaded documents."
export const ERROR_ANSWER_PREFIX = 'An error occurred while processing your question: '

export type ConversationState = 'idle' | 'retrieving' | 'answering' | 'formatting' | 'done' | 'failed'

export type AskOptions = {
  traceId?: string
  sessionId?: string
  /** Only keep chunks whose source equals this filename (case-insensitive) */
  sourceFilter?: string
  signal?: AbortSignal
  onProgress?: RagProgressListener
}

type Retriever = Pick<HybridRetriever, 'retrieveWithFilter'>
type Answerer = Pick<CitationAnswerer, 'generate'>

function emptyResponse(answer: string): FormattedResponse {
  return { answer, references: '', chunksUsed: 0, sources: [] }
}

/**
 * Question flow for one session: retrieve, answer, record history, then format.
 * Never throws for a question; faults become an explanatory response.
 */
export class RagConversation {
  private history: ConversationTurn[] = []
  private _state: ConversationState = 'idle'

  constructor(
    private readonly retriever: Retriever,
    private readonly answerer: Answerer,
    history: ConversationTurn[] = []
  ) {
    this.history = [...history]
  }

  get state() {
    return this._state
  }

  async ask(question: string, opts: AskOptions = {}): Promise<FormattedResponse> {
    const { traceId, sessionId } = opts
    const emit = createProgressEmitter(opts.onProgress, { traceId, sessionId })

    if (!question || !question.trim()) {
      return emptyResponse(INVALID_QUESTION_ANSWER)
    }

    try {
      console.log('[rag]', JSON.stringify({ traceId, sessionId, stage: 'start', question: question.slice(0, 50) }))

      this._state = 'retrieving'
      emit({ stage: 'retrieval_start' })
      const chunks: ScoredChunk[] = await this.retriever.retrieveWithFilter(question, opts.sourceFilter)
      emit({ stage: 'retrieval_done', chunkCount: chunks.length })

      if (!chunks.length) {
        this._state = 'done'
        return emptyResponse(NO_RELEVANT_INFO_ANSWER)
      }

      this._state = 'answering'
      emit({ stage: 'answer_start', chunkCount: chunks.length })
      // History is read before this question is appended: it is the *previous* conversation.
      const answer = await this.answerer.generate(question, chunks, this.history, { signal: opts.signal })
      emit({ stage: 'answer_done', chunkCount: chunks.length })

      this.history.push({ role: 'user', content: question })
      this.history.push({ role: 'assistant', content: answer })

      const unknown = findUnknownCitations(answer, chunks.length)
      if (unknown.length) {
        console.warn('[rag]', JSON.stringify({ traceId, sessionId, stage: 'unknown_citations', unknown }))
      }

      this._state = 'formatting'
      const response = formatResponse(answer, chunks)
      emit({ stage: 'format_done', chunkCount: chunks.length })

      this._state = 'done'
      console.log('[rag]', JSON.stringify({ traceId, sessionId, stage: 'done', chunkCount: chunks.length }))
      return response
    } catch (e) {
      this._state = 'failed'
      const msg = errorMessage(e)
      console.error('[rag] error processing question:', msg)
      emit({ stage: 'error', message: msg })
      return emptyResponse(`${ERROR_ANSWER_PREFIX}${msg}`)
    }
  }

  clearMemory() {
    this.history = []
    console.log('[rag] chat history cleared')
  }

  getHistory(): ConversationTurn[] {
    return this.history.map((t) => ({ ...t }))
  }
}
