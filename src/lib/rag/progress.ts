export type RagProgressStage =
  | 'retrieval_start'
  | 'retrieval_done'
  | 'answer_start'
  | 'answer_done'
  | 'format_done'
  | 'error'

/**
 * Lightweight progress event for one question.\n
 * Emitted in order: retrieval_start → retrieval_done → answer_start →
 * answer_done → format_done, or `error` from any point.
 */
export type RagProgressEvent = {
  stage: RagProgressStage
  ts: number
  traceId?: string
  sessionId?: string
  chunkCount?: number
  message?: string
}

export type RagProgressListener = (ev: RagProgressEvent) => void

export function createProgressEmitter(
  listener: RagProgressListener | undefined,
  base: { traceId?: string; sessionId?: string } = {}
) {
  return (ev: Omit<RagProgressEvent, 'ts' | 'traceId' | 'sessionId'>) => {
    if (!listener) return
    try {
      listener({ ...ev, ...base, ts: Date.now() })
    } catch (e) {
      console.warn('[rag] progress listener failed:', e)
    }
  }
}
