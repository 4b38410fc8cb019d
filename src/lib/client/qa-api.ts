/**
 * Browser-side calls into the QA endpoints.
 * Every call throws {@link QaApiError} carrying the server's `error` text on a non-2xx reply.
 */

export class QaApiError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message)
    this.name = 'QaApiError'
  }
}

export type UploadSummary = {
  documents: string[]
  totalChunks: number
  skipped: string[]
}

export type AnswerPayload = {
  answer: string
  references: string
  chunksUsed: number
  sources: string[]
}

export type ReferenceLine = {
  number: number
  label: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : []
}

async function request(path: string, init?: RequestInit): Promise<Record<string, unknown>> {
  const res = await fetch(path, init)
  const data: unknown = await res.json().catch(() => null)
  const body = isRecord(data) ? data : {}
  if (!res.ok) {
    throw new QaApiError(typeof body.error === 'string' ? body.error : `HTTP ${res.status}`, res.status)
  }
  return body
}

export async function createSession(): Promise<string> {
  const body = await request('/api/session', { method: 'POST' })
  if (typeof body.session_id !== 'string' || !body.session_id) {
    throw new QaApiError('Session response is missing session_id', 500)
  }
  return body.session_id
}

/** Deletes the session. `keepalive` lets the request outlive a closing tab. */
export async function endSession(sessionId: string, opts: { keepalive?: boolean } = {}): Promise<void> {
  await request(`/api/session/${encodeURIComponent(sessionId)}`, { method: 'DELETE', keepalive: opts.keepalive })
}

export async function uploadDocuments(sessionId: string, files: File[]): Promise<UploadSummary> {
  const form = new FormData()
  form.append('session_id', sessionId)
  for (const file of files) form.append('files', file)

  const body = await request('/api/upload', { method: 'POST', body: form })
  return {
    documents: stringList(body.documents),
    totalChunks: typeof body.total_chunks === 'number' ? body.total_chunks : 0,
    skipped: stringList(body.skipped),
  }
}

export async function askQuestion(sessionId: string, question: string, source?: string): Promise<AnswerPayload> {
  const body = await request('/api/ask', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ session_id: sessionId, question, ...(source ? { source } : {}) }),
  })
  return {
    answer: typeof body.answer === 'string' ? body.answer : '',
    references: typeof body.references === 'string' ? body.references : '',
    chunksUsed: typeof body.chunks_used === 'number' ? body.chunks_used : 0,
    sources: stringList(body.sources),
  }
}

export async function clearHistory(sessionId: string): Promise<void> {
  await request(`/api/history/${encodeURIComponent(sessionId)}`, { method: 'DELETE' })
}

const REFERENCE_LINE = /^\[(\d+)\]\s+(.+)$/

/** Splits the references block into its numbered lines, dropping the rule and header. */
export function parseReferences(references: string): ReferenceLine[] {
  const lines: ReferenceLine[] = []
  for (const raw of references.split('\n')) {
    const m = REFERENCE_LINE.exec(raw.trim())
    if (m) lines.push({ number: Number(m[1]), label: m[2] })
  }
  return lines
}
