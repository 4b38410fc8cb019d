import type { FormattedResponse, ScoredChunk } from './types'
import { pageLabel, sourceLabel } from './prompt'

export const REFERENCES_HEADER = '\n\n---\n**References:**\n'

export type Citation = {
  number: number
  source: string
  page?: number
}

function citationKey(source: string, page: number | undefined) {
  return `${source}\u0000${page ?? ''}`
}

/**
 * One citation per distinct (source, page), numbered 1..n in first-seen order.
 */
export function buildCitations(chunks: ScoredChunk[]): Citation[] {
  const seen = new Set<string>()
  const out: Citation[] = []
  for (const { chunk } of chunks) {
    const source = sourceLabel(chunk)
    const page = chunk.metadata.page
    const key = citationKey(source, page)
    if (seen.has(key)) continue
    seen.add(key)
    out.push({ number: out.length + 1, source, page })
  }
  return out
}

export function formatReferences(chunks: ScoredChunk[]): string {
  if (!chunks.length) return ''
  const lines = buildCitations(chunks).map((c) => `[${c.number}] ${c.source}, Page ${pageLabel(c.page)}\n`)
  return REFERENCES_HEADER + lines.join('')
}

export function uniqueSources(chunks: ScoredChunk[]): string[] {
  return Array.from(new Set(chunks.map(({ chunk }) => sourceLabel(chunk))))
}

export function formatResponse(answer: string, chunks: ScoredChunk[]): FormattedResponse {
  return {
    answer,
    references: formatReferences(chunks),
    chunksUsed: chunks.length,
    sources: uniqueSources(chunks),
  }
}
