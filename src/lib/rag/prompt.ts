import type { Chunk, ConversationTurn, ScoredChunk } from './types'

export const NO_HISTORY_PLACEHOLDER = 'No previous conversation.'
export const NOT_IN_CONTEXT_PHRASE = 'I cannot find this information in the provided documents'

/**
 * Displayed page for a stored 0-based page: p + 1, or "N/A" when unknown.\n
 * Shared by the context block and the reference list so both number pages the same way.
 */
export function pageLabel(page: Chunk['metadata']['page']): string {
  return typeof page === 'number' && Number.isInteger(page) && page >= 0 ? String(page + 1) : 'N/A'
}

export function sourceLabel(c: Chunk) {
  return c.metadata.source || 'Unknown'
}

/**
 * Number chunks for citation: chunk i (1-based, input order) becomes `[i]`.
 */
export function formatChunksForPrompt(chunks: ScoredChunk[]): string {
  return chunks
    .map(({ chunk }, i) => `[${i + 1}] (Source: ${sourceLabel(chunk)}, Page ${pageLabel(chunk.metadata.page)}):\n${chunk.content}`)
    .join('\n\n')
}

export function formatHistory(history: ConversationTurn[]): string {
  if (!history.length) return NO_HISTORY_PLACEHOLDER
  return history.map((t) => `${t.role}: ${t.content}`).join('\n')
}

export function buildAnswerPrompt(args: { question: string; context: string; history: string }) {
  const { question, context, history } = args
  return `You are a helpful assistant answering questions based on document content.

Previous conversation:
${history}

Relevant context from documents:
${context}

INSTRUCTIONS:
- Answer based ONLY on the provided context
- Use inline citations like [1], [2] referring to chunk numbers above
- Be specific and detailed in your answers
- If the information is not in the context, say "${NOT_IN_CONTEXT_PHRASE}"

User question: ${question}
`
}
