import type { ConversationTurn, LanguageCompleter, ScoredChunk } from './types'
import { buildAnswerPrompt, formatChunksForPrompt, formatHistory } from './prompt'
import { GenerationError, errorMessage } from './errors'

export const NO_CONTEXT_ANSWER = 'No context available to answer the question.'

export class CitationAnswerer {
  constructor(private readonly llm: LanguageCompleter) {}

  /**
   * Answer from the numbered context block.\n
   * The model's text is returned as-is; citation markers are not rewritten.
   */
  async generate(
    question: string,
    chunks: ScoredChunk[],
    history: ConversationTurn[],
    opts: { signal?: AbortSignal } = {}
  ): Promise<string> {
    if (!chunks.length) return NO_CONTEXT_ANSWER

    const prompt = buildAnswerPrompt({
      question,
      context: formatChunksForPrompt(chunks),
      history: formatHistory(history),
    })

    let answer: string
    try {
      answer = await this.llm.complete(prompt, { signal: opts.signal })
    } catch (e) {
      console.error('[rag] LLM call failed:', errorMessage(e))
      throw new GenerationError(`Failed to generate answer: ${errorMessage(e)}`, { cause: e })
    }

    console.log('[rag]', JSON.stringify({ stage: 'answered', question: question.slice(0, 50), answerLen: answer.length }))
    return answer
  }
}

/** Citation numbers printed in an answer, ascending and de-duplicated. */
export function extractCitationNumbers(answer: string): number[] {
  const found = new Set<number>()
  for (const m of answer.matchAll(/\[(\d+(?:\s*,\s*\d+)*)\]/g)) {
    for (const part of m[1].split(',')) {
      const n = Number(part.trim())
      if (Number.isInteger(n) && n > 0) found.add(n)
    }
  }
  return Array.from(found).sort((a, b) => a - b)
}

/** Citations outside 1..chunkCount; they point at no context chunk. */
export function findUnknownCitations(answer: string, chunkCount: number): number[] {
  return extractCitationNumbers(answer).filter((n) => n > chunkCount)
}
