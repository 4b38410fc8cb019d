import type { Chunk, LexicalIndex } from './types'

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .normalize('NFKC')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter(Boolean)
}

export type Bm25Options = {
  k1?: number
  b?: number
}

type DocStats = {
  chunk: Chunk
  termFreq: Map<string, number>
  length: number
}

/**
 * Okapi BM25 over an immutable chunk set.\n
 * Chunks with no query term overlap are never returned.
 */
export class Bm25Index implements LexicalIndex {
  private readonly docs: DocStats[]
  private readonly docFreq = new Map<string, number>()
  private readonly avgLength: number
  private readonly k1: number
  private readonly b: number

  constructor(chunks: Chunk[], opts: Bm25Options = {}) {
    this.k1 = opts.k1 ?? 1.5
    this.b = opts.b ?? 0.75
    this.docs = chunks.map((chunk) => {
      const termFreq = new Map<string, number>()
      const tokens = tokenize(chunk.content)
      for (const t of tokens) termFreq.set(t, (termFreq.get(t) ?? 0) + 1)
      for (const t of termFreq.keys()) this.docFreq.set(t, (this.docFreq.get(t) ?? 0) + 1)
      return { chunk, termFreq, length: tokens.length }
    })
    const totalLength = this.docs.reduce((acc, d) => acc + d.length, 0)
    this.avgLength = this.docs.length ? totalLength / this.docs.length : 0
  }

  size() {
    return this.docs.length
  }

  private idf(term: string) {
    const n = this.docs.length
    const df = this.docFreq.get(term) ?? 0
    return Math.log((n - df + 0.5) / (df + 0.5) + 1)
  }

  private score(queryTokens: string[], doc: DocStats): number {
    let s = 0
    const norm = this.avgLength > 0 ? doc.length / this.avgLength : 0
    for (const t of queryTokens) {
      const tf = doc.termFreq.get(t)
      if (!tf) continue
      s += this.idf(t) * ((tf * (this.k1 + 1)) / (tf + this.k1 * (1 - this.b + this.b * norm)))
    }
    return s
  }

  async query(text: string, k: number): Promise<Chunk[]> {
    const qTokens = Array.from(new Set(tokenize(text)))
    if (qTokens.length === 0 || k <= 0) return []

    return this.docs
      .map((doc, i) => ({ doc, i, s: this.score(qTokens, doc) }))
      .filter((x) => x.s > 0)
      // Stable on ties: earlier chunks first.
      .sort((a, b) => b.s - a.s || a.i - b.i)
      .slice(0, k)
      .map((x) => x.doc.chunk)
  }
}

/**
 * Build the optional lexical index.\n
 * Returns null for an empty chunk set or when construction throws; the
 * retriever then runs semantic-only.
 */
export function buildLexicalIndex(
  chunks: Chunk[] | undefined,
  build: (chunks: Chunk[]) => LexicalIndex = (c) => new Bm25Index(c)
): LexicalIndex | null {
  if (!chunks || chunks.length === 0) return null
  try {
    const index = build(chunks)
    console.log('[retriever]', JSON.stringify({ stage: 'lexical_ready', chunkCount: index.size() }))
    return index
  } catch (e) {
    console.warn('[retriever] lexical index build failed, using semantic only:', e)
    return null
  }
}
