import type { Chunk, LexicalIndex, ScoredChunk, SemanticIndex } from './types'
import { buildLexicalIndex } from './lexical-index'
import { weightedReciprocalRankFusion } from './fusion'
import { IndexError, RetrievalError, errorMessage } from './errors'

export type HybridRetrieverOptions = {
  /** Chunks for the lexical index; omitted or empty means semantic-only */
  chunks?: Chunk[]
  /** Max distance kept in semantic-only mode (lower = stricter) */
  distanceThreshold?: number
  /** Semantic share of the fused rank; lexical gets 1 - semanticWeight */
  semanticWeight?: number
  defaultK?: number
  buildLexical?: (chunks: Chunk[]) => LexicalIndex
}

function roundTo(n: number, digits: number) {
  const f = Math.pow(10, digits)
  return Math.round(n * f) / f
}

function preview(q: string) {
  return q.slice(0, 50)
}

export class HybridRetriever {
  private readonly semantic: SemanticIndex
  private readonly lexical: LexicalIndex | null
  readonly distanceThreshold?: number
  readonly semanticWeight: number
  readonly defaultK: number

  constructor(semantic: SemanticIndex | null | undefined, opts: HybridRetrieverOptions = {}) {
    if (!semantic) {
      throw new IndexError('Semantic index cannot be empty')
    }
    this.semantic = semantic
    this.distanceThreshold = opts.distanceThreshold
    this.semanticWeight = Math.max(0, Math.min(1, opts.semanticWeight ?? 0.5))
    this.defaultK = opts.defaultK ?? 5
    this.lexical = buildLexicalIndex(opts.chunks, opts.buildLexical)
  }

  get hybridAvailable() {
    return this.lexical !== null
  }

  async retrieve(query: string, k: number = this.defaultK, useHybrid = true): Promise<ScoredChunk[]> {
    if (!query || !query.trim()) {
      console.warn('[retriever] empty query, skipping search')
      return []
    }
    const topK = Math.max(1, Math.floor(k))

    let results: ScoredChunk[]
    try {
      if (useHybrid && this.lexical) {
        const [lexicalHits, semanticHits] = await Promise.all([
          this.lexical.query(query, topK),
          this.semantic.query(query, topK),
        ])
        const fused = weightedReciprocalRankFusion(
          [
            { chunks: lexicalHits, weight: 1 - this.semanticWeight },
            { chunks: semanticHits, weight: this.semanticWeight },
          ],
          topK
        )
        results = fused.map((chunk) => ({ chunk }))
      } else {
        const hits = await this.semantic.queryWithDistances(query, topK)
        const threshold = this.distanceThreshold
        results = hits
          .filter((h) => threshold == null || h.distance <= threshold)
          .map((h) => ({ chunk: h.chunk, score: roundTo(h.distance, 4) }))
      }
    } catch (e) {
      console.error('[retriever] search failed:', errorMessage(e))
      throw new RetrievalError(`Failed to search documents: ${errorMessage(e)}`, { cause: e })
    }

    console.log(
      '[retriever]',
      JSON.stringify({
        stage: 'retrieved',
        mode: useHybrid && this.lexical ? 'hybrid' : 'semantic',
        chunkCount: results.length,
        question: preview(query),
      })
    )
    return results
  }

  async retrieveWithFilter(query: string, sourceFilter?: string, k?: number): Promise<ScoredChunk[]> {
    const results = await this.retrieve(query, k)
    if (!sourceFilter) return results
    const wanted = sourceFilter.toLowerCase()
    return results.filter((r) => (r.chunk.metadata.source || '').toLowerCase() === wanted)
  }
}
