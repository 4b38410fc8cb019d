import type { Chunk, ChunkWithDistance, Embedder, SemanticIndex } from './types'

type StoredVector = {
  chunk: Chunk
  embedding: number[]
}

export function l2Distance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`embedding dimension mismatch: ${a.length} vs ${b.length}`)
  }
  let sum = 0
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i]
    sum += d * d
  }
  return Math.sqrt(sum)
}

/**
 * Exact nearest-neighbour search over chunk embeddings held in memory.\n
 * Distances are Euclidean (lower = closer).
 */
export class InMemoryVectorIndex implements SemanticIndex {
  private readonly records: StoredVector[] = []

  constructor(private readonly embedder: Embedder) {}

  size() {
    return this.records.length
  }

  async add(chunks: Chunk[]): Promise<void> {
    if (chunks.length === 0) return
    const embeddings = await this.embedder.embedMany(chunks.map((c) => c.content))
    if (embeddings.length !== chunks.length) {
      throw new Error(`embedder returned ${embeddings.length} vectors for ${chunks.length} chunks`)
    }
    // Only append after the whole batch embedded, so a failed add leaves the index untouched.
    chunks.forEach((chunk, i) => this.records.push({ chunk, embedding: embeddings[i] }))
  }

  async queryWithDistances(text: string, k: number): Promise<ChunkWithDistance[]> {
    if (k <= 0 || this.records.length === 0) return []
    const q = await this.embedder.embedQuery(text)
    return this.records
      .map((r, i) => ({ i, chunk: r.chunk, distance: l2Distance(q, r.embedding) }))
      .sort((a, b) => a.distance - b.distance || a.i - b.i)
      .slice(0, k)
      .map(({ chunk, distance }) => ({ chunk, distance }))
  }

  async query(text: string, k: number): Promise<Chunk[]> {
    const hits = await this.queryWithDistances(text, k)
    return hits.map((h) => h.chunk)
  }
}
