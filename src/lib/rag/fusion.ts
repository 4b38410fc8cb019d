import type { Chunk } from './types'

export type WeightedRanking = {
  /** Best first */
  chunks: Chunk[]
  weight: number
}

export const RRF_C = 60

export function chunkKey(c: Chunk) {
  return c.metadata.chunk_id || `${c.metadata.source}\u0000${c.metadata.page ?? ''}\u0000${c.content}`
}

/**
 * Weighted reciprocal rank fusion.
 *
 * fused(d) = Σ weight_i / (c + rank_i(d)), rank 1-based.
 *
 * `c` is raised to at least `limit`, which keeps any chunk ranked by both
 * lists at equal weights ahead of every chunk ranked by only one.
 * Ties keep first-appearance order, scanning the rankings in the order given.
 */
export function weightedReciprocalRankFusion(
  rankings: WeightedRanking[],
  limit: number,
  opts: { c?: number } = {}
): Chunk[] {
  if (limit <= 0) return []
  const c = Math.max(opts.c ?? RRF_C, limit)

  const fused = new Map<string, { chunk: Chunk; score: number; order: number }>()
  let order = 0

  for (const { chunks, weight } of rankings) {
    const seen = new Set<string>()
    chunks.forEach((chunk, idx) => {
      const key = chunkKey(chunk)
      // A chunk listed twice by one index only counts at its best rank.
      if (seen.has(key)) return
      seen.add(key)
      const contribution = weight / (c + idx + 1)
      const existing = fused.get(key)
      if (existing) {
        existing.score += contribution
      } else {
        fused.set(key, { chunk, score: contribution, order: order++ })
      }
    })
  }

  return Array.from(fused.values())
    .sort((a, b) => b.score - a.score || a.order - b.order)
    .slice(0, limit)
    .map((x) => x.chunk)
}
