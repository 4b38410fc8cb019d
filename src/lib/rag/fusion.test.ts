import { describe, expect, it } from 'vitest'
import { weightedReciprocalRankFusion } from './fusion'
import { makeChunk } from '@/test/fakes'

const a = makeChunk('A', 'doc.pdf', 0, 'a')
const b = makeChunk('B', 'doc.pdf', 1, 'b')
const c = makeChunk('C', 'doc.pdf', 2, 'c')
const d = makeChunk('D', 'doc.pdf', 3, 'd')

const ids = (chunks: { metadata: { chunk_id: string } }[]) => chunks.map((x) => x.metadata.chunk_id)

describe('weightedReciprocalRankFusion', () => {
  it('puts chunks found by both lists first at equal weights', () => {
    const fused = weightedReciprocalRankFusion(
      [
        { chunks: [a, b, c], weight: 0.5 },
        { chunks: [d, a, c], weight: 0.5 },
      ],
      4
    )
    // a: ranks 1+2, c: ranks 3+3; then d (rank 1) ahead of b (rank 2)
    expect(ids(fused)).toEqual(['a', 'c', 'd', 'b'])
  })

  it('keeps dual-listed chunks ahead even at the deepest ranks', () => {
    const lexical = [b, c, a]
    const semantic = [d, c, a]
    const fused = weightedReciprocalRankFusion(
      [
        { chunks: lexical, weight: 0.5 },
        { chunks: semantic, weight: 0.5 },
      ],
      3
    )
    expect(ids(fused).slice(0, 2)).toEqual(['c', 'a'])
  })

  it('lets the heavier list win for single-listed chunks', () => {
    const fused = weightedReciprocalRankFusion(
      [
        { chunks: [a], weight: 0.2 },
        { chunks: [b], weight: 0.8 },
      ],
      2
    )
    expect(ids(fused)).toEqual(['b', 'a'])
  })

  it('breaks exact ties by first appearance', () => {
    const fused = weightedReciprocalRankFusion(
      [
        { chunks: [a], weight: 0.5 },
        { chunks: [b], weight: 0.5 },
      ],
      2
    )
    expect(ids(fused)).toEqual(['a', 'b'])
  })

  it('never returns more than the limit', () => {
    const fused = weightedReciprocalRankFusion(
      [
        { chunks: [a, b], weight: 0.5 },
        { chunks: [c, d], weight: 0.5 },
      ],
      3
    )
    expect(fused).toHaveLength(3)
    expect(weightedReciprocalRankFusion([{ chunks: [a], weight: 1 }], 0)).toEqual([])
  })

  it('is deterministic', () => {
    const rankings = [
      { chunks: [a, b, c], weight: 0.3 },
      { chunks: [c, d, b], weight: 0.7 },
    ]
    expect(ids(weightedReciprocalRankFusion(rankings, 4))).toEqual(ids(weightedReciprocalRankFusion(rankings, 4)))
  })
})
