import { describe, expect, it } from 'vitest'
import { RecursiveTextSplitter, splitPages } from './chunking'

describe('RecursiveTextSplitter', () => {
  it('packs words up to the chunk size without overlap', () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 10, chunkOverlap: 0 })
    expect(splitter.splitText('aaaa bbbb cccc')).toEqual(['aaaa bbbb', 'cccc'])
  })

  it('carries trailing pieces into the next chunk as overlap', () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 10, chunkOverlap: 4 })
    expect(splitter.splitText('aaaa bbbb cccc')).toEqual(['aaaa bbbb', 'bbbb cccc'])
  })

  it('prefers paragraph breaks over spaces', () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 12, chunkOverlap: 0 })
    expect(splitter.splitText('one two\n\nthree four')).toEqual(['one two', 'three four'])
  })

  it('falls back to characters for a single long word', () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 4, chunkOverlap: 0 })
    expect(splitter.splitText('abcdefghij')).toEqual(['abcd', 'efgh', 'ij'])
  })

  it('rejects an overlap that is not below the size', () => {
    expect(() => new RecursiveTextSplitter({ chunkSize: 10, chunkOverlap: 10 })).toThrow(/chunkOverlap/)
  })

  it('is deterministic', () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 20, chunkOverlap: 5 })
    const text = 'The quick brown fox jumps over the lazy dog.\nIt was not amused.'
    expect(splitter.splitText(text)).toEqual(splitter.splitText(text))
  })
})

describe('splitPages', () => {
  it('keeps source and page per chunk and numbers ids from startIndex', () => {
    const chunks = splitPages(
      [
        { text: 'alpha beta', metadata: { source: 'a.pdf', page: 0 } },
        { text: '   ', metadata: { source: 'a.pdf', page: 1 } },
        { text: 'gamma', metadata: { source: 'a.pdf', page: 2 } },
      ],
      { chunkSize: 100, chunkOverlap: 0, startIndex: 7 }
    )
    expect(chunks).toEqual([
      { content: 'alpha beta', metadata: { source: 'a.pdf', page: 0, chunk_id: 'a.pdf_chunk_7' } },
      { content: 'gamma', metadata: { source: 'a.pdf', page: 2, chunk_id: 'a.pdf_chunk_8' } },
    ])
  })

  it('never joins text from two pages into one chunk', () => {
    const chunks = splitPages(
      [
        { text: 'x', metadata: { source: 'b.pdf', page: 0 } },
        { text: 'y', metadata: { source: 'b.pdf', page: 1 } },
      ],
      { chunkSize: 100, chunkOverlap: 0 }
    )
    expect(chunks.map((c) => [c.content, c.metadata.page])).toEqual([
      ['x', 0],
      ['y', 1],
    ])
  })

  it('omits page when the record has none', () => {
    const [chunk] = splitPages([{ text: 'z', metadata: { source: 'c.pdf' } }], { chunkSize: 10, chunkOverlap: 0 })
    expect(chunk.metadata).toEqual({ source: 'c.pdf', chunk_id: 'c.pdf_chunk_0' })
  })
})
