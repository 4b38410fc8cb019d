import { beforeEach, describe, expect, it, vi } from 'vitest'
import { DocumentIngestion } from './ingestion'
import { IndexError, IngestionError } from './errors'
import { InMemoryVectorIndex } from './vector-index'
import { FakeLoader, LetterEmbedder } from '@/test/fakes'

const loader = () =>
  new FakeLoader({
    'a.pdf': ['alpha page', 'beta page'],
    'b.pdf': ['gamma'],
    'bad.pdf': new Error('corrupt xref table'),
  })

const ingestion = (l = loader()) =>
  new DocumentIngestion({
    loader: l,
    createIndex: () => new InMemoryVectorIndex(new LetterEmbedder()),
    chunkSize: 1000,
    chunkOverlap: 0,
  })

describe('DocumentIngestion', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  it('chunks loaded pages and skips documents that fail', async () => {
    const ing = ingestion()
    const res = await ing.processPdfs(['/up/a.pdf', '/up/bad.pdf'])

    expect(res.loaded).toEqual(['/up/a.pdf'])
    expect(res.failed).toEqual([{ path: '/up/bad.pdf', error: 'corrupt xref table' }])
    expect(res.chunks).toEqual([
      { content: 'alpha page', metadata: { source: 'a.pdf', page: 0, chunk_id: 'a.pdf_chunk_0' } },
      { content: 'beta page', metadata: { source: 'a.pdf', page: 1, chunk_id: 'a.pdf_chunk_1' } },
    ])
    expect(res.index.size()).toBe(2)
  })

  it('appends later batches to the same index with continuing chunk ids', async () => {
    const ing = ingestion()
    const first = await ing.processPdfs(['/up/a.pdf'])
    const second = await ing.processPdfs(['/up/b.pdf'])

    expect(second.index).toBe(first.index)
    expect(second.newChunks.map((c) => c.metadata.chunk_id)).toEqual(['b.pdf_chunk_2'])
    expect(ing.getChunks()).toHaveLength(3)
    expect(second.index.size()).toBe(3)
  })

  it('fails when no paths are given or nothing loads', async () => {
    const ing = ingestion()
    await expect(ing.processPdfs([])).rejects.toThrow(new IngestionError('No file paths provided'))
    await expect(ing.processPdfs(['/up/bad.pdf', '/up/missing.pdf'])).rejects.toThrow(
      'No documents were successfully loaded'
    )
    expect(ing.getIndex()).toBeNull()
  })

  it('surfaces index failures and keeps prior state', async () => {
    const ing = new DocumentIngestion({
      loader: loader(),
      createIndex: () =>
        new InMemoryVectorIndex({
          embedMany: async () => {
            throw new Error('503 from embeddings')
          },
          embedQuery: async () => [],
        }),
      chunkSize: 1000,
      chunkOverlap: 0,
    })
    await expect(ing.processPdfs(['/up/a.pdf'])).rejects.toThrow(IndexError)
    expect(ing.getChunks()).toEqual([])
    expect(ing.getIndex()).toBeNull()
  })

  it('clears chunks and index', async () => {
    const ing = ingestion()
    await ing.processPdfs(['/up/a.pdf'])
    ing.clear()
    expect(ing.getChunks()).toEqual([])
    expect(ing.getIndex()).toBeNull()
  })
})
