import type { DocumentLoader } from '@/lib/pdf/loader'
import type { Chunk, SemanticIndex } from './types'
import { splitPages, type PageRecord } from './chunking'
import { IndexError, IngestionError, errorMessage } from './errors'

export type IngestionOptions = {
  loader: DocumentLoader
  createIndex: () => SemanticIndex
  chunkSize: number
  chunkOverlap: number
}

export type IngestionResult = {
  index: SemanticIndex
  /** Every chunk ingested so far, oldest first */
  chunks: Chunk[]
  newChunks: Chunk[]
  /** Paths that loaded; failures were skipped */
  loaded: string[]
  failed: Array<{ path: string; error: string }>
}

/**
 * Accumulating chunk store + semantic index for one session.\n
 * Each call appends; nothing is re-indexed.
 */
export class DocumentIngestion {
  private index: SemanticIndex | null = null
  private chunks: Chunk[] = []

  constructor(private readonly opts: IngestionOptions) {}

  async loadMany(filePaths: string[]) {
    if (!filePaths.length) {
      throw new IngestionError('No file paths provided')
    }

    const records: PageRecord[] = []
    const loaded: string[] = []
    const failed: Array<{ path: string; error: string }> = []

    for (const p of filePaths) {
      try {
        const pages = await this.opts.loader.load(p)
        records.push(...pages)
        loaded.push(p)
      } catch (e) {
        console.warn(`[ingest] skipping ${p}: ${errorMessage(e)}`)
        failed.push({ path: p, error: errorMessage(e) })
      }
    }

    if (!loaded.length) {
      throw new IngestionError('No documents were successfully loaded')
    }

    console.log('[ingest]', JSON.stringify({ stage: 'loaded', pages: records.length, loaded: loaded.length, failed: failed.length }))
    return { records, loaded, failed }
  }

  async processPdfs(filePaths: string[]): Promise<IngestionResult> {
    const { records, loaded, failed } = await this.loadMany(filePaths)

    const newChunks = splitPages(records, {
      chunkSize: this.opts.chunkSize,
      chunkOverlap: this.opts.chunkOverlap,
      startIndex: this.chunks.length,
    })
    console.log('[ingest]', JSON.stringify({ stage: 'chunked', chunkCount: newChunks.length }))

    const index = this.index ?? this.opts.createIndex()
    try {
      await index.add(newChunks)
    } catch (e) {
      console.error('[ingest] failed to add chunks to vector index:', errorMessage(e))
      throw new IndexError(`Failed to update vector index: ${errorMessage(e)}`, { cause: e })
    }

    this.index = index
    this.chunks = [...this.chunks, ...newChunks]

    return { index, chunks: this.chunks, newChunks, loaded, failed }
  }

  getChunks(): Chunk[] {
    return this.chunks
  }

  getIndex(): SemanticIndex | null {
    return this.index
  }

  clear() {
    this.index = null
    this.chunks = []
    console.log('[ingest] cleared vector index and chunks')
  }
}
