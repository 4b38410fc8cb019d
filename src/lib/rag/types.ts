export type ChunkMetadata = {
  /** Original filename the text came from, e.g. "report.pdf" */
  source: string
  /** 0-based page index; absent when the loader could not tell */
  page?: number
  /** Unique within one chunk store */
  chunk_id: string
}

export type Chunk = {
  content: string
  metadata: ChunkMetadata
}

export type ScoredChunk = {
  chunk: Chunk
  /**
   * Rounded distance from a single-index similarity search.\n
   * Absent after hybrid fusion: a fused rank has no comparable magnitude.
   */
  score?: number
}

export type ConversationRole = 'user' | 'assistant'

export type ConversationTurn = {
  role: ConversationRole
  content: string
}

export type FormattedResponse = {
  answer: string
  references: string
  chunksUsed: number
  sources: string[]
}

/**
 * Anything that can rank chunks for a text query.\n
 * Fusion is written purely against this capability.
 */
export interface RankedIndex {
  query(text: string, k: number): Promise<Chunk[]>
}

export type ChunkWithDistance = {
  chunk: Chunk
  distance: number
}

export interface SemanticIndex extends RankedIndex {
  add(chunks: Chunk[]): Promise<void>
  queryWithDistances(text: string, k: number): Promise<ChunkWithDistance[]>
  size(): number
}

export interface LexicalIndex extends RankedIndex {
  size(): number
}

export interface Embedder {
  embedMany(texts: string[]): Promise<number[][]>
  embedQuery(text: string): Promise<number[]>
}

export type CompleteOptions = {
  signal?: AbortSignal
}

export interface LanguageCompleter {
  complete(prompt: string, opts?: CompleteOptions): Promise<string>
}
