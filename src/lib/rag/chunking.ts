import type { Chunk } from './types'

export type PageRecord = {
  text: string
  metadata: {
    source: string
    /** 0-based */
    page?: number
  }
}

export type ChunkingOptions = {
  chunkSize?: number
  chunkOverlap?: number
  separators?: string[]
  /** First number used in `chunk_id`; lets repeated uploads append without id collisions */
  startIndex?: number
}

export const DEFAULT_SEPARATORS = ['\n\n', '\n', ' ', '']

function joinDocs(docs: string[], separator: string): string | null {
  const text = docs.join(separator).trim()
  return text === '' ? null : text
}

/**
 * Recursive character splitter.
 *
 * - Tries separators in order, recursing into pieces still over `chunkSize`
 * - Adjacent chunks share up to `chunkOverlap` characters of trailing pieces
 * - Deterministic for identical input
 */
export class RecursiveTextSplitter {
  readonly chunkSize: number
  readonly chunkOverlap: number
  readonly separators: string[]

  constructor(opts: ChunkingOptions = {}) {
    this.chunkSize = opts.chunkSize ?? 1000
    this.chunkOverlap = opts.chunkOverlap ?? 200
    this.separators = opts.separators ?? DEFAULT_SEPARATORS
    if (this.chunkSize <= 0) throw new Error('chunkSize must be positive')
    if (this.chunkOverlap < 0 || this.chunkOverlap >= this.chunkSize) {
      throw new Error(`chunkOverlap (${this.chunkOverlap}) must be in [0, chunkSize=${this.chunkSize})`)
    }
  }

  splitText(text: string): string[] {
    return this.split(text, this.separators)
  }

  private split(text: string, separators: string[]): string[] {
    let separator = separators[separators.length - 1] ?? ''
    let rest: string[] = []
    for (let i = 0; i < separators.length; i++) {
      const s = separators[i]
      if (s === '' || text.includes(s)) {
        separator = s
        rest = separators.slice(i + 1)
        break
      }
    }

    const pieces = (separator ? text.split(separator) : Array.from(text)).filter((p) => p !== '')
    const out: string[] = []
    let good: string[] = []

    for (const piece of pieces) {
      if (piece.length < this.chunkSize) {
        good.push(piece)
        continue
      }
      if (good.length) {
        out.push(...this.merge(good, separator))
        good = []
      }
      if (rest.length === 0) {
        out.push(piece)
      } else {
        out.push(...this.split(piece, rest))
      }
    }

    if (good.length) out.push(...this.merge(good, separator))
    return out
  }

  private merge(pieces: string[], separator: string): string[] {
    const docs: string[] = []
    const current: string[] = []
    let total = 0
    const sepLen = separator.length

    for (const piece of pieces) {
      const len = piece.length
      if (total + len + (current.length > 0 ? sepLen : 0) > this.chunkSize) {
        if (current.length > 0) {
          const doc = joinDocs(current, separator)
          if (doc) docs.push(doc)
          // Drop leading pieces until what remains fits as overlap and leaves room for this piece.
          while (
            total > this.chunkOverlap ||
            (total + len + (current.length > 0 ? sepLen : 0) > this.chunkSize && total > 0)
          ) {
            const head = current.shift()
            if (head === undefined) break
            total -= head.length + (current.length > 0 ? sepLen : 0)
          }
        }
      }
      current.push(piece)
      total += len + (current.length > 1 ? sepLen : 0)
    }

    const doc = joinDocs(current, separator)
    if (doc) docs.push(doc)
    return docs
  }
}

/**
 * Split page records into chunks.\n
 * Chunks never span two pages, so every chunk keeps exactly one (source, page).
 */
export function splitPages(records: PageRecord[], opts: ChunkingOptions = {}): Chunk[] {
  const splitter = new RecursiveTextSplitter(opts)
  const chunks: Chunk[] = []
  let n = opts.startIndex ?? 0

  for (const r of records) {
    const text = (r.text || '').trim()
    if (!text) continue
    for (const content of splitter.splitText(text)) {
      const metadata: Chunk['metadata'] = {
        source: r.metadata.source,
        chunk_id: `${r.metadata.source}_chunk_${n}`,
      }
      if (typeof r.metadata.page === 'number') metadata.page = r.metadata.page
      chunks.push({ content, metadata })
      n++
    }
  }

  return chunks
}
