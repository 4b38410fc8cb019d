import fs from 'node:fs/promises'
import path from 'node:path'
import { extractText, getDocumentProxy } from 'unpdf'
import type { PageRecord } from '@/lib/rag/chunking'
import { DocumentLoadError, errorMessage } from '@/lib/rag/errors'

export interface DocumentLoader {
  load(filePath: string): Promise<PageRecord[]>
}

/**
 * Turn extracted page strings into page records (0-based page, source = basename).
 */
export function toPageRecords(pageTexts: string[], source: string): PageRecord[] {
  return pageTexts.map((raw, i) => ({
    text: String(raw || '')
      .replace(/[ \t\f\v]+/g, ' ')
      .replace(/\n{3,}/g, '\n\n')
      .trim(),
    metadata: { source, page: i },
  }))
}

export class PdfLoader implements DocumentLoader {
  async load(filePath: string): Promise<PageRecord[]> {
    const source = path.basename(filePath)

    let buffer: Buffer
    try {
      buffer = await fs.readFile(filePath)
    } catch (e) {
      throw new DocumentLoadError(`PDF file not found: ${filePath}`, { cause: e })
    }

    try {
      const pdf = await getDocumentProxy(new Uint8Array(buffer))
      const { text, totalPages } = await extractText(pdf, { mergePages: false })
      const pageTexts = Array.isArray(text) ? text : [text]
      console.log('[ingest]', JSON.stringify({ stage: 'pdf_loaded', source, totalPages }))
      return toPageRecords(pageTexts, source)
    } catch (e) {
      console.error(`[ingest] failed to load PDF ${source}:`, errorMessage(e))
      throw new DocumentLoadError(`Failed to load PDF: ${errorMessage(e)}`, { cause: e })
    }
  }
}
