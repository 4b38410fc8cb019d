import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { loadConfig } from '@/lib/config'
import { CitationAnswerer } from '@/lib/rag/answer'
import type { DocumentLoader } from '@/lib/pdf/loader'
import { IngestionError, NotFoundError } from '@/lib/rag/errors'
import type { LanguageCompleter } from '@/lib/rag/types'
import { InMemoryVectorIndex } from '@/lib/rag/vector-index'
import { FakeCompleter, FakeLoader, LetterEmbedder } from '@/test/fakes'
import { KeyedLock } from './keyed-lock'
import { Session, UPLOAD_FIRST_ANSWER } from './session'

const pages = {
  'doc1.pdf': ['Cats purr when content.', 'Cats sleep a lot.'],
  'doc2.pdf': ['Dogs bark at night.'],
  'bad.pdf': new Error('corrupt xref table'),
}

describe('Session', () => {
  let uploadRoot: string

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    uploadRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'rag-session-'))
  })

  afterEach(async () => {
    await fs.rm(uploadRoot, { recursive: true, force: true })
  })

  const newSession = (llm: LanguageCompleter = new FakeCompleter('Cats purr [1].')) =>
    new Session('s1', {
      config: loadConfig({ UPLOAD_DIR: uploadRoot }),
      loader: new FakeLoader(pages),
      createIndex: () => new InMemoryVectorIndex(new LetterEmbedder()),
      answerer: new CitationAnswerer(llm),
      lock: new KeyedLock(),
    })

  it('asks for an upload before any documents exist', async () => {
    const session = newSession()
    expect(await session.ask('Hi')).toEqual({ answer: UPLOAD_FIRST_ANSWER, references: '', chunksUsed: 0, sources: [] })
    expect(session.info()).toMatchObject({ session_id: 's1', has_qa_chain: false, chat_history_length: 0, total_chunks: 0 })
  })

  it('answers from uploaded documents and clears history without touching documents', async () => {
    const session = newSession()
    const added = await session.addDocuments(['/up/doc1.pdf'])
    expect(added).toEqual({ documents: ['doc1.pdf'], totalChunks: 2, failed: [] })

    const res = await session.ask('What do cats do?')
    expect(res.answer).toBe('Cats purr [1].')
    expect(res.chunksUsed).toBe(2)
    expect(res.sources).toEqual(['doc1.pdf'])
    expect(session.getChatHistory()).toHaveLength(2)

    await session.clearChat()
    expect(session.info()).toMatchObject({
      documents: ['doc1.pdf'],
      has_qa_chain: true,
      chat_history_length: 0,
      total_chunks: 2,
    })
  })

  it('keeps history when more documents arrive', async () => {
    const session = newSession()
    await session.addDocuments(['/up/doc1.pdf'])
    await session.ask('What do cats do?')

    const added = await session.addDocuments(['/up/doc2.pdf', '/up/doc1.pdf'])
    expect(added.documents).toEqual(['doc1.pdf', 'doc2.pdf'])
    expect(added.totalChunks).toBe(5)
    expect(session.getChatHistory()).toHaveLength(2)
  })

  it('lists only documents that loaded', async () => {
    const session = newSession()
    const added = await session.addDocuments(['/up/doc1.pdf', '/up/bad.pdf'])
    expect(added.documents).toEqual(['doc1.pdf'])
    expect(added.failed).toEqual([{ path: '/up/bad.pdf', error: 'corrupt xref table' }])
  })

  it('stays without a conversation when nothing loads', async () => {
    const session = newSession()
    await expect(session.addDocuments(['/up/bad.pdf'])).rejects.toThrow(IngestionError)
    expect(session.info().has_qa_chain).toBe(false)
    expect(session.getDocuments()).toEqual([])
  })

  it('runs operations on one session one at a time', async () => {
    let release: () => void = () => {}
    const gate = new Promise<void>((r) => {
      release = r
    })
    const slow: LanguageCompleter = {
      complete: async () => {
        await gate
        return 'Slow answer [1].'
      },
    }
    const session = newSession(slow)
    await session.addDocuments(['/up/doc1.pdf'])

    const asking = session.ask('What do cats do?')
    const clearing = session.clearChat()
    release()
    await Promise.all([asking, clearing])

    // The clear was queued behind the question, so it wipes the turns the question added.
    expect(session.getChatHistory()).toEqual([])
  })

  it('saves uploads under its own directory and ingests them', async () => {
    const session = newSession()
    const added = await session.upload([
      { name: 'doc1.pdf', bytes: new Uint8Array([37, 80, 68, 70]) },
      { name: 'doc2.pdf', bytes: new Uint8Array([1]) },
    ])
    expect(added).toEqual({ documents: ['doc1.pdf', 'doc2.pdf'], totalChunks: 3, failed: [] })
    expect(Array.from(await fs.readFile(path.join(uploadRoot, 's1', 'doc1.pdf')))).toEqual([37, 80, 68, 70])

    await session.cleanup()
    await expect(fs.stat(session.uploadDir)).rejects.toThrow()
    expect(session.info()).toMatchObject({ documents: [], has_qa_chain: false, total_chunks: 0 })
  })

  it('refuses work once cleaned up', async () => {
    const session = newSession()
    await session.addDocuments(['/up/doc1.pdf'])
    await session.cleanup()

    await expect(session.ask('Anything?')).rejects.toThrow(new NotFoundError('Session not found: s1'))
    await expect(session.addDocuments(['/up/doc1.pdf'])).rejects.toThrow(NotFoundError)
    await expect(session.upload([{ name: 'doc2.pdf', bytes: new Uint8Array([1]) }])).rejects.toThrow(NotFoundError)
    await expect(session.clearChat()).rejects.toThrow(NotFoundError)
    await expect(fs.stat(session.uploadDir)).rejects.toThrow()
  })

  it('finishes an upload in progress before cleaning up', async () => {
    let release: () => void = () => {}
    const gate = new Promise<void>((r) => {
      release = r
    })
    const inner = new FakeLoader(pages)
    const loader: DocumentLoader = {
      load: async (filePath) => {
        await gate
        return inner.load(filePath)
      },
    }
    const session = new Session('s1', {
      config: loadConfig({ UPLOAD_DIR: uploadRoot }),
      loader,
      createIndex: () => new InMemoryVectorIndex(new LetterEmbedder()),
      answerer: new CitationAnswerer(new FakeCompleter()),
      lock: new KeyedLock(),
    })

    const uploading = session.upload([
      { name: 'doc1.pdf', bytes: new Uint8Array([1]) },
      { name: 'doc2.pdf', bytes: new Uint8Array([2]) },
    ])
    const cleaning = session.cleanup()
    release()

    expect((await uploading).documents).toEqual(['doc1.pdf', 'doc2.pdf'])
    await cleaning
    await expect(fs.stat(session.uploadDir)).rejects.toThrow()
    expect(session.info().documents).toEqual([])
  })
})
