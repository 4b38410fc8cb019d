import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createHttpEmbedder, getEmbeddingConfig, type EmbeddingConfig } from './embeddings'

const config: EmbeddingConfig = {
  baseURL: 'http://embeddings.test/v1/',
  apiKey: 'test-secret',
  model: 'test-embedding',
  batchSize: 2,
  timeoutMs: 1000,
  maxAttempts: 2,
  retryBaseMs: 0,
}

type FetchArgs = [input: string | URL | Request, init?: RequestInit]

function mockFetch(...responses: Array<() => Response>) {
  const fn = vi.fn(async (..._args: FetchArgs) => {
    const next = responses.shift()
    if (!next) throw new Error('unexpected fetch')
    return next()
  })
  vi.stubGlobal('fetch', fn)
  return fn
}

const ok = (data: unknown) => () => new Response(JSON.stringify({ data }), { status: 200 })

describe('getEmbeddingConfig', () => {
  it('falls back to the chat credentials and clamps batch size', () => {
    expect(getEmbeddingConfig({ AI_API_KEY: 'test-secret', RAG_EMBEDDING_BATCH_SIZE: '1000' })).toEqual({
      baseURL: 'https://api.openai.com/v1',
      apiKey: 'test-secret',
      model: 'text-embedding-3-small',
      batchSize: 128,
      timeoutMs: 30000,
      maxAttempts: 4,
      retryBaseMs: 300,
    })
  })
})

describe('createHttpEmbedder', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('posts batches and orders vectors by index', async () => {
    const fetch = mockFetch(
      ok([
        { embedding: [0, 1], index: 1 },
        { embedding: [1, 0], index: 0 },
      ]),
      ok([{ embedding: [1, 1], index: 0 }])
    )

    const vectors = await createHttpEmbedder(config).embedMany(['a', 'b', 'c'])
    expect(vectors).toEqual([
      [1, 0],
      [0, 1],
      [1, 1],
    ])

    expect(fetch).toHaveBeenCalledTimes(2)
    const [url, init] = fetch.mock.calls[0]
    expect(url).toBe('http://embeddings.test/v1/embeddings')
    expect(JSON.parse(String(init?.body))).toEqual({ model: 'test-embedding', input: ['a', 'b'] })
  })

  it('retries a rate-limited request', async () => {
    const fetch = mockFetch(() => new Response('slow down', { status: 429 }), ok([{ embedding: [2], index: 0 }]))
    expect(await createHttpEmbedder(config).embedQuery('q')).toEqual([2])
    expect(fetch).toHaveBeenCalledTimes(2)
  })

  it('does not retry client errors', async () => {
    const fetch = mockFetch(() => new Response('bad model', { status: 400 }))
    await expect(createHttpEmbedder(config).embedQuery('q')).rejects.toThrow(
      'embeddings request failed: status=400 body=bad model'
    )
    expect(fetch).toHaveBeenCalledTimes(1)
  })

  it('gives up when items stay missing', async () => {
    mockFetch(ok([{ embedding: [1], index: 0 }]), ok([{ embedding: [1], index: 0 }]))
    await expect(createHttpEmbedder(config).embedMany(['a', 'b'])).rejects.toThrow(
      'embeddings response missing 1 of 2 items'
    )
  })

  it('needs an API key', async () => {
    const fetch = mockFetch()
    await expect(createHttpEmbedder({ ...config, apiKey: '' }).embedQuery('q')).rejects.toThrow(
      'Missing embeddings API key'
    )
    expect(fetch).not.toHaveBeenCalled()
  })
})
