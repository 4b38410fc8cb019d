import type { Embedder } from '@/lib/rag/types'

type OpenAIEmbeddingResponse = {
  data?: Array<{
    embedding?: number[]
    index?: number
  }>
  error?: {
    message?: string
    type?: string
    code?: string | number
  }
}

export type EmbeddingConfig = {
  baseURL: string
  apiKey: string
  model: string
  batchSize: number
  timeoutMs: number
  maxAttempts: number
  retryBaseMs: number
}

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms))
}

export function getEmbeddingConfig(env: Record<string, string | undefined> = process.env): EmbeddingConfig {
  const baseURL = env.RAG_EMBEDDING_BASE_URL || env.AI_BASE_URL || 'https://api.openai.com/v1'
  const apiKey = env.RAG_EMBEDDING_API_KEY || env.AI_API_KEY || env.OPENAI_API_KEY || ''
  const model = env.RAG_EMBEDDING_MODEL || 'text-embedding-3-small'
  const batchSize = Number(env.RAG_EMBEDDING_BATCH_SIZE || '32')
  const timeoutMs = Number(env.EMBEDDING_TIMEOUT_MS || '30000')
  return {
    baseURL,
    apiKey,
    model,
    batchSize: Number.isFinite(batchSize) && batchSize > 0 ? Math.min(batchSize, 128) : 32,
    timeoutMs: Number.isFinite(timeoutMs) && timeoutMs > 0 ? timeoutMs : 30000,
    maxAttempts: 4,
    retryBaseMs: 300,
  }
}

async function requestEmbeddings(config: EmbeddingConfig, inputs: string[], attempt: number): Promise<number[][]> {
  const { baseURL, apiKey, model } = config
  if (!apiKey) {
    throw new Error('Missing embeddings API key: set RAG_EMBEDDING_API_KEY or AI_API_KEY')
  }

  const res = await fetch(`${baseURL.replace(/\/+$/, '')}/embeddings`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${apiKey}`,
    },
    body: JSON.stringify({
      model,
      input: inputs,
    }),
    signal: AbortSignal.timeout(config.timeoutMs),
  })

  if (!res.ok) {
    const text = await res.text().catch(() => '')
    const retryable = res.status === 429 || res.status >= 500
    if (retryable && attempt < config.maxAttempts) {
      await sleep(config.retryBaseMs * Math.pow(2, attempt - 1))
      return requestEmbeddings(config, inputs, attempt + 1)
    }
    throw new Error(`embeddings request failed: status=${res.status} body=${text.slice(0, 500)}`)
  }

  const json: OpenAIEmbeddingResponse = await res.json()
  const data = Array.isArray(json?.data) ? json.data : []
  const embeddings: Array<number[] | undefined> = new Array(inputs.length)

  for (let i = 0; i < data.length; i++) {
    const item = data[i]
    const idx = typeof item?.index === 'number' ? item.index : i
    if (idx >= 0 && idx < inputs.length && Array.isArray(item?.embedding)) {
      embeddings[idx] = item.embedding
    }
  }

  const missing: number[] = []
  for (let i = 0; i < embeddings.length; i++) {
    if (!embeddings[i]) missing.push(i)
  }

  // Some providers return fewer items even with 200 OK; treat as retryable.
  if (missing.length > 0) {
    console.warn(
      '[embeddings] missing items',
      JSON.stringify({
        attempt,
        model,
        inputCount: inputs.length,
        returnedCount: data.length,
        missingCount: missing.length,
        missingIndexes: missing.slice(0, 12),
        errorMessage: json?.error?.message?.slice(0, 160),
      })
    )

    if (attempt < config.maxAttempts) {
      await sleep(config.retryBaseMs * Math.pow(2, attempt - 1))
      return requestEmbeddings(config, inputs, attempt + 1)
    }
    throw new Error(`embeddings response missing ${missing.length} of ${inputs.length} items`)
  }

  return embeddings.map((e) => e ?? [])
}

export function createHttpEmbedder(config: EmbeddingConfig): Embedder {
  const embedMany = async (texts: string[]): Promise<number[][]> => {
    const out: number[][] = []
    for (let i = 0; i < texts.length; i += config.batchSize) {
      const batch = texts.slice(i, i + config.batchSize)
      const embs = await requestEmbeddings(config, batch, 1)
      out.push(...embs)
    }
    return out
  }

  return {
    embedMany,
    async embedQuery(text: string) {
      const [emb] = await embedMany([text])
      return emb
    },
  }
}
