import path from 'node:path'

type Env = Record<string, string | undefined>

function envNum(env: Env, name: string, def: number) {
  const raw = env[name]
  if (raw == null || raw.trim() === '') return def
  const v = Number(raw)
  return Number.isFinite(v) ? v : def
}

function envOptionalNum(env: Env, name: string) {
  const raw = env[name]
  if (raw == null || raw.trim() === '') return undefined
  const v = Number(raw)
  return Number.isFinite(v) ? v : undefined
}

function envStr(env: Env, name: string, def: string) {
  const v = env[name]
  return v && v.trim() ? v.trim() : def
}

export type AppConfig = {
  chunkSize: number
  chunkOverlap: number
  topK: number
  semanticWeight: number
  distanceThreshold?: number
  uploadDir: string
  maxUploadBytes: number
  llmTimeoutMs: number
  embeddingTimeoutMs: number
}

export function loadConfig(env: Env = process.env): AppConfig {
  const chunkSize = Math.max(1, Math.floor(envNum(env, 'CHUNK_SIZE', 1000)))
  const overlapRaw = Math.max(0, Math.floor(envNum(env, 'CHUNK_OVERLAP', 200)))
  // Overlap must stay strictly below the chunk size or the splitter never advances.
  const chunkOverlap = Math.min(overlapRaw, chunkSize - 1)
  const semanticWeight = Math.max(0, Math.min(1, envNum(env, 'SEMANTIC_WEIGHT', 0.5)))

  return Object.freeze({
    chunkSize,
    chunkOverlap,
    topK: Math.max(1, Math.floor(envNum(env, 'TOP_K_RESULTS', 5))),
    semanticWeight,
    distanceThreshold: envOptionalNum(env, 'DISTANCE_THRESHOLD'),
    uploadDir: path.resolve(envStr(env, 'UPLOAD_DIR', path.join(process.cwd(), 'uploads'))),
    maxUploadBytes: envNum(env, 'MAX_UPLOAD_BYTES', 50 * 1024 * 1024),
    llmTimeoutMs: envNum(env, 'LLM_TIMEOUT_MS', 60_000),
    embeddingTimeoutMs: envNum(env, 'EMBEDDING_TIMEOUT_MS', 30_000),
  })
}
