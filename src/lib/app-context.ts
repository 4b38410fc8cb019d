import { loadConfig, type AppConfig } from '@/lib/config'
import { resolveAIConfig } from '@/lib/ai/config'
import { createAiSdkCompleter, getChatModel } from '@/lib/ai/openai'
import { createHttpEmbedder, getEmbeddingConfig } from '@/lib/ai/embeddings'
import { PdfLoader } from '@/lib/pdf/loader'
import { CitationAnswerer } from '@/lib/rag/answer'
import type { LanguageCompleter } from '@/lib/rag/types'
import { InMemoryVectorIndex } from '@/lib/rag/vector-index'
import { SessionRegistry, createSessionFactory } from '@/lib/session/registry'

export type AppContext = {
  config: AppConfig
  registry: SessionRegistry
}

/**
 * Wire the production collaborators.\n
 * The chat model is built on first use, so a missing key fails the first
 * question rather than process start.
 */
export function createAppContext(env: Record<string, string | undefined> = process.env): AppContext {
  const config = loadConfig(env)
  const aiConfig = resolveAIConfig(env)
  const embedder = createHttpEmbedder(getEmbeddingConfig(env))

  let completer: LanguageCompleter | null = null
  const lazyCompleter: LanguageCompleter = {
    async complete(prompt, opts) {
      const c = (completer ??= createAiSdkCompleter(getChatModel(aiConfig), {
        temperature: aiConfig.temperature,
        timeoutMs: config.llmTimeoutMs,
      }))
      return c.complete(prompt, opts)
    },
  }

  const registry = new SessionRegistry(
    createSessionFactory({
      config,
      loader: new PdfLoader(),
      createIndex: () => new InMemoryVectorIndex(embedder),
      answerer: new CitationAnswerer(lazyCompleter),
    })
  )

  return { config, registry }
}

export type ShutdownHost = {
  once(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown
  exit(code?: number): void
}

/**
 * Delete every session, and with it every upload directory, when the
 * process is asked to stop.
 */
export function registerShutdown(registry: Pick<SessionRegistry, 'cleanupAll'>, host: ShutdownHost = process) {
  const shutdown = (signal: string) => {
    console.log('[app]', JSON.stringify({ stage: 'shutdown', signal }))
    void registry.cleanupAll().then(
      () => host.exit(0),
      (e: unknown) => {
        console.error('[app] shutdown cleanup failed:', e)
        host.exit(1)
      }
    )
  }
  host.once('SIGINT', () => shutdown('SIGINT'))
  host.once('SIGTERM', () => shutdown('SIGTERM'))
}

let defaultContext: AppContext | null = null

/** Process-wide context used by the route modules. */
export function getAppContext(): AppContext {
  if (!defaultContext) {
    defaultContext = createAppContext()
    registerShutdown(defaultContext.registry)
  }
  return defaultContext
}
