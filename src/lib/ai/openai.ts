import { generateText } from 'ai'
import { createOpenAI } from '@ai-sdk/openai'
import { createGoogleGenerativeAI } from '@ai-sdk/google'
import { createOpenRouter } from '@openrouter/ai-sdk-provider'
import type { LanguageCompleter } from '@/lib/rag/types'
import { type AIConfig, type ApiProvider, DEFAULT_BASE_URLS } from './config'

export type ChatModel = Parameters<typeof generateText>[0]['model']

// OpenAI, OpenRouter and custom endpoints all speak the OpenAI format
function getSDKType(provider: ApiProvider): 'google' | 'openai' {
  return provider === 'google' ? 'google' : 'openai'
}

/**
 * Build the chat model for the configured provider.\n
 * Throws when no API key is configured.
 */
export function getChatModel(config: AIConfig): ChatModel {
  const { provider, model, apiKey, baseURL } = config
  if (!apiKey) {
    throw new Error(`Missing API key for provider "${provider}": set AI_API_KEY`)
  }

  console.log(`[AI Client] provider=${provider}, model=${model}`)

  if (getSDKType(provider) === 'google') {
    const google = createGoogleGenerativeAI({
      apiKey,
      baseURL: baseURL || DEFAULT_BASE_URLS.google,
    })
    return google(model)
  }

  if (provider === 'openrouter') {
    const openrouter = createOpenRouter({ apiKey })
    return openrouter.chat(model)
  }

  const openai = createOpenAI({
    apiKey,
    baseURL: baseURL || DEFAULT_BASE_URLS.openai,
  })
  return openai.chat(model)
}

/**
 * Adapt an AI SDK model to the `complete(prompt)` seam used by the answerer.\n
 * Each call is bounded by `timeoutMs`; a caller-provided signal aborts it earlier.
 */
export function createAiSdkCompleter(
  model: ChatModel,
  opts: { temperature?: number; timeoutMs: number; maxOutputTokens?: number }
): LanguageCompleter {
  const temperature = opts.temperature ?? 0
  return {
    async complete(prompt, callOpts) {
      const timeout = AbortSignal.timeout(opts.timeoutMs)
      const abortSignal = callOpts?.signal ? AbortSignal.any([callOpts.signal, timeout]) : timeout
      const res = await generateText({
        model,
        prompt,
        temperature,
        maxOutputTokens: opts.maxOutputTokens ?? 2048,
        abortSignal,
      })
      return res.text
    },
  }
}
