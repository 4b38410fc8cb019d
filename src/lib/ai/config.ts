// ============================================================
// AI model configuration
// Provider types, defaults and env resolution live here
// ============================================================

export type ApiProvider = 'google' | 'openai' | 'openrouter' | 'custom'

export interface AIConfig {
  provider: ApiProvider
  model: string
  apiKey: string
  baseURL: string
  temperature: number
}

export const DEFAULT_BASE_URLS: Record<ApiProvider, string> = {
  google: 'https://generativelanguage.googleapis.com/v1beta',
  openai: 'https://api.openai.com/v1',
  openrouter: 'https://openrouter.ai/api/v1',
  custom: '',
}

export const DEFAULT_MODELS: Record<ApiProvider, string> = {
  google: 'gemini-2.0-flash-lite',
  openai: 'gpt-4o-mini',
  openrouter: 'openai/gpt-4o-mini',
  custom: 'gpt-4o-mini',
}

// Env var checked for the key when AI_API_KEY is not set
const PROVIDER_KEY_ENV: Record<ApiProvider, string> = {
  google: 'GOOGLE_GENERATIVE_AI_API_KEY',
  openai: 'OPENAI_API_KEY',
  openrouter: 'OPENROUTER_API_KEY',
  custom: 'OPENAI_API_KEY',
}

function isApiProvider(v: string): v is ApiProvider {
  return v === 'google' || v === 'openai' || v === 'openrouter' || v === 'custom'
}

// Google sometimes reports model names with a models/ prefix
export function normalizeModelId(modelId: string): string {
  return modelId.startsWith('models/') ? modelId.slice('models/'.length) : modelId
}

export function resolveAIConfig(env: Record<string, string | undefined> = process.env): AIConfig {
  const rawProvider = String(env.AI_PROVIDER || '').trim().toLowerCase()
  const provider: ApiProvider = isApiProvider(rawProvider) ? rawProvider : 'openai'

  const model = normalizeModelId(String(env.MODEL_NAME || '').trim() || DEFAULT_MODELS[provider])
  const apiKey = String(env.AI_API_KEY || env[PROVIDER_KEY_ENV[provider]] || '').trim()
  const baseURL = String(env.AI_BASE_URL || '').trim() || DEFAULT_BASE_URLS[provider]

  return { provider, model, apiKey, baseURL, temperature: 0 }
}
