import { type EncodingType, EncodingTypeSchema } from './request/parameters'

export const DEFAULT_BASE_URL = 'https://opentdb.com'

export type ClientConfig = {
  baseUrl: string
  encoding: EncodingType
  useSessionToken: boolean
}

function parseBaseUrl(value: string | undefined): string {
  const trimmed = value?.trim()
  if (!trimmed) return DEFAULT_BASE_URL
  try {
    new URL(trimmed)
  } catch {
    return DEFAULT_BASE_URL
  }
  return trimmed.replace(/\/+$/, '')
}

function parseEncoding(value: string | undefined): EncodingType {
  const parsed = EncodingTypeSchema.safeParse(value?.trim())
  return parsed.success ? parsed.data : 'html'
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  const normalized = value?.trim().toLowerCase()
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true
  return fallback
}

export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  return {
    baseUrl: parseBaseUrl(env.TRIVIA_API_BASE_URL),
    encoding: parseEncoding(env.TRIVIA_ENCODING),
    useSessionToken: parseFlag(env.TRIVIA_USE_SESSION_TOKEN, true),
  }
}
