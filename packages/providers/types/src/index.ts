import { ProviderError, ReviewConfigError, type ProviderErrorKind } from '@brevity/core'

export type { CompleteOptions, ModelClient } from '@brevity/core'

/**
 * Normalized, provider-agnostic options for a model backend. Anything left
 * out falls back to the environment, then to the backend's default.
 */
export interface ProviderOptions {
  apiKey?: string
  model?: string
  /** Override the API endpoint (proxies, compatible gateways) */
  baseURL?: string
  /** SDK-level retries; the review pipeline itself never retries */
  maxRetries?: number
  env?: NodeJS.ProcessEnv
}

export type ProviderName = 'openai' | 'claude' | 'gemini' | 'mock'

/** Sent as the system message by every remote backend */
export const REVIEWER_SYSTEM_PROMPT = 'You are an expert code reviewer. Provide concise, actionable feedback.'

/**
 * First non-empty key from `explicit` or the listed env vars. A missing key
 * is a configuration problem, reported before any request is made.
 */
export function requireApiKey(
  provider: string,
  explicit: string | undefined,
  envNames: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (explicit) return explicit
  for (const name of envNames) {
    const v = env[name]
    if (v) return v
  }
  throw new ReviewConfigError(`[provider-${provider}] ${envNames.join(' or ')} is required (env var not set).`)
}

function readField(err: unknown, key: string): unknown {
  return typeof err === 'object' && err !== null && key in err ? Reflect.get(err, key) : undefined
}

const NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET'])
const CONNECTION_NAMES = new Set(['APIConnectionError', 'APIConnectionTimeoutError', 'FetchError'])
const ABORT_NAMES = new Set(['AbortError', 'APIUserAbortError'])

export function kindForStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return 'invalid-credential'
  if (status === 429 || status === 402) return 'quota'
  if (status === 400 || status === 404 || status === 422) return 'unsupported'
  if (status === 408 || status >= 500) return 'network'
  return 'unknown'
}

/**
 * Map whatever an SDK threw onto a `ProviderError`. Reads `status`, `code`
 * and `name` structurally so every SDK's error classes are covered.
 */
export function toProviderError(err: unknown, provider: string): ProviderError {
  if (err instanceof ProviderError) return err
  const message = err instanceof Error ? err.message : String(err)
  const options = { cause: err }

  const status = readField(err, 'status')
  if (typeof status === 'number') {
    return new ProviderError(kindForStatus(status), provider, message, status, options)
  }

  const name = readField(err, 'name')
  if (typeof name === 'string') {
    if (ABORT_NAMES.has(name)) return new ProviderError('timeout', provider, message, undefined, options)
    if (CONNECTION_NAMES.has(name)) return new ProviderError('network', provider, message, undefined, options)
  }

  const code = readField(err, 'code') ?? readField(readField(err, 'cause'), 'code')
  if (typeof code === 'string' && NETWORK_CODES.has(code)) {
    return new ProviderError('network', provider, message, undefined, options)
  }

  return new ProviderError('unknown', provider, message, undefined, options)
}
