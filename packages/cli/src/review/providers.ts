import { ReviewConfigError } from '@brevity/core'
import type { ModelClient, ProviderName, ProviderOptions } from '@brevity/provider-types'
import { createMockClient } from '@brevity/provider-mock'
import { createOpenAIClient } from '@brevity/provider-openai'
import { createClaudeClient } from '@brevity/provider-claude'
import { createGeminiClient } from '@brevity/provider-gemini'

type ClientFactory = (opts: ProviderOptions) => ModelClient

const REGISTRY = new Map<ProviderName, ClientFactory>([
  ['mock', () => createMockClient()],
  ['openai', createOpenAIClient],
  ['claude', createClaudeClient],
  ['gemini', createGeminiClient],
])

export function listProviders(): string[] {
  return Array.from(REGISTRY.keys()).sort()
}

/** Build the client for `name`; a missing API key fails here, before any request */
export function pickProvider(name: string, opts: ProviderOptions = {}): ModelClient {
  const key = name.toLowerCase()
  for (const [id, factory] of REGISTRY) {
    if (id === key) return factory(opts)
  }
  throw new ReviewConfigError(`Unknown provider "${key}". Available: ${listProviders().join(', ')}`)
}
