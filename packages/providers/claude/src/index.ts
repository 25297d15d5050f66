import Anthropic from '@anthropic-ai/sdk'
import {
  REVIEWER_SYSTEM_PROMPT,
  requireApiKey,
  toProviderError,
  type CompleteOptions,
  type ModelClient,
  type ProviderOptions,
} from '@brevity/provider-types'

export const DEFAULT_CLAUDE_MODEL = 'claude-sonnet-4-20250514'

export function createClaudeClient(opts: ProviderOptions = {}): ModelClient {
  const env = opts.env ?? process.env
  const apiKey = requireApiKey('claude', opts.apiKey, ['ANTHROPIC_API_KEY'], env)
  const client = new Anthropic({ apiKey, baseURL: opts.baseURL, maxRetries: opts.maxRetries })
  const model = opts.model || env.BREVITY_CLAUDE_MODEL || DEFAULT_CLAUDE_MODEL

  return {
    name: 'claude',
    async complete(prompt: string, { maxTokens, temperature, signal }: CompleteOptions): Promise<string> {
      try {
        const response = await client.messages.create(
          {
            model,
            max_tokens: maxTokens,
            temperature,
            system: REVIEWER_SYSTEM_PROMPT,
            messages: [{ role: 'user', content: prompt }],
          },
          { signal },
        )
        return response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('')
          .trim()
      } catch (err) {
        throw toProviderError(err, 'claude')
      }
    },
  }
}

export default createClaudeClient
