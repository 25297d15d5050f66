import OpenAI from 'openai'
import {
  REVIEWER_SYSTEM_PROMPT,
  requireApiKey,
  toProviderError,
  type CompleteOptions,
  type ModelClient,
  type ProviderOptions,
} from '@brevity/provider-types'

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini'

export function createOpenAIClient(opts: ProviderOptions = {}): ModelClient {
  const env = opts.env ?? process.env
  const apiKey = requireApiKey('openai', opts.apiKey, ['OPENAI_API_KEY', 'OPENAI_KEY'], env)
  const client = new OpenAI({ apiKey, baseURL: opts.baseURL, maxRetries: opts.maxRetries })
  const model = opts.model || env.BREVITY_OPENAI_MODEL || DEFAULT_OPENAI_MODEL

  return {
    name: 'openai',
    async complete(prompt: string, { maxTokens, temperature, signal }: CompleteOptions): Promise<string> {
      try {
        const resp = await client.chat.completions.create(
          {
            model,
            temperature,
            max_tokens: maxTokens,
            messages: [
              { role: 'system', content: REVIEWER_SYSTEM_PROMPT },
              { role: 'user', content: prompt },
            ],
          },
          { signal },
        )
        return (resp.choices[0]?.message.content ?? '').trim()
      } catch (err) {
        throw toProviderError(err, 'openai')
      }
    },
  }
}

export default createOpenAIClient
