import { GoogleGenAI } from '@google/genai'
import {
  REVIEWER_SYSTEM_PROMPT,
  requireApiKey,
  toProviderError,
  type CompleteOptions,
  type ModelClient,
  type ProviderOptions,
} from '@brevity/provider-types'

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash'

export function createGeminiClient(opts: ProviderOptions = {}): ModelClient {
  const env = opts.env ?? process.env
  const apiKey = requireApiKey('gemini', opts.apiKey, ['GOOGLE_API_KEY', 'GEMINI_API_KEY'], env)
  const genAI = new GoogleGenAI({ apiKey })
  const model = opts.model || env.BREVITY_GEMINI_MODEL || DEFAULT_GEMINI_MODEL

  return {
    name: 'gemini',
    async complete(prompt: string, { maxTokens, temperature, signal }: CompleteOptions): Promise<string> {
      try {
        const result = await genAI.models.generateContent({
          model,
          contents: prompt,
          config: {
            systemInstruction: REVIEWER_SYSTEM_PROMPT,
            maxOutputTokens: maxTokens,
            temperature,
            abortSignal: signal,
          },
        })
        return (result.text ?? '').trim()
      } catch (err) {
        throw toProviderError(err, 'gemini')
      }
    },
  }
}

export default createGeminiClient
