import { ReviewCancelledError } from '@brevity/core'
import type { CompleteOptions, ModelClient } from '@brevity/provider-types'

export interface MockOptions {
  /** Fixed reply; when unset the reply is derived from the prompt */
  reply?: string
}

const BLOCK_RE = /^### (\S+) \(/
const LINE_RE = /^\+(?:(\d+)\| )?(.*)$/

// primitive signals so that the mock visibly "works"
const SIGNALS: ReadonlyArray<{ re: RegExp; reply: (loc: string) => string }> = [
  { re: /\b(eval|exec)\s*\(/, reply: (loc) => `Security: ${loc} dynamic code execution` },
  { re: /\b(TODO|FIXME)\b/, reply: (loc) => `Note: ${loc} unresolved TODO left in code` },
]

/** Deterministic reply for a packed prompt: one finding per flagged added line. */
export function mockReply(prompt: string): string {
  const out: string[] = []
  let path = ''
  for (const row of prompt.split('\n')) {
    const block = BLOCK_RE.exec(row)
    if (block?.[1]) {
      path = block[1]
      continue
    }
    const m = LINE_RE.exec(row)
    if (!m || !path) continue
    const loc = m[1] ? `${path}:${m[1]}` : path
    for (const s of SIGNALS) {
      if (s.re.test(m[2] ?? '')) out.push(s.reply(loc))
    }
  }
  return out.length ? out.join('\n') : 'No issues found.'
}

export function createMockClient(opts: MockOptions = {}): ModelClient {
  return {
    name: 'mock',
    async complete(prompt: string, { signal }: CompleteOptions): Promise<string> {
      if (signal?.aborted) throw new ReviewCancelledError(undefined, { cause: signal.reason })
      return opts.reply ?? mockReply(prompt)
    },
  }
}

export const mockClient: ModelClient = createMockClient()

export default mockClient
