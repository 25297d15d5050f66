import { describe, it, expect } from 'vitest'
import { buildReviewHeader, parseReviewReply } from '@brevity/core'
import { createMockClient, mockClient, mockReply } from '../index'

function makePrompt(lines: string[], file = 'src/file.ts') {
  return [buildReviewHeader('normal'), '', `### ${file} (modified, +${lines.length}/-0)`, ...lines].join('\n')
}

const opts = { maxTokens: 400, temperature: 0 }

describe('@brevity/provider-mock', () => {
  it('exposes provider name', () => {
    expect(mockClient.name).toBe('mock')
  })

  it('answers "No issues found." when nothing is flagged', async () => {
    expect(await mockClient.complete(makePrompt(['+1| const a = 1']), opts)).toBe('No issues found.')
  })

  it('flags TODOs and dynamic code execution on added lines with their location', () => {
    const reply = mockReply(makePrompt(['+3| // TODO: remove', '-4| eval(old)', '+7| run(eval(code))'], 'src/foo/bar.ts'))
    expect(reply).toBe(
      ['Note: src/foo/bar.ts:3 unresolved TODO left in code', 'Security: src/foo/bar.ts:7 dynamic code execution'].join('\n'),
    )
  })

  it('produces replies the result parser reads back', () => {
    const reply = mockReply(makePrompt(['+2| exec(cmd)'], 'src/run.py'))
    const result = parseReviewReply(reply, 'normal', { knownPaths: ['src/run.py'] })
    expect(result.summaryStatus).toBe('hasFindings')
    expect(result.findings).toEqual([
      { category: 'security', location: { path: 'src/run.py', line: 2 }, message: 'dynamic code execution' },
    ])
  })

  it('is deterministic and honours a fixed reply', async () => {
    const prompt = makePrompt(['+1| // FIXME'])
    expect(mockReply(prompt)).toBe(mockReply(prompt))
    expect(await createMockClient({ reply: 'Bug: x' }).complete(prompt, opts)).toBe('Bug: x')
  })

  it('rejects when already aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    await expect(mockClient.complete('x', { ...opts, signal: controller.signal })).rejects.toThrow('review cancelled')
  })
})
