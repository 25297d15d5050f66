import { describe, it, expect } from 'vitest'
import { mdEscapeInline, renderMarkdown } from '../md'
import type { ReviewResult } from '../../types'

const result: ReviewResult = {
  level: 'normal',
  summaryStatus: 'hasFindings',
  estimatedTokensUsed: 321,
  findings: [
    { category: 'note', location: {}, message: 'consider a_b naming' },
    { category: 'bug', location: { path: 'src/a.ts', line: 3 }, message: 'null deref' },
  ],
}

describe('renderMarkdown', () => {
  it('groups findings by category in a fixed order', () => {
    const md = renderMarkdown(result)
    expect(md).toContain('Expected token usage: **321**')
    const bugs = md.indexOf('## 🐛 Bugs (1)')
    const notes = md.indexOf('## 💡 Notes (1)')
    expect(bugs).toBeGreaterThan(-1)
    expect(notes).toBeGreaterThan(bugs)
    expect(md).toContain('- `src/a.ts:3` null deref')
    expect(md).toContain('- consider a\\_b naming')
  })

  it('groups by file when asked', () => {
    const md = renderMarkdown(result, { groupByFile: true, title: 'Review' })
    expect(md.startsWith('# Review\n')).toBe(true)
    expect(md).toContain('## src/a.ts (1)')
    expect(md).toContain('- **bug** (line 3): null deref')
    expect(md).toContain('## (general) (1)')
  })

  it('says so when nothing was found', () => {
    const md = renderMarkdown({ level: 'quick', summaryStatus: 'clean', estimatedTokensUsed: 0, findings: [] })
    expect(md).toContain('Status: **clean**')
    expect(md.trimEnd().endsWith('> ✅ No issues found.')).toBe(true)
  })
})

describe('mdEscapeInline', () => {
  it('escapes markdown control characters', () => {
    expect(mdEscapeInline('a|b*c_d`e\\')).toBe('a\\|b\\*c\\_d\\`e\\\\')
  })
})
