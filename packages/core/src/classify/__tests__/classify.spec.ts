import { describe, it, expect } from 'vitest'
import {
  aggregateChangedLines,
  applyLevelPolicy,
  classifyChanges,
  decidePath,
  excludeRule,
  orderByPriority,
  type PathRule,
} from '..'
import { DEFAULT_REVIEW_CONFIG } from '../../config'
import { fileChange } from '../../__tests__/fixtures'

const cfg = DEFAULT_REVIEW_CONFIG

describe('classifyChanges', () => {
  it('tags excluded, high and low files in input order', () => {
    const out = classifyChanges(
      [
        fileChange('README.md'),
        fileChange('src/api/users.ts'),
        fileChange('src/util/strings.ts'),
        fileChange('docs/guide.md'),
        fileChange('src/user.service.test.ts'),
      ],
      cfg,
    )
    expect(out.map((c) => [c.change.path, c.priority])).toEqual([
      ['README.md', 'excluded'],
      ['src/api/users.ts', 'high'],
      ['src/util/strings.ts', 'low'],
      ['docs/guide.md', 'excluded'],
      ['src/user.service.test.ts', 'excluded'],
    ])
    expect(out[0]?.matchedPattern).toBe('*.md')
    expect(out[1]?.matchedKeyword).toBe('api')
    expect(out[4]?.matchedPattern).toBe('*.test.*')
  })

  it('matches directory globs against the full path', () => {
    const [c] = classifyChanges([fileChange('db/migrations/001_init.sql')], cfg)
    expect(c?.priority).toBe('excluded')
    expect(c?.matchedPattern).toBe('**/migrations/**')
  })

  it('matches keywords case-insensitively and globs case-sensitively', () => {
    const out = classifyChanges([fileChange('src/AuthGuard.ts'), fileChange('NOTES.MD')], cfg)
    expect(out.map((c) => c.priority)).toEqual(['high', 'low'])
  })

  it('accepts a replacement rule list', () => {
    const vendored: PathRule = {
      id: 'vendor',
      decide: (p) => (p.startsWith('vendor/') ? { priority: 'excluded', matchedPattern: 'vendor/' } : null),
    }
    const out = classifyChanges([fileChange('vendor/lib.js'), fileChange('src/a.js')], { ...cfg, rules: [vendored] })
    expect(out.map((c) => c.priority)).toEqual(['excluded', 'low'])
  })
})

describe('decidePath', () => {
  it('lets the first matching rule win', () => {
    const rules = [excludeRule('*.js'), excludeRule('src/**')]
    expect(decidePath('src/a.js', rules)).toEqual({ priority: 'excluded', matchedPattern: '*.js' })
  })
})

describe('orderByPriority', () => {
  it('puts high before low, keeps input order inside a tier and drops excluded files', () => {
    const classified = classifyChanges(
      [
        fileChange('src/a.ts'),
        fileChange('src/auth.ts'),
        fileChange('CHANGELOG.md'),
        fileChange('src/model.ts'),
        fileChange('src/b.ts'),
      ],
      cfg,
    )
    expect(orderByPriority(classified).map((c) => c.change.path)).toEqual([
      'src/auth.ts',
      'src/model.ts',
      'src/a.ts',
      'src/b.ts',
    ])
  })
})

describe('applyLevelPolicy', () => {
  const mixed = classifyChanges([fileChange('src/a.ts'), fileChange('src/api.ts'), fileChange('x.md')], cfg)

  it('drops low-priority files at quick when a high-priority file exists', () => {
    expect(applyLevelPolicy(mixed, 'quick', cfg.includeLowPriority).map((c) => c.change.path)).toEqual(['src/api.ts'])
  })

  it('keeps low-priority files at normal and detailed', () => {
    expect(applyLevelPolicy(mixed, 'normal', cfg.includeLowPriority)).toHaveLength(2)
    expect(applyLevelPolicy(mixed, 'detailed', cfg.includeLowPriority)).toHaveLength(2)
  })

  it('keeps low-priority files when nothing is high', () => {
    const lows = classifyChanges([fileChange('src/a.ts'), fileChange('src/b.ts')], cfg)
    expect(applyLevelPolicy(lows, 'quick', cfg.includeLowPriority)).toHaveLength(2)
  })

  it('follows a custom policy', () => {
    const policy = { quick: true, normal: false, detailed: false }
    expect(applyLevelPolicy(mixed, 'quick', policy)).toHaveLength(2)
    expect(applyLevelPolicy(mixed, 'detailed', policy)).toHaveLength(1)
  })
})

describe('aggregateChangedLines', () => {
  it('sums added and removed lines of non-excluded files', () => {
    const classified = classifyChanges(
      [
        fileChange('src/a.ts', [], { linesAdded: 10, linesRemoved: 5 }),
        fileChange('README.md', [], { linesAdded: 100, linesRemoved: 0 }),
        fileChange('src/b.ts', [], { linesAdded: 1, linesRemoved: 1 }),
      ],
      cfg,
    )
    expect(aggregateChangedLines(classified)).toBe(17)
  })
})
