import picomatch from 'picomatch'
import type { PriorityTag } from '../types'

export interface PathDecision {
  priority: PriorityTag
  matchedPattern?: string
  matchedKeyword?: string
}

/** Ordered predicate → decision rule over a file path. */
export interface PathRule {
  id: string
  decide(path: string): PathDecision | null
}

/**
 * Case-sensitive glob. A pattern without `/` is matched against the basename,
 * so `*.md` catches `docs/guide.md` as well as `README.md`.
 */
export function excludeRule(pattern: string): PathRule {
  const isMatch = picomatch(pattern, { dot: true, basename: !pattern.includes('/') })
  return {
    id: `exclude:${pattern}`,
    decide: (path) => (isMatch(path) ? { priority: 'excluded', matchedPattern: pattern } : null),
  }
}

export function keywordRule(keywords: readonly string[]): PathRule {
  const lowered = keywords.map((k) => k.toLowerCase()).filter(Boolean)
  return {
    id: 'high-priority-keywords',
    decide: (path) => {
      const p = path.toLowerCase()
      const hit = lowered.find((k) => p.includes(k))
      return hit ? { priority: 'high', matchedKeyword: hit } : null
    },
  }
}

export const fallbackRule: PathRule = {
  id: 'fallback-low',
  decide: () => ({ priority: 'low' }),
}

export function buildPathRules(opts: {
  excludePatterns: readonly string[]
  highPriorityKeywords: readonly string[]
}): PathRule[] {
  return [
    ...opts.excludePatterns.map(excludeRule),
    keywordRule(opts.highPriorityKeywords),
    fallbackRule,
  ]
}

export function decidePath(path: string, rules: readonly PathRule[]): PathDecision {
  for (const rule of rules) {
    const d = rule.decide(path)
    if (d) return d
  }
  return { priority: 'low' }
}
