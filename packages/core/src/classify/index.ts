import type { ClassifiedChange, FileChange, ReviewLevel } from '../types'
import { buildPathRules, decidePath, type PathRule } from './rules'

export * from './rules'

export interface ClassifyOptions {
  excludePatterns: readonly string[]
  highPriorityKeywords: readonly string[]
  /** Replaces the rules built from the two lists above */
  rules?: readonly PathRule[]
}

/** Tag every file high / low / excluded, preserving input order. Path-only. */
export function classifyChanges(
  changes: readonly FileChange[],
  opts: ClassifyOptions,
): ClassifiedChange[] {
  const rules = opts.rules ?? buildPathRules(opts)
  return changes.map((change) => ({ change, ...decidePath(change.path, rules) }))
}

const tierRank = { high: 0, low: 1, excluded: 2 } as const

/** High before low; stable inside a tier. Excluded files are dropped. */
export function orderByPriority(classified: readonly ClassifiedChange[]): ClassifiedChange[] {
  return classified
    .map((c, i) => ({ c, i }))
    .filter(({ c }) => c.priority !== 'excluded')
    .sort((a, b) => tierRank[a.c.priority] - tierRank[b.c.priority] || a.i - b.i)
    .map(({ c }) => c)
}

/**
 * Drop low-priority files at levels whose policy excludes them, unless no
 * high-priority file is present: a run with reviewable files never ends up
 * with an empty request because of this policy.
 */
export function applyLevelPolicy(
  classified: readonly ClassifiedChange[],
  level: ReviewLevel,
  includeLowPriority: Readonly<Record<ReviewLevel, boolean>>,
): ClassifiedChange[] {
  const kept = classified.filter((c) => c.priority !== 'excluded')
  if (includeLowPriority[level]) return kept
  const high = kept.filter((c) => c.priority === 'high')
  return high.length ? high : kept
}

export function aggregateChangedLines(classified: readonly ClassifiedChange[]): number {
  let total = 0
  for (const c of classified) {
    if (c.priority === 'excluded') continue
    total += c.change.linesAdded + c.change.linesRemoved
  }
  return total
}
