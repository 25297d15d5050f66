import { maxTokensFor, type ReviewConfig } from './config'
import type { ReviewLevel } from './types'

/** What the model is asked to look at, per level. */
export const LEVEL_SCOPE: Readonly<Record<ReviewLevel, string>> = {
  quick: 'bugs and security issues only',
  normal: 'bugs, security issues, code quality and edge cases',
  detailed: 'bugs, security issues, code quality, edge cases, architecture and performance',
}

export type LevelReason = 'override' | 'auto' | 'default'

export interface LevelSelection {
  level: ReviewLevel
  /** Hard ceiling for the prompt builder */
  maxTokens: number
  scope: string
  reason: LevelReason
}

export interface SelectLevelInput {
  override?: ReviewLevel
  /** Added + removed lines over every non-excluded file */
  aggregateChangedLines: number
  config: ReviewConfig
}

export function levelForSize(changedLines: number, config: ReviewConfig): ReviewLevel {
  const { detailedBelow, quickAbove } = config.levelThresholds
  if (changedLines < detailedBelow) return 'detailed'
  if (changedLines > quickAbove) return 'quick'
  return 'normal'
}

export function selectLevel({ override, aggregateChangedLines, config }: SelectLevelInput): LevelSelection {
  let level: ReviewLevel
  let reason: LevelReason
  if (override) {
    level = override
    reason = 'override'
  } else if (config.autoAdjustLevel) {
    level = levelForSize(aggregateChangedLines, config)
    reason = 'auto'
  } else {
    level = config.defaultLevel
    reason = 'default'
  }
  return { level, maxTokens: maxTokensFor(config, level), scope: LEVEL_SCOPE[level], reason }
}
