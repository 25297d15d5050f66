import { LEVEL_SCOPE } from '../level'
import type { ReviewLevel } from '../types'

export const REPLY_CATEGORIES = ['Bug', 'Security', 'Performance', 'Architecture', 'Style', 'Note'] as const

/**
 * Fixed instruction placed before the diff. Kept short: it is paid for out of
 * the same ceiling as the code, and the quick ceiling is 150 tokens.
 */
export function buildReviewHeader(level: ReviewLevel): string {
  return [
    `Code review (${level}): ${LEVEL_SCOPE[level]}.`,
    `Reply one issue per line as "Category: path:line message" (${REPLY_CATEGORIES.join('|')}), or "No issues found."`,
  ].join('\n')
}
