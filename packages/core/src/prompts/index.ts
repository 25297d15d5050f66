import { ReviewConfigError } from '../errors'
import { estimateTokens } from '../tokens'
import type { CompressedChange, IncludedChange, ReviewLevel, ReviewRequest, SignatureLine } from '../types'
import { renderOmittedSummary } from './summary'
import { buildReviewHeader } from './system'
import { assemblePrompt, renderChangeBlock } from './user'

export * from './summary'
export * from './system'
export * from './user'

export interface BuildRequestOptions {
  level: ReviewLevel
  maxTokens: number
}

/**
 * Longest leading run of signature lines whose block fits. When not even the
 * first line fits whole, that line is cut to the characters that do.
 */
function largestFittingPrefix(
  change: CompressedChange,
  fits: (block: string) => boolean,
): SignatureLine[] | null {
  const lines = change.signatureLines
  for (let n = lines.length - 1; n > 0; n--) {
    const prefix = lines.slice(0, n)
    if (fits(renderChangeBlock(change, prefix, true))) return prefix
  }

  const first = lines[0]
  if (!first) return null
  const text = first.text.trim()
  let lo = 0
  let hi = text.length - 1
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2)
    const line = { ...first, text: text.slice(0, mid) }
    if (fits(renderChangeBlock(change, [line], true))) lo = mid
    else hi = mid - 1
  }
  return lo > 0 ? [{ ...first, text: text.slice(0, lo) }] : null
}

/**
 * Greedy, order-preserving pack of compressed changes under `maxTokens`.
 *
 * A change is appended while the whole prompt still fits. The first change
 * that does not fit is cut to its largest fitting prefix when nothing has been
 * packed yet, and dropped otherwise; packing stops there either way. A first
 * change with no room for a single character of code is a configuration error.
 * Changes left out are summarized by extension when the summary still fits.
 */
export function buildReviewRequest(
  changes: readonly CompressedChange[],
  { level, maxTokens }: BuildRequestOptions,
): ReviewRequest {
  const header = buildReviewHeader(level)
  const headerTokens = estimateTokens(header)
  if (headerTokens > maxTokens) {
    throw new ReviewConfigError(
      `token ceiling ${maxTokens} for level "${level}" is below the ${headerTokens}-token instruction header`,
    )
  }

  const candidates = changes.filter((c) => c.signatureLines.length > 0)
  const blocks: string[] = []
  const included: IncludedChange[] = []
  const fits = (block: string) => estimateTokens(assemblePrompt(header, [...blocks, block])) <= maxTokens

  let stoppedAt = candidates.length
  for (let i = 0; i < candidates.length; i++) {
    const change = candidates[i]
    if (!change) continue
    const full = renderChangeBlock(change, change.signatureLines, false)
    if (fits(full)) {
      blocks.push(full)
      included.push({ change, lines: change.signatureLines, truncated: false })
      continue
    }

    if (included.length === 0) {
      const cut = largestFittingPrefix(change, fits)
      if (!cut) {
        throw new ReviewConfigError(
          `token ceiling ${maxTokens} for level "${level}" leaves no room for any of ${change.path}`,
        )
      }
      blocks.push(renderChangeBlock(change, cut, true))
      included.push({ change, lines: cut, truncated: true })
    }
    stoppedAt = included.length && included[included.length - 1]?.change === change ? i + 1 : i
    break
  }

  // Omitted files are listed by extension when room is left; names go first.
  const omitted = candidates.slice(stoppedAt)
  let omittedSummary = false
  if (omitted.length) {
    for (const withNames of [true, false]) {
      const summary = renderOmittedSummary(omitted, withNames)
      if (fits(summary)) {
        blocks.push(summary)
        omittedSummary = true
        break
      }
    }
  }

  const prompt = assemblePrompt(header, blocks)
  return {
    level,
    tokenBudget: maxTokens,
    prompt,
    promptTokens: estimateTokens(prompt),
    included,
    omittedFileCount: omitted.length,
    omittedSummary,
  }
}
