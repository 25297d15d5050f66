import { parseHunk, type ParsedHunk } from '../diff/hunk'
import { estimateTokens } from '../tokens'
import type { CompressedChange, FileChange, SignatureLine } from '../types'
import { DEFAULT_LINE_RULES, decideLine, type LineRule } from './rules'

export * from './rules'

export function renderSignatureLine(l: SignatureLine, numbered: boolean): string {
  const text = l.text.trim()
  return numbered ? `${l.marker}${l.line}| ${text}` : `${l.marker}${text}`
}

export function renderSignatureLines(lines: readonly SignatureLine[], numbered: boolean): string {
  return lines.map((l) => renderSignatureLine(l, numbered)).join('\n')
}

/** Longest signature line sent to the model; longer lines keep their head */
export const MAX_SIGNATURE_LINE_CHARS = 120

export function clipLineText(text: string, maxChars = MAX_SIGNATURE_LINE_CHARS): string {
  const t = text.trim()
  return t.length > maxChars ? t.slice(0, maxChars) : text
}

const formattingKey = (text: string) => text.replace(/\s+/g, '')

/**
 * Within each hunk, pair removed and added lines that differ only in
 * whitespace and drop both sides of every pair.
 */
export function dropReformatPairs(lines: readonly SignatureLine[]): SignatureLine[] {
  const removed = new Map<string, number[]>()
  const added = new Map<string, number[]>()
  lines.forEach((l, i) => {
    if (l.marker === ' ') return
    const bucket = l.marker === '-' ? removed : added
    const key = `${l.hunk}\u0000${formattingKey(l.text)}`
    const list = bucket.get(key)
    if (list) list.push(i)
    else bucket.set(key, [i])
  })

  const dropped = new Set<number>()
  for (const [key, minus] of removed) {
    const plus = added.get(key)
    if (!plus) continue
    const n = Math.min(minus.length, plus.length)
    for (let k = 0; k < n; k++) {
      dropped.add(minus[k] ?? -1)
      dropped.add(plus[k] ?? -1)
    }
  }
  return lines.filter((_, i) => !dropped.has(i))
}

/** Rule filter followed by the reformat filter. Idempotent. */
export function filterSignatureLines(
  lines: readonly SignatureLine[],
  rules: readonly LineRule[] = DEFAULT_LINE_RULES,
): SignatureLine[] {
  const kept = lines.filter(
    (l) => decideLine({ marker: l.marker, stripped: l.text.trim() }, rules) === 'keep',
  )
  return dropReformatPairs(kept)
}

function emptyChange(change: FileChange, corrupt: boolean): CompressedChange {
  return Object.freeze({
    path: change.path,
    changeKind: change.changeKind,
    linesAdded: change.linesAdded,
    linesRemoved: change.linesRemoved,
    signatureLines: Object.freeze([]),
    numbered: true,
    estimatedTokens: 0,
    corrupt,
  })
}

/**
 * Reduce one file's hunks to its signature lines. A file whose hunks do not
 * parse yields an empty, `corrupt` change instead of failing the batch.
 */
export function compressChange(
  change: FileChange,
  rules: readonly LineRule[] = DEFAULT_LINE_RULES,
): CompressedChange {
  const hunks: ParsedHunk[] = []
  for (const text of change.rawDiffHunks) {
    const h = parseHunk(text)
    if (!h) return emptyChange(change, true)
    hunks.push(h)
  }

  const all: SignatureLine[] = hunks.flatMap((h, hunk) =>
    h.lines.map((l) => ({ hunk, line: l.line, marker: l.marker, text: l.text })),
  )
  const signatureLines = filterSignatureLines(all, rules).map((l) => ({ ...l, text: clipLineText(l.text) }))
  if (!signatureLines.length) return emptyChange(change, false)

  // Line numbers cost characters; fall back to plain rendering whenever they
  // would push the estimate above the raw diff.
  const rawTokens = estimateTokens(change.rawDiffHunks.join('\n'))
  let numbered = true
  let estimatedTokens = estimateTokens(renderSignatureLines(signatureLines, true))
  if (estimatedTokens > rawTokens) {
    numbered = false
    estimatedTokens = estimateTokens(renderSignatureLines(signatureLines, false))
  }

  return Object.freeze({
    path: change.path,
    changeKind: change.changeKind,
    linesAdded: change.linesAdded,
    linesRemoved: change.linesRemoved,
    signatureLines: Object.freeze(signatureLines.map((l) => Object.freeze(l))),
    numbered,
    estimatedTokens,
    corrupt: false,
  })
}

export function compressChanges(
  changes: readonly FileChange[],
  rules: readonly LineRule[] = DEFAULT_LINE_RULES,
): CompressedChange[] {
  return changes.map((c) => compressChange(c, rules))
}
