import type { CompressedChange } from '../types'

/** Files named per extension group; the rest are only counted */
export const SUMMARY_FILES_PER_GROUP = 2

export function extensionOf(path: string): string {
  const base = path.slice(path.lastIndexOf('/') + 1)
  const dot = base.lastIndexOf('.')
  return dot > 0 ? base.slice(dot) : 'other'
}

const size = (c: CompressedChange) => c.linesAdded + c.linesRemoved

/**
 * One line per extension (first-seen order) for changes that did not make it
 * into the prompt: file count, summed line counts and the largest files.
 * `withNames: false` keeps only the counts.
 */
export function renderOmittedSummary(changes: readonly CompressedChange[], withNames = true): string {
  const groups = new Map<string, CompressedChange[]>()
  for (const c of changes) {
    const ext = extensionOf(c.path)
    const list = groups.get(ext)
    if (list) list.push(c)
    else groups.set(ext, [c])
  }

  const rows = [`Not shown (${changes.length} ${changes.length === 1 ? 'file' : 'files'}):`]
  for (const [ext, files] of groups) {
    const added = files.reduce((n, f) => n + f.linesAdded, 0)
    const removed = files.reduce((n, f) => n + f.linesRemoved, 0)
    let row = `- ${ext}: ${files.length} (+${added}/-${removed})`
    if (withNames) {
      const largest = [...files].sort((a, b) => size(b) - size(a)).slice(0, SUMMARY_FILES_PER_GROUP)
      row += ` ${largest.map((f) => f.path).join(', ')}`
    }
    rows.push(row)
  }
  return rows.join('\n')
}
