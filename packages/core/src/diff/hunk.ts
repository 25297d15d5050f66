import type { LineMarker } from '../types'

export interface HunkLine {
  marker: LineMarker
  text: string
  /** New-file line for `+` and context lines, old-file line for `-` lines */
  line: number
}

export interface ParsedHunk {
  oldStart: number
  oldLines: number
  newStart: number
  newLines: number
  header: string
  lines: HunkLine[]
}

export const HUNK_HEADER_RE =
  /^@@\s+-(?<oStart>\d+)(?:,(?<oLen>\d+))?\s+\+(?<nStart>\d+)(?:,(?<nLen>\d+))?\s+@@/

/**
 * Parse one hunk (`@@` header plus body). Returns null when the text is not a
 * hunk: missing header, or a body line with an unknown prefix.
 */
export function parseHunk(text: string): ParsedHunk | null {
  const rows = text.split(/\r?\n/)
  if (rows.length && rows[rows.length - 1] === '') rows.pop()

  const header = rows[0] ?? ''
  const hm = HUNK_HEADER_RE.exec(header)
  if (!hm?.groups) return null

  const oldStart = Number(hm.groups.oStart)
  const newStart = Number(hm.groups.nStart)
  // an omitted length means a single line
  const oldLines = hm.groups.oLen === undefined ? 1 : Number(hm.groups.oLen)
  const newLines = hm.groups.nLen === undefined ? 1 : Number(hm.groups.nLen)

  let oldCursor = oldStart
  let newCursor = newStart
  const lines: HunkLine[] = []

  for (const row of rows.slice(1)) {
    if (row === '') {
      lines.push({ marker: ' ', text: '', line: newCursor })
      oldCursor++
      newCursor++
      continue
    }
    const prefix = row[0]
    const body = row.slice(1)
    if (prefix === '+') {
      lines.push({ marker: '+', text: body, line: newCursor++ })
    } else if (prefix === '-') {
      lines.push({ marker: '-', text: body, line: oldCursor++ })
    } else if (prefix === ' ') {
      lines.push({ marker: ' ', text: body, line: newCursor })
      oldCursor++
      newCursor++
    } else if (prefix === '\\') {
      // "\ No newline at end of file"
      continue
    } else {
      return null
    }
  }

  return { oldStart, oldLines, newStart, newLines, header, lines }
}
