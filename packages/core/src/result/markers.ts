import type { FindingCategory } from '../types'

export const CATEGORY_WORDS: ReadonlyMap<string, FindingCategory> = new Map(Object.entries({
  bug: 'bug',
  bugs: 'bug',
  error: 'bug',
  errors: 'bug',
  critical: 'bug',
  security: 'security',
  vulnerability: 'security',
  vulnerabilities: 'security',
  performance: 'performance',
  perf: 'performance',
  architecture: 'architecture',
  design: 'architecture',
  style: 'style',
  naming: 'style',
  quality: 'style',
  readability: 'style',
  note: 'note',
  notes: 'note',
  suggestion: 'note',
  suggestions: 'note',
  warning: 'note',
  warnings: 'note',
} satisfies Record<string, FindingCategory>))

/** Emoji the model tends to put in front of a category */
export const CATEGORY_EMOJI: ReadonlyArray<readonly [string, FindingCategory]> = [
  ['❌', 'bug'],
  ['🐛', 'bug'],
  ['🔒', 'security'],
  ['⚡', 'performance'],
  ['🔥', 'performance'],
  ['🏗', 'architecture'],
  ['📝', 'style'],
  ['💡', 'note'],
  ['⚠', 'note'],
]

export interface Marker {
  category: FindingCategory
  /** Text after the delimiter; empty for a heading-style marker */
  message: string
}

const BULLET_RE = /^(?:[-*+•]\s+|\d+[.)]\s+)/
const WORD_RE = /^[*_[]*([A-Za-z]+)(?:\s+(?:issues?|concerns?|problems?))?[*_\]]*/
const DELIMITER_RE = /^\s*(?::|\]|[-–—](?=\s))[*_]*\s*/
const HEADING_TAIL_RE = /^[\s*_:]*$/

export const isBullet = (line: string) => BULLET_RE.test(line)
export const stripBullet = (line: string) => line.replace(BULLET_RE, '')

/**
 * Recognize a category marker at the start of a trimmed line, after an
 * optional bullet, heading hashes, emoji, bold or bracket. A keyword needs a
 * delimiter or must stand alone; an emoji is a marker by itself.
 */
export function readMarker(line: string): Marker | null {
  let s = stripBullet(line.trim()).replace(/^#{1,6}\s*/, '')

  let emojiCategory: FindingCategory | undefined
  for (const [emoji, category] of CATEGORY_EMOJI) {
    if (s.startsWith(emoji)) {
      emojiCategory = category
      s = s.slice(emoji.length).replace(/^\uFE0F/, '').trimStart()
      break
    }
  }

  const m = WORD_RE.exec(s)
  const word = m?.[1]?.toLowerCase()
  const wordCategory = word === undefined ? undefined : CATEGORY_WORDS.get(word)
  if (m && wordCategory) {
    const rest = s.slice(m[0].length)
    if (HEADING_TAIL_RE.test(rest)) return { category: wordCategory, message: '' }
    const delim = DELIMITER_RE.exec(rest)
    if (delim) return { category: wordCategory, message: rest.slice(delim[0].length).trim() }
    if (m[0].includes(']')) return { category: wordCategory, message: rest.trim() }
  }

  if (emojiCategory) return { category: emojiCategory, message: s.replace(/^[\s*_:]+/, '').trim() }
  return null
}

const PATH_SHAPE_RE = /^[\w.@/-]+$/
const looksLikePath = (s: string) => PATH_SHAPE_RE.test(s) && (s.includes('/') || /\.\w+$/.test(s))

/**
 * `### src/a.ts`, `### src/a.ts (modified, +3/-1)`, `File: src/a.ts` or
 * `**src/a.ts**` on a line of its own.
 */
export function readFileHeading(line: string): string | null {
  const m =
    /^#{1,6}\s+`?([^\s`]+)`?(?:\s+\(.*\))?\s*:?$/.exec(line) ??
    /^(?:\*\*)?File:?(?:\*\*)?\s*`?([^\s`]+)`?\s*$/i.exec(line) ??
    /^\*\*`?([^\s`*]+)`?\*\*:?$/.exec(line)
  const candidate = m?.[1]
  return candidate && looksLikePath(candidate) ? candidate : null
}

export const LOCATION_RE = /`?([\w.@/-]*[\w-]\.[A-Za-z0-9]+|[\w.@-]+\/[\w.@/-]*[\w-]):(\d+)(?::\d+)?`?/
