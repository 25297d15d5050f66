import { estimateTokens } from '../tokens'
import type { FindingCategory, FindingLocation, ReviewFinding, ReviewLevel, ReviewResult } from '../types'
import { LOCATION_RE, isBullet, readFileHeading, readMarker, stripBullet } from './markers'

export * from './markers'

export interface ParseReplyOptions {
  /** Added to the reply estimate for `estimatedTokensUsed` */
  promptTokens?: number
  /** Paths that were sent to the model; used to resolve short paths */
  knownPaths?: readonly string[]
}

const EMPTY_MESSAGE_RE =
  /^(?:none|n\/a|nothing(?: to report)?|-|no (?:issues|problems|findings|bugs|concerns)(?: found)?|looks good|lgtm)[.!]*$/i
/** A whole reply that only says there is nothing to report */
const CLEAN_REPLY_RE =
  /^(?:no (?:issues|problems|bugs|findings|concerns)(?: (?:found|detected))?|nothing to report|looks good(?: to me)?|lgtm)[.!]*$/i

const normalizePath = (p: string) => p.replace(/^\.\//, '').replace(/^[ab]\//, '')

export function resolvePath(token: string, knownPaths: readonly string[]): string {
  const path = normalizePath(token)
  if (knownPaths.includes(path)) return path
  const bySuffix = knownPaths.find((k) => k.endsWith(`/${path}`) || path.endsWith(`/${k}`))
  return bySuffix ?? path
}

function locate(text: string, fallbackPath: string | undefined, knownPaths: readonly string[]) {
  const m = LOCATION_RE.exec(text)
  const location: FindingLocation = {}
  let message = text
  if (m?.[1] && m[2]) {
    location.path = resolvePath(m[1], knownPaths)
    location.line = Number(m[2])
    if (m.index === 0) {
      message = text.slice(m[0].length).replace(/^[\s:,–—-]+/, '').trim() || text
    }
  } else if (fallbackPath) {
    location.path = fallbackPath
  }
  return { location, message }
}

/**
 * Heuristic reader for a free-form review reply. Markers open a category;
 * text after them becomes findings until the next marker. Never throws.
 */
export function parseReviewReply(
  reply: string,
  level: ReviewLevel,
  { promptTokens = 0, knownPaths = [] }: ParseReplyOptions = {},
): ReviewResult {
  const estimatedTokensUsed = promptTokens + estimateTokens(reply)
  const done = (summaryStatus: ReviewResult['summaryStatus'], findings: ReviewFinding[]): ReviewResult => ({
    level,
    findings,
    estimatedTokensUsed,
    summaryStatus,
  })

  const body = reply.trim()
  if (!body) return done('clean', [])

  const onlyPath = knownPaths.length === 1 ? knownPaths[0] : undefined
  const findings: ReviewFinding[] = []
  let category: FindingCategory | null = null
  let open: ReviewFinding | null = null
  let headingPath: string | undefined
  let sawMarker = false

  const add = (text: string): ReviewFinding | null => {
    if (!category || EMPTY_MESSAGE_RE.test(text.trim())) return null
    const { location, message } = locate(text, headingPath ?? onlyPath, knownPaths)
    const finding: ReviewFinding = { category, location, message }
    findings.push(finding)
    return finding
  }

  for (const raw of body.split(/\r?\n/)) {
    const line = raw.trim()
    if (!line) continue

    const file = readFileHeading(line)
    if (file) {
      headingPath = resolvePath(file, knownPaths)
      open = null
      continue
    }

    const marker = readMarker(line)
    if (marker) {
      sawMarker = true
      category = marker.category
      open = marker.message ? add(marker.message) : null
      continue
    }

    if (!category) continue
    if (isBullet(line) || !open || LOCATION_RE.exec(line)?.index === 0) open = add(stripBullet(line))
    else open.message = `${open.message} ${line}`
  }

  if (sawMarker) return done(findings.length ? 'hasFindings' : 'clean', findings)
  if (CLEAN_REPLY_RE.test(body.replace(/\s+/g, ' '))) return done('clean', [])
  return done('unparsed', [{ category: 'note', location: onlyPath ? { path: onlyPath } : {}, message: body }])
}
