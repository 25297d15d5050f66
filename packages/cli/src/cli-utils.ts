import fs from 'node:fs'
import path from 'node:path'
import { pathToFileURL } from 'node:url'
import { bold, cyan, dim, green, red, yellow } from 'colorette'
import {
  CATEGORY_LABEL,
  FINDING_CATEGORIES,
  ProviderError,
  ReviewCancelledError,
  ReviewConfigError,
  formatLocation,
  type FindingCategory,
  type LevelSelection,
  type ReviewFinding,
  type ReviewResult,
} from '@brevity/core'

/** Bad flags, missing files, a failing `git diff`: anything the user must fix */
export class CliInputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CliInputError'
  }
}

/** ────────────────────────────────────────────────────────────────────────────
 *  FS helpers
 *  ──────────────────────────────────────────────────────────────────────────── */
export function ensureDirForFile(p: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true })
}

/** Resolve a (possibly relative) path against repo root */
export function resolveRepoPath(repoRoot: string, p: string) {
  return path.isAbsolute(p) ? p : path.join(repoRoot, p)
}

/** Make file:// link for pretty output */
export const linkifyFile = (absPath: string) => pathToFileURL(absPath).href

/** ────────────────────────────────────────────────────────────────────────────
 *  Repo root detection
 *  ────────────────────────────────────────────────────────────────────────────
 *  Rules:
 *   - If BREVITY_REPO_ROOT is set and exists → use it
 *   - Else walk up from `start` until you find .git
 *   - If not found, fall back to `start`
 */
export function findRepoRoot(start = process.cwd(), env: NodeJS.ProcessEnv = process.env): string {
  const envRoot = env.BREVITY_REPO_ROOT
  if (envRoot && fs.existsSync(envRoot)) {
    return path.resolve(envRoot)
  }

  let dir = path.resolve(start)
  while (true) {
    if (fs.existsSync(path.join(dir, '.git'))) return dir

    const parent = path.dirname(dir)
    if (parent === dir) {
      // reached FS root — fallback to original start
      return path.resolve(start)
    }
    dir = parent
  }
}

/** ────────────────────────────────────────────────────────────────────────────
 *  Pretty console helpers (consistent UX)
 *  ──────────────────────────────────────────────────────────────────────────── */
export const ok   = (msg: string) => console.log(green('✔ ') + msg)
export const info = (msg: string) => console.log(cyan('ℹ ') + msg)
export const warn = (msg: string) => console.warn(yellow('▲ ') + msg)
export const fail = (msg: string) => console.error(red('✖ ') + msg)

/** ────────────────────────────────────────────────────────────────────────────
 *  Exit policy
 *  ──────────────────────────────────────────────────────────────────────────── */
export type FailOn = 'none' | 'bug' | 'security' | 'any'

export const FAIL_ON_VALUES: readonly FailOn[] = ['none', 'bug', 'security', 'any']

/** Categories that trip each policy */
const FAIL_ON_CATEGORIES: Record<Exclude<FailOn, 'none' | 'any'>, ReadonlySet<FindingCategory>> = {
  security: new Set<FindingCategory>(['security']),
  bug: new Set<FindingCategory>(['bug', 'security']),
}

export const EXIT = {
  ok: 0,
  findings: 1,
  input: 2,
  retryable: 3,
  provider: 4,
  cancelled: 130,
} as const

export type Exit =
  | { mode: 'none'; exitCode: 0 }
  | { mode: 'threshold'; exitCode: number; failOn: Exclude<FailOn, 'none'>; matched: number }

export function computeExit(findings: readonly ReviewFinding[], failOn: FailOn): Exit {
  if (failOn === 'none') return { mode: 'none', exitCode: 0 }
  let matched = findings.length
  if (failOn !== 'any') {
    const cats = FAIL_ON_CATEGORIES[failOn]
    matched = findings.filter((f) => cats.has(f.category)).length
  }
  return { mode: 'threshold', exitCode: matched > 0 ? EXIT.findings : EXIT.ok, failOn, matched }
}

export function exitCodeForError(e: unknown): number {
  if (e instanceof ReviewCancelledError) return EXIT.cancelled
  if (e instanceof ReviewConfigError || e instanceof CliInputError) return EXIT.input
  if (e instanceof ProviderError) return e.retryable ? EXIT.retryable : EXIT.provider
  return EXIT.findings
}

export function countByCategory(findings: readonly ReviewFinding[]): Record<FindingCategory, number> {
  const c: Record<FindingCategory, number> = { bug: 0, security: 0, performance: 0, architecture: 0, style: 0, note: 0 }
  for (const f of findings) c[f.category]++
  return c
}

/** ────────────────────────────────────────────────────────────────────────────
 *  Unified summaries
 *  ──────────────────────────────────────────────────────────────────────────── */

export function printFindings(result: ReviewResult) {
  if (result.summaryStatus === 'clean') {
    ok('No issues found.')
    return
  }
  if (result.summaryStatus === 'unparsed') {
    warn('Reply did not follow the expected format; kept as a single note.')
  }
  for (const f of result.findings) {
    const loc = formatLocation(f)
    console.log(`  ${CATEGORY_LABEL[f.category]}${loc ? ' ' + dim(loc) : ''} ${f.message}`)
  }
}

/** Print nice summary for review run */
export function printReviewSummary(args: {
  repoRoot: string
  providerLabel: string
  level: LevelSelection
  filesIncluded: number
  filesOmitted: number
  result: ReviewResult
  modelCalled: boolean
  proceed: boolean
  outJsonPath: string
  outMdPath: string
  exit: Exit
}) {
  const { repoRoot, providerLabel, level, result, exit } = args
  const counts = countByCategory(result.findings)
  const breakdown = FINDING_CATEGORIES.map((c) => `${c} ${counts[c]}`).join(', ')

  console.log('')
  console.log(bold('Review summary'))
  console.log('  ' + cyan('provider: ') + providerLabel + (args.modelCalled ? '' : dim(' (not called)')))
  console.log('  ' + cyan('level:    ') + level.level + dim(` (${level.reason}, ${level.maxTokens} tokens)`))
  console.log('  ' + cyan('files:    ') + `${args.filesIncluded} included` + dim(`, ${args.filesOmitted} omitted`))
  console.log('  ' + cyan('status:   ')
    + (result.summaryStatus === 'clean' ? green('clean')
      : result.summaryStatus === 'unparsed' ? yellow('unparsed')
      : red('hasFindings')))
  console.log('  ' + cyan('findings: ') + `${result.findings.length} ` + dim(`(${breakdown})`))
  console.log('  ' + cyan('expected token usage: ') + result.estimatedTokensUsed)
  console.log('  ' + cyan('outputs:  ')
    + `${dim(path.relative(repoRoot, args.outJsonPath))}, `
    + `${dim(path.relative(repoRoot, args.outMdPath))}`)
  if (!args.proceed) console.log('  ' + cyan('commit:   ') + dim('review only, not proceeding'))

  let line = ''
  if (exit.mode === 'none') {
    line = green('exit 0') + dim(' — failOn=none (never fail)')
  } else {
    line = (exit.exitCode ? red(`exit ${exit.exitCode}`) : green('exit 0'))
         + dim(` — failOn=${exit.failOn}, matched=${exit.matched}`)
  }
  console.log('  ' + cyan('exit policy: ') + line)
}

/** Print nice summary for render → Markdown */
export function printRenderSummaryMarkdown(args: {
  repoRoot: string
  inFile: string
  outFile: string
  findingsCount?: number
}) {
  const { repoRoot, inFile, outFile, findingsCount } = args
  console.log('')
  console.log(bold('Render (Markdown) summary'))
  console.log('  ' + cyan('input:   ') + `${dim(path.relative(repoRoot, inFile))} ${cyan('→')} ${dim(linkifyFile(inFile))}`)
  console.log('  ' + cyan('output:  ') + `${dim(path.relative(repoRoot, outFile))} ${cyan('→')} ${dim(linkifyFile(outFile))}`)
  if (typeof findingsCount === 'number') {
    console.log('  ' + cyan('findings: ') + findingsCount)
  }
  ok('Markdown written')
}
