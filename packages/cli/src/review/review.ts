import fs from 'node:fs'

import {
  createLogger,
  parseUnifiedDiff,
  renderMarkdown,
  runReview,
  type ModelClient,
  type ReviewLevel,
  type ReviewOutcome,
} from '@brevity/core'
import {
  CliInputError,
  EXIT,
  computeExit,
  info,
  printFindings,
  printReviewSummary,
  resolveRepoPath,
} from '../cli-utils'
import type { ResolvedConfig } from '../config'
import { readGitDiff } from './git'
import { writeArtifacts, type ReviewArtifact } from './io'
import { pickProvider } from './providers'

export interface ReviewCliOptions {
  config: ResolvedConfig
  /** Unified diff file; `git diff` is run when omitted */
  diff?: string
  staged?: boolean
  level?: ReviewLevel
  files?: string[]
  reviewOnly?: boolean
  outJson?: string
  outMd?: string
  debug?: boolean
  signal?: AbortSignal
  /** Pre-built client; otherwise picked from `config.provider` */
  client?: ModelClient
}

function readDiffText(opts: ReviewCliOptions): string {
  const { repoRoot } = opts.config
  if (opts.diff) {
    const diffPath = resolveRepoPath(repoRoot, opts.diff)
    if (!fs.existsSync(diffPath)) throw new CliInputError(`diff file not found at ${diffPath}`)
    return fs.readFileSync(diffPath, 'utf8')
  }
  return readGitDiff(repoRoot, { staged: opts.staged })
}

export function toArtifact(outcome: ReviewOutcome, provider: string, now = new Date()): ReviewArtifact {
  const included = outcome.request?.included ?? []
  return {
    version: 1,
    generatedAt: now.toISOString(),
    provider,
    level: {
      level: outcome.level.level,
      reason: outcome.level.reason,
      maxTokens: outcome.level.maxTokens,
    },
    files: {
      included: included.map((i) => i.change.path),
      truncated: included.filter((i) => i.truncated).map((i) => i.change.path),
      omitted: outcome.request?.omittedFileCount ?? 0,
    },
    proceed: outcome.proceed,
    modelCalled: outcome.modelCalled,
    result: outcome.result,
  }
}

/** Collect → review → write review.json / review.md → print summary. Resolves to the exit code. */
export async function runReviewCLI(opts: ReviewCliOptions): Promise<number> {
  const { config } = opts
  const log = createLogger('review', { debug: opts.debug })

  const changes = parseUnifiedDiff(readDiffText(opts))
  if (!changes.length) info('No changes found in the diff.')
  log.debug('diff parsed', { files: changes.length })

  const client = opts.client ?? pickProvider(config.provider, { model: config.providerOptions.model })

  const outcome = await runReview({
    changes,
    config: config.review,
    client,
    level: opts.level,
    files: opts.files,
    reviewOnly: opts.reviewOnly,
    timeoutMs: config.timeoutMs,
    signal: opts.signal,
    logger: log,
  })

  const outJson = opts.outJson ? resolveRepoPath(config.repoRoot, opts.outJson) : config.out.jsonAbs
  const outMd = opts.outMd ? resolveRepoPath(config.repoRoot, opts.outMd) : config.out.mdAbs
  writeArtifacts(outJson, outMd, toArtifact(outcome, client.name), renderMarkdown(outcome.result))

  printFindings(outcome.result)
  const exit = computeExit(outcome.result.findings, config.failOn)
  printReviewSummary({
    repoRoot: config.repoRoot,
    providerLabel: client.name,
    level: outcome.level,
    filesIncluded: outcome.request?.included.length ?? 0,
    filesOmitted: outcome.request?.omittedFileCount ?? 0,
    result: outcome.result,
    modelCalled: outcome.modelCalled,
    proceed: outcome.proceed,
    outJsonPath: outJson,
    outMdPath: outMd,
    exit,
  })

  return exit.exitCode
}

/** Pre-commit entry: reviews staged changes only when reviews are enabled in config */
export async function runHookCLI(opts: Omit<ReviewCliOptions, 'staged'>): Promise<number> {
  if (!opts.config.review.enabled) return EXIT.ok
  return runReviewCLI({ ...opts, staged: true })
}
