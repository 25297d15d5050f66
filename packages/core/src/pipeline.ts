import picomatch from 'picomatch'
import { aggregateChangedLines, applyLevelPolicy, classifyChanges, orderByPriority } from './classify'
import type { ModelClient } from './client'
import { compressChange } from './compress'
import type { ReviewConfig } from './config'
import { ProviderError, ReviewCancelledError, ReviewConfigError, isProviderError } from './errors'
import { selectLevel, type LevelSelection } from './level'
import { silentLogger, type Logger } from './lib/log'
import { buildReviewRequest } from './prompts'
import { parseReviewReply } from './result'
import type { ClassifiedChange, FileChange, ReviewLevel, ReviewRequest, ReviewResult } from './types'

export const DEFAULT_TIMEOUT_MS = 60_000

export interface ReviewInvocation {
  changes: readonly FileChange[]
  config: ReviewConfig
  client: ModelClient
  /** Explicit level; wins over size-based selection */
  level?: ReviewLevel
  /** Restrict the review to these paths or globs */
  files?: readonly string[]
  /** Caller will not proceed to commit whatever the result */
  reviewOnly?: boolean
  timeoutMs?: number
  signal?: AbortSignal
  logger?: Logger
}

export interface ReviewOutcome {
  result: ReviewResult
  /** Null when the model was not called */
  request: ReviewRequest | null
  level: LevelSelection
  classified: ClassifiedChange[]
  proceed: boolean
  modelCalled: boolean
}

export function selectFiles(changes: readonly FileChange[], files?: readonly string[]): FileChange[] {
  if (!files?.length) return [...changes]
  const isMatch = picomatch([...files], { dot: true })
  return changes.filter((c) => files.includes(c.path) || isMatch(c.path))
}

/**
 * Await the model with a timeout and the caller's signal. The client gets its
 * own signal that fires in both cases.
 */
export async function callModel(
  client: ModelClient,
  prompt: string,
  opts: { maxTokens: number; temperature: number; timeoutMs: number; signal?: AbortSignal },
): Promise<string> {
  const { timeoutMs, signal, ...completeOpts } = opts
  if (signal?.aborted) throw new ReviewCancelledError(undefined, { cause: signal.reason })

  const controller = new AbortController()
  let timer: ReturnType<typeof setTimeout> | undefined
  let onAbort: (() => void) | undefined

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new ProviderError('timeout', client.name, `no reply within ${timeoutMs}ms`)
      controller.abort(err)
      reject(err)
    }, timeoutMs)
    onAbort = () => {
      const err = new ReviewCancelledError(undefined, { cause: signal?.reason })
      controller.abort(err)
      reject(err)
    }
    signal?.addEventListener('abort', onAbort, { once: true })
  })

  try {
    return await Promise.race([client.complete(prompt, { ...completeOpts, signal: controller.signal }), guard])
  } finally {
    clearTimeout(timer)
    if (onAbort) signal?.removeEventListener('abort', onAbort)
  }
}

function toRunError(err: unknown, provider: string): Error {
  if (err instanceof ReviewCancelledError) return err
  if (isProviderError(err)) {
    if (err.kind === 'invalid-credential' || err.kind === 'unsupported') {
      return new ReviewConfigError(err.message, { cause: err })
    }
    return err
  }
  const message = err instanceof Error ? err.message : String(err)
  return new ProviderError('unknown', provider, message, undefined, { cause: err })
}

/**
 * classify → select level → drop low-priority files per level → compress →
 * pack → one model call → parse. Returns without calling the model when
 * nothing reviewable is left.
 */
export async function runReview(inv: ReviewInvocation): Promise<ReviewOutcome> {
  const { config, client } = inv
  const log = inv.logger ?? silentLogger
  const proceed = !inv.reviewOnly

  const scoped = selectFiles(inv.changes, inv.files)
  const classified = classifyChanges(scoped, config)
  const aggregate = aggregateChangedLines(classified)
  const level = selectLevel({ override: inv.level, aggregateChangedLines: aggregate, config })
  log.debug('level selected', { level: level.level, reason: level.reason, aggregate, maxTokens: level.maxTokens })

  const kept = orderByPriority(applyLevelPolicy(classified, level.level, config.includeLowPriority))
  for (const c of classified) {
    if (c.priority === 'excluded') log.debug('excluded', { path: c.change.path, pattern: c.matchedPattern })
  }

  const compressed = kept.map((c) => {
    const out = compressChange(c.change)
    if (out.corrupt) log.warn('unparseable diff, file skipped', { path: out.path })
    return out
  })

  const clean = (): ReviewOutcome => ({
    result: { level: level.level, findings: [], estimatedTokensUsed: 0, summaryStatus: 'clean' },
    request: null,
    level,
    classified,
    proceed,
    modelCalled: false,
  })

  if (!compressed.some((c) => c.signatureLines.length > 0)) {
    log.debug('no reviewable lines, model not called')
    return clean()
  }

  const request = buildReviewRequest(compressed, { level: level.level, maxTokens: level.maxTokens })
  log.debug('request built', {
    promptTokens: request.promptTokens,
    included: request.included.length,
    omitted: request.omittedFileCount,
  })

  let reply: string
  try {
    reply = await callModel(client, request.prompt, {
      maxTokens: level.maxTokens,
      temperature: config.temperature,
      timeoutMs: inv.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      signal: inv.signal,
    })
  } catch (err) {
    throw toRunError(err, client.name)
  }

  const result = parseReviewReply(reply, level.level, {
    promptTokens: request.promptTokens,
    knownPaths: request.included.map((i) => i.change.path),
  })
  log.debug('reply parsed', { status: result.summaryStatus, findings: result.findings.length })

  return { result, request, level, classified, proceed, modelCalled: true }
}
