import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import {
  DEFAULT_TIMEOUT_MS,
  ReviewConfigError,
  formatZodIssues,
  resolveReviewConfig,
  type ReviewConfig,
} from '@brevity/core'
import type { ProviderName } from '@brevity/provider-types'
import { findRepoRoot, resolveRepoPath, type FailOn } from './cli-utils'

export const RC_FILE_NAMES = ['.brevityrc.json', '.brevityrc.yaml', '.brevityrc.yml'] as const

const PROVIDERS = ['openai', 'claude', 'gemini', 'mock'] as const satisfies readonly ProviderName[]

const RcSchema = z
  .object({
    provider: z.enum(PROVIDERS).optional(),
    model: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
    failOn: z.enum(['none', 'bug', 'security', 'any']).optional(),
    out: z
      .object({
        dir: z.string().min(1).optional(),
        jsonName: z.string().min(1).optional(),
        mdName: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    /** Review engine options; validated by `resolveReviewConfig` */
    review: z.record(z.unknown()).optional(),
  })
  .strict()

/** One layer of configuration: rc file, environment or CLI flags */
export type BrevityRc = z.infer<typeof RcSchema>

/** Resolved configuration (absolute paths and defaults) */
export interface ResolvedConfig {
  repoRoot: string
  rcPath: string | null
  provider: ProviderName
  providerOptions: { model?: string }
  timeoutMs: number
  failOn: FailOn
  out: {
    dirAbs: string
    jsonAbs: string
    mdAbs: string
  }
  review: ReviewConfig
}

export interface LoadConfigOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
}

const defaults = {
  provider: 'mock',
  timeoutMs: DEFAULT_TIMEOUT_MS,
  failOn: 'none',
  out: { dir: '.brevity', jsonName: 'review.json', mdName: 'review.md' },
} as const satisfies BrevityRc

/* ──────────────────────────────────────────────────────────────────────────── */

function validateLayer(raw: unknown, source: string): BrevityRc {
  const parsed = RcSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    throw new ReviewConfigError(`invalid config in ${source}: ${formatZodIssues(parsed.error)}`, {
      cause: parsed.error,
    })
  }
  return parsed.data
}

/** Nearest rc file from `startDir` up to the repo root */
export function findRc(startDir: string, repoRoot: string): string | null {
  let dir = path.resolve(startDir)
  while (true) {
    for (const name of RC_FILE_NAMES) {
      const candidate = path.join(dir, name)
      if (fs.existsSync(candidate)) return candidate
    }
    const parent = path.dirname(dir)
    if (parent === dir || dir === repoRoot) break
    dir = parent
  }
  for (const name of RC_FILE_NAMES) {
    const fallback = path.join(repoRoot, name)
    if (fs.existsSync(fallback)) return fallback
  }
  return null
}

function readRc(file: string): BrevityRc {
  const text = fs.readFileSync(file, 'utf8')
  let raw: unknown
  try {
    raw = file.endsWith('.json') ? JSON.parse(text) : parseYaml(text)
  } catch (e) {
    throw new ReviewConfigError(`cannot parse ${file}: ${e instanceof Error ? e.message : String(e)}`, { cause: e })
  }
  return validateLayer(raw, path.basename(file))
}

/** '1' | 'true' → true, '0' | 'false' → false; anything else is left for validation to reject */
function envFlag(v: string): boolean | string {
  const s = v.trim().toLowerCase()
  if (s === '1' || s === 'true') return true
  if (s === '0' || s === 'false') return false
  return v
}

/** ENV → RC */
export function envAsRc(env: NodeJS.ProcessEnv): BrevityRc {
  const raw: Record<string, unknown> = {}

  if (env.BREVITY_PROVIDER) raw.provider = env.BREVITY_PROVIDER.toLowerCase()
  if (env.BREVITY_MODEL) raw.model = env.BREVITY_MODEL
  if (env.BREVITY_TIMEOUT_MS) raw.timeoutMs = Number(env.BREVITY_TIMEOUT_MS)
  if (env.BREVITY_FAIL_ON) raw.failOn = env.BREVITY_FAIL_ON

  const out: Record<string, string> = {}
  if (env.BREVITY_OUT_DIR) out.dir = env.BREVITY_OUT_DIR
  if (env.BREVITY_OUT_JSON) out.jsonName = env.BREVITY_OUT_JSON
  if (env.BREVITY_OUT_MD) out.mdName = env.BREVITY_OUT_MD
  if (Object.keys(out).length) raw.out = out

  const review: Record<string, unknown> = {}
  if (env.BREVITY_ENABLED) review.enabled = envFlag(env.BREVITY_ENABLED)
  if (env.BREVITY_DEFAULT_LEVEL) review.defaultLevel = env.BREVITY_DEFAULT_LEVEL
  if (env.BREVITY_AUTO_ADJUST_LEVEL) review.autoAdjustLevel = envFlag(env.BREVITY_AUTO_ADJUST_LEVEL)
  if (env.BREVITY_TEMPERATURE) review.temperature = Number(env.BREVITY_TEMPERATURE)
  if (Object.keys(review).length) raw.review = review

  return validateLayer(raw, 'environment (BREVITY_*)')
}

function lastDefined<T>(values: readonly (T | undefined)[]): T | undefined {
  let out: T | undefined
  for (const v of values) if (v !== undefined) out = v
  return out
}

/** Public loader: defaults <- rc(file) <- env <- cli; undefined never overrides */
export function loadConfig(cliOverrides: BrevityRc = {}, opts: LoadConfigOptions = {}): ResolvedConfig {
  const env = opts.env ?? process.env
  const cwd = opts.cwd ?? process.cwd()
  const repoRoot = findRepoRoot(cwd, env)

  const rcPath = findRc(cwd, repoRoot)
  const layers: BrevityRc[] = [
    rcPath ? readRc(rcPath) : {},
    envAsRc(env),
    validateLayer(cliOverrides, 'command line flags'),
  ]

  const pickOut = (key: 'dir' | 'jsonName' | 'mdName'): string => {
    let value: string = defaults.out[key]
    for (const layer of layers) value = layer.out?.[key] ?? value
    return value
  }

  const review = resolveReviewConfig(
    layers.reduce<Record<string, unknown>>((acc, l) => ({ ...acc, ...l.review }), {}),
  )

  const dirAbs = resolveRepoPath(repoRoot, pickOut('dir'))

  return {
    repoRoot,
    rcPath,
    provider: lastDefined(layers.map((l) => l.provider)) ?? defaults.provider,
    providerOptions: { model: lastDefined(layers.map((l) => l.model)) },
    timeoutMs: lastDefined(layers.map((l) => l.timeoutMs)) ?? defaults.timeoutMs,
    failOn: lastDefined(layers.map((l) => l.failOn)) ?? defaults.failOn,
    out: {
      dirAbs,
      jsonAbs: path.join(dirAbs, pickOut('jsonName')),
      mdAbs: path.join(dirAbs, pickOut('mdName')),
    },
    review,
  }
}
