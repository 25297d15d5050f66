import { z } from 'zod'
import { ReviewConfigError } from './errors'
import type { ReviewLevel } from './types'

const Level = z.enum(['quick', 'normal', 'detailed'])
const PositiveInt = z.number().int().positive()

export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = [
  '*.md',
  '*.test.*',
  '*.spec.*',
  'test_*.py',
  '*_test.go',
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml',
  '*.lock',
  '**/migrations/**',
  '*.min.js',
  '*.snap',
  '*.log',
]

export const DEFAULT_HIGH_PRIORITY_KEYWORDS: readonly string[] = [
  'service',
  'controller',
  'api',
  'model',
  'handler',
  'middleware',
  'auth',
  'security',
]

/**
 * Shape of the review options. Every field is optional on input; defaults
 * reproduce the documented behaviour (150/400/800 tokens, <50 detailed,
 * >200 quick, low-priority files dropped at quick only).
 */
export const ReviewConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    defaultLevel: Level.default('quick'),
    autoAdjustLevel: z.boolean().default(true),
    temperature: z.number().min(0).max(2).default(0.2),
    maxTokensQuick: PositiveInt.default(150),
    maxTokensNormal: PositiveInt.default(400),
    maxTokensDetailed: PositiveInt.default(800),
    excludePatterns: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDE_PATTERNS]),
    highPriorityKeywords: z.array(z.string().min(1)).default([...DEFAULT_HIGH_PRIORITY_KEYWORDS]),
    includeLowPriority: z
      .object({
        quick: z.boolean().default(false),
        normal: z.boolean().default(true),
        detailed: z.boolean().default(true),
      })
      .default({}),
    levelThresholds: z
      .object({
        detailedBelow: z.number().int().nonnegative().default(50),
        quickAbove: z.number().int().nonnegative().default(200),
      })
      .default({})
      .refine((t) => t.detailedBelow <= t.quickAbove + 1, {
        message: 'detailedBelow must not exceed quickAbove + 1',
      }),
  })
  .strict()

export type ReviewConfigInput = z.input<typeof ReviewConfigSchema>
export type ReviewConfig = Readonly<z.output<typeof ReviewConfigSchema>>

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const v of Object.values(value)) deepFreeze(v)
    Object.freeze(value)
  }
  return value
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join('; ')
}

/** Fill defaults, validate, and freeze. Built once per process. */
export function resolveReviewConfig(input: unknown = {}): ReviewConfig {
  const parsed = ReviewConfigSchema.safeParse(input ?? {})
  if (!parsed.success) {
    throw new ReviewConfigError(`invalid review config: ${formatZodIssues(parsed.error)}`, {
      cause: parsed.error,
    })
  }
  return deepFreeze(parsed.data)
}

export const DEFAULT_REVIEW_CONFIG: ReviewConfig = resolveReviewConfig()

export function maxTokensFor(config: ReviewConfig, level: ReviewLevel): number {
  switch (level) {
    case 'quick': return config.maxTokensQuick
    case 'normal': return config.maxTokensNormal
    case 'detailed': return config.maxTokensDetailed
  }
}
