import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { formatZodIssues, type ReviewResult } from '@brevity/core'
import { CliInputError } from '../cli-utils'

export function atomicWrite(file: string, data: string | Buffer) {
  fs.mkdirSync(path.dirname(file), { recursive: true })
  const tmp = `${file}.tmp-${process.pid}-${Date.now()}`
  fs.writeFileSync(tmp, data)
  fs.renameSync(tmp, file)
}

const FindingSchema = z.object({
  category: z.enum(['bug', 'security', 'performance', 'architecture', 'style', 'note']),
  location: z.object({
    path: z.string().optional(),
    line: z.number().int().positive().optional(),
  }),
  message: z.string(),
})

const ResultSchema = z.object({
  level: z.enum(['quick', 'normal', 'detailed']),
  findings: z.array(FindingSchema),
  estimatedTokensUsed: z.number().int().nonnegative(),
  summaryStatus: z.enum(['clean', 'hasFindings', 'unparsed']),
}) satisfies z.ZodType<ReviewResult>

/** review.json as written by `brevity review` */
export const ReviewArtifactSchema = z.object({
  version: z.literal(1),
  generatedAt: z.string(),
  provider: z.string(),
  level: z.object({
    level: z.enum(['quick', 'normal', 'detailed']),
    reason: z.enum(['override', 'auto', 'default']),
    maxTokens: z.number().int().positive(),
  }),
  files: z.object({
    included: z.array(z.string()),
    truncated: z.array(z.string()),
    omitted: z.number().int().nonnegative(),
  }),
  proceed: z.boolean(),
  modelCalled: z.boolean(),
  result: ResultSchema,
})

export type ReviewArtifact = z.infer<typeof ReviewArtifactSchema>

export function writeArtifacts(jsonPath: string, mdPath: string, artifact: ReviewArtifact, markdown: string) {
  atomicWrite(jsonPath, JSON.stringify(artifact, null, 2) + '\n')
  atomicWrite(mdPath, markdown)
}

export function readArtifact(file: string): ReviewArtifact {
  if (!fs.existsSync(file)) throw new CliInputError(`review file not found: ${file}`)
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'))
  } catch (e) {
    throw new CliInputError(`review file is not valid JSON: ${file}`, { cause: e })
  }
  const parsed = ReviewArtifactSchema.safeParse(raw)
  if (!parsed.success) {
    throw new CliInputError(`unexpected review file shape (${file}): ${formatZodIssues(parsed.error)}`, {
      cause: parsed.error,
    })
  }
  return parsed.data
}
