import type { ReviewArtifact } from '../../review/io'

export const sampleArtifact: ReviewArtifact = {
  version: 1,
  generatedAt: '2026-01-02T03:04:05.000Z',
  provider: 'mock',
  level: { level: 'normal', reason: 'auto', maxTokens: 400 },
  files: { included: ['src/a.ts'], truncated: [], omitted: 2 },
  proceed: true,
  modelCalled: true,
  result: {
    level: 'normal',
    findings: [{ category: 'bug', location: { path: 'src/a.ts', line: 7 }, message: 'unchecked index' }],
    estimatedTokensUsed: 120,
    summaryStatus: 'hasFindings',
  },
}
