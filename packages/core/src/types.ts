export type ChangeKind = 'added' | 'modified' | 'deleted' | 'renamed'

/** One changed file as supplied by the version-control collector. */
export interface FileChange {
  readonly path: string
  readonly changeKind: ChangeKind
  readonly linesAdded: number
  readonly linesRemoved: number
  /** Hunk texts in file order, each starting with its `@@ -a,b +c,d @@` header */
  readonly rawDiffHunks: readonly string[]
  /** Source path of a rename */
  readonly previousPath?: string
}

export type PriorityTag = 'high' | 'low' | 'excluded'

export interface ClassifiedChange {
  change: FileChange
  priority: PriorityTag
  /** Exclude glob that tagged the file (first match wins) */
  matchedPattern?: string
  /** High-priority keyword found in the path */
  matchedKeyword?: string
}

export type LineMarker = '+' | '-' | ' '

export interface SignatureLine {
  /** Index of the hunk inside `FileChange.rawDiffHunks` */
  hunk: number
  /** New-file line for `+` and context lines, old-file line for `-` lines */
  line: number
  marker: LineMarker
  text: string
}

export interface CompressedChange {
  readonly path: string
  readonly changeKind: ChangeKind
  readonly linesAdded: number
  readonly linesRemoved: number
  readonly signatureLines: readonly SignatureLine[]
  /** Rendered as `+12| text` when true, as `+text` otherwise */
  readonly numbered: boolean
  readonly estimatedTokens: number
  /** Hunks could not be parsed; the change carries no lines */
  readonly corrupt: boolean
}

export type ReviewLevel = 'quick' | 'normal' | 'detailed'

export const REVIEW_LEVELS: readonly ReviewLevel[] = ['quick', 'normal', 'detailed']

export interface IncludedChange {
  change: CompressedChange
  /** Lines actually placed in the prompt (a prefix when truncated) */
  lines: readonly SignatureLine[]
  truncated: boolean
}

export interface ReviewRequest {
  level: ReviewLevel
  tokenBudget: number
  prompt: string
  promptTokens: number
  included: readonly IncludedChange[]
  omittedFileCount: number
  /** A per-extension summary of the omitted files closes the prompt */
  omittedSummary: boolean
}

export type FindingCategory =
  | 'bug'
  | 'security'
  | 'performance'
  | 'architecture'
  | 'style'
  | 'note'

export const FINDING_CATEGORIES: readonly FindingCategory[] = [
  'bug',
  'security',
  'performance',
  'architecture',
  'style',
  'note',
]

export interface FindingLocation {
  path?: string
  line?: number
}

export interface ReviewFinding {
  category: FindingCategory
  location: FindingLocation
  message: string
}

export type SummaryStatus = 'clean' | 'hasFindings' | 'unparsed'

export interface ReviewResult {
  level: ReviewLevel
  findings: ReviewFinding[]
  estimatedTokensUsed: number
  summaryStatus: SummaryStatus
}
