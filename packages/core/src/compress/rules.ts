import type { LineMarker } from '../types'

export type LineDecision = 'keep' | 'drop'

export interface LineFacts {
  marker: LineMarker
  /** Line content with surrounding whitespace removed */
  stripped: string
}

/** Ordered predicate → decision rule; the first rule that matches decides. */
export interface LineRule {
  id: string
  decision: LineDecision
  test(line: LineFacts): boolean
}

const IMPORT_RE = new RegExp(
  [
    String.raw`^import\b`,
    String.raw`^from\s+\S+\s+import\b`,
    String.raw`^#\s*(include|import)\b`,
    String.raw`^(const|let|var)\s+[\w{}\s,]+=\s*require\s*\(`,
    String.raw`^require(_once|_relative)?[\s(]`,
    String.raw`^(use|using)\s+[\w\\:.]+(\s+as\s+\w+)?\s*;`,
    String.raw`^(extern\s+crate|package)\s+[\w.]+;?$`,
  ].join('|'),
)

const COMMENT_RE = new RegExp(
  [
    String.raw`^\/\/`,
    String.raw`^\/\*`,
    String.raw`^\*(\s|\/|$)`,
    String.raw`^#(\s|#|!|$)`,
    String.raw`^<!--`,
    String.raw`^--(\s|$)`,
    String.raw`^;;`,
    String.raw`^("""|''')$`,
  ].join('|'),
)

const DECLARATION_RE = new RegExp(
  [
    String.raw`^(export\s+)?(default\s+)?(declare\s+)?(abstract\s+)?(async\s+)?(def|class|function\*?|fn|func|interface|type|enum|struct|trait|impl|module|namespace|record|object|protocol)\b`,
    String.raw`^(public|private|protected|internal|static|export|pub(\([\w:]+\))?|override|final|sealed|virtual|readonly)\b`,
    String.raw`^@[A-Za-z_][\w.]*`,
  ].join('|'),
)

const CONTROL_FLOW_RE = new RegExp(
  [
    String.raw`^(if|else|elif|elsif|unless|for|foreach|while|do|loop|switch|case|match|when|try|catch|except|finally|rescue|ensure|with|return|throw|raise|yield|break|continue|goto|defer|guard|select)\b`,
    String.raw`^\}\s*(else|catch|finally|while)\b`,
    String.raw`^(const|let|var|val|auto|mut)\s+[\w{[]`,
    String.raw`^[A-Za-z_][\w,\s]*:=`,
  ].join('|'),
)

export const blankRule: LineRule = {
  id: 'blank',
  decision: 'drop',
  test: (l) => l.stripped.length === 0,
}

export const importRule: LineRule = {
  id: 'import',
  decision: 'drop',
  test: (l) => IMPORT_RE.test(l.stripped),
}

export const commentRule: LineRule = {
  id: 'comment',
  decision: 'drop',
  test: (l) => COMMENT_RE.test(l.stripped),
}

export const declarationRule: LineRule = {
  id: 'declaration',
  decision: 'keep',
  test: (l) => DECLARATION_RE.test(l.stripped),
}

export const controlFlowRule: LineRule = {
  id: 'control-flow',
  decision: 'keep',
  test: (l) => CONTROL_FLOW_RE.test(l.stripped),
}

export const changedLineRule: LineRule = {
  id: 'changed-line',
  decision: 'keep',
  test: (l) => l.marker !== ' ',
}

/** Discards first, then retention; anything unmatched is dropped. */
export const DEFAULT_LINE_RULES: readonly LineRule[] = [
  blankRule,
  importRule,
  commentRule,
  declarationRule,
  controlFlowRule,
  changedLineRule,
]

export function decideLine(line: LineFacts, rules: readonly LineRule[] = DEFAULT_LINE_RULES): LineDecision {
  for (const rule of rules) {
    if (rule.test(line)) return rule.decision
  }
  return 'drop'
}
