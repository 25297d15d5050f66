import type { FindingCategory, ReviewFinding, ReviewResult } from '../types'
import { FINDING_CATEGORIES } from '../types'

type MDOptions = {
  groupByFile?: boolean
  title?: string
}

export const CATEGORY_LABEL: Readonly<Record<FindingCategory, string>> = {
  bug: '🐛 Bugs',
  security: '🔒 Security',
  performance: '⚡ Performance',
  architecture: '🏗️ Architecture',
  style: '📝 Style',
  note: '💡 Notes',
}

const catOrder = (c: FindingCategory) => FINDING_CATEGORIES.indexOf(c)

function sortFindings(a: ReviewFinding, b: ReviewFinding): number {
  const cat = catOrder(a.category) - catOrder(b.category)
  if (cat) return cat
  const fa = (a.location.path ?? '').localeCompare(b.location.path ?? '')
  if (fa) return fa
  return (a.location.line ?? Number.MAX_SAFE_INTEGER) - (b.location.line ?? Number.MAX_SAFE_INTEGER)
}

export function mdEscapeInline(s: string): string {
  return s
    .replace(/\\/g, '\\\\')
    .replace(/\|/g, '\\|')
    .replace(/\*/g, '\\*')
    .replace(/_/g, '\\_')
    .replace(/`/g, '\\`')
}

export function formatLocation(f: ReviewFinding): string {
  const { path, line } = f.location
  if (!path) return ''
  return line === undefined ? path : `${path}:${line}`
}

function formatItem(f: ReviewFinding): string {
  const loc = formatLocation(f)
  return loc ? `- \`${loc}\` ${mdEscapeInline(f.message)}` : `- ${mdEscapeInline(f.message)}`
}

function formatHeader(title: string, result: ReviewResult): string {
  return [
    `# ${title}`,
    '',
    `Level: **${result.level}**  `,
    `Status: **${result.summaryStatus}**  `,
    `Findings: **${result.findings.length}**  `,
    `Expected token usage: **${result.estimatedTokensUsed}**`,
    '',
  ].join('\n')
}

export function renderMarkdown(result: ReviewResult, opts: MDOptions = {}): string {
  const title = opts.title ?? 'Code review'
  const list = [...result.findings].sort(sortFindings)

  if (!list.length) {
    return `${formatHeader(title, result)}\n> ✅ No issues found.\n`
  }

  const sections: string[] = [formatHeader(title, result)]
  if (result.summaryStatus === 'unparsed') {
    sections.push('> The reply had no recognizable structure; shown as received.', '')
  }

  if (opts.groupByFile) {
    const byFile = new Map<string, ReviewFinding[]>()
    for (const f of list) {
      const k = f.location.path ?? '(general)'
      const arr = byFile.get(k) ?? []
      arr.push(f)
      byFile.set(k, arr)
    }
    for (const [file, arr] of byFile) {
      sections.push(`## ${mdEscapeInline(file)} (${arr.length})`, '')
      for (const f of arr) {
        const line = f.location.line === undefined ? '' : ` (line ${f.location.line})`
        sections.push(`- **${f.category}**${line}: ${mdEscapeInline(f.message)}`)
      }
      sections.push('')
    }
    return sections.join('\n')
  }

  for (const category of FINDING_CATEGORIES) {
    const items = list.filter((f) => f.category === category)
    if (!items.length) continue
    sections.push(`## ${CATEGORY_LABEL[category]} (${items.length})`, '', ...items.map(formatItem), '')
  }
  return sections.join('\n')
}

export default renderMarkdown
