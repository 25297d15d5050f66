import { renderSignatureLines } from '../compress'
import type { CompressedChange, SignatureLine } from '../types'

export function renderChangeBlock(
  change: CompressedChange,
  lines: readonly SignatureLine[],
  truncated: boolean,
): string {
  const tail = truncated ? ', truncated' : ''
  const title = `### ${change.path} (${change.changeKind}, +${change.linesAdded}/-${change.linesRemoved}${tail})`
  return `${title}\n${renderSignatureLines(lines, change.numbered)}`
}

export function assemblePrompt(header: string, blocks: readonly string[]): string {
  return [header, ...blocks].join('\n\n')
}
