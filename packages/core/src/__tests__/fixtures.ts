import type { CompressedChange, FileChange, SignatureLine } from '../types'

export function fileChange(path: string, hunks: string[] = [], overrides: Partial<FileChange> = {}): FileChange {
  let added = 0
  let removed = 0
  for (const h of hunks) {
    for (const row of h.split('\n').slice(1)) {
      if (row.startsWith('+')) added++
      else if (row.startsWith('-')) removed++
    }
  }
  return { path, changeKind: 'modified', linesAdded: added, linesRemoved: removed, rawDiffHunks: hunks, ...overrides }
}

/** Hunk of `n` added lines `value_<i> = compute(<i>)` starting at line 1 */
export function addedHunk(n: number): string {
  const rows = Array.from({ length: n }, (_, i) => `+value_${i} = compute(${i})`)
  return [`@@ -0,0 +1,${n} @@`, ...rows].join('\n')
}

export function compressed(path: string, n: number, text = (i: number) => `value_${i} = compute(${i})`): CompressedChange {
  const signatureLines: SignatureLine[] = Array.from({ length: n }, (_, i) => ({
    hunk: 0,
    line: i + 1,
    marker: '+',
    text: text(i),
  }))
  return {
    path,
    changeKind: 'modified',
    linesAdded: n,
    linesRemoved: 0,
    signatureLines,
    numbered: true,
    estimatedTokens: 0,
    corrupt: false,
  }
}

export const HANDLE_HUNK = [
  '@@ -0,0 +1,6 @@',
  '+import os',
  '+# a comment',
  '+def handle(x):',
  '+    if x is None:',
  '+        return None',
  '+    return x.value',
].join('\n')
