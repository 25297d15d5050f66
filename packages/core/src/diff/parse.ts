import type { ChangeKind, FileChange } from '../types'
import { HUNK_HEADER_RE } from './hunk'

interface Draft {
  path: string
  previousPath?: string
  kind: ChangeKind
  hunks: string[][]
  added: number
  removed: number
}

function stripSide(p: string): string {
  const clean = p.trim().replace(/\t.*$/, '')
  return clean.startsWith('a/') || clean.startsWith('b/') ? clean.slice(2) : clean
}

function finish(d: Draft): FileChange {
  return Object.freeze({
    path: d.path,
    changeKind: d.kind,
    linesAdded: d.added,
    linesRemoved: d.removed,
    rawDiffHunks: Object.freeze(d.hunks.map((h) => h.join('\n'))),
    ...(d.previousPath && d.previousPath !== d.path ? { previousPath: d.previousPath } : {}),
  })
}

/**
 * Split a unified diff (`git diff` output, or plain `---`/`+++` diffs) into
 * one FileChange per file. Hunk bodies are delimited by the header counts, so
 * a removed line that reads `-- x` is not mistaken for a file header.
 */
export function parseUnifiedDiff(diff: string): FileChange[] {
  const out: FileChange[] = []
  let cur: Draft | null = null
  let hunk: string[] | null = null
  let oldLeft = 0
  let newLeft = 0

  const flush = () => {
    if (cur && cur.path) out.push(finish(cur))
    cur = null
    hunk = null
  }

  for (const line of diff.split(/\r?\n/)) {
    // inside a hunk body
    if (cur && hunk && (oldLeft > 0 || newLeft > 0)) {
      if (line.startsWith('\\')) { hunk.push(line); continue }
      const prefix = line[0]
      if (prefix === '+') { hunk.push(line); cur.added++; newLeft--; continue }
      if (prefix === '-') { hunk.push(line); cur.removed++; oldLeft--; continue }
      if (prefix === ' ' || line === '') { hunk.push(line); oldLeft--; newLeft--; continue }
      // malformed body: fall through and treat as metadata
    }
    if (cur && hunk && line.startsWith('\\')) { hunk.push(line); continue }

    const gm = /^diff --git a\/(.+?) b\/(.+)$/.exec(line)
    if (gm) {
      flush()
      cur = { path: gm[2] ?? '', previousPath: gm[1], kind: 'modified', hunks: [], added: 0, removed: 0 }
      continue
    }

    if (line.startsWith('--- ')) {
      if (!cur || cur.hunks.length) {
        flush()
        cur = { path: '', kind: 'modified', hunks: [], added: 0, removed: 0 }
      }
      const from = stripSide(line.slice(4))
      if (from === '/dev/null') cur.kind = 'added'
      else cur.previousPath = from
      continue
    }

    if (line.startsWith('+++ ') && cur) {
      const to = stripSide(line.slice(4))
      if (to === '/dev/null') {
        cur.kind = 'deleted'
        cur.path = cur.previousPath ?? cur.path
      } else {
        cur.path = to
      }
      continue
    }

    if (cur && !hunk) {
      if (line.startsWith('new file mode')) { cur.kind = 'added'; continue }
      if (line.startsWith('deleted file mode')) { cur.kind = 'deleted'; continue }
      if (line.startsWith('rename from ')) { cur.previousPath = line.slice(12); cur.kind = 'renamed'; continue }
      if (line.startsWith('rename to ')) { cur.path = line.slice(10); cur.kind = 'renamed'; continue }
    }

    const hm = HUNK_HEADER_RE.exec(line)
    if (hm?.groups && cur) {
      oldLeft = hm.groups.oLen === undefined ? 1 : Number(hm.groups.oLen)
      newLeft = hm.groups.nLen === undefined ? 1 : Number(hm.groups.nLen)
      hunk = [line]
      cur.hunks.push(hunk)
      continue
    }
  }

  flush()
  return out
}
