import { describe, it, expect } from 'vitest'
import {
  MAX_SIGNATURE_LINE_CHARS,
  compressChange,
  decideLine,
  dropReformatPairs,
  filterSignatureLines,
  renderSignatureLines,
} from '..'
import { parseHunk } from '../../diff'
import { estimateTokens } from '../../tokens'
import type { SignatureLine } from '../../types'
import { HANDLE_HUNK, addedHunk, fileChange } from '../../__tests__/fixtures'

const keep = (text: string, marker: SignatureLine['marker'] = '+') =>
  decideLine({ marker, stripped: text.trim() })

describe('decideLine', () => {
  it('drops blanks, imports and full-line comments', () => {
    for (const t of ['', '   ', 'import os', "import { x } from './x'", 'from a import b', '#include <stdio.h>',
      "const fs = require('fs')", 'use std::io;', '// note', '# note', '/* block', ' * more']) {
      expect(keep(t), t).toBe('drop')
    }
  })

  it('keeps declarations and control flow even as context', () => {
    for (const t of ['def handle(x):', 'export async function run() {', 'class Repo {', 'fn main() {', '@Injectable()',
      'if (a) {', '} else {', 'return x', 'throw new Error()', 'for x in xs:', 'const total = 0', 'n := len(xs)',
      "export * from './y'", "export { a, b } from './z'"]) {
      expect(keep(t, ' '), t).toBe('keep')
    }
  })

  it('keeps other changed lines but not other context', () => {
    expect(keep('x.value = 1', '+')).toBe('keep')
    expect(keep('x.value = 1', '-')).toBe('keep')
    expect(keep('x.value = 1', ' ')).toBe('drop')
  })
})

describe('compressChange', () => {
  it('retains exactly the def / if / return lines and drops the import and comment', () => {
    const out = compressChange(fileChange('src/handler.py', [HANDLE_HUNK]))
    expect(out.signatureLines.map((l) => l.text.trim())).toEqual([
      'def handle(x):',
      'if x is None:',
      'return None',
      'return x.value',
    ])
    expect(out.signatureLines.map((l) => l.line)).toEqual([3, 4, 5, 6])
    expect(out.numbered).toBe(true)
    expect(out.estimatedTokens).toBe(18)
    expect(out.corrupt).toBe(false)
    expect(Object.isFrozen(out)).toBe(true)
  })

  it('clips long lines to their first characters', () => {
    const long = `const q = "${'s'.repeat(900)}" + req.query.id`
    const out = compressChange(fileChange('src/db.ts', [`@@ -0,0 +1 @@\n+${long}`]))
    expect(out.signatureLines).toEqual([{ hunk: 0, line: 1, marker: '+', text: long.slice(0, MAX_SIGNATURE_LINE_CHARS) }])
    expect(out.estimatedTokens).toBe(estimateTokens(`+1| ${long.slice(0, MAX_SIGNATURE_LINE_CHARS)}`))
  })

  it('drops whitespace-only reformat pairs inside a hunk', () => {
    const hunk = ['@@ -1,2 +1,3 @@', '-const a = {b:1}', '-foo( x )', '+const a = { b: 1 }', '+foo(x)', '+return y'].join('\n')
    const out = compressChange(fileChange('src/a.js', [hunk]))
    expect(out.signatureLines).toEqual([{ hunk: 0, line: 3, marker: '+', text: 'return y' }])
  })

  it('does not pair lines across hunks', () => {
    const out = compressChange(fileChange('src/a.js', ['@@ -1 +1,0 @@\n-foo( x )', '@@ -9,0 +9 @@\n+foo(x)']))
    expect(out.signatureLines.map((l) => l.marker + l.text)).toEqual(['-foo( x )', '+foo(x)'])
  })

  it('keeps structural context lines only', () => {
    const hunk = ['@@ -1,3 +1,4 @@', ' function f() {', '   x = 1', '+  x = 2', ' }'].join('\n')
    const out = compressChange(fileChange('src/f.js', [hunk]))
    expect(out.signatureLines.map((l) => l.marker + l.text.trim())).toEqual([' function f() {', '+x = 2'])
  })

  it('marks a file with an unparseable hunk as corrupt and empty', () => {
    const out = compressChange(fileChange('src/a.ts', [addedHunk(2), 'garbage']))
    expect(out).toMatchObject({ signatureLines: [], estimatedTokens: 0, corrupt: true })
  })

  it('falls back to plain rendering when line numbers would cost more than the raw diff', () => {
    const rows = Array.from({ length: 10 }, (_, i) => `+v=${i}`)
    const hunk = ['@@ -99990,0 +99990,10 @@', ...rows].join('\n')
    const out = compressChange(fileChange('src/v.py', [hunk]))
    expect(out.numbered).toBe(false)
    expect(out.estimatedTokens).toBe(13)
    expect(renderSignatureLines(out.signatureLines, false).split('\n')[0]).toBe('+v=0')
  })

  it('never estimates above the raw diff', () => {
    const samples = [
      [HANDLE_HUNK],
      [addedHunk(40)],
      ['@@ -1,2 +1,2 @@\n-a\n+b\n c'],
      ['@@ -99990,0 +99990,3 @@\n+a\n+b\n+c'],
    ]
    for (const hunks of samples) {
      const out = compressChange(fileChange('src/x.ts', hunks))
      expect(out.estimatedTokens).toBeLessThanOrEqual(estimateTokens(hunks.join('\n')))
    }
  })
})

describe('filterSignatureLines', () => {
  const hunk = [
    '@@ -1,6 +1,7 @@',
    ' import os',
    '-# old comment',
    '-total=sum( xs )',
    '+total = sum(xs)',
    '+def avg(xs):',
    '+    return total / len(xs)',
    ' ',
    '+print(avg([1]))',
  ].join('\n')
  const lines: SignatureLine[] = (parseHunk(hunk)?.lines ?? []).map((l) => ({ hunk: 0, ...l }))

  it('is idempotent', () => {
    const once = filterSignatureLines(lines)
    expect(once.map((l) => l.text.trim())).toEqual(['def avg(xs):', 'return total / len(xs)', 'print(avg([1]))'])
    expect(filterSignatureLines(once)).toEqual(once)
  })

  it('pairs only as many lines as match on both sides', () => {
    const three: SignatureLine[] = [
      { hunk: 0, line: 1, marker: '-', text: 'x(1)' },
      { hunk: 0, line: 1, marker: '+', text: 'x( 1 )' },
      { hunk: 0, line: 2, marker: '+', text: 'x(1)' },
    ]
    expect(dropReformatPairs(three)).toEqual([{ hunk: 0, line: 2, marker: '+', text: 'x(1)' }])
  })
})
