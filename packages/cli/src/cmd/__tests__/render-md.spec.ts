import fs from 'node:fs'
import path from 'node:path'
import { beforeEach, afterEach, describe, expect, it, vi } from 'vitest'
import { renderMarkdown } from '@brevity/core'

import { makeSandbox, type Sandbox } from '../../__tests__/helpers/sandbox'
import { sampleArtifact } from '../../__tests__/helpers/fixtures'
import { CliInputError } from '../../cli-utils'
import { renderMdCLI } from '../render-md'

describe('render-md (with sandbox)', () => {
  let sbx: Sandbox

  beforeEach(() => {
    sbx = makeSandbox('brevity-render-md-')
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    sbx.cleanup()
  })

  it('renders review.json into Markdown and returns the finding count', () => {
    const inFile = sbx.write('.brevity/review.json', JSON.stringify(sampleArtifact))
    const outFile = path.join(sbx.root, 'reports', 'review.human.md')

    expect(renderMdCLI({ repoRoot: sbx.root, inFile, outFile })).toBe(1)

    const md = fs.readFileSync(outFile, 'utf8')
    expect(md).toBe(renderMarkdown(sampleArtifact.result))
    expect(md).toContain('- `src/a.ts:7` unchecked index')
  })

  it('passes grouping and title through', () => {
    const inFile = sbx.write('.brevity/review.json', JSON.stringify(sampleArtifact))
    const outFile = path.join(sbx.root, 'out.md')

    renderMdCLI({ repoRoot: sbx.root, inFile, outFile, groupByFile: true, title: 'PR 12' })

    const md = fs.readFileSync(outFile, 'utf8')
    expect(md.startsWith('# PR 12\n')).toBe(true)
    expect(md).toContain('## src/a.ts (1)')
    expect(md).toContain('- **bug** (line 7): unchecked index')
  })

  it('fails with an input error when review.json is missing', () => {
    expect(() =>
      renderMdCLI({ repoRoot: sbx.root, inFile: path.join(sbx.root, 'none.json'), outFile: path.join(sbx.root, 'x.md') }),
    ).toThrow(CliInputError)
  })
})
