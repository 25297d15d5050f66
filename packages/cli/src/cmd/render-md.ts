import fs from 'node:fs'
import { renderMarkdown } from '@brevity/core'
import { ensureDirForFile, printRenderSummaryMarkdown } from '../cli-utils'
import { readArtifact } from '../review/io'

export interface RenderMdOptions {
  repoRoot: string
  inFile: string
  outFile: string
  groupByFile?: boolean
  title?: string
}

/** review.json → Markdown; returns the number of findings rendered */
export function renderMdCLI(opts: RenderMdOptions): number {
  const artifact = readArtifact(opts.inFile)
  const md = renderMarkdown(artifact.result, { groupByFile: opts.groupByFile, title: opts.title })

  ensureDirForFile(opts.outFile)
  fs.writeFileSync(opts.outFile, md, 'utf8')

  printRenderSummaryMarkdown({
    repoRoot: opts.repoRoot,
    inFile: opts.inFile,
    outFile: opts.outFile,
    findingsCount: artifact.result.findings.length,
  })
  return artifact.result.findings.length
}
