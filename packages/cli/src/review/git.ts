import { execFileSync } from 'node:child_process'
import { CliInputError } from '../cli-utils'

const MAX_DIFF_BYTES = 64 * 1024 * 1024

/** `git diff` of the working tree, or of the index with `staged` */
export function readGitDiff(repoRoot: string, opts: { staged?: boolean } = {}): string {
  const args = ['diff', '--no-color', '--no-ext-diff', ...(opts.staged ? ['--cached'] : [])]
  try {
    return execFileSync('git', args, {
      cwd: repoRoot,
      encoding: 'utf8',
      maxBuffer: MAX_DIFF_BYTES,
      stdio: ['ignore', 'pipe', 'pipe'],
    })
  } catch (e) {
    const stderr = readStderr(e)
    throw new CliInputError(`git ${args.join(' ')} failed${stderr ? `: ${stderr}` : ''}`, { cause: e })
  }
}

function readStderr(e: unknown): string {
  if (typeof e !== 'object' || e === null || !('stderr' in e)) return ''
  const { stderr } = e
  if (typeof stderr === 'string') return stderr.trim()
  if (Buffer.isBuffer(stderr)) return stderr.toString('utf8').trim()
  return ''
}
