import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

export type Sandbox = {
  root: string
  env: NodeJS.ProcessEnv
  write: (rel: string, content: string) => string
  cleanup: () => void
}

/** Temporary repo: a `.git` marker, BREVITY_REPO_ROOT pointing at it, and a sample diff */
export function makeSandbox(prefix = 'brevity-sbx-'): Sandbox {
  const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)))
  fs.mkdirSync(path.join(root, '.git'), { recursive: true })

  const write = (rel: string, content: string) => {
    const p = path.join(root, rel)
    fs.mkdirSync(path.dirname(p), { recursive: true })
    fs.writeFileSync(p, content, 'utf8')
    return p
  }

  write(
    'fixtures/changes.diff',
    [
      'diff --git a/src/api/handler.ts b/src/api/handler.ts',
      '--- a/src/api/handler.ts',
      '+++ b/src/api/handler.ts',
      '@@ -1,2 +1,3 @@',
      ' export function handle(input: string) {',
      '+  return eval(input)',
      ' }',
      '',
    ].join('\n'),
  )

  return {
    root,
    env: { BREVITY_REPO_ROOT: root },
    write,
    cleanup: () => {
      fs.rmSync(root, { recursive: true, force: true })
    },
  }
}

export async function withSandbox<T>(fn: (sbx: Sandbox) => Promise<T> | T): Promise<T> {
  const sbx = makeSandbox()
  try {
    return await fn(sbx)
  } finally {
    sbx.cleanup()
  }
}
