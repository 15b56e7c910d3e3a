import fs from 'node:fs'
import path from 'node:path'
import { execFile } from 'node:child_process'
import { promisify } from 'node:util'
import { AuditInputError, describeError, type AuditLogger, type Change, type SourceFile } from '@archgate/core'
import type { ResolvedConfig } from '../config/config'

const execFileAsync = promisify(execFile)

export type ChangeSource =
  | { kind: 'diff-file'; path: string }
  | { kind: 'stdin' }
  | { kind: 'staged' }
  | { kind: 'full-repo' }

/** Runs git and resolves with stdout. Tests pass their own. */
export type GitRunner = (args: string[], cwd: string) => Promise<string>

export const runGit: GitRunner = async (args, cwd) => {
  const { stdout } = await execFileAsync('git', args, { cwd, maxBuffer: 64 * 1024 * 1024, encoding: 'utf8' })
  return stdout
}

export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const parts: string[] = []
  stream.setEncoding('utf8')
  for await (const chunk of stream) parts.push(String(chunk))
  return parts.join('')
}

export const STAGED_DIFF_ARGS = ['diff', '--cached', '--diff-filter=ACMR']
export const HEAD_COMMIT_ARGS = ['rev-parse', '--short=12', 'HEAD']

/** Short HEAD hash, or undefined outside a repository or before the first commit. */
export async function readHeadCommit(repoRoot: string, git: GitRunner = runGit, logger?: AuditLogger): Promise<string | undefined> {
  try {
    return (await git(HEAD_COMMIT_ARGS, repoRoot)).trim() || undefined
  } catch (e) {
    logger?.debug(`no HEAD commit: ${describeError(e)}`)
    return undefined
  }
}

/* ──────────────────────────────────────────────────────────────
 * full-repo scan
 * ──────────────────────────────────────────────────────────── */
function walk(dir: string, scan: ResolvedConfig['scan'], out: string[]) {
  for (const ent of fs.readdirSync(dir, { withFileTypes: true })) {
    if (scan.exclude.some((x) => ent.name === x || (x.startsWith('.') && ent.name.endsWith(x)))) continue
    const abs = path.join(dir, ent.name)
    if (ent.isDirectory()) walk(abs, scan, out)
    else if (ent.isFile() && scan.extensions.includes(path.extname(ent.name))) out.push(abs)
  }
}

/**
 * Source files under the configured dirs (`src`, `lib`, `app` by default), or the whole
 * repo when none of them holds a matching file. Paths are repo-relative, posix, sorted.
 */
export function scanRepo(repoRoot: string, scan: ResolvedConfig['scan']): SourceFile[] {
  const found: string[] = []
  for (const d of scan.dirs) {
    const abs = path.join(repoRoot, d)
    if (fs.existsSync(abs) && fs.statSync(abs).isDirectory()) walk(abs, scan, found)
  }
  if (!found.length) walk(repoRoot, scan, found)
  return found
    .map((abs) => ({
      path: path.relative(repoRoot, abs).split(path.sep).join('/'),
      content: fs.readFileSync(abs, 'utf8'),
    }))
    .sort((a, b) => a.path.localeCompare(b.path))
}

export interface ReadChangeContext {
  repoRoot: string
  /** Base for a relative diff file path */
  cwd: string
  scan: ResolvedConfig['scan']
  git?: GitRunner
  stdin?: () => Promise<string>
}

/** Any failure to obtain the change is an input error; no review starts. */
export async function readChange(source: ChangeSource, ctx: ReadChangeContext): Promise<Change> {
  try {
    switch (source.kind) {
      case 'diff-file': {
        const file = path.resolve(ctx.cwd, source.path)
        return { kind: 'diff', text: fs.readFileSync(file, 'utf8') }
      }
      case 'stdin':
        return { kind: 'diff', text: await (ctx.stdin ?? readStdin)() }
      case 'staged':
        return { kind: 'diff', text: await (ctx.git ?? runGit)(STAGED_DIFF_ARGS, ctx.repoRoot) }
      case 'full-repo':
        return { kind: 'files', files: scanRepo(ctx.repoRoot, ctx.scan) }
    }
  } catch (e) {
    throw new AuditInputError(`cannot read the change (${source.kind}): ${describeError(e)}`, 'change-unreadable', { cause: e })
  }
}
