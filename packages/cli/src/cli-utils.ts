import fs from 'node:fs'
import path from 'node:path'
import { pathToFileURL } from 'node:url'
import { bold, cyan, dim, green, red, yellow } from 'colorette'
import { describeStrategy, type AuditLogger, type AuditResult } from '@archgate/core'
import type { HistoryEntry, SaveOutcome } from '@archgate/reports'

/** ────────────────────────────────────────────────────────────────────────────
 *  FS helpers
 *  ──────────────────────────────────────────────────────────────────────────── */
export function ensureDirForFile(p: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true })
}

/** Resolve a (possibly relative) path against repo root */
export function resolveRepoPath(repoRoot: string, p: string) {
  return path.isAbsolute(p) ? p : path.join(repoRoot, p)
}

/** Make file:// link for pretty output */
export const linkifyFile = (absPath: string) => pathToFileURL(absPath).href

/** Pretty rel + file link for logs */
export function prettyRelLink(repoRoot: string, absPath: string) {
  return `${dim(path.relative(repoRoot, absPath))} ${cyan('→')} ${dim(linkifyFile(absPath))}`
}

/** ────────────────────────────────────────────────────────────────────────────
 *  Repo root detection
 *  ────────────────────────────────────────────────────────────────────────────
 *  Rules:
 *   - If ARCHGATE_REPO_ROOT is set and exists → use it
 *   - Else walk up from `start` until .git or an archgate rc file
 *   - If not found, fall back to `start`
 */
export const ROOT_MARKERS = ['.git', '.archgaterc.json', 'archgate.config.yml', 'archgate.config.yaml']

export function findRepoRoot(start = process.cwd()): string {
  const envRoot = process.env.ARCHGATE_REPO_ROOT
  if (envRoot && fs.existsSync(envRoot)) {
    return path.resolve(envRoot)
  }

  let dir = path.resolve(start)
  while (true) {
    if (ROOT_MARKERS.some((m) => fs.existsSync(path.join(dir, m)))) return dir

    const parent = path.dirname(dir)
    if (parent === dir) {
      // reached FS root
      return path.resolve(start)
    }
    dir = parent
  }
}

/** ────────────────────────────────────────────────────────────────────────────
 *  Console
 *  ──────────────────────────────────────────────────────────────────────────── */
export const ok   = (msg: string) => console.log(green('✔ ') + msg)
export const info = (msg: string) => console.log(cyan('ℹ ') + msg)
export const warn = (msg: string) => console.warn(yellow('▲ ') + msg)
export const fail = (msg: string) => console.error(red('✖ ') + msg)

/** Core logger backed by the console helpers; debug lines are dimmed and opt-in. */
export function cliLogger(debug = false): AuditLogger {
  return {
    debug: (msg) => { if (debug) console.log(dim(msg)) },
    info,
    warn,
  }
}

/** ────────────────────────────────────────────────────────────────────────────
 *  Unified summaries
 *  ──────────────────────────────────────────────────────────────────────────── */

/** Print nice summary for an audit run */
export function printAuditSummary(args: {
  repoRoot: string
  result: AuditResult
  saved: SaveOutcome
  exitCode: number
}) {
  const { repoRoot, result, saved, exitCode } = args
  const m = result.metadata

  console.log('')
  console.log(bold('Audit summary'))
  console.log('  ' + cyan('status:   ') + (result.approved ? green('APPROVED') : red('NOT APPROVED')))
  console.log('  ' + cyan('reviewer: ') + m.provider + (m.model ? dim(` (${m.model})`) : ''))
  console.log('  ' + cyan('strategy: ') + describeStrategy(m))
  if (m.commit) console.log('  ' + cyan('commit:   ') + m.commit)
  console.log('  ' + cyan('findings: ')
    + `${result.issues.length + result.suggestions.length} `
    + dim(`(issues ${result.issues.length}, suggestions ${result.suggestions.length})`))
  console.log('  ' + cyan('outputs:  ')
    + `${dim(path.relative(repoRoot, saved.latest.json))}, `
    + `${dim(path.relative(repoRoot, saved.latest.md))}`)
  if (saved.entry) console.log('  ' + cyan('history:  ') + saved.entry.id)
  if (saved.trend) console.log('  ' + cyan('trend:    ') + saved.trend.direction)
  for (const note of m.notes) console.log('  ' + dim(`• ${note}`))

  const line = exitCode === 0 ? green('exit 0') : red(`exit ${exitCode}`)
  console.log('  ' + cyan('exit:     ') + line + dim(' (0 approved, 1 not approved, 2 failure)'))
}

/** Print the history list, oldest first */
export function printHistory(entries: HistoryEntry[]) {
  console.log('')
  console.log(bold(`History (${entries.length})`))
  if (!entries.length) {
    console.log('  ' + dim('no audits recorded yet'))
    return
  }
  for (const e of entries) {
    const r = e.result
    const status = r.approved ? green('✔') : red('✖')
    console.log(`  ${status} ${e.id} ` + dim(`issues ${r.issues.length}, suggestions ${r.suggestions.length}, ${r.metadata.strategy}`))
  }
}

/** Print nice summary for render → Markdown */
export function printRenderSummaryMarkdown(args: {
  repoRoot: string
  inFile: string
  outFile: string
  findingsCount?: number
}) {
  const { repoRoot, inFile, outFile, findingsCount } = args
  console.log('')
  console.log(bold('Render (Markdown) summary'))
  console.log('  ' + cyan('input:   ') + prettyRelLink(repoRoot, inFile))
  console.log('  ' + cyan('output:  ') + prettyRelLink(repoRoot, outFile))
  if (typeof findingsCount === 'number') {
    console.log('  ' + cyan('findings: ') + findingsCount)
  }
  ok('Markdown written')
}
