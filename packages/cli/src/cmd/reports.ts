import { ReportStore, printTrendSummary } from '@archgate/reports'
import { cliLogger, info, ok, printHistory } from '../cli-utils'
import type { ResolvedConfig } from '../config/config'

type StoreConfig = Pick<ResolvedConfig, 'out'>

const storeFor = (rc: StoreConfig, debug = false) => new ReportStore({ rootDir: rc.out.reportsDirAbs, logger: cliLogger(debug) })

/** history: list recorded audits, oldest first */
export function historyCLI(rc: StoreConfig, opts: { json?: boolean } = {}) {
  const entries = storeFor(rc).listHistory()
  if (opts.json) {
    console.log(JSON.stringify(entries.map((e) => ({
      id: e.id,
      timestamp: e.result.metadata.timestamp,
      approved: e.result.approved,
      issues: e.result.issues.length,
      suggestions: e.result.suggestions.length,
    })), null, 2))
    return entries
  }
  printHistory(entries)
  return entries
}

/** trend: recompute trend.json / trend.md from history */
export function trendCLI(rc: StoreConfig, opts: { top?: number } = {}) {
  const store = new ReportStore({ rootDir: rc.out.reportsDirAbs, logger: cliLogger(), topIssues: opts.top })
  const written = store.writeTrend()
  printTrendSummary(written?.trend ?? null)
  if (written) ok(`trend written to ${written.paths.md}`)
  return written
}

/** prune: keep the `keep` most recent history entries */
export function pruneCLI(rc: StoreConfig, keep: number) {
  const removed = storeFor(rc).keepMostRecent(keep)
  if (!removed.length) info(`nothing to prune (keeping ${keep})`)
  else ok(`removed ${removed.length} history entr${removed.length === 1 ? 'y' : 'ies'}`)
  return removed
}
