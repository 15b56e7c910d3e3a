import fs from 'node:fs'
import path from 'node:path'
import {
  AuditResult,
  PersistenceError,
  createLogger,
  describeError,
  renderAuditMarkdown,
  type AuditLogger,
} from '@archgate/core'
import {
  HISTORY_DIR,
  MAX_ID_SUFFIX,
  candidateId,
  compareHistoryIds,
  historyStamp,
  isHistoryId,
  type HistoryEntry,
} from './history'
import { atomicWrite, createExclusive, isErrno, toJson } from './io'
import { computeTrend, renderTrendMarkdown, type TrendReport } from './trend'

// ── Per-run state ───────────────────────────────────────────────

export type StoreState = 'NEW' | 'LATEST_WRITTEN' | 'HISTORY_APPENDED' | 'TREND_COMPUTED'

export const STORE_TRANSITIONS: Record<StoreState, StoreState[]> = {
  NEW:              ['LATEST_WRITTEN'],
  LATEST_WRITTEN:   ['HISTORY_APPENDED'],  // terminal when history is off
  HISTORY_APPENDED: ['TREND_COMPUTED'],    // terminal with < 2 entries
  TREND_COMPUTED:   [],
}

export interface ArtifactPaths {
  json: string
  md: string
}

export interface ReportStoreOptions {
  /** Reports directory; nothing is resolved against cwd */
  rootDir: string
  logger?: AuditLogger
  /** Recurring issues kept in the trend */
  topIssues?: number
}

export interface SaveOptions {
  /** Append to history and refresh the trend (default true) */
  history?: boolean
}

export interface SaveOutcome {
  state: StoreState
  latest: ArtifactPaths
  entry?: HistoryEntry
  trend?: TrendReport
  trendPaths?: ArtifactPaths
}

function guard<T>(what: string, file: string, fn: () => T): T {
  try {
    return fn()
  } catch (e) {
    if (e instanceof PersistenceError) throw e
    throw new PersistenceError(`${what} failed for ${file}: ${describeError(e)}`, file, { cause: e })
  }
}

/**
 * Latest snapshot, append-only history and derived trend under one root.
 *
 *   <root>/latest.json, latest.md
 *   <root>/history/audit_YYYYMMDD_HHMMSS[_N].json, .md
 *   <root>/trend.json, trend.md
 */
export class ReportStore {
  readonly rootDir: string
  private readonly logger: AuditLogger
  private readonly topIssues?: number

  constructor(opts: ReportStoreOptions) {
    this.rootDir = path.resolve(opts.rootDir)
    this.logger = opts.logger ?? createLogger({ scope: 'reports' })
    this.topIssues = opts.topIssues
  }

  get historyDir(): string {
    return path.join(this.rootDir, HISTORY_DIR)
  }

  get latestPaths(): ArtifactPaths {
    return { json: path.join(this.rootDir, 'latest.json'), md: path.join(this.rootDir, 'latest.md') }
  }

  get trendPaths(): ArtifactPaths {
    return { json: path.join(this.rootDir, 'trend.json'), md: path.join(this.rootDir, 'trend.md') }
  }

  /** Last writer wins; readers never see a half-written file. */
  writeLatest(result: AuditResult): ArtifactPaths {
    const p = this.latestPaths
    guard('write latest report', p.json, () => atomicWrite(p.json, toJson(result)))
    guard('write latest report', p.md, () => atomicWrite(p.md, renderAuditMarkdown(result)))
    return p
  }

  /**
   * New record under a fresh id. The JSON file is created exclusively, so two runs
   * landing on the same second end up as `_N` siblings instead of overwriting.
   */
  appendHistory(result: AuditResult): HistoryEntry {
    const stamp = new Date(result.metadata.timestamp)
    const base = historyStamp(Number.isNaN(stamp.getTime()) ? new Date() : stamp)
    const json = toJson(result)

    for (let attempt = 1; attempt <= MAX_ID_SUFFIX; attempt++) {
      const id = candidateId(base, attempt)
      const file = path.join(this.historyDir, `${id}.json`)
      if (!guard('append history', file, () => createExclusive(file, json))) continue

      const md = path.join(this.historyDir, `${id}.md`)
      guard('append history', md, () => atomicWrite(md, renderAuditMarkdown(result)))
      this.logger.debug(`[reports] history entry ${id}`)
      return { id, file, result }
    }
    throw new PersistenceError(`no free history id for ${base} after ${MAX_ID_SUFFIX} attempts`, this.historyDir)
  }

  private historyIds(): string[] {
    const dir = this.historyDir
    const names = guard('list history', dir, () => {
      try {
        return fs.readdirSync(dir)
      } catch (e) {
        if (isErrno(e, 'ENOENT')) return []
        throw e
      }
    })
    return names
      .filter((n) => n.endsWith('.json'))
      .map((n) => n.slice(0, -'.json'.length))
      .filter(isHistoryId)
      .sort(compareHistoryIds)
  }

  /** Oldest → newest. Unreadable or invalid records are skipped with a warning. */
  listHistory(): HistoryEntry[] {
    const out: HistoryEntry[] = []
    for (const id of this.historyIds()) {
      const file = path.join(this.historyDir, `${id}.json`)
      let raw: unknown
      try {
        raw = JSON.parse(fs.readFileSync(file, 'utf8'))
      } catch (e) {
        this.logger.warn(`skipping history entry ${id}: ${describeError(e)}`)
        continue
      }
      const parsed = AuditResult.safeParse(raw)
      if (!parsed.success) {
        const first = parsed.error.issues[0]
        this.logger.warn(`skipping history entry ${id}: ${first ? `${first.path.join('.')}: ${first.message}` : 'invalid record'}`)
        continue
      }
      out.push({ id, file, result: parsed.data })
    }
    return out
  }

  /** Recompute and write trend.json / trend.md. `null` while history holds fewer than two runs. */
  writeTrend(entries: HistoryEntry[] = this.listHistory()): { trend: TrendReport; paths: ArtifactPaths } | null {
    const trend = computeTrend(entries, { topIssues: this.topIssues })
    if (!trend) return null
    const p = this.trendPaths
    guard('write trend', p.json, () => atomicWrite(p.json, toJson(trend)))
    guard('write trend', p.md, () => atomicWrite(p.md, renderTrendMarkdown(trend)))
    return { trend, paths: p }
  }

  /** One run: NEW → LATEST_WRITTEN → HISTORY_APPENDED → (TREND_COMPUTED). */
  save(result: AuditResult, opts: SaveOptions = {}): SaveOutcome {
    let state: StoreState = 'NEW'
    const advance = (to: StoreState) => {
      if (!STORE_TRANSITIONS[state].includes(to)) {
        throw new PersistenceError(`invalid report store transition ${state} → ${to}`, this.rootDir)
      }
      state = to
    }

    const latest = this.writeLatest(result)
    advance('LATEST_WRITTEN')
    if (opts.history === false) return { state, latest }

    const entry = this.appendHistory(result)
    advance('HISTORY_APPENDED')

    const written = this.writeTrend()
    if (!written) return { state, latest, entry }
    advance('TREND_COMPUTED')
    return { state, latest, entry, trend: written.trend, trendPaths: written.paths }
  }

  /**
   * Retention: delete all but the `n` most recent entries (json + md).
   * Returns the removed ids. Never called by the audit itself.
   */
  keepMostRecent(n: number): string[] {
    if (!Number.isInteger(n) || n < 0) {
      throw new PersistenceError(`keep count must be a non-negative integer, got ${n}`, this.historyDir)
    }
    const ids = this.historyIds()
    const doomed = ids.slice(0, Math.max(0, ids.length - n))
    for (const id of doomed) {
      for (const ext of ['.json', '.md']) {
        const file = path.join(this.historyDir, id + ext)
        guard('prune history', file, () => fs.rmSync(file, { force: true }))
      }
    }
    if (doomed.length) this.logger.info(`pruned ${doomed.length} history entr${doomed.length === 1 ? 'y' : 'ies'}`)
    return doomed
  }
}
