import { mdEscapeInline, normalizeText } from '@archgate/core'
import type { HistoryEntry } from './history'

export type TrendDirection = 'improving' | 'regressing' | 'flat'

export interface TrendPoint {
  id: string
  timestamp: string
  approved: boolean
  issues: number
  suggestions: number
}

export interface RecurringIssue {
  text: string
  /** Number of runs that reported it */
  runs: number
}

export interface TrendReport {
  /** Oldest → newest */
  points: TrendPoint[]
  /** Between the two most recent runs */
  direction: TrendDirection
  issueDelta: number
  suggestionDelta: number
  approval: { from: boolean; to: boolean }
  recurringIssues: RecurringIssue[]
}

export interface TrendOptions {
  /** How many recurring issues to rank */
  topIssues?: number
}

export const DEFAULT_TOP_ISSUES = 5

function directionOf(issueDelta: number, suggestionDelta: number): TrendDirection {
  const d = issueDelta !== 0 ? issueDelta : suggestionDelta
  if (d < 0) return 'improving'
  if (d > 0) return 'regressing'
  return 'flat'
}

/**
 * Issues reported by at least two runs, most frequent first; ties keep first-seen order.
 * Text is matched the way findings are deduplicated.
 */
function rankRecurring(entries: HistoryEntry[], top: number): RecurringIssue[] {
  const byKey = new Map<string, RecurringIssue>()
  for (const e of entries) {
    const seen = new Set<string>()
    for (const f of e.result.issues) {
      const key = normalizeText(f.text)
      if (!key || seen.has(key)) continue
      seen.add(key)
      const hit = byKey.get(key)
      if (hit) hit.runs++
      else byKey.set(key, { text: f.text, runs: 1 })
    }
  }
  return [...byKey.values()]
    .filter((r) => r.runs > 1)
    .sort((a, b) => b.runs - a.runs)
    .slice(0, Math.max(0, top))
}

/** Derived view over history. `null` with fewer than two runs to compare. */
export function computeTrend(entries: HistoryEntry[], opts: TrendOptions = {}): TrendReport | null {
  if (entries.length < 2) return null

  const points: TrendPoint[] = entries.map((e) => ({
    id: e.id,
    timestamp: e.result.metadata.timestamp,
    approved: e.result.approved,
    issues: e.result.issues.length,
    suggestions: e.result.suggestions.length,
  }))
  const prev = points[points.length - 2]
  const last = points[points.length - 1]
  if (!prev || !last) return null

  const issueDelta = last.issues - prev.issues
  const suggestionDelta = last.suggestions - prev.suggestions

  return {
    points,
    direction: directionOf(issueDelta, suggestionDelta),
    issueDelta,
    suggestionDelta,
    approval: { from: prev.approved, to: last.approved },
    recurringIssues: rankRecurring(entries, opts.topIssues ?? DEFAULT_TOP_ISSUES),
  }
}

export const signed = (n: number) => (n > 0 ? `+${n}` : String(n))
const status = (approved: boolean) => (approved ? 'APPROVED' : 'NOT APPROVED')

export function renderTrendMarkdown(trend: TrendReport, title = 'Architecture Audit Trend'): string {
  const first = trend.points[trend.points.length - 2]
  const last = trend.points[trend.points.length - 1]

  const lines: string[] = [
    `# ${title}`,
    '',
    `**Direction:** ${trend.direction}  `,
    `**Issues:** ${first?.issues ?? 0} → ${last?.issues ?? 0} (${signed(trend.issueDelta)})  `,
    `**Suggestions:** ${first?.suggestions ?? 0} → ${last?.suggestions ?? 0} (${signed(trend.suggestionDelta)})  `,
    `**Approval:** ${status(trend.approval.from)} → ${status(trend.approval.to)}`,
    '',
    `## Runs (${trend.points.length})`,
    '',
    '| Run | Timestamp | Status | Issues | Suggestions |',
    '|---|---|---|---:|---:|',
    ...trend.points.map((p) => `| ${p.id} | ${p.timestamp} | ${status(p.approved)} | ${p.issues} | ${p.suggestions} |`),
    '',
    '## Recurring issues',
    '',
  ]

  if (!trend.recurringIssues.length) lines.push('> No recurring issues.')
  else lines.push(...trend.recurringIssues.map((r, i) => `${i + 1}. ${mdEscapeInline(r.text)} (${r.runs} runs)`))

  return lines.join('\n') + '\n'
}
