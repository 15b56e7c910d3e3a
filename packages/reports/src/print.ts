import { bold, cyan, dim, green, red, yellow } from 'colorette'
import type { TrendReport } from './trend'
import { signed } from './trend'

const paint = { improving: green, regressing: red, flat: yellow } as const

export function printTrendSummary(trend: TrendReport | null, out: (s: string) => void = console.log) {
  if (!trend) {
    out(dim('Not enough history for a trend (need at least 2 runs)'))
    return
  }
  const last = trend.points[trend.points.length - 1]
  out(bold('Audit Trend'))
  out('  ' + cyan('runs:        ') + trend.points.length)
  out('  ' + cyan('direction:   ') + paint[trend.direction](trend.direction))
  out('  ' + cyan('issues:      ') + `${last?.issues ?? 0}` + dim(` (${signed(trend.issueDelta)})`))
  out('  ' + cyan('suggestions: ') + `${last?.suggestions ?? 0}` + dim(` (${signed(trend.suggestionDelta)})`))
  for (const r of trend.recurringIssues) {
    out('  ' + dim(`• ${r.text} (${r.runs} runs)`))
  }
}
