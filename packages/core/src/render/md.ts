import { describeStrategy } from '../aggregate'
import type { AuditResult, Finding } from '../schemas'

type MDOptions = {
  title?: string
  /** Append the provenance tag after each finding */
  showSource?: boolean
}

export function mdEscapeInline(s: string): string {
  // minimal: escape | * _ ` and \
  return (s ?? '')
    .replace(/\\/g, '\\\\')
    .replace(/\|/g, '\\|')
    .replace(/\*/g, '\\*')
    .replace(/_/g, '\\_')
    .replace(/`/g, '\\`')
}

export function sourceTag(f: Finding): string {
  const p = f.provenance
  const parts: string[] = [p.strategy]
  if (p.chunk !== undefined) parts.push(`chunk ${p.chunk + 1}`)
  if (p.fallback) parts.push(p.reason ? `fallback: ${p.reason}` : 'fallback')
  if (p.truncated) parts.push('truncated')
  return parts.join(', ')
}

function list(findings: Finding[], showSource: boolean, empty: string): string[] {
  if (!findings.length) return [`> ${empty}`]
  return findings.map((f, i) => {
    const tag = showSource ? ` _(${sourceTag(f)})_` : ''
    return `${i + 1}. ${mdEscapeInline(f.text)}${tag}`
  })
}

export function renderAuditMarkdown(result: AuditResult, opts: MDOptions = {}): string {
  const title = opts.title ?? 'Architecture Audit Report'
  const showSource = opts.showSource ?? true
  const m = result.metadata

  const header = [
    `**Status:** ${result.approved ? '✅ APPROVED' : '❌ NOT APPROVED'}`,
    `**Timestamp:** ${m.timestamp}`,
    `**Strategy:** ${describeStrategy(m)}`,
    `**Reviewer:** ${mdEscapeInline(m.provider)}${m.model ? ` (${mdEscapeInline(m.model)})` : ''}`,
  ]
  if (m.commit) header.push(`**Commit:** \`${m.commit}\``)
  if (m.rulesFile) header.push(`**Rules:** ${mdEscapeInline(m.rulesFile)}`)

  const lines: string[] = [
    `# ${title}`,
    '',
    // hard line breaks
    ...header.map((l, i) => (i < header.length - 1 ? `${l}  ` : l)),
    '',
    '## Summary',
    '',
    mdEscapeInline(result.summary),
    '',
    `## Issues (${result.issues.length})`,
    '',
    ...list(result.issues, showSource, 'No issues found.'),
    '',
    `## Suggestions (${result.suggestions.length})`,
    '',
    ...list(result.suggestions, showSource, 'No suggestions.'),
    '',
    '## Additional Information',
    '',
    `- Units reviewed: ${m.units}`,
    `- Chunks: ${m.chunks}`,
    `- Remote calls: ${m.delegateCalls}`,
  ]

  if (m.failedChunks.length) lines.push(`- Fallback chunks: ${m.failedChunks.map((c) => c + 1).join(', ')}`)
  if (m.oversizedChunks.length) lines.push(`- Oversized chunks: ${m.oversizedChunks.map((c) => c + 1).join(', ')}`)

  if (m.remoteSummaries.length) {
    lines.push('', '### Reviewer summaries', '', ...m.remoteSummaries.map((s) => `- ${mdEscapeInline(s)}`))
  }
  if (m.notes.length) {
    lines.push('', '### Notes', '', ...m.notes.map((n) => `- ${mdEscapeInline(n)}`))
  }

  return lines.join('\n') + '\n'
}

export default renderAuditMarkdown
