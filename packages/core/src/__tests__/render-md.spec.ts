import { describe, it, expect } from 'vitest'
import { aggregate } from '../aggregate'
import { mdEscapeInline, renderAuditMarkdown, sourceTag } from '../render/md'
import type { AuditMetadata, Finding } from '../schemas'

const metadata: AuditMetadata = {
  timestamp: '2026-03-01T10:00:00.000Z',
  strategy: 'chunked',
  provider: 'openai',
  model: 'gpt-4o-mini',
  units: 3,
  chunks: 2,
  delegateCalls: 2,
  failedChunks: [1],
  oversizedChunks: [],
  remoteSummaries: ['chunk looks fine'],
  notes: ['chunk 2: timeout, reviewed by pattern matching'],
}

const issue: Finding = {
  text: 'Do not use `any` in core_utils',
  kind: 'issue',
  provenance: { strategy: 'chunked', chunk: 0, units: ['a.ts'] },
}
const suggestion: Finding = {
  text: 'Prefer a logger',
  kind: 'suggestion',
  provenance: { strategy: 'pattern-match', chunk: 1, units: ['b.ts'], fallback: true, reason: 'timeout' },
}
const result = aggregate([issue, suggestion], metadata)

describe('render/md', () => {
  it('escapes inline markdown', () => {
    expect(mdEscapeInline('a|b*c_d`e\\')).toBe('a\\|b\\*c\\_d\\`e\\\\')
  })

  it('tags provenance', () => {
    expect(sourceTag(issue)).toBe('chunked, chunk 1')
    expect(sourceTag(suggestion)).toBe('pattern-match, chunk 2, fallback: timeout')
  })

  it('renders the full report', () => {
    const md = renderAuditMarkdown(result)
    const lines = md.split('\n')

    expect(lines[0]).toBe('# Architecture Audit Report')
    expect(lines).toContain('**Status:** ❌ NOT APPROVED  ')
    expect(lines).toContain('**Strategy:** chunked review of 2 chunks, 1 fell back to pattern matching  ')
    expect(lines).toContain('**Reviewer:** openai (gpt-4o-mini)')
    expect(lines).toContain('1. Do not use \\`any\\` in core\\_utils _(chunked, chunk 1)_')
    expect(lines).toContain('1. Prefer a logger _(pattern-match, chunk 2, fallback: timeout)_')
    expect(lines).toContain('- Fallback chunks: 2')
    expect(lines).toContain('- chunk looks fine')
    expect(lines).toContain('- chunk 2: timeout, reviewed by pattern matching')
    expect(md.endsWith('\n')).toBe(true)
  })

  it('tags findings reviewed from a truncated request', () => {
    const cut: Finding = { ...issue, provenance: { ...issue.provenance, truncated: true } }
    expect(sourceTag(cut)).toBe('chunked, chunk 1, truncated')
  })

  it('records the commit and rules file in the header', () => {
    const md = renderAuditMarkdown(aggregate([issue], { ...metadata, commit: '0123456789ab', rulesFile: 'docs/AGENTS.md' }))
    const lines = md.split('\n')

    expect(lines).toContain('**Reviewer:** openai (gpt-4o-mini)  ')
    expect(lines).toContain('**Commit:** `0123456789ab`  ')
    expect(lines).toContain('**Rules:** docs/AGENTS.md')
  })

  it('renders empty sections for an approved result', () => {
    const md = renderAuditMarkdown(aggregate([], { ...metadata, strategy: 'none', failedChunks: [], notes: [], remoteSummaries: [] }), {
      title: 'Audit',
      showSource: false,
    })
    expect(md).toContain('# Audit\n')
    expect(md).toContain('**Status:** ✅ APPROVED  ')
    expect(md).toContain('## Issues (0)\n\n> No issues found.\n')
    expect(md).toContain('## Suggestions (0)\n\n> No suggestions.\n')
    expect(md).not.toContain('### Notes')
  })
})
