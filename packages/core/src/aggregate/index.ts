import type { AuditMetadata, AuditResult, Finding } from '../schemas'

/** Key used to detect duplicates across strategies and chunks. */
export function normalizeText(text: string): string {
  return text.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim()
}

/** First occurrence wins; relative order is kept. */
export function dedupeFindings(findings: Finding[]): Finding[] {
  const seen = new Set<string>()
  const out: Finding[] = []
  for (const f of findings) {
    const norm = normalizeText(f.text)
    const key = `${f.kind}\u0000${norm}`
    if (!norm || seen.has(key)) continue
    seen.add(key)
    out.push(f)
  }
  return out
}

export const plural = (n: number, word: string) => `${n} ${word}${n === 1 ? '' : 's'}`

export function describeStrategy(meta: Pick<AuditMetadata, 'strategy' | 'chunks' | 'failedChunks' | 'delegateCalls'>): string {
  switch (meta.strategy) {
    case 'none':
      return 'nothing to review'
    case 'single-shot':
      return 'single-shot review'
    case 'chunked': {
      const base = `chunked review of ${plural(meta.chunks, 'chunk')}`
      const fb = meta.failedChunks.length
      return fb ? `${base}, ${fb} fell back to pattern matching` : base
    }
    case 'pattern-match':
      return meta.delegateCalls > 0 ? 'pattern matching after remote review failed' : 'pattern matching'
  }
}

/**
 * Findings from every strategy → one verdict. Approved exactly when no issue
 * survives deduplication; the summary states counts and how the review ran.
 */
export function aggregate(findings: Finding[], metadata: AuditMetadata): AuditResult {
  const unique = dedupeFindings(findings)
  const issues = unique.filter((f) => f.kind === 'issue')
  const suggestions = unique.filter((f) => f.kind === 'suggestion')

  return {
    approved: issues.length === 0,
    issues,
    suggestions,
    summary: `${plural(issues.length, 'issue')}, ${plural(suggestions.length, 'suggestion')}; ${describeStrategy(metadata)}`,
    metadata,
  }
}
