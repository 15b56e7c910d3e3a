import type { ReviewRequest } from '@archgate/core'
import type { ProviderFactory, ReviewProvider } from '@archgate/provider-types'

export const MOCK_TODO = 'TODO comment found; link a tracked ticket instead of leaving it inline'
export const MOCK_INTERNAL = 'Cross-feature internal import; go through the feature public API'

/** Lines added by the change shown in the prompt (diff `+` lines, or file bodies as-is). */
function addedText(user: string): string {
  const lines = user.split('\n')
  const isDiff = lines.some((l) => l.startsWith('+++ ') || l.startsWith('@@ '))
  if (!isDiff) return user
  return lines.filter((l) => l.startsWith('+') && !l.startsWith('+++')).join('\n')
}

/**
 * Deterministic reviewer for demos and tests: flags TODO markers as suggestions
 * and `/internal` imports as issues. Same prompt, same answer.
 */
export const createMockProvider: ProviderFactory = (init = {}) => {
  const provider: ReviewProvider = {
    name: 'mock',
    model: init.options?.model,
    async review(req: ReviewRequest): Promise<string> {
      if (req.signal.aborted) throw new Error('mock review aborted')

      const text = addedText(req.user)
      const issues: string[] = []
      const suggestions: string[] = []
      if (/\bTODO\b/i.test(text)) suggestions.push(MOCK_TODO)
      if (/\/internal\b/.test(text)) issues.push(MOCK_INTERNAL)

      init.logger?.debug(`[mock] ${issues.length} issue(s), ${suggestions.length} suggestion(s)`)
      return JSON.stringify({
        approved: issues.length === 0,
        issues,
        suggestions,
        summary: 'mock review',
      })
    },
  }
  return provider
}

export const mockProvider = createMockProvider()

export default mockProvider
