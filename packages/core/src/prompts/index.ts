import { estimateTokens } from '../tokens'
import type { RulesInput } from '../types'
import { buildSystemPrompt } from './system'
import { buildChunkPrompt, buildSingleReviewPrompt, buildTruncatedChunkPrompt } from './user'

export * from './system'
export * from './user'

/**
 * Fixed cost of every request: the system prompt plus the widest user template skeleton.
 * Unit renderings are added on top of this by the planner.
 */
export function estimatePromptOverhead(input: RulesInput): number {
  const skeleton = { index: 9998, units: [] }
  const template = Math.max(
    estimateTokens(buildSingleReviewPrompt([])),
    estimateTokens(buildChunkPrompt(skeleton, 9999)),
    estimateTokens(buildTruncatedChunkPrompt(skeleton, 9999, '')),
  )
  return estimateTokens(buildSystemPrompt(input)) + template
}
