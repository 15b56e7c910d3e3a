/** Rough chars-per-token ratio for English prose and source code. */
export const CHARS_PER_TOKEN = 4

/**
 * Approximate token cost of a text blob. Monotonic in length; not a tokenizer.
 * Budgets treat it as a soft ceiling and keep a reserve on top.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN)
}

/** Cut text so that its estimate fits into `maxTokens`. */
export function truncateToTokens(text: string, maxTokens: number, marker = ''): string {
  if (estimateTokens(text) <= maxTokens) return text
  const room = Math.max(0, maxTokens * CHARS_PER_TOKEN - marker.length)
  return text.slice(0, room) + marker
}
