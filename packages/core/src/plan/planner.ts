import type { Chunk, PlanOptions, Unit } from '../types'

export const DEFAULT_BUDGET = 14_000
export const DEFAULT_RESERVED_RESPONSE_TOKENS = 1_000

/**
 * Room left for unit text once the prompt overhead and response reserve are taken out.
 * Negative when the overhead alone exceeds the budget; every unit is then oversized.
 */
export function usableBudget(opts: PlanOptions): number {
  return opts.budget - opts.overhead - opts.reservedResponseTokens
}

/**
 * Greedy packing in input order. A unit never gets split: one that does not fit
 * the usable budget on its own closes the current chunk and travels alone,
 * flagged `overBudget`.
 */
export function planChunks(units: Unit[], opts: PlanOptions): Chunk[] {
  const usable = usableBudget(opts)
  const chunks: Chunk[] = []
  let current: Unit[] = []
  let tokens = 0

  const flush = () => {
    if (!current.length) return
    chunks.push({ index: chunks.length, units: current, tokens, overBudget: false })
    current = []
    tokens = 0
  }

  for (const u of units) {
    if (u.tokens > usable) {
      flush()
      chunks.push({ index: chunks.length, units: [u], tokens: u.tokens, overBudget: true })
      continue
    }
    if (tokens + u.tokens > usable) flush()
    current.push(u)
    tokens += u.tokens
  }
  flush()
  return chunks
}

/** One chunk per unit; the retry granularity after a failed single-shot review. */
export function planPerUnit(units: Unit[], opts: PlanOptions): Chunk[] {
  const usable = usableBudget(opts)
  return units.map((u, index) => ({ index, units: [u], tokens: u.tokens, overBudget: u.tokens > usable }))
}

/** The whole change fits one request. */
export function isSingleShot(plan: Chunk[]): boolean {
  return plan.length === 1 && plan[0]?.overBudget === false
}
