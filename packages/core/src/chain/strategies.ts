import { StrategyError, describeError } from '../errors'
import type { LocalEngine, LocalRunContext } from '../engine'
import { buildChunkPrompt, buildSingleReviewPrompt, buildTruncatedChunkPrompt, renderUnit } from '../prompts'
import { parseRemoteReview } from '../response/schema'
import type { Finding, FindingKind, Provenance, StrategyKind } from '../schemas'
import { estimateTokens, truncateToTokens } from '../tokens'
import { err, ok, type AuditLogger, type Chunk, type Result, type ReviewDelegate } from '../types'

export type OversizedPolicy = 'local' | 'truncate'

/** Closed set of review strategies, in priority order. */
export type Strategy =
  | { kind: 'single-shot'; delegate: ReviewDelegate; timeoutMs: number }
  | { kind: 'chunked'; delegate: ReviewDelegate; timeoutMs: number; concurrency: number; oversized: OversizedPolicy }
  | { kind: 'pattern-match'; engine: LocalEngine }

export interface StrategyContext {
  system: string
  totalChunks: number
  /** Room for unit text in one request */
  usable: number
  logger: AuditLogger
  local?: LocalRunContext
  /** Counts remote calls actually made */
  onDelegateCall?: () => void
}

export interface StrategyOutput {
  findings: Finding[]
  summary?: string
  /** The request carried only a truncated view of the chunk */
  truncated?: boolean
}

export const TRUNCATION_MARKER = '\n... [truncated to fit the request budget]\n'

/** Largest delay a Node timer honours; anything above fires after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647

/* ──────────────────────────────────────────────────────────────
 * remote call with a hard timeout
 * ──────────────────────────────────────────────────────────── */
export async function callDelegate(
  delegate: ReviewDelegate,
  prompt: { system: string; user: string },
  opts: { timeoutMs: number; strategy: StrategyKind; chunk?: number; logger: AuditLogger },
): Promise<Result<string, StrategyError>> {
  const controller = new AbortController()
  const delay = Math.min(Math.max(1, opts.timeoutMs), MAX_TIMEOUT_MS)
  let timer: ReturnType<typeof setTimeout> | undefined

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new StrategyError('timeout', opts.strategy, `${delegate.name} did not answer within ${opts.timeoutMs} ms`, opts.chunk))
    }, delay)
  })

  const call = Promise.resolve().then(() => delegate.review({ ...prompt, signal: controller.signal }))
  // a call that settles after the timeout has no reader left
  void call.catch((e: unknown) => opts.logger.debug(`[chain] ${delegate.name} call settled with error: ${describeError(e)}`))

  try {
    return ok(await Promise.race([call, timeout]))
  } catch (e) {
    if (e instanceof StrategyError) return err(e)
    return err(new StrategyError('provider', opts.strategy, `${delegate.name} failed: ${describeError(e)}`, opts.chunk, { cause: e }))
  } finally {
    clearTimeout(timer)
  }
}

function toFindings(
  texts: string[],
  kind: FindingKind,
  strategy: StrategyKind,
  chunk: Chunk,
  opts: { withChunk: boolean; truncated: boolean },
): Finding[] {
  const provenance: Provenance = { strategy, units: chunk.units.map((u) => u.id) }
  if (opts.withChunk) provenance.chunk = chunk.index
  if (opts.truncated) provenance.truncated = true
  return texts.map((text) => ({ text, kind, provenance: { ...provenance } }))
}

async function remoteReview(
  strategy: Extract<Strategy, { kind: 'single-shot' | 'chunked' }>,
  chunk: Chunk,
  user: string,
  ctx: StrategyContext,
  truncated = false,
): Promise<Result<StrategyOutput, StrategyError>> {
  const chunkIndex = strategy.kind === 'chunked' ? chunk.index : undefined
  ctx.onDelegateCall?.()
  const raw = await callDelegate(strategy.delegate, { system: ctx.system, user }, {
    timeoutMs: strategy.timeoutMs,
    strategy: strategy.kind,
    chunk: chunkIndex,
    logger: ctx.logger,
  })
  if (!raw.ok) return raw

  const parsed = parseRemoteReview(raw.value, strategy.kind, chunkIndex)
  if (!parsed.ok) return parsed

  const tag = { withChunk: strategy.kind === 'chunked', truncated }
  const out: StrategyOutput = {
    findings: [
      ...toFindings(parsed.value.issues, 'issue', strategy.kind, chunk, tag),
      ...toFindings(parsed.value.suggestions, 'suggestion', strategy.kind, chunk, tag),
    ],
    summary: parsed.value.summary,
  }
  if (truncated) out.truncated = true
  return ok(out)
}

/**
 * One dispatcher for every strategy. Remote failures come back as values;
 * the pattern-match strategy always succeeds.
 */
export async function runStrategy(
  strategy: Strategy,
  chunk: Chunk,
  ctx: StrategyContext,
): Promise<Result<StrategyOutput, StrategyError>> {
  switch (strategy.kind) {
    case 'pattern-match':
      return ok({ findings: strategy.engine.run(chunk.units, ctx.local) })

    case 'single-shot':
      return remoteReview(strategy, chunk, buildSingleReviewPrompt(chunk.units), ctx)

    case 'chunked': {
      if (!chunk.overBudget) {
        return remoteReview(strategy, chunk, buildChunkPrompt(chunk, ctx.totalChunks), ctx)
      }
      // with no room left past the marker there is nothing worth sending
      if (strategy.oversized === 'local' || ctx.usable <= estimateTokens(TRUNCATION_MARKER)) {
        return err(new StrategyError(
          'over-budget',
          'chunked',
          `chunk ${chunk.index + 1} needs ~${chunk.tokens} tokens, ${ctx.usable} available`,
          chunk.index,
        ))
      }
      const body = truncateToTokens(chunk.units.map(renderUnit).join(''), ctx.usable, TRUNCATION_MARKER)
      ctx.logger.warn(`[chain] chunk ${chunk.index + 1} truncated to ~${ctx.usable} tokens`)
      return remoteReview(strategy, chunk, buildTruncatedChunkPrompt(chunk, ctx.totalChunks, body), ctx, true)
    }
  }
}
