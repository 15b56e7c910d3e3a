import pLimit from 'p-limit'
import { StrategyError, describeError } from '../errors'
import type { LocalEngine } from '../engine'
import { isSingleShot, planPerUnit } from '../plan/planner'
import type { Finding, StrategyKind } from '../schemas'
import { err, type AuditLogger, type Chunk, type PlanOptions, type Result, type ReviewDelegate, type Unit } from '../types'
import { runStrategy, type OversizedPolicy, type Strategy, type StrategyContext, type StrategyOutput } from './strategies'

export * from './strategies'

export const DEFAULT_CONCURRENCY = 2
export const DEFAULT_TIMEOUT_MS = 60_000

export interface ChainOptions {
  /** Remote reviewer; without one only the local strategy runs */
  delegate?: ReviewDelegate
  engine: LocalEngine
  system: string
  planOptions: PlanOptions
  usable: number
  timeoutMs?: number
  concurrency?: number
  oversized?: OversizedPolicy
  logger: AuditLogger
}

export interface ChainOutcome {
  /** Strategy that produced the remote part of the result */
  strategy: StrategyKind
  /** Remote and per-chunk fallback findings by chunk position, then the local baseline */
  findings: Finding[]
  chunks: number
  /** Chunks reviewed by the local fallback, whatever the reason */
  failedChunks: number[]
  oversizedChunks: number[]
  delegateCalls: number
  remoteSummaries: string[]
  notes: string[]
}

type ChunkRun = { chunk: Chunk; result: Result<StrategyOutput, StrategyError> }

/**
 * Chunk reviews run concurrently under a cap. Every outcome is captured on its own
 * and nothing is merged until all of them are in.
 */
async function runChunked(
  strategy: Extract<Strategy, { kind: 'chunked' }>,
  plan: Chunk[],
  ctx: StrategyContext,
): Promise<ChunkRun[]> {
  const limit = pLimit(Math.max(1, strategy.concurrency))
  return Promise.all(plan.map((chunk) => limit(async (): Promise<ChunkRun> => {
    try {
      return { chunk, result: await runStrategy(strategy, chunk, ctx) }
    } catch (e) {
      return {
        chunk,
        result: err(new StrategyError('provider', 'chunked', describeError(e), chunk.index, { cause: e })),
      }
    }
  })))
}

/**
 * Priority order: single-shot (whole change fits one request) → chunked → pattern matching.
 * Pattern matching runs over every unit as a baseline and is the fallback for any
 * chunk whose remote review failed, so a verdict is always produced.
 */
export async function runChain(units: Unit[], plan: Chunk[], opts: ChainOptions): Promise<ChainOutcome> {
  const { engine, logger } = opts
  const changeIds = units.map((u) => u.id)
  const local: Strategy = { kind: 'pattern-match', engine }
  const allUnits: Chunk = { index: 0, units, tokens: units.reduce((n, u) => n + u.tokens, 0), overBudget: false }

  const baselineRun = await runStrategy(local, allUnits, {
    system: opts.system, totalChunks: 1, usable: opts.usable, logger, local: { changeIds },
  })
  const baseline = baselineRun.ok ? baselineRun.value.findings : []

  const outcome: ChainOutcome = {
    strategy: 'pattern-match',
    findings: [],
    chunks: plan.length,
    failedChunks: [],
    oversizedChunks: plan.filter((c) => c.overBudget).map((c) => c.index),
    delegateCalls: 0,
    remoteSummaries: [],
    notes: [],
  }

  const delegate = opts.delegate
  if (!delegate) {
    outcome.notes.push('no remote reviewer configured; pattern matching only')
    outcome.findings = baseline
    return outcome
  }

  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
  const ctx = (totalChunks: number): StrategyContext => ({
    system: opts.system,
    totalChunks,
    usable: opts.usable,
    logger,
    onDelegateCall: () => { outcome.delegateCalls++ },
  })

  // 1) single-shot
  let chunkPlan = plan
  if (isSingleShot(plan)) {
    const single = await runStrategy({ kind: 'single-shot', delegate, timeoutMs }, allUnits, ctx(1))
    if (single.ok) {
      logger.debug(`[chain] single-shot review returned ${single.value.findings.length} finding(s)`)
      outcome.strategy = 'single-shot'
      outcome.findings = [...single.value.findings, ...baseline]
      if (single.value.summary) outcome.remoteSummaries.push(single.value.summary)
      return outcome
    }

    outcome.notes.push(`single-shot review failed (${single.error.kind}): ${single.error.message}`)
    logger.warn(single.error.message)
    if (units.length <= 1) {
      outcome.findings = baseline
      return outcome
    }
    // retry at the smallest granularity
    chunkPlan = planPerUnit(units, opts.planOptions)
    outcome.chunks = chunkPlan.length
    outcome.oversizedChunks = chunkPlan.filter((c) => c.overBudget).map((c) => c.index)
  }

  // 2) chunked
  const chunked: Extract<Strategy, { kind: 'chunked' }> = {
    kind: 'chunked',
    delegate,
    timeoutMs,
    concurrency: opts.concurrency ?? DEFAULT_CONCURRENCY,
    oversized: opts.oversized ?? 'local',
  }
  const runs = await runChunked(chunked, chunkPlan, ctx(chunkPlan.length))

  // 3) merge by chunk position, local fallback for failed chunks
  const findings: Finding[] = []
  let succeeded = 0
  for (const { chunk, result } of runs) {
    if (result.ok) {
      succeeded++
      findings.push(...result.value.findings)
      if (result.value.summary) outcome.remoteSummaries.push(result.value.summary)
      if (result.value.truncated) outcome.notes.push(`chunk ${chunk.index + 1}: truncated to fit the request budget`)
      continue
    }

    const reason = result.error.kind
    outcome.failedChunks.push(chunk.index)
    outcome.notes.push(`chunk ${chunk.index + 1}: ${reason}, reviewed by pattern matching`)
    logger.warn(result.error.message)

    const fallback = await runStrategy(local, chunk, {
      ...ctx(chunkPlan.length),
      local: { chunk: chunk.index, fallback: true, reason, changeIds },
    })
    if (fallback.ok) findings.push(...fallback.value.findings)
  }

  outcome.strategy = succeeded > 0 ? 'chunked' : 'pattern-match'
  outcome.findings = [...findings, ...baseline]
  return outcome
}
