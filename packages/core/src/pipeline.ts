import { aggregate } from './aggregate'
import { runChain, type OversizedPolicy } from './chain'
import { partition } from './diff/partition'
import { createLocalEngine, type CheckDef } from './engine'
import { AuditInputError } from './errors'
import { createLogger } from './logger'
import { DEFAULT_BUDGET, DEFAULT_RESERVED_RESPONSE_TOKENS, planChunks, usableBudget } from './plan/planner'
import { buildSystemPrompt, estimatePromptOverhead } from './prompts'
import type { AuditMetadata, AuditResult } from './schemas'
import type { AuditLogger, Change, PlanOptions, ReviewDelegate, RulesInput } from './types'

export interface AuditOptions {
  rules: RulesInput
  change: Change
  /** Remote reviewer; omit to run pattern matching only */
  delegate?: ReviewDelegate
  budget?: number
  reservedResponseTokens?: number
  timeoutMs?: number
  concurrency?: number
  oversized?: OversizedPolicy
  logger?: AuditLogger
  catalog?: CheckDef[]
  now?: () => Date
  /** Recorded in the metadata as given */
  commit?: string
  rulesFile?: string
}

/**
 * One audit run: partition → plan → strategy chain → aggregate.
 * Throws AuditInputError for unusable input; every review failure past that point
 * is absorbed by the chain.
 */
export async function runAudit(opts: AuditOptions): Promise<AuditResult> {
  if (!opts.rules.rules.trim()) {
    throw new AuditInputError('rules text is empty; nothing to audit against', 'rules-missing')
  }

  const logger = opts.logger ?? createLogger()
  const units = partition(opts.change)
  const baseMeta: AuditMetadata = {
    timestamp: (opts.now?.() ?? new Date()).toISOString(),
    strategy: 'none',
    provider: opts.delegate?.name ?? 'none',
    units: units.length,
    chunks: 0,
    delegateCalls: 0,
    failedChunks: [],
    oversizedChunks: [],
    remoteSummaries: [],
    notes: [],
  }
  if (opts.delegate?.model) baseMeta.model = opts.delegate.model
  if (opts.commit) baseMeta.commit = opts.commit
  if (opts.rulesFile) baseMeta.rulesFile = opts.rulesFile

  if (!units.length) {
    logger.info('empty change, nothing to review')
    return aggregate([], { ...baseMeta, notes: ['empty change'] })
  }

  const planOptions: PlanOptions = {
    budget: opts.budget ?? DEFAULT_BUDGET,
    overhead: estimatePromptOverhead(opts.rules),
    reservedResponseTokens: opts.reservedResponseTokens ?? DEFAULT_RESERVED_RESPONSE_TOKENS,
  }
  const plan = planChunks(units, planOptions)
  const usable = usableBudget(planOptions)
  logger.debug(`${units.length} unit(s) → ${plan.length} chunk(s), ~${usable} tokens usable per chunk`)

  const outcome = await runChain(units, plan, {
    delegate: opts.delegate,
    engine: createLocalEngine(opts.rules, { catalog: opts.catalog }),
    system: buildSystemPrompt(opts.rules),
    planOptions,
    usable,
    timeoutMs: opts.timeoutMs,
    concurrency: opts.concurrency,
    oversized: opts.oversized,
    logger,
  })

  return aggregate(outcome.findings, {
    ...baseMeta,
    strategy: outcome.strategy,
    chunks: outcome.chunks,
    delegateCalls: outcome.delegateCalls,
    failedChunks: outcome.failedChunks,
    oversizedChunks: outcome.oversizedChunks,
    remoteSummaries: outcome.remoteSummaries,
    notes: outcome.notes,
  })
}
