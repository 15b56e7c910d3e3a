import { z } from 'zod'

// Persisted shapes. Everything written to disk by the report store goes through these.

export const FindingKind = z.enum(['issue', 'suggestion'])
export const StrategyKind = z.enum(['single-shot', 'chunked', 'pattern-match'])
export const StrategyErrorKind = z.enum(['timeout', 'provider', 'malformed-response', 'over-budget'])

export const Provenance = z.object({
  strategy: StrategyKind,
  chunk: z.number().int().nonnegative().optional(),
  units: z.array(z.string()),
  fallback: z.boolean().optional(),
  reason: StrategyErrorKind.optional(),
  /** Reviewed from a request cut down to the budget */
  truncated: z.boolean().optional(),
})

export const Finding = z.object({
  text: z.string().min(1),
  kind: FindingKind,
  provenance: Provenance,
})

export const AuditMetadata = z.object({
  timestamp: z.string(),
  strategy: z.union([StrategyKind, z.literal('none')]),
  provider: z.string(),
  model: z.string().optional(),
  /** Short HEAD commit the audit ran against */
  commit: z.string().optional(),
  /** Rules document, repo-relative when it lives in the repo */
  rulesFile: z.string().optional(),
  units: z.number().int().nonnegative(),
  chunks: z.number().int().nonnegative(),
  delegateCalls: z.number().int().nonnegative(),
  failedChunks: z.array(z.number().int().nonnegative()),
  oversizedChunks: z.array(z.number().int().nonnegative()),
  remoteSummaries: z.array(z.string()),
  notes: z.array(z.string()),
})

export const AuditResult = z.object({
  approved: z.boolean(),
  issues: z.array(Finding),
  suggestions: z.array(Finding),
  summary: z.string(),
  metadata: AuditMetadata,
})

export type FindingKind = z.infer<typeof FindingKind>
export type StrategyKind = z.infer<typeof StrategyKind>
export type StrategyErrorKind = z.infer<typeof StrategyErrorKind>
export type Provenance = z.infer<typeof Provenance>
export type Finding = z.infer<typeof Finding>
export type AuditMetadata = z.infer<typeof AuditMetadata>
export type AuditResult = z.infer<typeof AuditResult>
