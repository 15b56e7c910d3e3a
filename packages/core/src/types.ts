export type UnitOrigin = 'diff' | 'file'

export interface Unit {
  /** File path the unit belongs to (b-side for diffs, a-side for deletions) */
  id: string
  origin: UnitOrigin
  /** Raw segment: one file's diff section, or the file content */
  text: string
  /** Estimated cost of the unit as it appears in a prompt */
  tokens: number
}

export interface Chunk {
  index: number
  units: Unit[]
  tokens: number
  /** Set only for a one-unit chunk whose unit alone exceeds the usable budget */
  overBudget: boolean
}

export interface SourceFile {
  path: string
  content: string
}

export type Change =
  | { kind: 'diff'; text: string }
  | { kind: 'files'; files: SourceFile[] }

export interface PlanOptions {
  /** Hard ceiling for one request, prompt included */
  budget: number
  /** Fixed prompt cost added to every chunk (system prompt + template) */
  overhead: number
  /** Tokens kept free for the response */
  reservedResponseTokens: number
}

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value })
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error })

/** What a remote reviewer receives. `signal` aborts the call on timeout. */
export interface ReviewRequest {
  system: string
  user: string
  signal: AbortSignal
}

/**
 * Anything that turns a prompt into raw response text.
 * The core never interprets transport details; providers adapt SDKs to this.
 */
export interface ReviewDelegate {
  name: string
  model?: string
  review(req: ReviewRequest): Promise<string>
}

export interface AuditLogger {
  debug(msg: string): void
  info(msg: string): void
  warn(msg: string): void
}

export interface RulesInput {
  /** Free-form architectural rules (e.g. AGENTS.md) */
  rules: string
  /** Optional dependency guidelines appended to the system prompt */
  dependencies?: string
}
