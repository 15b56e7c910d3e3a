import { z } from 'zod'
import { StrategyError } from '../errors'
import type { StrategyKind } from '../schemas'
import { err, ok, type Result } from '../types'

/** The only response shape a remote reviewer may return. */
export const RemoteReview = z.object({
  approved: z.boolean(),
  issues: z.array(z.string()),
  suggestions: z.array(z.string()),
  summary: z.string(),
}).strict()
export type RemoteReview = z.infer<typeof RemoteReview>

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text)
    return { ok: true, value }
  } catch {
    return { ok: false }
  }
}

/* ──────────────────────────────────────────────────────────────
 * JSON parsing: tolerate fenced blocks ```json ... ``` and prose around one object
 * ──────────────────────────────────────────────────────────── */
export function extractJson(text: string): unknown {
  const t = text.trim()
  const fenced = t.match(/```(?:json)?\s*([\s\S]*?)```/i)
  const body = fenced?.[1] ?? t

  const direct = tryParse(body)
  if (direct.ok) return direct.value

  const first = body.indexOf('{')
  const last = body.lastIndexOf('}')
  if (first >= 0 && last > first) {
    const sliced = tryParse(body.slice(first, last + 1))
    if (sliced.ok) return sliced.value
  }
  return undefined
}

/**
 * Raw delegate text → validated review. Anything that is not exactly the expected
 * object is a malformed response; there is no lenient fallback shape.
 */
export function parseRemoteReview(
  text: string,
  strategy: StrategyKind,
  chunk?: number,
): Result<RemoteReview, StrategyError> {
  const json = extractJson(text)
  if (json === undefined) {
    return err(new StrategyError('malformed-response', strategy, 'response is not JSON', chunk))
  }

  const parsed = RemoteReview.safeParse(json)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    const where = first?.path.length ? first.path.join('.') : 'root'
    return err(new StrategyError(
      'malformed-response',
      strategy,
      `response does not match the review schema (${where}: ${first?.message ?? 'invalid'})`,
      chunk,
      { cause: parsed.error },
    ))
  }

  const clean = (xs: string[]) => xs.map((s) => s.trim()).filter(Boolean)
  return ok({
    approved: parsed.data.approved,
    issues: clean(parsed.data.issues),
    suggestions: clean(parsed.data.suggestions),
    summary: parsed.data.summary.trim(),
  })
}
