import picomatch from 'picomatch'
import { addedLines } from '../diff/lines'
import type { Finding, Provenance, StrategyErrorKind } from '../schemas'
import type { RulesInput, Unit } from '../types'
import { activeChecks, builtinChecks, type CheckDef } from './catalog'
import { deriveImportChecks } from './rules'

export * from './catalog'
export * from './rules'

export type LocalRunContext = {
  /** Chunk the units came from, when running as a per-chunk fallback */
  chunk?: number
  fallback?: boolean
  reason?: StrategyErrorKind
  /** Every unit id of the change; manifest checks look for companions here */
  changeIds?: string[]
}

export interface LocalEngine {
  checks: CheckDef[]
  run(units: Unit[], ctx?: LocalRunContext): Finding[]
}

/* ───────────────── matchers ───────────────── */

type Compiled = {
  def: CheckDef
  /** Unit ids that trigger the check */
  hits(units: Unit[], changeIds: string[]): string[]
}

function fileMatcher(globs: string[] | undefined): (file: string) => boolean {
  if (!globs?.length) return () => true
  const ms = globs.map((g) => picomatch(g, { dot: true }))
  return (file) => ms.some((m) => m(file))
}

function compile(def: CheckDef): Compiled {
  if (def.type === 'manifest') {
    const changed = picomatch(def.changed, { dot: true })
    const missing = picomatch(def.missing, { dot: true })
    return {
      def,
      hits(units, changeIds) {
        if (changeIds.some((id) => missing(id))) return []
        return units.filter((u) => changed(u.id)).map((u) => u.id)
      },
    }
  }

  const re = new RegExp(def.pattern)
  const inScope = fileMatcher(def.files)
  return {
    def,
    hits(units) {
      return units
        .filter((u) => inScope(u.id) && addedLines(u).some((l) => re.test(l.text)))
        .map((u) => u.id)
    },
  }
}

function provenance(units: string[], ctx: LocalRunContext): Provenance {
  const p: Provenance = { strategy: 'pattern-match', units }
  if (ctx.chunk !== undefined) p.chunk = ctx.chunk
  if (ctx.fallback) p.fallback = true
  if (ctx.reason) p.reason = ctx.reason
  return p
}

/* ───────────────────────── engine ───────────────────────── */

/**
 * Offline reviewer. Built-in checks are switched on by keywords found in the rules,
 * disallowed imports are read from the rules text itself. Never fails.
 */
export function createLocalEngine(input: RulesInput, opts: { catalog?: CheckDef[] } = {}): LocalEngine {
  const rulesText = [input.rules, input.dependencies ?? ''].join('\n')
  const checks = [
    ...activeChecks(rulesText, opts.catalog ?? builtinChecks()),
    ...deriveImportChecks(input.rules),
  ]
  const compiled = checks.map(compile)

  return {
    checks,
    run(units, ctx = {}) {
      const changeIds = ctx.changeIds ?? units.map((u) => u.id)
      const out: Finding[] = []
      for (const c of compiled) {
        const ids = Array.from(new Set(c.hits(units, changeIds)))
        if (!ids.length) continue
        out.push({ text: c.def.message, kind: c.def.kind, provenance: provenance(ids, ctx) })
      }
      return out
    },
  }
}
