import { z } from 'zod'
import { FindingKind } from '../schemas'
import rawCatalog from './checks.json'

const Base = z.object({
  id: z.string(),
  kind: FindingKind,
  message: z.string(),
  /** Case-insensitive substrings of the rules text that switch the check on */
  keywords: z.array(z.string()).min(1),
})

export const LineCheck = Base.extend({
  type: z.literal('line'),
  pattern: z.string(),
  files: z.array(z.string()).optional(),
})

/** Fires when a file matching `changed` is in the change and none matching `missing` is. */
export const ManifestCheck = Base.extend({
  type: z.literal('manifest'),
  changed: z.string(),
  missing: z.string(),
})

export const CheckDef = z.discriminatedUnion('type', [LineCheck, ManifestCheck])
export const Catalog = z.object({
  version: z.literal(1),
  checks: z.array(CheckDef),
})

export type LineCheck = z.infer<typeof LineCheck>
export type ManifestCheck = z.infer<typeof ManifestCheck>
export type CheckDef = z.infer<typeof CheckDef>

let cached: CheckDef[] | null = null

/** Built-in checks shipped with the engine (validated once). */
export function builtinChecks(): CheckDef[] {
  if (!cached) cached = Catalog.parse(rawCatalog).checks
  return cached
}

/** Checks whose keywords appear in the rules text. */
export function activeChecks(rulesText: string, catalog: CheckDef[] = builtinChecks()): CheckDef[] {
  const hay = rulesText.toLowerCase()
  return catalog.filter((c) => c.keywords.some((k) => hay.includes(k.toLowerCase())))
}
