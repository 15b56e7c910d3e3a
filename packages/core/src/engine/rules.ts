import type { LineCheck } from './catalog'

const PROHIBITIONS = ['never', 'do not', "don't", 'must not', 'forbidden', 'disallow', 'avoid', 'no direct']

function escapeRe(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/** Import statement of `mod` (or a submodule) in Python or JS/TS syntax. */
export function importPattern(mod: string): string {
  const m = escapeRe(mod)
  return [
    `^\\s*from\\s+${m}(\\.|\\s)`,
    `^\\s*import\\s+${m}(\\.|\\s|,|$)`,
    `\\bfrom\\s+['"]${m}(['"/])`,
    `\\brequire\\(\\s*['"]${m}(['"/])`,
    `^\\s*import\\s+['"]${m}(['"/])`,
  ].join('|')
}

/**
 * Disallowed-import checks written in plain language, e.g.
 *   "Never import `crewai` or `dvc` directly in `src/service/**`."
 * Backticked names become modules; backticked tokens with `*` scope the check.
 */
export function deriveImportChecks(rulesText: string): LineCheck[] {
  const out: LineCheck[] = []
  const seen = new Set<string>()

  for (const line of rulesText.split('\n')) {
    const lower = line.toLowerCase()
    if (!lower.includes('import')) continue
    if (!PROHIBITIONS.some((p) => lower.includes(p))) continue

    const tokens = Array.from(line.matchAll(/`([^`]+)`/g), (m) => (m[1] ?? '').trim()).filter(Boolean)
    const globs = tokens.filter((t) => t.includes('*'))
    const modules = tokens.filter((t) => !t.includes('*') && /^[@\w][\w.\-/]*$/.test(t))

    for (const mod of modules) {
      const id = `imports.disallowed:${mod}${globs.length ? '@' + globs.join(',') : ''}`
      if (seen.has(id)) continue
      seen.add(id)
      out.push({
        id,
        type: 'line',
        kind: 'issue',
        message: globs.length
          ? `Disallowed import of \`${mod}\` in ${globs.map((g) => `\`${g}\``).join(', ')}`
          : `Disallowed import of \`${mod}\``,
        pattern: importPattern(mod),
        files: globs.length ? globs : undefined,
        keywords: ['import'],
      })
    }
  }
  return out
}
