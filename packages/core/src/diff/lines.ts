import type { Unit } from '../types'

export type AddedLine = { line: number; text: string }

/**
 * Added lines of a diff section with their new-side line numbers.
 * Headers, context and removed lines are skipped. File units count every line as added.
 */
export function addedLines(unit: Pick<Unit, 'origin' | 'text'>): AddedLine[] {
  const raw = unit.text.split('\n')
  if (unit.origin === 'file') {
    return raw.map((text, i) => ({ line: i + 1, text: text.replace(/\r$/, '') }))
  }

  const out: AddedLine[] = []
  let newLine = 0
  let inHunk = false
  for (const l of raw) {
    const m = l.match(/^@@ -\d+(?:,\d+)? \+(\d+)(?:,\d+)? @@/)
    if (m) { newLine = Number(m[1]); inHunk = true; continue }
    if (l.startsWith('diff --git ')) { inHunk = false; continue }
    if (!inHunk) continue
    if (l.startsWith('+')) {
      out.push({ line: newLine, text: l.slice(1).replace(/\r$/, '') })
      newLine++
    } else if (l.startsWith(' ')) {
      newLine++
    }
  }
  return out
}
