import { renderUnit } from '../prompts/user'
import { estimateTokens } from '../tokens'
import type { Change, SourceFile, Unit, UnitOrigin } from '../types'

const GIT_HEADER = 'diff --git '
const HUNK_HEADER = /^@@ -\d+(?:,(\d+))? \+\d+(?:,(\d+))? @@/

/** Line count of one hunk side; omitted means 1. */
function hunkCount(raw: string | undefined): number {
  return raw === undefined ? 1 : Number(raw)
}

/** Split keeping line terminators, so joining the parts gives back the input. */
function splitLinesKeepEol(text: string): string[] {
  return text.split(/(?<=\n)/)
}

function stripEol(line: string): string {
  return line.replace(/\r?\n$/, '')
}

/** Indexes of lines that open a new file section. */
function findBoundaries(lines: string[]): number[] {
  const git: number[] = []
  lines.forEach((l, i) => { if (l.startsWith(GIT_HEADER)) git.push(i) })
  if (git.length) return git

  // plain unified diff: "--- a/x" immediately followed by "+++ b/x", outside any hunk body
  const plain: number[] = []
  let oldLeft = 0
  let newLeft = 0
  lines.forEach((l, i) => {
    if (oldLeft > 0 || newLeft > 0) {
      if (l.startsWith('-')) oldLeft--
      else if (l.startsWith('+')) newLeft--
      else if (!l.startsWith('\\')) { oldLeft--; newLeft-- }
      return
    }
    const hunk = l.match(HUNK_HEADER)
    if (hunk) {
      oldLeft = hunkCount(hunk[1])
      newLeft = hunkCount(hunk[2])
      return
    }
    if (l.startsWith('--- ') && lines[i + 1]?.startsWith('+++ ')) plain.push(i)
  })
  return plain
}

function cleanPath(raw: string, side: 'a' | 'b'): string | null {
  // "+++ b/src/x.ts\t2024-01-01 ..." → "src/x.ts"
  const p = stripEol(raw).split('\t')[0]?.trim() ?? ''
  if (!p || p === '/dev/null') return null
  const prefix = `${side}/`
  return p.startsWith(prefix) ? p.slice(prefix.length) : p
}

/** File path of one diff section: b-side, or a-side when the file was deleted. */
export function unitIdFromDiff(section: string): string {
  let minus: string | null = null
  let plus: string | null = null
  let gitB: string | null = null

  for (const raw of section.split('\n')) {
    if (raw.startsWith(GIT_HEADER) && gitB === null) {
      const m = raw.match(/^diff --git a\/(.+?) b\/(.+?)\s*$/)
      if (m?.[2]) gitB = m[2]
      continue
    }
    if (raw.startsWith('--- ') && minus === null) { minus = cleanPath(raw.slice(4), 'a'); continue }
    if (raw.startsWith('+++ ') && plus === null) { plus = cleanPath(raw.slice(4), 'b'); continue }
    if (raw.startsWith('@@')) break
  }
  return plus ?? minus ?? gitB ?? 'unknown'
}

function makeUnit(id: string, origin: UnitOrigin, text: string): Unit {
  return { id, origin, text, tokens: estimateTokens(renderUnit({ id, origin, text })) }
}

/**
 * Raw diff → one Unit per file section, split strictly at file headers.
 * Text before the first header stays with the first unit, so joining all
 * unit texts reproduces the input exactly.
 */
export function partitionDiff(text: string): Unit[] {
  if (!text.trim()) return []

  const lines = splitLinesKeepEol(text)
  const bounds = findBoundaries(lines)
  if (!bounds.length) return [makeUnit(unitIdFromDiff(text), 'diff', text)]

  const units: Unit[] = []
  for (let i = 0; i < bounds.length; i++) {
    const start = i === 0 ? 0 : (bounds[i] ?? 0)
    const end = bounds[i + 1] ?? lines.length
    const section = lines.slice(start, end).join('')
    const header = lines.slice(bounds[i] ?? 0, end).join('')
    units.push(makeUnit(unitIdFromDiff(header), 'diff', section))
  }
  return units
}

/** File collection → one Unit per non-empty file, in the given order. */
export function partitionFiles(files: SourceFile[]): Unit[] {
  return files
    .filter((f) => f.content.trim().length > 0)
    .map((f) => makeUnit(f.path, 'file', f.content))
}

export function partition(change: Change): Unit[] {
  return change.kind === 'diff' ? partitionDiff(change.text) : partitionFiles(change.files)
}
