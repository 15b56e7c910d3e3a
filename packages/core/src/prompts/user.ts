import type { Chunk, Unit } from '../types'

/** How a unit appears inside a prompt. Token estimates are taken on this form. */
export function renderUnit(unit: Pick<Unit, 'id' | 'origin' | 'text'>): string {
  if (unit.origin === 'diff') {
    return unit.text.endsWith('\n') ? unit.text : unit.text + '\n'
  }
  return ['### FILE: ' + unit.id, '```', unit.text.replace(/\n$/, ''), '```', ''].join('\n')
}

function changeLabel(units: Unit[]): string {
  return units.every((u) => u.origin === 'file') ? 'SOURCE FILES' : 'DIFF'
}

export function buildSingleReviewPrompt(units: Unit[]): string {
  return [
    'Review the complete change below against the RULES.',
    '',
    `${changeLabel(units)}:`,
    units.map(renderUnit).join(''),
  ].join('\n')
}

export function buildChunkPrompt(chunk: Pick<Chunk, 'index' | 'units'>, total: number): string {
  return [
    `Review CHUNK ${chunk.index + 1} of ${total} of a larger change against the RULES.`,
    'Other chunks are reviewed separately; judge only what is shown here.',
    '',
    `${changeLabel(chunk.units)}:`,
    chunk.units.map(renderUnit).join(''),
  ].join('\n')
}

/** Body text of a prompt, after the unit renderings were cut down to fit. */
export function buildTruncatedChunkPrompt(chunk: Pick<Chunk, 'index' | 'units'>, total: number, body: string): string {
  return [
    `Review CHUNK ${chunk.index + 1} of ${total} of a larger change against the RULES.`,
    'The content was truncated to fit the request size; judge only what is shown here.',
    '',
    `${changeLabel(chunk.units)}:`,
    body,
  ].join('\n')
}
