import type { RulesInput } from '../types'

export const FOCUS_AREAS = [
  'Layering and module boundaries described in the rules',
  'Forbidden imports and dependencies',
  'Error handling conventions (custom error types, no bare generic exceptions)',
  'Type annotations on public functions',
  'Dependency manifests kept in sync',
]

export const RESPONSE_FORMAT = [
  'Return ONLY one JSON object (UTF-8), no markdown, with exactly these keys:',
  '{',
  '  "approved": true | false,',
  '  "issues": ["rule violation, one sentence each"],',
  '  "suggestions": ["optional improvement, one sentence each"],',
  '  "summary": "one or two sentences"',
  '}',
  'Set "approved" to false whenever "issues" is not empty.',
]

export function buildSystemPrompt(input: RulesInput): string {
  const lines = [
    'You are a strict architecture reviewer for this repository.',
    'Goal: check the CHANGE against the RULES below and report only violations evidenced in the change.',
    'Prefer added lines (prefixed with "+") as evidence. Do not invent files or code that is not shown.',
    'Phrase each issue so it names the offending file when one is visible.',
    '',
    'RULES:',
    input.rules.trim(),
  ]

  if (input.dependencies?.trim()) {
    lines.push('', 'DEPENDENCY GUIDELINES:', input.dependencies.trim())
  }

  lines.push(
    '',
    'FOCUS AREAS:',
    ...FOCUS_AREAS.map((a) => `- ${a}`),
    '',
    ...RESPONSE_FORMAT,
  )
  return lines.join('\n')
}
