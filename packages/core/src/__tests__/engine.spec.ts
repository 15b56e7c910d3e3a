import { describe, it, expect } from 'vitest'
import { partitionDiff, partitionFiles } from '../diff/partition'
import { activeChecks, builtinChecks, createLocalEngine, deriveImportChecks } from '../engine'
import { fileDiff } from './helpers/fixtures'

const GENERIC_PY = 'Generic Exception/ValueError raised; use a custom exception class'

describe('check catalog', () => {
  it('loads and validates the built-in checks', () => {
    const ids = builtinChecks().map((c) => c.id)
    expect(ids).toContain('errors.generic-exception-py')
    expect(ids).toContain('deps.pyproject-without-requirements')
  })

  it('activates checks by rule keywords only', () => {
    expect(activeChecks('Be kind to each other.')).toEqual([])
    expect(activeChecks('Follow our ERROR HANDLING guide').map((c) => c.id)).toEqual([
      'errors.generic-exception-py',
      'errors.generic-error-ts',
    ])
  })
})

describe('deriveImportChecks', () => {
  it('reads prohibited modules and scoping globs from rule lines', () => {
    const checks = deriveImportChecks([
      '# Layers',
      'Never import `crewai` or `dvc` directly in `**/service/**`.',
      'Use `pydantic` for models.',
    ].join('\n'))

    expect(checks.map((c) => c.id)).toEqual([
      'imports.disallowed:crewai@**/service/**',
      'imports.disallowed:dvc@**/service/**',
    ])
    expect(checks[0]?.files).toEqual(['**/service/**'])
    expect(checks[0]?.message).toBe('Disallowed import of `crewai` in `**/service/**`')
  })
})

describe('createLocalEngine', () => {
  it('flags generic exceptions on added lines', () => {
    const engine = createLocalEngine({ rules: 'Use custom exceptions.' })
    const units = partitionDiff(fileDiff('svc/a.py', ['raise Exception("boom")']))

    expect(engine.run(units)).toEqual([
      { text: GENERIC_PY, kind: 'suggestion', provenance: { strategy: 'pattern-match', units: ['svc/a.py'] } },
    ])
  })

  it('ignores removed lines', () => {
    const engine = createLocalEngine({ rules: 'Use custom exceptions.' })
    const text = [
      'diff --git a/svc/a.py b/svc/a.py',
      '--- a/svc/a.py',
      '+++ b/svc/a.py',
      '@@ -1,1 +1,1 @@',
      '-raise Exception("old")',
      '+raise AppError("new")',
      '',
    ].join('\n')
    expect(engine.run(partitionDiff(text))).toEqual([])
  })

  it('scopes disallowed imports by glob', () => {
    const engine = createLocalEngine({ rules: 'Never import `crewai` in `**/service/**`.' })
    const units = partitionDiff(
      fileDiff('app/service/run.py', ['import crewai']) +
      fileDiff('app/cli/main.py', ['from crewai import Agent']),
    )
    const findings = engine.run(units)

    expect(findings).toHaveLength(1)
    expect(findings[0]?.kind).toBe('issue')
    expect(findings[0]?.provenance.units).toEqual(['app/service/run.py'])
  })

  it('matches JS imports of a module and its subpaths', () => {
    const engine = createLocalEngine({ rules: 'Do not import `lodash`.' })
    const units = partitionFiles([
      { path: 'src/a.ts', content: "import { get } from 'lodash/get'\n" },
      { path: 'src/b.ts', content: "import x from 'lodash-es'\n" },
    ])
    expect(engine.run(units).map((f) => f.provenance.units)).toEqual([['src/a.ts']])
  })

  it('flags functions without return types', () => {
    const engine = createLocalEngine({ rules: 'Every function needs a return type.' })
    const units = partitionDiff(fileDiff('src/x.ts', [
      'export function bar(): void {',
      'export function foo(a: string) {',
    ]))
    const findings = engine.run(units)
    expect(findings.map((f) => f.text)).toEqual(['Function declared without a return type annotation'])
  })

  it('checks manifests against the whole change', () => {
    const engine = createLocalEngine({ rules: 'Keep dependency manifests in sync.' })
    const onlyPyproject = partitionDiff(fileDiff('pyproject.toml', ['requests = "^2"']))
    const both = partitionDiff(
      fileDiff('pyproject.toml', ['requests = "^2"']) + fileDiff('requirements.txt', ['requests==2.0']),
    )

    expect(engine.run(onlyPyproject).map((f) => f.text)).toEqual([
      'pyproject.toml changed without requirements.txt; keep dependency manifests in sync',
    ])
    expect(engine.run(both)).toEqual([])
    expect(engine.run(onlyPyproject, { changeIds: ['pyproject.toml', 'requirements.txt'] })).toEqual([])
  })

  it('tags fallback provenance', () => {
    const engine = createLocalEngine({ rules: 'Use custom exceptions.' })
    const units = partitionDiff(fileDiff('svc/a.py', ['raise ValueError("x")']))
    const [f] = engine.run(units, { chunk: 1, fallback: true, reason: 'timeout' })
    expect(f?.provenance).toEqual({
      strategy: 'pattern-match',
      units: ['svc/a.py'],
      chunk: 1,
      fallback: true,
      reason: 'timeout',
    })
  })
})
