import fs from 'node:fs'
import path from 'node:path'
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { ReportStore } from '@archgate/reports'
import { historyCLI, pruneCLI, trendCLI } from '../reports'
import { auditResult, makeSandbox } from '../../__tests__/helpers/sandbox'

describe('reports commands', () => {
  let sbx: ReturnType<typeof makeSandbox>
  let logs: string[]
  let rc: { out: { rootAbs: string; reportsDirAbs: string } }

  beforeEach(() => {
    sbx = makeSandbox('archgate-reports-cmd-')
    logs = []
    vi.spyOn(console, 'log').mockImplementation((...a: unknown[]) => { logs.push(a.join(' ')) })
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const rootAbs = path.join(sbx.root, '.archgate')
    rc = { out: { rootAbs, reportsDirAbs: path.join(rootAbs, 'reports') } }
  })

  afterEach(() => {
    vi.restoreAllMocks()
    sbx.cleanup()
  })

  function seed() {
    const store = new ReportStore({ rootDir: rc.out.reportsDirAbs })
    store.appendHistory(auditResult('2026-03-01T10:00:00.000Z', ['Layer violation', 'Generic error']))
    store.appendHistory(auditResult('2026-03-02T10:00:00.000Z', ['Layer violation'], ['Add a test']))
    store.appendHistory(auditResult('2026-03-03T10:00:00.000Z', [], ['Add a test']))
  }

  it('history lists entries oldest first', () => {
    seed()
    const entries = historyCLI(rc)
    expect(entries.map((e) => e.id)).toEqual([
      'audit_20260301_100000',
      'audit_20260302_100000',
      'audit_20260303_100000',
    ])
    expect(logs.join('\n')).toContain('History (3)')
  })

  it('history --json prints a compact listing', () => {
    seed()
    historyCLI(rc, { json: true })
    const printed: unknown = JSON.parse(logs.join('\n'))
    expect(printed).toEqual([
      { id: 'audit_20260301_100000', timestamp: '2026-03-01T10:00:00.000Z', approved: false, issues: 2, suggestions: 0 },
      { id: 'audit_20260302_100000', timestamp: '2026-03-02T10:00:00.000Z', approved: false, issues: 1, suggestions: 1 },
      { id: 'audit_20260303_100000', timestamp: '2026-03-03T10:00:00.000Z', approved: true, issues: 0, suggestions: 1 },
    ])
  })

  it('trend writes trend files and reports the direction', () => {
    seed()
    const written = trendCLI(rc, { top: 1 })

    expect(written?.trend.direction).toBe('improving')
    expect(written?.trend.issueDelta).toBe(-1)
    expect(written?.trend.recurringIssues).toEqual([{ text: 'Layer violation', runs: 2 }])
    expect(fs.existsSync(path.join(rc.out.reportsDirAbs, 'trend.json'))).toBe(true)
    expect(logs.join('\n')).toContain('Audit Trend')
  })

  it('trend with a single run writes nothing', () => {
    new ReportStore({ rootDir: rc.out.reportsDirAbs }).appendHistory(auditResult('2026-03-01T10:00:00.000Z'))

    expect(trendCLI(rc)).toBeNull()
    expect(logs.join('\n')).toContain('Not enough history for a trend')
    expect(fs.existsSync(path.join(rc.out.reportsDirAbs, 'trend.json'))).toBe(false)
  })

  it('prune keeps the most recent entries', () => {
    seed()
    expect(pruneCLI(rc, 1)).toEqual(['audit_20260301_100000', 'audit_20260302_100000'])
    expect(fs.readdirSync(path.join(rc.out.reportsDirAbs, 'history')).sort()).toEqual([
      'audit_20260303_100000.json',
      'audit_20260303_100000.md',
    ])
    expect(pruneCLI(rc, 1)).toEqual([])
    expect(logs.join('\n')).toContain('nothing to prune (keeping 1)')
  })
})
