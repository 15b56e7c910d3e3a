import fs from 'node:fs'
import path from 'node:path'
import { describe, it, beforeEach, afterEach, expect } from 'vitest'
import { ConfigError } from '@archgate/core'
import { loadConfig, mergeRc, pickDefined } from '../config/config'
import { makeSandbox } from './helpers/sandbox'

describe('config.loadConfig (with sandbox)', () => {
  let sbx: ReturnType<typeof makeSandbox>

  beforeEach(() => {
    sbx = makeSandbox('archgate-config-')
  })

  afterEach(() => {
    sbx.cleanup()
  })

  function writeRc(dir: string, data: unknown) {
    fs.writeFileSync(path.join(dir, '.archgaterc.json'), JSON.stringify(data, null, 2), 'utf8')
  }

  const load = (cli?: Parameters<typeof loadConfig>[0], cwd = sbx.root) => loadConfig(cli, { cwd })

  it('returns defaults when no rc and no env', () => {
    const cfg = load()
    expect(cfg).toEqual({
      repoRoot: sbx.root,
      rulesPath: path.join(sbx.root, 'AGENTS.md'),
      provider: 'none',
      providerOptions: {},
      budget: { maxTokensPerChunk: 14000, reservedResponseTokens: 1000 },
      concurrency: 2,
      timeoutMs: 60000,
      oversized: 'local',
      out: {
        rootAbs: path.join(sbx.root, '.archgate'),
        reportsDirAbs: path.join(sbx.root, '.archgate', 'reports'),
      },
      history: { enabled: true },
      scan: cfg.scan,
      skip: false,
    })
    expect(cfg.scan.dirs).toEqual(['src', 'lib', 'app'])
  })

  it('picks openai by default only when a key is present', () => {
    process.env.OPENAI_API_KEY = 'test-secret'
    expect(load().provider).toBe('openai')
  })

  it('merges a JSON rc from the repo root', () => {
    writeRc(sbx.root, {
      provider: 'mock',
      budget: { maxTokensPerChunk: 8000 },
      out: { root: 'build' },
      history: { keep: 10 },
    })

    const cfg = load()
    expect(cfg.rcPath).toBe(path.join(sbx.root, '.archgaterc.json'))
    expect(cfg.provider).toBe('mock')
    expect(cfg.budget).toEqual({ maxTokensPerChunk: 8000, reservedResponseTokens: 1000 })
    expect(cfg.out.reportsDirAbs).toBe(path.join(sbx.root, 'build', 'reports'))
    expect(cfg.history).toEqual({ enabled: true, keep: 10 })
  })

  it('reads a YAML rc', () => {
    sbx.write('archgate.config.yml', [
      'rules: docs/RULES.md',
      'dependencies: docs/DEPS.md',
      'scan:',
      '  dirs: [pkg]',
      'oversized: truncate',
    ].join('\n'))

    const cfg = load()
    expect(cfg.rulesPath).toBe(path.join(sbx.root, 'docs', 'RULES.md'))
    expect(cfg.dependenciesPath).toBe(path.join(sbx.root, 'docs', 'DEPS.md'))
    expect(cfg.scan.dirs).toEqual(['pkg'])
    expect(cfg.scan.extensions).toContain('.py')
    expect(cfg.oversized).toBe('truncate')
  })

  it('finds the nearest rc walking up from cwd', () => {
    writeRc(sbx.root, { concurrency: 3 })
    const deep = path.join(sbx.root, 'a', 'b', 'c')
    fs.mkdirSync(deep, { recursive: true })

    expect(load(undefined, deep).concurrency).toBe(3)

    writeRc(path.join(sbx.root, 'a', 'b'), { concurrency: 5 })
    expect(load(undefined, deep).concurrency).toBe(5)
  })

  it('applies env over rc and CLI over env, ignoring undefined CLI values', () => {
    writeRc(sbx.root, { concurrency: 3, provider: 'mock', timeoutMs: 1000 })
    process.env.ARCHGATE_CONCURRENCY = '4'
    process.env.ARCHGATE_MODEL = 'gpt-env'

    const cfg = load({ concurrency: 6, provider: undefined, providerOptions: pickDefined({ model: undefined }) })
    expect(cfg.concurrency).toBe(6)
    expect(cfg.provider).toBe('mock')
    expect(cfg.timeoutMs).toBe(1000)
    expect(cfg.providerOptions).toEqual({ model: 'gpt-env' })
  })

  it('reads skip and history toggles from env', () => {
    process.env.ARCHGATE_SKIP = 'true'
    process.env.ARCHGATE_HISTORY = '0'
    const cfg = load()
    expect(cfg.skip).toBe(true)
    expect(cfg.history.enabled).toBe(false)
  })

  it('rejects an rc with an unknown provider', () => {
    writeRc(sbx.root, { provider: 'claude' })
    expect(() => load()).toThrow(ConfigError)
    expect(() => load()).toThrow(/invalid configuration in \.archgaterc\.json: provider: Invalid enum value/)
  })

  it('rejects unknown keys', () => {
    writeRc(sbx.root, { profile: 'frontend' })
    expect(() => load()).toThrow("(root): Unrecognized key(s) in object: 'profile'")
  })

  it('rejects a malformed rc file', () => {
    fs.writeFileSync(path.join(sbx.root, '.archgaterc.json'), '{ provider: ', 'utf8')
    expect(() => load()).toThrow(/cannot parse .*\.archgaterc\.json/)
  })

  it('rejects non-numeric env values', () => {
    process.env.ARCHGATE_TIMEOUT_MS = 'soon'
    expect(() => load()).toThrow(/invalid configuration in environment: timeoutMs: Expected number, received nan/)
  })

  it('rejects timeouts beyond the timer range', () => {
    writeRc(sbx.root, { timeoutMs: 3_000_000_000 })
    expect(() => load()).toThrow(/timeoutMs: Number must be less than or equal to 2147483647/)
    expect(load({ timeoutMs: 2_147_483_647 }).timeoutMs).toBe(2_147_483_647)
  })

  it('rejects invalid CLI values', () => {
    expect(() => load({ concurrency: 0 })).toThrow(/command line options: concurrency/)
  })
})

describe('mergeRc', () => {
  it('merges nested blocks key by key', () => {
    expect(mergeRc(
      { budget: { maxTokensPerChunk: 1, reservedResponseTokens: 2 }, out: { root: 'x' } },
      { budget: { reservedResponseTokens: 5 } },
    )).toEqual({
      budget: { maxTokensPerChunk: 1, reservedResponseTokens: 5 },
      out: { root: 'x' },
      providerOptions: {},
      history: {},
      scan: {},
    })
  })
})
