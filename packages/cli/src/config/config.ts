import fs from 'node:fs'
import path from 'node:path'
import YAML from 'yaml'
import { z } from 'zod'
import {
  ConfigError,
  DEFAULT_BUDGET,
  DEFAULT_CONCURRENCY,
  DEFAULT_RESERVED_RESPONSE_TOKENS,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
  describeError,
  type OversizedPolicy,
} from '@archgate/core'
import type { ProviderOptions } from '@archgate/provider-types'
import { findRepoRoot } from '../cli-utils'

export const PROVIDERS = ['openai', 'mock', 'none'] as const
export type ProviderName = (typeof PROVIDERS)[number]

export const RC_FILES = ['.archgaterc.json', 'archgate.config.yml', 'archgate.config.yaml']

const int = z.number().int()

/** Shape of `.archgaterc.json` / `archgate.config.yml`; env and CLI overrides share it. */
export const ArchgateRc = z.object({
  /** Rules document, repo-root relative (default AGENTS.md) */
  rules: z.string().min(1),
  /** Optional dependency guidelines appended to the prompt */
  dependencies: z.string().min(1),
  provider: z.enum(PROVIDERS),
  providerOptions: z.object({
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxTokens: int.positive(),
  }).partial().strict(),
  budget: z.object({
    maxTokensPerChunk: int.positive(),
    reservedResponseTokens: int.nonnegative(),
  }).partial().strict(),
  concurrency: int.positive(),
  timeoutMs: int.positive().max(MAX_TIMEOUT_MS),
  oversized: z.enum(['local', 'truncate']),
  out: z.object({
    root: z.string().min(1),
    reportsDir: z.string().min(1),
  }).partial().strict(),
  history: z.object({
    enabled: z.boolean(),
    keep: int.nonnegative(),
  }).partial().strict(),
  scan: z.object({
    dirs: z.array(z.string().min(1)),
    extensions: z.array(z.string().min(1)),
    exclude: z.array(z.string().min(1)),
  }).partial().strict(),
  skip: z.boolean(),
}).partial().strict()

export type ArchgateRc = z.infer<typeof ArchgateRc>

/** Resolved configuration (absolute paths and defaults) */
export interface ResolvedConfig {
  repoRoot: string
  /** rc file that contributed, if any */
  rcPath?: string
  rulesPath: string
  dependenciesPath?: string
  provider: ProviderName
  providerOptions: ProviderOptions
  budget: { maxTokensPerChunk: number; reservedResponseTokens: number }
  concurrency: number
  timeoutMs: number
  oversized: OversizedPolicy
  out: { rootAbs: string; reportsDirAbs: string }
  history: { enabled: boolean; keep?: number }
  scan: { dirs: string[]; extensions: string[]; exclude: string[] }
  skip: boolean
}

/* ──────────────────────────────────────────────────────────────────────────── */

export const DEFAULT_SCAN = {
  dirs: ['src', 'lib', 'app'],
  extensions: ['.py', '.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs'],
  exclude: [
    'node_modules', '.git', 'dist', 'build', 'coverage', '.archgate',
    'venv', '.venv', 'env', '__pycache__', '.tox', '.egg-info', 'migrations',
  ],
}

/** Nearest rc file from `startDir` up to the repo root */
export function findRc(startDir: string, repoRoot: string): string | null {
  let dir = path.resolve(startDir)
  while (true) {
    for (const name of RC_FILES) {
      const candidate = path.join(dir, name)
      if (fs.existsSync(candidate)) return candidate
    }
    const parent = path.dirname(dir)
    if (parent === dir || dir === repoRoot) break
    dir = parent
  }
  return null
}

function validate(raw: unknown, source: string, file?: string): ArchgateRc {
  const parsed = ArchgateRc.safeParse(raw ?? {})
  if (parsed.success) return parsed.data
  const details = parsed.error.issues
    .map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join('; ')
  throw new ConfigError(`invalid configuration in ${source}: ${details}`, file)
}

export function readRcFile(file: string): ArchgateRc {
  let raw: unknown
  try {
    const text = fs.readFileSync(file, 'utf8')
    raw = file.endsWith('.json') ? JSON.parse(text) : YAML.parse(text)
  } catch (e) {
    throw new ConfigError(`cannot parse ${file}: ${describeError(e)}`, file, { cause: e })
  }
  return validate(raw, path.basename(file), file)
}

/** tiny helper: keep only defined fields */
export function pickDefined<T extends object>(obj: T | undefined): Partial<T> {
  const out: Partial<T> = obj ? { ...obj } : {}
  for (const k in out) {
    if (out[k] === undefined) delete out[k]
  }
  return out
}

/** Deep merge that ignores undefined, so a missing CLI flag never wipes an rc value */
export function mergeRc(base: ArchgateRc, over?: ArchgateRc): ArchgateRc {
  if (!over) return base
  return {
    ...base,
    ...pickDefined({
      rules: over.rules,
      dependencies: over.dependencies,
      provider: over.provider,
      concurrency: over.concurrency,
      timeoutMs: over.timeoutMs,
      oversized: over.oversized,
      skip: over.skip,
    }),
    providerOptions: { ...base.providerOptions, ...pickDefined(over.providerOptions) },
    budget: { ...base.budget, ...pickDefined(over.budget) },
    out: { ...base.out, ...pickDefined(over.out) },
    history: { ...base.history, ...pickDefined(over.history) },
    scan: { ...base.scan, ...pickDefined(over.scan) },
  }
}

const num = (v: string | undefined) => (v === undefined || v === '' ? undefined : Number(v))
const bool = (v: string | undefined) => (v === undefined || v === '' ? undefined : v === '1' || v.toLowerCase() === 'true')
const list = (v: string | undefined) => (v ? v.split(',').map((s) => s.trim()).filter(Boolean) : undefined)

/** ENV → rc. Values go through the same schema as the file. */
export function envAsRc(env: NodeJS.ProcessEnv = process.env): ArchgateRc {
  const raw = {
    rules: env.ARCHGATE_RULES,
    dependencies: env.ARCHGATE_DEPENDENCIES,
    provider: env.ARCHGATE_PROVIDER?.toLowerCase(),
    concurrency: num(env.ARCHGATE_CONCURRENCY),
    timeoutMs: num(env.ARCHGATE_TIMEOUT_MS),
    oversized: env.ARCHGATE_OVERSIZED,
    skip: bool(env.ARCHGATE_SKIP),
    providerOptions: pickDefined({
      model: env.ARCHGATE_MODEL,
      temperature: num(env.ARCHGATE_TEMPERATURE),
      maxTokens: num(env.ARCHGATE_MAX_TOKENS),
    }),
    budget: pickDefined({
      maxTokensPerChunk: num(env.ARCHGATE_BUDGET),
      reservedResponseTokens: num(env.ARCHGATE_RESERVED_TOKENS),
    }),
    out: pickDefined({ root: env.ARCHGATE_OUT_ROOT, reportsDir: env.ARCHGATE_REPORTS_DIR }),
    history: pickDefined({ enabled: bool(env.ARCHGATE_HISTORY), keep: num(env.ARCHGATE_HISTORY_KEEP) }),
    scan: pickDefined({
      dirs: list(env.ARCHGATE_SCAN_DIRS),
      extensions: list(env.ARCHGATE_SCAN_EXTENSIONS),
      exclude: list(env.ARCHGATE_SCAN_EXCLUDE),
    }),
  }
  return validate(pickDefined(raw), 'environment')
}

/** Default values */
export const defaults: ArchgateRc = {
  rules: 'AGENTS.md',
  budget: {
    maxTokensPerChunk: DEFAULT_BUDGET,
    reservedResponseTokens: DEFAULT_RESERVED_RESPONSE_TOKENS,
  },
  concurrency: DEFAULT_CONCURRENCY,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  oversized: 'local',
  out: { root: '.archgate', reportsDir: 'reports' },
  history: { enabled: true },
  scan: DEFAULT_SCAN,
  skip: false,
}

/** Public loader: defaults <- rc(file) <- env <- cli */
export function loadConfig(cliOverrides?: ArchgateRc, opts: { cwd?: string } = {}): ResolvedConfig {
  const cwd = opts.cwd ?? process.cwd()
  const repoRoot = findRepoRoot(cwd)
  const rcPath = findRc(cwd, repoRoot)
  const fileRc = rcPath ? readRcFile(rcPath) : {}
  const cli = cliOverrides ? validate(cliOverrides, 'command line options') : undefined

  const merged = mergeRc(mergeRc(mergeRc(defaults, fileRc), envAsRc()), cli)

  const abs = (p: string) => (path.isAbsolute(p) ? p : path.join(repoRoot, p))
  const outRootAbs = abs(merged.out?.root ?? '.archgate')
  const reportsDir = merged.out?.reportsDir ?? 'reports'

  return {
    repoRoot,
    ...(rcPath ? { rcPath } : {}),
    rulesPath: abs(merged.rules ?? 'AGENTS.md'),
    ...(merged.dependencies ? { dependenciesPath: abs(merged.dependencies) } : {}),
    // remote review only when asked for, or when a key is around to make it work
    provider: merged.provider ?? (process.env.OPENAI_API_KEY ? 'openai' : 'none'),
    providerOptions: merged.providerOptions ?? {},
    budget: {
      maxTokensPerChunk: merged.budget?.maxTokensPerChunk ?? DEFAULT_BUDGET,
      reservedResponseTokens: merged.budget?.reservedResponseTokens ?? DEFAULT_RESERVED_RESPONSE_TOKENS,
    },
    concurrency: merged.concurrency ?? DEFAULT_CONCURRENCY,
    timeoutMs: merged.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    oversized: merged.oversized ?? 'local',
    out: {
      rootAbs: outRootAbs,
      reportsDirAbs: path.isAbsolute(reportsDir) ? reportsDir : path.join(outRootAbs, reportsDir),
    },
    history: {
      enabled: merged.history?.enabled ?? true,
      ...(merged.history?.keep !== undefined ? { keep: merged.history.keep } : {}),
    },
    scan: {
      dirs: merged.scan?.dirs ?? DEFAULT_SCAN.dirs,
      extensions: merged.scan?.extensions ?? DEFAULT_SCAN.extensions,
      exclude: merged.scan?.exclude ?? DEFAULT_SCAN.exclude,
    },
    skip: merged.skip ?? false,
  }
}
