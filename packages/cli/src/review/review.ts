import path from 'node:path'
import {
  ArchgateError,
  runAudit,
  type AuditLogger,
  type AuditResult,
  type ReviewDelegate,
} from '@archgate/core'
import { ReportStore, type SaveOutcome } from '@archgate/reports'
import { cliLogger, fail, printAuditSummary, warn } from '../cli-utils'
import { loadConfig, type ArchgateRc } from '../config/config'
import { pickProvider } from './providers'
import { loadRules } from './rules'
import { readChange, readHeadCommit, type ChangeSource, type GitRunner } from './sources'

export type ExitCode = 0 | 1 | 2

export interface AuditCliOptions {
  source: ChangeSource
  overrides?: ArchgateRc
  debug?: boolean
  skip?: boolean
  cwd?: string
  /** Injection points for tests */
  delegate?: ReviewDelegate
  git?: GitRunner
  stdin?: () => Promise<string>
  logger?: AuditLogger
  quiet?: boolean
}

export interface AuditCliOutcome {
  exitCode: ExitCode
  skipped?: boolean
  result?: AuditResult
  saved?: SaveOutcome
}

/** 0 approved, 1 not approved. Failures (2) never come from a verdict. */
export function exitCodeFor(result: AuditResult): ExitCode {
  return result.approved ? 0 : 1
}

/** Posix path relative to the repo, or the absolute path when it lives elsewhere */
function repoRelative(repoRoot: string, file: string): string {
  const rel = path.relative(repoRoot, file)
  return rel.startsWith('..') || path.isAbsolute(rel) ? file : rel.split(path.sep).join('/')
}

const truthy = (v: string | undefined) => v === '1' || v?.toLowerCase() === 'true'

/**
 * audit: config → rules → change → pipeline → report store.
 * Input, config and persistence errors end the run with exit 2 and no verdict.
 */
export async function runAuditCLI(opts: AuditCliOptions): Promise<AuditCliOutcome> {
  if (opts.skip || truthy(process.env.ARCHGATE_SKIP)) {
    warn('audit skipped (--skip / ARCHGATE_SKIP)')
    return { exitCode: 0, skipped: true }
  }

  try {
    const rc = loadConfig(opts.overrides, { cwd: opts.cwd })
    if (rc.skip) {
      warn('audit skipped (skip: true in config)')
      return { exitCode: 0, skipped: true }
    }
    const logger = opts.logger ?? cliLogger(opts.debug)

    const rules = loadRules(rc, logger)
    const change = await readChange(opts.source, {
      repoRoot: rc.repoRoot,
      cwd: opts.cwd ?? process.cwd(),
      scan: rc.scan,
      git: opts.git,
      stdin: opts.stdin,
    })
    const commit = await readHeadCommit(rc.repoRoot, opts.git, logger)

    const delegate = opts.delegate ?? pickProvider(rc.provider, {
      options: rc.providerOptions,
      debug: { enabled: !!opts.debug, dir: path.join(rc.out.reportsDirAbs, 'debug') },
      logger,
    })

    const result = await runAudit({
      rules,
      change,
      delegate,
      budget: rc.budget.maxTokensPerChunk,
      reservedResponseTokens: rc.budget.reservedResponseTokens,
      timeoutMs: rc.timeoutMs,
      concurrency: rc.concurrency,
      oversized: rc.oversized,
      logger,
      commit,
      rulesFile: repoRelative(rc.repoRoot, rc.rulesPath),
    })

    const store = new ReportStore({ rootDir: rc.out.reportsDirAbs, logger })
    const saved = store.save(result, { history: rc.history.enabled })
    const exitCode = exitCodeFor(result)

    if (!opts.quiet) printAuditSummary({ repoRoot: rc.repoRoot, result, saved, exitCode })
    return { exitCode, result, saved }
  } catch (e) {
    if (e instanceof ArchgateError) {
      fail(e.message)
      return { exitCode: 2 }
    }
    throw e
  }
}
