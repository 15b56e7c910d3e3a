import path from 'node:path'
import { Command, InvalidArgumentError, Option } from 'commander'
import { bold } from 'colorette'
import { config as loadEnv } from 'dotenv'
import { ArchgateError, AuditInputError, type OversizedPolicy } from '@archgate/core'

import { fail, findRepoRoot } from './cli-utils'
import { PROVIDERS, loadConfig, pickDefined, type ArchgateRc, type ProviderName } from './config/config'
import { runAuditCLI } from './review/review'
import type { ChangeSource } from './review/sources'
import { historyCLI, pruneCLI, trendCLI } from './cmd/reports'
import { renderMdCLI } from './cmd/render-md'

// ────────────────────────────────────────────────────────────────────────────────
// Repo root (.git | rc file | fallback) and .env
// ────────────────────────────────────────────────────────────────────────────────
const REPO_ROOT = findRepoRoot()

process.env.ARCHGATE_REPO_ROOT ||= REPO_ROOT

loadEnv({ path: path.join(REPO_ROOT, '.env') })
loadEnv()

function intArg(v: string): number {
  const n = Number(v)
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('expected a non-negative integer')
  return n
}

/** Exit with the command's code; failures that are not a verdict exit 2. */
async function run(fn: () => Promise<number> | number): Promise<never> {
  try {
    return process.exit(await fn())
  } catch (e) {
    if (e instanceof ArchgateError) fail(e.message)
    else fail(String(e instanceof Error ? e.stack ?? e.message : e))
    return process.exit(2)
  }
}

// ────────────────────────────────────────────────────────────────────────────────
const program = new Command()
  .name('archgate')
  .description(`${bold('archgate')}: architecture-rule code review gate with history and trends`)
  .version('0.1.0')

program.showHelpAfterError()
program.showSuggestionAfterError()

// ────────────────────────────────────────────────────────────────────────────────
// audit
// ────────────────────────────────────────────────────────────────────────────────
interface AuditFlags {
  diff?: string
  staged?: boolean
  fullRepo?: boolean
  rules?: string
  dependencies?: string
  provider?: ProviderName
  model?: string
  budget?: number
  concurrency?: number
  timeoutMs?: number
  oversized?: OversizedPolicy
  reportsDir?: string
  history: boolean
  skip?: boolean
  debug?: boolean
}

function sourceFrom(flags: AuditFlags): ChangeSource {
  const picked = [flags.diff !== undefined, !!flags.staged, !!flags.fullRepo].filter(Boolean).length
  if (picked > 1) throw new AuditInputError('use only one of --diff, --staged, --full-repo', 'change-unreadable')
  if (flags.diff === '-') return { kind: 'stdin' }
  if (flags.diff !== undefined) return { kind: 'diff-file', path: flags.diff }
  if (flags.fullRepo) return { kind: 'full-repo' }
  return { kind: 'staged' }
}

function auditOverrides(flags: AuditFlags): ArchgateRc {
  return {
    rules: flags.rules,
    dependencies: flags.dependencies,
    provider: flags.provider,
    providerOptions: pickDefined({ model: flags.model }),
    budget: pickDefined({ maxTokensPerChunk: flags.budget }),
    concurrency: flags.concurrency,
    timeoutMs: flags.timeoutMs,
    oversized: flags.oversized,
    out: pickDefined({ reportsDir: flags.reportsDir }),
    history: flags.history ? undefined : { enabled: false },
  }
}

program
  .command('audit')
  .description('Audit a change against the architecture rules; exit 0 approved, 1 not approved, 2 failure')
  .option('-d, --diff <file>', 'unified diff file, or - to read stdin')
  .option('--staged', 'audit staged changes (default)')
  .option('--full-repo', 'audit source files instead of a diff')
  .option('-r, --rules <file>', 'rules document (default AGENTS.md)')
  .option('--dependencies <file>', 'dependency guidelines appended to the prompt')
  .addOption(new Option('--provider <name>', 'remote reviewer').choices([...PROVIDERS]))
  .option('--model <name>', 'model for the remote reviewer')
  .option('--budget <tokens>', 'max tokens per remote request', intArg)
  .option('--concurrency <n>', 'chunk reviews in flight', intArg)
  .option('--timeout-ms <ms>', 'timeout per remote call', intArg)
  .addOption(new Option('--oversized <policy>', 'oversized chunks').choices(['local', 'truncate']))
  .option('--reports-dir <dir>', 'reports directory (default .archgate/reports)')
  .option('--no-history', 'write latest only, no history entry')
  .option('--skip', 'skip the audit and exit 0')
  .option('--debug', 'verbose logs and provider debug dumps')
  .action((flags: AuditFlags) => run(async () => {
    const out = await runAuditCLI({
      source: sourceFrom(flags),
      overrides: auditOverrides(flags),
      skip: flags.skip,
      debug: flags.debug,
    })
    return out.exitCode
  }))

// ────────────────────────────────────────────────────────────────────────────────
// history / trend / prune
// ────────────────────────────────────────────────────────────────────────────────
const storeConfig = (reportsDir?: string) => loadConfig({ out: pickDefined({ reportsDir }) })

program
  .command('history')
  .description('List recorded audits, oldest first')
  .option('--reports-dir <dir>', 'reports directory')
  .option('--json', 'print JSON')
  .action((flags: { reportsDir?: string; json?: boolean }) => run(() => {
    historyCLI(storeConfig(flags.reportsDir), { json: flags.json })
    return 0
  }))

program
  .command('trend')
  .description('Recompute trend.json / trend.md from history')
  .option('--reports-dir <dir>', 'reports directory')
  .option('--top <n>', 'recurring issues to rank', intArg)
  .action((flags: { reportsDir?: string; top?: number }) => run(() => {
    trendCLI(storeConfig(flags.reportsDir), { top: flags.top })
    return 0
  }))

program
  .command('prune')
  .description('Delete all but the most recent history entries')
  .option('--keep <n>', 'entries to keep (default history.keep from config)', intArg)
  .option('--reports-dir <dir>', 'reports directory')
  .action((flags: { keep?: number; reportsDir?: string }) => run(() => {
    const rc = storeConfig(flags.reportsDir)
    const keep = flags.keep ?? rc.history.keep
    if (keep === undefined) {
      fail('pass --keep <n> or set history.keep in the config')
      return 2
    }
    pruneCLI(rc, keep)
    return 0
  }))

// ────────────────────────────────────────────────────────────────────────────────
// render-md
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('render-md')
  .description('Render a saved audit JSON record to Markdown')
  .argument('<in>', 'audit JSON (latest.json or a history entry)')
  .option('-o, --out <file>', 'output file (default: next to the input)')
  .option('--title <title>', 'report title')
  .action((inFile: string, flags: { out?: string; title?: string }) => run(() => {
    renderMdCLI({ repoRoot: REPO_ROOT, inFile, outFile: flags.out, title: flags.title })
    return 0
  }))

program.parseAsync().catch((e: unknown) => {
  fail(String(e instanceof Error ? e.stack ?? e.message : e))
  process.exit(2)
})
