import fs from 'node:fs'
import { AuditResult, PersistenceError, describeError, renderAuditMarkdown } from '@archgate/core'
import {
  ensureDirForFile,
  printRenderSummaryMarkdown,
  resolveRepoPath,
} from '../cli-utils'

/** Read a saved audit record; anything that is not a valid AuditResult is rejected. */
export function readAuditJson(file: string): AuditResult {
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'))
  } catch (e) {
    throw new PersistenceError(`cannot read audit record ${file}: ${describeError(e)}`, file, { cause: e })
  }
  const parsed = AuditResult.safeParse(raw)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    throw new PersistenceError(`${file} is not an audit record (${first?.path.join('.') || 'root'}: ${first?.message ?? 'invalid'})`, file)
  }
  return parsed.data
}

export function renderMdCLI(opts: { repoRoot: string; inFile: string; outFile?: string; title?: string }) {
  const inAbs = resolveRepoPath(opts.repoRoot, opts.inFile)
  const outAbs = resolveRepoPath(opts.repoRoot, opts.outFile ?? inAbs.replace(/\.json$/i, '') + '.md')

  const result = readAuditJson(inAbs)
  const md = renderAuditMarkdown(result, { title: opts.title })
  try {
    ensureDirForFile(outAbs)
    fs.writeFileSync(outAbs, md, 'utf8')
  } catch (e) {
    throw new PersistenceError(`cannot write ${outAbs}: ${describeError(e)}`, outAbs, { cause: e })
  }

  printRenderSummaryMarkdown({
    repoRoot: opts.repoRoot,
    inFile: inAbs,
    outFile: outAbs,
    findingsCount: result.issues.length + result.suggestions.length,
  })
  return { outFile: outAbs, markdown: md }
}
