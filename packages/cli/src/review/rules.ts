import fs from 'node:fs'
import { AuditInputError, describeError, type AuditLogger, type RulesInput } from '@archgate/core'
import type { ResolvedConfig } from '../config/config'

/** Rules document plus the optional dependency guidelines. */
export function loadRules(cfg: Pick<ResolvedConfig, 'rulesPath' | 'dependenciesPath'>, logger: AuditLogger): RulesInput {
  if (!fs.existsSync(cfg.rulesPath)) {
    throw new AuditInputError(`rules file not found at ${cfg.rulesPath}`, 'rules-missing')
  }
  let rules: string
  try {
    rules = fs.readFileSync(cfg.rulesPath, 'utf8')
  } catch (e) {
    throw new AuditInputError(`cannot read rules at ${cfg.rulesPath}: ${describeError(e)}`, 'rules-unreadable', { cause: e })
  }

  const depPath = cfg.dependenciesPath
  if (!depPath) return { rules }
  if (!fs.existsSync(depPath)) {
    logger.warn(`dependency guidelines not found at ${depPath}; continuing without them`)
    return { rules }
  }
  try {
    return { rules, dependencies: fs.readFileSync(depPath, 'utf8') }
  } catch (e) {
    throw new AuditInputError(`cannot read dependency guidelines at ${depPath}: ${describeError(e)}`, 'rules-unreadable', { cause: e })
  }
}
