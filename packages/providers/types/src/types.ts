import fs from 'node:fs'
import path from 'node:path'
import { createLogger, describeError, type AuditLogger, type ReviewDelegate } from '@archgate/core'

/**
 * Debug controls passed into a provider.
 * When `enabled`, the provider may dump prompts and raw responses into `dir` (absolute).
 */
export interface ProviderDebug {
  enabled: boolean
  dir: string
}

/**
 * Normalized, provider-agnostic options for LLM-like providers.
 */
export interface ProviderOptions {
  model?: string
  temperature?: number
  maxTokens?: number
}

export interface ProviderInit {
  options?: ProviderOptions
  debug?: ProviderDebug
  logger?: AuditLogger
}

/**
 * Provider contract: a named delegate that turns one prompt into raw response text.
 * Parsing and validation stay in the core.
 */
export type ReviewProvider = ReviewDelegate

export type ProviderFactory = (init?: ProviderInit) => ReviewProvider

/** Write a debug artifact; a failed write is reported and never breaks the review. */
export function debugDump(debug: ProviderDebug | undefined, name: string, data: unknown, logger?: AuditLogger): void {
  if (!debug?.enabled) return
  try {
    fs.mkdirSync(debug.dir, { recursive: true })
    const content = typeof data === 'string' ? data : JSON.stringify(data, null, 2)
    fs.writeFileSync(path.join(debug.dir, name), content, 'utf8')
  } catch (e) {
    (logger ?? createLogger({ scope: 'provider' })).warn(`could not write debug artifact ${name}: ${describeError(e)}`)
  }
}
