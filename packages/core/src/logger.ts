import type { AuditLogger } from './types'

export function isDebugEnabled(opts?: { debug?: boolean }): boolean {
  return !!opts?.debug || process.env.ARCHGATE_DEBUG === '1' || process.env.ARCHGATE_DEBUG === 'true'
}

/** Console logger; debug lines only with `debug: true` or ARCHGATE_DEBUG=1. */
export function createLogger(opts: { debug?: boolean; scope?: string } = {}): AuditLogger {
  const prefix = `[${opts.scope ?? 'archgate'}]`
  const debugOn = isDebugEnabled(opts)
  return {
    debug: (msg) => { if (debugOn) console.log(prefix, msg) },
    info: (msg) => console.log(prefix, msg),
    warn: (msg) => console.warn(prefix, msg),
  }
}

export const silentLogger: AuditLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
}
