import type { AuditResult } from '@archgate/core'

export const HISTORY_DIR = 'history'
export const HISTORY_PREFIX = 'audit_'
/** Upper bound on `_N` suffixes tried for one second-resolution stamp. */
export const MAX_ID_SUFFIX = 1000

export interface HistoryEntry {
  /** `audit_YYYYMMDD_HHMMSS`, or with `_N` when several runs share a second */
  id: string
  /** Absolute path of the JSON record */
  file: string
  result: AuditResult
}

const ID_RE = /^audit_(\d{8}_\d{6})(?:_(\d+))?$/

const pad = (n: number, w = 2) => String(n).padStart(w, '0')

/** UTC stamp, so ids sort the same on every machine. */
export function historyStamp(d: Date): string {
  return (
    HISTORY_PREFIX +
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}_` +
    `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  )
}

export function isHistoryId(id: string): boolean {
  return ID_RE.test(id)
}

/** Base id first, then `_2`, `_3`, … */
export function candidateId(base: string, attempt: number): string {
  return attempt <= 1 ? base : `${base}_${attempt}`
}

function sortKey(id: string): [string, number] {
  const m = id.match(ID_RE)
  return m ? [m[1] ?? '', Number(m[2] ?? 1)] : [id, 0]
}

/** Chronological order; `_10` sorts after `_9`. */
export function compareHistoryIds(a: string, b: string): number {
  const [sa, na] = sortKey(a)
  const [sb, nb] = sortKey(b)
  if (sa !== sb) return sa < sb ? -1 : 1
  return na - nb
}
