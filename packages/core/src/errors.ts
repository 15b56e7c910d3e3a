import type { StrategyErrorKind, StrategyKind } from './schemas'

export type ArchgateErrorCode =
  | 'rules-missing'
  | 'rules-unreadable'
  | 'change-unreadable'
  | 'config-invalid'
  | 'persistence'
  | StrategyErrorKind

/** Base class for everything the pipeline throws or reports. */
export class ArchgateError extends Error {
  constructor(
    message: string,
    public readonly code: ArchgateErrorCode,
    options?: { cause?: unknown },
  ) {
    super(`[archgate] ${message}`, options)
    this.name = 'ArchgateError'
  }
}

export type AuditInputErrorCode = 'rules-missing' | 'rules-unreadable' | 'change-unreadable'

/** Raised before any review starts; the run is aborted. */
export class AuditInputError extends ArchgateError {
  constructor(message: string, code: AuditInputErrorCode, options?: { cause?: unknown }) {
    super(message, code, options)
    this.name = 'AuditInputError'
  }
}

export class ConfigError extends ArchgateError {
  constructor(message: string, public readonly file?: string, options?: { cause?: unknown }) {
    super(message, 'config-invalid', options)
    this.name = 'ConfigError'
  }
}

/**
 * A failed strategy attempt. Carried as a value inside Result and consumed by the chain,
 * never thrown past it.
 */
export class StrategyError extends ArchgateError {
  constructor(
    public readonly kind: StrategyErrorKind,
    public readonly strategy: StrategyKind,
    message: string,
    public readonly chunk?: number,
    options?: { cause?: unknown },
  ) {
    super(message, kind, options)
    this.name = 'StrategyError'
  }
}

export class PersistenceError extends ArchgateError {
  constructor(message: string, public readonly path?: string, options?: { cause?: unknown }) {
    super(message, 'persistence', options)
    this.name = 'PersistenceError'
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
