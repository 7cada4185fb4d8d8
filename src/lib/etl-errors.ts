import type { EtlErrorKind } from './types'

export abstract class EtlError extends Error {
  abstract readonly kind: EtlErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class ConfigError extends EtlError {
  readonly kind = 'config' as const
}

/** Network or HTTP failure after the retry policy gave up. */
export class FetchError extends EtlError {
  readonly kind = 'fetch' as const

  constructor(
    readonly endpoint: string,
    readonly url: string,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(`${endpoint} fetch failed after ${attempts} attempt(s): ${describeError(cause)}`, { cause })
  }
}

export type ValidationCheck = 'payload' | 'presence' | 'type' | 'range' | 'timestamp' | 'freshness'

export class ValidationError extends EtlError {
  readonly kind = 'validation' as const

  constructor(
    readonly check: ValidationCheck,
    readonly field: string,
    readonly value: unknown,
    message: string,
  ) {
    super(message)
  }
}

/** Transactional write failure. The transaction has already been rolled back. */
export class PersistenceError extends EtlError {
  readonly kind = 'persistence' as const
  readonly code: string | null

  constructor(message: string, cause: unknown) {
    super(`${message}: ${describeError(cause)}`, { cause })
    this.code = sqlStateOf(cause)
  }

  get isUniqueViolation(): boolean {
    return this.code === UNIQUE_VIOLATION
  }
}

const UNIQUE_VIOLATION = '23505'

function sqlStateOf(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null
  return typeof error.code === 'string' ? error.code : null
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
