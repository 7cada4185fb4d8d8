export type Sleep = (ms: number) => Promise<void>

export interface RetryPolicyOptions {
  maxAttempts: number
  baseDelayMs: number
  sleep?: Sleep
}

export interface RetryAttemptInfo {
  attempt: number
  maxAttempts: number
  delayMs: number
  error: unknown
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`gave up after ${attempts} attempt(s)`, { cause: lastError })
    this.name = 'RetryExhaustedError'
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Bounded retry with exponential backoff. After failed attempt n (1-based)
 * the policy waits baseDelayMs * 2^n before the next one, so a 1000ms base
 * gives 2s, 4s, 8s.
 *
 * `shouldRetry` lets callers mark errors as permanent; those are rethrown
 * as-is without waiting.
 */
export class RetryPolicy {
  readonly maxAttempts: number
  readonly baseDelayMs: number
  private readonly sleep: Sleep

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`)
    }
    if (!Number.isFinite(options.baseDelayMs) || options.baseDelayMs < 0) {
      throw new RangeError(`baseDelayMs must be non-negative, got ${options.baseDelayMs}`)
    }
    this.maxAttempts = options.maxAttempts
    this.baseDelayMs = options.baseDelayMs
    this.sleep = options.sleep ?? sleep
  }

  delayAfter(attempt: number): number {
    return this.baseDelayMs * 2 ** attempt
  }

  async run<T>(
    operation: (attempt: number) => Promise<T>,
    hooks: {
      shouldRetry?: (error: unknown) => boolean
      onRetry?: (info: RetryAttemptInfo) => void
    } = {},
  ): Promise<T> {
    let lastError: unknown = null

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await operation(attempt)
      } catch (error) {
        if (hooks.shouldRetry && !hooks.shouldRetry(error)) throw error
        lastError = error
        if (attempt === this.maxAttempts) break

        const delayMs = this.delayAfter(attempt)
        hooks.onRetry?.({ attempt, maxAttempts: this.maxAttempts, delayMs, error })
        await this.sleep(delayMs)
      }
    }

    throw new RetryExhaustedError(this.maxAttempts, lastError)
  }
}
