/**
 * carbon-intensity.ts — HTTP client for the GB grid carbon-intensity API.
 *
 * Two endpoints are read per run: the current half-hour intensity and the
 * generation mix. Transient failures (network error, non-2xx, timeout) go
 * through the shared RetryPolicy; a 2xx body that is not JSON is a payload
 * problem and is not retried.
 */

import { FetchError, ValidationError } from './etl-errors'
import type { EtlLogger } from './etl-logger'
import { RetryExhaustedError, RetryPolicy } from './retry'

export const CARBON_API_BASE = 'https://api.carbonintensity.org.uk'
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000

export const CARBON_ENDPOINTS = {
  intensity: '/intensity',
  generation: '/generation',
} as const

export type CarbonEndpoint = keyof typeof CARBON_ENDPOINTS

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface CarbonIntensityClientOptions {
  retry: RetryPolicy
  logger: EtlLogger
  baseUrl?: string
  timeoutMs?: number
  fetchImpl?: FetchLike
}

export interface CarbonIntensityClient {
  fetchJson(endpoint: CarbonEndpoint): Promise<unknown>
  fetchIntensity(): Promise<unknown>
  fetchGeneration(): Promise<unknown>
}

export function endpointUrl(baseUrl: string, endpoint: CarbonEndpoint): string {
  return `${baseUrl.replace(/\/+$/, '')}${CARBON_ENDPOINTS[endpoint]}`
}

export function createCarbonIntensityClient(options: CarbonIntensityClientOptions): CarbonIntensityClient {
  const baseUrl = options.baseUrl ?? CARBON_API_BASE
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch
  const { retry, logger } = options

  async function exchange(endpoint: CarbonEndpoint, url: string, signal: AbortSignal): Promise<unknown> {
    const response = await fetchImpl(url, {
      headers: { Accept: 'application/json', 'User-Agent': 'GridCarbonEtl/1.0' },
      signal,
    })

    if (!response.ok) {
      const errorText = (await response.text().catch(() => '')).trim().slice(0, 200)
      const status = response.statusText ? `${response.status} ${response.statusText}` : String(response.status)
      throw new Error(errorText ? `HTTP ${status}: ${errorText}` : `HTTP ${status}`)
    }

    const text = await response.text()
    try {
      return JSON.parse(text)
    } catch {
      throw new ValidationError('payload', endpoint, text.slice(0, 200), `${endpoint} response is not valid JSON`)
    }
  }

  // The timer covers headers and body; a body that stalls after a 200 still times out.
  async function requestOnce(endpoint: CarbonEndpoint, url: string): Promise<unknown> {
    const controller = new AbortController()
    const timedOut = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(new Error(`request timed out after ${timeoutMs}ms`)),
        { once: true },
      )
    })
    const timeout = setTimeout(() => controller.abort(), timeoutMs)
    try {
      return await Promise.race([exchange(endpoint, url, controller.signal), timedOut])
    } finally {
      clearTimeout(timeout)
    }
  }

  async function fetchJson(endpoint: CarbonEndpoint): Promise<unknown> {
    const url = endpointUrl(baseUrl, endpoint)
    try {
      const payload = await retry.run(() => requestOnce(endpoint, url), {
        shouldRetry: (error) => !(error instanceof ValidationError),
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          const msg = error instanceof Error ? error.message : String(error)
          logger.warn(`${endpoint} attempt ${attempt}/${maxAttempts} failed: ${msg}; retrying in ${delayMs}ms`)
        },
      })
      logger.info(`${endpoint} fetched from ${url}`)
      return payload
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new FetchError(endpoint, url, error.attempts, error.lastError)
      }
      throw error
    }
  }

  return {
    fetchJson,
    fetchIntensity: () => fetchJson('intensity'),
    fetchGeneration: () => fetchJson('generation'),
  }
}
