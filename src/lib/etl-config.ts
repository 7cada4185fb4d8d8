import { CARBON_API_BASE, DEFAULT_REQUEST_TIMEOUT_MS } from './carbon-intensity'
import { resolveDatabaseUrl, type ResolvedDbTarget } from './db-url'
import { ConfigError } from './etl-errors'

export interface EtlConfig {
  database: ResolvedDbTarget
  apiBaseUrl: string
  fetchMaxAttempts: number
  fetchBaseDelayMs: number
  fetchTimeoutMs: number
  maxSampleAgeMs: number
}

export const DEFAULT_FETCH_MAX_ATTEMPTS = 3
export const DEFAULT_FETCH_BASE_DELAY_MS = 1000
export const DEFAULT_MAX_SAMPLE_AGE_MINUTES = 120

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got '${raw}'`)
  }
  return value
}

export function loadEtlConfig(env: NodeJS.ProcessEnv = process.env): EtlConfig {
  const apiBaseUrl = (env.CARBON_API_BASE_URL || CARBON_API_BASE).trim()
  try {
    new URL(apiBaseUrl)
  } catch {
    throw new ConfigError(`CARBON_API_BASE_URL is not a valid URL: '${apiBaseUrl}'`)
  }

  return {
    database: resolveDatabaseUrl(env),
    apiBaseUrl,
    fetchMaxAttempts: positiveInt(env, 'ETL_FETCH_MAX_ATTEMPTS', DEFAULT_FETCH_MAX_ATTEMPTS),
    fetchBaseDelayMs: positiveInt(env, 'ETL_FETCH_BASE_DELAY_MS', DEFAULT_FETCH_BASE_DELAY_MS),
    fetchTimeoutMs: positiveInt(env, 'ETL_FETCH_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
    maxSampleAgeMs: positiveInt(env, 'ETL_MAX_SAMPLE_AGE_MINUTES', DEFAULT_MAX_SAMPLE_AGE_MINUTES) * 60_000,
  }
}
