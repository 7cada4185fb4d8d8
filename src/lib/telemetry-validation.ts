/**
 * telemetry-validation.ts — Turn the two raw API documents into one
 * TelemetrySample, or say exactly which check rejected them.
 *
 * Checks run in order: payload shape, presence, type, range, timestamp
 * format, freshness. The first failure wins.
 */

import { ValidationError } from './etl-errors'
import { TRACKED_FUELS, type FuelCategory, type Result, type TelemetrySample } from './types'

export const INTENSITY_MIN = 0
export const INTENSITY_MAX = 1000
export const PERCENT_MIN = 0
export const PERCENT_MAX = 100
export const DEFAULT_MAX_SAMPLE_AGE_MS = 2 * 60 * 60 * 1000

const FUEL_COLUMN: Record<FuelCategory, string> = {
  gas: 'fuel_gas_perc',
  nuclear: 'fuel_nuclear_perc',
  wind: 'fuel_wind_perc',
  solar: 'fuel_solar_perc',
}

// ─────────────────────────────────────────────
// Payload extraction
// ─────────────────────────────────────────────

interface IntensityReading {
  from: unknown
  intensity: unknown
}

interface GenerationReading {
  from: unknown
  mix: Partial<Record<FuelCategory, unknown>>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function payloadError(field: string, value: unknown, message: string): ValidationError {
  return new ValidationError('payload', field, value, message)
}

/** First element of an array envelope, or the value itself. */
function unwrapData(data: unknown): unknown {
  return Array.isArray(data) ? data[0] : data
}

function pickIntensityValue(intensity: unknown): unknown {
  if (!isRecord(intensity)) return intensity
  return intensity.actual ?? intensity.forecast ?? null
}

/**
 * Accepts the live envelope `{ data: [{ from, intensity: { forecast, actual } }] }`
 * or the flat form `{ intensity, from }`.
 */
export function extractIntensityReading(raw: unknown): Result<IntensityReading, ValidationError> {
  if (!isRecord(raw)) {
    return { ok: false, error: payloadError('intensity', raw, 'intensity payload is not a JSON object') }
  }

  if ('data' in raw) {
    const entry = unwrapData(raw.data)
    if (!isRecord(entry)) {
      return { ok: false, error: payloadError('intensity.data', raw.data, 'intensity payload has no data entry') }
    }
    return { ok: true, value: { from: entry.from, intensity: pickIntensityValue(entry.intensity) } }
  }

  return { ok: true, value: { from: raw.from, intensity: pickIntensityValue(raw.intensity) } }
}

/**
 * Accepts the live envelope `{ data: { from, generationmix: [{ fuel, perc }] } }`
 * (data may also be a one-element array) or the flat form `{ gas, nuclear, wind, solar }`.
 */
export function extractGenerationReading(raw: unknown): Result<GenerationReading, ValidationError> {
  if (!isRecord(raw)) {
    return { ok: false, error: payloadError('generation', raw, 'generation payload is not a JSON object') }
  }

  if (!('data' in raw)) {
    const mix: Partial<Record<FuelCategory, unknown>> = {}
    for (const fuel of TRACKED_FUELS) {
      if (fuel in raw) mix[fuel] = raw[fuel]
    }
    return { ok: true, value: { from: raw.from, mix } }
  }

  const entry = unwrapData(raw.data)
  if (!isRecord(entry) || !Array.isArray(entry.generationmix)) {
    return {
      ok: false,
      error: payloadError('generation.data', raw.data, 'generation payload has no generationmix list'),
    }
  }

  const mix: Partial<Record<FuelCategory, unknown>> = {}
  for (const item of entry.generationmix) {
    if (!isRecord(item) || typeof item.fuel !== 'string') continue
    const fuel = TRACKED_FUELS.find((f) => f === item.fuel)
    if (fuel) mix[fuel] = item.perc
  }
  return { ok: true, value: { from: entry.from, mix } }
}

// ─────────────────────────────────────────────
// Field checks
// ─────────────────────────────────────────────

export function validateIntensity(value: unknown): boolean {
  return typeof value === 'number' && Number.isFinite(value) && value >= INTENSITY_MIN && value <= INTENSITY_MAX
}

export function validateFuelPercentage(value: unknown): boolean {
  return typeof value === 'number' && Number.isFinite(value) && value >= PERCENT_MIN && value <= PERCENT_MAX
}

const ISO_8601_WITH_OFFSET =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|([+-])(\d{2}):(\d{2}))$/

/**
 * Parse ISO-8601 with a mandatory `Z` or `±HH:MM` offset. Seconds and
 * fractions are optional (the API sends `2025-12-09T14:00Z`).
 * Returns null for anything else, including out-of-range calendar fields.
 */
export function parseIso8601(value: unknown): Date | null {
  if (typeof value !== 'string') return null
  const m = ISO_8601_WITH_OFFSET.exec(value.trim())
  if (!m) return null

  const [, y, mo, d, h, mi, s, frac, zone, sign, offH, offM] = m
  const year = Number(y)
  const month = Number(mo)
  const day = Number(d)
  const hour = Number(h)
  const minute = Number(mi)
  const second = s === undefined ? 0 : Number(s)
  const millis = frac === undefined ? 0 : Number(frac.slice(0, 3).padEnd(3, '0'))

  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) return null
  if (new Date(Date.UTC(year, month - 1, day)).getUTCDate() !== day) return null

  let offsetMinutes = 0
  if (zone !== 'Z') {
    const hours = Number(offH)
    const minutes = Number(offM)
    if (hours > 23 || minutes > 59) return null
    offsetMinutes = (sign === '-' ? -1 : 1) * (hours * 60 + minutes)
  }

  const utcMs = Date.UTC(year, month - 1, day, hour, minute, second, millis) - offsetMinutes * 60_000
  return new Date(utcMs)
}

function checkIntensity(value: unknown): ValidationError | null {
  const field = 'overall_intensity'
  if (value === null || value === undefined) {
    return new ValidationError('presence', field, value, `${field} is missing`)
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return new ValidationError('type', field, value, `${field} must be a number, got ${JSON.stringify(value)}`)
  }
  if (!validateIntensity(value)) {
    return new ValidationError(
      'range',
      field,
      value,
      `${field} out of range: ${value} (expected ${INTENSITY_MIN}..${INTENSITY_MAX})`,
    )
  }
  return null
}

function checkFuel(fuel: FuelCategory, value: unknown): ValidationError | null {
  const field = FUEL_COLUMN[fuel]
  if (value === null || value === undefined) {
    return new ValidationError('presence', field, value, `${field} is missing`)
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return new ValidationError('type', field, value, `${field} must be a number, got ${JSON.stringify(value)}`)
  }
  if (!validateFuelPercentage(value)) {
    return new ValidationError(
      'range',
      field,
      value,
      `${field} out of range: ${value} (expected ${PERCENT_MIN}..${PERCENT_MAX})`,
    )
  }
  return null
}

// ─────────────────────────────────────────────
// Sample validation
// ─────────────────────────────────────────────

export interface ValidateSampleOptions {
  now: Date
  maxAgeMs?: number
}

export function validateSample(
  rawIntensity: unknown,
  rawGeneration: unknown,
  options: ValidateSampleOptions,
): Result<TelemetrySample, ValidationError> {
  const maxAgeMs = options.maxAgeMs ?? DEFAULT_MAX_SAMPLE_AGE_MS

  const intensity = extractIntensityReading(rawIntensity)
  if (!intensity.ok) return intensity
  const generation = extractGenerationReading(rawGeneration)
  if (!generation.ok) return generation

  const { from } = intensity.value
  if (from === null || from === undefined) {
    return { ok: false, error: new ValidationError('presence', 'timestamp', from, 'timestamp is missing') }
  }

  const intensityError = checkIntensity(intensity.value.intensity)
  if (intensityError) return { ok: false, error: intensityError }

  const mix = generation.value.mix
  for (const fuel of TRACKED_FUELS) {
    const fuelError = checkFuel(fuel, mix[fuel])
    if (fuelError) return { ok: false, error: fuelError }
  }

  const timestamp = parseIso8601(from)
  if (!timestamp) {
    return {
      ok: false,
      error: new ValidationError('timestamp', 'timestamp', from, `timestamp is not ISO-8601 with offset: ${JSON.stringify(from)}`),
    }
  }

  const ageMs = options.now.getTime() - timestamp.getTime()
  if (ageMs > maxAgeMs) {
    const ageMinutes = Math.floor(ageMs / 60_000)
    return {
      ok: false,
      error: new ValidationError(
        'freshness',
        'timestamp',
        from,
        `sample is stale: ${timestamp.toISOString()} is ${ageMinutes} minutes old (max ${Math.floor(maxAgeMs / 60_000)})`,
      ),
    }
  }

  return {
    ok: true,
    value: Object.freeze({
      timestamp,
      // overall_intensity is an INTEGER column
      overallIntensity: Math.round(Number(intensity.value.intensity)),
      fuelGasPerc: Number(mix.gas),
      fuelNuclearPerc: Number(mix.nuclear),
      fuelWindPerc: Number(mix.wind),
      fuelSolarPerc: Number(mix.solar),
    }),
  }
}
