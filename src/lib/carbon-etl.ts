/**
 * carbon-etl.ts — One ETL run: fetch → validate → dedup check → persist → record.
 *
 * Every path ends in exactly one run-outcome write. Stage errors are turned
 * into a failure outcome here and never escape to the caller; the only thing
 * a caller sees is the returned RunSummary.
 */

import type { CarbonIntensityClient } from './carbon-intensity'
import { describeError, EtlError, PersistenceError } from './etl-errors'
import type { EtlLogger } from './etl-logger'
import type { TelemetryStore } from './telemetry-store'
import { validateSample } from './telemetry-validation'
import type { EtlErrorKind, EtlState, RunOutcome, RunSummary, TelemetrySample } from './types'

export interface EtlContext {
  client: CarbonIntensityClient
  store: TelemetryStore
  logger: EtlLogger
  maxSampleAgeMs?: number
  now?: () => Date
}

/**
 * Single best-effort insert of the run outcome. A failure is logged and
 * reported as `false`; it never replaces the run's own result.
 */
export async function recordRunOutcome(
  store: TelemetryStore,
  outcome: RunOutcome,
  logger: EtlLogger,
): Promise<boolean> {
  try {
    await store.recordRun(outcome)
    return true
  } catch (error) {
    logger.error(`could not record run outcome (${outcome.status}): ${describeError(error)}`)
    return false
  }
}

class StageFailure {
  constructor(
    readonly state: EtlState,
    readonly error: unknown,
  ) {}
}

function errorKindOf(error: unknown): EtlErrorKind | null {
  return error instanceof EtlError ? error.kind : null
}

export async function runCarbonEtl(context: EtlContext): Promise<RunSummary> {
  const { client, store, logger } = context
  const now = context.now ?? (() => new Date())
  const startedAt = now()

  let state: EtlState = 'FETCHING'
  let sample: TelemetrySample | null = null
  let rowsInserted = 0
  let failure: StageFailure | null = null

  try {
    logger.info('fetching intensity and generation mix')
    const rawIntensity = await client.fetchIntensity()
    const rawGeneration = await client.fetchGeneration()

    state = 'VALIDATING'
    const validated = validateSample(rawIntensity, rawGeneration, {
      now: now(),
      maxAgeMs: context.maxSampleAgeMs,
    })
    if (!validated.ok) throw validated.error
    const current = validated.value
    sample = current
    logger.info(
      `validated sample ${current.timestamp.toISOString()} intensity=${current.overallIntensity} ` +
        `gas=${current.fuelGasPerc} nuclear=${current.fuelNuclearPerc} wind=${current.fuelWindPerc} solar=${current.fuelSolarPerc}`,
    )

    state = 'DEDUP_CHECK'
    if (await store.exists(current.timestamp)) {
      logger.info(`sample ${current.timestamp.toISOString()} already stored, skipping insert`)
    } else {
      state = 'PERSISTING'
      try {
        await store.persist(current)
        rowsInserted = 1
      } catch (error) {
        if (!(error instanceof PersistenceError && error.isUniqueViolation)) throw error
        logger.warn(`sample ${current.timestamp.toISOString()} was inserted concurrently, treating as duplicate`)
      }
    }
  } catch (error) {
    failure = new StageFailure(state, error)
  }

  const executionTimeMs = Math.max(0, Math.round(now().getTime() - startedAt.getTime()))
  const errorMessage = failure ? describeError(failure.error) : null
  const outcome: RunOutcome = {
    runTimestamp: startedAt,
    status: failure ? 'failure' : 'success',
    rowsInserted: failure ? 0 : rowsInserted,
    executionTimeMs,
    errorMessage,
  }

  if (failure) {
    logger.error(`${failure.state} failed: ${errorMessage}`)
  }

  const outcomeRecorded = await recordRunOutcome(store, outcome, logger)

  const summaryLine =
    `run ${outcome.status}: rows_inserted=${outcome.rowsInserted} duration_ms=${executionTimeMs}` +
    (errorMessage ? ` error="${errorMessage}"` : '')
  if (failure) logger.error(summaryLine)
  else logger.info(summaryLine)

  return {
    outcome,
    state: failure ? 'FAILED' : 'DONE',
    failedIn: failure ? failure.state : null,
    errorKind: failure ? errorKindOf(failure.error) : null,
    sample,
    outcomeRecorded,
  }
}
