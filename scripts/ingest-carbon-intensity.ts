/**
 * ingest-carbon-intensity.ts
 *
 * One scheduled ETL run: pull the current GB grid carbon intensity and
 * generation mix, store a validated sample in grid_telemetry and one row
 * in etl_runs. Meant to be invoked hourly by an external scheduler.
 *
 * Exit code is 0 whenever the run got as far as recording its outcome
 * (including failed runs), 1 when configuration is invalid or the database
 * is unreachable at startup.
 *
 * Usage:
 *   npx tsx scripts/ingest-carbon-intensity.ts
 */

import { pathToFileURL } from 'node:url'
import pg from 'pg'
import { createCarbonIntensityClient, type FetchLike } from '../src/lib/carbon-intensity'
import { runCarbonEtl } from '../src/lib/carbon-etl'
import { describeDbTarget } from '../src/lib/db-url'
import { loadEtlConfig, type EtlConfig } from '../src/lib/etl-config'
import { describeError } from '../src/lib/etl-errors'
import { scopedLogger, type EtlLogger } from '../src/lib/etl-logger'
import { RetryPolicy, type Sleep } from '../src/lib/retry'
import { createTelemetryStore, type SqlPool } from '../src/lib/telemetry-store'
import { loadDotEnvFiles } from './ingest-utils'

export interface ClosablePool extends SqlPool {
  end(): Promise<void>
}

export interface IngestDeps {
  env?: NodeJS.ProcessEnv
  createPool?: (connectionString: string) => ClosablePool
  fetchImpl?: FetchLike
  sleep?: Sleep
  sink?: EtlLogger
  now?: () => Date
}

function createPgPool(connectionString: string): ClosablePool {
  return new pg.Pool({ connectionString, max: 2 })
}

export async function runScheduledIngest(deps: IngestDeps = {}): Promise<number> {
  const logger = scopedLogger('carbon-etl', deps.sink)

  let config: EtlConfig
  try {
    config = loadEtlConfig(deps.env ?? process.env)
  } catch (error) {
    logger.error(`fatal: ${describeError(error)}`)
    return 1
  }
  logger.info(`database target ${describeDbTarget(config.database)}`)

  const pool = (deps.createPool ?? createPgPool)(config.database.url)
  try {
    const store = createTelemetryStore(pool)
    try {
      await store.ensureSchema()
    } catch (error) {
      logger.error(`fatal: database unreachable, no run recorded: ${describeError(error)}`)
      return 1
    }

    const client = createCarbonIntensityClient({
      baseUrl: config.apiBaseUrl,
      timeoutMs: config.fetchTimeoutMs,
      fetchImpl: deps.fetchImpl,
      logger,
      retry: new RetryPolicy({
        maxAttempts: config.fetchMaxAttempts,
        baseDelayMs: config.fetchBaseDelayMs,
        sleep: deps.sleep,
      }),
    })

    await runCarbonEtl({
      client,
      store,
      logger,
      maxSampleAgeMs: config.maxSampleAgeMs,
      now: deps.now,
    })
    return 0
  } finally {
    await pool.end().catch((error: unknown) => {
      logger.warn(`pool shutdown failed: ${describeError(error)}`)
    })
  }
}

const isMain = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href

if (isMain) {
  loadDotEnvFiles()
  runScheduledIngest()
    .then((code) => {
      process.exit(code)
    })
    .catch((err) => {
      console.error(`[carbon-etl] fatal: ${describeError(err)}`)
      process.exit(1)
    })
}
