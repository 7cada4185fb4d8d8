/**
 * telemetry-store.ts — Postgres persistence for grid telemetry and the run log.
 *
 * Each call checks a client out of the pool and releases it in `finally`,
 * so a run never holds a connection past its own statements. Schema
 * creation runs at most once per store instance.
 */

import type pg from 'pg'
import { PersistenceError } from './etl-errors'
import type { RunOutcome, StoredRunOutcome, TelemetrySample } from './types'

// Structural subset of pg.Pool / pg.PoolClient the store relies on.
export interface SqlQueryResult {
  rows: Record<string, unknown>[]
  rowCount: number | null
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlQueryResult>
  release(err?: Error | boolean): void
}

export interface SqlPool {
  connect(): Promise<SqlClient>
}

export interface TelemetryStore {
  ensureSchema(): Promise<void>
  exists(timestamp: Date): Promise<boolean>
  persist(sample: TelemetrySample): Promise<void>
  recordRun(outcome: RunOutcome): Promise<void>
  recentRuns(limit: number): Promise<StoredRunOutcome[]>
  latestSampleTimestamp(): Promise<Date | null>
}

// ─────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────

export const TELEMETRY_TABLE = 'grid_telemetry'
export const RUNS_TABLE = 'etl_runs'

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS ${TELEMETRY_TABLE} (
    id                BIGSERIAL PRIMARY KEY,
    timestamp         TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    overall_intensity INTEGER,
    fuel_gas_perc     DOUBLE PRECISION,
    fuel_nuclear_perc DOUBLE PRECISION,
    fuel_wind_perc    DOUBLE PRECISION,
    fuel_solar_perc   DOUBLE PRECISION
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS ${TELEMETRY_TABLE}_timestamp_key ON ${TELEMETRY_TABLE} (timestamp)`,
  `CREATE TABLE IF NOT EXISTS ${RUNS_TABLE} (
    id                BIGSERIAL PRIMARY KEY,
    run_timestamp     TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    status            VARCHAR(16) NOT NULL,
    rows_inserted     INTEGER NOT NULL DEFAULT 0,
    execution_time_ms INTEGER NOT NULL DEFAULT 0,
    error_message     TEXT
  )`,
  `CREATE INDEX IF NOT EXISTS ${RUNS_TABLE}_run_timestamp_idx ON ${RUNS_TABLE} (run_timestamp)`,
]

const EXISTS_SQL = `SELECT EXISTS (SELECT 1 FROM ${TELEMETRY_TABLE} WHERE timestamp = $1) AS exists`

const INSERT_SAMPLE_SQL = `
  INSERT INTO ${TELEMETRY_TABLE} (
    timestamp, overall_intensity,
    fuel_gas_perc, fuel_nuclear_perc, fuel_wind_perc, fuel_solar_perc
  )
  VALUES ($1, $2, $3, $4, $5, $6)
`

const INSERT_RUN_SQL = `
  INSERT INTO ${RUNS_TABLE} (run_timestamp, status, rows_inserted, execution_time_ms, error_message)
  VALUES ($1, $2, $3, $4, $5)
`

const RECENT_RUNS_SQL = `
  SELECT id, run_timestamp, status, rows_inserted, execution_time_ms, error_message
  FROM ${RUNS_TABLE}
  ORDER BY run_timestamp DESC, id DESC
  LIMIT $1
`

const LATEST_SAMPLE_SQL = `SELECT MAX(timestamp) AS latest FROM ${TELEMETRY_TABLE}`

// ─────────────────────────────────────────────
// Row mapping
// ─────────────────────────────────────────────

function toDate(value: unknown): Date | null {
  if (value instanceof Date) return value
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value)
    return Number.isNaN(parsed.getTime()) ? null : parsed
  }
  return null
}

function toRunOutcome(row: Record<string, unknown>): StoredRunOutcome {
  return {
    id: String(row.id),
    runTimestamp: toDate(row.run_timestamp) ?? new Date(0),
    status: row.status === 'success' ? 'success' : 'failure',
    rowsInserted: Number(row.rows_inserted ?? 0),
    executionTimeMs: Number(row.execution_time_ms ?? 0),
    errorMessage: typeof row.error_message === 'string' ? row.error_message : null,
  }
}

// ─────────────────────────────────────────────
// Store
// ─────────────────────────────────────────────

export function createTelemetryStore(pool: SqlPool): TelemetryStore {
  let schemaReady: Promise<void> | null = null

  async function withClient<T>(fn: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await pool.connect()
    try {
      return await fn(client)
    } finally {
      client.release()
    }
  }

  async function createSchema(): Promise<void> {
    await withClient(async (client) => {
      for (const statement of SCHEMA_STATEMENTS) {
        await client.query(statement)
      }
    })
  }

  return {
    ensureSchema() {
      if (!schemaReady) {
        schemaReady = createSchema().catch((error: unknown) => {
          schemaReady = null
          throw error
        })
      }
      return schemaReady
    },

    async exists(timestamp) {
      const result = await withClient((client) => client.query(EXISTS_SQL, [timestamp]))
      return result.rows[0]?.exists === true
    },

    async persist(sample) {
      let client: SqlClient
      try {
        client = await pool.connect()
      } catch (error) {
        throw new PersistenceError('could not acquire a database connection', error)
      }

      let failure: Error | undefined
      try {
        await client.query('BEGIN')
        await client.query(INSERT_SAMPLE_SQL, [
          sample.timestamp,
          sample.overallIntensity,
          sample.fuelGasPerc,
          sample.fuelNuclearPerc,
          sample.fuelWindPerc,
          sample.fuelSolarPerc,
        ])
        await client.query('COMMIT')
      } catch (error) {
        try {
          await client.query('ROLLBACK')
        } catch (rollbackError) {
          // A failed ROLLBACK means the connection itself is broken; drop it from the pool.
          failure = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError))
        }
        throw new PersistenceError(`insert into ${TELEMETRY_TABLE} failed`, error)
      } finally {
        client.release(failure)
      }
    },

    async recordRun(outcome) {
      await withClient((client) =>
        client.query(INSERT_RUN_SQL, [
          outcome.runTimestamp,
          outcome.status,
          outcome.rowsInserted,
          outcome.executionTimeMs,
          outcome.errorMessage,
        ]),
      )
    },

    async recentRuns(limit) {
      const result = await withClient((client) => client.query(RECENT_RUNS_SQL, [limit]))
      return result.rows.map(toRunOutcome)
    },

    async latestSampleTimestamp() {
      const result = await withClient((client) => client.query(LATEST_SAMPLE_SQL))
      return toDate(result.rows[0]?.latest)
    },
  }
}

export function createPgTelemetryStore(pool: pg.Pool): TelemetryStore {
  return createTelemetryStore(pool)
}
