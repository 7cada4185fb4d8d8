/**
 * fake-pg.ts — In-process stand-in for a pg.Pool, for tests only.
 *
 * Understands exactly the statements telemetry-store.ts issues against
 * grid_telemetry and etl_runs, including BEGIN/COMMIT/ROLLBACK staging and
 * the unique timestamp index. Anything else throws, so a changed query
 * shows up as a test failure rather than a silent no-op.
 */

import type { SqlClient, SqlQueryResult } from '../src/lib/telemetry-store'
import type { ClosablePool } from './ingest-carbon-intensity'

export interface FakeTelemetryRow {
  id: number
  timestamp: Date
  overall_intensity: number
  fuel_gas_perc: number
  fuel_nuclear_perc: number
  fuel_wind_perc: number
  fuel_solar_perc: number
}

export interface FakeRunRow {
  id: number
  run_timestamp: Date
  status: string
  rows_inserted: number
  execution_time_ms: number
  error_message: string | null
}

export class FakePgError extends Error {
  constructor(
    message: string,
    readonly code: string,
  ) {
    super(message)
    this.name = 'FakePgError'
  }
}

type FailureHook = (sql: string) => Error | null

function normalize(sql: string): string {
  return sql.replace(/\s+/g, ' ').trim()
}

function asDate(value: unknown): Date {
  if (value instanceof Date) return value
  throw new TypeError(`expected a Date parameter, got ${String(value)}`)
}

function asNumber(value: unknown): number {
  if (typeof value === 'number') return value
  throw new TypeError(`expected a numeric parameter, got ${String(value)}`)
}

export class FakePgPool implements ClosablePool {
  telemetry: FakeTelemetryRow[] = []
  runs: FakeRunRow[] = []
  statements: string[] = []
  schemaStatements = 0
  connects = 0
  releases = 0
  /** Errors handed to `release(err)`; pg destroys such clients instead of pooling them. */
  evicted: Error[] = []
  ended = false
  /** Return an error to make the matching statement fail. */
  failOn: FailureHook | null = null
  connectError: Error | null = null

  private nextId = 1

  async connect(): Promise<SqlClient> {
    if (this.connectError) throw this.connectError
    if (this.ended) throw new Error('pool has been ended')
    this.connects++
    return new FakePgClient(this)
  }

  async end(): Promise<void> {
    this.ended = true
  }

  allocateId(): number {
    return this.nextId++
  }

  statementsMatching(prefix: string): string[] {
    return this.statements.filter((s) => s.startsWith(prefix))
  }
}

class FakePgClient implements SqlClient {
  private pending: FakeTelemetryRow[] | null = null
  private released = false

  constructor(private readonly pool: FakePgPool) {}

  release(err?: Error | boolean): void {
    if (this.released) throw new Error('client released twice')
    this.released = true
    this.pool.releases++
    if (err instanceof Error) this.pool.evicted.push(err)
  }

  async query(text: string, values: unknown[] = []): Promise<SqlQueryResult> {
    if (this.released) throw new Error('query on a released client')
    const sql = normalize(text)
    this.pool.statements.push(sql)

    const injected = this.pool.failOn?.(sql)
    if (injected) throw injected

    if (sql.startsWith('CREATE ')) {
      this.pool.schemaStatements++
      return { rows: [], rowCount: null }
    }
    if (sql === 'BEGIN') {
      this.pending = []
      return { rows: [], rowCount: null }
    }
    if (sql === 'COMMIT') {
      this.pool.telemetry.push(...(this.pending ?? []))
      this.pending = null
      return { rows: [], rowCount: null }
    }
    if (sql === 'ROLLBACK') {
      this.pending = null
      return { rows: [], rowCount: null }
    }
    if (sql.startsWith('SELECT EXISTS') && sql.includes('grid_telemetry')) {
      const ts = asDate(values[0]).getTime()
      const exists = this.visibleTelemetry().some((r) => r.timestamp.getTime() === ts)
      return { rows: [{ exists }], rowCount: 1 }
    }
    if (sql.startsWith('INSERT INTO grid_telemetry')) {
      return this.insertTelemetry(values)
    }
    if (sql.startsWith('INSERT INTO etl_runs')) {
      const row: FakeRunRow = {
        id: this.pool.allocateId(),
        run_timestamp: asDate(values[0]),
        status: String(values[1]),
        rows_inserted: asNumber(values[2]),
        execution_time_ms: asNumber(values[3]),
        error_message: values[4] === null ? null : String(values[4]),
      }
      this.pool.runs.push(row)
      return { rows: [], rowCount: 1 }
    }
    if (sql.startsWith('SELECT id, run_timestamp') && sql.includes('FROM etl_runs')) {
      const limit = asNumber(values[0])
      const rows = [...this.pool.runs]
        .sort((a, b) => b.run_timestamp.getTime() - a.run_timestamp.getTime() || b.id - a.id)
        .slice(0, limit)
        .map((r) => ({ ...r, id: String(r.id) }))
      return { rows, rowCount: rows.length }
    }
    if (sql.startsWith('SELECT MAX(timestamp)')) {
      const times = this.visibleTelemetry().map((r) => r.timestamp.getTime())
      const latest = times.length > 0 ? new Date(Math.max(...times)) : null
      return { rows: [{ latest }], rowCount: 1 }
    }

    throw new Error(`fake-pg does not understand: ${sql}`)
  }

  private visibleTelemetry(): FakeTelemetryRow[] {
    return [...this.pool.telemetry, ...(this.pending ?? [])]
  }

  private insertTelemetry(values: unknown[]): SqlQueryResult {
    const timestamp = asDate(values[0])
    if (this.visibleTelemetry().some((r) => r.timestamp.getTime() === timestamp.getTime())) {
      throw new FakePgError(
        'duplicate key value violates unique constraint "grid_telemetry_timestamp_key"',
        '23505',
      )
    }

    const row: FakeTelemetryRow = {
      id: this.pool.allocateId(),
      timestamp,
      overall_intensity: asNumber(values[1]),
      fuel_gas_perc: asNumber(values[2]),
      fuel_nuclear_perc: asNumber(values[3]),
      fuel_wind_perc: asNumber(values[4]),
      fuel_solar_perc: asNumber(values[5]),
    }
    if (this.pending) this.pending.push(row)
    else this.pool.telemetry.push(row)
    return { rows: [], rowCount: 1 }
  }
}
