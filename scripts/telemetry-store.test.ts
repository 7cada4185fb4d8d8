import test from 'node:test'
import assert from 'node:assert/strict'
import { PersistenceError } from '../src/lib/etl-errors'
import { createTelemetryStore } from '../src/lib/telemetry-store'
import type { TelemetrySample } from '../src/lib/types'
import { FakePgPool } from './fake-pg'

const SAMPLE: TelemetrySample = {
  timestamp: new Date('2025-12-09T14:00:00Z'),
  overallIntensity: 90,
  fuelGasPerc: 20.0,
  fuelNuclearPerc: 21.9,
  fuelWindPerc: 57.0,
  fuelSolarPerc: 1.1,
}

test('ensureSchema creates both tables and indexes once per store', async () => {
  const pool = new FakePgPool()
  const store = createTelemetryStore(pool)

  await Promise.all([store.ensureSchema(), store.ensureSchema()])
  await store.ensureSchema()

  assert.equal(pool.schemaStatements, 4)
  assert.deepEqual(
    pool.statements.map((s) => s.split(' (')[0]),
    [
      'CREATE TABLE IF NOT EXISTS grid_telemetry',
      'CREATE UNIQUE INDEX IF NOT EXISTS grid_telemetry_timestamp_key ON grid_telemetry',
      'CREATE TABLE IF NOT EXISTS etl_runs',
      'CREATE INDEX IF NOT EXISTS etl_runs_run_timestamp_idx ON etl_runs',
    ],
  )
  assert.equal(pool.releases, pool.connects)
})

test('ensureSchema can be retried after a failed attempt', async () => {
  const pool = new FakePgPool()
  const store = createTelemetryStore(pool)
  pool.failOn = (sql) => (sql.startsWith('CREATE') ? new Error('connection reset') : null)

  await assert.rejects(store.ensureSchema(), /connection reset/)
  assert.equal(pool.schemaStatements, 0)

  pool.failOn = null
  await store.ensureSchema()
  assert.equal(pool.schemaStatements, 4)
  assert.equal(pool.releases, pool.connects)
})

test('persist inserts the sample inside a committed transaction', async () => {
  const pool = new FakePgPool()
  const store = createTelemetryStore(pool)

  await store.persist(SAMPLE)

  assert.deepEqual(pool.statements.map((s) => s.split(' (')[0]), ['BEGIN', 'INSERT INTO grid_telemetry', 'COMMIT'])
  assert.equal(pool.telemetry.length, 1)
  const row = pool.telemetry[0]
  assert.equal(row.timestamp.toISOString(), '2025-12-09T14:00:00.000Z')
  assert.equal(row.overall_intensity, 90)
  assert.equal(row.fuel_gas_perc, 20.0)
  assert.equal(row.fuel_nuclear_perc, 21.9)
  assert.equal(row.fuel_wind_perc, 57.0)
  assert.equal(row.fuel_solar_perc, 1.1)
  assert.equal(pool.releases, 1)
})

test('a failing insert rolls back and raises PersistenceError', async () => {
  const pool = new FakePgPool()
  const store = createTelemetryStore(pool)
  pool.failOn = (sql) => (sql.startsWith('INSERT INTO grid_telemetry') ? new Error('disk full') : null)

  await assert.rejects(store.persist(SAMPLE), (error: unknown) => {
    assert.ok(error instanceof PersistenceError)
    assert.equal(error.message, 'insert into grid_telemetry failed: disk full')
    assert.equal(error.code, null)
    assert.equal(error.isUniqueViolation, false)
    return true
  })

  assert.deepEqual(pool.statements.map((s) => s.split(' (')[0]), ['BEGIN', 'INSERT INTO grid_telemetry', 'ROLLBACK'])
  assert.equal(pool.telemetry.length, 0)
  assert.equal(pool.releases, 1)
  assert.deepEqual(pool.evicted, [])
})

test('a failing rollback still surfaces the original insert error', async () => {
  const pool = new FakePgPool()
  const store = createTelemetryStore(pool)
  pool.failOn = (sql) => {
    if (sql.startsWith('INSERT INTO grid_telemetry')) return new Error('server closed the connection')
    if (sql === 'ROLLBACK') return new Error('not connected')
    return null
  }

  await assert.rejects(store.persist(SAMPLE), /insert into grid_telemetry failed: server closed the connection/)
  assert.equal(pool.releases, 1)
  assert.deepEqual(pool.evicted.map((e) => e.message), ['not connected'])
})

test('the unique timestamp index rejects a second insert for the same instant', async () => {
  const pool = new FakePgPool()
  const store = createTelemetryStore(pool)

  await store.persist(SAMPLE)
  await assert.rejects(store.persist({ ...SAMPLE, overallIntensity: 91 }), (error: unknown) => {
    assert.ok(error instanceof PersistenceError)
    assert.equal(error.code, '23505')
    assert.equal(error.isUniqueViolation, true)
    return true
  })
  assert.equal(pool.telemetry.length, 1)
  assert.equal(pool.telemetry[0].overall_intensity, 90)
})

test('persist reports an unreachable pool as PersistenceError', async () => {
  const pool = new FakePgPool()
  pool.connectError = new Error('connection refused')
  const store = createTelemetryStore(pool)

  await assert.rejects(store.persist(SAMPLE), /could not acquire a database connection: connection refused/)
})

test('exists looks up the exact timestamp', async () => {
  const pool = new FakePgPool()
  const store = createTelemetryStore(pool)
  await store.persist(SAMPLE)

  assert.equal(await store.exists(new Date('2025-12-09T14:00:00Z')), true)
  assert.equal(await store.exists(new Date('2025-12-09T14:30:00Z')), false)
  assert.equal(pool.releases, pool.connects)
})

test('recordRun writes the outcome and recentRuns reads it back newest first', async () => {
  const pool = new FakePgPool()
  const store = createTelemetryStore(pool)

  await store.recordRun({
    runTimestamp: new Date('2025-12-09T13:00:00Z'),
    status: 'success',
    rowsInserted: 1,
    executionTimeMs: 812,
    errorMessage: null,
  })
  await store.recordRun({
    runTimestamp: new Date('2025-12-09T14:00:00Z'),
    status: 'failure',
    rowsInserted: 0,
    executionTimeMs: 14_020,
    errorMessage: 'intensity fetch failed after 3 attempt(s): HTTP 503',
  })

  const runs = await store.recentRuns(10)
  assert.equal(runs.length, 2)
  assert.deepEqual(runs[0], {
    id: '2',
    runTimestamp: new Date('2025-12-09T14:00:00Z'),
    status: 'failure',
    rowsInserted: 0,
    executionTimeMs: 14_020,
    errorMessage: 'intensity fetch failed after 3 attempt(s): HTTP 503',
  })
  assert.equal(runs[1].status, 'success')
  assert.equal(runs[1].errorMessage, null)

  assert.equal((await store.recentRuns(1)).length, 1)
})

test('latestSampleTimestamp is null for an empty table', async () => {
  const pool = new FakePgPool()
  const store = createTelemetryStore(pool)

  assert.equal(await store.latestSampleTimestamp(), null)
  await store.persist(SAMPLE)
  await store.persist({ ...SAMPLE, timestamp: new Date('2025-12-09T14:30:00Z') })
  assert.equal((await store.latestSampleTimestamp())?.toISOString(), '2025-12-09T14:30:00.000Z')
})
