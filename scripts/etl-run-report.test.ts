import test from 'node:test'
import assert from 'node:assert/strict'
import { formatRunReport, summarizeRuns } from '../src/lib/etl-run-report'
import type { StoredRunOutcome } from '../src/lib/types'

const RUNS: StoredRunOutcome[] = [
  {
    id: '3',
    runTimestamp: new Date('2025-12-09T16:00:00Z'),
    status: 'success',
    rowsInserted: 0,
    executionTimeMs: 640,
    errorMessage: null,
  },
  {
    id: '2',
    runTimestamp: new Date('2025-12-09T15:00:00Z'),
    status: 'failure',
    rowsInserted: 0,
    executionTimeMs: 14_020,
    errorMessage: 'intensity fetch failed after 3 attempt(s): HTTP 503',
  },
  {
    id: '1',
    runTimestamp: new Date('2025-12-09T14:00:00Z'),
    status: 'success',
    rowsInserted: 1,
    executionTimeMs: 812,
    errorMessage: null,
  },
]

test('summarizeRuns counts outcomes and sample age', () => {
  const report = summarizeRuns(RUNS, new Date('2025-12-09T14:00:00Z'), new Date('2025-12-09T16:05:00Z'))

  assert.equal(report.total, 3)
  assert.equal(report.succeeded, 2)
  assert.equal(report.failed, 1)
  assert.equal(report.successRate, 2 / 3)
  assert.equal(report.rowsInserted, 1)
  assert.equal(report.lastFailure?.id, '2')
  assert.equal(report.sampleAgeMinutes, 125)
})

test('summarizeRuns handles an empty run log', () => {
  const report = summarizeRuns([], null, new Date('2025-12-09T16:05:00Z'))
  assert.equal(report.successRate, null)
  assert.equal(report.lastFailure, null)
  assert.equal(report.sampleAgeMinutes, null)
  assert.deepEqual(formatRunReport(report, []), [
    'Runs: 0 (0 success, 0 failure, n/a)',
    'Rows inserted: 0',
    'Latest sample: none',
  ])
})

test('formatRunReport renders the header and one line per run', () => {
  const report = summarizeRuns(RUNS, new Date('2025-12-09T14:00:00Z'), new Date('2025-12-09T16:05:00Z'))

  assert.deepEqual(formatRunReport(report, RUNS), [
    'Runs: 3 (2 success, 1 failure, 66.7%)',
    'Rows inserted: 1',
    'Latest sample: 2025-12-09T14:00:00.000Z (125 min old)',
    'Last failure: 2025-12-09T15:00:00.000Z intensity fetch failed after 3 attempt(s): HTTP 503',
    '',
    '  2025-12-09T16:00:00.000Z  success   0    640ms',
    '  2025-12-09T15:00:00.000Z  failure   0  14020ms  intensity fetch failed after 3 attempt(s): HTTP 503',
    '  2025-12-09T14:00:00.000Z  success   1    812ms',
  ])
})
