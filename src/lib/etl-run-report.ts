import type { StoredRunOutcome } from './types'

export interface RunReport {
  total: number
  succeeded: number
  failed: number
  successRate: number | null
  rowsInserted: number
  lastFailure: StoredRunOutcome | null
  latestSample: Date | null
  sampleAgeMinutes: number | null
}

/** Runs are expected newest first, as `recentRuns` returns them. */
export function summarizeRuns(runs: StoredRunOutcome[], latestSample: Date | null, now: Date): RunReport {
  const succeeded = runs.filter((r) => r.status === 'success').length
  const failed = runs.length - succeeded

  return {
    total: runs.length,
    succeeded,
    failed,
    successRate: runs.length > 0 ? succeeded / runs.length : null,
    rowsInserted: runs.reduce((sum, r) => sum + r.rowsInserted, 0),
    lastFailure: runs.find((r) => r.status === 'failure') ?? null,
    latestSample,
    sampleAgeMinutes: latestSample ? Math.floor((now.getTime() - latestSample.getTime()) / 60_000) : null,
  }
}

export function formatRunReport(report: RunReport, runs: StoredRunOutcome[]): string[] {
  const lines: string[] = []
  const rate = report.successRate === null ? 'n/a' : `${(report.successRate * 100).toFixed(1)}%`

  lines.push(`Runs: ${report.total} (${report.succeeded} success, ${report.failed} failure, ${rate})`)
  lines.push(`Rows inserted: ${report.rowsInserted}`)
  lines.push(
    report.latestSample
      ? `Latest sample: ${report.latestSample.toISOString()} (${report.sampleAgeMinutes} min old)`
      : 'Latest sample: none',
  )
  if (report.lastFailure) {
    lines.push(`Last failure: ${report.lastFailure.runTimestamp.toISOString()} ${report.lastFailure.errorMessage ?? ''}`.trimEnd())
  }

  if (runs.length > 0) {
    lines.push('')
    for (const run of runs) {
      const status = run.status.padEnd(7)
      const rows = String(run.rowsInserted).padStart(3)
      const ms = `${run.executionTimeMs}ms`.padStart(8)
      const suffix = run.errorMessage ? `  ${run.errorMessage.slice(0, 120)}` : ''
      lines.push(`  ${run.runTimestamp.toISOString()}  ${status} ${rows} ${ms}${suffix}`)
    }
  }

  return lines
}
