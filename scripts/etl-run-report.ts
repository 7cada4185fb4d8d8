/**
 * etl-run-report.ts — Print recent ETL run outcomes and telemetry freshness.
 *
 * Usage:
 *   npx tsx scripts/etl-run-report.ts             # last 24 runs
 *   npx tsx scripts/etl-run-report.ts --limit=72
 */

import pg from 'pg'
import { logResolvedDbTarget, resolveDatabaseUrl } from '../src/lib/db-url'
import { formatRunReport, summarizeRuns } from '../src/lib/etl-run-report'
import { createPgTelemetryStore } from '../src/lib/telemetry-store'
import { loadDotEnvFiles, parsePositiveIntArg } from './ingest-utils'

async function run(): Promise<void> {
  loadDotEnvFiles()
  const limit = parsePositiveIntArg('limit', 24)
  const target = resolveDatabaseUrl()
  logResolvedDbTarget('etl-run-report', target)

  const pool = new pg.Pool({ connectionString: target.url, max: 1 })
  try {
    const store = createPgTelemetryStore(pool)
    const [runs, latest] = await Promise.all([store.recentRuns(limit), store.latestSampleTimestamp()])
    const report = summarizeRuns(runs, latest, new Date())

    console.log(`\n═══ CARBON ETL — LAST ${limit} RUNS ═══`)
    for (const line of formatRunReport(report, runs)) console.log(line)
  } finally {
    await pool.end()
  }
}

run().catch((err) => {
  console.error(`[etl-run-report] fatal: ${err instanceof Error ? err.message : err}`)
  process.exit(1)
})
