/**
 * create-carbon-tables.ts — Create grid_telemetry and etl_runs ahead of the first run.
 * The ingest script does this itself; this is for provisioning a fresh database by hand.
 * Run: npx tsx scripts/create-carbon-tables.ts
 */
import pg from 'pg'
import { logResolvedDbTarget, resolveDatabaseUrl } from '../src/lib/db-url'
import { RUNS_TABLE, SCHEMA_STATEMENTS, TELEMETRY_TABLE } from '../src/lib/telemetry-store'
import { loadDotEnvFiles } from './ingest-utils'

async function main() {
  loadDotEnvFiles()
  const target = resolveDatabaseUrl()
  logResolvedDbTarget('create-carbon-tables', target)

  const client = new pg.Client({ connectionString: target.url })
  await client.connect()

  try {
    for (const statement of SCHEMA_STATEMENTS) {
      await client.query(statement)
    }
    console.log('Tables and indexes created')

    for (const table of [TELEMETRY_TABLE, RUNS_TABLE]) {
      const res = await client.query<{ count: string }>(`SELECT count(*) FROM ${table}`)
      console.log(`Verification: ${table} row count`, res.rows[0].count)
    }
  } finally {
    await client.end()
  }
}

main().catch(e => { console.error(e); process.exit(1) })
