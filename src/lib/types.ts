export interface TelemetrySample {
  readonly timestamp: Date
  readonly overallIntensity: number
  readonly fuelGasPerc: number
  readonly fuelNuclearPerc: number
  readonly fuelWindPerc: number
  readonly fuelSolarPerc: number
}

export type RunStatus = 'success' | 'failure'

export interface RunOutcome {
  runTimestamp: Date
  status: RunStatus
  rowsInserted: number
  executionTimeMs: number
  errorMessage: string | null
}

/** Run outcome as read back from etl_runs. */
export interface StoredRunOutcome extends RunOutcome {
  id: string // bigint comes as string from pg
}

export type EtlState = 'FETCHING' | 'VALIDATING' | 'DEDUP_CHECK' | 'PERSISTING' | 'DONE' | 'FAILED'

export type EtlErrorKind = 'config' | 'fetch' | 'validation' | 'persistence'

export interface RunSummary {
  outcome: RunOutcome
  state: 'DONE' | 'FAILED'
  failedIn: EtlState | null
  errorKind: EtlErrorKind | null
  sample: TelemetrySample | null
  outcomeRecorded: boolean
}

export type FuelCategory = 'gas' | 'nuclear' | 'wind' | 'solar'

export const TRACKED_FUELS: readonly FuelCategory[] = ['gas', 'nuclear', 'wind', 'solar']

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }
