import { config } from 'dotenv'

/** Load `.env.local` then `.env`; values already in the environment (or from an earlier file) win. */
export function loadDotEnvFiles(): void {
  config({ path: '.env.local' })
  config({ path: '.env' })
}

export function parseArg(name: string, fallback: string, argv: string[] = process.argv.slice(2)): string {
  const prefixed = `--${name}=`
  for (const arg of argv) {
    if (arg.startsWith(prefixed)) return arg.slice(prefixed.length)
  }

  const idx = argv.indexOf(`--${name}`)
  if (idx >= 0 && argv[idx + 1]) return argv[idx + 1]
  return fallback
}

export function parsePositiveIntArg(name: string, fallback: number, argv: string[] = process.argv.slice(2)): number {
  const raw = parseArg(name, String(fallback), argv)
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`--${name} must be a positive integer, got '${raw}'`)
  }
  return value
}
