export interface EtlLogger {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

/** Prefix every line with `[scope]`, the way the ingest scripts tag their output. */
export function scopedLogger(scope: string, sink: EtlLogger = console): EtlLogger {
  const tag = `[${scope}]`
  return {
    info: (message) => sink.info(`${tag} ${message}`),
    warn: (message) => sink.warn(`${tag} ${message}`),
    error: (message) => sink.error(`${tag} ${message}`),
  }
}
