// src/core/logger.ts
import pino, { type Logger } from 'pino'

export interface LoggerOptions {
  level?: string
  file?: string
}

// Credential tokens must never reach a log line
export const REDACT = ['apiCode', 'uniqCode', 'credentials.apiCode', 'credentials.uniqCode', 'uniq_code']

/** Options left out fall back to LOG_LEVEL and LOG_FILE. */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? process.env['LOG_LEVEL'] ?? 'info'
  const file = opts.file ?? (process.env['LOG_FILE'] || undefined)
  const options = { level, redact: { paths: REDACT, censor: '[redacted]' } }

  if (file) {
    return pino(options, pino.destination({ dest: file, mkdir: true }))
  }

  // stderr only: stdout carries query results
  return pino(options, process.stderr)
}
