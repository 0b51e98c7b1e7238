// src/core/metrics.ts
import Database from 'better-sqlite3'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import type { ProviderId, Technology } from './types.js'

// Call outcomes only. Address fields are never written.
export interface MetricRecord {
  provider: ProviderId
  results: number
  elapsedMs: number
  technology?: Technology
  error?: string
}

export interface MetricsSink {
  record(m: MetricRecord): Promise<void>
}

export interface ProviderStats {
  provider: ProviderId
  calls: number
  errors: number
  empty: number
  p50: number
  p95: number
  p99: number
}

export class SqliteMetrics implements MetricsSink {
  private db: Database.Database

  constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true })
    this.db = new Database(dbPath)
    this.migrate()
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS provider_calls (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        ts         INTEGER NOT NULL,
        provider   TEXT NOT NULL,
        technology TEXT,
        results    INTEGER NOT NULL,
        elapsed_ms INTEGER NOT NULL,
        error      TEXT
      );
    `)
  }

  async record(m: MetricRecord): Promise<void> {
    this.db
      .prepare(
        'INSERT INTO provider_calls (ts, provider, technology, results, elapsed_ms, error) VALUES (?, ?, ?, ?, ?, ?)',
      )
      .run(
        Math.floor(Date.now() / 1000),
        m.provider,
        m.technology ?? null,
        m.results,
        Math.round(m.elapsedMs),
        m.error ?? null,
      )
  }

  close(): void {
    this.db.close()
  }

  async stats(sinceSec = 86400): Promise<ProviderStats[]> {
    const since = Math.floor(Date.now() / 1000) - sinceSec
    const rows = this.db
      .prepare(
        `SELECT provider,
                COUNT(*) as calls,
                SUM(CASE WHEN error IS NOT NULL THEN 1 ELSE 0 END) as errors,
                SUM(CASE WHEN results = 0 THEN 1 ELSE 0 END) as empty,
                GROUP_CONCAT(elapsed_ms) as latencies
         FROM provider_calls
         WHERE ts >= ?
         GROUP BY provider
         ORDER BY provider`,
      )
      .all(since) as Array<{
      provider: ProviderId
      calls: number
      errors: number
      empty: number
      latencies: string | null
    }>

    return rows.map((r) => {
      const lats = r.latencies
        ? r.latencies
            .split(',')
            .map(Number)
            .filter((n) => !isNaN(n))
            .sort((a, b) => a - b)
        : []
      return {
        provider: r.provider,
        calls: r.calls,
        errors: r.errors,
        empty: r.empty,
        p50: percentile(lats, 0.5),
        p95: percentile(lats, 0.95),
        p99: percentile(lats, 0.99),
      }
    })
  }
}

export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0
  const idx = Math.ceil(sorted.length * p) - 1
  return sorted[Math.max(0, Math.min(idx, sorted.length - 1))] ?? 0
}
