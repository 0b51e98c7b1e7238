// src/core/orchestrator-factory.ts
import { loadConfig, type Config } from './config.js'
import { InfraOrchestrator } from './orchestrator.js'
import { SqliteMetrics } from './metrics.js'

export interface BuildOptions {
  metrics?: boolean
}

export function buildOrchestrator(cfg: Config = loadConfig(), opts: BuildOptions = {}): InfraOrchestrator {
  const metrics = opts.metrics === false ? undefined : new SqliteMetrics(cfg.metricsPath)
  return new InfraOrchestrator(
    {
      credentials: cfg.credentials,
      wiradius: {
        baseUrl: cfg.wiradiusBaseUrl,
        timeoutMs: cfg.requestTimeoutMs,
        fieldAliases: cfg.fieldAliases,
      },
    },
    metrics,
  )
}
