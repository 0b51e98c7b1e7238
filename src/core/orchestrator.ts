// src/core/orchestrator.ts
import type { Provider } from '../providers/base.js'
import type { Credentials } from './config.js'
import { resolveCredentials } from './config.js'
import type { MetricsSink } from './metrics.js'
import type { Address, InfraResult, ProviderId, QueryResponse } from './types.js'
import { errorResult } from './types.js'
import { createLogger } from './logger.js'
import { MockProvider } from '../providers/mock.js'
import { WiradiusProvider, type WiradiusOptions } from '../providers/wiradius.js'
import { DirectoryProvider } from '../providers/directory.js'

const log = createLogger()

export interface OrchestratorSettings {
  credentials: Credentials
  wiradius?: WiradiusOptions
}

/** Mock first, the remote lookup only when credentials resolved, the link directory last. */
export function buildProviders(
  credentials: Credentials | undefined,
  wiradius: WiradiusOptions = {},
): Provider[] {
  const providers: Provider[] = [new MockProvider()]
  if (credentials) providers.push(new WiradiusProvider(credentials, wiradius))
  providers.push(new DirectoryProvider())
  return providers
}

/**
 * Query each provider in order and concatenate their results. A provider that
 * rejects is reported as an `Error` result and does not stop the ones after it.
 */
export async function runProviders(
  address: Address,
  providers: readonly Provider[],
  metrics?: MetricsSink,
): Promise<InfraResult[]> {
  if (!address) throw new TypeError('runProviders: address is required')

  const results: InfraResult[] = []
  for (const provider of providers) {
    const t0 = Date.now()
    let batch: InfraResult[]
    try {
      batch = await provider.query(address)
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err)
      log.error({ provider: provider.id, error: message }, 'provider threw')
      batch = [errorResult(provider.name, message)]
    }
    const elapsed = Date.now() - t0
    results.push(...batch)
    log.info({ provider: provider.id, count: batch.length, elapsed_ms: elapsed }, 'provider response')

    if (metrics) {
      const failed = batch.find((r) => r.technology === 'Error')
      await metrics
        .record({
          provider: provider.id,
          results: batch.length,
          elapsedMs: elapsed,
          technology: batch[0]?.technology,
          error: failed ? String(failed.rawDetails['error'] ?? 'error') : undefined,
        })
        .catch((err: unknown) => log.warn({ error: String(err) }, 'metrics write failed'))
    }
  }
  return results
}

export class InfraOrchestrator {
  constructor(
    private readonly settings: OrchestratorSettings,
    private readonly metrics?: MetricsSink,
  ) {}

  activeProviders(override?: Partial<Credentials>): Provider[] {
    return buildProviders(resolveCredentials(this.settings.credentials, override), this.settings.wiradius)
  }

  async query(address: Address, override?: Partial<Credentials>): Promise<QueryResponse> {
    const t0 = Date.now()
    const providers = this.activeProviders(override)
    const ids: ProviderId[] = providers.map((p) => p.id)
    log.info({ province: address.province, district: address.district, providers: ids }, 'query request')

    const results = await runProviders(address, providers, this.metrics)
    return { address, providers: ids, results, elapsed_ms: Date.now() - t0 }
  }
}
