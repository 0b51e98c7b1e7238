// src/mcp/handlers.ts
import type { z } from 'zod'
import { loadConfig } from '../core/config.js'
import { SqliteMetrics } from '../core/metrics.js'
import type { InfraOrchestrator } from '../core/orchestrator.js'
import { buildOrchestrator } from '../core/orchestrator-factory.js'
import { createAddress } from '../core/types.js'
import { JsonFormatter } from '../results/json.js'
import { MarkdownFormatter } from '../results/markdown.js'
import type { QueryInfrastructureInput, ListProvidersInput, ProviderStatsInput } from './tools.js'

// Lazy singleton -- one orchestrator per MCP server process
let _orchestrator: InfraOrchestrator | undefined
function getOrchestrator(): InfraOrchestrator {
  if (!_orchestrator) _orchestrator = buildOrchestrator()
  return _orchestrator
}

export async function handleQueryInfrastructure(
  input: z.infer<typeof QueryInfrastructureInput>,
  orchestrator: InfraOrchestrator = getOrchestrator(),
): Promise<string> {
  const address = createAddress({
    province: input.province,
    district: input.district,
    neighborhood: input.neighborhood,
    street: input.street,
    buildingNumber: input.buildingNumber,
    unit: input.unit,
    carrierAddressCode: input.carrierAddressCode,
  })
  const response = await orchestrator.query(address, { apiCode: input.apiCode, uniqCode: input.uniqCode })
  const formatter = input.output === 'markdown' ? new MarkdownFormatter() : new JsonFormatter()
  return formatter.format(response)
}

export async function handleListProviders(
  input: z.infer<typeof ListProvidersInput>,
  orchestrator: InfraOrchestrator = getOrchestrator(),
): Promise<string> {
  const providers = orchestrator
    .activeProviders({ apiCode: input.apiCode, uniqCode: input.uniqCode })
    .map((p) => ({ id: p.id, name: p.name }))
  return JSON.stringify(providers, null, 2)
}

export async function handleProviderStats(
  input: z.infer<typeof ProviderStatsInput>,
  metricsPath: string = loadConfig().metricsPath,
): Promise<string> {
  const metrics = new SqliteMetrics(metricsPath)
  try {
    const stats = await metrics.stats((input.sinceHours ?? 24) * 3600)
    return JSON.stringify(stats, null, 2)
  } finally {
    metrics.close()
  }
}
