// src/mcp/tools.ts
import { z } from 'zod'

export const QueryInfrastructureInput = z.object({
  province: z.string().describe('Province (il), e.g. "Rize". Required.'),
  district: z.string().describe('District (ilçe), e.g. "Merkez". Required.'),
  neighborhood: z.string().optional().describe('Neighborhood (mahalle).'),
  street: z.string().optional().describe('Street (cadde/sokak).'),
  buildingNumber: z.string().optional().describe('Building number.'),
  unit: z.string().optional().describe('Unit / flat number.'),
  carrierAddressCode: z.string().optional().describe(
    'Türk Telekom address code. The Wiradius provider only runs when this and both API codes are set.',
  ),
  apiCode: z.string().optional().describe('Wiradius API code, used for this call only. Needs uniqCode too.'),
  uniqCode: z.string().optional().describe('Wiradius uniq code, used for this call only. Needs apiCode too.'),
  output: z.enum(['json', 'markdown']).optional().describe('Result format. Default: "json".'),
})

export const ListProvidersInput = z.object({
  apiCode: z.string().optional().describe('Wiradius API code override.'),
  uniqCode: z.string().optional().describe('Wiradius uniq code override.'),
})

export const ProviderStatsInput = z.object({
  sinceHours: z.number().positive().optional().describe('Look-back window in hours (default: 24).'),
})

export const tools = [
  {
    name: 'query_infrastructure',
    description:
      'Look up broadband infrastructure (Fiber / VDSL / ADSL) for a Turkish address. ' +
      'Runs a demo rule-based provider, the Wiradius TT VAE API when credentials and a TT address code are available, ' +
      'and finally returns a list of official lookup portals (technology "Redirect"). ' +
      'Results with technology "Error" carry the upstream failure in rawDetails.error.',
    inputSchema: QueryInfrastructureInput,
  },
  {
    name: 'list_providers',
    description: 'List the providers a query would run, in order, for the configured or given credentials.',
    inputSchema: ListProvidersInput,
  },
  {
    name: 'provider_stats',
    description: 'Per-provider call counts, error counts and P50/P95/P99 latencies.',
    inputSchema: ProviderStatsInput,
  },
] as const
