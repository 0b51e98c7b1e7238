// src/mcp/server.ts
import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js'
import type { ZodTypeAny } from 'zod'
import { zodToJsonSchema } from 'zod-to-json-schema'
import { tools, QueryInfrastructureInput, ListProvidersInput, ProviderStatsInput } from './tools.js'
import {
  handleQueryInfrastructure,
  handleListProviders,
  handleProviderStats,
} from './handlers.js'
import { loadConfig } from '../core/config.js'
import { createLogger } from '../core/logger.js'
import { isRecord } from '../core/types.js'

interface ToolInputSchema {
  type: 'object'
  properties?: Record<string, Record<string, unknown>>
  required?: string[]
}

function toInputSchema(schema: ZodTypeAny): ToolInputSchema {
  const json: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' })
  if (!isRecord(json)) return { type: 'object' }
  const props = json['properties']
  const properties: Record<string, Record<string, unknown>> = {}
  for (const [key, value] of Object.entries(isRecord(props) ? props : {})) {
    if (isRecord(value)) properties[key] = value
  }
  const req = json['required']
  const required = Array.isArray(req) ? req.filter((k): k is string => typeof k === 'string') : undefined
  return { type: 'object', properties, required }
}

export async function startMcpServer(): Promise<void> {
  const cfg = loadConfig()
  const log = createLogger({ level: cfg.logLevel, file: cfg.logFile })

  const server = new Server(
    { name: 'infracheck', version: '0.1.0' },
    { capabilities: { tools: {} } },
  )

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: toInputSchema(t.inputSchema),
    })),
  }))

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const { name, arguments: args } = req.params
    log.info({ tool: name }, 'MCP tool call')

    try {
      let result: string
      switch (name) {
        case 'query_infrastructure':
          result = await handleQueryInfrastructure(QueryInfrastructureInput.parse(args))
          break
        case 'list_providers':
          result = await handleListProviders(ListProvidersInput.parse(args ?? {}))
          break
        case 'provider_stats':
          result = await handleProviderStats(ProviderStatsInput.parse(args ?? {}))
          break
        default:
          throw new Error(`Unknown tool: ${name}`)
      }
      return { content: [{ type: 'text' as const, text: result }] }
    } catch (err) {
      log.error({ tool: name, error: String(err) }, 'tool error')
      return {
        content: [{ type: 'text' as const, text: `Error: ${String(err)}` }],
        isError: true,
      }
    }
  })

  const transport = new StdioServerTransport()
  await server.connect(transport)
  log.info('MCP server running on stdio')
}
