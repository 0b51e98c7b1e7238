#!/usr/bin/env node
// src/cli/index.ts
import { realpathSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { loadConfig, type Credentials } from '../core/config.js'
import { SqliteMetrics } from '../core/metrics.js'
import { ValidationError } from '../core/errors.js'
import { buildOrchestrator } from '../core/orchestrator-factory.js'
import { createAddress, type Address, type QueryResponse } from '../core/types.js'
import { PORTAL_LINKS } from '../providers/directory.js'
import { JsonFormatter } from '../results/json.js'
import { MarkdownFormatter } from '../results/markdown.js'
import type { ResultFormatter } from '../results/base.js'

interface CliDeps {
  query?: (address: Address, override?: Partial<Credentials>) => Promise<QueryResponse>
  write?: (s: string) => void
}

export function buildCli(deps: CliDeps = {}): Command {
  const write = deps.write ?? ((s: string) => process.stdout.write(s + '\n'))

  const program = new Command()
  program
    .name('infracheck')
    .description('Look up fiber / VDSL / ADSL availability for a Turkish address')
    .version('0.1.0')

  // ---- query command ----
  program
    .command('query')
    .description('Query every active provider for an address')
    .requiredOption('--province <name>', 'province (il)')
    .requiredOption('--district <name>', 'district (ilçe)')
    .option('--neighborhood <name>', 'neighborhood (mahalle)')
    .option('--street <name>', 'street (cadde/sokak)')
    .option('--building <no>', 'building number')
    .option('--unit <no>', 'unit / flat number')
    .option('--carrier-code <code>', 'Türk Telekom address code')
    .option('--api-code <code>', 'Wiradius API code for this query only')
    .option('--uniq-code <code>', 'Wiradius uniq code for this query only')
    .option('--output <fmt>', 'output format: json | markdown', 'json')
    .option('--no-metrics', 'do not record provider metrics')
    .action(async (opts: Record<string, unknown>) => {
      const address = createAddress({
        province: str(opts['province']) ?? '',
        district: str(opts['district']) ?? '',
        neighborhood: str(opts['neighborhood']),
        street: str(opts['street']),
        buildingNumber: str(opts['building']),
        unit: str(opts['unit']),
        carrierAddressCode: str(opts['carrierCode']),
      })
      const override = { apiCode: str(opts['apiCode']), uniqCode: str(opts['uniqCode']) }

      const query =
        deps.query ??
        ((a: Address, o?: Partial<Credentials>) =>
          buildOrchestrator(loadConfig(), { metrics: opts['metrics'] !== false }).query(a, o))
      const response = await query(address, override)
      write(formatterFor(opts['output']).format(response))
    })

  // ---- providers command ----
  program
    .command('providers')
    .description('List the providers a query would run, in order')
    .option('--api-code <code>', 'Wiradius API code override')
    .option('--uniq-code <code>', 'Wiradius uniq code override')
    .action((opts: { apiCode?: string; uniqCode?: string }) => {
      const orchestrator = buildOrchestrator(loadConfig(), { metrics: false })
      const providers = orchestrator
        .activeProviders({ apiCode: opts.apiCode, uniqCode: opts.uniqCode })
        .map((p) => ({ id: p.id, name: p.name }))
      write(JSON.stringify(providers, null, 2))
    })

  // ---- links command ----
  program
    .command('links')
    .description('Print official infrastructure lookup portals')
    .action(() => {
      write(JSON.stringify(PORTAL_LINKS, null, 2))
    })

  // ---- stats command ----
  program
    .command('stats')
    .description('Show provider call metrics')
    .option('--since <hours>', 'hours to look back', '24')
    .action(async (opts: { since: string }) => {
      const hours = Number(opts.since)
      if (!Number.isFinite(hours) || hours <= 0) {
        throw new ValidationError(`--since must be a positive number of hours, got "${opts.since}"`, ['since'])
      }
      const cfg = loadConfig()
      const metrics = new SqliteMetrics(cfg.metricsPath)
      const stats = await metrics.stats(hours * 3600)
      metrics.close()
      const formatted = stats.map((s) => ({
        ...s,
        p50: `${s.p50}ms`,
        p95: `${s.p95}ms`,
        p99: `${s.p99}ms`,
      }))
      write(JSON.stringify(formatted, null, 2))
    })

  // ---- mcp-serve command ----
  program
    .command('mcp-serve')
    .description('Start MCP server (stdio transport)')
    .action(async () => {
      const mod = await import('../mcp/server.js')
      await mod.startMcpServer()
    })

  return program
}

function formatterFor(output: unknown): ResultFormatter {
  return output === 'markdown' ? new MarkdownFormatter() : new JsonFormatter()
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function isEntrypoint(): boolean {
  const argv1 = process.argv[1]
  if (!argv1) return false
  try {
    return realpathSync(argv1) === fileURLToPath(import.meta.url)
  } catch {
    return false // argv[1] is not a file (e.g. the REPL)
  }
}

if (isEntrypoint()) {
  const program = buildCli()
  program.parseAsync(process.argv).catch((e: unknown) => {
    process.stderr.write((e instanceof Error ? `${e.name}: ${e.message}` : String(e)) + '\n')
    process.exit(1)
  })
}
