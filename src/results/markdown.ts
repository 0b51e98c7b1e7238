// src/results/markdown.ts
import type { ResultFormatter } from './base.js'
import type { InfraResult, QueryResponse } from '../core/types.js'

export class MarkdownFormatter implements ResultFormatter {
  format(response: QueryResponse): string {
    const { address } = response
    const lines: string[] = [
      `## Infrastructure for ${address.province} / ${address.district}`,
      `> ${response.results.length} result(s) from ${response.providers.length} provider(s) in ${response.elapsed_ms}ms`,
      '',
      '| Provider | Technology | Down (Mbps) | Up (Mbps) | Port |',
      '|---|---|---|---|---|',
    ]

    for (const r of response.results) {
      lines.push(
        `| ${cell(r.providerName)} | ${r.technology} | ${r.maxDownloadMbps ?? '-'} | ${r.maxUploadMbps ?? '-'} | ${port(r)} |`,
      )
    }

    const links = response.results
      .filter((r) => r.technology === 'Redirect')
      .flatMap((r) => Object.entries(r.rawDetails))
    if (links.length > 0) {
      lines.push('', '### Links', '')
      for (const [label, url] of links) {
        if (typeof url === 'string') lines.push(`- [${label}](${url})`)
      }
    }

    const errors = response.results.filter((r) => r.technology === 'Error')
    if (errors.length > 0) {
      lines.push('', '### Errors', '')
      for (const e of errors) {
        lines.push(`- **${e.providerName}**: ${String(e.rawDetails['error'] ?? 'unknown error')}`)
      }
    }

    return lines.join('\n')
  }
}

function port(r: InfraResult): string {
  if (r.portAvailable === undefined) return '-'
  return r.portAvailable ? 'yes' : 'no'
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|')
}
