// src/providers/wiradius.ts
import type { Provider } from './base.js'
import type { Credentials } from '../core/config.js'
import type { Address, InfraResult, ProviderId } from '../core/types.js'
import { createInfraResult, errorResult, isRecord, parseTechnology } from '../core/types.js'
import { createLogger } from '../core/logger.js'
import { postJson } from './http.js'

const log = createLogger()

export const DEFAULT_BASE_URL = 'https://api.wiradius.com'
export const DEFAULT_TIMEOUT_MS = 20_000

/**
 * Candidate response keys per logical field, tried in order. The vendor's
 * schema is undocumented and has drifted, so each field accepts several names.
 */
export interface FieldAliases {
  technology: readonly string[]
  download: readonly string[]
  upload: readonly string[]
  portAvailable: readonly string[]
}

export const DEFAULT_FIELD_ALIASES: FieldAliases = {
  technology: ['technology', 'tech'],
  download: ['max_down', 'download'],
  upload: ['max_up', 'upload'],
  portAvailable: ['port_available'],
}

export interface WiradiusOptions {
  baseUrl?: string
  timeoutMs?: number
  fieldAliases?: Partial<FieldAliases>
}

/** Türk Telekom VAE lookup through the Wiradius API, keyed by TT address code. */
export class WiradiusProvider implements Provider {
  readonly id: ProviderId = 'wiradius'
  readonly name = 'Wiradius TT VAE'

  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly aliases: FieldAliases

  constructor(
    private readonly credentials: Credentials,
    opts: WiradiusOptions = {},
  ) {
    this.baseUrl = (opts.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.aliases = { ...DEFAULT_FIELD_ALIASES, ...opts.fieldAliases }
  }

  async query(address: Address): Promise<InfraResult[]> {
    const apiCode = this.credentials.apiCode.trim()
    const uniqCode = this.credentials.uniqCode.trim()
    if (!apiCode || !uniqCode || !address.carrierAddressCode) {
      log.debug({ provider: this.id }, 'skipped: credentials or carrier address code missing')
      return []
    }

    const url = `${this.baseUrl}/internet_infrastructure/tt_vae_query/${encodeURIComponent(apiCode)}`
    const res = await postJson(
      url,
      { tt_code: address.carrierAddressCode, uniq_code: uniqCode },
      { timeoutMs: this.timeoutMs },
    )

    if (!res.ok) {
      log.warn({ provider: this.id, code: res.error.code, status: res.error.statusCode }, res.error.message)
      return [errorResult(this.name, res.error.message)]
    }
    if (!isRecord(res.value)) {
      log.warn({ provider: this.id }, 'response body is not a JSON object')
      return [errorResult(this.name, 'Malformed response: expected a JSON object')]
    }

    return [normalize(this.name, res.value, this.aliases)]
  }
}

function normalize(
  providerName: string,
  body: Record<string, unknown>,
  aliases: FieldAliases,
): InfraResult {
  return createInfraResult({
    providerName,
    technology: parseTechnology(pick(body, aliases.technology)),
    maxDownloadMbps: toMbps(pick(body, aliases.download)),
    maxUploadMbps: toMbps(pick(body, aliases.upload)),
    portAvailable: toBool(pick(body, aliases.portAvailable)),
    rawDetails: body,
  })
}

/** First key whose value is present and not null. */
function pick(body: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    const v = body[key]
    if (v !== undefined && v !== null) return v
  }
  return undefined
}

function toMbps(value: unknown): number | undefined {
  const n =
    typeof value === 'number' ? value
    : typeof value === 'string' && value.trim() !== '' ? Number(value)
    : NaN
  return Number.isFinite(n) && n >= 0 ? n : undefined
}

function toBool(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value
  if (value === 'true') return true
  if (value === 'false') return false
  return undefined
}
