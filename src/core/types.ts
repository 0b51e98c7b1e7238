// src/core/types.ts
import { z } from 'zod'
import { ValidationError } from './errors.js'

export type ProviderId = 'mock' | 'wiradius' | 'directory'

export const TECHNOLOGIES = ['Fiber', 'VDSL', 'ADSL', 'None', 'Unknown', 'Redirect', 'Error'] as const

export type Technology = (typeof TECHNOLOGIES)[number]

export interface Address {
  readonly province: string
  readonly district: string
  readonly neighborhood: string
  readonly street: string
  readonly buildingNumber: string
  readonly unit: string
  readonly carrierAddressCode: string   // carrier-specific id, e.g. TT address code
}

export interface InfraResult {
  readonly providerName: string
  readonly technology: Technology
  readonly maxDownloadMbps?: number
  readonly maxUploadMbps?: number
  readonly portAvailable?: boolean      // undefined = unknown
  readonly rawDetails: Readonly<Record<string, unknown>>
}

export interface QueryResponse {
  address: Address
  providers: ProviderId[]
  results: InfraResult[]
  elapsed_ms: number
}

const required = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} is required`)

const optional = z.string().trim().optional().default('')

export const AddressSchema = z.object({
  province: required('province'),
  district: required('district'),
  neighborhood: optional,
  street: optional,
  buildingNumber: optional,
  unit: optional,
  carrierAddressCode: optional,
})

export type AddressInput = z.input<typeof AddressSchema>

/** Validate user input into an immutable Address. Throws ValidationError. */
export function createAddress(input: AddressInput): Address {
  const parsed = AddressSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues
    throw new ValidationError(
      issues.map((i) => i.message).join('; '),
      issues.map((i) => i.path.join('.')).filter((p) => p !== ''),
    )
  }
  return Object.freeze(parsed.data)
}

export interface InfraResultInit {
  providerName: string
  technology: Technology
  maxDownloadMbps?: number
  maxUploadMbps?: number
  portAvailable?: boolean
  rawDetails?: Record<string, unknown>
}

export function createInfraResult(init: InfraResultInit): InfraResult {
  assertSpeed('maxDownloadMbps', init.maxDownloadMbps)
  assertSpeed('maxUploadMbps', init.maxUploadMbps)
  const result: InfraResult = {
    providerName: init.providerName,
    technology: init.technology,
    rawDetails: Object.freeze({ ...(init.rawDetails ?? {}) }),
    ...(init.maxDownloadMbps !== undefined ? { maxDownloadMbps: init.maxDownloadMbps } : {}),
    ...(init.maxUploadMbps !== undefined ? { maxUploadMbps: init.maxUploadMbps } : {}),
    ...(init.portAvailable !== undefined ? { portAvailable: init.portAvailable } : {}),
  }
  return Object.freeze(result)
}

export function errorResult(providerName: string, message: string): InfraResult {
  return createInfraResult({ providerName, technology: 'Error', rawDetails: { error: message } })
}

function assertSpeed(field: string, value: number | undefined): void {
  if (value === undefined) return
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${field} must be a non-negative number, got ${value}`)
  }
}

const TECHNOLOGY_ALIASES: Record<string, Technology> = {
  fiber: 'Fiber',
  fibre: 'Fiber',
  ftth: 'Fiber',
  fttb: 'Fiber',
  vdsl: 'VDSL',
  vdsl2: 'VDSL',
  adsl: 'ADSL',
  adsl2: 'ADSL',
  'adsl2+': 'ADSL',
  none: 'None',
}

/** Map an upstream technology label onto the known set; anything unrecognized is Unknown. */
export function parseTechnology(value: unknown): Technology {
  if (typeof value !== 'string') return 'Unknown'
  return TECHNOLOGY_ALIASES[value.trim().toLowerCase()] ?? 'Unknown'
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
