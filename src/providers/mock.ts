// src/providers/mock.ts
import type { Provider } from './base.js'
import type { Address, InfraResult, ProviderId } from '../core/types.js'
import { createInfraResult } from '../core/types.js'

// Illustrative rule only: Black Sea provinces get fiber
export const COASTAL_PROVINCES: ReadonlySet<string> = new Set([
  'rize',
  'artvin',
  'trabzon',
  'giresun',
  'ordu',
  'samsun',
  'bartin',
  'kastamonu',
  'sinop',
  'zonguldak',
])

export class MockProvider implements Provider {
  readonly id: ProviderId = 'mock'
  readonly name = 'Mock'

  async query(address: Address): Promise<InfraResult[]> {
    const province = normalizeProvince(address.province)
    const coastal = COASTAL_PROVINCES.has(province)

    return [
      createInfraResult({
        providerName: this.name,
        technology: coastal ? 'Fiber' : 'VDSL',
        maxDownloadMbps: coastal ? 1000 : 100,
        maxUploadMbps: coastal ? 100 : 8,
        portAvailable: true,
        rawDetails: { rule: coastal ? 'coastal-fiber' : 'default-vdsl', province },
      }),
    ]
  }
}

/** Lowercase, then fold diacritics and the dotless ı so "Bartın" and "RİZE" match the ASCII list. */
export function normalizeProvince(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/ı/g, 'i')
}
