// src/providers/base.ts
import type { Address, InfraResult, ProviderId } from '../core/types.js'

/**
 * A source of infrastructure availability for an address.
 *
 * `query` resolves for every operational failure: an upstream problem comes
 * back as a single `Error` result and an inapplicable provider (e.g. missing
 * credentials) as an empty list. Only broken contracts reject.
 */
export interface Provider {
  readonly id: ProviderId
  readonly name: string
  query(address: Address): Promise<InfraResult[]>
}
