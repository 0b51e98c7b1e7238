import { describe, it, expect } from 'vitest'
import { DirectoryProvider, PORTAL_LINKS } from '../../src/providers/directory.js'
import { createAddress } from '../../src/core/types.js'
import type { Provider } from '../../src/providers/base.js'

describe('DirectoryProvider', () => {
  it('returns one Redirect result carrying the full link table', async () => {
    const results = await new DirectoryProvider().query()
    expect(results).toEqual([
      { providerName: 'Official Portals', technology: 'Redirect', rawDetails: PORTAL_LINKS },
    ])
  })

  it('does not depend on the address', async () => {
    const provider: Provider = new DirectoryProvider()
    const a = await provider.query(createAddress({ province: 'Van', district: 'Tuşba' }))
    const b = await provider.query(createAddress({ province: 'Rize', district: 'Merkez', carrierAddressCode: '42' }))
    expect(a).toEqual(b)
  })

  it('lists the carrier portals and the e-Devlet EHABS page', () => {
    expect(Object.keys(PORTAL_LINKS)).toHaveLength(7)
    expect(PORTAL_LINKS['Netspeed']).toBe('https://www.netspeed.com.tr/altyapi-sorgula')
    expect(Object.values(PORTAL_LINKS).every((url) => url.startsWith('https://'))).toBe(true)
  })

  it('hands out a copy of the table', async () => {
    const [result] = await new DirectoryProvider().query()
    expect(result?.rawDetails).not.toBe(PORTAL_LINKS)
  })
})
