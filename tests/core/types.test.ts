import { describe, it, expect } from 'vitest'
import {
  createAddress,
  createInfraResult,
  errorResult,
  parseTechnology,
  type AddressInput,
} from '../../src/core/types.js'
import { ValidationError } from '../../src/core/errors.js'

describe('createAddress', () => {
  it('trims required fields and defaults optional ones to empty strings', () => {
    const address = createAddress({ province: '  Rize ', district: 'Merkez' })
    expect(address).toEqual({
      province: 'Rize',
      district: 'Merkez',
      neighborhood: '',
      street: '',
      buildingNumber: '',
      unit: '',
      carrierAddressCode: '',
    })
  })

  it('keeps optional fields, trimmed', () => {
    const address = createAddress({
      province: 'Ankara',
      district: 'Çankaya',
      neighborhood: 'Kızılay',
      carrierAddressCode: ' 1234567890 ',
    })
    expect(address.neighborhood).toBe('Kızılay')
    expect(address.carrierAddressCode).toBe('1234567890')
  })

  it('returns a frozen value', () => {
    const address = createAddress({ province: 'Rize', district: 'Merkez' })
    expect(Object.isFrozen(address)).toBe(true)
  })

  it.each([
    ['empty province', { province: '', district: 'Merkez' }, 'province'],
    ['whitespace province', { province: '   ', district: 'Merkez' }, 'province'],
    ['empty district', { province: 'Rize', district: '' }, 'district'],
    ['tab-only district', { province: 'Rize', district: '\t' }, 'district'],
  ])('rejects %s', (_label, input: AddressInput, field) => {
    try {
      createAddress(input)
      expect.unreachable('createAddress should throw')
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError)
      expect((err as ValidationError).fields).toEqual([field])
      expect((err as ValidationError).message).toBe(`${field} is required`)
    }
  })

  it('reports both fields when both are blank', () => {
    expect(() => createAddress({ province: ' ', district: ' ' })).toThrow(
      'province is required; district is required',
    )
  })
})

describe('createInfraResult', () => {
  it('omits unset optional fields', () => {
    const r = createInfraResult({ providerName: 'p', technology: 'Redirect' })
    expect(r).toEqual({ providerName: 'p', technology: 'Redirect', rawDetails: {} })
    expect('maxDownloadMbps' in r).toBe(false)
    expect('portAvailable' in r).toBe(false)
  })

  it('keeps portAvailable=false', () => {
    const r = createInfraResult({ providerName: 'p', technology: 'ADSL', portAvailable: false })
    expect(r.portAvailable).toBe(false)
  })

  it('rejects negative speeds', () => {
    expect(() =>
      createInfraResult({ providerName: 'p', technology: 'VDSL', maxDownloadMbps: -1 }),
    ).toThrow(RangeError)
  })

  it('copies rawDetails so later mutation of the source does not leak in', () => {
    const raw: Record<string, unknown> = { a: 1 }
    const r = createInfraResult({ providerName: 'p', technology: 'Unknown', rawDetails: raw })
    raw['a'] = 2
    expect(r.rawDetails).toEqual({ a: 1 })
  })
})

describe('errorResult', () => {
  it('builds an Error-technology result with the message', () => {
    expect(errorResult('remote', 'boom')).toEqual({
      providerName: 'remote',
      technology: 'Error',
      rawDetails: { error: 'boom' },
    })
  })
})

describe('parseTechnology', () => {
  it.each([
    ['Fiber', 'Fiber'],
    ['FTTH', 'Fiber'],
    [' vdsl2 ', 'VDSL'],
    ['ADSL2+', 'ADSL'],
    ['none', 'None'],
    ['Satellite', 'Unknown'],
    ['', 'Unknown'],
  ])('maps %j to %s', (input, expected) => {
    expect(parseTechnology(input)).toBe(expected)
  })

  it('maps non-strings to Unknown', () => {
    expect(parseTechnology(42)).toBe('Unknown')
    expect(parseTechnology(undefined)).toBe('Unknown')
  })
})
