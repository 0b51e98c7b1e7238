import { describe, it, expect, afterEach } from 'vitest'
import { loadConfig, resolveCredentials } from '../../src/core/config.js'
import { ConfigError } from '../../src/core/errors.js'

describe('loadConfig', () => {
  const original = { ...process.env }

  afterEach(() => {
    for (const key of Object.keys(process.env)) delete process.env[key]
    Object.assign(process.env, original)
  })

  it('reads Wiradius credentials from env', () => {
    process.env['WIRADIUS_API_CODE'] = 'test-api'
    process.env['WIRADIUS_UNIQ_CODE'] = 'test-uniq'
    const cfg = loadConfig()
    expect(cfg.credentials).toEqual({ apiCode: 'test-api', uniqCode: 'test-uniq' })
  })

  it('returns defaults when env not set', () => {
    delete process.env['WIRADIUS_API_CODE']
    delete process.env['WIRADIUS_UNIQ_CODE']
    delete process.env['WIRADIUS_BASE_URL']
    delete process.env['INFRACHECK_TIMEOUT_MS']
    delete process.env['WIRADIUS_TECHNOLOGY_FIELDS']
    delete process.env['INFRACHECK_METRICS_DB']
    const cfg = loadConfig()
    expect(cfg.credentials).toEqual({ apiCode: '', uniqCode: '' })
    expect(cfg.wiradiusBaseUrl).toBe('https://api.wiradius.com')
    expect(cfg.requestTimeoutMs).toBe(20_000)
    expect(cfg.fieldAliases.technology).toEqual(['technology', 'tech'])
    expect(cfg.metricsPath.endsWith('metrics.db')).toBe(true)
  })

  it('reads the timeout from INFRACHECK_TIMEOUT_MS', () => {
    process.env['INFRACHECK_TIMEOUT_MS'] = '5000'
    expect(loadConfig().requestTimeoutMs).toBe(5000)
  })

  it('throws ConfigError for a non-numeric timeout', () => {
    process.env['INFRACHECK_TIMEOUT_MS'] = 'soon'
    expect(() => loadConfig()).toThrow(ConfigError)
  })

  it('parses comma-separated alias lists', () => {
    process.env['WIRADIUS_DOWNLOAD_FIELDS'] = 'down_mbps, max_down ,'
    expect(loadConfig().fieldAliases.download).toEqual(['down_mbps', 'max_down'])
  })

  it('honours INFRACHECK_METRICS_DB', () => {
    process.env['INFRACHECK_METRICS_DB'] = '/tmp/infracheck-test/metrics.db'
    expect(loadConfig().metricsPath).toBe('/tmp/infracheck-test/metrics.db')
  })
})

describe('resolveCredentials', () => {
  const ambient = { apiCode: 'env-api', uniqCode: 'env-uniq' }
  const empty = { apiCode: '', uniqCode: '' }

  it('prefers a complete override', () => {
    expect(resolveCredentials(ambient, { apiCode: 'o-api', uniqCode: 'o-uniq' })).toEqual({
      apiCode: 'o-api',
      uniqCode: 'o-uniq',
    })
  })

  it('falls back to ambient when the override is partial', () => {
    expect(resolveCredentials(ambient, { apiCode: 'o-api', uniqCode: '' })).toEqual(ambient)
    expect(resolveCredentials(ambient, { apiCode: 'o-api' })).toEqual(ambient)
  })

  it('uses ambient when there is no override', () => {
    expect(resolveCredentials(ambient)).toEqual(ambient)
  })

  it('returns undefined when neither pair is complete', () => {
    expect(resolveCredentials(empty)).toBeUndefined()
    expect(resolveCredentials({ apiCode: 'env-api', uniqCode: ' ' }, { uniqCode: 'o-uniq' })).toBeUndefined()
  })

  it('accepts an override even with empty ambient credentials', () => {
    expect(resolveCredentials(empty, { apiCode: 'o-api', uniqCode: 'o-uniq' })).toEqual({
      apiCode: 'o-api',
      uniqCode: 'o-uniq',
    })
  })
})
