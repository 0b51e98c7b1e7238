import { homedir } from 'node:os'
import { join, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { readFileSync } from 'node:fs'
import { ConfigError } from './errors.js'
import {
  DEFAULT_BASE_URL,
  DEFAULT_FIELD_ALIASES,
  DEFAULT_TIMEOUT_MS,
  type FieldAliases,
} from '../providers/wiradius.js'

// Load .env from package root into process.env (does not override existing vars)
function loadEnvFile(): void {
  const pkgRoot = join(dirname(fileURLToPath(import.meta.url)), '..', '..')
  let content: string
  try {
    content = readFileSync(join(pkgRoot, '.env'), 'utf8')
  } catch {
    return // no .env, environment only
  }
  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    const eq = trimmed.indexOf('=')
    if (eq === -1) continue
    const key = trimmed.slice(0, eq).trim()
    const val = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, '')
    if (key && process.env[key] === undefined) process.env[key] = val
  }
}

loadEnvFile()

export interface Credentials {
  apiCode: string
  uniqCode: string
}

export interface Config {
  credentials: Credentials
  wiradiusBaseUrl: string
  requestTimeoutMs: number
  fieldAliases: FieldAliases
  metricsPath: string
  logLevel: string
  logFile: string | undefined
}

export function loadConfig(): Config {
  return {
    credentials: {
      apiCode: process.env['WIRADIUS_API_CODE'] ?? '',
      uniqCode: process.env['WIRADIUS_UNIQ_CODE'] ?? '',
    },
    wiradiusBaseUrl: process.env['WIRADIUS_BASE_URL'] || DEFAULT_BASE_URL,
    requestTimeoutMs: positiveInt('INFRACHECK_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    fieldAliases: {
      technology: aliasList('WIRADIUS_TECHNOLOGY_FIELDS', DEFAULT_FIELD_ALIASES.technology),
      download: aliasList('WIRADIUS_DOWNLOAD_FIELDS', DEFAULT_FIELD_ALIASES.download),
      upload: aliasList('WIRADIUS_UPLOAD_FIELDS', DEFAULT_FIELD_ALIASES.upload),
      portAvailable: aliasList('WIRADIUS_PORT_FIELDS', DEFAULT_FIELD_ALIASES.portAvailable),
    },
    metricsPath:
      process.env['INFRACHECK_METRICS_DB'] || join(homedir(), '.cache', 'infracheck', 'metrics.db'),
    logLevel: process.env['LOG_LEVEL'] ?? 'info',
    logFile: process.env['LOG_FILE'] || undefined,
  }
}

/**
 * Pick the credentials for one query. A per-query override wins only when both
 * of its tokens are set; otherwise the ambient pair is used if complete.
 */
export function resolveCredentials(
  ambient: Credentials,
  override?: Partial<Credentials>,
): Credentials | undefined {
  if (isComplete(override)) return { apiCode: override.apiCode, uniqCode: override.uniqCode }
  if (isComplete(ambient)) return { ...ambient }
  return undefined
}

function isComplete(c: Partial<Credentials> | undefined): c is Credentials {
  return !!c?.apiCode?.trim() && !!c.uniqCode?.trim()
}

function positiveInt(name: string, fallback: number): number {
  const raw = process.env[name]
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`)
  }
  return n
}

function aliasList(name: string, fallback: readonly string[]): string[] {
  const raw = process.env[name]
  const keys = (raw ?? '').split(',').map((k) => k.trim()).filter(Boolean)
  return keys.length > 0 ? keys : [...fallback]
}
