// src/providers/http.ts
import got, { HTTPError, ParseError, RequestError, TimeoutError } from 'got'
import { UpstreamError } from '../core/errors.js'

export type HttpResult<T> = { ok: true; value: T } | { ok: false; error: UpstreamError }

export interface PostOptions {
  timeoutMs: number
}

/** Single-attempt JSON POST. Never rejects; failures come back as `ok: false`. */
export async function postJson(
  url: string,
  body: Record<string, unknown>,
  opts: PostOptions,
): Promise<HttpResult<unknown>> {
  try {
    const value = await got
      .post(url, {
        json: body,
        retry: { limit: 0 },
        timeout: { request: opts.timeoutMs },
      })
      .json<unknown>()
    return { ok: true, value }
  } catch (err: unknown) {
    return { ok: false, error: toUpstreamError(err, opts.timeoutMs) }
  }
}

function toUpstreamError(err: unknown, timeoutMs: number): UpstreamError {
  if (err instanceof HTTPError) {
    const status = err.response.statusCode
    return new UpstreamError('HTTP', `Upstream responded with HTTP ${status}`, status)
  }
  if (err instanceof TimeoutError) {
    return new UpstreamError('TIMEOUT', `Request timed out after ${timeoutMs}ms`)
  }
  if (err instanceof ParseError) {
    return new UpstreamError('PARSE', 'Malformed JSON response')
  }
  if (err instanceof RequestError) {
    return new UpstreamError('NETWORK', err.message)
  }
  return new UpstreamError('NETWORK', err instanceof Error ? err.message : String(err))
}
