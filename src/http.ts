/**
 * HTTP Utilities
 *
 * A minimal response interface and uniform error mapping for calls to
 * external APIs. Callers take a `FetchFn` so tests can substitute one.
 */

import type { Result } from './types'

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Error thrown when a test reaches for the real network.
 */
class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(`HTTP request to ${url} blocked: tests must inject a fetch function.`)
    this.name = 'BlockedHttpRequestError'
  }
}

/**
 * Standard HTTP response interface for API calls.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
}

export type FetchFn = (url: string, init?: RequestInit) => Promise<HttpResponse>

/**
 * Perform a fetch request and return a typed response.
 *
 * @throws BlockedHttpRequestError when called from a test run
 */
export const httpFetch: FetchFn = async (url, init) => {
  if (isTestMode()) {
    throw new BlockedHttpRequestError(url)
  }
  return fetch(url, init)
}

/**
 * Handle HTTP error responses uniformly across all API modules.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()

  if (response.status === 429) {
    const retryAfter = response.headers.get('retry-after')
    const seconds = retryAfter ? Number.parseInt(retryAfter, 10) : Number.NaN
    return {
      ok: false,
      error: {
        type: 'rate_limit',
        message: `Rate limited: ${errorText}`,
        retryAfter: Number.isNaN(seconds) ? undefined : seconds
      }
    }
  }

  if (response.status === 401) {
    return { ok: false, error: { type: 'auth', message: `Authentication failed: ${errorText}` } }
  }

  if (response.status === 402) {
    return { ok: false, error: { type: 'quota', message: `Quota exceeded: ${errorText}` } }
  }

  if (response.status === 400) {
    return { ok: false, error: { type: 'invalid_request', message: `Bad request: ${errorText}` } }
  }

  return {
    ok: false,
    error: { type: 'network', message: `API error ${response.status}: ${errorText}` }
  }
}

/**
 * Handle network errors uniformly across all API modules.
 */
export function handleNetworkError(error: unknown): Result<never> {
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty API responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: 'Empty response from API' } }
}
