/**
 * Frankfurter API Client
 * Fetches the latest exchange rates relative to a base currency
 */

import { isPositiveNumber, isRecord, toError } from '@/lib/utils/guards'
import type { LatestRatesResponse, RateMap } from './types'

export type RateFetchErrorKind = 'http' | 'network' | 'timeout' | 'parse'

export class RateFetchError extends Error {
  readonly kind: RateFetchErrorKind
  readonly status: number | null

  constructor(kind: RateFetchErrorKind, message: string, status: number | null = null) {
    super(message)
    this.name = 'RateFetchError'
    this.kind = kind
    this.status = status
  }

  /** Server errors, dropped connections and timeouts are worth another attempt */
  get isRetryable(): boolean {
    if (this.kind === 'http') return this.status !== null && this.status >= 500
    return this.kind === 'network' || this.kind === 'timeout'
  }
}

export interface RequestLatestRatesOptions {
  apiUrl: string
  base: string
  fetchFn?: typeof fetch
  maxRetries?: number
  delayMs?: number
  timeoutMs?: number
}

/**
 * Validate the response body. Entries that are not positive numbers are dropped.
 */
export function parseLatestRatesBody(body: unknown): LatestRatesResponse {
  if (!isRecord(body)) {
    throw new RateFetchError('parse', 'Response body is not an object')
  }
  if (typeof body.date !== 'string' || !body.date) {
    throw new RateFetchError('parse', 'Response body has no date')
  }
  if (!isRecord(body.rates)) {
    throw new RateFetchError('parse', 'Response body has no rates')
  }

  const rates: RateMap = {}
  for (const [code, rate] of Object.entries(body.rates)) {
    if (isPositiveNumber(rate)) {
      rates[code.toUpperCase()] = rate
    } else {
      console.warn(`[frankfurterClient] Ignoring invalid rate for ${code}:`, rate)
    }
  }

  if (Object.keys(rates).length === 0) {
    throw new RateFetchError('parse', 'Response body has no usable rates')
  }

  return { date: body.date, rates }
}

/**
 * Fetch the latest rates, retrying server and network failures
 */
export async function requestLatestRates({
  apiUrl,
  base,
  fetchFn = (input, init) => fetch(input, init),
  maxRetries = 3,
  delayMs = 1000,
  timeoutMs = 10_000,
}: RequestLatestRatesOptions): Promise<LatestRatesResponse> {
  const url = new URL(apiUrl)
  url.searchParams.set('from', base)

  let lastError: RateFetchError | null = null

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      console.log(`[frankfurterClient] Fetching: ${url.toString()}`)
      return await requestOnce(url.toString(), fetchFn, timeoutMs)
    } catch (error) {
      lastError =
        error instanceof RateFetchError ? error : new RateFetchError('network', toError(error).message)
      console.warn(`[frankfurterClient] Attempt ${attempt}/${maxRetries} failed:`, lastError.message)

      if (!lastError.isRetryable) break
      if (attempt < maxRetries) {
        await sleep(delayMs * attempt)
      }
    }
  }

  throw lastError ?? new RateFetchError('network', 'Failed to fetch exchange rates')
}

async function requestOnce(
  url: string,
  fetchFn: typeof fetch,
  timeoutMs: number
): Promise<LatestRatesResponse> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  let response: Response
  try {
    response = await fetchFn(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: controller.signal,
    })
  } catch (error) {
    if (controller.signal.aborted) {
      throw new RateFetchError('timeout', `Request timed out after ${timeoutMs}ms`)
    }
    throw new RateFetchError('network', toError(error).message)
  } finally {
    clearTimeout(timer)
  }

  if (!response.ok) {
    throw new RateFetchError('http', `HTTP error: ${response.status}`, response.status)
  }

  let body: unknown
  try {
    body = await response.json()
  } catch (error) {
    throw new RateFetchError('parse', `Invalid JSON: ${toError(error).message}`)
  }

  return parseLatestRatesBody(body)
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
