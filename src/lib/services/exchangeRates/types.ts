/**
 * Types for Exchange Rate Service
 * Latest rates relative to a fixed base currency, cached in localStorage
 */

/** Currency code -> units of that currency per 1 unit of the base */
export type RateMap = Record<string, number>

/**
 * Rate table as stored in the local cache
 */
export interface RateTable {
  /** ISO 4217 code every rate is relative to (its own rate is always 1) */
  base: string
  /** As-of date reported by the rate source (YYYY-MM-DD) */
  date: string
  rates: RateMap
  /** Local capture timestamp (ms since epoch) */
  cachedAt: number
}

export interface FetchRatesResult {
  base: string
  date: string
  rates: RateMap
  /** True when served from a cache entry younger than the TTL */
  fromCache: boolean
}

/**
 * Validated body of the rate source's "latest" endpoint
 */
export interface LatestRatesResponse {
  date: string
  rates: RateMap
}

/** The subset of the Web Storage API the cache needs */
export type KeyValueStorage = Pick<Storage, 'getItem' | 'setItem' | 'removeItem'>

export interface RateProvider {
  /** Cached table if fresh, otherwise a network fetch. Rejects on fetch failure. */
  fetchLatestRates: () => Promise<FetchRatesResult>
  /** Cached table regardless of age, or null */
  getCachedRates: () => RateTable | null
  clearRatesCache: () => void
}
