/**
 * Exchange Rate Service
 *
 * Provides the latest rates relative to a fixed base currency for the
 * currency calculator.
 *
 * Features:
 * - localStorage cache served without a network call while younger than the TTL
 * - Stale cache readable on its own as an offline fallback
 * - Cache write failures (quota, private mode) never fail a fetch
 */

import { config, RATES_BASE_CURRENCY, RATES_CACHE_TTL_MS } from '@/lib/config'
import { isPositiveNumber, isRecord } from '@/lib/utils/guards'
import { requestLatestRates } from './frankfurterClient'
import type { FetchRatesResult, KeyValueStorage, RateMap, RateProvider, RateTable } from './types'

// =============================================================================
// Constants
// =============================================================================

export const RATES_STORAGE_KEY = 'exchange:rates'

// =============================================================================
// Cache Management
// =============================================================================

function isRateTable(value: unknown): value is RateTable {
  if (!isRecord(value)) return false
  if (typeof value.base !== 'string' || typeof value.date !== 'string') return false
  if (typeof value.cachedAt !== 'number' || !Number.isFinite(value.cachedAt)) return false
  if (!isRecord(value.rates)) return false
  return Object.values(value.rates).every(isPositiveNumber)
}

function browserStorage(): KeyValueStorage | null {
  try {
    return typeof localStorage === 'undefined' ? null : localStorage
  } catch {
    // Accessing localStorage throws when storage is disabled
    return null
  }
}

// =============================================================================
// Provider
// =============================================================================

export interface RateProviderOptions {
  /** Defaults to window.localStorage; null disables caching */
  storage?: KeyValueStorage | null
  fetchFn?: typeof fetch
  now?: () => number
  apiUrl?: string
  base?: string
  ttlMs?: number
  maxRetries?: number
  retryDelayMs?: number
  /** Per-attempt abort timeout */
  timeoutMs?: number
}

export function createRateProvider(options: RateProviderOptions = {}): RateProvider {
  const {
    fetchFn,
    now = () => Date.now(),
    apiUrl = config.ratesApiUrl,
    base = RATES_BASE_CURRENCY,
    ttlMs = RATES_CACHE_TTL_MS,
    maxRetries,
    retryDelayMs,
    timeoutMs,
  } = options
  const storage = options.storage === undefined ? browserStorage() : options.storage

  function loadCache(): RateTable | null {
    if (!storage) return null
    try {
      const stored = storage.getItem(RATES_STORAGE_KEY)
      if (!stored) return null

      const parsed: unknown = JSON.parse(stored)
      if (!isRateTable(parsed)) {
        console.warn('[exchangeRates] Ignoring malformed cache entry')
        return null
      }
      return parsed
    } catch (error) {
      console.warn('[exchangeRates] Failed to load cache from storage:', error)
      return null
    }
  }

  function saveCache(table: RateTable): void {
    if (!storage) return
    try {
      storage.setItem(RATES_STORAGE_KEY, JSON.stringify(table))
    } catch (error) {
      console.warn('[exchangeRates] Failed to save cache to storage:', error)
    }
  }

  async function fetchLatestRates(): Promise<FetchRatesResult> {
    const cached = loadCache()
    if (cached && now() - cached.cachedAt < ttlMs) {
      console.log(`[exchangeRates] Cache hit (${cached.date})`)
      return { base: cached.base, date: cached.date, rates: cached.rates, fromCache: true }
    }

    const response = await requestLatestRates({
      apiUrl,
      base,
      fetchFn,
      maxRetries,
      delayMs: retryDelayMs,
      timeoutMs,
    })

    // The source omits the base itself
    const rates: RateMap = { ...response.rates, [base]: 1 }
    saveCache({ base, date: response.date, rates, cachedAt: now() })
    console.log(`[exchangeRates] Fetched ${Object.keys(rates).length} rates for ${response.date}`)

    return { base, date: response.date, rates, fromCache: false }
  }

  function clearRatesCache(): void {
    try {
      storage?.removeItem(RATES_STORAGE_KEY)
    } catch (error) {
      console.warn('[exchangeRates] Failed to clear cache:', error)
    }
  }

  return {
    fetchLatestRates,
    getCachedRates: loadCache,
    clearRatesCache,
  }
}

/** Shared provider backed by localStorage and the configured rate source */
export const rateProvider = createRateProvider()

// =============================================================================
// Re-exports
// =============================================================================

export { RateFetchError, parseLatestRatesBody } from './frankfurterClient'
export type { RateFetchErrorKind } from './frankfurterClient'
export type {
  FetchRatesResult,
  KeyValueStorage,
  LatestRatesResponse,
  RateMap,
  RateProvider,
  RateTable,
} from './types'
