import { vi } from 'vitest'
import type { FetchRatesResult, KeyValueStorage, RateProvider, RateTable } from '@/lib/services/exchangeRates'
import { createExchangeStore } from '@/stores/exchangeStore'

export const SAMPLE_RATES = { USD: 1, KRW: 1300, EUR: 0.92, JPY: 150 }

/** In-memory Web Storage stand-in */
export function memoryStorage(initial: Record<string, string> = {}): KeyValueStorage {
  const items = new Map(Object.entries(initial))
  return {
    getItem: (key) => items.get(key) ?? null,
    setItem: (key, value) => {
      items.set(key, value)
    },
    removeItem: (key) => {
      items.delete(key)
    },
  }
}

export function fakeRateProvider(overrides: Partial<RateProvider> = {}): RateProvider {
  const result: FetchRatesResult = { base: 'USD', date: '2026-10-16', rates: SAMPLE_RATES, fromCache: false }
  return {
    fetchLatestRates: vi.fn(async () => result),
    getCachedRates: vi.fn((): RateTable | null => null),
    clearRatesCache: vi.fn(),
    ...overrides,
  }
}

/** Ids id-1, id-2, ... in creation order */
export function sequentialIds(): () => string {
  let next = 0
  return () => `id-${++next}`
}

export function makeStore(rateProvider: RateProvider = fakeRateProvider(), storage = memoryStorage()) {
  return createExchangeStore({ rateProvider, storage, generateId: sequentialIds() })
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}
