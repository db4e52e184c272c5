/**
 * Runtime configuration read from Vite env variables.
 * See .env.example for the supported keys.
 */

const DEFAULT_RATES_API_URL = 'https://api.frankfurter.app/latest'
const DEFAULT_POSTHOG_HOST = 'https://us.i.posthog.com'

export const config = {
  ratesApiUrl: import.meta.env.VITE_RATES_API_URL || DEFAULT_RATES_API_URL,
  posthogKey: import.meta.env.VITE_POSTHOG_KEY || null,
  posthogHost: import.meta.env.VITE_POSTHOG_HOST || DEFAULT_POSTHOG_HOST,
} as const

/** Rates are always fetched relative to this currency */
export const RATES_BASE_CURRENCY = 'USD'

/** Cached rates younger than this are served without a network call */
export const RATES_CACHE_TTL_MS = 60 * 60 * 1000 // 1 hour
