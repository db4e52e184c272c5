import { useQuery } from '@tanstack/react-query'
import { useExchangeStore } from '@/contexts/ExchangeStoreContext'
import { RATES_CACHE_TTL_MS } from '@/lib/config'

export const RATES_QUERY_KEY = ['exchange-rates'] as const

/**
 * Load rates on mount, then again every TTL period and whenever the
 * browser comes back online. Results land in the exchange store; the
 * query only tracks scheduling.
 */
export function useRatesRefresh() {
  const loadRates = useExchangeStore((state) => state.loadRates)

  return useQuery({
    queryKey: RATES_QUERY_KEY,
    queryFn: () => loadRates(),
    staleTime: RATES_CACHE_TTL_MS,
    refetchInterval: RATES_CACHE_TTL_MS,
    refetchOnReconnect: true,
  })
}
