import { useExchangeStore } from '@/contexts/ExchangeStoreContext'
import { useRatesRefresh } from '@/hooks/useRatesRefresh'
import { captureEvent } from '@/lib/posthog'
import { ExchangeHeader } from '@/components/exchange/ExchangeHeader'
import { StatusBar } from '@/components/exchange/StatusBar'
import { CurrencyList } from '@/components/exchange/CurrencyList'
import { NumericKeypad } from '@/components/exchange/NumericKeypad'

export function ExchangePage() {
  const isOffline = useExchangeStore((state) => state.isOffline)
  const ratesDate = useExchangeStore((state) => state.ratesDate)
  const { refetch } = useRatesRefresh()

  const handleRefresh = () => {
    captureEvent('rates_refreshed')
    void refetch()
  }

  return (
    /* Mobile-first: full height, centered on desktop */
    <div className="flex min-h-screen justify-center bg-background">
      <div className="flex h-screen w-full max-w-sm flex-col overflow-hidden bg-surface shadow-xl">
        <ExchangeHeader onRefresh={handleRefresh} />
        {isOffline && <StatusBar lastUpdate={ratesDate} />}
        <CurrencyList />
        <NumericKeypad />
      </div>
    </div>
  )
}
