import { createContext, useContext, useState, type ReactNode } from 'react'
import { useStore } from 'zustand'
import { rateProvider } from '@/lib/services/exchangeRates'
import { createExchangeStore, type ExchangeState, type ExchangeStore } from '@/stores/exchangeStore'

const ExchangeStoreContext = createContext<ExchangeStore | undefined>(undefined)

interface ExchangeStoreProviderProps {
  children: ReactNode
  /** Pre-built store, e.g. one with a fake rate provider in tests */
  store?: ExchangeStore
}

export function ExchangeStoreProvider({ children, store }: ExchangeStoreProviderProps) {
  const [value] = useState(() => store ?? createExchangeStore({ rateProvider }))

  return <ExchangeStoreContext.Provider value={value}>{children}</ExchangeStoreContext.Provider>
}

function useExchangeStoreApi(): ExchangeStore {
  const context = useContext(ExchangeStoreContext)
  if (context === undefined) {
    throw new Error('useExchangeStore must be used within an ExchangeStoreProvider')
  }
  return context
}

export function useExchangeStore<T>(selector: (state: ExchangeState) => T): T {
  return useStore(useExchangeStoreApi(), selector)
}
