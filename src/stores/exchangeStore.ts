import { createStore } from 'zustand/vanilla'
import { createJSONStorage, persist, type StateStorage } from 'zustand/middleware'
import {
  MAX_INPUT_LENGTH,
  appendDigit as appendDigitTo,
  appendOperator as appendOperatorTo,
  backspace as backspaceFrom,
  evaluateInput,
  type KeypadDigit,
  type Operator,
} from '@/lib/calculator'
import { DEFAULT_CURRENCIES, convertAmount, toInputString } from '@/lib/currency'
import type { RateMap, RateProvider } from '@/lib/services/exchangeRates'
import { isRecord, toError } from '@/lib/utils/guards'

export const LAYOUT_STORAGE_KEY = 'exchange:state'

export interface CurrencyEntry {
  id: string
  code: string
}

export type RatesStatus = 'online' | 'offline'

export interface ExchangeState {
  currencies: CurrencyEntry[]
  baseCurrencyCode: string
  inputString: string
  rates: RateMap
  ratesDate: string | null
  isOffline: boolean
  isLoading: boolean

  // Selectors
  computeValue: (code: string) => number

  // Actions
  setBaseCurrency: (code: string) => void
  appendDigit: (digit: KeypadDigit) => void
  appendOperator: (op: Operator) => void
  clearInput: () => void
  backspace: () => void
  swapWithBase: () => void
  addCurrency: (code: string) => void
  removeCurrency: (id: string) => void
  changeCurrency: (id: string, newCode: string) => void
  reorderCurrency: (fromIndex: number, toIndex: number) => void
  loadRates: () => Promise<RatesStatus>
}

type PersistedLayout = Pick<ExchangeState, 'currencies' | 'baseCurrencyCode'>

export interface ExchangeStoreDeps {
  rateProvider: RateProvider
  /** Where layout preferences persist; defaults to localStorage */
  storage?: StateStorage
  generateId?: () => string
}

function randomId(): string {
  return Math.random().toString(36).substring(2, 11)
}

function isCurrencyEntry(value: unknown): value is CurrencyEntry {
  return isRecord(value) && typeof value.id === 'string' && typeof value.code === 'string'
}

/**
 * Accept a persisted layout only if it still satisfies the store invariants
 */
function sanitizeLayout(persisted: unknown): Partial<PersistedLayout> {
  if (!isRecord(persisted) || !Array.isArray(persisted.currencies)) return {}

  const currencies = persisted.currencies.filter(isCurrencyEntry)
  if (currencies.length === 0) return {}

  const stored = persisted.baseCurrencyCode
  const baseCurrencyCode =
    typeof stored === 'string' && currencies.some((c) => c.code === stored) ? stored : currencies[0].code

  return { currencies, baseCurrencyCode }
}

export function createExchangeStore({ rateProvider, storage, generateId = randomId }: ExchangeStoreDeps) {
  // Concurrent loadRates calls share one request so a slow response can't
  // overwrite a newer one
  let inFlight: Promise<RatesStatus> | null = null

  const freshId = (existing: CurrencyEntry[]): string => {
    let id = generateId()
    while (existing.some((c) => c.id === id)) id = generateId()
    return id
  }

  return createStore<ExchangeState>()(
    persist(
      (set, get) => {
        // Rejected keystrokes leave the state untouched
        const setInput = (inputString: string) => {
          if (inputString !== get().inputString) set({ inputString })
        }

        const initialCurrencies: CurrencyEntry[] = []
        for (const code of DEFAULT_CURRENCIES) {
          initialCurrencies.push({ id: freshId(initialCurrencies), code })
        }

        return {
          currencies: initialCurrencies,
          baseCurrencyCode: DEFAULT_CURRENCIES[0],
          inputString: '',
          rates: {},
          ratesDate: null,
          isOffline: false,
          isLoading: true,

          computeValue: (code) => {
            const { rates, baseCurrencyCode, inputString } = get()
            const amount = evaluateInput(inputString)
            if (amount === 0) return 0
            return convertAmount(amount, rates, baseCurrencyCode, code)
          },

          setBaseCurrency: (code) => {
            const state = get()
            if (code === state.baseCurrencyCode) return
            if (!state.currencies.some((c) => c.code === code)) return

            const amount = evaluateInput(state.inputString)
            const converted = convertAmount(amount, state.rates, state.baseCurrencyCode, code)
            const nextInput = converted > 0 ? toInputString(converted, code) : ''

            // Without both rates, or when the result doesn't fit the keypad,
            // the typed input carries over unchanged
            if (!nextInput || nextInput.length > MAX_INPUT_LENGTH) {
              set({ baseCurrencyCode: code })
              return
            }
            set({ baseCurrencyCode: code, inputString: nextInput })
          },

          appendDigit: (digit) => setInput(appendDigitTo(get().inputString, digit)),

          appendOperator: (op) => setInput(appendOperatorTo(get().inputString, op)),

          clearInput: () => setInput(''),

          backspace: () => setInput(backspaceFrom(get().inputString)),

          swapWithBase: () => {
            const { currencies, baseCurrencyCode } = get()
            const baseIndex = currencies.findIndex((c) => c.code === baseCurrencyCode)
            if (currencies.length < 2 || baseIndex <= 0) return

            const next = [...currencies]
            ;[next[0], next[baseIndex]] = [next[baseIndex], next[0]]
            set({ currencies: next })
          },

          addCurrency: (code) => {
            const { currencies } = get()
            if (currencies.some((c) => c.code === code)) return
            set({ currencies: [...currencies, { id: freshId(currencies), code }] })
          },

          removeCurrency: (id) => {
            const { currencies, baseCurrencyCode } = get()
            if (currencies.length <= 1) return
            const removed = currencies.find((c) => c.id === id)
            if (!removed) return

            const remaining = currencies.filter((c) => c.id !== id)
            set({
              currencies: remaining,
              baseCurrencyCode: removed.code === baseCurrencyCode ? remaining[0].code : baseCurrencyCode,
            })
          },

          changeCurrency: (id, newCode) => {
            const { currencies, baseCurrencyCode } = get()
            const target = currencies.find((c) => c.id === id)
            if (!target || target.code === newCode) return
            if (currencies.some((c) => c.code === newCode && c.id !== id)) return

            set({
              currencies: currencies.map((c) => (c.id === id ? { ...c, code: newCode } : c)),
              baseCurrencyCode: target.code === baseCurrencyCode ? newCode : baseCurrencyCode,
            })
          },

          reorderCurrency: (fromIndex, toIndex) => {
            const { currencies } = get()
            const inRange = (i: number) => Number.isInteger(i) && i >= 0 && i < currencies.length
            if (!inRange(fromIndex) || !inRange(toIndex) || fromIndex === toIndex) return

            const next = [...currencies]
            const [moved] = next.splice(fromIndex, 1)
            next.splice(toIndex, 0, moved)
            set({ currencies: next })
          },

          loadRates: () => {
            if (inFlight) return inFlight

            const run = async (): Promise<RatesStatus> => {
              set({ isLoading: true })
              try {
                const result = await rateProvider.fetchLatestRates()
                set({ rates: result.rates, ratesDate: result.date, isOffline: false, isLoading: false })
                return 'online'
              } catch (error) {
                console.warn('[exchangeStore] Rate fetch failed, using cache:', toError(error).message)

                const cached = rateProvider.getCachedRates()
                if (cached) {
                  set({ rates: cached.rates, ratesDate: cached.date, isOffline: true, isLoading: false })
                } else {
                  console.warn('[exchangeStore] No cached rates, values will show as 0')
                  set({ rates: {}, ratesDate: null, isOffline: true, isLoading: false })
                }
                return 'offline'
              }
            }

            inFlight = run().finally(() => {
              inFlight = null
            })
            return inFlight
          },
        }
      },
      {
        name: LAYOUT_STORAGE_KEY,
        version: 1,
        storage: createJSONStorage(() => storage ?? localStorage),
        // Only persist UI preferences, not runtime state
        partialize: (state): PersistedLayout => ({
          currencies: state.currencies,
          baseCurrencyCode: state.baseCurrencyCode,
        }),
        merge: (persisted, current) => ({ ...current, ...sanitizeLayout(persisted) }),
      }
    )
  )
}

export type ExchangeStore = ReturnType<typeof createExchangeStore>
