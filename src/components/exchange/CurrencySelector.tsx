import { useState } from 'react'
import { MagnifyingGlassIcon, XMarkIcon, CheckIcon } from '@heroicons/react/24/outline'
import { Input, SearchField } from 'react-aria-components'
import { Sheet } from '@/components/ui/base/sheet/sheet'
import { useExchangeStore } from '@/contexts/ExchangeStoreContext'
import { codesHiddenFromSelector, searchCurrencies } from '@/lib/currency'
import { captureEvent } from '@/lib/posthog'
import { cx } from '@/utils/cx'

export type SelectorMode = 'add' | 'change'

interface CurrencySelectorProps {
  isOpen: boolean
  mode: SelectorMode
  targetId: string | null
  onClose: () => void
}

export function CurrencySelector({ isOpen, mode, targetId, onClose }: CurrencySelectorProps) {
  const currencies = useExchangeStore((state) => state.currencies)
  const addCurrency = useExchangeStore((state) => state.addCurrency)
  const changeCurrency = useExchangeStore((state) => state.changeCurrency)
  const [search, setSearch] = useState('')

  const targetCode = targetId ? currencies.find((c) => c.id === targetId)?.code : undefined
  const results = searchCurrencies(search, {
    exclude: codesHiddenFromSelector(
      currencies.map((c) => c.code),
      mode === 'change' ? targetCode : undefined
    ),
  })

  const handleClose = () => {
    setSearch('')
    onClose()
  }

  const handleSelect = (code: string) => {
    if (mode === 'add') {
      addCurrency(code)
      captureEvent('currency_added', { code })
    } else if (targetId && code !== targetCode) {
      changeCurrency(targetId, code)
      captureEvent('currency_changed', { from: targetCode, to: code })
    }
    handleClose()
  }

  return (
    <Sheet.Overlay isOpen={isOpen} onOpenChange={(open) => !open && handleClose()}>
      <Sheet.Content aria-label="Select currency">
        <div className="flex shrink-0 items-center justify-between px-4 py-3">
          <Sheet.Title>{mode === 'add' ? 'Add currency' : 'Change currency'}</Sheet.Title>
          <button
            type="button"
            onClick={handleClose}
            className="rounded-lg p-1.5 text-slate-500 transition-colors hover:bg-slate-100 hover:text-slate-700"
            aria-label="Close"
          >
            <XMarkIcon className="h-5 w-5" />
          </button>
        </div>

        <div className="shrink-0 px-4 pb-3">
          <SearchField
            value={search}
            onChange={setSearch}
            aria-label="Search currencies"
            autoFocus
            className="flex items-center gap-2 rounded-xl bg-surface-muted px-4 py-3"
          >
            <MagnifyingGlassIcon className="h-4 w-4 shrink-0 text-slate-400" />
            <Input
              placeholder="Search by code or name…"
              className="flex-1 bg-transparent text-sm text-slate-700 outline-none placeholder:text-slate-400"
            />
          </SearchField>
        </div>

        <div className="flex-1 overflow-y-auto pb-4">
          {results.length === 0 && <p className="py-8 text-center text-sm text-slate-400">No matching currencies</p>}
          {results.map((currency) => {
            const isCurrentTarget = currency.code === targetCode
            return (
              <button
                key={currency.code}
                type="button"
                onClick={() => handleSelect(currency.code)}
                className={cx(
                  'flex w-full items-center gap-3 px-4 py-3 text-left transition-colors',
                  isCurrentTarget ? 'bg-blue-50 text-blue-700' : 'hover:bg-slate-50 active:bg-slate-100'
                )}
              >
                <span className="shrink-0 text-2xl" role="img" aria-label={currency.name}>
                  {currency.flag}
                </span>
                <div className="min-w-0 flex-1">
                  <span className={cx('text-sm font-bold', isCurrentTarget ? 'text-blue-700' : 'text-slate-800')}>
                    {currency.code}
                  </span>
                  <span className="ml-2 text-sm text-slate-400">{currency.name}</span>
                </div>
                {isCurrentTarget && <CheckIcon className="h-4 w-4 shrink-0 text-primary" />}
              </button>
            )
          })}
        </div>
      </Sheet.Content>
    </Sheet.Overlay>
  )
}
