import { ChevronDownIcon, CheckIcon } from '@heroicons/react/24/outline'
import { useExchangeStore } from '@/contexts/ExchangeStoreContext'
import { useSwipeToReveal } from '@/hooks/useSwipeToReveal'
import { DEFAULT_SWIPE_CONFIG } from '@/lib/gestures/swipe'
import { formatAmount, getCurrencyInfo } from '@/lib/currency'
import { captureEvent } from '@/lib/posthog'
import { cx } from '@/utils/cx'

interface CurrencyRowProps {
  id: string
  code: string
  onChangeCurrency: (id: string) => void
  onDelete: (id: string) => void
}

export function CurrencyRow({ id, code, onChangeCurrency, onDelete }: CurrencyRowProps) {
  const isBase = useExchangeStore((state) => state.baseCurrencyCode === code)
  const inputString = useExchangeStore((state) => state.inputString)
  const amount = useExchangeStore((state) => state.computeValue(code))
  const setBaseCurrency = useExchangeStore((state) => state.setBaseCurrency)
  const { offset, isDragging, close, consumeTap, handlers } = useSwipeToReveal()

  const currency = getCurrencyInfo(code)

  const handleRowClick = () => {
    if (!consumeTap() || isBase) return
    setBaseCurrency(code)
    captureEvent('base_currency_changed', { code })
  }

  const handleDelete = () => {
    close()
    onDelete(id)
  }

  // Base row shows what was typed; the others show converted amounts
  const displayValue = isBase ? inputString || '0' : formatAmount(amount, code)

  return (
    <div className="relative flex-1 overflow-hidden">
      {/* Delete action revealed on swipe-left */}
      <div
        className="absolute inset-y-0 right-0 flex items-center justify-center bg-danger"
        style={{ width: DEFAULT_SWIPE_CONFIG.revealWidth }}
      >
        <button type="button" className="h-full w-full text-sm font-semibold text-white" onClick={handleDelete}>
          Delete
        </button>
      </div>

      <div
        data-testid={`currency-row-${code}`}
        className={cx(
          'relative flex h-16 cursor-pointer select-none touch-pan-y items-center justify-between border-b border-slate-100 px-4',
          isBase ? 'border-l-4 border-l-primary bg-blue-50' : 'bg-surface'
        )}
        style={{
          transform: `translateX(${offset}px)`,
          transition: isDragging ? 'none' : 'transform 0.2s ease',
        }}
        {...handlers}
        onClick={handleRowClick}
      >
        {/* Left: flag + currency code */}
        <div className="flex min-w-0 items-center gap-3">
          <span className="shrink-0 text-2xl" role="img" aria-label={currency.name}>
            {currency.flag}
          </span>
          <button
            type="button"
            className="flex shrink-0 items-center gap-1"
            onClick={(e) => {
              e.stopPropagation()
              onChangeCurrency(id)
            }}
            aria-label={`Change ${code}`}
          >
            <span className={cx('text-sm font-semibold', isBase ? 'text-blue-700' : 'text-slate-800')}>{code}</span>
            <ChevronDownIcon className="h-3 w-3 text-slate-400" />
          </button>
        </div>

        {/* Right: amount */}
        <div className="flex min-w-0 items-center gap-1.5 overflow-hidden">
          <span
            data-testid={`currency-value-${code}`}
            className={cx(
              'truncate tabular-nums',
              isBase ? 'text-xl font-extrabold text-blue-900' : 'text-lg font-bold text-text'
            )}
          >
            {displayValue}
          </span>
          {isBase && <CheckIcon className="h-4 w-4 shrink-0 text-primary" aria-label="Base currency" />}
        </div>
      </div>
    </div>
  )
}
