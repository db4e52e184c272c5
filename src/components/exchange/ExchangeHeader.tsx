import dayjs from 'dayjs'
import { ArrowPathIcon } from '@heroicons/react/24/outline'
import { useExchangeStore } from '@/contexts/ExchangeStoreContext'
import { cx } from '@/utils/cx'

interface ExchangeHeaderProps {
  onRefresh: () => void
}

export function ExchangeHeader({ onRefresh }: ExchangeHeaderProps) {
  const isLoading = useExchangeStore((state) => state.isLoading)
  const ratesDate = useExchangeStore((state) => state.ratesDate)

  return (
    <header className="flex h-14 shrink-0 items-center justify-between border-b border-slate-100 bg-surface px-4">
      <div className="w-9" />

      <div className="flex flex-col items-center">
        <h1 className="text-base font-semibold text-text">Currency Calculator</h1>
        {isLoading && <span className="text-xs text-text-muted">Updating rates…</span>}
        {!isLoading && ratesDate && (
          <span className="text-xs text-text-muted">Rates as of {dayjs(ratesDate).format('MMM D, YYYY')}</span>
        )}
      </div>

      <button
        type="button"
        onClick={onRefresh}
        disabled={isLoading}
        className="rounded-lg p-2 text-slate-600 transition-colors hover:text-text active:bg-slate-100 disabled:opacity-40"
        aria-label="Refresh rates"
      >
        <ArrowPathIcon className={cx('h-5 w-5', isLoading && 'animate-spin')} />
      </button>
    </header>
  )
}
