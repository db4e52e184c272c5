import { useState } from 'react'
import { Bars3Icon, PlusIcon } from '@heroicons/react/24/outline'
import { Button, GridList, GridListItem, useDragAndDrop } from 'react-aria-components'
import { useExchangeStore } from '@/contexts/ExchangeStoreContext'
import { resolveReorder } from '@/lib/gestures/reorder'
import { captureEvent } from '@/lib/posthog'
import { CurrencyRow } from './CurrencyRow'
import { CurrencySelector, type SelectorMode } from './CurrencySelector'

interface SelectorState {
  isOpen: boolean
  mode: SelectorMode
  targetId: string | null
}

export function CurrencyList() {
  const currencies = useExchangeStore((state) => state.currencies)
  const removeCurrency = useExchangeStore((state) => state.removeCurrency)
  const reorderCurrency = useExchangeStore((state) => state.reorderCurrency)

  const [selector, setSelector] = useState<SelectorState>({
    isOpen: false,
    mode: 'add',
    targetId: null,
  })

  const openAdd = () => setSelector({ isOpen: true, mode: 'add', targetId: null })
  const openChange = (id: string) => setSelector({ isOpen: true, mode: 'change', targetId: id })
  const closeSelector = () => setSelector((s) => ({ ...s, isOpen: false }))

  const handleDelete = (id: string) => {
    const entry = currencies.find((c) => c.id === id)
    // The last row stays
    if (!entry || currencies.length <= 1) return
    removeCurrency(id)
    captureEvent('currency_removed', { code: entry.code })
  }

  const { dragAndDropHooks } = useDragAndDrop({
    getItems: (keys) => [...keys].map((key) => ({ 'text/plain': String(key) })),
    onReorder: (e) => {
      const [movedKey] = [...e.keys]
      if (movedKey === undefined) return
      const move = resolveReorder(
        currencies.map((c) => c.id),
        String(movedKey),
        String(e.target.key),
        e.target.dropPosition
      )
      if (!move) return
      reorderCurrency(move.fromIndex, move.toIndex)
      captureEvent('currencies_reordered')
    },
  })

  return (
    <>
      <div className="flex-1 overflow-y-auto bg-surface">
        <GridList aria-label="Currencies" items={currencies} dragAndDropHooks={dragAndDropHooks}>
          {(entry) => (
            <GridListItem id={entry.id} textValue={entry.code} className="flex items-stretch outline-none">
              <Button
                slot="drag"
                aria-label={`Reorder ${entry.code}`}
                className="flex w-8 shrink-0 items-center justify-center border-b border-slate-100 bg-surface text-slate-300"
              >
                <Bars3Icon className="h-4 w-4" />
              </Button>
              <CurrencyRow
                id={entry.id}
                code={entry.code}
                onChangeCurrency={openChange}
                onDelete={handleDelete}
              />
            </GridListItem>
          )}
        </GridList>

        <button
          type="button"
          onClick={openAdd}
          className="flex h-14 w-full items-center justify-center gap-2 border-t border-dashed border-slate-300 bg-slate-50 text-sm font-semibold text-primary transition-colors hover:bg-slate-100 active:bg-slate-200"
        >
          <PlusIcon className="h-5 w-5" />
          Add currency
        </button>
      </div>

      <CurrencySelector
        isOpen={selector.isOpen}
        mode={selector.mode}
        targetId={selector.targetId}
        onClose={closeSelector}
      />
    </>
  )
}
