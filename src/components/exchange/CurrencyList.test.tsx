import { describe, it, expect, vi } from 'vitest'
import { fireEvent, render, screen } from '@testing-library/react'
import { ExchangeStoreProvider } from '@/contexts/ExchangeStoreContext'
import { captureEvent } from '@/lib/posthog'
import { makeStore } from '@/test/fakes'
import { CurrencyList } from './CurrencyList'

vi.mock('@/lib/posthog', () => ({ captureEvent: vi.fn() }))

function renderList(store = makeStore()) {
  render(
    <ExchangeStoreProvider store={store}>
      <CurrencyList />
    </ExchangeStoreProvider>
  )
  return store
}

describe('CurrencyList', () => {
  it('removes a row and records it', () => {
    const store = renderList()

    fireEvent.click(screen.getAllByRole('button', { name: 'Delete' })[1])

    expect(store.getState().currencies.map((c) => c.code)).toEqual(['USD', 'EUR', 'JPY', 'GBP', 'CNY'])
    expect(captureEvent).toHaveBeenCalledWith('currency_removed', { code: 'KRW' })
  })

  it('keeps the last row without recording a removal', () => {
    const store = makeStore()
    store.setState({ currencies: [{ id: 'id-1', code: 'USD' }] })
    renderList(store)

    fireEvent.click(screen.getByRole('button', { name: 'Delete' }))

    expect(store.getState().currencies).toEqual([{ id: 'id-1', code: 'USD' }])
    expect(captureEvent).not.toHaveBeenCalled()
  })
})
