import { describe, it, expect } from 'vitest'
import { fireEvent, render, screen } from '@testing-library/react'
import { ExchangeStoreProvider } from '@/contexts/ExchangeStoreContext'
import { makeStore } from '@/test/fakes'
import { NumericKeypad } from './NumericKeypad'

function renderKeypad() {
  const store = makeStore()
  render(
    <ExchangeStoreProvider store={store}>
      <NumericKeypad />
    </ExchangeStoreProvider>
  )
  const press = (name: string) => fireEvent.pointerDown(screen.getByRole('button', { name }))
  return { store, press }
}

describe('NumericKeypad', () => {
  it('builds an expression from key presses', () => {
    const { store, press } = renderKeypad()

    for (const key of ['1', 'Plus', '2', 'Multiply', '3']) press(key)

    expect(store.getState().inputString).toBe('1+2×3')
  })

  it('types decimals and deletes the last character', () => {
    const { store, press } = renderKeypad()

    for (const key of ['0', 'Decimal point', '5', '5', 'Backspace']) press(key)

    expect(store.getState().inputString).toBe('0.5')
  })

  it('clears the input', () => {
    const { store, press } = renderKeypad()

    press('9')
    press('Clear')

    expect(store.getState().inputString).toBe('')
  })

  it('moves the base currency to the top', () => {
    const { store, press } = renderKeypad()
    store.getState().setBaseCurrency('EUR')

    press('Move base to top')

    expect(store.getState().currencies.map((c) => c.code)).toEqual(['EUR', 'KRW', 'USD', 'JPY', 'GBP', 'CNY'])
  })
})
