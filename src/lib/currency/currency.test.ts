import { describe, it, expect } from 'vitest'
import {
  SUPPORTED_CURRENCIES,
  convertAmount,
  formatAmount,
  getCurrencyInfo,
  getDisplayDigits,
  codesHiddenFromSelector,
  getFlagEmoji,
  isSupportedCurrency,
  searchCurrencies,
  toInputString,
} from '@/lib/currency'

describe('getDisplayDigits', () => {
  it('uses ISO 4217 minor units', () => {
    expect(getDisplayDigits('USD')).toBe(2)
    expect(getDisplayDigits('EUR')).toBe(2)
    expect(getDisplayDigits('KRW')).toBe(0)
    expect(getDisplayDigits('JPY')).toBe(0)
    expect(getDisplayDigits('ISK')).toBe(0)
  })

  it('shows IDR and HUF without decimals', () => {
    expect(getDisplayDigits('IDR')).toBe(0)
    expect(getDisplayDigits('HUF')).toBe(0)
  })

  it('falls back to 2 for unknown codes', () => {
    expect(getDisplayDigits('XYZ')).toBe(2)
  })
})

describe('formatAmount', () => {
  it('groups thousands at display precision', () => {
    expect(formatAmount(130000, 'KRW')).toBe('130,000')
    expect(formatAmount(1234.567, 'USD')).toBe('1,234.57')
    expect(formatAmount(92.5, 'EUR')).toBe('92.50')
  })

  it('renders zero and non-finite amounts as "0"', () => {
    expect(formatAmount(0, 'USD')).toBe('0')
    expect(formatAmount(Number.NaN, 'USD')).toBe('0')
    expect(formatAmount(Number.POSITIVE_INFINITY, 'USD')).toBe('0')
  })
})

describe('toInputString', () => {
  it('strips trailing zeros', () => {
    expect(toInputString(92.5, 'EUR')).toBe('92.5')
    expect(toInputString(100.004, 'USD')).toBe('100')
  })

  it('rounds to whole units for zero-decimal currencies', () => {
    expect(toInputString(130000, 'KRW')).toBe('130000')
    expect(toInputString(1299.6, 'KRW')).toBe('1300')
  })

  it('renders zero as empty input', () => {
    expect(toInputString(0, 'USD')).toBe('')
  })

  it('renders amounts past plain decimal notation as empty input', () => {
    expect(toInputString(1.3e23, 'KRW')).toBe('')
    expect(toInputString(5e21, 'USD')).toBe('')
  })
})

describe('convertAmount', () => {
  const rates = { USD: 1, KRW: 1300, EUR: 0.92 }

  it('converts through the shared base', () => {
    expect(convertAmount(100, rates, 'USD', 'KRW')).toBe(130000)
    expect(convertAmount(1300, rates, 'KRW', 'USD')).toBeCloseTo(1, 10)
  })

  it('returns 0 when a rate is missing', () => {
    expect(convertAmount(100, rates, 'USD', 'GBP')).toBe(0)
    expect(convertAmount(100, {}, 'USD', 'KRW')).toBe(0)
  })

  it('round-trips within display precision', () => {
    const pairs: Array<[string, string]> = [
      ['USD', 'EUR'],
      ['USD', 'KRW'],
      ['EUR', 'KRW'],
    ]
    for (const [from, to] of pairs) {
      const there = Number(toInputString(convertAmount(100, rates, from, to), to))
      const back = toInputString(convertAmount(there, rates, to, from), from)
      expect(back).toBe('100')
    }
  })
})

describe('currency catalog', () => {
  it('builds flags from the region letters', () => {
    expect(getFlagEmoji('USD')).toBe('🇺🇸')
    expect(getFlagEmoji('EUR')).toBe('🇪🇺')
    expect(getFlagEmoji('12X')).toBe('🏳')
  })

  it('looks up ISO names', () => {
    expect(getCurrencyInfo('USD')).toEqual({ code: 'USD', name: 'US Dollar', flag: '🇺🇸', digits: 2 })
  })

  it('recognises supported codes', () => {
    expect(isSupportedCurrency('KRW')).toBe(true)
    expect(isSupportedCurrency('XAU')).toBe(false)
    expect(isSupportedCurrency(42)).toBe(false)
  })

  it('searches by code', () => {
    expect(searchCurrencies('usd').map((c) => c.code)).toEqual(['USD'])
  })

  it('searches by name', () => {
    expect(searchCurrencies('dollar').map((c) => c.code)).toEqual(expect.arrayContaining(['USD', 'AUD', 'CAD']))
  })

  it('leaves out excluded codes', () => {
    const exclude = SUPPORTED_CURRENCIES.filter((code) => code !== 'ISK')
    expect(searchCurrencies('', { exclude }).map((c) => c.code)).toEqual(['ISK'])
  })
})

describe('codesHiddenFromSelector', () => {
  it('hides every listed code when adding', () => {
    expect(codesHiddenFromSelector(['USD', 'KRW', 'EUR'])).toEqual(['USD', 'KRW', 'EUR'])
  })

  it('keeps the code being changed visible and hides the others', () => {
    const exclude = codesHiddenFromSelector(['USD', 'KRW', 'EUR'], 'KRW')

    expect(exclude).toEqual(['USD', 'EUR'])
    expect(searchCurrencies('', { exclude }).map((c) => c.code)).not.toContain('EUR')
    expect(searchCurrencies('', { exclude }).map((c) => c.code)).toContain('KRW')
  })
})
