/**
 * Currency Formatting Utilities
 *
 * Display precision and amount formatting for converted values and for
 * amounts written back into the keypad input.
 */

import { getCurrencyRecord } from './types';

/**
 * Currencies whose minor unit is never shown in practice even though
 * ISO 4217 lists two digits
 */
const DISPLAY_DIGITS_OVERRIDES: Record<string, number> = {
  IDR: 0,
  HUF: 0,
};

/**
 * Decimal places shown for a currency (e.g., 2 for USD, 0 for KRW)
 */
export function getDisplayDigits(currencyCode: string): number {
  const override = DISPLAY_DIGITS_OVERRIDES[currencyCode];
  if (override !== undefined) return override;
  return getCurrencyRecord(currencyCode)?.digits ?? 2;
}

/**
 * Format a converted amount for a currency row
 *
 * @example
 * formatAmount(130000, 'KRW') // => "130,000"
 * formatAmount(92.5, 'EUR')   // => "92.50"
 * formatAmount(0, 'USD')      // => "0"
 */
export function formatAmount(amount: number, currencyCode: string): string {
  if (!Number.isFinite(amount) || amount === 0) return '0';
  const digits = getDisplayDigits(currencyCode);
  return new Intl.NumberFormat('en-US', {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  }).format(amount);
}

/**
 * Render an amount as keypad input: rounded to the currency's precision,
 * no grouping, trailing zeros stripped. Zero, and amounts too large for
 * plain decimal notation, render as empty input.
 *
 * @example
 * toInputString(130000, 'KRW') // => "130000"
 * toInputString(92.5, 'EUR')   // => "92.5"
 * toInputString(100.004, 'USD') // => "100"
 */
export function toInputString(value: number, currencyCode: string): string {
  if (!Number.isFinite(value) || value <= 0) return '';
  const fixed = value.toFixed(getDisplayDigits(currencyCode));
  // toFixed switches to exponent notation from 1e21
  if (!/^\d+(\.\d+)?$/.test(fixed)) return '';
  if (!fixed.includes('.')) return fixed;
  return fixed.replace(/0+$/, '').replace(/\.$/, '');
}
