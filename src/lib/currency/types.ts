/**
 * Currency Types - Single Source of Truth
 *
 * Supported codes are a fixed list; names and minor-unit digits come from
 * the currency-codes-ts library (ISO 4217).
 */

import { code as getCurrencyRecordFn } from 'currency-codes-ts';

export type CurrencyCodeRecord = NonNullable<ReturnType<typeof getCurrencyRecordFn>>;

export function getCurrencyRecord(currencyCode: string): CurrencyCodeRecord | undefined {
  return getCurrencyRecordFn(currencyCode) ?? undefined;
}

/**
 * Currencies the calculator offers, in selector order
 */
export const SUPPORTED_CURRENCIES = [
  'USD', 'EUR', 'KRW', 'JPY', 'GBP', 'CNY', 'HKD', 'SGD',
  'AUD', 'CAD', 'CHF', 'NZD', 'SEK', 'NOK', 'DKK', 'INR',
  'THB', 'IDR', 'MYR', 'PHP', 'BRL', 'MXN', 'ZAR', 'TRY',
  'HUF', 'PLN', 'CZK', 'ILS', 'RON', 'BGN', 'ISK',
] as const;

export type SupportedCurrencyCode = (typeof SUPPORTED_CURRENCIES)[number];

/**
 * Rows shown on first launch; the first one starts as the base
 */
export const DEFAULT_CURRENCIES: readonly SupportedCurrencyCode[] = ['USD', 'KRW', 'EUR', 'JPY', 'GBP', 'CNY'];

const supportedSet = new Set<string>(SUPPORTED_CURRENCIES);

/**
 * Type guard for runtime validation of currency codes
 */
export function isSupportedCurrency(value: unknown): value is SupportedCurrencyCode {
  return typeof value === 'string' && supportedSet.has(value);
}

/**
 * Currency info for UI display
 */
export interface CurrencyInfo {
  code: string;
  name: string;
  flag: string;
  digits: number;
}
