/**
 * Currency catalog for the selector and currency rows
 */

import type { CurrencyInfo } from './types';
import { SUPPORTED_CURRENCIES, getCurrencyRecord } from './types';
import { getDisplayDigits } from './format';

const REGIONAL_INDICATOR_A = 0x1f1e6;
const FALLBACK_FLAG = '\u{1F3F3}'; // 🏳

/**
 * Flag emoji from the first two letters of a currency code, which are its
 * ISO 3166 region (EU for EUR)
 *
 * @example
 * getFlagEmoji('USD') // => "🇺🇸"
 */
export function getFlagEmoji(currencyCode: string): string {
  const region = currencyCode.slice(0, 2).toUpperCase();
  if (!/^[A-Z]{2}$/.test(region)) return FALLBACK_FLAG;
  return String.fromCodePoint(
    ...Array.from(region, (char) => REGIONAL_INDICATOR_A + char.charCodeAt(0) - 65)
  );
}

export function getCurrencyInfo(currencyCode: string): CurrencyInfo {
  return {
    code: currencyCode,
    name: getCurrencyRecord(currencyCode)?.currency ?? currencyCode,
    flag: getFlagEmoji(currencyCode),
    digits: getDisplayDigits(currencyCode),
  };
}

const CATALOG: CurrencyInfo[] = SUPPORTED_CURRENCIES.map(getCurrencyInfo);

export interface SearchCurrenciesOptions {
  /** Codes to leave out, e.g. rows already on screen */
  exclude?: Iterable<string>;
}

/**
 * Filter supported currencies by code or name (case-insensitive)
 */
export function searchCurrencies(query: string, options: SearchCurrenciesOptions = {}): CurrencyInfo[] {
  const excluded = new Set(options.exclude ?? []);
  const q = query.trim().toLowerCase();

  return CATALOG.filter((currency) => {
    if (excluded.has(currency.code)) return false;
    if (!q) return true;
    return currency.code.toLowerCase().includes(q) || currency.name.toLowerCase().includes(q);
  });
}

/**
 * Codes the selector must not offer: every listed code except the one
 * being changed, which stays visible as the current choice
 */
export function codesHiddenFromSelector(listedCodes: readonly string[], changingCode?: string): string[] {
  return listedCodes.filter((code) => code !== changingCode);
}
