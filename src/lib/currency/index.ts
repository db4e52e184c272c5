/**
 * Currency Module - Public API
 *
 * Import everything from '@/lib/currency' rather than individual files.
 */

// =============================================================================
// Types
// =============================================================================

export type { CurrencyCodeRecord, CurrencyInfo, SupportedCurrencyCode } from './types';

export {
  SUPPORTED_CURRENCIES,
  DEFAULT_CURRENCIES,
  isSupportedCurrency,
  getCurrencyRecord,
} from './types';

// =============================================================================
// Catalog
// =============================================================================

export type { SearchCurrenciesOptions } from './catalog';

export { codesHiddenFromSelector, getCurrencyInfo, getFlagEmoji, searchCurrencies } from './catalog';

// =============================================================================
// Formatting & Conversion
// =============================================================================

export { getDisplayDigits, formatAmount, toInputString } from './format';

export { convertAmount } from './convert';
