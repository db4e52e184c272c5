import type { RateMap } from '@/lib/services/exchangeRates/types';

/**
 * Convert an amount between two currencies quoted against the same base.
 * Returns 0 when either rate is unknown.
 *
 * @example
 * convertAmount(100, { USD: 1, KRW: 1300 }, 'USD', 'KRW') // => 130000
 */
export function convertAmount(amount: number, rates: RateMap, from: string, to: string): number {
  const fromRate = rates[from];
  const toRate = rates[to];
  if (!fromRate || !toRate) return 0;
  return amount * (toRate / fromRate);
}
