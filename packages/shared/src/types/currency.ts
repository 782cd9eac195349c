/**
 * Exchange rate types
 */

import type { CurrencyCode } from '../constants/currencies';

/**
 * Current rates, always quoted currency -> reference
 * (one major unit of the currency is worth `rate` major units of the reference)
 */
export interface RateTable {
  reference: CurrencyCode;
  rates: Partial<Record<CurrencyCode, string>>;
  asOf?: string;
}

/**
 * Historical rate source used when pinning an expense's rate
 */
export type RateLookup = (currency: CurrencyCode, date: string) => string | undefined;
