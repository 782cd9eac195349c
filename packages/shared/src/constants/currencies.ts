/**
 * Supported currencies and their minor-unit exponents
 */

export const CURRENCY_CODES = [
  'USD',
  'EUR',
  'GBP',
  'CAD',
  'AUD',
  'JPY',
  'CHF',
  'CNY',
  'INR',
  'MXN',
  'NZD',
  'SGD',
  'SEK',
  'NOK',
  'DKK',
  'KRW',
  'HKD',
  'THB',
  'PLN',
  'CZK',
] as const;

export type CurrencyCode = (typeof CURRENCY_CODES)[number];

export interface CurrencyMeta {
  code: CurrencyCode;
  exponent: number;
  symbol: string;
}

export const CURRENCIES: Record<CurrencyCode, CurrencyMeta> = {
  USD: { code: 'USD', exponent: 2, symbol: '$' },
  EUR: { code: 'EUR', exponent: 2, symbol: '€' },
  GBP: { code: 'GBP', exponent: 2, symbol: '£' },
  CAD: { code: 'CAD', exponent: 2, symbol: 'C$' },
  AUD: { code: 'AUD', exponent: 2, symbol: 'A$' },
  JPY: { code: 'JPY', exponent: 0, symbol: '¥' },
  CHF: { code: 'CHF', exponent: 2, symbol: 'CHF' },
  CNY: { code: 'CNY', exponent: 2, symbol: '¥' },
  INR: { code: 'INR', exponent: 2, symbol: '₹' },
  MXN: { code: 'MXN', exponent: 2, symbol: '$' },
  NZD: { code: 'NZD', exponent: 2, symbol: 'NZ$' },
  SGD: { code: 'SGD', exponent: 2, symbol: 'S$' },
  SEK: { code: 'SEK', exponent: 2, symbol: 'kr' },
  NOK: { code: 'NOK', exponent: 2, symbol: 'kr' },
  DKK: { code: 'DKK', exponent: 2, symbol: 'kr' },
  KRW: { code: 'KRW', exponent: 0, symbol: '₩' },
  HKD: { code: 'HKD', exponent: 2, symbol: 'HK$' },
  THB: { code: 'THB', exponent: 2, symbol: '฿' },
  PLN: { code: 'PLN', exponent: 2, symbol: 'zł' },
  CZK: { code: 'CZK', exponent: 2, symbol: 'Kč' },
};
