/**
 * Currency normalization with current rates
 *
 * Every rate is quoted currency -> reference currency. Converting to the
 * reference multiplies by the rate; converting onward to another currency
 * divides the reference amount by the target's rate. Each step rounds to the
 * nearest minor unit, half-up on magnitudes.
 *
 * This module only handles current rate tables (group balance display and
 * settlement input). Expense-level amounts use the rate pinned on the
 * expense, see pinned-rates.ts.
 */

import type { CurrencyCode, RateTable } from '@splitledger/shared';
import { CURRENCIES, LEDGER_CONFIG } from '@splitledger/shared';
import { LedgerError } from '../../core/errors';
import { divideRoundHalfUp, isMinorUnits, pow10 } from '../../core/money/allocation';
import { parseRate, type ScaledRate } from '../../core/money/decimal-rate';

export function getCurrencyExponent(currency: CurrencyCode): number {
  return CURRENCIES[currency].exponent;
}

export function unitRate(scale: number = LEDGER_CONFIG.RATE_SCALE): ScaledRate {
  return { value: pow10(scale), scale };
}

function ensureMinorUnits(amount: number): void {
  if (!isMinorUnits(amount)) {
    throw new LedgerError('InvalidInput', `Amount must be a whole number of minor units, got ${amount}`, {
      amount,
    });
  }
}

/**
 * amount (minor units of `from`) * rate -> minor units of `to`
 */
export function multiplyByRate(
  amount: number,
  from: CurrencyCode,
  to: CurrencyCode,
  rate: ScaledRate
): number {
  ensureMinorUnits(amount);
  const numerator = BigInt(amount) * rate.value * pow10(getCurrencyExponent(to));
  const denominator = pow10(rate.scale) * pow10(getCurrencyExponent(from));
  return Number(divideRoundHalfUp(numerator, denominator));
}

/**
 * amount (minor units of `from`) / rate -> minor units of `to`
 */
export function divideByRate(
  amount: number,
  from: CurrencyCode,
  to: CurrencyCode,
  rate: ScaledRate
): number {
  ensureMinorUnits(amount);
  const numerator = BigInt(amount) * pow10(rate.scale) * pow10(getCurrencyExponent(to));
  const denominator = rate.value * pow10(getCurrencyExponent(from));
  return Number(divideRoundHalfUp(numerator, denominator));
}

/**
 * Rate of `currency` against the table's reference currency
 */
export function lookupRate(table: RateTable, currency: CurrencyCode): ScaledRate {
  if (currency === table.reference) {
    return unitRate();
  }
  const rate = table.rates[currency];
  if (rate === undefined) {
    throw new LedgerError(
      'RateUnavailable',
      `No ${currency} -> ${table.reference} rate available`,
      { currency, reference: table.reference, asOf: table.asOf }
    );
  }
  return parseRate(rate);
}

export function convertToReference(amount: number, currency: CurrencyCode, table: RateTable): number {
  if (currency === table.reference) {
    ensureMinorUnits(amount);
    return amount;
  }
  return multiplyByRate(amount, currency, table.reference, lookupRate(table, currency));
}

export function convertCurrency(
  amount: number,
  from: CurrencyCode,
  to: CurrencyCode,
  table: RateTable
): number {
  if (from === to) {
    ensureMinorUnits(amount);
    return amount;
  }
  const referenceAmount = convertToReference(amount, from, table);
  if (to === table.reference) {
    return referenceAmount;
  }
  return divideByRate(referenceAmount, table.reference, to, lookupRate(table, to));
}

/**
 * Layer a cached or static table under the current one.
 *
 * Rates present in `primary` win; `fallback` only fills gaps.
 */
export function withFallbackRates(primary: RateTable, fallback: RateTable): RateTable {
  if (primary.reference !== fallback.reference) {
    throw new LedgerError(
      'InvalidInput',
      `Cannot merge rate tables quoted against ${primary.reference} and ${fallback.reference}`,
      { primary: primary.reference, fallback: fallback.reference }
    );
  }
  return {
    reference: primary.reference,
    rates: { ...fallback.rates, ...primary.rates },
    asOf: primary.asOf,
  };
}
