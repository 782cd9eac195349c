/**
 * Single-currency presentation of group balances
 *
 * Converts each root's per-currency balances to one display currency with a
 * current rate table. Display only: rounding each conversion means the
 * converted totals are not guaranteed to sum to zero. Use the settlement
 * planner to settle across currencies.
 */

import type { CurrencyCode, GroupBalances, ParticipantKey, RateTable } from '@splitledger/shared';
import { convertCurrency } from '../currency/currency-normalizer';

export function convertRootBalances(
  balances: GroupBalances,
  target: CurrencyCode,
  rates: RateTable
): Map<ParticipantKey, number> {
  const converted = new Map<ParticipantKey, number>();
  for (const [rootKey, perCurrency] of balances.byRoot) {
    let total = 0;
    for (const balance of perCurrency.values()) {
      total += convertCurrency(balance.netBalance, balance.currency, target, rates);
    }
    converted.set(rootKey, total);
  }
  return converted;
}
