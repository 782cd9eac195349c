/**
 * Settlement planning
 *
 * Turns aggregated group balances into a settlement plan in one currency:
 * - `{ currency }` settles the balances recorded in that currency as they are
 * - `{ target, rates }` converts every root's balance in every currency to
 *   `target` with a current rate table, then settles the totals
 *
 * Rounding each conversion separately can leave a currency's converted
 * balances a few units off zero. The drift is corrected one unit at a time,
 * largest original balance first, before the totals are simplified.
 */

import type {
  CurrencyCode,
  GroupBalances,
  ParticipantKey,
  RateTable,
  SettlementPlan,
} from '@splitledger/shared';
import { compareParticipantKeys } from '../../core/participants';
import { toSingleCurrencyBalances } from '../balances/balance-aggregator';
import { convertCurrency } from '../currency/currency-normalizer';
import { simplifyDebts } from './debt-simplifier';

export type SettlementOptions =
  | { currency: CurrencyCode }
  | { target: CurrencyCode; rates: RateTable };

interface ConvertedEntry {
  key: ParticipantKey;
  original: number;
  converted: number;
}

function convertPreservingZeroSum(
  balances: ReadonlyMap<ParticipantKey, number>,
  from: CurrencyCode,
  to: CurrencyCode,
  rates: RateTable
): ConvertedEntry[] {
  const entries: ConvertedEntry[] = [];
  for (const [key, original] of balances) {
    if (original === 0) continue;
    entries.push({ key, original, converted: convertCurrency(original, from, to, rates) });
  }

  entries.sort(
    (a, b) => Math.abs(b.original) - Math.abs(a.original) || compareParticipantKeys(a.key, b.key)
  );

  let drift = entries.reduce((total, entry) => total + entry.converted, 0);
  for (let index = 0; drift !== 0 && entries.length > 0; index = (index + 1) % entries.length) {
    const entry = entries[index];
    if (!entry) break;
    const step = Math.sign(drift);
    entry.converted -= step;
    drift -= step;
  }

  return entries;
}

/**
 * Build the settlement plan for a group
 */
export function planSettlement(balances: GroupBalances, options: SettlementOptions): SettlementPlan {
  if ('currency' in options) {
    const transactions = simplifyDebts(toSingleCurrencyBalances(balances, options.currency));
    return { currency: options.currency, transactions, totalTransactions: transactions.length };
  }

  const { target, rates } = options;
  const totals = new Map<ParticipantKey, number>();
  for (const key of Array.from(balances.byRoot.keys()).sort(compareParticipantKeys)) {
    totals.set(key, 0);
  }

  for (const currency of balances.currencies) {
    const converted = convertPreservingZeroSum(
      toSingleCurrencyBalances(balances, currency),
      currency,
      target,
      rates
    );
    for (const entry of converted) {
      totals.set(entry.key, (totals.get(entry.key) ?? 0) + entry.converted);
    }
  }

  const transactions = simplifyDebts(totals);
  return { currency: target, transactions, totalTransactions: transactions.length };
}
