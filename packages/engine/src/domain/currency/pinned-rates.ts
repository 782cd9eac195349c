/**
 * Pinned historical rates
 *
 * An expense carries the currency -> reference rate of its date, fixed when
 * the expense is created. What was owed at creation time is always computed
 * with that pinned rate, never with a current table.
 */

import type { CurrencyCode, Expense, ExpenseSplit, GroupExpense, RateLookup } from '@splitledger/shared';
import { LEDGER_CONFIG } from '@splitledger/shared';
import { LedgerError } from '../../core/errors';
import { allocateByWeights } from '../../core/money/allocation';
import { formatRate, parseRate, type ScaledRate } from '../../core/money/decimal-rate';
import { multiplyByRate, unitRate } from './currency-normalizer';

export interface NormalizedExpense {
  currency: CurrencyCode;
  amount: number;
  splits: ExpenseSplit[];
}

function pinnedRate(expense: Expense, reference: CurrencyCode): ScaledRate {
  if (expense.currency === reference) {
    return unitRate();
  }
  if (expense.pinnedExchangeRate === null) {
    throw new LedgerError(
      'RateUnavailable',
      `Expense ${expense.id} has no pinned ${expense.currency} -> ${reference} rate`,
      { expenseId: expense.id, currency: expense.currency, reference }
    );
  }
  return parseRate(expense.pinnedExchangeRate);
}

/**
 * Expense amount in the reference currency at its pinned rate
 */
export function convertAtPinnedRate(
  expense: Expense,
  reference: CurrencyCode = LEDGER_CONFIG.DEFAULT_REFERENCE_CURRENCY
): number {
  return multiplyByRate(expense.amount, expense.currency, reference, pinnedRate(expense, reference));
}

/**
 * Convert an expense and its splits at the pinned rate.
 *
 * The total is converted once; the converted total is then spread over the
 * splits in proportion to their original shares, so the converted splits
 * still sum exactly to the converted total.
 */
export function normalizeGroupExpense(
  groupExpense: GroupExpense,
  reference: CurrencyCode = LEDGER_CONFIG.DEFAULT_REFERENCE_CURRENCY
): NormalizedExpense {
  const amount = convertAtPinnedRate(groupExpense.expense, reference);
  const weights = groupExpense.splits.map((split) => split.owedAmount);
  const weightTotal = weights.reduce((total, weight) => total + weight, 0);

  const parts =
    weightTotal > 0 ? allocateByWeights(amount, weights, 'first') : weights.map(() => 0);

  return {
    currency: reference,
    amount,
    splits: groupExpense.splits.map((split, index) => ({
      participant: split.participant,
      owedAmount: parts[index] ?? 0,
    })),
  };
}

/**
 * A pinned rate is re-pinned only when the date or the currency changed
 */
export function needsRepin(
  previous: Pick<Expense, 'date' | 'currency'>,
  next: Pick<Expense, 'date' | 'currency'>
): boolean {
  return previous.date !== next.date || previous.currency !== next.currency;
}

/**
 * Fix the expense's rate from the historical rate of its date
 */
export function pinExchangeRate(
  expense: Expense,
  lookup: RateLookup,
  reference: CurrencyCode = LEDGER_CONFIG.DEFAULT_REFERENCE_CURRENCY
): Expense {
  if (expense.currency === reference) {
    return { ...expense, pinnedExchangeRate: '1' };
  }
  const rate = lookup(expense.currency, expense.date);
  if (rate === undefined) {
    throw new LedgerError(
      'RateUnavailable',
      `No ${expense.currency} -> ${reference} rate for ${expense.date}`,
      { expenseId: expense.id, currency: expense.currency, date: expense.date, reference }
    );
  }
  return { ...expense, pinnedExchangeRate: formatRate(parseRate(rate)) };
}

/**
 * Apply a full replacement of an expense, keeping its pinned rate unless
 * the date or currency changed
 */
export function applyExpenseUpdate(
  previous: Expense,
  next: Expense,
  lookup: RateLookup,
  reference: CurrencyCode = LEDGER_CONFIG.DEFAULT_REFERENCE_CURRENCY
): Expense {
  if (!needsRepin(previous, next) && previous.pinnedExchangeRate !== null) {
    return { ...next, pinnedExchangeRate: previous.pinnedExchangeRate };
  }
  return pinExchangeRate(next, lookup, reference);
}
