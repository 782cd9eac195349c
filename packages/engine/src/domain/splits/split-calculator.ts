/**
 * Split calculation engine
 *
 * Converts an expense and its split specification into per-participant
 * shares in integer minor units. Shares always sum exactly to the expense
 * amount; inconsistent split data is reported, never corrected.
 */

import type { Expense, ExpenseSplit, GroupExpense, ParticipantRef } from '@splitledger/shared';
import { LedgerError } from '../../core/errors';
import {
  buildRoster,
  computeEqualShares,
  computeExactShares,
  computePercentShares,
  computeSharesSplit,
} from './allocation-rules';
import { computeItemizedSplit } from './itemized';

/**
 * Compute the splits of an expense among `participants`.
 *
 * For EQUAL splits the order of `participants` decides who receives the
 * leftover minor units.
 */
export function computeSplits(expense: Expense, participants: readonly ParticipantRef[]): ExpenseSplit[] {
  const roster = buildRoster(participants);
  const { amount, split } = expense;

  switch (split.type) {
    case 'EQUAL':
      return computeEqualShares(amount, participants);
    case 'EXACT':
      return computeExactShares(amount, split.allocations, roster);
    case 'PERCENT':
      return computePercentShares(amount, split.allocations, roster);
    case 'SHARES':
      return computeSharesSplit(amount, split.allocations, roster);
    case 'ITEMIZED':
      return computeItemizedSplit(amount, split.items, roster);
    default: {
      const unknownSplit: never = split;
      throw new LedgerError('InvalidSplitSpec', `Unknown split type: ${JSON.stringify(unknownSplit)}`);
    }
  }
}

/**
 * Replace-and-recompute: pair an expense with freshly computed splits
 */
export function recomputeExpense(expense: Expense, participants: readonly ParticipantRef[]): GroupExpense {
  return {
    expense,
    splits: computeSplits(expense, participants),
  };
}
