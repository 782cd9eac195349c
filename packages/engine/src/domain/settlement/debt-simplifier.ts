/**
 * Debt simplification
 *
 * Reduces single-currency net balances to a short list of transactions that
 * settles everyone.
 *
 * Algorithm (greedy, largest first):
 * 1. Split participants into creditors (positive) and debtors (negative),
 *    each in a max-heap by magnitude, ties going to the lower participant key
 * 2. Pop the largest creditor and the largest debtor, settle the smaller of
 *    the two amounts and push back whatever remains
 * 3. Repeat until both heaps are empty
 *
 * Every step clears at least one participant, so n non-zero balances need at
 * most n - 1 transactions. The result is not always the global minimum.
 */

import type { DebtEdge, SettlementPlan } from '@splitledger/shared';
import { MaxHeap } from '../../core/collections/max-heap';
import { LedgerError } from '../../core/errors';
import { isMinorUnits } from '../../core/money/allocation';
import { compareParticipantKeys } from '../../core/participants';

interface Position {
  key: string;
  amount: number; // Magnitude, always positive
}

function byLargestAmount(a: Position, b: Position): number {
  if (a.amount !== b.amount) {
    return a.amount - b.amount;
  }
  // Lower key wins the tie
  return compareParticipantKeys(b.key, a.key);
}

function checkBalances(balances: ReadonlyMap<string, number>): void {
  let total = 0;
  for (const [key, amount] of balances) {
    if (!isMinorUnits(amount)) {
      throw new LedgerError('InvalidInput', `Balance of ${key} must be a whole number of minor units, got ${amount}`, {
        participant: key,
        amount,
      });
    }
    total += amount;
  }
  if (total !== 0) {
    throw new LedgerError('UnbalancedLedger', `Balances sum to ${total} instead of zero`, { total });
  }
}

/**
 * Produce settling transactions for balances of one currency.
 *
 * Positive balance = owed money, negative = owes money.
 */
export function simplifyDebts(balances: ReadonlyMap<string, number>): DebtEdge[] {
  checkBalances(balances);

  const creditors = new MaxHeap<Position>(byLargestAmount);
  const debtors = new MaxHeap<Position>(byLargestAmount);
  for (const [key, amount] of balances) {
    if (amount > 0) {
      creditors.push({ key, amount });
    } else if (amount < 0) {
      debtors.push({ key, amount: -amount });
    }
  }

  const transactions: DebtEdge[] = [];
  for (;;) {
    const creditor = creditors.pop();
    const debtor = debtors.pop();
    if (!creditor || !debtor) break;

    const amount = Math.min(creditor.amount, debtor.amount);
    transactions.push({ from: debtor.key, to: creditor.key, amount });

    if (creditor.amount > amount) {
      creditors.push({ key: creditor.key, amount: creditor.amount - amount });
    }
    if (debtor.amount > amount) {
      debtors.push({ key: debtor.key, amount: debtor.amount - amount });
    }
  }

  return transactions;
}

/**
 * Replay transactions on balances: the payer's balance rises, the
 * receiver's falls
 */
export function applyTransactions(
  balances: ReadonlyMap<string, number>,
  transactions: readonly DebtEdge[]
): Map<string, number> {
  const result = new Map(balances);
  for (const { from, to, amount } of transactions) {
    result.set(from, (result.get(from) ?? 0) + amount);
    result.set(to, (result.get(to) ?? 0) - amount);
  }
  return result;
}

/**
 * Get the total amount settled in a settlement plan
 */
export function getTotalSettlementAmount(plan: SettlementPlan): number {
  return plan.transactions.reduce((sum, edge) => sum + edge.amount, 0);
}

/**
 * Check if all balances in a group are settled
 */
export function areAllBalancesSettled(balances: ReadonlyMap<string, number>): boolean {
  return Array.from(balances.values()).every((amount) => amount === 0);
}
