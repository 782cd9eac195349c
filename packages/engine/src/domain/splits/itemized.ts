/**
 * Itemized split calculation
 *
 * Regular items are split among their own assignees with the item's split
 * type. Tax/tip items are then spread over everyone with a non-zero item
 * subtotal, in proportion to that subtotal.
 */

import type {
  ExpenseItem,
  ExpenseSplit,
  ItemAssignment,
  ParticipantKey,
  ParticipantRef,
} from '@splitledger/shared';
import { LEDGER_CONFIG } from '@splitledger/shared';
import { LedgerError } from '../../core/errors';
import { allocateByWeights, divideRoundHalfUp, isMinorUnits, sum } from '../../core/money/allocation';
import { participantKey } from '../../core/participants';
import {
  checkAllocationTargets,
  computeEqualShares,
  computeExactShares,
  computePercentShares,
  computeSharesSplit,
  toBasisPoints,
  type Roster,
} from './allocation-rules';

function describeItem(item: ExpenseItem, index: number): string {
  return item.description ? `Item "${item.description}"` : `Item #${index + 1}`;
}

function requireDetail(
  assignment: ItemAssignment,
  field: 'amount' | 'percentage' | 'shares',
  context: string
): number {
  const value = assignment[field];
  if (value === undefined) {
    throw new LedgerError(
      'InvalidSplitSpec',
      `${context}: assignment for ${participantKey(assignment.participant)} is missing its ${field}`,
      { participant: participantKey(assignment.participant), field }
    );
  }
  return value;
}

/**
 * Split a single (non tax/tip) item among its assignees
 */
export function computeItemShares(item: ExpenseItem, roster: Roster, index = 0): ExpenseSplit[] {
  const context = describeItem(item, index);
  const { assignments } = item;

  if (assignments.length === 0) {
    if (item.price !== 0) {
      throw new LedgerError('InvalidSplitSpec', `${context} has a price but no assignees`, {
        price: item.price,
      });
    }
    return [];
  }

  switch (item.splitType) {
    case 'EQUAL': {
      const participants = assignments.map((assignment) => assignment.participant);
      checkAllocationTargets(participants, roster, context);
      return computeEqualShares(item.price, participants, context);
    }
    case 'EXACT':
      return computeExactShares(
        item.price,
        assignments.map((assignment) => ({
          participant: assignment.participant,
          amount: requireDetail(assignment, 'amount', context),
        })),
        roster,
        context
      );
    case 'PERCENT':
      return computePercentShares(
        item.price,
        assignments.map((assignment) => ({
          participant: assignment.participant,
          percentage: requireDetail(assignment, 'percentage', context),
        })),
        roster,
        context
      );
    case 'SHARES':
      return computeSharesSplit(
        item.price,
        assignments.map((assignment) => ({
          participant: assignment.participant,
          shares: requireDetail(assignment, 'shares', context),
        })),
        roster,
        context
      );
    default: {
      const unknownType: never = item.splitType;
      throw new LedgerError('InvalidSplitSpec', `${context} has unknown split type ${String(unknownType)}`);
    }
  }
}

/**
 * Compute the splits of an itemized expense.
 *
 * The result lists participants in canonical order (first appearance across
 * the regular items) and omits anyone whose total is zero.
 */
export function computeItemizedSplit(
  amount: number,
  items: readonly ExpenseItem[],
  roster: Roster
): ExpenseSplit[] {
  items.forEach((item, index) => {
    if (!isMinorUnits(item.price) || item.price < 0) {
      throw new LedgerError(
        'InvalidSplitSpec',
        `${describeItem(item, index)}: price must be a non-negative whole number of minor units`,
        { price: item.price }
      );
    }
  });

  const itemsTotal = sum(items.map((item) => item.price));
  if (itemsTotal !== amount) {
    throw new LedgerError(
      'SplitMismatch',
      `Item prices sum to ${itemsTotal} but the expense total is ${amount}`,
      { expected: amount, actual: itemsTotal }
    );
  }

  const order: ParticipantKey[] = [];
  const refs = new Map<ParticipantKey, ParticipantRef>();
  const subtotals = new Map<ParticipantKey, number>();
  const taxShares = new Map<ParticipantKey, number>();

  // Regular items first: they define subtotals and the canonical order
  items.forEach((item, index) => {
    if (item.isTaxTip) return;
    for (const share of computeItemShares(item, roster, index)) {
      const key = participantKey(share.participant);
      if (!refs.has(key)) {
        refs.set(key, share.participant);
        order.push(key);
      }
      subtotals.set(key, (subtotals.get(key) ?? 0) + share.owedAmount);
    }
  });

  const carriers = order.filter((key) => (subtotals.get(key) ?? 0) > 0);
  const weights = carriers.map((key) => subtotals.get(key) ?? 0);

  items.forEach((item, index) => {
    if (!item.isTaxTip) return;
    const context = describeItem(item, index);
    // Direct assignments on tax/tip items do not earn a share, but must still be valid
    checkAllocationTargets(
      item.assignments.map((assignment) => assignment.participant),
      roster,
      context
    );
    if (item.price === 0) return;
    if (carriers.length === 0) {
      throw new LedgerError(
        'InvalidSplitSpec',
        `${context}: tax/tip cannot be distributed without any item subtotal`,
        { price: item.price }
      );
    }
    const parts = allocateByWeights(item.price, weights, 'last');
    carriers.forEach((key, position) => {
      taxShares.set(key, (taxShares.get(key) ?? 0) + (parts[position] ?? 0));
    });
  });

  const splits: ExpenseSplit[] = [];
  for (const key of order) {
    const participant = refs.get(key);
    const owedAmount = (subtotals.get(key) ?? 0) + (taxShares.get(key) ?? 0);
    if (participant && owedAmount > 0) {
      splits.push({ participant, owedAmount });
    }
  }
  return splits;
}

/**
 * Tip for a given percentage of the subtotal, rounded half-up to the minor unit
 */
export function tipFromPercentage(subtotal: number, percent: number): number {
  const basisPoints = toBasisPoints(percent);
  if (basisPoints === null || !isMinorUnits(subtotal) || subtotal < 0) {
    throw new LedgerError('InvalidSplitSpec', `Cannot compute a ${percent}% tip on ${subtotal}`, {
      subtotal,
      percent,
    });
  }
  return Number(
    divideRoundHalfUp(
      BigInt(subtotal) * BigInt(basisPoints),
      BigInt(LEDGER_CONFIG.PERCENT_TOTAL_BASIS_POINTS)
    )
  );
}
