/**
 * Item assignment transfer
 *
 * Moves item assignments from one participant to another, e.g. when a
 * member claims items that were assigned to the Unknown placeholder guest.
 * The returned expense must be recomputed by the caller.
 */

import type { Expense, ExpenseItem, ItemAssignment, ParticipantRef } from '@splitledger/shared';
import { LedgerError } from '../../core/errors';
import { sameParticipant } from '../../core/participants';

function addOptional(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined && b === undefined) return undefined;
  return (a ?? 0) + (b ?? 0);
}

function mergeAssignments(existing: ItemAssignment, moved: ItemAssignment): ItemAssignment {
  const merged: ItemAssignment = { participant: existing.participant };
  const amount = addOptional(existing.amount, moved.amount);
  const percentage = addOptional(existing.percentage, moved.percentage);
  const shares = addOptional(existing.shares, moved.shares);
  if (amount !== undefined) merged.amount = amount;
  if (percentage !== undefined) merged.percentage = percentage;
  if (shares !== undefined) merged.shares = shares;
  return merged;
}

function transferInItem(item: ExpenseItem, from: ParticipantRef, to: ParticipantRef): ExpenseItem {
  const moved = item.assignments.find((assignment) => sameParticipant(assignment.participant, from));
  if (!moved) {
    return item;
  }

  const target = item.assignments.find((assignment) => sameParticipant(assignment.participant, to));
  const assignments: ItemAssignment[] = [];
  for (const assignment of item.assignments) {
    if (assignment === moved) {
      if (!target) {
        assignments.push({ ...assignment, participant: to });
      }
    } else if (assignment === target) {
      assignments.push(mergeAssignments(target, moved));
    } else {
      assignments.push(assignment);
    }
  }

  return { ...item, assignments };
}

/**
 * Reassign `from`'s item assignments to `to`.
 *
 * @param itemIndexes Items to touch (all items when omitted)
 */
export function transferItemAssignments(
  expense: Expense,
  from: ParticipantRef,
  to: ParticipantRef,
  itemIndexes?: readonly number[]
): Expense {
  const { split } = expense;
  if (split.type !== 'ITEMIZED') {
    throw new LedgerError('InvalidSplitSpec', 'Only itemized expenses have item assignments', {
      expenseId: expense.id,
      splitType: split.type,
    });
  }

  const selected = new Set(itemIndexes ?? split.items.map((_, index) => index));
  for (const index of selected) {
    if (!Number.isInteger(index) || index < 0 || index >= split.items.length) {
      throw new LedgerError('InvalidSplitSpec', `Expense ${expense.id} has no item #${index}`, {
        expenseId: expense.id,
        itemIndex: index,
      });
    }
  }

  return {
    ...expense,
    split: {
      type: 'ITEMIZED',
      items: split.items.map((item, index) =>
        selected.has(index) ? transferInItem(item, from, to) : item
      ),
    },
  };
}
