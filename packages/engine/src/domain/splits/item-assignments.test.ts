import { describe, it, expect } from 'vitest';
import type { Expense, ParticipantRef } from '@splitledger/shared';
import { transferItemAssignments } from './item-assignments';
import { computeSplits } from './split-calculator';
import { alice, bob, captureLedgerError, makeExpense } from '../../../tests/fixtures';

const unknown: ParticipantRef = { kind: 'guest', id: 'unknown' };

function receipt(): Expense {
  return makeExpense({
    amount: 1650,
    split: {
      type: 'ITEMIZED',
      items: [
        {
          description: 'Nachos',
          price: 900,
          isTaxTip: false,
          splitType: 'EQUAL',
          assignments: [{ participant: unknown }, { participant: alice }],
        },
        {
          description: 'Drinks',
          price: 600,
          isTaxTip: false,
          splitType: 'SHARES',
          assignments: [
            { participant: unknown, shares: 1 },
            { participant: bob, shares: 2 },
          ],
        },
        { description: 'Tip', price: 150, isTaxTip: true, splitType: 'EQUAL', assignments: [] },
      ],
    },
  });
}

function itemsOf(expense: Expense) {
  if (expense.split.type !== 'ITEMIZED') {
    throw new Error('expected an itemized expense');
  }
  return expense.split.items;
}

describe('transferItemAssignments', () => {
  it('moves assignments in place and merges with existing ones', () => {
    const updated = transferItemAssignments(receipt(), unknown, bob);
    const [nachos, drinks] = itemsOf(updated);

    expect(nachos?.assignments).toEqual([{ participant: bob }, { participant: alice }]);
    expect(drinks?.assignments).toEqual([{ participant: bob, shares: 3 }]);
  });

  it('produces an expense that recomputes without the placeholder', () => {
    const updated = transferItemAssignments(receipt(), unknown, bob);
    const splits = computeSplits(updated, [unknown, alice, bob]);

    expect(splits).toEqual([
      { participant: bob, owedAmount: 1155 },
      { participant: alice, owedAmount: 495 },
    ]);
  });

  it('only touches the selected items', () => {
    const original = receipt();
    const updated = transferItemAssignments(original, unknown, bob, [0]);

    expect(itemsOf(updated)[1]).toBe(itemsOf(original)[1]);
    expect(itemsOf(updated)[0]?.assignments[0]).toEqual({ participant: bob });
  });

  it('leaves the original expense untouched', () => {
    const original = receipt();
    transferItemAssignments(original, unknown, bob);
    expect(itemsOf(original)[0]?.assignments[0]).toEqual({ participant: unknown });
  });

  it('rejects non-itemized expenses', () => {
    expect(captureLedgerError(() => transferItemAssignments(makeExpense(), unknown, bob)).code).toBe(
      'InvalidSplitSpec'
    );
  });

  it('rejects unknown item indexes', () => {
    const error = captureLedgerError(() => transferItemAssignments(receipt(), unknown, bob, [5]));
    expect(error.code).toBe('InvalidSplitSpec');
    expect(error.message).toBe('Expense exp-1 has no item #5');
  });
});
