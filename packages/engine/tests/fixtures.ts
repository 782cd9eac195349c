/**
 * Shared test builders
 */

import type {
  Expense,
  GroupExpense,
  GroupRelationships,
  ManagementEdge,
  Participant,
  ParticipantRef,
} from '@splitledger/shared';
import { LedgerError } from '../src/core/errors';

export const alice: ParticipantRef = { kind: 'user', id: 'alice' };
export const bob: ParticipantRef = { kind: 'user', id: 'bob' };
export const charlie: ParticipantRef = { kind: 'user', id: 'charlie' };
export const dana: ParticipantRef = { kind: 'user', id: 'dana' };

export function makeExpense(overrides: Partial<Expense> = {}): Expense {
  return {
    id: 'exp-1',
    groupId: 'group-1',
    description: 'Dinner',
    amount: 1000,
    currency: 'USD',
    date: '2024-03-15',
    payer: alice,
    split: { type: 'EQUAL' },
    pinnedExchangeRate: null,
    ...overrides,
  };
}

/**
 * Expense paid by `payer` with explicit splits, bypassing split calculation
 */
export function paid(
  id: string,
  payer: ParticipantRef,
  amount: number,
  shares: Array<[ParticipantRef, number]>,
  currency: Expense['currency'] = 'USD'
): GroupExpense {
  return {
    expense: makeExpense({ id, payer, amount, currency }),
    splits: shares.map(([participant, owedAmount]) => ({ participant, owedAmount })),
  };
}

export function user(id: string, name = id): Participant {
  return { kind: 'user', id, name };
}

export function guest(id: string, claimedBy: string | null = null, name = id): Participant {
  return { kind: 'guest', id, name, claimedBy };
}

export function relationships(
  participants: Participant[],
  edges: ManagementEdge[] = []
): GroupRelationships {
  return { groupId: 'group-1', participants, edges };
}

export function manages(manager: ParticipantRef, managed: ParticipantRef): ManagementEdge {
  return { managed, manager };
}

/**
 * Run `fn` and return the LedgerError it throws
 */
export function captureLedgerError(fn: () => unknown): LedgerError {
  try {
    fn();
  } catch (error) {
    if (error instanceof LedgerError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a LedgerError to be thrown');
}
