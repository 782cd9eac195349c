/**
 * Pairwise balance between two participants
 *
 * Counts only expenses one of the two paid: when `self` paid, `other`'s
 * share is owed to `self`; when `other` paid, `self`'s share is owed to
 * `other`. Claimed guests count as the user who claimed them.
 */

import type {
  CurrencyCode,
  GroupExpense,
  GroupRelationships,
  PairwiseBalance,
  ParticipantRef,
} from '@splitledger/shared';
import { sameParticipant } from '../../core/participants';
import { RelationshipResolver } from '../relationships/relationship-resolver';

export function computePairwiseBalance(
  groupExpenses: readonly GroupExpense[],
  relationships: GroupRelationships,
  self: ParticipantRef,
  other: ParticipantRef
): PairwiseBalance[] {
  const created = RelationshipResolver.create(relationships);
  if (!created.ok) {
    throw created.error;
  }
  const resolver = created.value;
  const selfIdentity = resolver.displayIdentity(self);
  const otherIdentity = resolver.displayIdentity(other);

  const owedBy = (groupExpense: GroupExpense, participant: ParticipantRef): number =>
    groupExpense.splits
      .filter((split) => sameParticipant(resolver.displayIdentity(split.participant), participant))
      .reduce((total, split) => total + split.owedAmount, 0);

  const balances = new Map<CurrencyCode, number>();
  for (const groupExpense of groupExpenses) {
    const { expense } = groupExpense;
    const payer = resolver.displayIdentity(expense.payer);
    const current = balances.get(expense.currency) ?? 0;

    if (sameParticipant(payer, selfIdentity)) {
      balances.set(expense.currency, current + owedBy(groupExpense, otherIdentity));
    } else if (sameParticipant(payer, otherIdentity)) {
      balances.set(expense.currency, current - owedBy(groupExpense, selfIdentity));
    }
  }

  return Array.from(balances.entries())
    .filter(([, amount]) => amount !== 0)
    .map(([currency, amount]) => ({ currency, amount }))
    .sort((a, b) => (a.currency < b.currency ? -1 : a.currency > b.currency ? 1 : 0));
}
