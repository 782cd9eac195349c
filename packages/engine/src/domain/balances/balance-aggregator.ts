/**
 * Balance aggregation
 *
 * Folds a group's expenses and splits into net balances per display
 * identity and currency, then folds those into aggregation roots.
 *
 * Invariant: in a closed group the display balances of each currency sum to
 * exactly zero, before and after folding. Folding only moves balance between
 * entries; a violation means an upstream bug and aborts the computation.
 */

import type {
  Balance,
  CurrencyBalances,
  CurrencyCode,
  GroupBalances,
  GroupExpense,
  GroupRelationships,
  ParticipantKey,
  ParticipantRef,
} from '@splitledger/shared';
import { LedgerError } from '../../core/errors';
import { isMinorUnits } from '../../core/money/allocation';
import { compareParticipantKeys, participantKey } from '../../core/participants';
import { RelationshipResolver } from '../relationships/relationship-resolver';

function emptyBalance(participant: ParticipantRef, currency: CurrencyCode): Balance {
  return { participant, currency, totalPaid: 0, totalOwed: 0, netBalance: 0 };
}

function balanceFor(
  balances: Map<ParticipantKey, CurrencyBalances>,
  identities: Map<ParticipantKey, ParticipantRef>,
  participant: ParticipantRef,
  currency: CurrencyCode
): Balance {
  const key = participantKey(participant);
  let perCurrency = balances.get(key);
  if (!perCurrency) {
    perCurrency = new Map();
    balances.set(key, perCurrency);
    identities.set(key, participant);
  }
  let balance = perCurrency.get(currency);
  if (!balance) {
    balance = emptyBalance(participant, currency);
    perCurrency.set(currency, balance);
  }
  return balance;
}

/**
 * Each expense's amounts must be whole minor units, and its splits must add
 * up to the amount credited to its payer
 */
function assertSplitsCoverExpense({ expense, splits }: GroupExpense): void {
  const amounts = [expense.amount, ...splits.map((split) => split.owedAmount)];
  for (const amount of amounts) {
    if (!isMinorUnits(amount) || amount < 0) {
      throw new LedgerError(
        'InvalidInput',
        `Expense ${expense.id} has amount ${amount}; amounts must be non-negative whole minor units`,
        { expenseId: expense.id, amount }
      );
    }
  }
  const owed = splits.reduce((total, split) => total + split.owedAmount, 0);
  if (owed !== expense.amount) {
    throw new LedgerError(
      'UnbalancedLedger',
      `Splits of expense ${expense.id} sum to ${owed} but the expense amount is ${expense.amount}`,
      { expenseId: expense.id, expected: expense.amount, actual: owed }
    );
  }
}

function assertZeroSum(balances: Map<ParticipantKey, CurrencyBalances>, stage: string): void {
  const totals = new Map<CurrencyCode, number>();
  for (const perCurrency of balances.values()) {
    for (const balance of perCurrency.values()) {
      totals.set(balance.currency, (totals.get(balance.currency) ?? 0) + balance.netBalance);
    }
  }
  for (const [currency, total] of totals) {
    if (total !== 0) {
      throw new LedgerError(
        'UnbalancedLedger',
        `${currency} balances sum to ${total} ${stage}`,
        { currency, total, stage }
      );
    }
  }
}

/**
 * Calculate per-root, per-currency balances for a group
 */
export function computeBalances(
  groupExpenses: readonly GroupExpense[],
  relationships: GroupRelationships
): GroupBalances {
  const created = RelationshipResolver.create(relationships);
  if (!created.ok) {
    throw created.error;
  }
  const resolver = created.value;

  const byDisplayIdentity = new Map<ParticipantKey, CurrencyBalances>();
  const displayIdentities = new Map<ParticipantKey, ParticipantRef>();
  const currencies = new Set<CurrencyCode>();

  for (const groupExpense of groupExpenses) {
    assertSplitsCoverExpense(groupExpense);
    const { expense, splits } = groupExpense;
    currencies.add(expense.currency);

    // Record who paid
    const payer = balanceFor(
      byDisplayIdentity,
      displayIdentities,
      resolver.displayIdentity(expense.payer),
      expense.currency
    );
    payer.totalPaid += expense.amount;
    payer.netBalance += expense.amount;

    // Record who owes
    for (const split of splits) {
      const debtor = balanceFor(
        byDisplayIdentity,
        displayIdentities,
        resolver.displayIdentity(split.participant),
        expense.currency
      );
      debtor.totalOwed += split.owedAmount;
      debtor.netBalance -= split.owedAmount;
    }
  }

  assertZeroSum(byDisplayIdentity, 'before management folding');

  // Validate the whole relationship graph before folding anything
  const resolved = resolver.resolveAll(Array.from(displayIdentities.values()));
  if (!resolved.ok) {
    throw resolved.error;
  }
  const roots = new Map<ParticipantKey, ParticipantRef>();
  for (const key of displayIdentities.keys()) {
    const identity = resolved.value.get(key);
    if (identity) {
      roots.set(key, identity.aggregationRoot);
    }
  }

  const byRoot = new Map<ParticipantKey, CurrencyBalances>();
  const rootIdentities = new Map<ParticipantKey, ParticipantRef>();
  const members = new Map<ParticipantKey, ParticipantRef[]>();

  for (const [key, perCurrency] of byDisplayIdentity) {
    const root = roots.get(key);
    const identity = displayIdentities.get(key);
    if (!root || !identity) continue;
    const rootKey = participantKey(root);

    for (const balance of perCurrency.values()) {
      const folded = balanceFor(byRoot, rootIdentities, root, balance.currency);
      folded.totalPaid += balance.totalPaid;
      folded.totalOwed += balance.totalOwed;
      folded.netBalance += balance.netBalance;
    }

    const rootMembers = members.get(rootKey) ?? [];
    rootMembers.push(identity);
    members.set(rootKey, rootMembers);
  }

  assertZeroSum(byRoot, 'after management folding');

  return {
    byDisplayIdentity,
    byRoot,
    members,
    currencies: Array.from(currencies).sort(),
  };
}

/**
 * Net balance of an aggregation root in one currency (0 when absent)
 */
export function getRootBalance(
  balances: GroupBalances,
  root: ParticipantRef,
  currency: CurrencyCode
): number {
  return balances.byRoot.get(participantKey(root))?.get(currency)?.netBalance ?? 0;
}

/**
 * Root balances of a single currency, keyed by participant key in sorted order
 */
export function toSingleCurrencyBalances(
  balances: GroupBalances,
  currency: CurrencyCode
): Map<ParticipantKey, number> {
  const keys = Array.from(balances.byRoot.keys()).sort(compareParticipantKeys);
  const result = new Map<ParticipantKey, number>();
  for (const key of keys) {
    const balance = balances.byRoot.get(key)?.get(currency);
    if (balance) {
      result.set(key, balance.netBalance);
    }
  }
  return result;
}
