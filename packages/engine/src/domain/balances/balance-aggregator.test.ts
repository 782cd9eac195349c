import { describe, it, expect, vi, afterEach } from 'vitest';
import type { GroupBalances, GroupExpense, ParticipantRef } from '@splitledger/shared';
import { computeBalances, getRootBalance, toSingleCurrencyBalances } from './balance-aggregator';
import {
  alice,
  bob,
  captureLedgerError,
  charlie,
  dana,
  guest,
  manages,
  paid,
  relationships,
  user,
} from '../../../tests/fixtures';

const members = [user('alice'), user('bob'), user('charlie'), user('dana')];

const dinnerAndTaxi: GroupExpense[] = [
  paid('dinner', alice, 900, [
    [alice, 300],
    [bob, 300],
    [charlie, 300],
  ]),
  paid(
    'taxi',
    bob,
    600,
    [
      [bob, 300],
      [charlie, 300],
    ],
    'EUR'
  ),
];

function net(balances: GroupBalances, view: 'byDisplayIdentity' | 'byRoot') {
  const result: Record<string, Record<string, number>> = {};
  for (const [key, perCurrency] of balances[view]) {
    const amounts: Record<string, number> = {};
    for (const [currency, balance] of perCurrency) {
      amounts[currency] = balance.netBalance;
    }
    result[key] = amounts;
  }
  return result;
}

function sumsPerCurrency(balances: GroupBalances, view: 'byDisplayIdentity' | 'byRoot') {
  const totals: Record<string, number> = {};
  for (const perCurrency of balances[view].values()) {
    for (const balance of perCurrency.values()) {
      totals[balance.currency] = (totals[balance.currency] ?? 0) + balance.netBalance;
    }
  }
  return totals;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('computeBalances', () => {
  it('credits payers and debits split participants per currency', () => {
    const balances = computeBalances(dinnerAndTaxi, relationships(members));

    expect(net(balances, 'byDisplayIdentity')).toEqual({
      'user:alice': { USD: 600 },
      'user:bob': { USD: -300, EUR: 300 },
      'user:charlie': { USD: -300, EUR: -300 },
    });
    expect(balances.currencies).toEqual(['EUR', 'USD']);

    const aliceUsd = balances.byDisplayIdentity.get('user:alice')?.get('USD');
    expect(aliceUsd).toEqual({
      participant: alice,
      currency: 'USD',
      totalPaid: 900,
      totalOwed: 300,
      netBalance: 600,
    });
  });

  it('folds managed participants into their root per currency', () => {
    const balances = computeBalances(dinnerAndTaxi, relationships(members, [manages(alice, charlie)]));

    expect(net(balances, 'byRoot')).toEqual({
      'user:alice': { USD: 300, EUR: -300 },
      'user:bob': { USD: -300, EUR: 300 },
    });
    expect(balances.byRoot.get('user:alice')?.get('USD')).toMatchObject({ totalPaid: 900, totalOwed: 600 });
    expect(balances.members.get('user:alice')).toEqual([alice, charlie]);
    expect(balances.members.get('user:bob')).toEqual([bob]);
  });

  it('keeps display balances unchanged by folding', () => {
    const balances = computeBalances(dinnerAndTaxi, relationships(members, [manages(alice, charlie)]));
    expect(net(balances, 'byDisplayIdentity')['user:charlie']).toEqual({ USD: -300, EUR: -300 });
  });

  it('counts claimed guests as their claimer', () => {
    const g1: ParticipantRef = { kind: 'guest', id: 'g1' };
    const expenses = [
      paid('lunch', alice, 1000, [
        [alice, 500],
        [g1, 500],
      ]),
    ];
    const balances = computeBalances(expenses, relationships([...members, guest('g1', 'bob')]));

    expect(net(balances, 'byDisplayIdentity')).toEqual({
      'user:alice': { USD: 500 },
      'user:bob': { USD: -500 },
    });
  });

  it('sums to zero per currency before and after folding', () => {
    const expenses: GroupExpense[] = [
      ...dinnerAndTaxi,
      paid('hotel', dana, 45001, [
        [alice, 11251],
        [bob, 11250],
        [charlie, 11250],
        [dana, 11250],
      ]),
      paid(
        'museum',
        charlie,
        3000,
        [
          [alice, 1000],
          [dana, 2000],
        ],
        'EUR'
      ),
    ];
    const balances = computeBalances(
      expenses,
      relationships(members, [manages(alice, bob), manages(bob, charlie)])
    );

    expect(sumsPerCurrency(balances, 'byDisplayIdentity')).toEqual({ USD: 0, EUR: 0 });
    expect(sumsPerCurrency(balances, 'byRoot')).toEqual({ USD: 0, EUR: 0 });
    expect(Array.from(balances.byRoot.keys())).toEqual(['user:alice', 'user:dana']);
  });

  it('returns the same result on every call', () => {
    const rel = relationships(members, [manages(alice, charlie)]);
    expect(computeBalances(dinnerAndTaxi, rel)).toEqual(computeBalances(dinnerAndTaxi, rel));
  });

  it('rejects splits that do not cover the expense', () => {
    const expenses = [
      paid('dinner', alice, 1000, [
        [alice, 450],
        [bob, 450],
      ]),
    ];
    const error = captureLedgerError(() => computeBalances(expenses, relationships(members)));
    expect(error.code).toBe('UnbalancedLedger');
    expect(error.message).toBe('Splits of expense dinner sum to 900 but the expense amount is 1000');
  });

  it('rejects fractional split amounts', () => {
    const expenses = [
      paid('dinner', alice, 1000, [
        [alice, 333.5],
        [bob, 666.5],
      ]),
    ];
    const error = captureLedgerError(() => computeBalances(expenses, relationships(members)));
    expect(error.code).toBe('InvalidInput');
    expect(error.message).toBe(
      'Expense dinner has amount 333.5; amounts must be non-negative whole minor units'
    );
  });

  it('rejects negative split amounts', () => {
    const expenses = [
      paid('dinner', alice, 1000, [
        [alice, 1200],
        [bob, -200],
      ]),
    ];
    const error = captureLedgerError(() => computeBalances(expenses, relationships(members)));
    expect(error.code).toBe('InvalidInput');
    expect(error.details).toEqual({ expenseId: 'dinner', amount: -200 });
  });

  it('folds a user who claimed several managed guests under the first manager', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const g2: ParticipantRef = { kind: 'guest', id: 'g2' };
    const rel = relationships(
      [...members, guest('g1', 'dana'), guest('g2', 'dana')],
      [manages(alice, { kind: 'guest', id: 'g1' }), manages(bob, g2)]
    );
    const expenses = [
      paid('tickets', dana, 1000, [
        [alice, 500],
        [g2, 500],
      ]),
    ];

    const balances = computeBalances(expenses, rel);

    expect(net(balances, 'byRoot')).toEqual({ 'user:alice': { USD: 0 } });
    expect(balances.members.get('user:alice')).toEqual([dana, alice]);
  });

  it('aborts on a management cycle', () => {
    const rel = relationships(members, [manages(alice, charlie), manages(charlie, alice)]);
    expect(captureLedgerError(() => computeBalances(dinnerAndTaxi, rel)).code).toBe('ManagementCycle');
  });

  it('aborts on a cycle between participants without expenses', () => {
    const x: ParticipantRef = { kind: 'guest', id: 'x' };
    const rel = relationships(members, [manages(dana, x), manages(x, dana)]);
    expect(captureLedgerError(() => computeBalances(dinnerAndTaxi, rel)).code).toBe('ManagementCycle');
  });
});

describe('getRootBalance', () => {
  it('reads a root balance and defaults to zero', () => {
    const balances = computeBalances(dinnerAndTaxi, relationships(members, [manages(alice, charlie)]));
    expect(getRootBalance(balances, alice, 'EUR')).toBe(-300);
    expect(getRootBalance(balances, charlie, 'USD')).toBe(0);
    expect(getRootBalance(balances, bob, 'GBP')).toBe(0);
  });
});

describe('toSingleCurrencyBalances', () => {
  it('lists roots holding the currency in key order', () => {
    const balances = computeBalances(dinnerAndTaxi, relationships(members));
    const eur = toSingleCurrencyBalances(balances, 'EUR');
    expect(Array.from(eur.entries())).toEqual([
      ['user:bob', 300],
      ['user:charlie', -300],
    ]);
  });
});
