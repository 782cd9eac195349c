import { describe, it, expect } from 'vitest';
import {
  applyTransactions,
  areAllBalancesSettled,
  getTotalSettlementAmount,
  simplifyDebts,
} from './debt-simplifier';
import { captureLedgerError } from '../../../tests/fixtures';

const balancesOf = (entries: Record<string, number>) => new Map(Object.entries(entries));

describe('simplifyDebts', () => {
  it('settles the largest debts first', () => {
    expect(simplifyDebts(balancesOf({ 'user:a': 30, 'user:b': -10, 'user:c': -20 }))).toEqual([
      { from: 'user:c', to: 'user:a', amount: 20 },
      { from: 'user:b', to: 'user:a', amount: 10 },
    ]);
  });

  it('breaks ties by participant key', () => {
    expect(
      simplifyDebts(balancesOf({ 'user:d': -10, 'user:b': 10, 'user:c': -10, 'user:a': 10 }))
    ).toEqual([
      { from: 'user:c', to: 'user:a', amount: 10 },
      { from: 'user:d', to: 'user:b', amount: 10 },
    ]);
  });

  it('needs at most n - 1 transactions and settles everyone', () => {
    const balances = balancesOf({
      'user:a': 500,
      'user:b': -200,
      'user:c': -150,
      'user:d': 100,
      'user:e': -250,
    });

    const transactions = simplifyDebts(balances);

    expect(transactions).toEqual([
      { from: 'user:e', to: 'user:a', amount: 250 },
      { from: 'user:b', to: 'user:a', amount: 200 },
      { from: 'user:c', to: 'user:a', amount: 50 },
      { from: 'user:c', to: 'user:d', amount: 100 },
    ]);
    expect(areAllBalancesSettled(applyTransactions(balances, transactions))).toBe(true);
  });

  it('ignores participants who are already settled', () => {
    expect(simplifyDebts(balancesOf({ 'user:a': 0, 'guest:g': 0 }))).toEqual([]);
  });

  it('rejects balances that do not sum to zero', () => {
    const error = captureLedgerError(() => simplifyDebts(balancesOf({ 'user:a': 10, 'user:b': -5 })));
    expect(error.code).toBe('UnbalancedLedger');
    expect(error.message).toBe('Balances sum to 5 instead of zero');
  });

  it('rejects fractional amounts', () => {
    expect(captureLedgerError(() => simplifyDebts(balancesOf({ 'user:a': 0.5, 'user:b': -0.5 }))).code).toBe(
      'InvalidInput'
    );
  });
});

describe('applyTransactions', () => {
  it('moves each payment between the two balances', () => {
    const result = applyTransactions(balancesOf({ 'user:a': 30, 'user:b': -30 }), [
      { from: 'user:b', to: 'user:a', amount: 20 },
    ]);
    expect(Object.fromEntries(result)).toEqual({ 'user:a': 10, 'user:b': -10 });
  });
});

describe('getTotalSettlementAmount', () => {
  it('adds up every transaction', () => {
    const transactions = [
      { from: 'user:c', to: 'user:a', amount: 20 },
      { from: 'user:b', to: 'user:a', amount: 10 },
    ];
    expect(getTotalSettlementAmount({ currency: 'USD', transactions, totalTransactions: 2 })).toBe(30);
  });
});

describe('areAllBalancesSettled', () => {
  it('requires every balance to be exactly zero', () => {
    expect(areAllBalancesSettled(balancesOf({ 'user:a': 0, 'user:b': 0 }))).toBe(true);
    expect(areAllBalancesSettled(balancesOf({ 'user:a': 1, 'user:b': -1 }))).toBe(false);
  });
});
