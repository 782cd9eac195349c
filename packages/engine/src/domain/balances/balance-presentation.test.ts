import { describe, it, expect } from 'vitest';
import type { RateTable } from '@splitledger/shared';
import { computeBalances } from './balance-aggregator';
import { convertRootBalances } from './balance-presentation';
import { alice, bob, captureLedgerError, charlie, paid, relationships, user } from '../../../tests/fixtures';

const rates: RateTable = { reference: 'USD', rates: { EUR: '1.1' } };

const balances = computeBalances(
  [
    paid('dinner', alice, 900, [
      [alice, 300],
      [bob, 300],
      [charlie, 300],
    ]),
    paid('taxi', bob, 600, [
      [bob, 300],
      [charlie, 300],
    ], 'EUR'),
  ],
  relationships([user('alice'), user('bob'), user('charlie')])
);

describe('convertRootBalances', () => {
  it('sums each root across currencies in the display currency', () => {
    expect(Object.fromEntries(convertRootBalances(balances, 'USD', rates))).toEqual({
      'user:alice': 600,
      'user:bob': 30,
      'user:charlie': -630,
    });
  });

  it('reports a missing rate', () => {
    expect(captureLedgerError(() => convertRootBalances(balances, 'GBP', rates)).code).toBe(
      'RateUnavailable'
    );
  });
});
