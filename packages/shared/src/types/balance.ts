/**
 * Balance calculation types
 */

import type { CurrencyCode } from '../constants/currencies';
import type { ParticipantKey, ParticipantRef } from './participant';

export interface Balance {
  participant: ParticipantRef;
  currency: CurrencyCode;
  totalPaid: number;
  totalOwed: number;
  netBalance: number; // Positive = owed money, Negative = owes money
}

export type CurrencyBalances = Map<CurrencyCode, Balance>;

export interface GroupBalances {
  byDisplayIdentity: Map<ParticipantKey, CurrencyBalances>;
  byRoot: Map<ParticipantKey, CurrencyBalances>;
  members: Map<ParticipantKey, ParticipantRef[]>; // Root -> display identities folded in
  currencies: CurrencyCode[];
}

export interface PairwiseBalance {
  currency: CurrencyCode;
  amount: number; // Positive = other owes self
}

export interface DebtEdge {
  from: string; // Participant key who owes
  to: string; // Participant key who is owed
  amount: number;
}

export interface SettlementPlan {
  currency: CurrencyCode;
  transactions: DebtEdge[];
  totalTransactions: number;
}
