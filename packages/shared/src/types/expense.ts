/**
 * Expense data types
 */

import type { CurrencyCode } from '../constants/currencies';
import type { ParticipantRef } from './participant';

export type SplitType = 'EQUAL' | 'EXACT' | 'PERCENT' | 'SHARES' | 'ITEMIZED';
export type ItemSplitType = Exclude<SplitType, 'ITEMIZED'>;

export interface ExactAllocation {
  participant: ParticipantRef;
  amount: number; // Minor units
}

export interface PercentAllocation {
  participant: ParticipantRef;
  percentage: number; // At most two decimal places
}

export interface SharesAllocation {
  participant: ParticipantRef;
  shares: number; // Positive integer
}

export interface ItemAssignment {
  participant: ParticipantRef;
  amount?: number; // For 'EXACT' items
  percentage?: number; // For 'PERCENT' items
  shares?: number; // For 'SHARES' items
}

export interface ExpenseItem {
  description: string;
  price: number; // Minor units
  isTaxTip: boolean;
  splitType: ItemSplitType;
  assignments: ItemAssignment[];
}

export interface EqualSplit {
  type: 'EQUAL';
}

export interface ExactSplit {
  type: 'EXACT';
  allocations: ExactAllocation[];
}

export interface PercentSplit {
  type: 'PERCENT';
  allocations: PercentAllocation[];
}

export interface SharesSplit {
  type: 'SHARES';
  allocations: SharesAllocation[];
}

export interface ItemizedSplit {
  type: 'ITEMIZED';
  items: ExpenseItem[];
}

export type SplitSpec = EqualSplit | ExactSplit | PercentSplit | SharesSplit | ItemizedSplit;

export interface Expense {
  id: string;
  groupId: string;
  description: string;
  amount: number; // Minor units of `currency`
  currency: CurrencyCode;
  date: string; // YYYY-MM-DD
  payer: ParticipantRef;
  split: SplitSpec;
  pinnedExchangeRate: string | null; // currency -> reference on `date`
}

/**
 * Derived per-participant share of an expense
 */
export interface ExpenseSplit {
  participant: ParticipantRef;
  owedAmount: number;
}

/**
 * An expense together with its computed splits
 */
export interface GroupExpense {
  expense: Expense;
  splits: ExpenseSplit[];
}
