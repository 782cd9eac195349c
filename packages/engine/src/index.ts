/**
 * Ledger & settlement engine
 *
 * Splits expenses, resolves guest claims and balance management, aggregates
 * multi-currency balances and plans settlements. Pure and synchronous.
 */

export { LedgerError, isLedgerError, type LedgerErrorCode, type LedgerResult } from './core/errors';
export {
  participantKey,
  parseParticipantKey,
  sameParticipant,
  userRef,
  guestRef,
  compareParticipantKeys,
} from './core/participants';
export { splitEvenly, allocateByWeights, divideRoundHalfUp } from './core/money/allocation';
export { parseRate, formatRate, type ScaledRate } from './core/money/decimal-rate';

// Splits
export { computeSplits, recomputeExpense } from './domain/splits/split-calculator';
export { tipFromPercentage } from './domain/splits/itemized';
export { transferItemAssignments } from './domain/splits/item-assignments';

// Relationships
export {
  RelationshipResolver,
  createRelationshipResolver,
  resolveIdentity,
  buildAggregationRootMap,
} from './domain/relationships/relationship-resolver';
export {
  canAssignManager,
  canClaimGuest,
  validateRelationships,
} from './domain/relationships/relationship-validation';

// Currency
export {
  getCurrencyExponent,
  convertToReference,
  convertCurrency,
  withFallbackRates,
} from './domain/currency/currency-normalizer';
export {
  convertAtPinnedRate,
  normalizeGroupExpense,
  needsRepin,
  pinExchangeRate,
  applyExpenseUpdate,
  type NormalizedExpense,
} from './domain/currency/pinned-rates';

// Balances
export {
  computeBalances,
  getRootBalance,
  toSingleCurrencyBalances,
} from './domain/balances/balance-aggregator';
export { computePairwiseBalance } from './domain/balances/pairwise-balance';
export { convertRootBalances } from './domain/balances/balance-presentation';

// Settlement
export {
  simplifyDebts,
  applyTransactions,
  getTotalSettlementAmount,
  areAllBalancesSettled,
} from './domain/settlement/debt-simplifier';
export { planSettlement, type SettlementOptions } from './domain/settlement/settlement-planner';

// Parsing
export {
  parseExpense,
  parseRelationships,
  parseRateTable,
  parseGroupSnapshot,
  type GroupSnapshot,
} from './domain/snapshot/snapshot-parser';
