/**
 * Per-split-type share rules
 *
 * Each rule turns an amount and its allocation list into cent-exact shares
 * for the EQUAL, EXACT, PERCENT and SHARES split types. They are used for
 * whole expenses and, inside ITEMIZED expenses, for individual items.
 */

import type {
  ExactAllocation,
  ExpenseSplit,
  ParticipantKey,
  ParticipantRef,
  PercentAllocation,
  SharesAllocation,
} from '@splitledger/shared';
import { LEDGER_CONFIG } from '@splitledger/shared';
import { LedgerError } from '../../core/errors';
import { allocateByWeights, isMinorUnits, splitEvenly, sum } from '../../core/money/allocation';
import { participantKey } from '../../core/participants';

export type Roster = ReadonlyMap<ParticipantKey, ParticipantRef>;

/**
 * Build the participant set an expense may allocate to.
 */
export function buildRoster(participants: readonly ParticipantRef[]): Roster {
  const roster = new Map<ParticipantKey, ParticipantRef>();
  for (const participant of participants) {
    const key = participantKey(participant);
    if (roster.has(key)) {
      throw new LedgerError('InvalidSplitSpec', `Participant ${key} is listed twice`, {
        participant: key,
      });
    }
    roster.set(key, participant);
  }
  return roster;
}

/**
 * Reject allocation lists naming a participant twice or naming someone
 * outside the participant set.
 */
export function checkAllocationTargets(
  targets: readonly ParticipantRef[],
  roster: Roster,
  context: string
): void {
  const seen = new Set<ParticipantKey>();
  for (const target of targets) {
    const key = participantKey(target);
    if (seen.has(key)) {
      throw new LedgerError('InvalidSplitSpec', `${context}: participant ${key} is allocated twice`, {
        participant: key,
      });
    }
    seen.add(key);
    if (!roster.has(key)) {
      throw new LedgerError(
        'UnassignedParticipant',
        `${context}: participant ${key} is not part of this expense`,
        { participant: key }
      );
    }
  }
}

function checkAmount(amount: number, context: string): void {
  if (!isMinorUnits(amount) || amount < 0) {
    throw new LedgerError(
      'InvalidSplitSpec',
      `${context}: amount must be a non-negative whole number of minor units`,
      { amount }
    );
  }
}

function checkAssignees(count: number, amount: number, context: string): void {
  if (count === 0 && amount !== 0) {
    throw new LedgerError('InvalidSplitSpec', `${context}: a non-zero amount needs at least one participant`, {
      amount,
    });
  }
}

/**
 * Convert a percentage with at most two decimal places to hundredths of a
 * percent, or null when it has more precision or is negative.
 */
export function toBasisPoints(percentage: number): number | null {
  if (!Number.isFinite(percentage) || percentage < 0) {
    return null;
  }
  const basisPoints = Math.round(percentage * 100);
  if (Math.abs(percentage * 100 - basisPoints) > 1e-6) {
    return null;
  }
  return basisPoints;
}

export function computeEqualShares(
  amount: number,
  participants: readonly ParticipantRef[],
  context = 'EQUAL split'
): ExpenseSplit[] {
  checkAmount(amount, context);
  checkAssignees(participants.length, amount, context);
  if (participants.length === 0) {
    return [];
  }
  const parts = splitEvenly(amount, participants.length);
  return participants.map((participant, index) => ({
    participant,
    owedAmount: parts[index] ?? 0,
  }));
}

export function computeExactShares(
  amount: number,
  allocations: readonly ExactAllocation[],
  roster: Roster,
  context = 'EXACT split'
): ExpenseSplit[] {
  checkAmount(amount, context);
  checkAssignees(allocations.length, amount, context);
  checkAllocationTargets(
    allocations.map((allocation) => allocation.participant),
    roster,
    context
  );
  for (const allocation of allocations) {
    checkAmount(allocation.amount, context);
  }

  const allocated = sum(allocations.map((allocation) => allocation.amount));
  if (allocated !== amount) {
    throw new LedgerError(
      'SplitMismatch',
      `${context}: allocations sum to ${allocated} but the total is ${amount}`,
      { expected: amount, actual: allocated }
    );
  }

  return allocations.map((allocation) => ({
    participant: allocation.participant,
    owedAmount: allocation.amount,
  }));
}

export function computePercentShares(
  amount: number,
  allocations: readonly PercentAllocation[],
  roster: Roster,
  context = 'PERCENT split'
): ExpenseSplit[] {
  checkAmount(amount, context);
  checkAssignees(allocations.length, amount, context);
  checkAllocationTargets(
    allocations.map((allocation) => allocation.participant),
    roster,
    context
  );

  const basisPoints = allocations.map((allocation) => {
    const value = toBasisPoints(allocation.percentage);
    if (value === null) {
      throw new LedgerError(
        'InvalidSplitSpec',
        `${context}: percentage ${allocation.percentage} must be non-negative with at most two decimals`,
        { percentage: allocation.percentage }
      );
    }
    return value;
  });

  const totalBasisPoints = sum(basisPoints);
  if (totalBasisPoints !== LEDGER_CONFIG.PERCENT_TOTAL_BASIS_POINTS) {
    throw new LedgerError(
      'InvalidSplitSpec',
      `${context}: percentages must add up to exactly 100, got ${totalBasisPoints / 100}`,
      { total: totalBasisPoints / 100 }
    );
  }

  const parts = allocateByWeights(amount, basisPoints, 'first');
  return allocations.map((allocation, index) => ({
    participant: allocation.participant,
    owedAmount: parts[index] ?? 0,
  }));
}

export function computeSharesSplit(
  amount: number,
  allocations: readonly SharesAllocation[],
  roster: Roster,
  context = 'SHARES split'
): ExpenseSplit[] {
  checkAmount(amount, context);
  checkAssignees(allocations.length, amount, context);
  checkAllocationTargets(
    allocations.map((allocation) => allocation.participant),
    roster,
    context
  );

  for (const allocation of allocations) {
    if (!Number.isSafeInteger(allocation.shares) || allocation.shares <= 0) {
      throw new LedgerError(
        'InvalidSplitSpec',
        `${context}: share counts must be positive integers, got ${allocation.shares}`,
        { shares: allocation.shares }
      );
    }
  }
  if (allocations.length === 0) {
    return [];
  }

  const parts = allocateByWeights(
    amount,
    allocations.map((allocation) => allocation.shares),
    'first'
  );
  return allocations.map((allocation, index) => ({
    participant: allocation.participant,
    owedAmount: parts[index] ?? 0,
  }));
}
