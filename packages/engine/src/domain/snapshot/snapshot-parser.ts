/**
 * Inbound record parsing
 *
 * Validates raw records from the storage/API layer against the shared zod
 * schemas. The engine operations accept typed values directly; parsing is
 * for callers holding untrusted JSON.
 */

import type { z } from 'zod';
import {
  expenseSchema,
  groupRelationshipsSchema,
  groupSnapshotSchema,
  rateTableSchema,
  type Expense,
  type GroupExpense,
  type GroupRelationships,
  type RateTable,
} from '@splitledger/shared';
import { LedgerError } from '../../core/errors';

export interface GroupSnapshot {
  expenses: GroupExpense[];
  relationships: GroupRelationships;
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, record: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    const message = issue ? issue.message : 'Invalid input';
    throw new LedgerError(
      'InvalidInput',
      path ? `Invalid ${record} at ${path}: ${message}` : `Invalid ${record}: ${message}`,
      { record, path, issues: result.error.issues.length }
    );
  }
  return result.data;
}

export function parseExpense(input: unknown): Expense {
  return parseWith(expenseSchema, input, 'expense');
}

export function parseRelationships(input: unknown): GroupRelationships {
  return parseWith(groupRelationshipsSchema, input, 'relationships');
}

export function parseRateTable(input: unknown): RateTable {
  return parseWith(rateTableSchema, input, 'rate table');
}

export function parseGroupSnapshot(input: unknown): GroupSnapshot {
  return parseWith(groupSnapshotSchema, input, 'group snapshot');
}
