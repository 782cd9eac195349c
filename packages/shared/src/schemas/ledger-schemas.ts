/**
 * Schemas for records handed to the engine by the storage/API layer
 */

import { z } from 'zod';
import { CURRENCY_CODES } from '../constants/currencies';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const RATE_PATTERN = /^[0-9]+(\.[0-9]+)?$/;

const minorUnitsSchema = z.number().int('Amounts must be whole minor units');

export const currencyCodeSchema = z.enum(CURRENCY_CODES);

export const calendarDateSchema = z
  .string()
  .regex(DATE_PATTERN, 'Dates must use the YYYY-MM-DD format')
  .refine((value) => {
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
  }, 'Date is not a valid calendar date');

export const exchangeRateSchema = z
  .string()
  .trim()
  .regex(RATE_PATTERN, 'Rate must be a positive decimal string')
  .refine((value) => /[1-9]/.test(value), 'Rate must be greater than zero');

export const participantRefSchema = z.object({
  kind: z.enum(['user', 'guest']),
  id: z.string().min(1, 'Participant ID is required'),
});

export const participantSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('user'),
    id: z.string().min(1),
    name: z.string(),
    defaultCurrency: currencyCodeSchema.optional(),
  }),
  z.object({
    kind: z.literal('guest'),
    id: z.string().min(1),
    name: z.string(),
    claimedBy: z.string().min(1).nullable().optional(),
    isUnknownPlaceholder: z.boolean().optional(),
  }),
]);

export const itemSplitTypeSchema = z.enum(['EQUAL', 'EXACT', 'PERCENT', 'SHARES']);

export const expenseItemSchema = z.object({
  description: z.string(),
  price: minorUnitsSchema.nonnegative('Item price cannot be negative'),
  isTaxTip: z.boolean(),
  splitType: itemSplitTypeSchema,
  assignments: z.array(
    z.object({
      participant: participantRefSchema,
      amount: minorUnitsSchema.optional(),
      percentage: z.number().finite().optional(),
      shares: z.number().int().optional(),
    })
  ),
});

export const splitSpecSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('EQUAL') }),
  z.object({
    type: z.literal('EXACT'),
    allocations: z.array(z.object({ participant: participantRefSchema, amount: minorUnitsSchema })),
  }),
  z.object({
    type: z.literal('PERCENT'),
    allocations: z.array(
      z.object({ participant: participantRefSchema, percentage: z.number().finite() })
    ),
  }),
  z.object({
    type: z.literal('SHARES'),
    allocations: z.array(z.object({ participant: participantRefSchema, shares: z.number().int() })),
  }),
  z.object({ type: z.literal('ITEMIZED'), items: z.array(expenseItemSchema) }),
]);

export const expenseSchema = z.object({
  id: z.string().min(1),
  groupId: z.string().min(1),
  description: z.string(),
  amount: minorUnitsSchema.nonnegative('Amount cannot be negative'),
  currency: currencyCodeSchema,
  date: calendarDateSchema,
  payer: participantRefSchema,
  split: splitSpecSchema,
  pinnedExchangeRate: exchangeRateSchema.nullable(),
});

export const expenseSplitSchema = z.object({
  participant: participantRefSchema,
  owedAmount: minorUnitsSchema,
});

export const groupExpenseSchema = z.object({
  expense: expenseSchema,
  splits: z.array(expenseSplitSchema),
});

export const managementEdgeSchema = z.object({
  managed: participantRefSchema,
  manager: participantRefSchema,
});

export const groupRelationshipsSchema = z.object({
  groupId: z.string().min(1),
  participants: z.array(participantSchema),
  edges: z.array(managementEdgeSchema),
});

export const rateTableSchema = z.object({
  reference: currencyCodeSchema,
  rates: z.record(currencyCodeSchema, exchangeRateSchema),
  asOf: z.string().optional(),
});

export const groupSnapshotSchema = z.object({
  expenses: z.array(groupExpenseSchema),
  relationships: groupRelationshipsSchema,
});
