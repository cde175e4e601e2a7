/**
 * Input schemas for the entry forms and the HTTP layer.
 * The store itself never validates; these guard what the user submits.
 */
import { z } from 'zod';
import { ALL_MONTHS, CATEGORY_OPTIONS, CURRENCY_OPTIONS, TRANSACTION_KINDS, type CurrencySymbol } from './types.js';

export const transactionKindSchema = z.enum(TRANSACTION_KINDS);
export const categorySchema = z.enum(CATEGORY_OPTIONS);

const currencySymbols = Object.keys(CURRENCY_OPTIONS);

export const currencySchema = z
  .string()
  .refine((s): s is CurrencySymbol => currencySymbols.includes(s), {
    message: `Currency must be one of ${currencySymbols.join(' ')}`,
  });

/** New transaction or recurring rule: amount must be positive */
export const transactionEntrySchema = z.object({
  kind: transactionKindSchema,
  category: categorySchema,
  amount: z.number().positive(),
  description: z.string().default(''),
});
export type TransactionEntry = z.infer<typeof transactionEntrySchema>;

export const recurringRuleInputSchema = transactionEntrySchema;
export type RecurringRuleInput = TransactionEntry;

/** Edit form: zero is allowed, negative is not */
export const transactionEditSchema = z.object({
  kind: transactionKindSchema,
  category: categorySchema,
  amount: z.number().nonnegative(),
  description: z.string(),
});

export const budgetLimitSchema = z.object({
  limit: z.number().nonnegative().nullable(),
});

export const settingsSchema = z.object({
  currency: currencySchema,
});

export const positionSchema = z.coerce.number().int().nonnegative();

export const historyQuerySchema = z.object({
  search: z.string().optional(),
  category: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((v) => (v === undefined ? [] : Array.isArray(v) ? v : [v])),
  month: z
    .union([z.literal(ALL_MONTHS), z.string().regex(/^\d{4}-\d{2}$/)])
    .optional(),
});

export const importQuerySchema = z.object({
  filename: z.string().min(1),
});
