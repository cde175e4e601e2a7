/**
 * Domain types for the budget ledger.
 * Pure data. No DB, no IO.
 */

export const TRANSACTION_KINDS = ['Income', 'Expense'] as const;
export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

export const CATEGORY_OPTIONS = ['Food', 'Transport', 'Bills', 'Entertainment', 'Other'] as const;
export type Category = (typeof CATEGORY_OPTIONS)[number];

/** Canonical header used for import matching and export, in column order */
export const LEDGER_COLUMNS = ['Date', 'Type', 'Category', 'Description', 'Amount'] as const;

export const CURRENCY_OPTIONS = {
  '$': 'USD',
  '₦': 'NGN',
  '€': 'EUR',
  '£': 'GBP',
} as const;
export type CurrencySymbol = keyof typeof CURRENCY_OPTIONS;

/**
 * One ledger row after schema enforcement.
 * kind and category are only constrained for rows entered through the forms;
 * imported rows keep whatever strings the file had.
 */
export type LedgerRow = {
  date: Date | null;
  kind: string | null;
  category: string | null;
  description: string | null;
  amount: number | null;
};

/** A row as held by the store */
export type Transaction = LedgerRow & {
  id: string;
};

/** Any tabular input: one record per row, keyed by column name */
export type RawRow = Record<string, unknown>;

/** Fields overwritten by an edit; the date is always re-stamped */
export interface TransactionEdit {
  kind: TransactionKind;
  category: Category;
  description: string;
  amount: number;
}

export interface RecurringRule {
  id: string;
  kind: TransactionKind;
  category: Category;
  amount: number;
  description: string;
}

/** null (or a non-positive value) means no limit */
export type BudgetMap = Record<Category, number | null>;

export type BudgetState = 'over' | 'within' | 'unset';

export interface BudgetStatus {
  category: Category;
  state: Exclude<BudgetState, 'unset'>;
  spent: number;
  limit: number;
}

/** YYYY-MM string */
export type Month = string;

export const ALL_MONTHS = 'All';

export interface TransactionFilters {
  search?: string;
  categories?: string[];
  month?: Month | typeof ALL_MONTHS;
}

export interface MonthOption {
  value: Month | typeof ALL_MONTHS;
  label: string;
}

export interface FilterOptions {
  categories: string[];
  months: MonthOption[];
}

export interface MonthlySummary {
  month: Month;
  income: number;
  expenses: number;
  balance: number;
}

export interface CategoryTotal {
  category: string;
  spent: number;
}

export interface BalancePoint {
  id: string;
  date: Date | null;
  delta: number;
  balance: number;
}

export function emptyBudgets(): BudgetMap {
  return {
    Food: null,
    Transport: null,
    Bills: null,
    Entertainment: null,
    Other: null,
  };
}
