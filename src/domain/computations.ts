/**
 * Pure domain computations.
 * No DB, no IO. Data in, data out.
 */
import { format, parse } from 'date-fns';
import {
  ALL_MONTHS,
  CATEGORY_OPTIONS,
  type BalancePoint,
  type BudgetMap,
  type BudgetState,
  type BudgetStatus,
  type CategoryTotal,
  type FilterOptions,
  type LedgerRow,
  type Month,
  type MonthlySummary,
  type TransactionFilters,
  type TransactionKind,
} from './types.js';

/** Get current month as YYYY-MM */
export function currentMonth(now: Date = new Date()): Month {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  return `${y}-${m}`;
}

/** Period of a row's date, or null when the date could not be read */
export function monthKeyOf(date: Date | null): Month | null {
  return date ? currentMonth(date) : null;
}

/** "2026-01" -> "January 2026" */
export function monthLabel(month: Month): string {
  return format(parse(month, 'yyyy-MM', new Date(2000, 0, 1)), 'MMMM yyyy');
}

/** Filter rows to a single month (YYYY-MM) */
export function forMonth<T extends LedgerRow>(txns: readonly T[], month: Month): T[] {
  return txns.filter((t) => monthKeyOf(t.date) === month);
}

export function ofKind<T extends LedgerRow>(txns: readonly T[], kind: TransactionKind): T[] {
  return txns.filter((t) => t.kind === kind);
}

/** Sum of amounts; unreadable amounts are skipped */
export function sumAmounts(txns: readonly LedgerRow[]): number {
  return txns.reduce((sum, t) => sum + (t.amount ?? 0), 0);
}

export function monthlySummary(txns: readonly LedgerRow[], month: Month): MonthlySummary {
  const monthTxns = forMonth(txns, month);
  const income = sumAmounts(ofKind(monthTxns, 'Income'));
  const expenses = sumAmounts(ofKind(monthTxns, 'Expense'));
  return { month, income, expenses, balance: income - expenses };
}

/** Expense totals per category, sorted by category name. Rows without a category are left out. */
export function categoryTotals(txns: readonly LedgerRow[]): CategoryTotal[] {
  const map = new Map<string, number>();
  for (const t of ofKind(txns, 'Expense')) {
    if (t.category === null) continue;
    map.set(t.category, (map.get(t.category) ?? 0) + (t.amount ?? 0));
  }
  return Array.from(map.entries())
    .map(([category, spent]) => ({ category, spent }))
    .sort((a, b) => (a.category < b.category ? -1 : a.category > b.category ? 1 : 0));
}

/**
 * Three-way budget outcome. Spending exactly the limit is still within.
 */
export function budgetState(spent: number, limit: number | null | undefined): BudgetState {
  if (limit === null || limit === undefined || !(limit > 0)) return 'unset';
  return spent > limit ? 'over' : 'within';
}

/**
 * Budget check for one month's rows. Categories without a limit produce no entry,
 * and a month with no rows at all produces none.
 */
export function budgetCheck(monthTxns: readonly LedgerRow[], budgets: BudgetMap): BudgetStatus[] {
  if (monthTxns.length === 0) return [];
  const spentBy = new Map(categoryTotals(monthTxns).map((c) => [c.category, c.spent]));
  const statuses: BudgetStatus[] = [];

  for (const category of CATEGORY_OPTIONS) {
    const limit = budgets[category];
    const spent = spentBy.get(category) ?? 0;
    const state = budgetState(spent, limit);
    if (state === 'unset' || limit === null) continue;
    statuses.push({ category, state, spent, limit });
  }
  return statuses;
}

/** Stable sort by date ascending; rows without a date go last */
export function sortByDate<T extends LedgerRow>(txns: readonly T[]): T[] {
  return txns
    .map((t, index) => ({ t, index }))
    .sort((a, b) => {
      const ta = a.t.date?.getTime();
      const tb = b.t.date?.getTime();
      if (ta === undefined && tb === undefined) return a.index - b.index;
      if (ta === undefined) return 1;
      if (tb === undefined) return -1;
      return ta - tb || a.index - b.index;
    })
    .map(({ t }) => t);
}

/**
 * Running balance in date order: income adds, anything else subtracts.
 * The last point equals total income minus total expenses.
 */
export function balanceSeries<T extends LedgerRow & { id: string }>(txns: readonly T[]): BalancePoint[] {
  let balance = 0;
  return sortByDate(txns).map((t) => {
    const amount = t.amount ?? 0;
    const delta = t.kind === 'Income' ? amount : -amount;
    balance += delta;
    return { id: t.id, date: t.date, delta, balance };
  });
}

export function filterTransactions<T extends LedgerRow>(
  txns: readonly T[],
  filters: TransactionFilters,
): T[] {
  const search = filters.search?.toLowerCase() ?? '';
  const categories = new Set(filters.categories ?? []);
  const month = filters.month ?? ALL_MONTHS;

  return txns.filter((t) => {
    if (search && !(t.description !== null && t.description.toLowerCase().includes(search))) {
      return false;
    }
    if (categories.size > 0 && !(t.category !== null && categories.has(t.category))) {
      return false;
    }
    if (month !== ALL_MONTHS && monthKeyOf(t.date) !== month) {
      return false;
    }
    return true;
  });
}

/** Choices offered by the filter controls for the current ledger */
export function filterOptions(txns: readonly LedgerRow[]): FilterOptions {
  const categories = new Set<string>();
  const months = new Set<Month>();

  for (const t of txns) {
    if (t.category !== null && t.category.trim() !== '') categories.add(t.category);
    const month = monthKeyOf(t.date);
    if (month) months.add(month);
  }

  return {
    categories: Array.from(categories).sort(),
    months: [
      { value: ALL_MONTHS, label: ALL_MONTHS },
      ...Array.from(months)
        .sort()
        .map((value) => ({ value, label: monthLabel(value) })),
    ],
  };
}
