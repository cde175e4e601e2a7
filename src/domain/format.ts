/**
 * User-facing strings for amounts, summaries and budget checks.
 */
import { monthLabel } from './computations.js';
import type { BudgetStatus, CurrencySymbol, MonthlySummary } from './types.js';

const moneyFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** 1234.5 -> "$1,234.50"; the sign goes after the symbol ("$-5.00") */
export function formatMoney(amount: number, currency: CurrencySymbol): string {
  return `${currency}${moneyFormat.format(amount)}`;
}

export function summaryMessage(summary: MonthlySummary, currency: CurrencySymbol): string {
  return (
    `${monthLabel(summary.month)} – ` +
    `Income: ${formatMoney(summary.income, currency)} | ` +
    `Expenses: ${formatMoney(summary.expenses, currency)} | ` +
    `Balance: ${formatMoney(summary.balance, currency)}`
  );
}

export function budgetMessage(status: BudgetStatus, currency: CurrencySymbol): string {
  const prefix = status.state === 'over' ? 'Over budget' : 'Within budget';
  return (
    `${prefix} for ${status.category}: ` +
    `Spent ${formatMoney(status.spent, currency)} / Limit ${formatMoney(status.limit, currency)}`
  );
}
