/**
 * Recurring rule reconciliation.
 * A rule has no schedule: it only guarantees one transaction per calendar
 * month with the same description and category.
 */
import { currentMonth, monthKeyOf } from './computations.js';
import type { LedgerRow, RecurringRule } from './types.js';

export function matchesRule(row: LedgerRow, rule: RecurringRule, month: string): boolean {
  return (
    row.description === rule.description &&
    row.category === rule.category &&
    monthKeyOf(row.date) === month
  );
}

/**
 * Rows that must be appended so every rule has a match in the month of `now`.
 *
 * Rules are checked in order against the ledger plus the rows already
 * produced in this pass, so two rules sharing (description, category)
 * yield a single row.
 */
export function pendingRecurring(
  txns: readonly LedgerRow[],
  rules: readonly RecurringRule[],
  now: Date,
): LedgerRow[] {
  const month = currentMonth(now);
  const created: LedgerRow[] = [];

  for (const rule of rules) {
    const exists =
      txns.some((t) => matchesRule(t, rule, month)) ||
      created.some((t) => matchesRule(t, rule, month));
    if (exists) continue;

    created.push({
      date: new Date(now.getTime()),
      kind: rule.kind,
      category: rule.category,
      description: rule.description,
      amount: rule.amount,
    });
  }
  return created;
}
