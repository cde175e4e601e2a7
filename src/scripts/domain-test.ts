/**
 * Domain computation tests.
 * Run with: npm run test:domain
 */
import {
  balanceSeries,
  budgetCheck,
  budgetState,
  categoryTotals,
  currentMonth,
  filterOptions,
  filterTransactions,
  forMonth,
  monthLabel,
  monthlySummary,
  sortByDate,
} from '../domain/computations.js';
import { coerceAmount, coerceDate, enforceSchema } from '../domain/schema.js';
import { pendingRecurring } from '../domain/recurring.js';
import { budgetMessage, formatMoney, summaryMessage } from '../domain/format.js';
import { emptyBudgets, type RecurringRule, type Transaction } from '../domain/types.js';
import { assertDeepEq, assertEq, summarize, test } from './harness.js';

// --- Test data factories ---

function makeTxn(overrides: Partial<Transaction> = {}): Transaction {
  return {
    id: 'test-1',
    date: new Date(2026, 0, 15, 12, 0),
    kind: 'Expense',
    category: 'Food',
    description: 'lunch',
    amount: 10,
    ...overrides,
  };
}

function makeRule(overrides: Partial<RecurringRule> = {}): RecurringRule {
  return {
    id: 'rule-1',
    kind: 'Expense',
    category: 'Bills',
    amount: 50,
    description: 'rent',
    ...overrides,
  };
}

async function main(): Promise<void> {
  console.log('\n=== Domain Computation Tests ===\n');

  // --- Schema enforcement ---

  await test('enforceSchema: maps columns by name, any order, drops extras', () => {
    const [row] = enforceSchema([
      { amount: '12.5', Category: 'Food', Type: 'Expense', Date: '2026-01-05', Description: 'lunch', Note: 'x' },
    ]);
    assertDeepEq(Object.keys(row), ['date', 'kind', 'category', 'description', 'amount'], 'field order');
    assertEq(row.date?.getTime(), new Date(2026, 0, 5).getTime(), 'date');
    assertEq(row.kind, 'Expense', 'kind');
    assertEq(row.category, 'Food', 'category');
    assertEq(row.description, 'lunch', 'description');
    assertEq(row.amount, 12.5, 'amount');
  });

  await test('enforceSchema: missing and unreadable values become null', () => {
    const [row] = enforceSchema([{ Date: 'not a date', Amount: 'abc' }]);
    assertDeepEq(row, { date: null, kind: null, category: null, description: null, amount: null }, 'row');
  });

  await test('enforceSchema: keeps category strings outside the option set', () => {
    const [row] = enforceSchema([{ Category: 'Travel', Type: 'Refund' }]);
    assertEq(row.category, 'Travel', 'category');
    assertEq(row.kind, 'Refund', 'kind');
  });

  await test('enforceSchema: is idempotent', () => {
    const once = enforceSchema([
      { Date: '2026-01-05', Type: 'Income', Category: 'Other', Description: '', Amount: '100' },
      { Date: 'garbage', Amount: 'x', Extra: 1 },
      { date: new Date(2026, 2, 1), amount: 7, description: 42 },
    ]);
    assertDeepEq(enforceSchema(once), once, 'second pass');
    assertEq(once[2].description, '42', 'numeric description stringified');
  });

  await test('coerceDate: ISO and fallback formats', () => {
    assertEq(coerceDate('2026/02/03')?.getTime(), new Date(2026, 1, 3).getTime(), 'yyyy/MM/dd');
    assertEq(coerceDate('03/15/2026')?.getTime(), new Date(2026, 2, 15).getTime(), 'MM/dd/yyyy');
    assertEq(coerceDate('2026-01-01T09:00:00.000Z')?.toISOString(), '2026-01-01T09:00:00.000Z', 'ISO with zone');
    assertEq(coerceDate('   '), null, 'blank');
    assertEq(coerceDate(new Date(Number.NaN)), null, 'invalid Date');
    assertEq(coerceDate(true), null, 'boolean');
  });

  await test('coerceAmount: numeric strings only', () => {
    assertEq(coerceAmount(' 42 '), 42, 'padded');
    assertEq(coerceAmount('1e3'), 1000, 'exponent');
    assertEq(coerceAmount('-3.25'), -3.25, 'negative');
    assertEq(coerceAmount('0x10'), null, 'hex');
    assertEq(coerceAmount('1,234'), null, 'thousands separator');
    assertEq(coerceAmount(''), null, 'empty');
    assertEq(coerceAmount(Number.NaN), null, 'NaN');
  });

  // --- Filters ---

  await test('filterTransactions: text search is case-insensitive, null never matches', () => {
    const txns = [
      makeTxn({ id: 'a', description: 'Lunch at cafe' }),
      makeTxn({ id: 'b', description: null }),
      makeTxn({ id: 'c', description: 'groceries' }),
    ];
    const found = filterTransactions(txns, { search: 'LUNCH' });
    assertDeepEq(found.map((t) => t.id), ['a'], 'matches');
  });

  await test('filterTransactions: empty category set passes everything', () => {
    const txns = [makeTxn({ id: 'a', category: 'Food' }), makeTxn({ id: 'b', category: 'Bills' })];
    assertEq(filterTransactions(txns, { categories: [] }).length, 2, 'no filter');
    assertDeepEq(filterTransactions(txns, { categories: ['Bills'] }).map((t) => t.id), ['b'], 'Bills only');
  });

  await test('filterTransactions: month filter is exact, All passes through', () => {
    const txns = [
      makeTxn({ id: 'a', date: new Date(2026, 0, 31) }),
      makeTxn({ id: 'b', date: new Date(2026, 1, 1) }),
      makeTxn({ id: 'c', date: null }),
    ];
    assertDeepEq(filterTransactions(txns, { month: '2026-02' }).map((t) => t.id), ['b'], 'February');
    assertEq(filterTransactions(txns, { month: 'All' }).length, 3, 'All');
  });

  await test('filterOptions: sorted categories and chronological months', () => {
    const txns = [
      makeTxn({ date: new Date(2026, 1, 2), category: 'Food' }),
      makeTxn({ date: new Date(2025, 11, 24), category: 'Bills' }),
      makeTxn({ date: new Date(2026, 1, 9), category: ' ' }),
      makeTxn({ date: null, category: 'Other' }),
    ];
    const options = filterOptions(txns);
    assertDeepEq(options.categories, ['Bills', 'Food', 'Other'], 'categories');
    assertDeepEq(
      options.months,
      [
        { value: 'All', label: 'All' },
        { value: '2025-12', label: 'December 2025' },
        { value: '2026-02', label: 'February 2026' },
      ],
      'months',
    );
  });

  // --- Summary ---

  const scenario = [
    makeTxn({ id: 'inc', date: new Date(2026, 0, 1, 9), kind: 'Income', category: 'Other', description: '', amount: 100 }),
    makeTxn({ id: 'exp', date: new Date(2026, 0, 2, 13), kind: 'Expense', category: 'Food', description: 'lunch', amount: 30 }),
  ];

  await test('monthlySummary: income 100, expenses 30, balance 70', () => {
    const s = monthlySummary(scenario, '2026-01');
    assertDeepEq(s, { month: '2026-01', income: 100, expenses: 30, balance: 70 }, 'summary');
    assertEq(
      summaryMessage(s, '$'),
      'January 2026 – Income: $100.00 | Expenses: $30.00 | Balance: $70.00',
      'message',
    );
  });

  await test('monthlySummary: empty period is all zero', () => {
    assertDeepEq(
      monthlySummary(scenario, '2026-02'),
      { month: '2026-02', income: 0, expenses: 0, balance: 0 },
      'summary',
    );
  });

  await test('monthlySummary: unreadable amounts are skipped', () => {
    const s = monthlySummary([...scenario, makeTxn({ id: 'x', date: new Date(2026, 0, 3), amount: null })], '2026-01');
    assertEq(s.expenses, 30, 'expenses');
    assertEq(s.balance, s.income - s.expenses, 'balance identity');
  });

  // --- Balance series ---

  await test('balanceSeries: two-row scenario gives [100, 70]', () => {
    assertDeepEq(balanceSeries(scenario).map((p) => p.balance), [100, 70], 'balances');
  });

  await test('balanceSeries: date order, ties keep insertion order, undated last', () => {
    const txns = [
      makeTxn({ id: 'a', date: new Date(2026, 0, 5), kind: 'Income', amount: 10 }),
      makeTxn({ id: 'b', date: new Date(2026, 0, 3), kind: 'Expense', amount: 4 }),
      makeTxn({ id: 'c', date: new Date(2026, 0, 5), kind: 'Expense', amount: 1 }),
      makeTxn({ id: 'd', date: null, kind: 'Income', amount: 2 }),
    ];
    const series = balanceSeries(txns);
    assertDeepEq(series.map((p) => p.id), ['b', 'a', 'c', 'd'], 'order');
    assertDeepEq(series.map((p) => p.delta), [-4, 10, -1, 2], 'deltas');
    assertDeepEq(series.map((p) => p.balance), [-4, 6, 5, 7], 'balances');
  });

  await test('balanceSeries: last point equals total income minus total expenses', () => {
    const txns = [
      ...scenario,
      makeTxn({ id: 'x', date: new Date(2025, 5, 1), kind: 'Income', amount: 250 }),
      makeTxn({ id: 'y', date: new Date(2026, 3, 1), kind: 'Expense', amount: 45 }),
    ];
    const series = balanceSeries(txns);
    assertEq(series[series.length - 1].balance, 100 + 250 - 30 - 45, 'final balance');
  });

  await test('sortByDate: does not reorder the input array', () => {
    const txns = [makeTxn({ id: 'late', date: new Date(2026, 5, 1) }), makeTxn({ id: 'early', date: new Date(2026, 0, 1) })];
    sortByDate(txns);
    assertEq(txns[0].id, 'late', 'input untouched');
  });

  // --- Budgets ---

  await test('budgetState: over only when strictly above the limit', () => {
    assertEq(budgetState(30, 20), 'over', 'above');
    assertEq(budgetState(20, 20), 'within', 'equal');
    assertEq(budgetState(5, 20), 'within', 'below');
    assertEq(budgetState(5, null), 'unset', 'null limit');
    assertEq(budgetState(5, 0), 'unset', 'zero limit');
  });

  await test('budgetCheck: Food over at 30/20, Bills within at 100/100, unset left out', () => {
    const budgets = { ...emptyBudgets(), Food: 20, Bills: 100 };
    const month = forMonth(
      [
        makeTxn({ category: 'Food', amount: 30 }),
        makeTxn({ category: 'Food', kind: 'Income', amount: 50 }),
        makeTxn({ category: 'Bills', amount: 100 }),
        makeTxn({ category: 'Transport', amount: 12 }),
        makeTxn({ category: 'Food', amount: 99, date: new Date(2025, 11, 1) }),
      ],
      '2026-01',
    );
    const statuses = budgetCheck(month, budgets);
    assertDeepEq(
      statuses,
      [
        { category: 'Food', state: 'over', spent: 30, limit: 20 },
        { category: 'Bills', state: 'within', spent: 100, limit: 100 },
      ],
      'statuses',
    );
    assertEq(budgetMessage(statuses[0], '$'), 'Over budget for Food: Spent $30.00 / Limit $20.00', 'message');
  });

  await test('budgetCheck: a month without rows reports nothing', () => {
    const budgets = { ...emptyBudgets(), Food: 20 };
    assertDeepEq(budgetCheck([], budgets), [], 'empty month');
  });

  await test('budgetCheck: a limit with no spending in a non-empty month is within', () => {
    const budgets = { ...emptyBudgets(), Food: 20 };
    const month = [makeTxn({ category: 'Bills', amount: 10 })];
    assertDeepEq(budgetCheck(month, budgets), [{ category: 'Food', state: 'within', spent: 0, limit: 20 }], 'statuses');
  });

  // --- Category totals ---

  await test('categoryTotals: expenses only, by category name, null dropped', () => {
    const totals = categoryTotals([
      makeTxn({ category: 'Transport', amount: 5 }),
      makeTxn({ category: 'Food', amount: 3 }),
      makeTxn({ category: 'Food', amount: 2 }),
      makeTxn({ category: 'Bills', kind: 'Income', amount: 100 }),
      makeTxn({ category: null, amount: 7 }),
    ]);
    assertDeepEq(
      totals,
      [
        { category: 'Food', spent: 5 },
        { category: 'Transport', spent: 5 },
      ],
      'totals',
    );
  });

  // --- Recurring ---

  const now = new Date(2026, 0, 20, 8, 30);

  await test('pendingRecurring: creates the missing rent row dated now', () => {
    const created = pendingRecurring([], [makeRule()], now);
    assertDeepEq(
      created,
      [{ date: now, kind: 'Expense', category: 'Bills', description: 'rent', amount: 50 }],
      'created',
    );
  });

  await test('pendingRecurring: a match this month suppresses, last month does not', () => {
    const thisMonth = makeTxn({ category: 'Bills', description: 'rent', date: new Date(2026, 0, 1) });
    const lastMonth = makeTxn({ category: 'Bills', description: 'rent', date: new Date(2025, 11, 1) });
    assertEq(pendingRecurring([thisMonth], [makeRule()], now).length, 0, 'this month');
    assertEq(pendingRecurring([lastMonth], [makeRule()], now).length, 1, 'last month');
  });

  await test('pendingRecurring: a different category does not count as a match', () => {
    const other = makeTxn({ category: 'Other', description: 'rent', date: new Date(2026, 0, 1) });
    assertEq(pendingRecurring([other], [makeRule()], now).length, 1, 'created');
  });

  await test('pendingRecurring: rules sharing description and category yield one row', () => {
    const rules = [makeRule({ id: 'r1', amount: 50 }), makeRule({ id: 'r2', amount: 75 })];
    const created = pendingRecurring([], rules, now);
    assertEq(created.length, 1, 'count');
    assertEq(created[0].amount, 50, 'first rule wins');
  });

  // --- Formatting ---

  await test('formatMoney: grouping, two decimals, sign after symbol', () => {
    assertEq(formatMoney(1234.5, '$'), '$1,234.50', 'positive');
    assertEq(formatMoney(-5, '€'), '€-5.00', 'negative');
    assertEq(formatMoney(0, '₦'), '₦0.00', 'zero');
  });

  await test('currentMonth and monthLabel', () => {
    assertEq(currentMonth(new Date(2026, 0, 15)), '2026-01', 'january');
    assertEq(currentMonth(new Date(2025, 11, 1)), '2025-12', 'december');
    assertEq(monthLabel('2026-01'), 'January 2026', 'label');
  });

  summarize();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
