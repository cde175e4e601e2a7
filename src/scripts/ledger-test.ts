/**
 * Transaction store and session tests.
 * Run with: npm run test:ledger
 */
import { LedgerStore } from '../db/repo.js';
import { LedgerSession } from '../session.js';
import type { TransactionEdit } from '../domain/types.js';
import { assertDeepEq, assertEq, assertThrows, summarize, test } from './harness.js';

const edit: TransactionEdit = { kind: 'Income', category: 'Other', description: 'refund', amount: 0 };

async function main(): Promise<void> {
  console.log('\n=== Ledger Tests ===\n');

  // --- Store ---

  await test('append keeps insertion order and assigns distinct ids', () => {
    const store = new LedgerStore();
    const a = store.append({ date: new Date(2026, 0, 2), kind: 'Expense', category: 'Food', description: 'a', amount: 1 });
    const b = store.append({ date: new Date(2026, 0, 1), kind: 'Expense', category: 'Food', description: 'b', amount: 2 });
    assertDeepEq(store.all().map((t) => t.description), ['a', 'b'], 'order');
    assertEq(store.count(), 2, 'count');
    assertEq(a.id === b.id, false, 'distinct ids');
  });

  await test('rows round-trip through the store, nulls included', () => {
    const store = new LedgerStore();
    const date = new Date(2026, 0, 2, 13, 45, 10, 250);
    store.append({ date, kind: 'Expense', category: 'Food', description: 'lunch', amount: 12.75 });
    store.append({ date: null, kind: null, category: null, description: null, amount: null });
    const [first, second] = store.all();
    assertEq(first.date?.getTime(), date.getTime(), 'date');
    assertEq(first.amount, 12.75, 'amount');
    assertDeepEq(
      { ...second, id: 'x' },
      { id: 'x', date: null, kind: null, category: null, description: null, amount: null },
      'null row',
    );
  });

  await test('bulkAppend enforces the schema and appends after existing rows', () => {
    const store = new LedgerStore();
    store.append({ date: new Date(2026, 0, 1), kind: 'Income', category: 'Other', description: 'first', amount: 5 });
    const added = store.bulkAppend([
      { Description: 'second', Amount: '7', Extra: 'dropped' },
      { Description: 'third', Date: 'nope' },
    ]);
    assertEq(added.length, 2, 'returned');
    assertDeepEq(store.all().map((t) => t.description), ['first', 'second', 'third'], 'order');
    assertEq(store.at(1)?.amount, 7, 'coerced amount');
    assertEq(store.at(2)?.date, null, 'unreadable date');
  });

  await test('updateAt overwrites fields, stamps the date, keeps count and id', () => {
    const store = new LedgerStore();
    store.append({ date: new Date(2025, 5, 1), kind: 'Expense', category: 'Food', description: 'old', amount: 9 });
    const before = store.at(0);
    const stamp = new Date(2026, 0, 20, 10);
    const updated = store.updateAt(0, edit, stamp);
    assertEq(store.count(), 1, 'count');
    assertEq(updated.id, before?.id, 'id');
    const row = store.at(0);
    assertEq(row?.date?.getTime(), stamp.getTime(), 'date stamped');
    assertEq(row?.kind, 'Income', 'kind');
    assertEq(row?.category, 'Other', 'category');
    assertEq(row?.description, 'refund', 'description');
    assertEq(row?.amount, 0, 'amount');
  });

  await test('updateAt rejects positions outside the store', () => {
    const store = new LedgerStore();
    assertThrows(() => store.updateAt(0, edit, new Date()), 'PositionOutOfRangeError', 'empty store');
    store.append({ date: new Date(), kind: 'Expense', category: 'Food', description: 'x', amount: 1 });
    assertThrows(() => store.updateAt(1, edit, new Date()), 'PositionOutOfRangeError', 'past the end');
    assertThrows(() => store.updateAt(-1, edit, new Date()), 'PositionOutOfRangeError', 'negative');
    assertThrows(() => store.updateAt(0.5, edit, new Date()), 'PositionOutOfRangeError', 'fractional');
    assertEq(store.at(0)?.description, 'x', 'untouched');
  });

  await test('replaceAll swaps the whole content and positions restart', () => {
    const store = new LedgerStore();
    store.append({ date: new Date(), kind: 'Expense', category: 'Food', description: 'gone', amount: 1 });
    store.replaceAll([{ Description: 'fresh', Amount: 3 }]);
    assertEq(store.count(), 1, 'count');
    assertEq(store.at(0)?.description, 'fresh', 'first row');
    store.replaceAll([]);
    assertEq(store.count(), 0, 'emptied');
  });

  // --- Session ---

  await test('budgetStatus is empty while the month has no rows', () => {
    const fresh = new LedgerSession({ now: () => new Date(2026, 0, 20, 10, 0) });
    fresh.setBudget('Food', 20);
    assertDeepEq(fresh.budgetStatus(), [], 'statuses');
  });

  let clock = new Date(2026, 0, 20, 10, 0);
  const session = new LedgerSession({ now: () => clock });

  await test('recurring rent rule is added once per month', () => {
    session.addRecurringRule({ kind: 'Expense', category: 'Bills', amount: 50, description: 'rent' });
    const created = session.reconcileRecurring();
    assertEq(created.length, 1, 'first pass');
    const [rent] = session.transactions();
    assertEq(rent.date?.getTime(), clock.getTime(), 'dated now');
    assertEq(rent.kind, 'Expense', 'kind');
    assertEq(rent.category, 'Bills', 'category');
    assertEq(rent.amount, 50, 'amount');
    assertEq(rent.description, 'rent', 'description');

    assertEq(session.reconcileRecurring().length, 0, 'second pass');
    assertEq(session.transactions().length, 1, 'still one row');
  });

  await test('recurring rule fires again in the next month', () => {
    clock = new Date(2026, 1, 3, 9, 0);
    assertEq(session.reconcileRecurring().length, 1, 'february');
    assertEq(session.transactions().length, 2, 'two rows');
  });

  await test('removed rules stop reconciling', () => {
    const [rule] = session.recurringRules();
    assertEq(session.removeRecurringRule(rule.id), true, 'removed');
    assertEq(session.removeRecurringRule(rule.id), false, 'already gone');
    clock = new Date(2026, 2, 1, 9, 0);
    assertEq(session.reconcileRecurring().length, 0, 'march');
  });

  await test('budget over limit in the current month', () => {
    session.setBudget('Food', 20);
    session.addTransaction({ kind: 'Expense', category: 'Food', amount: 30, description: 'dinner' });
    assertDeepEq(session.budgetStatus(), [{ category: 'Food', state: 'over', spent: 30, limit: 20 }], 'status');
  });

  await test('a zero budget clears the limit', () => {
    session.setBudget('Food', 0);
    assertEq(session.budgetMap().Food, null, 'cleared');
    assertDeepEq(session.budgetStatus(), [], 'no statuses');
  });

  await test('summary balance equals income minus expenses', () => {
    session.addTransaction({ kind: 'Income', category: 'Other', amount: 120, description: 'salary' });
    const s = session.summary();
    assertEq(s.month, '2026-03', 'month');
    assertEq(s.income, 120, 'income');
    assertEq(s.expenses, 30, 'expenses');
    assertEq(s.balance, s.income - s.expenses, 'balance');
  });

  await test('editTransaction keeps the row count and re-stamps the date', () => {
    const count = session.transactions().length;
    clock = new Date(2026, 2, 2, 18, 0);
    const updated = session.editTransaction(0, edit);
    assertEq(session.transactions().length, count, 'count');
    assertEq(updated.date?.getTime(), clock.getTime(), 'date');
    assertEq(session.transactions()[0].description, 'refund', 'stored');
  });

  await test('history filters and sorts by date', () => {
    const rows = session.history({ month: '2026-03' });
    assertDeepEq(rows.map((t) => t.description), ['dinner', 'salary', 'refund'], 'march rows');
    assertDeepEq(session.history({ search: 'RENT' }).map((t) => t.description), ['rent'], 'search');
  });

  await test('balance series ends at total income minus total expenses', () => {
    const series = session.balanceSeries();
    // refund 0 (Income), rent 50, dinner 30, salary 120
    assertEq(series[series.length - 1].balance, 0 + 120 - 50 - 30, 'final');
  });

  await test('reset clears ledger, budgets and rules but keeps currency', () => {
    session.setCurrency('€');
    session.setBudget('Bills', 80);
    session.addRecurringRule({ kind: 'Income', category: 'Other', amount: 10, description: 'allowance' });
    session.reset();
    assertEq(session.transactions().length, 0, 'ledger');
    assertEq(session.budgetMap().Bills, null, 'budgets');
    assertEq(session.recurringRules().length, 0, 'rules');
    assertEq(session.currency, '€', 'currency');
  });

  summarize();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
