/**
 * One user's ledger session: the store, budgets, recurring rules and
 * currency, plus every operation the UI performs on them.
 */
import { LedgerStore } from './db/repo.js';
import { generateId } from './db/database.js';
import {
  balanceSeries,
  budgetCheck,
  categoryTotals,
  currentMonth,
  filterOptions,
  filterTransactions,
  forMonth,
  monthlySummary,
  sortByDate,
} from './domain/computations.js';
import { pendingRecurring } from './domain/recurring.js';
import {
  emptyBudgets,
  type BalancePoint,
  type BudgetMap,
  type BudgetStatus,
  type Category,
  type CategoryTotal,
  type CurrencySymbol,
  type FilterOptions,
  type MonthlySummary,
  type RecurringRule,
  type Transaction,
  type TransactionEdit,
  type TransactionFilters,
} from './domain/types.js';
import type { RecurringRuleInput, TransactionEntry } from './domain/validation.js';
import { exportCsv, exportSpreadsheet, importUpload, type ImportOutcome } from './api/transfer.js';
import type { SpreadsheetExport } from './api/spreadsheet.js';

export interface SessionOptions {
  currency?: CurrencySymbol;
  now?: () => Date;
  store?: LedgerStore;
}

export class LedgerSession {
  readonly store: LedgerStore;
  readonly now: () => Date;
  currency: CurrencySymbol;
  private budgets: BudgetMap = emptyBudgets();
  private rules: RecurringRule[] = [];

  constructor(options: SessionOptions = {}) {
    this.store = options.store ?? new LedgerStore();
    this.now = options.now ?? (() => new Date());
    this.currency = options.currency ?? '$';
  }

  // --- Transactions ---

  /** Entry form submission; amount > 0 is checked by the form schema */
  addTransaction(entry: TransactionEntry): Transaction {
    return this.store.append({ date: this.now(), ...entry });
  }

  editTransaction(position: number, edit: TransactionEdit): Transaction {
    return this.store.updateAt(position, edit, this.now());
  }

  transactions(): Transaction[] {
    return this.store.all();
  }

  // --- Recurring rules ---

  addRecurringRule(input: RecurringRuleInput): RecurringRule {
    const rule: RecurringRule = { id: generateId(), ...input };
    this.rules.push(rule);
    return rule;
  }

  removeRecurringRule(id: string): boolean {
    const before = this.rules.length;
    this.rules = this.rules.filter((r) => r.id !== id);
    return this.rules.length !== before;
  }

  recurringRules(): RecurringRule[] {
    return [...this.rules];
  }

  /**
   * Make sure every rule has a transaction in the current month.
   * Rescans the whole ledger on each call.
   */
  reconcileRecurring(): Transaction[] {
    const now = this.now();
    const created = pendingRecurring(this.store.all(), this.rules, now).map((row) => this.store.append(row));
    for (const t of created) {
      console.log(`[recurring] Added "${t.description ?? ''}" (${t.category ?? ''}) for ${currentMonth(now)}`);
    }
    return created;
  }

  // --- Budgets ---

  /** A limit of zero or less clears the budget */
  setBudget(category: Category, limit: number | null): void {
    this.budgets[category] = limit !== null && limit > 0 ? limit : null;
  }

  budgetMap(): BudgetMap {
    return { ...this.budgets };
  }

  budgetStatus(): BudgetStatus[] {
    return budgetCheck(forMonth(this.store.all(), currentMonth(this.now())), this.budgets);
  }

  // --- Views ---

  summary(): MonthlySummary {
    return monthlySummary(this.store.all(), currentMonth(this.now()));
  }

  /** Filtered history, oldest first */
  history(filters: TransactionFilters = {}): Transaction[] {
    return sortByDate(filterTransactions(this.store.all(), filters));
  }

  filterOptions(): FilterOptions {
    return filterOptions(this.store.all());
  }

  categoryTotals(): CategoryTotal[] {
    return categoryTotals(this.store.all());
  }

  balanceSeries(): BalancePoint[] {
    return balanceSeries(this.store.all());
  }

  // --- Import / export ---

  importUpload(fileName: string, bytes: Uint8Array): Promise<ImportOutcome> {
    return importUpload(this.store, fileName, bytes);
  }

  exportCsv(): Buffer {
    return exportCsv(this.store.all());
  }

  exportSpreadsheet(): Promise<SpreadsheetExport> {
    return exportSpreadsheet(this.store.all());
  }

  // --- Settings ---

  setCurrency(currency: CurrencySymbol): void {
    this.currency = currency;
  }

  /** Clear the ledger, budgets and recurring rules; the currency is kept */
  reset(): void {
    this.store.replaceAll([]);
    this.budgets = emptyBudgets();
    this.rules = [];
  }
}
