/**
 * Repository layer: the transaction store.
 *
 * Rows are addressed by position (rank in insertion order), which is what the
 * edit form offers. Every row also carries an opaque id for keying in a UI.
 */
import { enforceSchema } from '../domain/schema.js';
import { PositionOutOfRangeError } from '../domain/errors.js';
import type { LedgerRow, RawRow, Transaction, TransactionEdit } from '../domain/types.js';
import { generateId, openLedgerDatabase, type DbTransaction, type LedgerDatabase } from './database.js';

type InsertParams = [string, string | null, string | null, string | null, string | null, number | null];

function toTransaction(row: DbTransaction): Transaction {
  return {
    id: row.id,
    date: row.date === null ? null : new Date(row.date),
    kind: row.kind,
    category: row.category,
    description: row.description,
    amount: row.amount,
  };
}

function insertParams(id: string, row: LedgerRow): InsertParams {
  return [id, row.date ? row.date.toISOString() : null, row.kind, row.category, row.description, row.amount];
}

export class LedgerStore {
  private readonly db: LedgerDatabase;

  constructor(db: LedgerDatabase = openLedgerDatabase()) {
    this.db = db;
  }

  all(): Transaction[] {
    return this.db
      .prepare<[], DbTransaction>('SELECT * FROM transactions ORDER BY seq ASC')
      .all()
      .map(toTransaction);
  }

  count(): number {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM transactions').get();
    return row ? row.total : 0;
  }

  at(position: number): Transaction | undefined {
    const row = this.rowAt(position);
    return row ? toTransaction(row) : undefined;
  }

  /** Add one row at the end. The caller is responsible for validating it. */
  append(row: LedgerRow): Transaction {
    const id = generateId();
    this.insert().run(...insertParams(id, row));
    return { id, ...row };
  }

  /**
   * Enforce the schema on an incoming table, then append all of it after the
   * existing rows in one transaction. Nothing is appended if any insert fails.
   */
  bulkAppend(table: readonly RawRow[]): Transaction[] {
    const rows = enforceSchema(table);
    const insert = this.insert();

    const insertMany = this.db.transaction((items: LedgerRow[]) =>
      items.map((row) => {
        const id = generateId();
        insert.run(...insertParams(id, row));
        return { id, ...row };
      }),
    );

    return insertMany(rows);
  }

  /** Overwrite the editable fields at `position` and stamp the date with `now` */
  updateAt(position: number, fields: TransactionEdit, now: Date): Transaction {
    const existing = this.rowAt(position);
    if (!existing) {
      throw new PositionOutOfRangeError(position, this.count());
    }

    this.db
      .prepare<[string, string, string, string, number, number]>(`
        UPDATE transactions SET date = ?, kind = ?, category = ?, description = ?, amount = ?
        WHERE seq = ?
      `)
      .run(now.toISOString(), fields.kind, fields.category, fields.description, fields.amount, existing.seq);

    return {
      id: existing.id,
      date: new Date(now.getTime()),
      kind: fields.kind,
      category: fields.category,
      description: fields.description,
      amount: fields.amount,
    };
  }

  /** Wholesale replacement, used by reset */
  replaceAll(table: readonly RawRow[]): Transaction[] {
    const rows = enforceSchema(table);
    const insert = this.insert();

    const replace = this.db.transaction((items: LedgerRow[]) => {
      this.db.prepare('DELETE FROM transactions').run();
      return items.map((row) => {
        const id = generateId();
        insert.run(...insertParams(id, row));
        return { id, ...row };
      });
    });

    return replace(rows);
  }

  close(): void {
    this.db.close();
  }

  private rowAt(position: number): DbTransaction | undefined {
    if (!Number.isInteger(position) || position < 0) return undefined;
    return this.db
      .prepare<[number], DbTransaction>('SELECT * FROM transactions ORDER BY seq ASC LIMIT 1 OFFSET ?')
      .get(position);
  }

  private insert() {
    return this.db.prepare<InsertParams>(`
      INSERT INTO transactions (id, date, kind, category, description, amount)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
  }
}
