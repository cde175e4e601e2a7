/**
 * SQLite database for one ledger session.
 * Always opened in memory: the ledger lives as long as the process and is
 * only kept beyond it through export.
 */
import Database from 'better-sqlite3';

export type LedgerDatabase = Database.Database;

export function openLedgerDatabase(): LedgerDatabase {
  const db = new Database(':memory:');

  // seq gives the store order; a row's position is its rank by seq
  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT UNIQUE NOT NULL,
      date TEXT,
      kind TEXT,
      category TEXT,
      description TEXT,
      amount REAL
    )
  `);

  return db;
}

let idCounter = 0;

// Helper function to generate cuid-like IDs; the counter keeps ids unique within a bulk insert
export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const count = (idCounter++).toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${count}${randomPart}`;
}

/** Row shape as stored; dates are ISO strings */
export interface DbTransaction {
  seq: number;
  id: string;
  date: string | null;
  kind: string | null;
  category: string | null;
  description: string | null;
  amount: number | null;
}
