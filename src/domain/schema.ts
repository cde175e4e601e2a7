/**
 * Ledger schema enforcement.
 * Coerces any tabular input to the five ledger fields. Values that cannot be
 * read become null; nothing here throws.
 */
import { isValid, parse, parseISO } from 'date-fns';
import type { LedgerRow, RawRow } from './types.js';

type LedgerField = keyof LedgerRow;

const LEDGER_FIELDS: readonly LedgerField[] = ['date', 'kind', 'category', 'description', 'amount'];

/** Accepted column names per field, lower-cased */
const COLUMN_ALIASES: Record<LedgerField, readonly string[]> = {
  date: ['date'],
  kind: ['type', 'kind'],
  category: ['category'],
  description: ['description'],
  amount: ['amount'],
};

const FALLBACK_DATE_FORMATS = ['yyyy/MM/dd', 'MM/dd/yyyy', 'dd.MM.yyyy'];

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function coerceDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? new Date(value.getTime()) : null;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const d = new Date(value);
    return isValid(d) ? d : null;
  }
  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (text === '') return null;

  const iso = parseISO(text);
  if (isValid(iso)) return iso;

  const reference = new Date(2000, 0, 1);
  for (const fmt of FALLBACK_DATE_FORMATS) {
    const d = parse(text, fmt, reference);
    if (isValid(d)) return d;
  }
  return null;
}

export function coerceAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (!NUMERIC_PATTERN.test(text)) return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

export function coerceText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return isValid(value) ? value.toISOString() : null;
  return null;
}

/** Map each ledger field to the key it is read from in this row, if any */
function resolveColumns(row: RawRow): Partial<Record<LedgerField, string>> {
  const resolved: Partial<Record<LedgerField, string>> = {};
  for (const key of Object.keys(row)) {
    const normalized = key.trim().toLowerCase();
    for (const field of LEDGER_FIELDS) {
      if (resolved[field] === undefined && COLUMN_ALIASES[field].includes(normalized)) {
        resolved[field] = key;
      }
    }
  }
  return resolved;
}

function read(row: RawRow, key: string | undefined): unknown {
  return key === undefined ? undefined : row[key];
}

export function enforceRow(row: RawRow): LedgerRow {
  const cols = resolveColumns(row);
  return {
    date: coerceDate(read(row, cols.date)),
    kind: coerceText(read(row, cols.kind)),
    category: coerceText(read(row, cols.category)),
    description: coerceText(read(row, cols.description)),
    amount: coerceAmount(read(row, cols.amount)),
  };
}

/**
 * Produce a table with exactly the ledger fields, in canonical order.
 * Missing columns come out as null, extra columns are dropped.
 * Applying it to its own output returns an equal table.
 */
export function enforceSchema(table: readonly RawRow[]): LedgerRow[] {
  return table.map(enforceRow);
}
