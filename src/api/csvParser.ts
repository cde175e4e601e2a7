import Encoding from 'encoding-japanese';
import Papa from 'papaparse';
import { ImportError } from '../domain/errors.js';
import { LEDGER_COLUMNS, type LedgerRow, type RawRow } from '../domain/types.js';

/**
 * Decode file bytes to string, trying UTF-8 first, then Shift_JIS/CP932
 */
export function decodeFileContent(bytes: Uint8Array): string {
  // Try UTF-8 first
  try {
    const decoder = new TextDecoder('utf-8', { fatal: true });
    const text = decoder.decode(bytes);
    if (!text.includes('\uFFFD')) {
      return text;
    }
  } catch {
    // not valid UTF-8, fall through to Shift_JIS
  }

  const detected = Encoding.detect(bytes);
  const unicodeArray = Encoding.convert(bytes, {
    to: 'UNICODE',
    from: detected === 'UTF8' ? 'UTF8' : 'SJIS',
  });
  return Encoding.codeToString(unicodeArray);
}

// A short row keeps its missing cells empty, and a single-column file has no delimiter to detect
const TOLERATED_ERRORS = new Set(['TooFewFields', 'UndetectableDelimiter']);

/**
 * Parse CSV text with a header row into records keyed by column name.
 * Column order is free; schema enforcement maps columns by name.
 */
export function parseCsvText(text: string): RawRow[] {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
  });

  const fatal = parsed.errors.filter((e) => !TOLERATED_ERRORS.has(e.code));
  if (fatal.length > 0) {
    const first = fatal[0];
    const where = first.row === undefined ? '' : ` (row ${first.row + 1})`;
    throw new ImportError(`${first.message}${where}`);
  }

  const fields = parsed.meta.fields ?? [];
  if (fields.length === 0) {
    throw new ImportError('No columns to parse from file');
  }

  return parsed.data;
}

/**
 * Serialize rows as CSV in canonical column order. Dates are ISO-8601,
 * missing values are empty cells.
 */
export function toCsvText(rows: readonly LedgerRow[]): string {
  return Papa.unparse({
    fields: [...LEDGER_COLUMNS],
    data: rows.map((r) => [
      r.date ? r.date.toISOString() : '',
      r.kind ?? '',
      r.category ?? '',
      r.description ?? '',
      r.amount === null ? '' : String(r.amount),
    ]),
  });
}
