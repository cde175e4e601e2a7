/**
 * Import/export adapters between the store and uploaded or downloaded bytes.
 */
import type { LedgerStore } from '../db/repo.js';
import type { LedgerRow, RawRow } from '../domain/types.js';
import { decodeFileContent, parseCsvText, toCsvText } from './csvParser.js';
import { parseSpreadsheet, toSpreadsheet, type SpreadsheetExport } from './spreadsheet.js';

export type ImportOutcome =
  | { ok: true; imported: number; message: string }
  | { ok: false; message: string };

/** `.csv` is read as delimited text; anything else as a spreadsheet */
export async function parseUpload(fileName: string, bytes: Uint8Array): Promise<RawRow[]> {
  if (fileName.toLowerCase().endsWith('.csv')) {
    return parseCsvText(decodeFileContent(bytes));
  }
  return parseSpreadsheet(bytes);
}

/**
 * Parse the whole file before touching the store, then bulk append.
 * Failures come back as a message and leave the store unchanged.
 */
export async function importUpload(
  store: LedgerStore,
  fileName: string,
  bytes: Uint8Array,
): Promise<ImportOutcome> {
  try {
    const table = await parseUpload(fileName, bytes);
    const appended = store.bulkAppend(table);
    console.log(`[import] ${fileName}: ${appended.length} rows appended`);
    return { ok: true, imported: appended.length, message: 'Data Imported!' };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[import] ${fileName} rejected:`, reason);
    return { ok: false, message: `Import failed: ${reason}` };
  }
}

export function exportCsv(rows: readonly LedgerRow[]): Buffer {
  return Buffer.from(toCsvText(rows), 'utf-8');
}

export function exportSpreadsheet(rows: readonly LedgerRow[]): Promise<SpreadsheetExport> {
  return toSpreadsheet(rows);
}
