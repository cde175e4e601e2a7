/**
 * XLSX reading and writing through exceljs.
 *
 * exceljs is an optional dependency. When it cannot be loaded, export reports
 * itself unavailable and import fails with an ImportError, which the import
 * path turns into a message.
 */
import type { CellValue, Worksheet } from 'exceljs';
import { ImportError } from '../domain/errors.js';
import { coerceText } from '../domain/schema.js';
import { LEDGER_COLUMNS, type LedgerRow, type RawRow } from '../domain/types.js';

type ExcelModule = typeof import('exceljs');

export type SpreadsheetLoader = () => Promise<ExcelModule>;

const importExceljs: SpreadsheetLoader = () => import('exceljs').then((mod) => mod.default);

let loader: SpreadsheetLoader = importExceljs;
let excelModule: Promise<ExcelModule | null> | undefined;

/** Swap how exceljs is obtained; called without arguments it restores the real import */
export function setSpreadsheetLoader(next: SpreadsheetLoader = importExceljs): void {
  loader = next;
  excelModule = undefined;
}

export function loadSpreadsheetEncoder(): Promise<ExcelModule | null> {
  excelModule ??= loader().catch((error: unknown) => {
    console.warn('[export] exceljs could not be loaded:', error);
    return null;
  });
  return excelModule;
}

/**
 * Spreadsheet cells hold wall-clock time with no zone, and exceljs reads and
 * writes them through the UTC fields of a Date. Local fields map onto those.
 */
export function toSheetDate(date: Date): Date {
  return new Date(
    Date.UTC(
      date.getFullYear(),
      date.getMonth(),
      date.getDate(),
      date.getHours(),
      date.getMinutes(),
      date.getSeconds(),
      date.getMilliseconds(),
    ),
  );
}

export function fromSheetDate(cell: Date): Date {
  return new Date(
    cell.getUTCFullYear(),
    cell.getUTCMonth(),
    cell.getUTCDate(),
    cell.getUTCHours(),
    cell.getUTCMinutes(),
    cell.getUTCSeconds(),
    cell.getUTCMilliseconds(),
  );
}

export type SpreadsheetExport =
  | { available: true; bytes: Buffer }
  | { available: false; reason: string };

export const SPREADSHEET_UNAVAILABLE =
  'Excel export needs the optional exceljs package: npm install exceljs';

export async function toSpreadsheet(rows: readonly LedgerRow[]): Promise<SpreadsheetExport> {
  const Excel = await loadSpreadsheetEncoder();
  if (!Excel) {
    return { available: false, reason: SPREADSHEET_UNAVAILABLE };
  }

  try {
    const workbook = new Excel.Workbook();
    const sheet = workbook.addWorksheet('Transactions');
    sheet.addRow([...LEDGER_COLUMNS]);
    for (const r of rows) {
      sheet.addRow([r.date && toSheetDate(r.date), r.kind, r.category, r.description, r.amount]);
    }
    sheet.getColumn(1).numFmt = 'yyyy-mm-dd hh:mm:ss';

    const written = await workbook.xlsx.writeBuffer();
    return { available: true, bytes: Buffer.from(written) };
  } catch (error) {
    console.error('[export] Failed to write spreadsheet:', error);
    return {
      available: false,
      reason: error instanceof Error ? error.message : 'Spreadsheet export failed',
    };
  }
}

function cellValue(value: CellValue): unknown {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return fromSheetDate(value);
  if (typeof value !== 'object') return value;
  if ('result' in value) return value.result === undefined ? null : cellValue(value.result);
  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('text' in value) return value.text;
  return null;
}

function readSheet(sheet: Worksheet): RawRow[] {
  const headers = new Map<number, string>();
  sheet.getRow(1).eachCell((cell, col) => {
    const name = coerceText(cellValue(cell.value));
    if (name !== null && name.trim() !== '') headers.set(col, name);
  });
  if (headers.size === 0) {
    throw new ImportError('No columns to parse from file');
  }

  const rows: RawRow[] = [];
  sheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) return;
    const record: RawRow = {};
    for (const [col, name] of headers) {
      record[name] = cellValue(row.getCell(col).value);
    }
    rows.push(record);
  });
  return rows;
}

/** Read the first worksheet; row 1 is the header */
export async function parseSpreadsheet(bytes: Uint8Array): Promise<RawRow[]> {
  const Excel = await loadSpreadsheetEncoder();
  if (!Excel) {
    throw new ImportError('Reading Excel files needs the optional exceljs package');
  }

  const data = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(data).set(bytes);

  const workbook = new Excel.Workbook();
  await workbook.xlsx.load(data);

  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new ImportError('Workbook has no worksheets');
  }
  return readSheet(sheet);
}
