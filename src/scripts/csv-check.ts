/**
 * Import/export verification script.
 * Covers CSV and XLSX in both directions, plus the failure paths.
 * Run with: npm run csvcheck
 */
import Encoding from 'encoding-japanese';
import { decodeFileContent, parseCsvText, toCsvText } from '../api/csvParser.js';
import { SPREADSHEET_UNAVAILABLE, setSpreadsheetLoader, toSheetDate } from '../api/spreadsheet.js';
import { parseUpload } from '../api/transfer.js';
import { monthKeyOf } from '../domain/computations.js';
import { LedgerSession } from '../session.js';
import { assertDeepEq, assertEq, summarize, test } from './harness.js';

function bytesOf(text: string): Buffer {
  return Buffer.from(text, 'utf-8');
}

function newSession(): LedgerSession {
  return new LedgerSession({ now: () => new Date(2026, 0, 20, 10, 0) });
}

async function main(): Promise<void> {
  console.log('\n=== Import / Export Checks ===\n');

  // --- Decoding ---

  await test('decodeFileContent: strips a UTF-8 BOM', () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...bytesOf('Date,Amount')]);
    assertEq(decodeFileContent(bytes), 'Date,Amount', 'text');
  });

  await test('decodeFileContent: falls back to Shift_JIS', () => {
    const text = 'Date,Category,Description\n2026-01-05,Food,食費の支払い\n';
    const sjis = Encoding.convert(Encoding.stringToCode(text), { to: 'SJIS', from: 'UNICODE' });
    assertEq(decodeFileContent(new Uint8Array(sjis)), text, 'text');
  });

  // --- CSV parsing ---

  await test('parseCsvText: header row keys each record', () => {
    const rows = parseCsvText('Type,Amount,Date\nIncome,100,2026-01-01\n\nExpense,30,2026-01-02\n');
    assertDeepEq(
      rows,
      [
        { Type: 'Income', Amount: '100', Date: '2026-01-01' },
        { Type: 'Expense', Amount: '30', Date: '2026-01-02' },
      ],
      'rows',
    );
  });

  await test('parseCsvText: short rows are tolerated', () => {
    const rows = parseCsvText('Date,Description,Amount\n2026-01-01,coffee\n');
    assertEq(rows.length, 1, 'count');
    assertEq(rows[0].Description, 'coffee', 'description');
  });

  await test('parseCsvText: an unterminated quote is an error', () => {
    let message = '';
    try {
      parseCsvText('Date,Description\n2026-01-01,"broken\n');
    } catch (error) {
      message = error instanceof Error ? error.name : String(error);
    }
    assertEq(message, 'ImportError', 'error type');
  });

  // --- CSV export ---

  await test('toCsvText: canonical header, ISO dates, empty cells for nulls', () => {
    const text = toCsvText([
      { date: new Date('2026-01-01T09:00:00.000Z'), kind: 'Income', category: 'Other', description: '', amount: 100 },
      { date: null, kind: 'Expense', category: 'Food', description: 'lunch, with tip', amount: null },
    ]);
    assertEq(
      text,
      'Date,Type,Category,Description,Amount\r\n' +
        '2026-01-01T09:00:00.000Z,Income,Other,,100\r\n' +
        ',Expense,Food,"lunch, with tip",',
      'csv',
    );
  });

  // --- Import through the session ---

  await test('import: file without an Amount column gives null amounts, no exception', async () => {
    const session = newSession();
    const outcome = await session.importUpload(
      'budget.csv',
      bytesOf('Date,Type,Category,Description\n2026-01-05,Expense,Food,lunch\n2026-01-06,Income,Other,salary\n'),
    );
    assertDeepEq(outcome, { ok: true, imported: 2, message: 'Data Imported!' }, 'outcome');
    assertDeepEq(session.transactions().map((t) => t.amount), [null, null], 'amounts');
    assertDeepEq(session.transactions().map((t) => t.description), ['lunch', 'salary'], 'descriptions');
  });

  await test('import: rows are appended after existing ones', async () => {
    const session = newSession();
    session.addTransaction({ kind: 'Income', category: 'Other', amount: 5, description: 'existing' });
    await session.importUpload('more.CSV', bytesOf('Description,Amount\nimported,2\n'));
    assertDeepEq(session.transactions().map((t) => t.description), ['existing', 'imported'], 'order');
  });

  await test('import: a parse failure is reported and leaves the store unchanged', async () => {
    const session = newSession();
    session.addTransaction({ kind: 'Expense', category: 'Food', amount: 3, description: 'kept' });
    const outcome = await session.importUpload('bad.csv', bytesOf('Date,Description\n2026-01-01,"broken\n'));
    assertEq(outcome.ok, false, 'ok');
    assertEq(outcome.message.startsWith('Import failed: '), true, 'message prefix');
    assertEq(session.transactions().length, 1, 'count');
  });

  await test('import: a non-csv name that is not a workbook fails softly', async () => {
    const session = newSession();
    const outcome = await session.importUpload('notes.txt', bytesOf('Date,Amount\n2026-01-01,1\n'));
    assertEq(outcome.ok, false, 'ok');
    assertEq(session.transactions().length, 0, 'count');
  });

  await test('CSV export then import reproduces the ledger', async () => {
    const source = newSession();
    source.addTransaction({ kind: 'Income', category: 'Other', amount: 100, description: 'pay' });
    source.addTransaction({ kind: 'Expense', category: 'Food', amount: 30.5, description: 'groceries, weekly' });

    const target = newSession();
    const outcome = await target.importUpload('budget.csv', source.exportCsv());
    assertEq(outcome.ok, true, 'imported');

    const strip = (s: LedgerSession) => s.transactions().map(({ id: _id, ...row }) => row);
    assertDeepEq(strip(target), strip(source), 'rows');
  });

  // --- Spreadsheet ---

  await test('XLSX export then import reproduces the ledger', async () => {
    const source = newSession();
    source.addTransaction({ kind: 'Income', category: 'Other', amount: 100, description: 'pay' });
    source.addTransaction({ kind: 'Expense', category: 'Bills', amount: 42.25, description: 'power' });

    const exported = await source.exportSpreadsheet();
    if (!exported.available) throw new Error(`export unavailable: ${exported.reason}`);

    const rows = await parseUpload('budget.xlsx', exported.bytes);
    assertDeepEq(Object.keys(rows[0]), ['Date', 'Type', 'Category', 'Description', 'Amount'], 'header');

    const target = newSession();
    const outcome = await target.importUpload('budget.xlsx', exported.bytes);
    assertEq(outcome.ok, true, 'imported');

    const [pay, power] = target.transactions();
    assertEq(pay.kind, 'Income', 'kind');
    assertEq(pay.amount, 100, 'amount');
    assertEq(power.category, 'Bills', 'category');
    assertEq(power.description, 'power', 'description');
    assertEq(power.amount, 42.25, 'amount');
    assertEq(monthKeyOf(power.date), '2026-01', 'month');
    assertEq(power.date?.getDate(), 20, 'day');
    assertEq(power.date?.getHours(), 10, 'local hour');
    assertEq(power.date?.getMinutes(), 0, 'minutes');
  });

  await test('toSheetDate: cells carry the local wall-clock time', () => {
    const cell = toSheetDate(new Date(2026, 0, 5, 9, 30, 15));
    assertDeepEq(
      [cell.getUTCFullYear(), cell.getUTCMonth(), cell.getUTCDate(), cell.getUTCHours(), cell.getUTCMinutes(), cell.getUTCSeconds()],
      [2026, 0, 5, 9, 30, 15],
      'utc fields',
    );
  });

  await test('without exceljs, export is unavailable and xlsx import fails softly', async () => {
    setSpreadsheetLoader(() => Promise.reject(new Error('Cannot find package exceljs')));
    try {
      const session = newSession();
      session.addTransaction({ kind: 'Expense', category: 'Food', amount: 3, description: 'kept' });

      assertDeepEq(await session.exportSpreadsheet(), { available: false, reason: SPREADSHEET_UNAVAILABLE }, 'export');

      const outcome = await session.importUpload('budget.xlsx', bytesOf('not a workbook'));
      assertDeepEq(
        outcome,
        { ok: false, message: 'Import failed: Reading Excel files needs the optional exceljs package' },
        'import',
      );
      assertEq(session.transactions().length, 1, 'store unchanged');
    } finally {
      setSpreadsheetLoader();
    }
  });

  summarize();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
