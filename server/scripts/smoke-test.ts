/**
 * API smoke test script.
 * Starts the app on an ephemeral port inside this process.
 * Run with: npm run smoke
 */
import { SPREADSHEET_UNAVAILABLE, setSpreadsheetLoader } from '../../src/api/spreadsheet.js';
import { LedgerSession } from '../../src/session.js';
import { createApp } from '../src/app.js';
import { assertDeepEq, assertEq, summarize, test } from '../../src/scripts/harness.js';

async function fetchJson(url: string, options?: RequestInit): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options?.headers,
    },
  });
  return { status: response.status, body: await response.json() };
}

function field(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null) return undefined;
  return Object.entries(body).find(([k]) => k === key)?.[1];
}

async function runTests(apiBase: string): Promise<void> {
  console.log('\n=== API Smoke Tests ===\n');

  await test('GET /health returns ok:true', async () => {
    const { body } = await fetchJson(`${apiBase}/health`);
    assertDeepEq(body, { ok: true }, 'body');
  });

  await test('POST /transactions creates a transaction', async () => {
    const { status, body } = await fetchJson(`${apiBase}/transactions`, {
      method: 'POST',
      body: JSON.stringify({ kind: 'Expense', category: 'Food', amount: 30, description: 'lunch' }),
    });
    assertEq(status, 201, 'status');
    assertEq(field(body, 'description'), 'lunch', 'description');
    assertEq(field(body, 'date'), '2026-01-20T10:00:00.000Z', 'date');
  });

  await test('POST /transactions rejects a zero amount', async () => {
    const { status } = await fetchJson(`${apiBase}/transactions`, {
      method: 'POST',
      body: JSON.stringify({ kind: 'Expense', category: 'Food', amount: 0, description: 'nothing' }),
    });
    assertEq(status, 400, 'status');
  });

  await test('POST /transactions rejects a category outside the options', async () => {
    const { status } = await fetchJson(`${apiBase}/transactions`, {
      method: 'POST',
      body: JSON.stringify({ kind: 'Expense', category: 'Travel', amount: 5 }),
    });
    assertEq(status, 400, 'status');
  });

  await test('POST /transactions with malformed JSON is 400', async () => {
    const { status, body } = await fetchJson(`${apiBase}/transactions`, { method: 'POST', body: '{"kind":' });
    assertEq(status, 400, 'status');
    assertEq(typeof field(body, 'error'), 'string', 'error message');
  });

  await test('POST /transactions with a body over the JSON limit is 413', async () => {
    const { status } = await fetchJson(`${apiBase}/transactions`, {
      method: 'POST',
      body: JSON.stringify({ kind: 'Expense', category: 'Food', amount: 1, description: 'x'.repeat(200_000) }),
    });
    assertEq(status, 413, 'status');
  });

  await test('PUT /budgets/Food then GET /budgets/status reports over', async () => {
    await fetchJson(`${apiBase}/budgets/Food`, { method: 'PUT', body: JSON.stringify({ limit: 20 }) });
    const { body } = await fetchJson(`${apiBase}/budgets/status`);
    assertDeepEq(
      body,
      [
        {
          category: 'Food',
          state: 'over',
          spent: 30,
          limit: 20,
          message: 'Over budget for Food: Spent $30.00 / Limit $20.00',
        },
      ],
      'statuses',
    );
  });

  await test('POST /recurring materializes the rule once', async () => {
    const { status } = await fetchJson(`${apiBase}/recurring`, {
      method: 'POST',
      body: JSON.stringify({ kind: 'Income', category: 'Other', amount: 100, description: 'salary' }),
    });
    assertEq(status, 201, 'status');
    await fetchJson(`${apiBase}/summary`);
    const { body } = await fetchJson(`${apiBase}/transactions?search=salary`);
    assertEq(Array.isArray(body) ? body.length : -1, 1, 'one salary row');
  });

  await test('GET /summary reports the current month', async () => {
    const { body } = await fetchJson(`${apiBase}/summary`);
    assertDeepEq(
      body,
      {
        month: '2026-01',
        income: 100,
        expenses: 30,
        balance: 70,
        message: 'January 2026 – Income: $100.00 | Expenses: $30.00 | Balance: $70.00',
      },
      'summary',
    );
  });

  await test('GET /charts/balance ends at the ledger balance', async () => {
    const { body } = await fetchJson(`${apiBase}/charts/balance`);
    const points = Array.isArray(body) ? body : [];
    assertDeepEq(points.map((p) => field(p, 'balance')), [-30, 70], 'balances');
  });

  await test('PATCH /transactions/:position out of range is 404', async () => {
    const { status } = await fetchJson(`${apiBase}/transactions/9`, {
      method: 'PATCH',
      body: JSON.stringify({ kind: 'Expense', category: 'Food', amount: 1, description: 'x' }),
    });
    assertEq(status, 404, 'status');
  });

  await test('POST /import without an Amount column appends rows with null amounts', async () => {
    const response = await fetch(`${apiBase}/import?filename=upload.csv`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/csv' },
      body: 'Date,Type,Category,Description\n2025-12-05,Expense,Food,snack\n',
    });
    assertEq(response.status, 200, 'status');
    const { body } = await fetchJson(`${apiBase}/transactions?month=2025-12`);
    const rows = Array.isArray(body) ? body : [];
    assertDeepEq(rows.map((r) => [field(r, 'description'), field(r, 'amount'), field(r, 'position')]), [['snack', null, 2]], 'rows');
  });

  await test('POST /import with a broken file is 422 and reports the failure', async () => {
    const response = await fetch(`${apiBase}/import?filename=bad.csv`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/csv' },
      body: 'Date,Description\n2026-01-01,"broken\n',
    });
    assertEq(response.status, 422, 'status');
    const body: unknown = await response.json();
    assertEq(field(body, 'ok'), false, 'ok');
  });

  await test('GET /export.csv downloads the ledger', async () => {
    const response = await fetch(`${apiBase}/export.csv`);
    const text = await response.text();
    assertEq(text.split('\r\n')[0], 'Date,Type,Category,Description,Amount', 'header');
    assertEq(text.split('\r\n').length, 4, 'header plus three rows');
  });

  await test('POST /import reads the raw body even when labelled as JSON', async () => {
    const response = await fetch(`${apiBase}/import?filename=extra.csv`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: 'Description,Amount\nrefund,4\n',
    });
    assertEq(response.status, 200, 'status');
    const body: unknown = await response.json();
    assertEq(field(body, 'imported'), 1, 'imported');
  });

  await test('GET /export.xlsx is 501 when exceljs cannot be loaded', async () => {
    setSpreadsheetLoader(() => Promise.reject(new Error('Cannot find package exceljs')));
    try {
      const { status, body } = await fetchJson(`${apiBase}/export.xlsx`);
      assertEq(status, 501, 'status');
      assertEq(field(body, 'error'), SPREADSHEET_UNAVAILABLE, 'reason');
    } finally {
      setSpreadsheetLoader();
    }
  });

  await test('POST /reset empties the ledger', async () => {
    await fetchJson(`${apiBase}/reset`, { method: 'POST' });
    const { body } = await fetchJson(`${apiBase}/transactions`);
    assertDeepEq(body, [], 'transactions');
  });
}

async function main(): Promise<void> {
  const session = new LedgerSession({ now: () => new Date('2026-01-20T10:00:00.000Z') });
  const server = createApp(session).listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port');
  }
  const { port } = address;

  try {
    await runTests(`http://127.0.0.1:${port}`);
  } finally {
    server.closeAllConnections();
    server.close();
  }

  summarize();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
