import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { ZodError } from 'zod';
import type { LedgerSession } from '../../src/session.js';
import { PositionOutOfRangeError } from '../../src/domain/errors.js';
import { budgetMessage, summaryMessage } from '../../src/domain/format.js';
import {
  budgetLimitSchema,
  categorySchema,
  historyQuerySchema,
  importQuerySchema,
  positionSchema,
  recurringRuleInputSchema,
  settingsSchema,
  transactionEditSchema,
  transactionEntrySchema,
} from '../../src/domain/validation.js';
import type { Transaction } from '../../src/domain/types.js';

export interface AppOptions {
  uploadLimit?: string;
}

function badRequest(res: Response, error: ZodError): void {
  res.status(400).json({ error: 'Invalid request', issues: error.issues });
}

/** 4xx status carried by body-parser errors (malformed JSON, oversized body) */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/** Attach each row's current store position, which is what edits address */
function withPositions(session: LedgerSession, rows: Transaction[]): Array<Transaction & { position: number }> {
  const positions = new Map(session.transactions().map((t, index) => [t.id, index]));
  return rows.map((t) => ({ ...t, position: positions.get(t.id) ?? -1 }));
}

export function createApp(session: LedgerSession, options: AppOptions = {}) {
  const app = express();

  app.use(cors());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // Recurring rules are reconciled on every interaction
  app.use((_req, _res, next) => {
    try {
      session.reconcileRecurring();
      next();
    } catch (error) {
      next(error);
    }
  });

  // POST /import?filename=budget.csv - raw file body whatever its Content-Type,
  // so this route sits before the JSON parser
  app.post(
    '/import',
    express.raw({ type: () => true, limit: options.uploadLimit ?? '10mb' }),
    async (req, res, next: NextFunction) => {
      const query = importQuerySchema.safeParse(req.query);
      if (!query.success) {
        badRequest(res, query.error);
        return;
      }
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        res.status(400).json({ error: 'Upload body is empty' });
        return;
      }
      try {
        const outcome = await session.importUpload(query.data.filename, body);
        res.status(outcome.ok ? 200 : 422).json(outcome);
      } catch (error) {
        next(error);
      }
    },
  );

  app.use(express.json());

  // --- Transactions ---

  // GET /transactions?search=&category=&month=YYYY-MM|All
  app.get('/transactions', (req, res) => {
    const query = historyQuerySchema.safeParse(req.query);
    if (!query.success) {
      badRequest(res, query.error);
      return;
    }
    try {
      const rows = session.history({
        search: query.data.search,
        categories: query.data.category,
        month: query.data.month,
      });
      res.json(withPositions(session, rows));
    } catch (error) {
      console.error('[api] Error fetching transactions:', error);
      res.status(500).json({ error: 'Failed to fetch transactions' });
    }
  });

  // POST /transactions - Entry form
  app.post('/transactions', (req, res) => {
    const entry = transactionEntrySchema.safeParse(req.body);
    if (!entry.success) {
      badRequest(res, entry.error);
      return;
    }
    try {
      const created = session.addTransaction(entry.data);
      res.status(201).json(created);
    } catch (error) {
      console.error('[api] Error creating transaction:', error);
      res.status(500).json({ error: 'Failed to create transaction' });
    }
  });

  // PATCH /transactions/:position - Edit form; the date is re-stamped
  app.patch('/transactions/:position', (req, res) => {
    const position = positionSchema.safeParse(req.params.position);
    const edit = transactionEditSchema.safeParse(req.body);
    if (!position.success) {
      badRequest(res, position.error);
      return;
    }
    if (!edit.success) {
      badRequest(res, edit.error);
      return;
    }
    try {
      res.json(session.editTransaction(position.data, edit.data));
    } catch (error) {
      if (error instanceof PositionOutOfRangeError) {
        res.status(404).json({ error: error.message });
        return;
      }
      console.error('[api] Error updating transaction:', error);
      res.status(500).json({ error: 'Failed to update transaction' });
    }
  });

  app.get('/filters', (_req, res) => {
    res.json(session.filterOptions());
  });

  // --- Summary & budgets ---

  app.get('/summary', (_req, res) => {
    const summary = session.summary();
    res.json({ ...summary, message: summaryMessage(summary, session.currency) });
  });

  app.get('/budgets', (_req, res) => {
    res.json(session.budgetMap());
  });

  app.get('/budgets/status', (_req, res) => {
    const statuses = session.budgetStatus();
    res.json(statuses.map((s) => ({ ...s, message: budgetMessage(s, session.currency) })));
  });

  // PUT /budgets/:category - zero or null clears the limit
  app.put('/budgets/:category', (req, res) => {
    const category = categorySchema.safeParse(req.params.category);
    const body = budgetLimitSchema.safeParse(req.body);
    if (!category.success) {
      badRequest(res, category.error);
      return;
    }
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    session.setBudget(category.data, body.data.limit);
    res.json(session.budgetMap());
  });

  // --- Recurring ---

  app.get('/recurring', (_req, res) => {
    res.json(session.recurringRules());
  });

  app.post('/recurring', (req, res) => {
    const input = recurringRuleInputSchema.safeParse(req.body);
    if (!input.success) {
      badRequest(res, input.error);
      return;
    }
    const rule = session.addRecurringRule(input.data);
    // Apply the new rule right away
    session.reconcileRecurring();
    res.status(201).json(rule);
  });

  app.delete('/recurring/:id', (req, res) => {
    if (!session.removeRecurringRule(req.params.id)) {
      res.status(404).json({ error: 'Recurring rule not found' });
      return;
    }
    res.json({ ok: true });
  });

  // --- Charts ---

  app.get('/charts/categories', (_req, res) => {
    res.json(session.categoryTotals());
  });

  app.get('/charts/balance', (_req, res) => {
    res.json(session.balanceSeries());
  });

  // --- Import / export ---

  app.get('/export.csv', (_req, res) => {
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', 'attachment; filename="budget.csv"');
    res.send(session.exportCsv());
  });

  app.get('/export.xlsx', async (_req, res, next: NextFunction) => {
    try {
      const result = await session.exportSpreadsheet();
      if (!result.available) {
        res.status(501).json({ error: result.reason });
        return;
      }
      res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
      res.setHeader('Content-Disposition', 'attachment; filename="budget.xlsx"');
      res.send(result.bytes);
    } catch (error) {
      next(error);
    }
  });

  // --- Settings ---

  app.get('/settings', (_req, res) => {
    res.json({ currency: session.currency });
  });

  app.put('/settings', (req, res) => {
    const body = settingsSchema.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    session.setCurrency(body.data.currency);
    res.json({ currency: session.currency });
  });

  app.post('/reset', (_req, res) => {
    session.reset();
    res.json({ ok: true });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(error);
    if (status !== undefined) {
      res.status(status).json({ error: error instanceof Error ? error.message : 'Bad request' });
      return;
    }
    console.error('[api] Unhandled error:', error);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
