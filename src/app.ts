import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { LedgerErrorKind, ValidationError, isLedgerError } from './errors';
import { formatCurrency, formatRecordLine } from './format';
import { LedgerEngine } from './ledger';
import { ApiError, ExpenseRecord, RecordFilter } from './types';
import { categoryKeyFor } from './validation';

export type Logger = Pick<Console, 'log' | 'error'>;

export interface AppOptions {
  currencySymbol?: string;
  logger?: Logger;
}

const STATUS_BY_KIND: Record<LedgerErrorKind, number> = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  parse: 422,
  io: 500,
  merge: 500
};

const TITLE_BY_KIND: Record<LedgerErrorKind, string> = {
  validation: 'Validation failed',
  not_found: 'Not found',
  conflict: 'Conflict',
  parse: 'Invalid data file',
  io: 'Could not save changes',
  merge: 'Merge failed'
};

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toFilter(query: Request['query']): RecordFilter | undefined {
  const filter: RecordFilter = {};
  const start = queryString(query.start);
  const end = queryString(query.end);
  const category = queryString(query.category);
  const owner = queryString(query.owner);
  const text = queryString(query.q);

  if (start !== undefined) filter.start = start;
  if (end !== undefined) filter.end = end;
  if (category !== undefined) filter.category = category;
  if (owner !== undefined) filter.owner = owner;
  if (text !== undefined) filter.text = text;

  return Object.keys(filter).length > 0 ? filter : undefined;
}

export function createApp(ledger: LedgerEngine, options: AppOptions = {}): Express {
  const app = express();
  const symbol = options.currencySymbol ?? '$';
  const logger = options.logger ?? console;

  // Ledger errors carry their own status; anything else is logged and reported as a 500
  function sendError(res: Response, error: unknown, fallback: string) {
    if (isLedgerError(error)) {
      if (error.kind === 'io' || error.kind === 'merge') {
        logger.error(`${fallback}:`, error.message);
      }
      const body: ApiError = {
        error: TITLE_BY_KIND[error.kind],
        code: error.kind,
        details: [error.message],
        context: error.context
      };
      return res.status(STATUS_BY_KIND[error.kind]).json(body);
    }

    logger.error(`${fallback}:`, error);
    const body: ApiError = { error: fallback };
    return res.status(500).json(body);
  }

  function describe(record: ExpenseRecord): string {
    return formatRecordLine(record, ledger.getCategories(), symbol);
  }

  app.use(cors());
  app.use(express.json({ limit: '5mb' })); // imports carry a whole export

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    next();
  });

  // POST /expenses - Create a new expense
  app.post('/expenses', (req: Request, res: Response) => {
    try {
      const id = ledger.create(req.body);
      const record = ledger.getRecord(id);
      if (!record) {
        return sendError(res, new Error(`Record ${id} missing after create`), 'Failed to create expense');
      }

      logger.log(`Created expense: ${describe(record)}`);
      return res.status(201).json(record);
    } catch (error) {
      return sendError(res, error, 'Failed to create expense');
    }
  });

  // GET /expenses - List expenses, optionally filtered (start, end, category, owner, q) and paginated
  app.get('/expenses', (req: Request, res: Response) => {
    try {
      const filter = toFilter(req.query);
      const records = filter ? ledger.filter(filter) : ledger.listAll();

      const pageNum = parseInt(String(req.query.page)) || 1;
      const limitNum = parseInt(String(req.query.limit)) || 0; // 0 = no pagination
      const data = limitNum > 0 ? records.slice((pageNum - 1) * limitNum, pageNum * limitNum) : records;

      return res.json({
        data,
        total: records.length,
        totalAmount: records.reduce((sum, record) => sum + record.amount, 0),
        page: limitNum > 0 ? pageNum : 1,
        limit: limitNum > 0 ? limitNum : records.length,
        totalPages: limitNum > 0 ? Math.ceil(records.length / limitNum) : 1
      });
    } catch (error) {
      return sendError(res, error, 'Failed to fetch expenses');
    }
  });

  // GET /expenses/:id - Fetch one expense
  app.get('/expenses/:id', (req: Request, res: Response) => {
    const record = ledger.getRecord(req.params.id);
    if (!record) {
      return res.status(404).json({ error: 'Expense not found' });
    }
    return res.json(record);
  });

  // PUT /expenses/:id - Replace an expense
  app.put('/expenses/:id', (req: Request, res: Response) => {
    try {
      const updated = ledger.update(req.params.id, req.body);
      logger.log(`Updated expense: ${describe(updated)}`);
      return res.json(updated);
    } catch (error) {
      return sendError(res, error, 'Failed to update expense');
    }
  });

  // DELETE /expenses/:id - Delete an expense
  app.delete('/expenses/:id', (req: Request, res: Response) => {
    try {
      const { id } = req.params;
      if (!ledger.delete(id)) {
        return res.status(404).json({ error: 'Expense not found' });
      }

      logger.log(`Deleted expense: ${id}`);
      return res.status(204).send();
    } catch (error) {
      return sendError(res, error, 'Failed to delete expense');
    }
  });

  // DELETE /expenses - Remove every expense
  app.delete('/expenses', (_req: Request, res: Response) => {
    try {
      const removed = ledger.clearAll();
      logger.log(`Cleared ${removed} expenses`);
      return res.json({ removed });
    } catch (error) {
      return sendError(res, error, 'Failed to clear expenses');
    }
  });

  // GET /stats - Totals, per-category breakdown and monthly trend
  app.get('/stats', (_req: Request, res: Response) => {
    const total = ledger.totalAmount();
    const summary = ledger.summaryByCategory();

    return res.json({
      total,
      formattedTotal: formatCurrency(total, symbol),
      count: ledger.listAll().length,
      categories: Object.entries(summary).map(([key, entry]) => ({ key, ...entry })),
      trend: ledger.monthlyTrend()
    });
  });

  // GET /stats/monthly/:year/:month - Summary of one calendar month
  app.get('/stats/monthly/:year/:month', (req: Request, res: Response) => {
    try {
      const summary = ledger.monthlySummary(Number(req.params.year), Number(req.params.month));
      return res.json({ ...summary, formattedTotal: formatCurrency(summary.totalAmount, symbol) });
    } catch (error) {
      return sendError(res, error, 'Failed to build monthly summary');
    }
  });

  // GET /categories - Category registry for selection controls
  app.get('/categories', (_req: Request, res: Response) => {
    const protectedKeys = ledger.getProtectedCategories();
    return res.json(
      Object.entries(ledger.getCategories()).map(([key, name]) => ({
        key,
        name,
        protected: protectedKeys.includes(key)
      }))
    );
  });

  // POST /categories - Add a category; the key is derived from the name when omitted
  app.post('/categories', (req: Request, res: Response) => {
    try {
      const { name, key } = req.body ?? {};
      const categoryKey = typeof key === 'string' ? key : typeof name === 'string' ? categoryKeyFor(name) : '';

      ledger.addCategory(categoryKey, name);
      const created = { key: categoryKey, name: ledger.getCategories()[categoryKey] };
      logger.log(`Added category: ${created.key} (${created.name})`);
      return res.status(201).json(created);
    } catch (error) {
      return sendError(res, error, 'Failed to add category');
    }
  });

  // DELETE /categories/:key - Remove an unused, unprotected category
  app.delete('/categories/:key', (req: Request, res: Response) => {
    try {
      ledger.deleteCategory(req.params.key);
      logger.log(`Deleted category: ${req.params.key}`);
      return res.status(204).send();
    } catch (error) {
      return sendError(res, error, 'Failed to delete category');
    }
  });

  // GET /owners - Owner registry
  app.get('/owners', (_req: Request, res: Response) => {
    return res.json({ enabled: ledger.isOwnerTrackingEnabled(), owners: ledger.getOwners() });
  });

  // GET /export - Export envelope with every record
  app.get('/export', (_req: Request, res: Response) => {
    return res.json(ledger.exportSnapshot());
  });

  // POST /import - Merge an uploaded export or bare id -> record mapping
  app.post('/import', (req: Request, res: Response) => {
    try {
      const document: unknown = req.body;
      if (typeof document !== 'object' || document === null || Object.keys(document).length === 0) {
        throw new ValidationError('body', 'request body must hold the records to import');
      }

      const added = ledger.mergeData(document, 'request body');
      logger.log(`Merged ${added} expenses from an upload`);
      return res.json({ added, total: ledger.listAll().length });
    } catch (error) {
      return sendError(res, error, 'Failed to import expenses');
    }
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    return res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      unsavedChanges: ledger.hasUnsavedChanges()
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    return res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if ('type' in err && err.type === 'entity.parse.failed') {
      return res.status(400).json({ error: 'Request body must be valid JSON' });
    }
    logger.error('Unhandled error:', err);
    return res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
