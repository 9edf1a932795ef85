import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import type { Logger } from '../log.js';
import type { CreditStore } from '../loans/store.js';
import {
  checkEligibility,
  createLoan,
  registerCustomer,
  viewLoan,
  viewLoans,
  type ServiceContext,
} from '../loans/service.js';
import { ValidationError, normalizeError, toErrorResponse } from '../utils/errors.js';

const API_PREFIX = '/api';

export type AppDeps = {
  store: CreditStore;
  log: Logger;
  now?: () => Date;
};

// Handlers are synchronous today; the wrapper keeps a thrown error on the
// error middleware path either way.
function route(fn: (req: Request, res: Response) => void | Promise<void>): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch(next);
  };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp(deps: AppDeps): express.Express {
  const ctx: ServiceContext = { store: deps.store, log: deps.log, now: deps.now };
  const log = deps.log;
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '100kb' }));

  app.use((req, res, next) => {
    const started = Date.now();
    res.on('finish', () => {
      log.info({ msg: 'http_request', method: req.method, path: req.baseUrl + req.path, status: res.statusCode, ms: Date.now() - started });
    });
    next();
  });

  const api = express.Router();

  // ── Customers ───────────────────────────────────────────
  api.post('/register', route((req, res) => {
    res.status(201).json(registerCustomer(ctx, req.body));
  }));

  // ── Loans ───────────────────────────────────────────────
  api.post('/check-eligibility', route((req, res) => {
    res.json(checkEligibility(ctx, req.body));
  }));

  api.post('/create-loan', route((req, res) => {
    const out = createLoan(ctx, req.body);
    res.status(out.loan_approved ? 201 : 200).json(out);
  }));

  api.get('/view-loan/:loan_id', route((req, res) => {
    res.json(viewLoan(ctx, req.params.loan_id));
  }));

  api.get('/view-loans/:customer_id', route((req, res) => {
    res.json(viewLoans(ctx, req.params.customer_id));
  }));

  app.use(API_PREFIX, api);

  // ── Health ──────────────────────────────────────────────
  app.get('/health', (_req, res) => {
    res.json({ ok: true, service: 'credit-desk' });
  });

  app.use((req, res) => {
    res.status(404).json({ error: 'not_found', message: `No route for ${req.method} ${req.path}` });
  });

  // Express recognises error middleware by its four parameters.
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const mapped = toErrorResponse(isBodyParseError(err) ? new ValidationError('Request body is not valid JSON') : err);
    if (mapped.status >= 500) {
      const e = normalizeError(err);
      log.error({ msg: 'http_error', errorId: mapped.body.error_id, method: req.method, path: req.path, name: e.name, message: e.message, stack: e.stack.split('\n').slice(0, 10) });
    } else {
      log.warn({ msg: 'http_rejected', method: req.method, path: req.path, status: mapped.status, error: mapped.body.error });
    }
    res.status(mapped.status).json(mapped.body);
  });

  return app;
}
