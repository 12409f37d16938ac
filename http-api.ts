/**
 * Retention HTTP REST API
 *
 * Endpoints:
 *   GET  /api/health               - Health check
 *   GET  /api/concepts             - All concepts, insertion order
 *   POST /api/concepts             - Add a concept
 *   GET  /api/stats                - Aggregate stats (refreshed on read)
 *   GET  /api/revision-queue       - Concepts, weakest memory first (?limit=)
 *   GET  /api/revision-queue/next  - Head of the revision queue
 *   GET  /api/summary              - Counts per priority band and category
 *   POST /api/revise/:conceptId    - Revise a concept
 *   POST /api/simulate             - Advance the clock { days }
 *   POST /api/decay-rate           - Set the decay rate { rate }
 */

import express from 'express';
import { HTTP_STATUS_BY_CODE, RetentionError, type OperationResult } from './errors';
import {
  parseRequest,
  newConceptSchema,
  advanceSchema,
  decayRateSchema,
  queueSchema,
} from './request-schemas';
import type { SimulationSession } from './simulation-session';

export interface AppOptions {
  /** Directory served at / for the dashboard assets */
  staticDir?: string;
}

function sendFailure(res: express.Response, error: RetentionError) {
  res.status(HTTP_STATUS_BY_CODE[error.code]).json({ status: 'error', code: error.code, message: error.message });
}

/**
 * Send `data` on success, the mapped error otherwise.
 */
function sendResult<T>(res: express.Response, result: OperationResult<T>, render: (data: T) => unknown = (d) => d) {
  if (!result.success) return sendFailure(res, result.error);
  res.json(render(result.data));
}

type AsyncRoute = (req: express.Request, res: express.Response) => Promise<void>;

/** Forward rejections to the error middleware */
function route(handler: AsyncRoute): express.RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createApp(session: SimulationSession, options: AppOptions = {}): express.Express {
  const app = express();

  app.use(express.json());

  // CORS
  app.use((req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') return res.sendStatus(204);
    next();
  });

  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', service: 'retention-sim', version: '1.0.0' });
  });

  app.get('/api/concepts', route(async (req, res) => {
    sendResult(res, await session.listConcepts());
  }));

  app.post('/api/concepts', route(async (req, res) => {
    const input = parseRequest(newConceptSchema, req.body);
    if (!input.success) return sendFailure(res, input.error);

    const result = await session.addConcept(input.data);
    sendResult(res, result, (concept) => ({ status: 'success', message: 'Concept added', concept }));
  }));

  app.get('/api/stats', route(async (req, res) => {
    sendResult(res, await session.getStats());
  }));

  app.get('/api/revision-queue', route(async (req, res) => {
    const input = parseRequest(queueSchema, req.query);
    if (!input.success) return sendFailure(res, input.error);
    sendResult(res, await session.getRevisionQueue(input.data.limit));
  }));

  app.get('/api/revision-queue/next', route(async (req, res) => {
    sendResult(res, await session.getNextRevision(), (concept) => ({ concept }));
  }));

  app.get('/api/summary', route(async (req, res) => {
    sendResult(res, await session.getRetentionSummary());
  }));

  app.post('/api/revise/:conceptId', route(async (req, res) => {
    const result = await session.reviseConcept(req.params.conceptId);
    sendResult(res, result, (concept) => ({ status: 'success', message: 'Concept revised', concept }));
  }));

  app.post('/api/simulate', route(async (req, res) => {
    const input = parseRequest(advanceSchema, req.body);
    if (!input.success) return sendFailure(res, input.error);

    const result = await session.advance(input.data.days);
    sendResult(res, result, (advanced) => ({ status: 'success', ...advanced }));
  }));

  app.post('/api/decay-rate', route(async (req, res) => {
    const input = parseRequest(decayRateSchema, req.body);
    if (!input.success) return sendFailure(res, input.error);

    const result = await session.setDecayRate(input.data.rate);
    sendResult(res, result, (updated) => ({ status: 'success', ...updated }));
  }));

  app.use('/api', (req, res) => {
    res.status(404).json({ status: 'error', code: 'NOT_FOUND', message: 'API endpoint not found' });
  });

  if (options.staticDir) {
    app.use(express.static(options.staticDir));
  }

  // Malformed JSON bodies and anything a route failed to handle
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) return next(err);
    if (err instanceof SyntaxError) {
      return sendFailure(res, new RetentionError('INVALID_INPUT', `Malformed JSON body: ${err.message}`));
    }
    console.error('[retention-api] unhandled error:', err);
    res.status(500).json({ status: 'error', message: 'Internal server error' });
  });

  return app;
}
