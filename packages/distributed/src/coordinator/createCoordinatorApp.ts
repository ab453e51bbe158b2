import express from 'express';
import type { Request } from 'express';
import type { Logger } from 'pino';
import { InvalidRequestError, parseDateTime } from '@logfleet/core';
import type { Coordinator, TimeRange, TransitionOutcome } from '@logfleet/core';
import { asyncHandler, createErrorHandler } from '../http/errorHandler.js';
import { optionalString, requireInteger, requireObject, requireString } from '../http/requestBody.js';

/** Parse `from`/`to`: epoch milliseconds, or an ISO timestamp (UTC unless it carries an offset). */
function timeParam(query: Request['query'], name: 'from' | 'to'): number | undefined {
  const value = query[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new InvalidRequestError(`${name} must be an ISO timestamp or epoch milliseconds`);
  }
  const parsed = /^-?\d+$/.test(value) ? Number(value) : parseDateTime(value);
  if (parsed === null || !Number.isSafeInteger(parsed)) {
    throw new InvalidRequestError(`${name} must be an ISO timestamp or epoch milliseconds, got '${value}'`);
  }
  return parsed;
}

function chunkIdParam(req: Request): string {
  const chunkId = req.params['chunkId'];
  if (chunkId === undefined || chunkId === '') {
    throw new InvalidRequestError('chunkId is required');
  }
  return chunkId;
}

function transitionReply(outcome: TransitionOutcome): { applied: boolean; reason?: string } {
  return outcome.applied ? { applied: true } : { applied: false, reason: outcome.reason };
}

/**
 * Express app exposing a coordinator to workers and operators.
 *
 * Chunk ids contain a `/`, so clients send them URL-encoded in paths.
 */
export function createCoordinatorApp(coordinator: Coordinator, logger: Logger): express.Express {
  const app = express();
  app.use(express.json({ limit: '10mb' }));

  app.post(
    '/workers/register',
    asyncHandler(async (req, res) => {
      const body = requireObject(req.body);
      const registration = await coordinator.register({
        workerId: optionalString(body, 'workerId'),
        address: requireString(body, 'address'),
      });
      res.json(registration);
    }),
  );

  app.post('/workers/heartbeat', (req, res) => {
    const body = requireObject(req.body);
    coordinator.heartbeat(requireString(body, 'workerId'), requireInteger(body, 'generation'));
    res.json({ status: 'ok' });
  });

  app.post(
    '/chunks/:chunkId/started',
    asyncHandler(async (req, res) => {
      const body = requireObject(req.body);
      const outcome = await coordinator.reportStarted(chunkIdParam(req), requireInteger(body, 'attemptToken'));
      res.json(transitionReply(outcome));
    }),
  );

  app.post(
    '/chunks/:chunkId/failed',
    asyncHandler(async (req, res) => {
      const body = requireObject(req.body);
      const outcome = await coordinator.reportFailed(
        chunkIdParam(req),
        requireInteger(body, 'attemptToken'),
        requireString(body, 'error'),
      );
      res.json(transitionReply(outcome));
    }),
  );

  app.post(
    '/results',
    asyncHandler(async (req, res) => {
      const body = requireObject(req.body);
      const outcome = await coordinator.submitResult(
        requireString(body, 'chunkId'),
        requireInteger(body, 'attemptToken'),
        body['metrics'],
      );
      res.json({ status: 'acknowledged', outcome });
    }),
  );

  app.get('/metrics', (req, res) => {
    const from = timeParam(req.query, 'from');
    const to = timeParam(req.query, 'to');
    const range: TimeRange = { ...(from === undefined ? {} : { from }), ...(to === undefined ? {} : { to }) };
    res.json(coordinator.queryMetrics(range));
  });

  app.get('/status', (_req, res) => {
    res.json(coordinator.getStatus());
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not Found', code: 'NOT_FOUND' });
  });

  app.use(createErrorHandler(logger));

  return app;
}
