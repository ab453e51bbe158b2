import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from 'pino';
import { isCoordinatorError } from '@logfleet/core';
import type { CoordinatorErrorCode } from '@logfleet/core';

/** HTTP status for each coordinator error code. */
export function statusForCode(code: CoordinatorErrorCode): number {
  switch (code) {
    case 'STALE_GENERATION':
    case 'DUPLICATE_ACTIVE_WORKER':
      return 409;
    case 'UNKNOWN_WORKER':
      return 404;
    case 'INVALID_TRANSITION':
    case 'INVALID_PARTIAL_METRICS':
    case 'INVALID_CONFIGURATION':
    case 'INVALID_REQUEST':
      return 400;
  }
}

/** Status of a client error raised by express itself, e.g. a body that is not JSON. */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  const status = error.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Error middleware: coordinator errors become `{ error, code }` with the status for
 * their code; anything else is logged and answered with a 500.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (isCoordinatorError(error)) {
      res.status(statusForCode(error.code)).json({ error: error.message, code: error.code });
      return;
    }

    const status = clientErrorStatus(error);
    if (status !== null) {
      const message = error instanceof Error ? error.message : 'Bad request';
      res.status(status).json({ error: message, code: 'INVALID_REQUEST' });
      return;
    }

    logger.error({ err: error, method: req.method, path: req.path }, 'Request failed');
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL' });
  };
}

/** Wrap an async route handler so a rejection reaches the error middleware. */
export function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res)).catch(next);
  };
}
