import type { Request, Response } from 'express';

import { logger } from '../logger.js';
import * as errors from './errors.js';
import { middleware, MiddlewareTypes } from './middleware.js';
import { getRequestLogger } from './serverContext.js';

const log = logger('errorHandler');

export const NOT_FOUND_BODY = '404 page not found';

/** Plain-text 404, matching what unknown health dependencies answer with */
export function sendNotFound(res: Response): void {
  res.status(404).type('text/plain').send(NOT_FOUND_BODY);
}

export const notFoundMiddleware = middleware({
  name: 'NotFound',
  type: MiddlewareTypes.BEFORE,
  handler(_req: Request, res: Response) {
    sendNotFound(res);
  },
});

/**
 * Status of a client error, whether raised as an HttpError or by an Express middleware that
 * sets `status` (body-parser, cors).
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (error instanceof errors.HttpError) {
    return error.http < 500 ? error.http : undefined;
  }
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 500 ? error.status : undefined;
  }
  return undefined;
}

/**
 * Last stop for anything a handler threw or rejected with
 *
 * Client errors (4xx) are answered with their status and message. Anything
 * else is recovered: logged once with its stack and answered with an empty 500. The response
 * body never carries the failure.
 */
export const errorHandlerMiddleware = middleware({
  name: 'ErrorHandler',
  type: MiddlewareTypes.AFTER,
  runAfterHeadersSent: true,
  handler(originalError: unknown, req: Request, res: Response) {
    const requestLog = getRequestLogger(log);

    const clientStatus = clientErrorStatus(originalError);
    if (clientStatus != null && originalError instanceof Error) {
      requestLog.warn(`FAIL ${req.method} ${req.originalUrl}`, { error: originalError.message });

      if (!res.headersSent) {
        res.status(clientStatus).type('text/plain').send(originalError.message);
        return;
      }
      res.end();
      return;
    }

    const recovered = new errors.RecoveredError(originalError);
    requestLog.error(`recovered ${req.method} ${req.originalUrl}`, {
      error: recovered.message,
      stack: recovered.stack,
    });

    if (!res.headersSent) {
      res.status(500).end();
      return;
    }
    res.end();
  },
});
