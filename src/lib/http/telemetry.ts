import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

import type { Logger } from '../logger.js';
import type { Recorder } from '../metrics/recorder.js';
import { middleware, MiddlewareTypes } from './middleware.js';
import { contextManager } from './serverContext.js';
import { TelemetryWriter } from './telemetryWriter.js';

export const CORRELATION_HEADER = 'Correlation-ID';

export interface TelemetryOptions {
  logger: Logger;
  recorder: Recorder;
  /** Reuse an inbound Correlation-ID header instead of generating one */
  readCorrelationHeader?: boolean;
  correlationIdGenerator?: () => string;
}

/**
 * Route template the request matched, e.g. `/health/:name`. Unmatched requests fall back
 * to the raw path.
 */
export function routeTemplate(req: Request): string {
  const route: unknown = req.route;
  if (route != null && typeof route === 'object' && 'path' in route) {
    const { path } = route;
    if (typeof path === 'string') {
      return `${req.baseUrl}${path}`;
    }
  }
  return req.path;
}

export function resolveCorrelationId(
  req: Request,
  options: Pick<TelemetryOptions, 'readCorrelationHeader' | 'correlationIdGenerator'>,
): string {
  if (options.readCorrelationHeader === true) {
    const inbound = req.get(CORRELATION_HEADER);
    if (inbound != null && inbound !== '') {
      return inbound;
    }
  }
  return (options.correlationIdGenerator ?? uuidv4)();
}

/**
 * Measures, correlates and reports every request
 *
 * Sets the Correlation-ID header before the rest of the chain runs and binds a request
 * logger into the server context. Once the handler chain has ended the response and the
 * response is closed, it logs one `request complete` line and reports duration and size to
 * the recorder.
 */
export const getTelemetryMiddleware = (options: TelemetryOptions) =>
  middleware({
    name: 'Telemetry',
    type: MiddlewareTypes.BEFORE,
    handler(req: Request, res: Response, next: NextFunction) {
      const start = performance.now();
      const writer = new TelemetryWriter(res);

      const correlationId = resolveCorrelationId(req, options);
      res.setHeader(CORRELATION_HEADER, correlationId);
      const log = options.logger.child({ correlation_id: correlationId });

      const abortController = new AbortController();
      const closed = new Promise<void>((resolve) => {
        res.once('close', () => {
          if (!res.writableFinished) {
            abortController.abort();
          }
          resolve();
        });
      });

      // A client that disconnects early closes the response before the handler is done;
      // report only once the handler chain has ended it as well.
      void Promise.all([closed, writer.ended])
        .then(() => {
          const duration = performance.now() - start;
          const path = routeTemplate(req);

          log.info('request complete', {
            method: req.method,
            url: req.originalUrl,
            user_agent: req.get('user-agent') ?? '',
            status_code: writer.statusCode,
            duration_ms: duration,
            response_bytes: writer.size,
          });

          options.recorder.observeRequestDuration(req.method, path, writer.statusCode, duration);
          options.recorder.observeResponseSize(req.method, path, writer.statusCode, writer.size);
        })
        .catch((error: unknown) => {
          log.error('Failed to report request telemetry', { error });
        });

      contextManager.runWithContext(
        { correlationId, logger: log, signal: abortController.signal },
        () => {
          next();
        },
      );
    },
  });
