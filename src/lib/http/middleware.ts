import { isPromise } from 'node:util/types';

import {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';

import { logger } from '../logger.js';

export enum MiddlewareTypes {
  BEFORE,
  AFTER,
}

export type AsyncRequestHandler = (
  ...args: Parameters<RequestHandler>
) => Promise<ReturnType<RequestHandler>>;

export type AsyncErrorRequestHandler = (
  ...args: Parameters<ErrorRequestHandler>
) => Promise<ReturnType<ErrorRequestHandler>>;

export type { RequestHandler, ErrorRequestHandler } from 'express';

export type MiddlewareHandler =
  | RequestHandler
  | ErrorRequestHandler
  | AsyncRequestHandler
  | AsyncErrorRequestHandler;

interface MiddlewareProps<Handler extends MiddlewareHandler> {
  name?: string;
  handler: Handler;
  type: MiddlewareTypes;
  /** Run even when a previous middleware already sent the headers */
  runAfterHeadersSent?: boolean;
}

const log = logger('middlewareWrapper');

/** Route a rejected promise returned by a handler to `next` */
const forwardRejection = (result: unknown, next: NextFunction) => {
  if (isPromise(result)) {
    result.catch((err: unknown) => {
      next(err);
    });
  }
};

function middlewareWrapper<Handler extends MiddlewareHandler>(
  middlewareProps: MiddlewareProps<Handler>,
): RequestHandler | ErrorRequestHandler {
  const name = middlewareProps.name ?? 'unknown';
  const skipWhenSent = middlewareProps.runAfterHeadersSent !== true;

  if (middlewareProps.type === MiddlewareTypes.BEFORE) {
    const m = middlewareProps.handler as RequestHandler;
    return (req: Request, res: Response, next: NextFunction) => {
      if (skipWhenSent && res.headersSent) {
        log.debug(`Exiting middleware ${name} early, headers already sent`);
        next();
        return;
      }
      try {
        forwardRejection(m(req, res, next), next);
      } catch (err) {
        next(err);
      }
    };
  }

  const m = middlewareProps.handler as ErrorRequestHandler;
  return (prevError: unknown, req: Request, res: Response, next: NextFunction) => {
    if (skipWhenSent && res.headersSent) {
      log.debug(`Exiting middleware ${name} early, headers already sent`);
      next(prevError);
      return;
    }
    try {
      forwardRejection(m(prevError, req, res, next), next);
    } catch (err) {
      next(err);
    }
  };
}

export class Middleware<Handler extends MiddlewareHandler = MiddlewareHandler> {
  constructor(private readonly options: MiddlewareProps<Handler>) {}

  get name() {
    return this.options.name;
  }

  get type() {
    return this.options.type;
  }

  get handler() {
    return middlewareWrapper(this.options);
  }
}

export const middleware = <Handler extends MiddlewareHandler = MiddlewareHandler>(
  options: MiddlewareProps<Handler>,
) => new Middleware<Handler>(options);
