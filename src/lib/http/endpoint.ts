import type { NextFunction, Request, RequestHandler, Response } from 'express';

import { Middleware } from './middleware.js';

export const methods = [
  'get',
  'put',
  'post',
  'delete',
  'head',
  'options',
  'patch',
] as const;
export type Method = (typeof methods)[number];

/**
 * Endpoint handler. A value it resolves with is sent as the response body unless the
 * handler already answered on `res` itself.
 */
export type EndpointHandler = (req: Request, res: Response) => Promise<unknown> | unknown;

export interface EndpointOptions<Path extends string> {
  method: Method;
  path: Path;
  name?: string;
  description?: string;
  handler?: EndpointHandler;
  requestHandler?: RequestHandler;
  responseContentType: string;
  middlewares?: Middleware[];
}

export class Endpoint<Path extends string = string> {
  constructor(private options: EndpointOptions<Path>) {}

  /** Add a description to the endpoint */
  description(description: (typeof this.options)['description']) {
    this.options.description = description;
    return this;
  }

  /** Name the endpoint */
  name(name: (typeof this.options)['name']) {
    this.options.name = name;
    return this;
  }

  /**
   * Specify the response content type. Defaults to `application/json`.
   * @example
   * ```ts
   *...
   *.responseContentType('text/plain')
   * ```
   * */
  responseContentType(contentType: string) {
    this.options.responseContentType = contentType;
    return this;
  }

  /** Define the handler of the endpoint. May be sync or async.
   * @example
   * ```ts
   * ...
   * .handler(async (req) => {
   *   return {
   *     greeting: `Hello ${req.params.name}!`
   *   }
   * })
   * ```
   * */
  handler(handler: EndpointHandler) {
    this.options.handler = handler;
    return this;
  }

  /**
   * Hand the request to a plain Express handler, bypassing the return-value handling of
   * {@link Endpoint.handler}.
   */
  delegate(requestHandler: RequestHandler) {
    this.options.requestHandler = requestHandler;
    return this;
  }

  /** Add an array of middlewares to the endpoint */
  middlewares(middlewares: Middleware[]) {
    this.options.middlewares = [...(this.options.middlewares ?? []), ...middlewares];
    return this;
  }

  /** Add a middleware to the endpoint */
  middleware(middleware: Middleware) {
    this.options.middlewares = [...(this.options.middlewares ?? []), middleware];
    return this;
  }

  getName() {
    return this.options.name;
  }

  getDescription() {
    return this.options.description;
  }

  getMiddlewares() {
    return this.options.middlewares ?? [];
  }

  getHandler() {
    return this.options.handler;
  }

  getRequestHandler() {
    return this.options.requestHandler;
  }

  getMethod() {
    return this.options.method;
  }

  getPath() {
    return this.options.path;
  }

  getResponseContentType() {
    return this.options.responseContentType;
  }
}

/** Define a new endpoint */
export const endpoint = <Path extends string>(method: Method, path: Path, name?: string) =>
  new Endpoint<Path>({
    name,
    method,
    path,
    responseContentType: 'application/json',
  });

/** Define a new GET endpoint */
export const get = <Path extends string>(path: Path, name?: string) => endpoint('get', path, name);

/** Define a new PUT endpoint */
export const put = <Path extends string>(path: Path, name?: string) => endpoint('put', path, name);

/** Define a new POST endpoint */
export const post = <Path extends string>(path: Path, name?: string) =>
  endpoint('post', path, name);

/** Define a new DELETE endpoint */
export const del = <Path extends string>(path: Path, name?: string) =>
  endpoint('delete', path, name);

export const endpointToExpressHandler = (_endpoint: Endpoint): RequestHandler => {
  const requestHandler = _endpoint.getRequestHandler();
  if (requestHandler != null) {
    return requestHandler;
  }

  return (req: Request, res: Response, next: NextFunction) => {
    const handler = _endpoint.getHandler();
    if (handler == null) {
      res.status(501).type('text/plain').send('Not Implemented');
      return;
    }

    // Run inside a promise so synchronous throws and rejections both reach `next`
    new Promise<unknown>((resolve) => {
      resolve(handler(req, res));
    })
      .then((responseObj) => {
        if (res.headersSent || res.writableEnded) {
          return;
        }

        if (responseObj === undefined) {
          res.end();
          return;
        }

        res.header('content-type', _endpoint.getResponseContentType());
        res.send(responseObj);
      })
      .catch((e: unknown) => {
        next(e);
      });
  };
};
