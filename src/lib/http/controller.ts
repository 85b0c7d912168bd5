import type { IRouter } from 'express';

import { type Endpoint, endpointToExpressHandler, type Method } from './endpoint.js';

/**
 * Join controller base path with endpoint path
 * Handles leading/trailing slashes correctly
 */
export function joinPaths(basePath: string, endpointPath: string): string {
  const endpoint = endpointPath.startsWith('/') ? endpointPath : `/${endpointPath}`;

  // Root controller - no prefix
  if (basePath === '/' || basePath === '') {
    return endpoint;
  }

  const base = basePath.startsWith('/') ? basePath : `/${basePath}`;
  const joined = `${base}${endpoint}`.replace(/\/+/g, '/');

  return joined.length > 1 && joined.endsWith('/') ? joined.slice(0, -1) : joined;
}

export interface BoundRoute {
  method: Method;
  path: string;
  endpoint: Endpoint;
}

export class Controller {
  private _description?: string;
  private _endpoints: Endpoint[] = [];

  constructor(public readonly name: string) {}

  /** Add a description to the controller */
  description(description: string) {
    this._description = description;
    return this;
  }

  /** Add endpoints to the controller */
  endpoints(endpoints: Endpoint[]) {
    this._endpoints = [...this._endpoints, ...endpoints];
    return this;
  }

  getDescription() {
    return this._description;
  }

  getEndpoints() {
    return this._endpoints;
  }

  /** Every endpoint with its full path, in declaration order */
  routes(): BoundRoute[] {
    return this._endpoints.map((endpoint) => ({
      method: endpoint.getMethod(),
      path: joinPaths(this.name, endpoint.getPath()),
      endpoint,
    }));
  }
}

/** Define a new controller, grouping endpoints under a base path */
export const controller = (name: string) => new Controller(name);

export function bindControllerToApp(controller: Controller, app: IRouter): BoundRoute[] {
  const routes = controller.routes();

  for (const { method, path, endpoint } of routes) {
    const middlewares = endpoint.getMiddlewares().map((m) => m.handler);
    app[method](path, ...middlewares, endpointToExpressHandler(endpoint));
  }

  return routes;
}
