import type { Request, Response } from 'express';

import {
  detailToJSON,
  type HealthRegistry,
  type HealthStatus,
  serviceHealthToJSON,
} from '../../health.js';
import type { Logger } from '../../logger.js';
import { controller } from '../controller.js';
import { get } from '../endpoint.js';
import { sendNotFound } from '../errorHandler.js';
import { getRequestLogger, getServerContext } from '../serverContext.js';

const VERBOSE_PARAM = 'verbose';

interface HealthControllerOptions {
  registry: HealthRegistry;
  /** Milliseconds the server has been running */
  uptime: () => number;
  version?: string;
  logger: Logger;
}

export interface HealthResponse {
  status: HealthStatus;
  version?: string;
  /** Seconds */
  uptime: number;
  services?: Record<string, ReturnType<typeof serviceHealthToJSON>>;
}

const isVerbose = (req: Request) => VERBOSE_PARAM in req.query;

const writeHealth = (req: Request, res: Response, status: HealthStatus, body: unknown) => {
  res.status(status === 'healthy' ? 200 : 500);
  res.setHeader('Content-Type', 'application/json');

  if (!isVerbose(req)) {
    res.end();
    return;
  }
  res.end(JSON.stringify(body));
};

/**
 * Aggregate and per-dependency health endpoints
 *
 * Both answer 200 when healthy and 500 otherwise. The JSON body is only written when the
 * `verbose` query parameter is present, so probes that only look at the status code never
 * pay for serialization.
 */
export const healthController = ({ registry, uptime, version, logger }: HealthControllerOptions) =>
  controller('health')
    .description('Dependency health checks')
    .endpoints([
      get('/', 'checkHealth')
        .description('Run every dependency check')
        .handler(async (req, res) => {
          const { signal } = getServerContext();
          const { status, services } = await registry.checkAll(signal);

          const result: HealthResponse = {
            status,
            ...(version != null && version !== '' ? { version } : {}),
            uptime: uptime() / 1000,
          };
          if (services.size > 0) {
            result.services = Object.fromEntries(
              Array.from(services, ([name, health]) => [name, serviceHealthToJSON(health)]),
            );
          }

          getRequestLogger(logger).info('health check', { health: result });

          writeHealth(req, res, status, result);
        }),

      get('/:name', 'checkDependencyHealth')
        .description('Run a single dependency check')
        .handler(async (req, res) => {
          const { signal } = getServerContext();
          const { name } = req.params;
          const health = await registry.checkOne(name, signal);

          if (health == null) {
            sendNotFound(res);
            return;
          }

          const body = health.detail != null ? detailToJSON(health.detail) : health.status;
          getRequestLogger(logger).info('health check', { health: { [name]: body } });

          writeHealth(req, res, health.status, body);
        }),
    ]);
