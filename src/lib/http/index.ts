export { HTTP, DEFAULT_PORT, DEFAULT_TIMEOUT } from './app.js';
export {
  endpoint,
  type Endpoint,
  type EndpointHandler,
  type Method,
  get,
  put,
  post,
  del,
  methods,
} from './endpoint.js';

export { controller, type Controller } from './controller.js';

export * from './middleware.js';

export type { Request, Response, NextFunction } from 'express';

export * from './serverContext.js';
export * from './errors.js';
export { CORRELATION_HEADER } from './telemetry.js';
export { UNVERSIONED } from './controllers/meta.js';
export type { HealthResponse } from './controllers/health.js';

/**
 * Dependency health checks and their registry
 *
 * @see {@link ../health.ts} for implementation
 */
export {
  HealthRegistry,
  type HealthCheck,
  type HealthChecker,
  type HealthCheckFn,
  type HealthStatus,
} from '../health.js';

export type { Recorder } from '../metrics/recorder.js';
export { NoOpRecorder } from '../metrics/noop.js';
export { PrometheusRecorder } from '../metrics/prometheus.js';

export { logger, type Logger } from '../logger.js';
