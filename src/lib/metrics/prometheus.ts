import type { RequestHandler } from 'express';
import { collectDefaultMetrics, Gauge, Histogram, Registry } from 'prom-client';

import type { Recorder } from './recorder.js';

const SUBSYSTEM = 'http';
const HTTP_LABELS = ['method', 'path', 'code'] as const;

interface PrometheusOptions {
  /** Registry the metrics are registered on. Defaults to a fresh registry per recorder. */
  registry?: Registry;
  /** Record status codes as their hundreds value: 2xx/4xx/5xx */
  groupCodes?: boolean;
  /** Also collect the prom-client default process metrics */
  collectDefaultMetrics?: boolean;
}

/**
 * Recorder backed by prom-client
 *
 * @example
 * ```typescript
 * const recorder = new PrometheusRecorder('orders', { groupCodes: true });
 * const http = new HTTP({}, { recorder });
 * ```
 */
export class PrometheusRecorder implements Recorder {
  private readonly registry: Registry;
  private readonly groupCodes: boolean;
  private readonly httpRequestDuration: Histogram<(typeof HTTP_LABELS)[number]>;
  private readonly httpResponseSize: Histogram<(typeof HTTP_LABELS)[number]>;
  private readonly healthStatus: Gauge<'name'>;

  constructor(namespace: string, options: PrometheusOptions = {}) {
    this.registry = options.registry ?? new Registry();
    this.groupCodes = options.groupCodes ?? false;

    this.httpRequestDuration = new Histogram({
      name: `${namespace}_${SUBSYSTEM}_request_duration_seconds`,
      help: 'HTTP Request Duration in Seconds',
      labelNames: HTTP_LABELS,
      registers: [this.registry],
    });

    this.httpResponseSize = new Histogram({
      name: `${namespace}_${SUBSYSTEM}_response_size_bytes`,
      help: 'HTTP Response Size in Bytes',
      labelNames: HTTP_LABELS,
      buckets: [100, 1_000, 10_000, 100_000, 1_000_000, 10_000_000],
      registers: [this.registry],
    });

    this.healthStatus = new Gauge({
      name: `${namespace}_health_status`,
      help: 'Result of the latest dependency health check (1 healthy, 0 unhealthy)',
      labelNames: ['name'],
      registers: [this.registry],
    });

    if (options.collectDefaultMetrics === true) {
      collectDefaultMetrics({ register: this.registry, prefix: `${namespace}_` });
    }
  }

  get register(): Registry {
    return this.registry;
  }

  handler(): RequestHandler {
    return (_req, res, next) => {
      this.registry
        .metrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch(next);
    };
  }

  observeHealth(name: string, isHealthy: boolean): void {
    this.healthStatus.labels(name).set(isHealthy ? 1 : 0);
  }

  observeRequestDuration(method: string, path: string, code: number, durationMs: number): void {
    this.httpRequestDuration.labels(method, path, this.formatStatusCode(code)).observe(durationMs / 1000);
  }

  observeResponseSize(method: string, path: string, code: number, bytes: number): void {
    this.httpResponseSize.labels(method, path, this.formatStatusCode(code)).observe(bytes);
  }

  private formatStatusCode(code: number): string {
    if (!this.groupCodes) {
      return String(code);
    }

    return `${String(Math.floor(code / 100))}xx`;
  }
}
