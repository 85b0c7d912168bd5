import type { RequestHandler } from 'express';

/**
 * Sink for the metrics the HTTP server produces.
 *
 * The server calls the observe functions from its telemetry middleware and health
 * handlers; `handler()` is mounted at `/metrics` as-is.
 */
export interface Recorder {
  /** Scrape endpoint for the collected metrics */
  handler(): RequestHandler;

  /** Called once per completed dependency health check */
  observeHealth(name: string, isHealthy: boolean): void;

  /** Called once per request, after the response has been closed */
  observeRequestDuration(method: string, path: string, code: number, durationMs: number): void;

  /** Called once per request with the number of body bytes written */
  observeResponseSize(method: string, path: string, code: number, bytes: number): void;
}
