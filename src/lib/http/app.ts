import { createServer, type Server } from 'node:http';

import bodyParser from 'body-parser';
import cors from 'cors';
import express, { type Application } from 'express';

import { type HealthCheck, HealthRegistry } from '../health.js';
import { logger, type Logger } from '../logger.js';
import { NoOpRecorder } from '../metrics/noop.js';
import type { Recorder } from '../metrics/recorder.js';
import { bindControllerToApp, type Controller } from './controller.js';
import { healthController } from './controllers/health.js';
import { metaController } from './controllers/meta.js';
import * as errors from './errors.js';
import { errorHandlerMiddleware, notFoundMiddleware } from './errorHandler.js';
import { type Middleware, MiddlewareTypes } from './middleware.js';
import { getTelemetryMiddleware } from './telemetry.js';

export const DEFAULT_PORT = 5000;
export const DEFAULT_TIMEOUT = 5000;
const SHUTDOWN_GRACE_PERIOD = 60_000;

interface RoutingOptions {
  controllers?: Controller[];
  middlewares?: Middleware[];
  /** Dependencies reported by /health, keyed by name */
  healthDependencies?: Record<string, HealthCheck>;
}

interface IHTTPOptions {
  /** Port to listen on. 0 picks a free port. */
  port?: number;
  /** Headers and request read timeout in milliseconds */
  readTimeout?: number;
  /** Socket write timeout in milliseconds */
  writeTimeout?: number;
  version?: string;
  /** Adopt the Correlation-ID header of inbound requests */
  readCorrelationHeader?: boolean;
  correlationIdGenerator?: () => string;
  recorder?: Recorder;
  logger?: Logger;
  /** Origins accepted when `bypassAllowedOrigins` is false */
  allowedOrigins?: string[];
  /** Accept every origin. Defaults to true. */
  bypassAllowedOrigins?: boolean;
  trustProxy?: boolean;
  bodyParserOptions?: bodyParser.OptionsJson;
}

const positiveOr = (value: number | undefined, fallback: number) =>
  value != null && value > 0 ? value : fallback;

export class HTTP {
  private app: Application;
  private httpServer: Server;
  private logger: Logger;
  private recorder: Recorder;
  private healthRegistry: HealthRegistry;
  private startedAt: number | null = null;
  private listening = false;

  constructor(
    private options: RoutingOptions = {},
    private httpOptions: IHTTPOptions = {},
  ) {
    this.logger = httpOptions.logger ?? logger('http');
    this.recorder = httpOptions.recorder ?? new NoOpRecorder();
    this.healthRegistry = new HealthRegistry((name, isHealthy) => {
      this.recorder.observeHealth(name, isHealthy);
    });

    // Apply defaults
    this.httpOptions = {
      ...this.httpOptions,
      port: this.httpOptions.port ?? DEFAULT_PORT,
      trustProxy: this.httpOptions.trustProxy ?? true,
      readTimeout: positiveOr(this.httpOptions.readTimeout, DEFAULT_TIMEOUT),
      writeTimeout: positiveOr(this.httpOptions.writeTimeout, DEFAULT_TIMEOUT),
    };

    this.app = express();
    this.httpServer = createServer(this.app);
    this.httpServer.headersTimeout = this.readTimeout;
    this.httpServer.requestTimeout = this.readTimeout;
    this.httpServer.setTimeout(this.writeTimeout);

    this.app.set('trust proxy', this.httpOptions.trustProxy);
    this.app.disable('x-powered-by');

    // Telemetry wraps everything else, including CORS rejections and 404s
    this.logger.debug('register', { middleware: 'telemetry' });
    this.app.use(
      getTelemetryMiddleware({
        logger: this.logger,
        recorder: this.recorder,
        readCorrelationHeader: this.httpOptions.readCorrelationHeader,
        correlationIdGenerator: this.httpOptions.correlationIdGenerator,
      }).handler,
    );

    this.app.use(bodyParser.json(this.httpOptions.bodyParserOptions));
    this.app.use(
      cors({
        origin: (
          origin: string | undefined,
          callback: (err: Error | null, allow?: boolean) => void,
        ) => {
          if (origin == null || origin === 'null') {
            callback(null, true);
            return;
          }
          const allowedOrigins = this.httpOptions.allowedOrigins ?? [];
          if (allowedOrigins.includes(origin) || this.httpOptions.bypassAllowedOrigins !== false) {
            callback(null, true);
            return;
          }
          this.logger.warn(`Origin ${origin} not allowed`);
          callback(new errors.BadRequestError('Not allowed by CORS'));
        },
      }),
    );

    for (const [name, check] of Object.entries(this.options.healthDependencies ?? {})) {
      this.addHealthDependency(name, check);
    }

    const middlewares = this.options.middlewares ?? [];

    // run all global before middlewares
    middlewares
      .filter((m) => m.type === MiddlewareTypes.BEFORE)
      .forEach((m) => {
        this.logger.debug('register', { middleware: m.name ?? 'unknown' });
        this.app.use(m.handler);
      });

    // Bind built-in and user controllers
    const controllers = [
      metaController({ version: this.version, recorder: this.recorder }),
      healthController({
        registry: this.healthRegistry,
        uptime: () => this.uptime(),
        version: this.version,
        logger: this.logger,
      }),
      ...(this.options.controllers ?? []),
    ];
    controllers.forEach((c) => {
      for (const route of bindControllerToApp(c, this.app)) {
        this.logger.debug('route registered', {
          method: route.method.toUpperCase(),
          path: route.path,
        });
      }
    });

    this.app.use(notFoundMiddleware.handler);

    // run all global after middlewares, the error handler goes last
    middlewares
      .filter((m) => m.type === MiddlewareTypes.AFTER)
      .forEach((m) => {
        this.app.use(m.handler);
      });
    this.app.use(errorHandlerMiddleware.handler);
  }

  get expressInstance() {
    return this.app;
  }

  get server() {
    return this.httpServer;
  }

  get version(): string | undefined {
    return this.httpOptions.version;
  }

  get readTimeout(): number {
    return this.httpOptions.readTimeout ?? DEFAULT_TIMEOUT;
  }

  get writeTimeout(): number {
    return this.httpOptions.writeTimeout ?? DEFAULT_TIMEOUT;
  }

  /** Port the server is bound to once listening, the configured port before that */
  get port(): number {
    const address = this.httpServer.address();
    if (address != null && typeof address === 'object') {
      return address.port;
    }
    return this.httpOptions.port ?? DEFAULT_PORT;
  }

  /** Milliseconds since the server started listening, 0 when it is not running */
  uptime(): number {
    return this.startedAt == null ? 0 : Date.now() - this.startedAt;
  }

  /**
   * Register a dependency for /health and /health/:name
   *
   * Registering an existing name replaces the previous check. Dependencies can only be added
   * before the server starts.
   */
  addHealthDependency(name: string, check: HealthCheck): this {
    if (this.listening) {
      throw new Error(`Cannot add health dependency "${name}" after the server has started`);
    }

    if (this.healthRegistry.has(name)) {
      this.logger.warn('replacing health dependency', { name });
    }
    this.logger.debug('register', { health_dependency: name });
    this.healthRegistry.register(name, check);
    return this;
  }

  /** Resolves once the server is listening, rejects when it cannot listen */
  start(): Promise<void> {
    this.logger.info('starting server', { port: this.httpOptions.port });

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.listening = false;
        reject(err);
      };

      this.httpServer.once('error', onError);
      this.httpServer.listen(this.httpOptions.port, () => {
        this.httpServer.off('error', onError);
        this.startedAt = Date.now();
        this.listening = true;
        this.logger.info(`HTTP server listening on port ${String(this.port)}`);
        resolve();
      });
    });
  }

  /**
   * Stop accepting connections and wait for in-flight requests. Connections still open after
   * the grace period are closed forcibly.
   */
  stop(): Promise<void> {
    this.logger.info('stopping server', { port: this.port });
    this.startedAt = null;

    return new Promise((resolve, reject) => {
      const forceClose = setTimeout(() => {
        this.httpServer.closeAllConnections();
      }, SHUTDOWN_GRACE_PERIOD);
      forceClose.unref();

      this.httpServer.close((err) => {
        clearTimeout(forceClose);
        this.listening = false;
        if (err != null) {
          reject(err);
          return;
        }
        this.logger.info('HTTP server stopped');
        resolve();
      });
      this.httpServer.closeIdleConnections();
    });
  }
}
