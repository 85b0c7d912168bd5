import { config } from './lib/config.js';
import { HTTP, PrometheusRecorder } from './lib/http/index.js';
import { logger } from './lib/logger.js';

const log = logger('app');

log.info(`Starting ${config.APP_NAME}...`);

const server = new HTTP(
  {},
  {
    port: config.HTTP_PORT,
    readTimeout: config.HTTP_READ_TIMEOUT_MS,
    writeTimeout: config.HTTP_WRITE_TIMEOUT_MS,
    version: config.APP_VERSION,
    readCorrelationHeader: config.READ_CORRELATION_HEADER,
    recorder: new PrometheusRecorder(config.METRICS_NAMESPACE, {
      groupCodes: config.METRICS_GROUP_CODES,
      collectDefaultMetrics: true,
    }),
    allowedOrigins: config.CORS_ALLOWED_ORIGINS,
    bypassAllowedOrigins: config.CORS_BYPASS_ALLOWED_ORIGINS,
  },
);

await server.start();

const shutdown = (signal: NodeJS.Signals) => {
  log.info(`Received ${signal}, shutting down`);
  server
    .stop()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      log.error('Failed to stop server', { error });
      process.exit(1);
    });
};

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
