import { z } from 'zod';

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'none']);
const logFormatSchema = z.enum(['human', 'json']);

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .transform((val) => val === 'true')
    .default(fallback);

export const configSchema = z.object({
  APP_NAME: z.string().default('service-scaffold'),
  NODE_ENV: z.string().default('development'),

  /**
   * Version reported by /version and the verbose health output
   * @example '1.4.2'
   */
  APP_VERSION: z.string().optional(),

  /**
   * Port the HTTP server listens on
   * @example 5000
   */
  HTTP_PORT: z.coerce.number().int().nonnegative().default(5000),

  /**
   * Read timeout (headers and full request) in milliseconds
   * @example 5000
   */
  HTTP_READ_TIMEOUT_MS: z.coerce.number().default(5000),

  /**
   * Socket write/idle timeout in milliseconds
   * @example 5000
   */
  HTTP_WRITE_TIMEOUT_MS: z.coerce.number().default(5000),

  /**
   * Adopt an inbound Correlation-ID header instead of always generating a new one
   * @default false
   */
  READ_CORRELATION_HEADER: booleanFlag('false'),

  /**
   * Prefix for every exported Prometheus metric
   * @example 'orders'
   */
  METRICS_NAMESPACE: z
    .string()
    .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, 'METRICS_NAMESPACE must be a valid Prometheus name')
    .default('app'),

  /**
   * Record status codes as 2xx/4xx/5xx instead of the exact code
   * @default false
   */
  METRICS_GROUP_CODES: booleanFlag('false'),

  /**
   * Accept requests from any origin. Set to 'false' to restrict to CORS_ALLOWED_ORIGINS.
   * @default true
   */
  CORS_BYPASS_ALLOWED_ORIGINS: z
    .string()
    .transform((val) => val !== 'false')
    .default('true'),

  /**
   * Comma-separated list of allowed CORS origins
   * Only used when CORS_BYPASS_ALLOWED_ORIGINS is false
   * @example 'http://localhost:3000,https://app.example.com'
   */
  CORS_ALLOWED_ORIGINS: z
    .string()
    .optional()
    .transform((val) => (val ? val.split(',').filter(Boolean) : [])),

  LOG_LEVEL: logLevelSchema.default('info'),
  LOG_FORMAT: logFormatSchema.default(process.env.NODE_ENV === 'production' ? 'json' : 'human'),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse(env);
}

export const config: Config = loadConfig();
