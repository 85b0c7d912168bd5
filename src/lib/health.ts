export type HealthStatus = 'healthy' | 'unhealthy';

/**
 * A dependency the server reports on. Resolve (optionally with detail) when healthy,
 * throw or reject when not. Only a throw or rejection marks a dependency unhealthy: a
 * resolved value, `false` included, is healthy and reported as its detail. Implementations
 * should stop work once `signal` aborts.
 */
export interface HealthChecker {
  healthCheck(signal: AbortSignal): Promise<unknown> | unknown;
}

/** Bare function form of {@link HealthChecker} */
export type HealthCheckFn = (signal: AbortSignal) => Promise<unknown> | unknown;

export type HealthCheck = HealthChecker | HealthCheckFn;

export type HealthDetail =
  | { kind: 'structured'; value: unknown }
  | { kind: 'text'; text: string };

export interface ServiceHealth {
  name: string;
  status: HealthStatus;
  detail?: HealthDetail;
}

export interface AggregateHealth {
  status: HealthStatus;
  services: Map<string, ServiceHealth>;
}

/** Receives the outcome of every completed dependency check */
export type HealthObserver = (name: string, isHealthy: boolean) => void;

const TRIVIAL_JSON = new Set(['{}', 'null']);

/**
 * Turn a value reported by a checker into detail.
 *
 * The structured form is used when the value serializes to JSON and the result is not
 * empty (`{}`, `null` or nothing). Otherwise the value is reported as text: the message
 * for errors, `String(value)` for anything else.
 */
export function toHealthDetail(value: unknown): HealthDetail {
  let serialized: string | undefined;
  try {
    serialized = JSON.stringify(value);
  } catch {
    serialized = undefined;
  }

  if (serialized !== undefined && !TRIVIAL_JSON.has(serialized)) {
    const parsed: unknown = JSON.parse(serialized);
    return { kind: 'structured', value: parsed };
  }

  return { kind: 'text', text: value instanceof Error ? value.message : String(value) };
}

/** JSON representation of a detail */
export function detailToJSON(detail: HealthDetail): unknown {
  return detail.kind === 'structured' ? detail.value : detail.text;
}

export function serviceHealthToJSON(health: ServiceHealth): {
  status: HealthStatus;
  details?: unknown;
} {
  if (health.detail == null) {
    return { status: health.status };
  }

  return { status: health.status, details: detailToJSON(health.detail) };
}

const runCheck = (check: HealthCheck, signal: AbortSignal): Promise<unknown> =>
  typeof check === 'function'
    ? Promise.resolve(check(signal))
    : Promise.resolve(check.healthCheck(signal));

/**
 * Registry of named dependency checks
 *
 * Dependencies are registered while the server is being configured and only read once
 * traffic is served. Registering a name twice replaces the earlier checker.
 *
 * @example
 * ```typescript
 * const registry = new HealthRegistry();
 *
 * registry.register('database', async (signal) => {
 *   await db.query('SELECT 1', { signal });
 * });
 *
 * registry.register('cache', {
 *   async healthCheck() {
 *     return { keys: await redis.dbSize() };
 *   },
 * });
 *
 * const { status, services } = await registry.checkAll(AbortSignal.timeout(2000));
 * ```
 */
export class HealthRegistry {
  private readonly checks = new Map<string, HealthCheck>();

  constructor(private readonly observe: HealthObserver = () => undefined) {}

  /**
   * Register a dependency check
   *
   * @param name - Dependency name, used as the key in results and in `/health/:name`
   */
  register(name: string, check: HealthCheck): void {
    this.checks.set(name, check);
  }

  has(name: string): boolean {
    return this.checks.has(name);
  }

  names(): string[] {
    return Array.from(this.checks.keys());
  }

  get size(): number {
    return this.checks.size;
  }

  /**
   * Run every registered check concurrently and reduce the results
   *
   * Resolves once every check has settled; there is no timeout of its own, so callers
   * bound the wait through `signal`. A single unhealthy dependency makes the aggregate
   * unhealthy. `services` lists dependencies in registration order regardless of the order
   * in which the checks completed.
   */
  async checkAll(signal: AbortSignal): Promise<AggregateHealth> {
    const results = await Promise.all(
      Array.from(this.checks, ([name, check]) => this.checkService(name, check, signal)),
    );

    let status: HealthStatus = 'healthy';
    const services = new Map<string, ServiceHealth>();

    for (const result of results) {
      services.set(result.name, result);

      if (result.status === 'unhealthy') {
        status = 'unhealthy';
      }
    }

    return { status, services };
  }

  /**
   * Run a single dependency's check
   *
   * @returns The dependency's health, or undefined when no dependency has that name
   */
  async checkOne(name: string, signal: AbortSignal): Promise<ServiceHealth | undefined> {
    const check = this.checks.get(name);
    if (check == null) {
      return undefined;
    }

    return this.checkService(name, check, signal);
  }

  private async checkService(
    name: string,
    check: HealthCheck,
    signal: AbortSignal,
  ): Promise<ServiceHealth> {
    let health: ServiceHealth;

    try {
      const result = await runCheck(check, signal);
      health = { name, status: 'healthy' };
      if (result != null) {
        health.detail = toHealthDetail(result);
      }
    } catch (error: unknown) {
      health = { name, status: 'unhealthy', detail: toHealthDetail(error) };
    }

    this.observe(name, health.status === 'healthy');
    return health;
  }
}
