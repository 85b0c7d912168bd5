import { describe, it } from 'node:test';
import assert from 'node:assert';
import { HealthRegistry, serviceHealthToJSON, toHealthDetail } from './health.js';

class DetailedError extends Error {
  constructor(private readonly inner: unknown) {
    super(`detailed error: ${String(inner)}`);
  }

  toJSON() {
    return { details: this.inner };
  }
}

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const summarize = (services: Map<string, unknown>) => JSON.stringify(Object.fromEntries(services));

void describe('toHealthDetail', () => {
  void it('should fall back to the message for plain errors', () => {
    assert.deepStrictEqual(toHealthDetail(new Error('timeout')), { kind: 'text', text: 'timeout' });
  });

  void it('should use the structured form when an error serializes to something', () => {
    assert.deepStrictEqual(toHealthDetail(new DetailedError('extra details')), {
      kind: 'structured',
      value: { details: 'extra details' },
    });
  });

  void it('should keep structured success values', () => {
    assert.deepStrictEqual(toHealthDetail({ connections: 3 }), {
      kind: 'structured',
      value: { connections: 3 },
    });
  });

  void it('should treat an empty object as trivial', () => {
    assert.deepStrictEqual(toHealthDetail({}), { kind: 'text', text: '[object Object]' });
  });

  void it('should fall back to text when serialization fails', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    const error = Object.assign(new Error('loop'), { circular });

    assert.deepStrictEqual(toHealthDetail(error), { kind: 'text', text: 'loop' });
  });
});

void describe('HealthRegistry', () => {
  void it('should be healthy with no dependencies', async () => {
    const registry = new HealthRegistry();

    const result = await registry.checkAll(new AbortController().signal);

    assert.strictEqual(result.status, 'healthy');
    assert.strictEqual(result.services.size, 0);
  });

  void it('should be healthy when every dependency succeeds', async () => {
    const registry = new HealthRegistry();
    registry.register('db', () => undefined);
    registry.register('cache', { healthCheck: () => Promise.resolve({ keys: 12 }) });

    const result = await registry.checkAll(new AbortController().signal);

    assert.strictEqual(result.status, 'healthy');
    assert.deepStrictEqual(result.services.get('db'), { name: 'db', status: 'healthy' });
    assert.deepStrictEqual(result.services.get('cache'), {
      name: 'cache',
      status: 'healthy',
      detail: { kind: 'structured', value: { keys: 12 } },
    });
  });

  void it('should be unhealthy when one dependency fails and keep the others healthy', async () => {
    const registry = new HealthRegistry();
    registry.register('db', () => undefined);
    registry.register('cache', () => undefined);
    registry.register('queue', () => Promise.reject(new Error('timeout')));

    const result = await registry.checkAll(new AbortController().signal);

    assert.strictEqual(result.status, 'unhealthy');
    assert.strictEqual(result.services.get('db')?.status, 'healthy');
    assert.strictEqual(result.services.get('cache')?.status, 'healthy');
    assert.deepStrictEqual(result.services.get('queue'), {
      name: 'queue',
      status: 'unhealthy',
      detail: { kind: 'text', text: 'timeout' },
    });
  });

  void it('should treat a synchronous throw as unhealthy', async () => {
    const registry = new HealthRegistry();
    registry.register('broken', () => {
      throw new Error('boom');
    });

    const result = await registry.checkAll(new AbortController().signal);

    assert.strictEqual(result.status, 'unhealthy');
    assert.deepStrictEqual(result.services.get('broken')?.detail, { kind: 'text', text: 'boom' });
  });

  void it('should only treat throws as unhealthy, not a false result', async () => {
    const registry = new HealthRegistry();
    registry.register('flag', () => false);

    const result = await registry.checkAll(new AbortController().signal);

    assert.strictEqual(result.status, 'healthy');
    assert.deepStrictEqual(result.services.get('flag'), {
      name: 'flag',
      status: 'healthy',
      detail: { kind: 'structured', value: false },
    });
  });

  void it('should stay unhealthy when several dependencies fail', async () => {
    const registry = new HealthRegistry();
    registry.register('a', () => Promise.reject(new Error('a down')));
    registry.register('b', () => Promise.reject(new Error('b down')));

    const result = await registry.checkAll(new AbortController().signal);

    assert.strictEqual(result.status, 'unhealthy');
    assert.strictEqual(result.services.size, 2);
  });

  void it('should produce the same result whatever order the checks complete in', async () => {
    const build = (latencies: { db: number; cache: number; queue: number }) => {
      const registry = new HealthRegistry();
      registry.register('db', async () => {
        await delay(latencies.db);
        return { pool: 'ok' };
      });
      registry.register('cache', async () => {
        await delay(latencies.cache);
      });
      registry.register('queue', async () => {
        await delay(latencies.queue);
        throw new Error('timeout');
      });
      return registry;
    };

    const first = await build({ db: 30, cache: 15, queue: 1 }).checkAll(
      new AbortController().signal,
    );
    const second = await build({ db: 1, cache: 15, queue: 30 }).checkAll(
      new AbortController().signal,
    );

    const toJSON = (services: typeof first.services) =>
      new Map(Array.from(services, ([name, health]) => [name, serviceHealthToJSON(health)]));

    assert.strictEqual(first.status, second.status);
    assert.strictEqual(summarize(toJSON(first.services)), summarize(toJSON(second.services)));
    assert.deepStrictEqual(Array.from(first.services.keys()), ['db', 'cache', 'queue']);
  });

  void it('should run checks concurrently', async () => {
    const registry = new HealthRegistry();
    for (const name of ['a', 'b', 'c', 'd']) {
      registry.register(name, () => delay(50));
    }

    const started = performance.now();
    await registry.checkAll(new AbortController().signal);
    const elapsed = performance.now() - started;

    assert.ok(elapsed < 150, `expected concurrent checks, took ${String(elapsed)}ms`);
  });

  void it('should replace a dependency registered twice under the same name', async () => {
    const registry = new HealthRegistry();
    registry.register('db', () => Promise.reject(new Error('old')));
    registry.register('db', () => undefined);

    const result = await registry.checkAll(new AbortController().signal);

    assert.strictEqual(registry.size, 1);
    assert.strictEqual(result.status, 'healthy');
  });

  void it('should pass the signal through to every checker', async () => {
    const registry = new HealthRegistry();
    const seen: boolean[] = [];
    registry.register('a', (signal) => {
      seen.push(signal.aborted);
    });
    registry.register('b', {
      healthCheck(signal) {
        seen.push(signal.aborted);
      },
    });

    const controller = new AbortController();
    controller.abort();
    await registry.checkAll(controller.signal);

    assert.deepStrictEqual(seen, [true, true]);
  });

  void it('should report every completed check to the observer', async () => {
    const observed: [string, boolean][] = [];
    const registry = new HealthRegistry((name, isHealthy) => {
      observed.push([name, isHealthy]);
    });
    registry.register('db', () => undefined);
    registry.register('queue', () => Promise.reject(new Error('timeout')));

    await registry.checkAll(new AbortController().signal);
    await registry.checkOne('db', new AbortController().signal);

    assert.deepStrictEqual(
      observed.sort(([a], [b]) => a.localeCompare(b)),
      [
        ['db', true],
        ['db', true],
        ['queue', false],
      ],
    );
  });

  void it('should return undefined from checkOne for an unknown dependency', async () => {
    const registry = new HealthRegistry();
    registry.register('db', () => undefined);

    assert.strictEqual(await registry.checkOne('missing', new AbortController().signal), undefined);
  });

  void it('should call each checker once per pass', async () => {
    const registry = new HealthRegistry();
    let calls = 0;
    registry.register('counted', () => {
      calls += 1;
    });

    await registry.checkAll(new AbortController().signal);
    await registry.checkAll(new AbortController().signal);

    assert.strictEqual(calls, 2);
  });
});
