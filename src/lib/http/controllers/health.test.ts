import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { setTimeout as sleep } from 'node:timers/promises';
import { isDeepStrictEqual } from 'node:util';

import { HTTP } from '../index.js';
import { baseUrl, captureLogger, type LogEntry, waitFor } from '../test-utils.js';

class DependencyError extends Error {
  constructor(
    message: string,
    private readonly code: number,
  ) {
    super(message);
  }

  toJSON() {
    return { message: this.message, code: this.code };
  }
}

void describe('Health Controller', () => {
  void describe('with dependencies', () => {
    const { log, entries } = captureLogger();
    let server: HTTP;
    let url: string;

    before(async () => {
      server = new HTTP(
        {
          healthDependencies: {
            db: async () => {
              await sleep(10);
            },
            cache: () => 'ok',
            queue: () => {
              throw new Error('timeout');
            },
          },
        },
        { port: 0, logger: log },
      );
      server.addHealthDependency('search', {
        healthCheck: () => Promise.reject(new DependencyError('index missing', 7)),
      });
      await server.start();
      url = baseUrl(server.port);
    });

    after(async () => {
      await server.stop();
    });

    void it('should answer 500 with an empty body when any dependency fails', async () => {
      const response = await fetch(`${url}/health`);

      assert.strictEqual(response.status, 500);
      assert.strictEqual(response.headers.get('content-type'), 'application/json');
      assert.strictEqual(await response.text(), '');
    });

    void it('should report every dependency when verbose', async () => {
      const response = await fetch(`${url}/health?verbose`);
      const body: unknown = await response.json();

      assert.strictEqual(response.status, 500);
      assert.ok(body != null && typeof body === 'object' && 'uptime' in body);
      assert.strictEqual(typeof body.uptime, 'number');
      assert.deepStrictEqual(body, {
        status: 'unhealthy',
        uptime: body.uptime,
        services: {
          db: { status: 'healthy' },
          cache: { status: 'healthy', details: 'ok' },
          queue: { status: 'unhealthy', details: 'timeout' },
          search: { status: 'unhealthy', details: { message: 'index missing', code: 7 } },
        },
      });
    });

    void it('should treat any value of the verbose parameter as verbose', async () => {
      const response = await fetch(`${url}/health?verbose=false`);

      assert.notStrictEqual(await response.text(), '');
    });

    void it('should stay terse when only other query parameters are present', async () => {
      const response = await fetch(`${url}/health?format=json&verbosity=1`);

      assert.strictEqual(response.status, 500);
      assert.strictEqual(await response.text(), '');
    });

    void it('should answer a healthy dependency with 200', async () => {
      const response = await fetch(`${url}/health/db`);

      assert.strictEqual(response.status, 200);
      assert.strictEqual(response.headers.get('content-type'), 'application/json');
      assert.strictEqual(await response.text(), '');
    });

    void it('should report the bare status of a dependency without detail', async () => {
      const response = await fetch(`${url}/health/db?verbose`);

      assert.strictEqual(await response.text(), '"healthy"');
    });

    void it('should report the bare detail of a single dependency', async () => {
      const failing = await fetch(`${url}/health/queue?verbose`);
      assert.strictEqual(failing.status, 500);
      assert.strictEqual(await failing.text(), '"timeout"');

      const structured = await fetch(`${url}/health/search?verbose`);
      assert.deepStrictEqual(await structured.json(), { message: 'index missing', code: 7 });
    });

    void it('should answer unknown dependencies with a plain-text 404', async () => {
      for (const path of ['/health/nope', '/health/nope?verbose']) {
        const response = await fetch(`${url}${path}`);

        assert.strictEqual(response.status, 404);
        assert.strictEqual(response.headers.get('content-type'), 'text/plain; charset=utf-8');
        assert.strictEqual(await response.text(), '404 page not found');
      }
    });

    void it('should log the outcome of a check', async () => {
      const response = await fetch(`${url}/health/cache`);
      await response.text();

      const isCacheCheck = (e: LogEntry) =>
        e.message === 'health check' && isDeepStrictEqual(e.health, { cache: 'ok' });
      await waitFor(() => entries.some(isCacheCheck));

      const logged = entries.find(isCacheCheck);
      assert.ok(logged);
      assert.strictEqual(logged.level, 'info');
      assert.strictEqual(typeof logged.correlation_id, 'string');
    });
  });

  void describe('without dependencies', () => {
    let server: HTTP;
    let url: string;

    before(async () => {
      server = new HTTP({}, { port: 0, logger: captureLogger().log });
      await server.start();
      url = baseUrl(server.port);
    });

    after(async () => {
      await server.stop();
    });

    void it('should be healthy and omit services', async () => {
      const response = await fetch(`${url}/health?verbose`);
      const body: unknown = await response.json();

      assert.strictEqual(response.status, 200);
      assert.ok(body != null && typeof body === 'object' && 'uptime' in body);
      assert.deepStrictEqual(Object.keys(body).sort(), ['status', 'uptime']);
      assert.ok('status' in body && body.status === 'healthy');
      assert.strictEqual(typeof body.uptime, 'number');
    });
  });

  void describe('with a version', () => {
    let server: HTTP;

    before(async () => {
      server = new HTTP(
        { healthDependencies: { db: () => ({ connections: 3 }) } },
        { port: 0, version: '2.0.1', logger: captureLogger().log },
      );
      await server.start();
    });

    after(async () => {
      await server.stop();
    });

    void it('should include the version and structured details', async () => {
      const response = await fetch(`${baseUrl(server.port)}/health?verbose`);
      const body: unknown = await response.json();

      assert.strictEqual(response.status, 200);
      assert.ok(body != null && typeof body === 'object' && 'uptime' in body);
      assert.deepStrictEqual(body, {
        status: 'healthy',
        version: '2.0.1',
        uptime: body.uptime,
        services: { db: { status: 'healthy', details: { connections: 3 } } },
      });
    });
  });
});
