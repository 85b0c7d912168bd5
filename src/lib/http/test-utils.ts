import { Writable } from 'node:stream';
import { setTimeout as sleep } from 'node:timers/promises';

import type { RequestHandler } from 'express';
import winston from 'winston';

import type { Logger } from '../logger.js';
import type { Recorder } from '../metrics/recorder.js';

export type LogEntry = Record<string, unknown> & { level: string; message: string };

const isLogEntry = (value: unknown): value is LogEntry =>
  value != null &&
  typeof value === 'object' &&
  'level' in value &&
  typeof value.level === 'string' &&
  'message' in value &&
  typeof value.message === 'string';

/**
 * Logger writing JSON lines into memory, for asserting on what the server logged
 */
export function captureLogger(): { log: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      for (const line of chunk.toString().split('\n')) {
        if (line.trim() === '') continue;
        const parsed: unknown = JSON.parse(line);
        if (isLogEntry(parsed)) {
          entries.push(parsed);
        }
      }
      callback();
    },
  });

  const log = winston.createLogger({
    level: 'debug',
    format: winston.format.json(),
    transports: [new winston.transports.Stream({ stream })],
  });

  return { log, entries };
}

/**
 * Poll until `predicate` holds. Log lines and metrics are recorded when the response closes,
 * which can be after the client already has the body.
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${String(timeoutMs)}ms`);
    }
    await sleep(5);
  }
}

export const baseUrl = (port: number) => `http://localhost:${String(port)}`;

export interface Observation {
  kind: 'duration' | 'size';
  method: string;
  path: string;
  code: number;
  value: number;
}

/**
 * Recorder keeping every observation in memory. Each one is also appended to `events` as a
 * short line, for asserting on ordering against other events.
 */
export class MemoryRecorder implements Recorder {
  observations: Observation[] = [];
  health: [string, boolean][] = [];

  constructor(readonly events: string[] = []) {}

  handler(): RequestHandler {
    return (_req, res) => {
      res.end();
    };
  }

  observeHealth(name: string, isHealthy: boolean): void {
    this.health.push([name, isHealthy]);
    this.events.push(`health ${name} ${String(isHealthy)}`);
  }

  observeRequestDuration(method: string, path: string, code: number, durationMs: number): void {
    this.observations.push({ kind: 'duration', method, path, code, value: durationMs });
    this.events.push(`duration ${method} ${path} ${String(code)}`);
  }

  observeResponseSize(method: string, path: string, code: number, bytes: number): void {
    this.observations.push({ kind: 'size', method, path, code, value: bytes });
    this.events.push(`size ${method} ${path} ${String(code)}`);
  }
}
