import type { ServerResponse } from 'node:http';

const byteLength = (chunk: unknown, encoding: unknown): number => {
  if (typeof chunk === 'string') {
    return Buffer.byteLength(
      chunk,
      typeof encoding === 'string' && Buffer.isEncoding(encoding) ? encoding : 'utf8',
    );
  }
  if (chunk instanceof Uint8Array) {
    return chunk.byteLength;
  }
  return 0;
};

/**
 * Records the status code and body size of one response without changing what is sent.
 *
 * `statusCode` follows whatever is written with the headers, and before that the status set
 * on the response (200 unless changed). `size` is the sum of every body chunk passed to
 * `write` and `end`. `ended` resolves the first time the handler chain ends the response,
 * even when the client is already gone.
 */
export class TelemetryWriter {
  size = 0;
  readonly ended: Promise<void>;
  private writtenStatus: number | undefined;
  private markEnded: () => void = () => undefined;

  constructor(private readonly response: ServerResponse) {
    this.ended = new Promise((resolve) => {
      this.markEnded = resolve;
    });

    const writeHead = response.writeHead;
    const write = response.write;
    const end = response.end;

    response.writeHead = (statusCode: number, ...rest: unknown[]) => {
      this.writtenStatus = statusCode;
      return Reflect.apply(writeHead, response, [statusCode, ...rest]);
    };

    response.write = (chunk: unknown, ...rest: unknown[]) => {
      this.size += byteLength(chunk, rest[0]);
      return Reflect.apply(write, response, [chunk, ...rest]);
    };

    response.end = (...args: unknown[]) => {
      if (typeof args[0] !== 'function') {
        this.size += byteLength(args[0], args[1]);
      }
      this.markEnded();
      return Reflect.apply(end, response, args);
    };
  }

  get statusCode(): number {
    return this.writtenStatus ?? this.response.statusCode;
  }

  /** Whether the status line has already gone out */
  get headersSent(): boolean {
    return this.response.headersSent;
  }
}
