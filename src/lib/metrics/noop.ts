import type { RequestHandler } from 'express';

import type { Recorder } from './recorder.js';

/** Recorder that drops every observation. Its scrape handler answers with an empty body. */
export class NoOpRecorder implements Recorder {
  handler(): RequestHandler {
    return (_req, res) => {
      res.end();
    };
  }

  observeHealth(): void {}

  observeRequestDuration(): void {}

  observeResponseSize(): void {}
}
