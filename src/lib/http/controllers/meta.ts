import type { Recorder } from '../../metrics/recorder.js';
import { controller } from '../controller.js';
import { get } from '../endpoint.js';

export const UNVERSIONED = 'unversioned';

interface MetaControllerOptions {
  version?: string;
  recorder: Recorder;
}

/**
 * Liveness, version and metrics endpoints
 *
 * - /ping: always `pong`
 * - /version: the configured version, or `unversioned`
 * - /metrics: whatever the recorder's scrape handler serves
 */
export const metaController = ({ version, recorder }: MetaControllerOptions) =>
  controller('/')
    .description('Server metadata endpoints')
    .endpoints([
      get('/ping', 'ping')
        .description('Liveness check')
        .responseContentType('text/plain')
        .handler(() => 'pong'),

      get('/version', 'getVersion')
        .description('Version of the running service')
        .responseContentType('text/plain')
        .handler(() => (version != null && version !== '' ? version : UNVERSIONED)),

      get('/metrics', 'getMetrics')
        .description('Metrics scrape endpoint')
        .delegate(recorder.handler()),
    ]);
