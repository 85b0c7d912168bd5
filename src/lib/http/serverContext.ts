import { AsyncLocalStorage } from 'node:async_hooks';

import type { Logger } from '../logger.js';

/** State bound to a single in-flight request */
export interface ServerContext {
  correlationId: string;
  /** Logger carrying the request's correlation_id */
  logger: Logger;
  /** Aborts when the client goes away before the response is complete */
  signal: AbortSignal;
}

class ServerContextManager {
  private asyncLocalStorage = new AsyncLocalStorage<ServerContext>();

  runWithContext<T>(context: ServerContext, fn: () => T): T {
    return this.asyncLocalStorage.run(context, fn);
  }

  findContext(): ServerContext | undefined {
    return this.asyncLocalStorage.getStore();
  }

  getContext(): ServerContext {
    const context = this.asyncLocalStorage.getStore();
    if (context == null) {
      throw new Error('No server context found, was the telemetry middleware used?');
    }
    return context;
  }
}

export const contextManager = new ServerContextManager();

export const getServerContext = (): ServerContext => {
  return contextManager.getContext();
};

/**
 * Logger for the current request, or `fallback` outside of one
 */
export const getRequestLogger = (fallback: Logger): Logger =>
  contextManager.findContext()?.logger ?? fallback;
