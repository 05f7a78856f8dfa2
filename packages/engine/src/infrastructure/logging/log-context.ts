/**
 * @fileoverview Logging Context - AsyncLocalStorage for automatic context propagation
 *
 * Carries session, event and dispatch identifiers through one dispatch call
 * without threading them through every handler.
 */

import { AsyncLocalStorage } from 'async_hooks';

export interface LoggingContext {
  sessionId?: string;
  eventName?: string;
  dispatchId?: string;
  ruleId?: string;
}

const loggingContext = new AsyncLocalStorage<LoggingContext>();

/**
 * Run a function with the specified logging context.
 * Nested calls merge with the parent context.
 *
 * @example
 * withLoggingContext({ sessionId: 'sess_123' }, () => {
 *   logger.info('This log will have sessionId attached');
 * });
 */
export function withLoggingContext<T>(context: LoggingContext, fn: () => T): T {
  const parentContext = loggingContext.getStore() ?? {};
  return loggingContext.run({ ...parentContext, ...context }, fn);
}

/**
 * Returns an empty object outside of a withLoggingContext block.
 */
export function getLoggingContext(): LoggingContext {
  return loggingContext.getStore() ?? {};
}
