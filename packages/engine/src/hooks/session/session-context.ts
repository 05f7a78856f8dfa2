/**
 * @fileoverview Session context
 *
 * Handle a host holds for one session, from SessionStart to SessionEnd. It
 * owns the session's environment and passes it to every dispatch, so
 * variables recorded during SessionStart reach the handlers of later events.
 */

import type { Decision, HookEvent } from '../types.js';
import { createLogger } from '../../infrastructure/logging/index.js';
import type { EventDispatcher } from '../dispatcher.js';
import { defaultDecision } from '../decisions/decision-aggregator.js';
import { EnvironmentBridge, type SessionEnvironmentSnapshot } from './environment-bridge.js';

const logger = createLogger('hooks:session');

export interface SessionDispatchOptions {
  signal?: AbortSignal;
}

export class SessionContext {
  readonly environment: EnvironmentBridge;

  constructor(
    readonly sessionId: string,
    private readonly dispatcher: EventDispatcher
  ) {
    this.environment = new EnvironmentBridge(sessionId);
  }

  get closed(): boolean {
    return this.environment.disposed;
  }

  /**
   * Dispatch an event of this session. Events of another session, or events
   * arriving after the session ended, get their default decision without
   * running any handler.
   */
  async dispatch(event: HookEvent, options: SessionDispatchOptions = {}): Promise<Decision> {
    if (event.sessionId !== this.sessionId) {
      logger.warn('Event belongs to another session, not dispatched', {
        sessionId: this.sessionId,
        eventSessionId: event.sessionId,
        eventName: event.eventName,
      });
      return defaultDecision(event.eventName);
    }

    if (this.closed) {
      logger.warn('Event received after session end, not dispatched', {
        sessionId: this.sessionId,
        eventName: event.eventName,
      });
      return defaultDecision(event.eventName);
    }

    try {
      return await this.dispatcher.dispatch(event, {
        signal: options.signal,
        environment: this.environment,
      });
    } finally {
      if (event.eventName === 'SessionEnd') {
        this.close();
      }
    }
  }

  snapshot(): SessionEnvironmentSnapshot {
    return this.environment.snapshot();
  }

  /**
   * Release the session's environment. Safe to call more than once.
   */
  close(): void {
    if (!this.closed) {
      this.environment.dispose();
      logger.debug('Session closed', { sessionId: this.sessionId });
    }
  }
}
