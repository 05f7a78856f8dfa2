/**
 * @fileoverview Session environment bridge
 *
 * Session-scoped key/value store filled by SessionStart handlers and injected
 * into every later handler process of the same session.
 *
 * Readers get frozen snapshots. A write swaps in a new frozen map, so a
 * snapshot taken before the write (and any process spawned from it) never
 * observes it.
 */

import { createLogger, LogErrorCategory, LogErrorCodes } from '../../infrastructure/logging/index.js';
import { ENV_KEY_PATTERN, type EnvFileEntry } from './env-file.js';

const logger = createLogger('hooks:session-env');

export type SessionEnvironmentSnapshot = Readonly<Record<string, string>>;

const EMPTY: SessionEnvironmentSnapshot = Object.freeze({});

/**
 * Write access to a session's environment for one SessionStart dispatch.
 * Writes are accepted only through the window, and only until it is closed.
 */
export interface StartupWindow {
  readonly isOpen: boolean;
  /**
   * Record a variable for all later handlers in this session. Rejected once
   * the window is closed or for keys that are not valid variable names.
   */
  recordStartupVariable(key: string, value: string): boolean;
  /** @returns number of variables recorded */
  recordAll(entries: readonly EnvFileEntry[]): number;
  close(): void;
}

export class EnvironmentBridge {
  private current: SessionEnvironmentSnapshot = EMPTY;
  private isDisposed = false;

  constructor(readonly sessionId: string) {}

  /**
   * Open a write window for the SessionStart dispatch that holds it. Other
   * dispatches of the session keep read-only access.
   */
  openStartupWindow(): StartupWindow {
    let closed = false;
    const isOpen = (): boolean => !closed && !this.isDisposed;

    const recordStartupVariable = (key: string, value: string): boolean => {
      if (!isOpen()) {
        logger.warn('Session environment write rejected outside SessionStart', {
          sessionId: this.sessionId,
          key,
          code: LogErrorCodes.SENV_WRITE_REJECTED,
          category: LogErrorCategory.SESSION_ENV,
        });
        return false;
      }
      return this.write(key, value);
    };

    return {
      get isOpen() {
        return isOpen();
      },
      recordStartupVariable,
      recordAll(entries) {
        let recorded = 0;
        for (const { key, value } of entries) {
          if (recordStartupVariable(key, value)) {
            recorded++;
          }
        }
        return recorded;
      },
      close() {
        closed = true;
      },
    };
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  private write(key: string, value: string): boolean {
    if (!ENV_KEY_PATTERN.test(key)) {
      logger.warn('Invalid session environment key', { sessionId: this.sessionId, key });
      return false;
    }

    this.current = Object.freeze({ ...this.current, [key]: value });
    logger.debug('Session variable recorded', { sessionId: this.sessionId, key });
    return true;
  }

  snapshot(): SessionEnvironmentSnapshot {
    return this.current;
  }

  /**
   * Drop all variables; later writes are rejected.
   */
  dispose(): void {
    this.current = EMPTY;
    this.isDisposed = true;
    logger.debug('Session environment disposed', { sessionId: this.sessionId });
  }
}
