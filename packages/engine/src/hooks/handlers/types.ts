/**
 * @fileoverview Handler contract
 *
 * Command and prompt handlers share one execute() signature so the
 * dispatcher never branches on handler kind.
 */

import type { HandlerKind, HandlerResult, HookEvent, HookRule } from '../types.js';
import type { SessionEnvironmentSnapshot } from '../session/environment-bridge.js';
import { MAX_TIMEOUT_SEC } from '../../infrastructure/settings/index.js';

export interface HandlerContext {
  event: HookEvent;
  /** Session variables visible to this invocation */
  environment: SessionEnvironmentSnapshot;
  timeoutSeconds: number;
  /** Host cancellation */
  signal?: AbortSignal;
  /** SessionStart only: file the handler may append KEY=VALUE lines to */
  envFilePath?: string;
}

export interface Handler {
  readonly kind: HandlerKind;
  execute(rule: HookRule, context: HandlerContext): Promise<HandlerResult>;
}

/**
 * Handler deadline in milliseconds, clamped to [0, MAX_TIMEOUT_SEC] so a
 * timer never overflows its 32-bit delay.
 */
export function deadlineMs(timeoutSeconds: number): number {
  const seconds = Number.isFinite(timeoutSeconds) ? timeoutSeconds : MAX_TIMEOUT_SEC;
  return Math.round(Math.min(Math.max(seconds, 0), MAX_TIMEOUT_SEC) * 1000);
}

/**
 * Result for a handler that could not run at all
 */
export function failedResult(kind: HandlerKind, processError: string, durationMs = 0): HandlerResult {
  return {
    kind,
    stdout: '',
    stderr: '',
    timedOut: false,
    cancelled: false,
    processError,
    durationMs,
  };
}
