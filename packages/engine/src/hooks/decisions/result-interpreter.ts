/**
 * @fileoverview Handler result interpretation
 *
 * Turns one HandlerResult into a Decision. Failed handlers (timeout, spawn
 * error, cancellation, unusable prompt response) always yield a
 * non-blocking `unspecified` decision: a broken hook never allows or
 * denies anything by itself.
 *
 * Command handlers:
 * - exit 2: deny, stderr is the reason, stdout is ignored
 * - exit 0: optional JSON on stdout
 * - anything else: non-blocking warning with stderr as the reason
 */

import type { Decision, HandlerKind, HandlerResult, HookEventName, Permission } from '../types.js';
import { parseCommandOutput, type CommandOutput } from '../wire.js';

/** Exit code with which a command handler blocks the action */
export const BLOCKING_EXIT_CODE = 2;

export const DEFAULT_MAX_REASON_LENGTH = 500;

const DEFAULT_BLOCK_REASON = 'blocked by hook';

/** Events whose plain stdout is handed to the host as additional context */
const CONTEXT_EVENTS: ReadonlySet<HookEventName> = new Set<HookEventName>(['SessionStart', 'UserInput']);

export interface InterpretOptions {
  maxReasonLength?: number;
  eventName?: HookEventName;
}

export function truncateReason(text: string, maxLength: number = DEFAULT_MAX_REASON_LENGTH): string {
  const trimmed = text.trim();
  if (trimmed.length <= maxLength) {
    return trimmed;
  }
  return `${trimmed.slice(0, Math.max(0, maxLength - 1))}…`;
}

/**
 * Map a handler's decision word onto a permission. Unknown words carry no
 * opinion.
 */
export function mapDecisionValue(value: string | undefined): Permission {
  switch (value?.toLowerCase()) {
    case 'allow':
    case 'approve':
      return 'allow';
    case 'deny':
    case 'block':
      return 'deny';
    case 'ask':
      return 'ask';
    default:
      return 'unspecified';
  }
}

export function failureDecision(cause: string): Decision {
  return {
    permission: 'unspecified',
    blocking: false,
    reason: `handler failed: ${cause}`,
    continueChain: true,
  };
}

function describeFailure(result: HandlerResult): string | undefined {
  if (result.timedOut) {
    return 'timed out';
  }
  if (result.cancelled) {
    return 'cancelled';
  }
  return result.processError;
}

function decisionFromOutput(output: CommandOutput, maxReasonLength: number): Decision {
  const specific = output.hookSpecificOutput;
  const permission = mapDecisionValue(specific?.permissionDecision ?? output.decision);
  const stopped = output.continue === false;

  const reason = stopped && output.stopReason !== undefined
    ? output.stopReason
    : specific?.permissionDecisionReason ?? output.reason ?? '';

  return {
    permission,
    blocking: permission === 'deny',
    reason: truncateReason(reason, maxReasonLength),
    continueChain: !stopped,
    ...(permission === 'allow' && specific?.updatedInput ? { updatedPayload: specific.updatedInput } : {}),
    ...(output.systemMessage ? { systemMessage: output.systemMessage } : {}),
    ...(specific?.additionalContext ? { additionalContext: specific.additionalContext } : {}),
  };
}

function interpretCommand(result: HandlerResult, maxReasonLength: number, eventName?: HookEventName): Decision {
  if (result.exitCode === BLOCKING_EXIT_CODE) {
    const stderr = result.stderr.trim();
    return {
      permission: 'deny',
      blocking: true,
      reason: stderr ? truncateReason(stderr, maxReasonLength) : DEFAULT_BLOCK_REASON,
      continueChain: true,
    };
  }

  if (result.exitCode !== 0) {
    return {
      permission: 'unspecified',
      blocking: false,
      reason: truncateReason(result.stderr, maxReasonLength),
      continueChain: true,
    };
  }

  const output = parseCommandOutput(result.stdout);
  if (output) {
    return decisionFromOutput(output, maxReasonLength);
  }

  const stdout = result.stdout.trim();
  return {
    permission: 'unspecified',
    blocking: false,
    reason: '',
    continueChain: true,
    ...(stdout !== '' && eventName !== undefined && CONTEXT_EVENTS.has(eventName) ? { additionalContext: stdout } : {}),
  };
}

function interpretPrompt(result: HandlerResult, maxReasonLength: number): Decision {
  const response = result.parsedJson;
  if (!response) {
    return failureDecision('no response');
  }

  const decision = typeof response.decision === 'string' ? response.decision : undefined;
  const permission = mapDecisionValue(decision);

  return {
    permission,
    blocking: permission === 'deny',
    reason: truncateReason(typeof response.reason === 'string' ? response.reason : '', maxReasonLength),
    continueChain: response.continue !== false,
  };
}

export function interpret(kind: HandlerKind, result: HandlerResult, options: InterpretOptions = {}): Decision {
  const maxReasonLength = options.maxReasonLength ?? DEFAULT_MAX_REASON_LENGTH;

  const failure = describeFailure(result);
  if (failure !== undefined) {
    return failureDecision(failure);
  }

  return kind === 'command'
    ? interpretCommand(result, maxReasonLength, options.eventName)
    : interpretPrompt(result, maxReasonLength);
}
