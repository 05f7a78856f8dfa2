/**
 * @fileoverview Hook type definitions
 *
 * Events the host dispatches, the rules they are matched against, what a
 * handler produces and the decision returned to the host.
 */

import type { ActionMatcher } from './rules/matcher.js';

// =============================================================================
// Hook Events
// =============================================================================

export const HOOK_EVENT_NAMES = [
  'PreAction',         // Before a tool/action runs
  'PostAction',        // After a tool/action completes
  'SessionStart',      // Session begins
  'SessionEnd',        // Session ends
  'UserInput',         // User submits a prompt
  'Notification',      // Host notification
  'PreCompact',        // Before context compaction
  'SubagentStop',      // Subagent finishes
  'Stop',              // Agent is about to stop
  'PermissionRequest', // Host is about to ask the user for permission
] as const;

export type HookEventName = (typeof HOOK_EVENT_NAMES)[number];

/**
 * Events whose default outcome is `allow` because they gate an action
 */
export const PERMISSION_EVENTS: ReadonlySet<HookEventName> = new Set<HookEventName>([
  'PreAction',
  'PermissionRequest',
]);

export function isHookEventName(value: string): value is HookEventName {
  return HOOK_EVENT_NAMES.some(name => name === value);
}

export type HookPayload = Readonly<Record<string, unknown>>;

/**
 * One lifecycle notification from the host. Frozen on creation.
 */
export interface HookEvent {
  readonly eventName: HookEventName;
  readonly sessionId: string;
  readonly workingDirectory: string;
  readonly permissionMode: string;
  /** Tool/action this event concerns; used for matching */
  readonly actionName?: string;
  /** Event-specific fields: actionInput, actionResponse, prompt, message, ... */
  readonly payload: HookPayload;
}

export interface HookEventInit {
  eventName: HookEventName;
  sessionId: string;
  workingDirectory: string;
  permissionMode?: string;
  actionName?: string;
  payload?: Record<string, unknown>;
}

export function createHookEvent(init: HookEventInit): HookEvent {
  const event: HookEvent = {
    eventName: init.eventName,
    sessionId: init.sessionId,
    workingDirectory: init.workingDirectory,
    permissionMode: init.permissionMode ?? 'default',
    payload: Object.freeze({ ...init.payload }),
    ...(init.actionName !== undefined && { actionName: init.actionName }),
  };
  return Object.freeze(event);
}

// =============================================================================
// Rules
// =============================================================================

export type HandlerKind = 'command' | 'prompt';

export type PromptFieldType = 'string' | 'number' | 'boolean' | 'object' | 'array';

export interface CommandHandlerSpec {
  kind: 'command';
  /** Shell command line, or the executable when `args` is given */
  command: string;
  args?: readonly string[];
}

export interface PromptHandlerSpec {
  kind: 'prompt';
  /** Instruction template with {{placeholders}} and optional $ARGUMENTS */
  prompt: string;
  model?: string;
  /** Fields required in the response beyond decision/reason/continue */
  schema: Readonly<Record<string, PromptFieldType>>;
}

export type HandlerSpec = CommandHandlerSpec | PromptHandlerSpec;

/**
 * Compiled configuration entry. Read-only once loaded.
 */
export interface HookRule {
  /** Stable identifier, e.g. `project:PreAction[0].hooks[1]` */
  readonly id: string;
  readonly eventName: HookEventName;
  readonly matcherPattern: string;
  readonly matcher: ActionMatcher;
  readonly handler: HandlerSpec;
  readonly timeoutSeconds: number;
}

// =============================================================================
// Handler Results
// =============================================================================

/**
 * Raw outcome of one handler invocation
 */
export interface HandlerResult {
  readonly kind: HandlerKind;
  /** Command handlers only */
  readonly exitCode?: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
  /** The host aborted the dispatch while this handler ran */
  readonly cancelled: boolean;
  readonly processError?: string;
  /** Prompt handlers only: the validated response object */
  readonly parsedJson?: Readonly<Record<string, unknown>>;
  readonly durationMs: number;
}

// =============================================================================
// Decisions
// =============================================================================

export type Permission = 'allow' | 'deny' | 'ask' | 'unspecified';

export interface Decision {
  permission: Permission;
  /** Action must not proceed (PreAction) / host must not stop (Stop) */
  blocking: boolean;
  reason: string;
  /** Replacement for the action input; only honored with `allow` */
  updatedPayload?: Record<string, unknown>;
  /** Whether the remaining rules for this event still run */
  continueChain: boolean;
  /** Advisory text for the user */
  systemMessage?: string;
  /** Text the host should add to the model's context */
  additionalContext?: string;
}
