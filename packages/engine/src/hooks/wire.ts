/**
 * @fileoverview Handler wire format
 *
 * The JSON document written to a command handler's stdin, and the optional
 * JSON document a handler may print on stdout.
 */

import { z } from 'zod';
import type { HookEvent } from './types.js';

// =============================================================================
// Handler Input
// =============================================================================

export interface HookInputDocument {
  session_id: string;
  hook_event_name: string;
  tool_name?: string;
  tool_input?: unknown;
  tool_response?: unknown;
  cwd: string;
  permission_mode: string;
  [field: string]: unknown;
}

/** Payload keys that have a dedicated name on the wire */
const PAYLOAD_KEY_ALIASES: Record<string, string> = {
  actionInput: 'tool_input',
  actionResponse: 'tool_response',
};

export function toSnakeCase(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}

/**
 * Build the stdin document. Base fields win over payload fields of the same name.
 */
export function toHookInput(event: HookEvent): HookInputDocument {
  const fromPayload: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(event.payload)) {
    fromPayload[PAYLOAD_KEY_ALIASES[key] ?? toSnakeCase(key)] = value;
  }

  return {
    ...fromPayload,
    session_id: event.sessionId,
    hook_event_name: event.eventName,
    ...(event.actionName !== undefined && { tool_name: event.actionName }),
    cwd: event.workingDirectory,
    permission_mode: event.permissionMode,
  };
}

export function serializeEvent(event: HookEvent): string {
  return JSON.stringify(toHookInput(event));
}

// =============================================================================
// Handler Output
// =============================================================================

const jsonObject = z.record(z.unknown());

export const hookSpecificOutputSchema = z
  .object({
    hookEventName: z.string().optional(),
    permissionDecision: z.string().optional(),
    permissionDecisionReason: z.string().optional(),
    updatedInput: jsonObject.optional(),
    additionalContext: z.string().optional(),
  })
  .passthrough();

export const commandOutputSchema = z
  .object({
    decision: z.string().optional(),
    reason: z.string().optional(),
    continue: z.boolean().optional(),
    stopReason: z.string().optional(),
    systemMessage: z.string().optional(),
    hookSpecificOutput: hookSpecificOutputSchema.optional(),
  })
  .passthrough();

export type CommandOutput = z.infer<typeof commandOutputSchema>;

/**
 * Parse text as a single JSON object. Anything else (arrays, scalars,
 * prose, trailing text) yields undefined.
 */
export function parseJsonObject(text: string): Record<string, unknown> | undefined {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{')) {
    return undefined;
  }

  let value: unknown;
  try {
    value = JSON.parse(trimmed);
  } catch {
    return undefined;
  }

  const parsed = jsonObject.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Structured output from a command handler's stdout, if it printed any.
 * Documents with fields of the wrong type are treated as absent.
 */
export function parseCommandOutput(stdout: string): CommandOutput | undefined {
  const object = parseJsonObject(stdout);
  if (!object) {
    return undefined;
  }
  const parsed = commandOutputSchema.safeParse(object);
  return parsed.success ? parsed.data : undefined;
}
