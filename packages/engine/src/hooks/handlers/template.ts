/**
 * @fileoverview Prompt rule templates
 *
 * Placeholders:
 * - `$ARGUMENTS`: the event as the JSON document command handlers receive
 * - `{{eventName}}`, `{{actionName}}`, `{{workingDirectory}}`,
 *   `{{sessionId}}`, `{{permissionMode}}`
 * - `{{payload.a.b}}`: dotted payload lookup, non-strings rendered as JSON
 * - `{{env.KEY}}`: session environment variable
 *
 * Missing values render empty. Unknown placeholders are left as written.
 */

import type { HookEvent, PromptFieldType } from '../types.js';
import type { SessionEnvironmentSnapshot } from '../session/environment-bridge.js';
import { serializeEvent } from '../wire.js';
import { RESERVED_RESPONSE_FIELDS } from '../rules/schema.js';

export const ARGUMENTS_PLACEHOLDER = '$ARGUMENTS';

/** `$ARGUMENTS` or a `{{name}}` placeholder; substituted text is never scanned again */
const PLACEHOLDER_PATTERN = /\$ARGUMENTS|\{\{\s*([\w.-]+)\s*\}\}/g;

export interface PromptTemplateContext {
  event: HookEvent;
  environment: SessionEnvironmentSnapshot;
}

export interface PromptRequestText {
  system: string;
  prompt: string;
}

function render(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

function lookupPath(root: unknown, path: string[]): unknown {
  let current = root;
  for (const segment of path) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Object.getOwnPropertyDescriptor(current, segment)?.value;
  }
  return current;
}

function resolvePlaceholder(name: string, { event, environment }: PromptTemplateContext): string | undefined {
  const [head, ...rest] = name.split('.');

  switch (head) {
    case 'eventName':
      return event.eventName;
    case 'actionName':
      return event.actionName ?? '';
    case 'workingDirectory':
      return event.workingDirectory;
    case 'sessionId':
      return event.sessionId;
    case 'permissionMode':
      return event.permissionMode;
    case 'payload':
      return render(rest.length === 0 ? event.payload : lookupPath(event.payload, rest));
    case 'env':
      return rest.length === 1 ? environment[rest.join('.')] ?? '' : undefined;
    default:
      return undefined;
  }
}

export function renderPrompt(template: string, context: PromptTemplateContext): string {
  let eventDocument: string | undefined;
  return template.replace(PLACEHOLDER_PATTERN, (match, name: string | undefined) => {
    if (name === undefined) {
      eventDocument ??= serializeEvent(context.event);
      return eventDocument;
    }
    return resolvePlaceholder(name, context) ?? match;
  });
}

function describeResponseShape(schema: Readonly<Record<string, PromptFieldType>>): string {
  const fields = [
    '"decision": "approve" | "block" | "continue"',
    '"reason": string',
    '"continue"?: boolean',
    ...Object.entries(schema)
      .filter(([field]) => !RESERVED_RESPONSE_FIELDS.includes(field))
      .map(([field, type]) => `${JSON.stringify(field)}: ${type}`),
  ];
  return `{ ${fields.join(', ')} }`;
}

/**
 * Build the system and user text sent to the completion backend. The event
 * document is appended unless the template placed it with $ARGUMENTS.
 */
export function buildPromptRequest(
  template: string,
  schema: Readonly<Record<string, PromptFieldType>>,
  context: PromptTemplateContext
): PromptRequestText {
  const rendered = renderPrompt(template, context);
  const prompt = template.includes(ARGUMENTS_PLACEHOLDER)
    ? rendered
    : `${rendered}\n\nHook event:\n${serializeEvent(context.event)}`;

  const system = [
    `You evaluate a ${context.event.eventName} hook event for an automated coding assistant.`,
    'Use "approve" to let it proceed, "block" to stop it, and "continue" to express no opinion.',
    'Set "continue" to false only if no further hooks should run for this event.',
    `Respond with a single JSON object and nothing else: ${describeResponseShape(schema)}`,
  ].join('\n');

  return { system, prompt };
}
