/**
 * @fileoverview Zod schemas for the rule configuration document
 *
 * ```json
 * { "hooks": { "PreAction": [ { "matcher": "Bash",
 *     "hooks": [ { "type": "command", "command": "./check.sh", "timeout": 10 } ] } ] } }
 * ```
 *
 * Groups and hook entries are validated one at a time so a malformed entry
 * only excludes itself.
 */

import { z } from 'zod';
import { MAX_TIMEOUT_SEC } from '../../infrastructure/settings/index.js';

const timeoutSchema = z
  .number()
  .int('timeout must be a whole number of seconds')
  .positive('timeout must be a positive number of seconds')
  .max(MAX_TIMEOUT_SEC, `timeout must not exceed ${MAX_TIMEOUT_SEC} seconds`);

/** Response fields every prompt handler answers with; a rule schema cannot redeclare them */
export const RESERVED_RESPONSE_FIELDS: readonly string[] = ['decision', 'reason', 'continue'];

export const commandHookSchema = z.object({
  type: z.literal('command'),
  command: z.string().trim().min(1, 'command must not be empty'),
  args: z.array(z.string()).optional(),
  timeout: timeoutSchema.optional(),
});

export const promptHookSchema = z.object({
  type: z.literal('prompt'),
  prompt: z.string().trim().min(1, 'prompt must not be empty'),
  model: z.string().min(1).optional(),
  schema: z
    .record(z.enum(['string', 'number', 'boolean', 'object', 'array']))
    .refine(fields => !RESERVED_RESPONSE_FIELDS.some(name => name in fields), {
      message: `schema must not redeclare ${RESERVED_RESPONSE_FIELDS.join(', ')}`,
    })
    .optional(),
  timeout: timeoutSchema.optional(),
});

export const hookEntrySchema = z.discriminatedUnion('type', [commandHookSchema, promptHookSchema]);

export type HookEntry = z.infer<typeof hookEntrySchema>;

export const matcherGroupSchema = z.object({
  matcher: z.string().optional(),
  hooks: z.array(z.unknown()),
});

export const ruleDocumentSchema = z
  .object({
    hooks: z.record(z.unknown()).optional(),
  })
  .passthrough();

/**
 * Flatten zod issues into one line
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
