/**
 * @fileoverview Prompt handler
 *
 * Renders a rule's instruction template, asks the completion backend for a
 * decision and validates the JSON it returns. Backend errors, timeouts and
 * responses that fail validation all come back as a HandlerResult with
 * `processError` (or `timedOut`) set.
 */

import { z } from 'zod';
import type { HandlerResult, HookEvent, HookRule, PromptFieldType } from '../types.js';
import type { HookSettings, PromptSettings } from '../../infrastructure/settings/index.js';
import { getSettings } from '../../infrastructure/settings/index.js';
import { categorizeError, createLogger, LogErrorCodes } from '../../infrastructure/logging/index.js';
import type { SessionEnvironmentSnapshot } from '../session/environment-bridge.js';
import { parseJsonObject } from '../wire.js';
import { describeIssues, RESERVED_RESPONSE_FIELDS } from '../rules/schema.js';
import type { CompletionBackend } from './completion-backend.js';
import { buildPromptRequest } from './template.js';
import { deadlineMs, failedResult, type Handler, type HandlerContext } from './types.js';

const logger = createLogger('hooks:prompt');

export const PROMPT_DECISIONS = ['approve', 'block', 'continue', 'allow', 'deny', 'ask'] as const;

const baseResponseSchema = z
  .object({
    decision: z.enum(PROMPT_DECISIONS),
    reason: z.string(),
    continue: z.boolean().optional(),
  })
  .passthrough();

const FIELD_SCHEMAS: Record<PromptFieldType, z.ZodTypeAny> = {
  string: z.string(),
  number: z.number(),
  boolean: z.boolean(),
  object: z.record(z.unknown()),
  array: z.array(z.unknown()),
};

/**
 * Response schema for a rule: the decision fields plus the rule's own fields.
 * Fields named like a decision field keep the decision field's schema.
 */
export function buildResponseSchema(fields: Readonly<Record<string, PromptFieldType>>) {
  const extension: Record<string, z.ZodTypeAny> = {};
  for (const [name, type] of Object.entries(fields)) {
    if (!RESERVED_RESPONSE_FIELDS.includes(name)) {
      extension[name] = FIELD_SCHEMAS[type];
    }
  }
  return baseResponseSchema.extend(extension);
}

const CODE_FENCE = /^```[\w-]*\s*\n([\s\S]*?)\n?```$/;

/**
 * Remove one surrounding Markdown code fence, if present
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = CODE_FENCE.exec(trimmed);
  return fenced?.[1] !== undefined ? fenced[1].trim() : trimmed;
}

export interface PromptHandlerOptions {
  hookSettings?: HookSettings;
  promptSettings?: PromptSettings;
}

export interface PromptRunOptions {
  signal?: AbortSignal;
  environment?: SessionEnvironmentSnapshot;
}

class DeadlineExceeded extends Error {
  constructor(readonly timeoutSeconds: number) {
    super(`timed out after ${timeoutSeconds}s`);
    this.name = 'DeadlineExceeded';
  }
}

class Cancelled extends Error {
  constructor() {
    super('cancelled');
    this.name = 'Cancelled';
  }
}

/**
 * Settle with the backend's answer, or reject as soon as the controller
 * aborts, whether or not the backend honours the signal.
 */
function raceAbort<T>(work: Promise<T>, controller: AbortController): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(controller.signal.reason);
    if (controller.signal.aborted) {
      onAbort();
      return;
    }
    controller.signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        controller.signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        controller.signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class PromptHandler implements Handler {
  readonly kind = 'prompt' as const;

  constructor(
    private readonly backend: CompletionBackend,
    private readonly options: PromptHandlerOptions = {}
  ) {}

  private get promptSettings(): PromptSettings {
    return this.options.promptSettings ?? getSettings().prompt;
  }

  private get maxOutputBytes(): number {
    return (this.options.hookSettings ?? getSettings().hooks).maxOutputBytes;
  }

  execute(rule: HookRule, context: HandlerContext): Promise<HandlerResult> {
    return this.run(rule, context.event, context.timeoutSeconds, {
      signal: context.signal,
      environment: context.environment,
    });
  }

  async run(
    rule: HookRule,
    event: HookEvent,
    timeoutSeconds: number,
    options: PromptRunOptions = {}
  ): Promise<HandlerResult> {
    const spec = rule.handler;
    if (spec.kind !== 'prompt') {
      return failedResult('prompt', `rule ${rule.id} is not a prompt rule`);
    }
    if (options.signal?.aborted) {
      return { ...failedResult('prompt', 'cancelled'), cancelled: true };
    }

    const settings = this.promptSettings;
    const startedAt = Date.now();
    const controller = new AbortController();
    const deadline = setTimeout(
      () => controller.abort(new DeadlineExceeded(timeoutSeconds)),
      deadlineMs(timeoutSeconds)
    );
    const onHostAbort = () => controller.abort(new Cancelled());
    options.signal?.addEventListener('abort', onHostAbort, { once: true });

    const { system, prompt } = buildPromptRequest(spec.prompt, spec.schema, {
      event,
      environment: options.environment ?? {},
    });
    const model = spec.model ?? settings.model;

    let output: string;
    try {
      output = await raceAbort(
        this.backend.complete({
          system,
          prompt,
          model,
          maxTokens: settings.maxTokens,
          signal: controller.signal,
        }),
        controller
      );
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      if (error instanceof DeadlineExceeded) {
        logger.warn('Prompt handler timed out', { ruleId: rule.id, model, timeoutSeconds });
        return { kind: 'prompt', stdout: '', stderr: '', timedOut: true, cancelled: false, durationMs };
      }
      if (error instanceof Cancelled) {
        logger.info('Prompt handler cancelled', { ruleId: rule.id, code: LogErrorCodes.HOOK_CANCELLED });
        return { ...failedResult('prompt', 'cancelled', durationMs), cancelled: true };
      }

      const structured = categorizeError(error, { ruleId: rule.id, model });
      logger.error('Prompt backend failed', {
        ruleId: rule.id,
        model,
        code: structured.code,
        category: structured.category,
        error: structured.message,
        retryable: structured.retryable,
      });
      return failedResult('prompt', `completion backend error: ${structured.message}`, durationMs);
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener('abort', onHostAbort);
    }

    return this.validate(rule, spec.schema, output, Date.now() - startedAt);
  }

  private validate(
    rule: HookRule,
    fields: Readonly<Record<string, PromptFieldType>>,
    output: string,
    durationMs: number
  ): HandlerResult {
    const stdout = Buffer.byteLength(output) > this.maxOutputBytes
      ? Buffer.from(output).subarray(0, this.maxOutputBytes).toString('utf-8')
      : output;
    const result = { kind: 'prompt' as const, stdout, stderr: '', timedOut: false, cancelled: false, durationMs };

    const object = parseJsonObject(stripCodeFence(output));
    if (!object) {
      logger.warn('Prompt response is not a JSON object', {
        ruleId: rule.id,
        code: LogErrorCodes.HOUT_MALFORMED,
        preview: output.slice(0, 200),
      });
      return { ...result, processError: 'malformed response: expected a JSON object' };
    }

    const parsed = buildResponseSchema(fields).safeParse(object);
    if (!parsed.success) {
      const detail = describeIssues(parsed.error);
      logger.warn('Prompt response failed validation', {
        ruleId: rule.id,
        code: LogErrorCodes.HOUT_SCHEMA,
        detail,
      });
      return { ...result, processError: `invalid response: ${detail}` };
    }

    return { ...result, parsedJson: parsed.data };
  }
}
