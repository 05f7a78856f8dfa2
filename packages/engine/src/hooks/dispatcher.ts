/**
 * @fileoverview Event dispatcher
 *
 * Runs the rules matching one event, one handler at a time, interpreting
 * and folding each result before the next handler starts. A deny or a
 * stop request ends the chain early; everything else is fail-open.
 *
 * dispatch() never rejects: unexpected errors are logged and turned into
 * the event's default decision.
 */

import { randomUUID } from 'crypto';
import type { Decision, HandlerKind, HandlerResult, HookEvent, HookRule } from './types.js';
import type { EngineSettings } from '../infrastructure/settings/index.js';
import { getSettings } from '../infrastructure/settings/index.js';
import {
  categorizeError,
  createLogger,
  LogErrorCategory,
  LogErrorCodes,
  withLoggingContext,
} from '../infrastructure/logging/index.js';
import { RuleMatcher, type RuleStore } from './rules/rule-store.js';
import { CommandHandler } from './handlers/command-handler.js';
import { PromptHandler } from './handlers/prompt-handler.js';
import type { CompletionBackend } from './handlers/completion-backend.js';
import { failedResult, type Handler } from './handlers/types.js';
import { interpret } from './decisions/result-interpreter.js';
import { DecisionFold, defaultDecision } from './decisions/decision-aggregator.js';
import { EnvironmentBridge, type StartupWindow } from './session/environment-bridge.js';
import { createEnvFile, type EnvFileHandle, type ParsedEnvFile } from './session/env-file.js';

const logger = createLogger('hooks:dispatcher');

export interface EventDispatcherOptions {
  rules: RuleStore;
  /** Replace the built-in handler for a kind */
  handlers?: Partial<Record<HandlerKind, Handler>>;
  /** Backend for prompt rules; without one (and no prompt handler) they fail open */
  completionBackend?: CompletionBackend;
  settings?: EngineSettings;
}

export interface DispatchOptions {
  /** Host cancellation: stops the running handler and skips the rest */
  signal?: AbortSignal;
  /** Session environment; a throwaway one is used when omitted */
  environment?: EnvironmentBridge;
}

/** What one rule execution may see and write within a dispatch */
interface RuleScope {
  environment: EnvironmentBridge;
  /** Present only while this dispatch handles SessionStart */
  startupWindow?: StartupWindow;
  signal?: AbortSignal;
}

export class EventDispatcher {
  private readonly matcher: RuleMatcher;
  private readonly handlers = new Map<HandlerKind, Handler>();

  constructor(private readonly options: EventDispatcherOptions) {
    this.matcher = new RuleMatcher(options.rules);

    this.handlers.set(
      'command',
      options.handlers?.command ?? new CommandHandler({ settings: options.settings?.hooks })
    );

    const prompt = options.handlers?.prompt ??
      (options.completionBackend &&
        new PromptHandler(options.completionBackend, {
          hookSettings: options.settings?.hooks,
          promptSettings: options.settings?.prompt,
        }));
    if (prompt) {
      this.handlers.set('prompt', prompt);
    }
  }

  private get settings(): EngineSettings {
    return this.options.settings ?? getSettings();
  }

  get rules(): RuleStore {
    return this.options.rules;
  }

  /**
   * Match, execute and aggregate. Resolves with the event's default decision
   * when nothing matches.
   */
  async dispatch(event: HookEvent, options: DispatchOptions = {}): Promise<Decision> {
    const context = {
      sessionId: event.sessionId,
      eventName: event.eventName,
      dispatchId: randomUUID(),
    };

    return withLoggingContext(context, async () => {
      try {
        return await this.runChain(event, options);
      } catch (error) {
        const structured = categorizeError(error, { eventName: event.eventName });
        logger.error('Dispatch failed, using default decision', {
          code: LogErrorCodes.HOOK_ERROR,
          category: structured.category,
          error: structured.message,
        });
        return defaultDecision(event.eventName);
      }
    });
  }

  private async runChain(event: HookEvent, options: DispatchOptions): Promise<Decision> {
    const settings = this.settings;
    const rules = this.matcher.match(event.eventName, event.actionName);
    const fold = new DecisionFold(event.eventName, { verbose: settings.hooks.verbose });

    if (rules.length === 0) {
      logger.debug('No matching hook rules', { actionName: event.actionName });
      return fold.result();
    }

    logger.debug('Dispatching event', {
      actionName: event.actionName,
      ruleIds: rules.map(rule => rule.id),
    });

    const environment = options.environment ?? new EnvironmentBridge(event.sessionId);
    const startupWindow = event.eventName === 'SessionStart' ? environment.openStartupWindow() : undefined;
    const startTime = Date.now();

    try {
      for (const [index, rule] of rules.entries()) {
        if (options.signal?.aborted) {
          logger.info('Dispatch cancelled, skipping remaining rules', {
            code: LogErrorCodes.HOOK_CANCELLED,
            skipped: rules.length - index,
          });
          break;
        }

        const decision = await withLoggingContext({ ruleId: rule.id }, () =>
          this.runRule(rule, event, { environment, startupWindow, signal: options.signal }, settings)
        );

        if (fold.push(decision) === 'stop') {
          if (decision.permission === 'deny') {
            logger.warn('Hook denied event', { ruleId: rule.id, reason: decision.reason });
          } else {
            logger.info('Hook stopped the chain', { ruleId: rule.id, reason: decision.reason });
          }
          break;
        }
      }
    } finally {
      startupWindow?.close();
    }

    const result = fold.result();
    logger.info('Dispatch complete', {
      permission: result.permission,
      blocking: result.blocking,
      handlersRun: fold.size,
      matched: rules.length,
      duration: Date.now() - startTime,
    });
    return result;
  }

  private async runRule(
    rule: HookRule,
    event: HookEvent,
    scope: RuleScope,
    settings: EngineSettings
  ): Promise<Decision> {
    const result = await this.execute(rule, event, scope);

    logger.debug('Handler finished', {
      kind: result.kind,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      durationMs: result.durationMs,
    });

    return interpret(rule.handler.kind, result, {
      maxReasonLength: settings.hooks.maxReasonLength,
      eventName: event.eventName,
    });
  }

  private async execute(
    rule: HookRule,
    event: HookEvent,
    { environment, startupWindow, signal }: RuleScope
  ): Promise<HandlerResult> {
    const kind = rule.handler.kind;
    const handler = this.handlers.get(kind);
    if (!handler) {
      logger.warn('No handler available for rule', { kind });
      return failedResult(kind, `no ${kind} handler configured`);
    }

    const envFile = startupWindow?.isOpen && kind === 'command'
      ? await this.openEnvFile()
      : undefined;

    try {
      const result = await handler.execute(rule, {
        event,
        environment: environment.snapshot(),
        timeoutSeconds: rule.timeoutSeconds,
        signal,
        envFilePath: envFile?.path,
      });
      if (envFile && startupWindow) {
        await this.collectEnvFile(envFile, startupWindow);
      }
      return result;
    } catch (error) {
      const structured = categorizeError(error, { kind });
      logger.error('Hook handler threw', {
        code: LogErrorCodes.HOOK_ERROR,
        category: LogErrorCategory.HOOK_EXECUTION,
        error: structured.message,
      });
      return failedResult(kind, structured.message);
    } finally {
      await envFile?.cleanup().catch((error: unknown) => {
        logger.warn('Failed to remove env file', { error: categorizeError(error).message });
      });
    }
  }

  private async openEnvFile(): Promise<EnvFileHandle | undefined> {
    try {
      return await createEnvFile();
    } catch (error) {
      const structured = categorizeError(error);
      logger.error('Could not create env file, handler runs without one', {
        code: structured.code,
        category: LogErrorCategory.SESSION_ENV,
        error: structured.message,
      });
      return undefined;
    }
  }

  private async collectEnvFile(envFile: EnvFileHandle, startupWindow: StartupWindow): Promise<void> {
    let parsed: ParsedEnvFile;
    try {
      parsed = await envFile.read();
    } catch (error) {
      logger.warn('Could not read env file', {
        category: LogErrorCategory.SESSION_ENV,
        error: categorizeError(error).message,
      });
      return;
    }

    const { entries, skippedLines } = parsed;
    if (skippedLines.length > 0) {
      logger.debug('Skipped malformed env file lines', { lines: skippedLines });
    }
    const recorded = startupWindow.recordAll(entries);
    if (recorded > 0) {
      logger.debug('Session variables recorded from env file', { count: recorded });
    }
  }
}
