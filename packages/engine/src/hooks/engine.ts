/**
 * @fileoverview Hook engine
 *
 * Entry point for hosts. Loads settings and rule files, builds the
 * dispatcher and keeps one SessionContext per open session.
 *
 * @example
 * ```typescript
 * const engine = await HookEngine.load({ projectPath: process.cwd() });
 * const session = engine.openSession('sess_123');
 * const decision = await session.dispatch(createHookEvent({
 *   eventName: 'PreAction',
 *   sessionId: 'sess_123',
 *   workingDirectory: process.cwd(),
 *   actionName: 'Bash',
 *   payload: { actionInput: { command: 'ls' } },
 * }));
 * ```
 */

import type { Decision, HandlerKind, HookEvent } from './types.js';
import type { EngineSettings } from '../infrastructure/settings/index.js';
import { preloadSettings } from '../infrastructure/settings/index.js';
import { createLogger } from '../infrastructure/logging/index.js';
import { loadRules, type HookConfigIssue, type RuleDiscoveryConfig } from './rules/config-loader.js';
import type { RuleStore } from './rules/rule-store.js';
import { EventDispatcher, type DispatchOptions } from './dispatcher.js';
import { createCompletionBackendFromEnv, type CompletionBackend } from './handlers/completion-backend.js';
import type { Handler } from './handlers/types.js';
import { SessionContext } from './session/session-context.js';

const logger = createLogger('hooks:engine');

export interface HookEngineOptions extends Omit<RuleDiscoveryConfig, 'settings'> {
  settings?: EngineSettings;
  /**
   * Backend for prompt rules. Defaults to the Anthropic backend when its API
   * key is set; `null` disables prompt rules.
   */
  completionBackend?: CompletionBackend | null;
  handlers?: Partial<Record<HandlerKind, Handler>>;
}

export class HookEngine {
  private readonly sessions = new Map<string, SessionContext>();

  constructor(
    readonly dispatcher: EventDispatcher,
    readonly issues: readonly HookConfigIssue[] = []
  ) {}

  /**
   * Load settings and rule files, then build an engine
   */
  static async load(options: HookEngineOptions = {}): Promise<HookEngine> {
    const settings = options.settings ?? (await preloadSettings());
    const { store, issues } = await loadRules({ ...options, settings: settings.hooks });

    const completionBackend = options.completionBackend === undefined
      ? createCompletionBackendFromEnv(settings.prompt)
      : options.completionBackend ?? undefined;

    const dispatcher = new EventDispatcher({
      rules: store,
      settings,
      completionBackend,
      handlers: options.handlers,
    });

    logger.info('Hook engine ready', {
      rules: store.size(),
      issues: issues.length,
      promptRulesEnabled: completionBackend !== undefined || options.handlers?.prompt !== undefined,
    });

    return new HookEngine(dispatcher, issues);
  }

  get rules(): RuleStore {
    return this.dispatcher.rules;
  }

  /**
   * Session handle for `sessionId`; an open one is reused
   */
  openSession(sessionId: string): SessionContext {
    const existing = this.sessions.get(sessionId);
    if (existing && !existing.closed) {
      return existing;
    }

    const session = new SessionContext(sessionId, this.dispatcher);
    this.sessions.set(sessionId, session);
    logger.debug('Session opened', { sessionId });
    return session;
  }

  getSession(sessionId: string): SessionContext | undefined {
    return this.sessions.get(sessionId);
  }

  closeSession(sessionId: string): void {
    this.sessions.get(sessionId)?.close();
    this.sessions.delete(sessionId);
  }

  /**
   * Dispatch through the event's open session. A SessionStart opens the
   * session; other events of an unknown session run without session
   * environment.
   */
  async dispatch(event: HookEvent, options: DispatchOptions = {}): Promise<Decision> {
    const session = event.eventName === 'SessionStart'
      ? this.openSession(event.sessionId)
      : this.sessions.get(event.sessionId);
    if (!session) {
      return this.dispatcher.dispatch(event, options);
    }

    const decision = await session.dispatch(event, { signal: options.signal });
    if (session.closed) {
      this.sessions.delete(event.sessionId);
    }
    return decision;
  }

  /**
   * Close every open session (host teardown)
   */
  shutdown(): void {
    for (const sessionId of [...this.sessions.keys()]) {
      this.closeSession(sessionId);
    }
  }
}
