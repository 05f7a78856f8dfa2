/**
 * @fileoverview Hook dispatch engine
 *
 * Matches host lifecycle events against configured rules, runs their
 * command and prompt handlers under timeouts and returns one decision.
 */

// Events, rules and decisions
export {
  HOOK_EVENT_NAMES,
  PERMISSION_EVENTS,
  isHookEventName,
  createHookEvent,
  type HookEventName,
  type HookEvent,
  type HookEventInit,
  type HookPayload,
  type HookRule,
  type HandlerKind,
  type HandlerSpec,
  type CommandHandlerSpec,
  type PromptHandlerSpec,
  type PromptFieldType,
  type HandlerResult,
  type Permission,
  type Decision,
} from './hooks/types.js';

// Engine and sessions
export { HookEngine, type HookEngineOptions } from './hooks/engine.js';
export { EventDispatcher, type EventDispatcherOptions, type DispatchOptions } from './hooks/dispatcher.js';
export { SessionContext, type SessionDispatchOptions } from './hooks/session/session-context.js';
export { EnvironmentBridge, type SessionEnvironmentSnapshot } from './hooks/session/environment-bridge.js';
export { parseEnvFile, createEnvFile, type EnvFileEntry, type EnvFileHandle } from './hooks/session/env-file.js';

// Rules
export { compileMatcher, matchesAction, MatcherSyntaxError, type ActionMatcher } from './hooks/rules/matcher.js';
export { RuleStore, RuleMatcher } from './hooks/rules/rule-store.js';
export {
  compileRuleDocument,
  loadRuleFile,
  loadRules,
  resolveRuleSources,
  type HookConfigIssue,
  type RuleLoadResult,
  type RuleDiscoveryConfig,
  type LoadedRules,
} from './hooks/rules/config-loader.js';

// Handlers
export { CommandHandler, buildHandlerEnvironment, type CommandHandlerOptions } from './hooks/handlers/command-handler.js';
export { PromptHandler, buildResponseSchema, stripCodeFence, type PromptHandlerOptions } from './hooks/handlers/prompt-handler.js';
export {
  AnthropicCompletionBackend,
  createCompletionBackendFromEnv,
  type CompletionBackend,
  type CompletionRequest,
} from './hooks/handlers/completion-backend.js';
export { renderPrompt, buildPromptRequest } from './hooks/handlers/template.js';
export type { Handler, HandlerContext } from './hooks/handlers/types.js';
export { toHookInput, serializeEvent, parseCommandOutput, type HookInputDocument } from './hooks/wire.js';

// Decisions
export { interpret, mapDecisionValue, truncateReason } from './hooks/decisions/result-interpreter.js';
export { aggregate, defaultDecision, DecisionFold, type FoldStep } from './hooks/decisions/decision-aggregator.js';

// Settings and logging
export {
  getSettings,
  loadSettings,
  preloadSettings,
  reloadSettings,
  setSettingsPath,
  clearSettingsCache,
  DEFAULT_SETTINGS,
  type EngineSettings,
  type HookSettings,
  type PromptSettings,
  type UserSettings,
} from './infrastructure/settings/index.js';
export { createLogger, withLoggingContext, type LoggingContext } from './infrastructure/logging/index.js';
