/**
 * @fileoverview Settings type definitions
 */

// =============================================================================
// Hook Settings
// =============================================================================

export interface HookSettings {
  /** Default timeout for command handlers, in seconds */
  commandTimeoutSec: number;
  /** Default timeout for prompt handlers, in seconds */
  promptTimeoutSec: number;
  /** Delay between SIGTERM and SIGKILL when a handler overruns or is cancelled */
  killGraceMs: number;
  /** Longest reason taken from a handler's stderr */
  maxReasonLength: number;
  /** Cap on captured stdout/stderr per handler, in bytes */
  maxOutputBytes: number;
  /** Surface handler failures to the host as system messages */
  verbose: boolean;
  /** Shell used to run command handlers that have no argument vector */
  shell: string;
  /** Rule file path relative to the project root */
  projectRulesFile: string;
  /** Rule file path relative to the user's home directory */
  userRulesFile: string;
}

// =============================================================================
// Prompt Handler Settings
// =============================================================================

export interface PromptSettings {
  /** Model used when a prompt rule does not name one */
  model: string;
  maxTokens: number;
  /** Environment variable holding the completion backend API key */
  apiKeyEnvVar: string;
  baseUrl?: string;
}

// =============================================================================
// Root Settings
// =============================================================================

export interface EngineSettings {
  version: string;
  hooks: HookSettings;
  prompt: PromptSettings;
}

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

/** Settings as written by the user, merged over the defaults */
export type UserSettings = DeepPartial<EngineSettings>;
