/**
 * @fileoverview Default Settings
 *
 * Fallback values when the user settings file does not specify them.
 */

import type { EngineSettings } from './types.js';

/** Longest handler timeout accepted anywhere, in seconds (one day) */
export const MAX_TIMEOUT_SEC = 86_400;

/** Longest SIGTERM-to-SIGKILL grace accepted, in milliseconds */
export const MAX_KILL_GRACE_MS = 60_000;

export const DEFAULT_SETTINGS: EngineSettings = {
  version: '0.1.0',

  hooks: {
    commandTimeoutSec: 60,
    promptTimeoutSec: 30,
    killGraceMs: 1000,
    maxReasonLength: 500,
    maxOutputBytes: 1024 * 1024,
    verbose: false,
    shell: '/bin/sh',
    projectRulesFile: '.hookline/settings.json',
    userRulesFile: '.hookline/settings.json',
  },

  prompt: {
    model: 'claude-haiku-4-5-20251001',
    maxTokens: 512,
    apiKeyEnvVar: 'ANTHROPIC_API_KEY',
  },
};
