/**
 * @fileoverview Settings Loader
 *
 * Loads user settings from ~/.hookline/config.json, merges them over the
 * defaults and applies environment overrides. Settings are cached after the
 * first load.
 */

import * as fs from 'fs';
import * as fsAsync from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import type { EngineSettings, UserSettings } from './types.js';
import { DEFAULT_SETTINGS, MAX_KILL_GRACE_MS, MAX_TIMEOUT_SEC } from './defaults.js';
import { EnvOverrides, type EnvSource } from './env-overrides.js';
import { createLogger } from '../logging/index.js';

const logger = createLogger('settings');

const SETTINGS_DIR = '.hookline';
const SETTINGS_FILE = 'config.json';

// =============================================================================
// Schema
// =============================================================================

const userSettingsSchema = z
  .object({
    version: z.string(),
    hooks: z
      .object({
        commandTimeoutSec: z.number().int().positive().max(MAX_TIMEOUT_SEC),
        promptTimeoutSec: z.number().int().positive().max(MAX_TIMEOUT_SEC),
        killGraceMs: z.number().int().nonnegative().max(MAX_KILL_GRACE_MS),
        maxReasonLength: z.number().int().positive(),
        maxOutputBytes: z.number().int().positive(),
        verbose: z.boolean(),
        shell: z.string().min(1),
        projectRulesFile: z.string().min(1),
        userRulesFile: z.string().min(1),
      })
      .partial(),
    prompt: z
      .object({
        model: z.string().min(1),
        maxTokens: z.number().int().positive(),
        apiKeyEnvVar: z.string().min(1),
        baseUrl: z.string().url(),
      })
      .partial(),
  })
  .partial();

/**
 * Merge user settings over a base. Each section is merged one level deep.
 */
export function mergeSettings(base: EngineSettings, user: UserSettings): EngineSettings {
  return {
    version: user.version ?? base.version,
    hooks: { ...base.hooks, ...user.hooks },
    prompt: { ...base.prompt, ...user.prompt },
  };
}

// =============================================================================
// Settings Loading
// =============================================================================

export function getSettingsPath(homeDir?: string): string {
  const home = homeDir ?? os.homedir();
  return path.join(home, SETTINGS_DIR, SETTINGS_FILE);
}

function parseUserSettings(content: string, filePath: string): UserSettings | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    logger.warn('Settings file is not valid JSON, using defaults', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const parsed = userSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Settings file failed validation, using defaults', {
      path: filePath,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }
  return parsed.data;
}

/**
 * Load user settings from file (synchronous - prefer async version)
 * @returns User settings or null if the file is missing or invalid
 */
export function loadUserSettings(settingsPath?: string): UserSettings | null {
  const filePath = settingsPath ?? getSettingsPath();

  if (!fs.existsSync(filePath)) {
    return null;
  }

  try {
    return parseUserSettings(fs.readFileSync(filePath, 'utf-8'), filePath);
  } catch (error) {
    logger.warn('Failed to read settings file, using defaults', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Load user settings from file (async - preferred for startup)
 */
export async function loadUserSettingsAsync(settingsPath?: string): Promise<UserSettings | null> {
  const filePath = settingsPath ?? getSettingsPath();

  try {
    const content = await fsAsync.readFile(filePath, 'utf-8');
    return parseUserSettings(content, filePath);
  } catch (error) {
    // ENOENT is expected if file doesn't exist - not an error
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    logger.warn('Failed to read settings file, using defaults', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Load and merge settings with defaults (synchronous)
 */
export function loadSettings(settingsPath?: string): EngineSettings {
  const userSettings = loadUserSettings(settingsPath);
  const merged = userSettings ? mergeSettings(DEFAULT_SETTINGS, userSettings) : DEFAULT_SETTINGS;
  return applyEnvOverrides(merged);
}

/**
 * Load and merge settings with defaults (async - preferred for startup)
 */
export async function loadSettingsAsync(settingsPath?: string): Promise<EngineSettings> {
  const userSettings = await loadUserSettingsAsync(settingsPath);
  const merged = userSettings ? mergeSettings(DEFAULT_SETTINGS, userSettings) : DEFAULT_SETTINGS;
  return applyEnvOverrides(merged);
}

// =============================================================================
// Environment Variable Overrides
// =============================================================================

/**
 * Environment variables take precedence over file settings
 */
export function applyEnvOverrides(settings: EngineSettings, env: EnvSource = process.env): EngineSettings {
  const overrides = new EnvOverrides(env, logger);

  return {
    ...settings,
    hooks: {
      ...settings.hooks,
      commandTimeoutSec: overrides.timeoutSeconds('HOOKLINE_COMMAND_TIMEOUT_SEC', settings.hooks.commandTimeoutSec),
      promptTimeoutSec: overrides.timeoutSeconds('HOOKLINE_PROMPT_TIMEOUT_SEC', settings.hooks.promptTimeoutSec),
      killGraceMs: overrides.graceMs('HOOKLINE_KILL_GRACE_MS', settings.hooks.killGraceMs),
      verbose: overrides.flag('HOOKLINE_VERBOSE', settings.hooks.verbose),
    },
    prompt: {
      ...settings.prompt,
      model: overrides.text('HOOKLINE_PROMPT_MODEL', settings.prompt.model),
    },
  };
}

// =============================================================================
// Singleton Settings Instance
// =============================================================================

let cachedSettings: EngineSettings | null = null;

/** Custom settings path (for testing) */
let customSettingsPath: string | undefined;

let preloadPromise: Promise<EngineSettings> | null = null;

/**
 * Preload settings asynchronously (call at host startup).
 * Subsequent calls to getSettings() return the cached result.
 */
export async function preloadSettings(): Promise<EngineSettings> {
  if (cachedSettings) {
    return cachedSettings;
  }

  if (preloadPromise) {
    return preloadPromise;
  }

  preloadPromise = loadSettingsAsync(customSettingsPath).then(settings => {
    cachedSettings = settings;
    preloadPromise = null;
    return settings;
  });

  return preloadPromise;
}

/**
 * Get the current settings (loads and caches on first call)
 */
export function getSettings(): EngineSettings {
  if (!cachedSettings) {
    cachedSettings = loadSettings(customSettingsPath);
  }
  return cachedSettings;
}

export function reloadSettings(): EngineSettings {
  cachedSettings = loadSettings(customSettingsPath);
  return cachedSettings;
}

/**
 * Set a custom settings path (mainly for testing). Clears the cache.
 */
export function setSettingsPath(settingsPath: string | undefined): void {
  customSettingsPath = settingsPath;
  cachedSettings = null;
  preloadPromise = null;
}

export function clearSettingsCache(): void {
  cachedSettings = null;
  preloadPromise = null;
}
