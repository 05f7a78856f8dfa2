/**
 * @fileoverview Settings Module
 *
 * Settings are loaded from ~/.hookline/config.json with defaults and
 * HOOKLINE_* environment overrides.
 *
 * @example
 * ```typescript
 * import { getSettings } from './index.js';
 *
 * const { hooks } = getSettings();
 * console.log(hooks.commandTimeoutSec);
 * ```
 */

export type {
  EngineSettings,
  HookSettings,
  PromptSettings,
  UserSettings,
  DeepPartial,
} from './types.js';

export { DEFAULT_SETTINGS, MAX_KILL_GRACE_MS, MAX_TIMEOUT_SEC } from './defaults.js';

export {
  preloadSettings,
  loadSettings,
  loadSettingsAsync,
  loadUserSettings,
  loadUserSettingsAsync,
  getSettings,
  reloadSettings,
  getSettingsPath,
  setSettingsPath,
  clearSettingsCache,
  applyEnvOverrides,
  mergeSettings,
} from './loader.js';

export { EnvOverrides, type EnvSource, type OverrideLogger } from './env-overrides.js';
