/**
 * @fileoverview Rule configuration loading
 *
 * Reads the `hooks` section of settings documents and compiles it into
 * HookRules. Rule files searched (in order):
 * 1. `<project>/.hookline/settings.json` - Project-level rules
 * 2. `~/.hookline/settings.json` - User-level rules
 * 3. Additional files via configuration
 *
 * Malformed entries are reported as issues and excluded; the rest still load.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { HookRule, HandlerSpec } from '../types.js';
import { isHookEventName } from '../types.js';
import type { HookSettings } from '../../infrastructure/settings/index.js';
import { getSettings } from '../../infrastructure/settings/index.js';
import { createLogger, LogErrorCategory, LogErrorCodes } from '../../infrastructure/logging/index.js';
import { compileMatcher, MatcherSyntaxError, type ActionMatcher } from './matcher.js';
import {
  describeIssues,
  hookEntrySchema,
  matcherGroupSchema,
  ruleDocumentSchema,
  type HookEntry,
} from './schema.js';
import { RuleStore } from './rule-store.js';

const logger = createLogger('hooks:config');

export type RuleSourceKind = 'project' | 'user' | 'custom';

export interface HookConfigIssue {
  severity: 'error' | 'warning';
  /** Rule file or label the issue came from */
  source: string;
  /** Location inside the document, e.g. `hooks.PreAction[0].hooks[1]` */
  path: string;
  message: string;
}

export interface RuleLoadResult {
  rules: HookRule[];
  issues: HookConfigIssue[];
}

export interface CompileRulesOptions {
  /** Prefix for rule ids and issue sources */
  source: string;
  settings?: Pick<HookSettings, 'commandTimeoutSec' | 'promptTimeoutSec'>;
}

function toHandlerSpec(entry: HookEntry): HandlerSpec {
  if (entry.type === 'command') {
    return {
      kind: 'command',
      command: entry.command,
      ...(entry.args ? { args: Object.freeze([...entry.args]) } : {}),
    };
  }
  return {
    kind: 'prompt',
    prompt: entry.prompt,
    schema: Object.freeze({ ...entry.schema }),
    ...(entry.model ? { model: entry.model } : {}),
  };
}

function tryCompileMatcher(pattern: string): ActionMatcher | MatcherSyntaxError {
  try {
    return compileMatcher(pattern);
  } catch (error) {
    if (error instanceof MatcherSyntaxError) {
      return error;
    }
    throw error;
  }
}

/**
 * Compile a parsed settings document into rules
 */
export function compileRuleDocument(document: unknown, options: CompileRulesOptions): RuleLoadResult {
  const defaults = options.settings ?? getSettings().hooks;
  const rules: HookRule[] = [];
  const issues: HookConfigIssue[] = [];
  const issue = (severity: HookConfigIssue['severity'], at: string, message: string) =>
    issues.push({ severity, source: options.source, path: at, message });

  const parsedDocument = ruleDocumentSchema.safeParse(document);
  if (!parsedDocument.success) {
    issue('error', '', `settings document must be a JSON object (${describeIssues(parsedDocument.error)})`);
    return { rules, issues };
  }

  const hooks = parsedDocument.data.hooks ?? {};

  for (const [eventName, groups] of Object.entries(hooks)) {
    const eventPath = `hooks.${eventName}`;

    if (!isHookEventName(eventName)) {
      issue('warning', eventPath, `unknown hook event "${eventName}"`);
      continue;
    }

    if (!Array.isArray(groups)) {
      issue('error', eventPath, 'hook configuration must be a list of matcher groups');
      continue;
    }

    groups.forEach((rawGroup: unknown, groupIndex: number) => {
      const groupPath = `${eventPath}[${groupIndex}]`;
      const group = matcherGroupSchema.safeParse(rawGroup);
      if (!group.success) {
        issue('error', groupPath, describeIssues(group.error));
        return;
      }

      const matcherPattern = group.data.matcher ?? '';
      const matcher = tryCompileMatcher(matcherPattern);
      if (matcher instanceof MatcherSyntaxError) {
        issue('error', `${groupPath}.matcher`, matcher.message);
        return;
      }

      group.data.hooks.forEach((rawEntry: unknown, hookIndex: number) => {
        const entryPath = `${groupPath}.hooks[${hookIndex}]`;
        const entry = hookEntrySchema.safeParse(rawEntry);
        if (!entry.success) {
          issue('error', entryPath, describeIssues(entry.error));
          return;
        }

        const timeoutSeconds =
          entry.data.timeout ??
          (entry.data.type === 'command' ? defaults.commandTimeoutSec : defaults.promptTimeoutSec);

        rules.push(
          Object.freeze({
            id: `${options.source}:${eventName}[${groupIndex}].hooks[${hookIndex}]`,
            eventName,
            matcherPattern,
            matcher,
            handler: Object.freeze(toHandlerSpec(entry.data)),
            timeoutSeconds,
          })
        );
      });
    });
  }

  return { rules, issues };
}

/**
 * Load rules from one settings file. A missing file yields no rules and no issues.
 */
export async function loadRuleFile(
  filePath: string,
  options: Omit<CompileRulesOptions, 'source'> & { source?: string } = {}
): Promise<RuleLoadResult> {
  const source = options.source ?? filePath;

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { rules: [], issues: [] };
    }
    return {
      rules: [],
      issues: [{
        severity: 'error',
        source,
        path: '',
        message: `cannot read rule file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      }],
    };
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    return {
      rules: [],
      issues: [{
        severity: 'error',
        source,
        path: '',
        message: `invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      }],
    };
  }

  return compileRuleDocument(document, { ...options, source });
}

// =============================================================================
// Discovery
// =============================================================================

export interface RuleDiscoveryConfig {
  /** Project root path (default: cwd) */
  projectPath?: string;
  /** User home directory (default: os.homedir()) */
  userHome?: string;
  /** Whether to load user-level rules (default: true) */
  includeUserRules?: boolean;
  /** Additional rule files, loaded last */
  additionalFiles?: string[];
  settings?: HookSettings;
}

export interface RuleSource {
  path: string;
  source: RuleSourceKind;
}

export function resolveRuleSources(config: RuleDiscoveryConfig = {}): RuleSource[] {
  const settings = config.settings ?? getSettings().hooks;
  const {
    projectPath = process.cwd(),
    userHome = os.homedir(),
    includeUserRules = true,
    additionalFiles = [],
  } = config;

  const sources: RuleSource[] = [
    { path: path.join(projectPath, settings.projectRulesFile), source: 'project' },
  ];

  if (includeUserRules && userHome) {
    const userPath = path.join(userHome, settings.userRulesFile);
    // Running inside the home directory would load the same file twice
    if (!sources.some(s => path.resolve(s.path) === path.resolve(userPath))) {
      sources.push({ path: userPath, source: 'user' });
    }
  }

  for (const file of additionalFiles) {
    sources.push({ path: file, source: 'custom' });
  }

  return sources;
}

export interface LoadedRules {
  store: RuleStore;
  issues: HookConfigIssue[];
}

/**
 * Discover, load and compile every rule file into one RuleStore
 */
export async function loadRules(config: RuleDiscoveryConfig = {}): Promise<LoadedRules> {
  const settings = config.settings ?? getSettings().hooks;
  const rules: HookRule[] = [];
  const issues: HookConfigIssue[] = [];

  for (const { path: filePath, source } of resolveRuleSources({ ...config, settings })) {
    const result = await loadRuleFile(filePath, { source, settings });
    rules.push(...result.rules);
    issues.push(...result.issues);
  }

  for (const item of issues) {
    const data = {
      source: item.source,
      path: item.path,
      detail: item.message,
      code: LogErrorCodes.HCFG_INVALID,
      category: LogErrorCategory.HOOK_CONFIG,
    };
    if (item.severity === 'error') {
      logger.error('Hook rule excluded', data);
    } else {
      logger.warn('Hook configuration warning', data);
    }
  }

  logger.info('Hook rules loaded', { count: rules.length, issues: issues.length });
  return { store: new RuleStore(rules), issues };
}
