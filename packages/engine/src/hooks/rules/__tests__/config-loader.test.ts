/**
 * @fileoverview Tests for rule configuration loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { compileRuleDocument, loadRuleFile, loadRules, resolveRuleSources } from '../config-loader.js';
import { makeSettings } from '../../__tests__/event-factories.js';

const settings = makeSettings().hooks;

describe('compileRuleDocument', () => {
  it('should compile command and prompt entries', () => {
    const { rules, issues } = compileRuleDocument(
      {
        hooks: {
          PreAction: [
            {
              matcher: 'Bash|Write',
              hooks: [
                { type: 'command', command: './check.sh', timeout: 10 },
                { type: 'prompt', prompt: 'Is this safe?', model: 'test-model', schema: { risk: 'number' } },
              ],
            },
          ],
        },
      },
      { source: 'project', settings }
    );

    expect(issues).toEqual([]);
    expect(rules).toHaveLength(2);

    expect(rules[0].id).toBe('project:PreAction[0].hooks[0]');
    expect(rules[0].eventName).toBe('PreAction');
    expect(rules[0].matcherPattern).toBe('Bash|Write');
    expect(rules[0].matcher.kind).toBe('alternation');
    expect(rules[0].handler).toEqual({ kind: 'command', command: './check.sh' });
    expect(rules[0].timeoutSeconds).toBe(10);

    expect(rules[1].id).toBe('project:PreAction[0].hooks[1]');
    expect(rules[1].handler).toEqual({
      kind: 'prompt',
      prompt: 'Is this safe?',
      model: 'test-model',
      schema: { risk: 'number' },
    });
    expect(rules[1].timeoutSeconds).toBe(settings.promptTimeoutSec);
  });

  it('should apply default timeouts per kind', () => {
    const { rules } = compileRuleDocument(
      { hooks: { Stop: [{ hooks: [{ type: 'command', command: 'true' }] }] } },
      { source: 'test', settings: { commandTimeoutSec: 42, promptTimeoutSec: 7 } }
    );
    expect(rules[0].timeoutSeconds).toBe(42);
    expect(rules[0].matcherPattern).toBe('');
    expect(rules[0].matcher.kind).toBe('any');
  });

  it('should keep argument vectors', () => {
    const { rules } = compileRuleDocument(
      { hooks: { PostAction: [{ matcher: 'Edit', hooks: [{ type: 'command', command: 'prettier', args: ['--check', '.'] }] }] } },
      { source: 'test', settings }
    );
    expect(rules[0].handler).toEqual({ kind: 'command', command: 'prettier', args: ['--check', '.'] });
  });

  it('should warn about unknown events and skip them', () => {
    const { rules, issues } = compileRuleDocument(
      { hooks: { PreToolUsage: [{ hooks: [{ type: 'command', command: 'true' }] }] } },
      { source: 'test', settings }
    );
    expect(rules).toEqual([]);
    expect(issues).toEqual([
      { severity: 'warning', source: 'test', path: 'hooks.PreToolUsage', message: 'unknown hook event "PreToolUsage"' },
    ]);
  });

  it('should exclude malformed entries and keep the rest', () => {
    const { rules, issues } = compileRuleDocument(
      {
        hooks: {
          PreAction: [
            { matcher: 'Bash(', hooks: [{ type: 'command', command: 'true' }] },
            {
              matcher: 'Bash',
              hooks: [
                { type: 'command' },
                { type: 'command', command: 'echo ok' },
                { type: 'command', command: 'echo slow', timeout: -1 },
                { type: 'webhook', url: 'http://localhost' },
              ],
            },
            'not a group',
          ],
          PostAction: 'nope',
        },
      },
      { source: 'test', settings }
    );

    expect(rules.map(rule => rule.id)).toEqual(['test:PreAction[1].hooks[1]']);
    expect(issues.map(issue => issue.path)).toEqual([
      'hooks.PreAction[0].matcher',
      'hooks.PreAction[1].hooks[0]',
      'hooks.PreAction[1].hooks[2]',
      'hooks.PreAction[1].hooks[3]',
      'hooks.PreAction[2]',
      'hooks.PostAction',
    ]);
    expect(issues.every(issue => issue.severity === 'error')).toBe(true);
  });

  it('should reject timeouts that are fractional or beyond the limit', () => {
    const { rules, issues } = compileRuleDocument(
      {
        hooks: {
          Stop: [
            {
              hooks: [
                { type: 'command', command: 'echo half', timeout: 1.5 },
                { type: 'command', command: 'echo forever', timeout: 3_000_000 },
                { type: 'prompt', prompt: 'Done?', timeout: 86_400 },
              ],
            },
          ],
        },
      },
      { source: 'test', settings }
    );

    expect(rules.map(rule => rule.timeoutSeconds)).toEqual([86_400]);
    expect(issues.map(issue => issue.path)).toEqual(['hooks.Stop[0].hooks[0]', 'hooks.Stop[0].hooks[1]']);
  });

  it('should reject prompt schemas that redeclare decision fields', () => {
    const { rules, issues } = compileRuleDocument(
      {
        hooks: {
          Stop: [
            {
              hooks: [
                { type: 'prompt', prompt: 'Done?', schema: { decision: 'string' } },
                { type: 'prompt', prompt: 'Done?', schema: { risk: 'number' } },
              ],
            },
          ],
        },
      },
      { source: 'test', settings }
    );

    expect(rules).toHaveLength(1);
    expect(issues.map(issue => issue.path)).toEqual(['hooks.Stop[0].hooks[0]']);
  });

  it('should report a document that is not an object', () => {
    const { rules, issues } = compileRuleDocument([1, 2], { source: 'test', settings });
    expect(rules).toEqual([]);
    expect(issues).toHaveLength(1);
    expect(issues[0].severity).toBe('error');
  });

  it('should treat a document without hooks as empty', () => {
    expect(compileRuleDocument({ theme: 'dark' }, { source: 'test', settings })).toEqual({ rules: [], issues: [] });
  });
});

describe('rule files', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'hookline-rules-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function writeRules(dir: string, document: unknown): Promise<string> {
    const file = path.join(dir, '.hookline', 'settings.json');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, typeof document === 'string' ? document : JSON.stringify(document));
    return file;
  }

  it('should return nothing for a missing file', async () => {
    const result = await loadRuleFile(path.join(root, 'missing.json'), { settings });
    expect(result).toEqual({ rules: [], issues: [] });
  });

  it('should report invalid JSON as an error', async () => {
    const file = await writeRules(root, '{ "hooks": ');
    const result = await loadRuleFile(file, { source: 'project', settings });
    expect(result.rules).toEqual([]);
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0].source).toBe('project');
    expect(result.issues[0].message).toContain('invalid JSON');
  });

  it('should load project rules before user rules', async () => {
    const project = path.join(root, 'project');
    const home = path.join(root, 'home');
    await writeRules(project, { hooks: { Stop: [{ hooks: [{ type: 'command', command: 'echo project' }] }] } });
    await writeRules(home, { hooks: { Stop: [{ hooks: [{ type: 'command', command: 'echo user' }] }] } });

    const { store, issues } = await loadRules({ projectPath: project, userHome: home, settings });

    expect(issues).toEqual([]);
    expect(store.rulesFor('Stop').map(rule => rule.id)).toEqual(['project:Stop[0].hooks[0]', 'user:Stop[0].hooks[0]']);
  });

  it('should skip user rules when disabled', async () => {
    const home = path.join(root, 'home');
    await writeRules(home, { hooks: { Stop: [{ hooks: [{ type: 'command', command: 'echo user' }] }] } });

    const { store } = await loadRules({ projectPath: path.join(root, 'project'), userHome: home, includeUserRules: false, settings });
    expect(store.size()).toBe(0);
  });

  it('should not load the same file twice when the project is the home directory', () => {
    const sources = resolveRuleSources({ projectPath: root, userHome: root, settings });
    expect(sources).toEqual([{ path: path.join(root, '.hookline', 'settings.json'), source: 'project' }]);
  });

  it('should append additional files as custom sources', () => {
    const extra = path.join(root, 'extra.json');
    const sources = resolveRuleSources({ projectPath: root, includeUserRules: false, additionalFiles: [extra], settings });
    expect(sources.map(source => source.source)).toEqual(['project', 'custom']);
    expect(sources[1].path).toBe(extra);
  });
});
