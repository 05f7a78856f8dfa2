/**
 * @fileoverview Tests for decision aggregation
 */

import { describe, it, expect } from 'vitest';
import { aggregate, DecisionFold, defaultDecision } from '../decision-aggregator.js';
import type { Decision } from '../../types.js';

function decision(overrides: Partial<Decision> = {}): Decision {
  return {
    permission: 'unspecified',
    blocking: false,
    reason: '',
    continueChain: true,
    ...overrides,
  };
}

const allow = (overrides: Partial<Decision> = {}) => decision({ permission: 'allow', ...overrides });
const deny = (reason: string) => decision({ permission: 'deny', blocking: true, reason });
const ask = (reason: string) => decision({ permission: 'ask', reason });

const preAction = { eventName: 'PreAction' } as const;
const stop = { eventName: 'Stop' } as const;

describe('defaultDecision', () => {
  it('should allow permission events', () => {
    expect(defaultDecision('PreAction')).toEqual({ permission: 'allow', blocking: false, reason: '', continueChain: true });
    expect(defaultDecision('PermissionRequest').permission).toBe('allow');
  });

  it('should have no opinion on other events', () => {
    expect(defaultDecision('Stop').permission).toBe('unspecified');
    expect(defaultDecision('SessionStart').permission).toBe('unspecified');
  });
});

describe('aggregate', () => {
  it('should return the default when there are no decisions', () => {
    expect(aggregate(preAction, [])).toEqual(defaultDecision('PreAction'));
    expect(aggregate(stop, [])).toEqual(defaultDecision('Stop'));
  });

  it('should let the first deny win', () => {
    const result = aggregate(preAction, [allow(), deny('first'), deny('second')]);
    expect(result).toEqual({ permission: 'deny', blocking: true, reason: 'first', continueChain: true });
  });

  it('should prefer a provisional ask over a later allow', () => {
    const result = aggregate(preAction, [ask('check with user'), allow({ reason: 'fine' })]);
    expect(result.permission).toBe('ask');
    expect(result.reason).toBe('check with user');
  });

  it('should let a deny after an ask win', () => {
    expect(aggregate(preAction, [ask('maybe'), deny('no')]).permission).toBe('deny');
  });

  it('should keep the last allow payload', () => {
    const result = aggregate(preAction, [
      allow({ updatedPayload: { command: 'ls' } }),
      allow({ updatedPayload: { command: 'ls -la' } }),
      allow({ updatedPayload: {} }),
    ]);
    expect(result.permission).toBe('allow');
    expect(result.updatedPayload).toEqual({ command: 'ls -la' });
  });

  it('should drop the payload when the result is not an allow', () => {
    const result = aggregate(preAction, [allow({ updatedPayload: { command: 'ls' } }), ask('confirm')]);
    expect(result.permission).toBe('ask');
    expect(result.updatedPayload).toBeUndefined();
  });

  it('should stop at a decision with continueChain false and return it', () => {
    const stopper = decision({ reason: 'halt', continueChain: false });
    const result = aggregate(stop, [stopper, deny('never seen')]);
    expect(result).toEqual(stopper);
  });

  it('should return the default when every decision is unspecified on a permission event', () => {
    const result = aggregate(preAction, [decision({ reason: 'handler failed: timed out' }), decision()]);
    expect(result).toEqual(defaultDecision('PreAction'));
  });

  it('should keep warnings as the reason when an event ends with no opinion', () => {
    const result = aggregate(stop, [
      decision({ reason: 'handler failed: timed out' }),
      decision({ reason: 'lint failed' }),
    ]);
    expect(result).toEqual({
      permission: 'unspecified',
      blocking: false,
      reason: 'handler failed: timed out; lint failed',
      continueChain: true,
    });
  });

  it('should join system messages and context from all decisions', () => {
    const result = aggregate(preAction, [
      decision({ systemMessage: 'one', additionalContext: 'ctx-a' }),
      allow({ systemMessage: 'two' }),
      decision({ additionalContext: 'ctx-b' }),
    ]);
    expect(result.systemMessage).toBe('one\ntwo');
    expect(result.additionalContext).toBe('ctx-a\nctx-b');
  });

  it('should surface warnings as system messages when verbose', () => {
    const result = aggregate(preAction, [decision({ reason: 'handler failed: timed out' })], { verbose: true });
    expect(result.permission).toBe('allow');
    expect(result.reason).toBe('');
    expect(result.systemMessage).toBe('handler failed: timed out');
  });

  it('should not surface warnings without verbose', () => {
    const result = aggregate(preAction, [decision({ reason: 'handler failed: timed out' })]);
    expect(result.systemMessage).toBeUndefined();
  });
});

describe('DecisionFold', () => {
  it('should ask the caller to stop after a deny', () => {
    const fold = new DecisionFold('PreAction');
    expect(fold.push(allow())).toBe('continue');
    expect(fold.push(deny('no'))).toBe('stop');
    expect(fold.stopped).toBe(true);
    expect(fold.push(allow())).toBe('stop');
    expect(fold.size).toBe(2);
  });

  it('should continue past an ask', () => {
    const fold = new DecisionFold('PermissionRequest');
    expect(fold.push(ask('confirm'))).toBe('continue');
    expect(fold.push(ask('second'))).toBe('continue');
    expect(fold.result().reason).toBe('confirm');
  });

  it('should force blocking on a deny', () => {
    const fold = new DecisionFold('PreAction');
    fold.push(decision({ permission: 'deny', reason: 'x' }));
    expect(fold.result().blocking).toBe(true);
  });
});
