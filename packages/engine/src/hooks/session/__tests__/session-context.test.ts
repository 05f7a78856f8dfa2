/**
 * @fileoverview Tests for session contexts
 */

import { describe, it, expect, vi } from 'vitest';
import { SessionContext } from '../session-context.js';
import { EventDispatcher } from '../../dispatcher.js';
import { RuleStore } from '../../rules/rule-store.js';
import { defaultDecision } from '../../decisions/decision-aggregator.js';
import type { Handler } from '../../handlers/types.js';
import type { HandlerResult } from '../../types.js';
import { makeCommandRule, makeEvent, makeSettings } from '../../__tests__/event-factories.js';

function okResult(): HandlerResult {
  return { kind: 'command', exitCode: 0, stdout: '', stderr: '', timedOut: false, cancelled: false, durationMs: 1 };
}

function setup() {
  const execute = vi.fn<Handler['execute']>(async () => okResult());
  const dispatcher = new EventDispatcher({
    rules: new RuleStore([
      makeCommandRule('true', { eventName: 'PreAction' }),
      makeCommandRule('true', { eventName: 'SessionEnd' }),
    ]),
    handlers: { command: { kind: 'command', execute } },
    settings: makeSettings(),
  });
  return { execute, session: new SessionContext('sess-test', dispatcher) };
}

describe('SessionContext', () => {
  it('should dispatch events of its own session with its environment', async () => {
    const { execute, session } = setup();

    await session.dispatch(makeEvent());

    expect(execute).toHaveBeenCalledTimes(1);
    expect(execute.mock.calls[0][1].environment).toBe(session.snapshot());
  });

  it('should refuse events of another session', async () => {
    const { execute, session } = setup();

    const decision = await session.dispatch(makeEvent({ sessionId: 'someone-else' }));

    expect(decision).toEqual(defaultDecision('PreAction'));
    expect(execute).not.toHaveBeenCalled();
  });

  it('should close after SessionEnd has been handled', async () => {
    const { execute, session } = setup();

    await session.dispatch(makeEvent({ eventName: 'SessionEnd', actionName: undefined }));
    expect(execute).toHaveBeenCalledTimes(1);
    expect(session.closed).toBe(true);

    const decision = await session.dispatch(makeEvent());
    expect(decision).toEqual(defaultDecision('PreAction'));
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it('should allow closing more than once', () => {
    const { session } = setup();
    session.close();
    session.close();
    expect(session.closed).toBe(true);
    expect(session.snapshot()).toEqual({});
  });
});
