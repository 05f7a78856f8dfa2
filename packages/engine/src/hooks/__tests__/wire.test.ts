/**
 * @fileoverview Tests for the handler wire format
 */

import { describe, it, expect } from 'vitest';
import { parseCommandOutput, parseJsonObject, toHookInput, toSnakeCase } from '../wire.js';
import { makeEvent } from './event-factories.js';

describe('toSnakeCase', () => {
  it('should convert camelCase keys', () => {
    expect(toSnakeCase('toolUseId')).toBe('tool_use_id');
    expect(toSnakeCase('transcriptPath')).toBe('transcript_path');
    expect(toSnakeCase('HTTPStatus')).toBe('http_status');
    expect(toSnakeCase('already_snake')).toBe('already_snake');
  });
});

describe('toHookInput', () => {
  it('should map the event onto wire field names', () => {
    const event = makeEvent({
      eventName: 'PostAction',
      workingDirectory: '/repo',
      permissionMode: 'acceptEdits',
      actionName: 'Edit',
      payload: { actionInput: { file: 'a.ts' }, actionResponse: { ok: true } },
    });

    expect(toHookInput(event)).toEqual({
      session_id: 'sess-test',
      hook_event_name: 'PostAction',
      tool_name: 'Edit',
      tool_input: { file: 'a.ts' },
      tool_response: { ok: true },
      cwd: '/repo',
      permission_mode: 'acceptEdits',
    });
  });

  it('should omit tool_name when there is no action', () => {
    const input = toHookInput(makeEvent({ eventName: 'UserInput', actionName: undefined, payload: { prompt: 'hi' } }));
    expect('tool_name' in input).toBe(false);
    expect(input.prompt).toBe('hi');
  });

  it('should not let payload fields override base fields', () => {
    const input = toHookInput(makeEvent({ payload: { sessionId: 'spoofed', cwd: '/elsewhere' } }));
    expect(input.session_id).toBe('sess-test');
    expect(input.cwd).not.toBe('/elsewhere');
  });
});

describe('parseJsonObject', () => {
  it('should parse a single object', () => {
    expect(parseJsonObject('  {"a": 1}\n')).toEqual({ a: 1 });
  });

  it('should reject anything else', () => {
    expect(parseJsonObject('')).toBeUndefined();
    expect(parseJsonObject('[1]')).toBeUndefined();
    expect(parseJsonObject('"text"')).toBeUndefined();
    expect(parseJsonObject('{"a": 1} trailing')).toBeUndefined();
    expect(parseJsonObject('Result: {"a": 1}')).toBeUndefined();
  });
});

describe('parseCommandOutput', () => {
  it('should keep unknown fields', () => {
    expect(parseCommandOutput('{"decision":"approve","suppressOutput":true}')).toEqual({
      decision: 'approve',
      suppressOutput: true,
    });
  });

  it('should reject documents with mistyped fields', () => {
    expect(parseCommandOutput('{"continue":"no"}')).toBeUndefined();
    expect(parseCommandOutput('{"hookSpecificOutput":{"updatedInput":"ls"}}')).toBeUndefined();
  });
});
