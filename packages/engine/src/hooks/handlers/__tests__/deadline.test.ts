/**
 * @fileoverview Tests for handler deadline clamping
 */

import { describe, it, expect } from 'vitest';
import { deadlineMs } from '../types.js';
import { MAX_TIMEOUT_SEC } from '../../../infrastructure/settings/index.js';

describe('deadlineMs', () => {
  it('should convert seconds to milliseconds', () => {
    expect(deadlineMs(10)).toBe(10_000);
    expect(deadlineMs(0.25)).toBe(250);
  });

  it('should clamp to the supported range', () => {
    expect(deadlineMs(3_000_000)).toBe(MAX_TIMEOUT_SEC * 1000);
    expect(deadlineMs(Number.POSITIVE_INFINITY)).toBe(MAX_TIMEOUT_SEC * 1000);
    expect(deadlineMs(-5)).toBe(0);
    expect(MAX_TIMEOUT_SEC * 1000).toBeLessThan(2 ** 31 - 1);
  });
});
