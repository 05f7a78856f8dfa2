/**
 * @fileoverview Environment overrides
 *
 * Readers for the HOOKLINE_* variables layered over file settings. A value
 * that does not parse, or falls outside its bounds, is ignored with a
 * warning and the configured value stays.
 */

import { z } from 'zod';
import { MAX_KILL_GRACE_MS, MAX_TIMEOUT_SEC } from './defaults.js';

export interface OverrideLogger {
  warn: (message: string, context?: Record<string, unknown>) => void;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

const wholeNumber = z
  .string()
  .trim()
  .regex(/^\d+$/, 'not a whole number')
  .transform(Number);

const FLAG_VALUES = new Map<string, boolean>([
  ['true', true],
  ['1', true],
  ['yes', true],
  ['on', true],
  ['false', false],
  ['0', false],
  ['no', false],
  ['off', false],
]);

export class EnvOverrides {
  constructor(
    private readonly env: EnvSource,
    private readonly logger?: OverrideLogger
  ) {}

  /** Handler timeout in whole seconds, 1 to MAX_TIMEOUT_SEC */
  timeoutSeconds(variable: string, current: number): number {
    return this.integer(variable, current, 1, MAX_TIMEOUT_SEC);
  }

  /** Kill grace in milliseconds, 0 to MAX_KILL_GRACE_MS */
  graceMs(variable: string, current: number): number {
    return this.integer(variable, current, 0, MAX_KILL_GRACE_MS);
  }

  flag(variable: string, current: boolean): boolean {
    const raw = this.env[variable];
    if (raw === undefined) {
      return current;
    }

    const value = FLAG_VALUES.get(raw.trim().toLowerCase());
    if (value === undefined) {
      this.reject(variable, raw, 'not a boolean', current);
      return current;
    }
    return value;
  }

  /** Blank values leave the setting alone */
  text(variable: string, current: string): string {
    const raw = this.env[variable]?.trim();
    return raw ? raw : current;
  }

  private integer(variable: string, current: number, min: number, max: number): number {
    const raw = this.env[variable];
    if (raw === undefined) {
      return current;
    }

    const parsed = wholeNumber.pipe(z.number().int().min(min).max(max)).safeParse(raw);
    if (!parsed.success) {
      this.reject(variable, raw, parsed.error.issues.map(issue => issue.message).join('; '), current);
      return current;
    }
    return parsed.data;
  }

  private reject(variable: string, value: string, reason: string, kept: number | boolean): void {
    this.logger?.warn('Ignoring invalid environment override', { variable, value, reason, kept });
  }
}
