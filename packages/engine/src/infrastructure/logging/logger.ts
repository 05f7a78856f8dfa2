/**
 * @fileoverview Centralized logging for the hook engine
 *
 * Uses pino for structured logging with:
 * - Level from LOG_LEVEL
 * - JSON output for production
 * - Pretty printing for interactive terminals
 *
 * Everything goes to stderr: hosts read decisions from stdout.
 */

import pino from 'pino';
import { getLoggingContext } from './log-context.js';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  component?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// =============================================================================
// Logger Factory
// =============================================================================

function createPinoLogger(): pino.Logger {
  // Default to 'warn' so hooks stay quiet inside interactive hosts.
  // Use LOG_LEVEL=info or LOG_LEVEL=debug for verbose output.
  const envLevel = process.env.LOG_LEVEL;
  const level = isLogLevel(envLevel) ? envLevel : 'warn';
  const pretty = process.env.NODE_ENV !== 'production' && process.stderr.isTTY === true;

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: 'hookline',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        name: bindings.name,
      }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

type LogData = Record<string, unknown>;

export class HookLogger {
  constructor(private readonly pino: pino.Logger) {}

  /**
   * Children share the parent's pino destination
   */
  child(context: LogContext): HookLogger {
    return new HookLogger(this.pino.child(context));
  }

  /**
   * Fields from the active logging context are merged under explicit data.
   */
  private write(level: LogLevel, msg: string, data?: LogData): void {
    this.pino[level]({ ...getLoggingContext(), ...data }, msg);
  }

  debug(msg: string, data?: LogData): void {
    this.write('debug', msg, data);
  }

  info(msg: string, data?: LogData): void {
    this.write('info', msg, data);
  }

  warn(msg: string, data?: LogData): void {
    this.write('warn', msg, data);
  }

  error(msg: string, data?: LogData): void {
    this.write('error', msg, data);
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let rootLogger: HookLogger | null = null;

/**
 * Create a component-specific logger. The pino root is built on first use.
 */
export function createLogger(component: string): HookLogger {
  if (!rootLogger) {
    rootLogger = new HookLogger(createPinoLogger());
  }
  return rootLogger.child({ component });
}
