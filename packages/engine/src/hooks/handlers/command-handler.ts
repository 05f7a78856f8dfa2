/**
 * @fileoverview Command handler
 *
 * Runs a rule's command as a subprocess with the serialized event on stdin.
 * The process gets its own process group so a timeout or a host abort can
 * terminate everything it spawned: SIGTERM to the group, then SIGKILL after
 * the grace period.
 *
 * Every outcome, including spawn failures, is returned as a HandlerResult.
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import type { HandlerResult, HookEvent, HookRule } from '../types.js';
import type { HookSettings } from '../../infrastructure/settings/index.js';
import { getSettings } from '../../infrastructure/settings/index.js';
import {
  categorizeError,
  createLogger,
  LogErrorCategory,
  LogErrorCodes,
} from '../../infrastructure/logging/index.js';
import type { SessionEnvironmentSnapshot } from '../session/environment-bridge.js';
import { serializeEvent } from '../wire.js';
import { deadlineMs, failedResult, type Handler, type HandlerContext } from './types.js';

const logger = createLogger('hooks:command');

/** Exit code reported for a handler that overran its timeout */
const TIMEOUT_EXIT_CODE = 1;

export interface CommandHandlerOptions {
  settings?: HookSettings;
}

export interface CommandRunOptions {
  signal?: AbortSignal;
  envFilePath?: string;
}

/**
 * Bounded capture of one output stream
 */
class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  append(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.truncated ||= kept.length < chunk.length;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }
}

/**
 * Child environment: ambient variables, engine variables, then the session's
 * recorded variables. HOOKLINE_ENV_FILE is only present during SessionStart.
 */
export function buildHandlerEnvironment(
  event: HookEvent,
  sessionEnv: SessionEnvironmentSnapshot,
  envFilePath?: string
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {
    ...process.env,
    HOOKLINE_PROJECT_DIR: event.workingDirectory,
    HOOKLINE_SESSION_ID: event.sessionId,
    HOOKLINE_EVENT: event.eventName,
    ...sessionEnv,
  };

  if (envFilePath) {
    env.HOOKLINE_ENV_FILE = envFilePath;
  } else {
    delete env.HOOKLINE_ENV_FILE;
  }
  return env;
}

function describeError(error: unknown): string {
  const structured = categorizeError(error);
  const nodeCode = structured.context.nodeCode;
  return typeof nodeCode === 'string' && !structured.message.includes(nodeCode)
    ? `${nodeCode}: ${structured.message}`
    : structured.message;
}

export class CommandHandler implements Handler {
  readonly kind = 'command' as const;

  constructor(private readonly options: CommandHandlerOptions = {}) {}

  private get settings(): HookSettings {
    return this.options.settings ?? getSettings().hooks;
  }

  execute(rule: HookRule, context: HandlerContext): Promise<HandlerResult> {
    return this.run(rule, context.event, context.environment, context.timeoutSeconds, {
      signal: context.signal,
      envFilePath: context.envFilePath,
    });
  }

  run(
    rule: HookRule,
    event: HookEvent,
    sessionEnv: SessionEnvironmentSnapshot,
    timeoutSeconds: number,
    options: CommandRunOptions = {}
  ): Promise<HandlerResult> {
    const spec = rule.handler;
    if (spec.kind !== 'command') {
      return Promise.resolve(failedResult('command', `rule ${rule.id} is not a command rule`));
    }
    if (options.signal?.aborted) {
      return Promise.resolve({ ...failedResult('command', 'cancelled'), cancelled: true });
    }

    const settings = this.settings;
    const startedAt = Date.now();
    const [file, args] = spec.args
      ? [spec.command, [...spec.args]]
      : [settings.shell, ['-c', spec.command]];

    return new Promise<HandlerResult>((resolve) => {
      const stdout = new OutputBuffer(settings.maxOutputBytes);
      const stderr = new OutputBuffer(settings.maxOutputBytes);
      const killTimers: NodeJS.Timeout[] = [];
      let timedOut = false;
      let cancelled = false;
      let settled = false;

      let child: ChildProcessWithoutNullStreams;
      try {
        child = spawn(file, args, {
          cwd: event.workingDirectory,
          env: buildHandlerEnvironment(event, sessionEnv, options.envFilePath),
          detached: process.platform !== 'win32',
          windowsHide: true,
        });
      } catch (error) {
        logger.error('Hook command could not be spawned', {
          ruleId: rule.id,
          code: LogErrorCodes.HOOK_SPAWN,
          category: LogErrorCategory.HOOK_EXECUTION,
          error: describeError(error),
        });
        resolve(failedResult('command', describeError(error), Date.now() - startedAt));
        return;
      }

      const signalGroup = (signal: NodeJS.Signals) => {
        const pid = child.pid;
        if (pid === undefined) return;
        try {
          process.kill(process.platform === 'win32' ? pid : -pid, signal);
        } catch (error) {
          // Group already gone (ESRCH) or not a group leader
          logger.debug('Process group signal failed, signalling child', {
            ruleId: rule.id,
            pid,
            signal,
            error: describeError(error),
          });
          child.kill(signal);
        }
      };

      const finish = (result: Omit<HandlerResult, 'kind' | 'durationMs' | 'stdout' | 'stderr' | 'timedOut' | 'cancelled'>) => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        killTimers.forEach(clearTimeout);
        options.signal?.removeEventListener('abort', onAbort);

        if (stdout.truncated || stderr.truncated) {
          logger.warn('Hook output truncated', {
            ruleId: rule.id,
            limitBytes: settings.maxOutputBytes,
            stdout: stdout.truncated,
            stderr: stderr.truncated,
          });
        }

        resolve({
          kind: 'command',
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          timedOut,
          cancelled,
          durationMs: Date.now() - startedAt,
          ...result,
        });
      };

      const terminate = () => {
        signalGroup('SIGTERM');
        killTimers.push(setTimeout(() => signalGroup('SIGKILL'), settings.killGraceMs));
        // A descendant that left the group can keep our pipes open; stop waiting for 'close'
        killTimers.push(
          setTimeout(() => {
            logger.warn('Hook process did not close after SIGKILL', { ruleId: rule.id, pid: child.pid });
            finish({
              exitCode: timedOut ? TIMEOUT_EXIT_CODE : undefined,
              processError: cancelled ? 'cancelled' : undefined,
            });
          }, settings.killGraceMs * 2 + 100)
        );
      };

      const deadline = setTimeout(() => {
        timedOut = true;
        logger.warn('Hook command timed out', {
          ruleId: rule.id,
          timeoutSeconds,
          code: LogErrorCodes.HOOK_TIMEOUT,
          category: LogErrorCategory.HOOK_EXECUTION,
        });
        terminate();
      }, deadlineMs(timeoutSeconds));

      const onAbort = () => {
        if (settled || timedOut) return;
        cancelled = true;
        logger.info('Hook command cancelled', { ruleId: rule.id, code: LogErrorCodes.HOOK_CANCELLED });
        terminate();
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout.on('data', (data: Buffer) => stdout.append(data));
      child.stderr.on('data', (data: Buffer) => stderr.append(data));

      child.on('error', (error) => {
        if (child.pid === undefined) {
          // Never started: ENOENT, EACCES, bad cwd
          logger.error('Hook command could not be spawned', {
            ruleId: rule.id,
            command: spec.command,
            code: LogErrorCodes.HOOK_SPAWN,
            category: LogErrorCategory.HOOK_EXECUTION,
            error: describeError(error),
          });
          finish({ processError: describeError(error) });
          return;
        }
        logger.warn('Hook process error', { ruleId: rule.id, error: describeError(error) });
      });

      child.on('close', (code, signal) => {
        let processError: string | undefined;
        if (cancelled) {
          processError = 'cancelled';
        } else if (!timedOut && code === null && signal) {
          processError = `terminated by ${signal}`;
        }

        logger.debug('Hook command exited', {
          ruleId: rule.id,
          exitCode: code,
          signal,
          timedOut,
          durationMs: Date.now() - startedAt,
        });

        finish({
          exitCode: timedOut ? TIMEOUT_EXIT_CODE : code ?? undefined,
          processError,
        });
      });

      // Handlers that never read stdin close the pipe early (EPIPE)
      child.stdin.on('error', (error) => {
        logger.debug('Hook stdin closed before input was written', {
          ruleId: rule.id,
          error: describeError(error),
        });
      });
      child.stdin.end(serializeEvent(event));
    });
  }
}
