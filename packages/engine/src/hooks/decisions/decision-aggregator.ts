/**
 * @fileoverview Decision aggregation
 *
 * Folds the decisions of one event's handlers, in configuration order, into
 * the single Decision returned to the host.
 *
 * - The first deny ends the fold and wins.
 * - A decision with continueChain=false ends the fold and is returned as is.
 * - The first ask is kept and the fold goes on; it beats any later allow.
 * - An allow's updatedPayload replaces the running payload (last allow wins).
 * - Nothing but unspecified decisions (or none at all): the event's default.
 */

import type { Decision, HookEvent, HookEventName } from '../types.js';
import { PERMISSION_EVENTS } from '../types.js';

export type FoldStep = 'continue' | 'stop';

export interface FoldOptions {
  /** Also surface warnings and failures of handlers to the user via systemMessage */
  verbose?: boolean;
}

/**
 * Outcome when no handler expresses an opinion: allow for events that gate
 * an action, unspecified otherwise.
 */
export function defaultDecision(eventName: HookEventName): Decision {
  return {
    permission: PERMISSION_EVENTS.has(eventName) ? 'allow' : 'unspecified',
    blocking: false,
    reason: '',
    continueChain: true,
  };
}

function joinLines(lines: readonly string[]): string | undefined {
  return lines.length > 0 ? lines.join('\n') : undefined;
}

export class DecisionFold {
  private terminal?: Decision;
  private provisionalAsk?: Decision;
  private allowSeen = false;
  private allowReason = '';
  private runningPayload?: Record<string, unknown>;
  private readonly systemMessages: string[] = [];
  private readonly contexts: string[] = [];
  private readonly warnings: string[] = [];
  private folded = 0;

  constructor(
    readonly eventName: HookEventName,
    private readonly options: FoldOptions = {}
  ) {}

  /** Whether a deny or stop has ended the fold */
  get stopped(): boolean {
    return this.terminal !== undefined;
  }

  /** Number of decisions folded so far */
  get size(): number {
    return this.folded;
  }

  push(decision: Decision): FoldStep {
    if (this.terminal) {
      return 'stop';
    }
    this.folded++;

    if (decision.systemMessage) this.systemMessages.push(decision.systemMessage);
    if (decision.additionalContext) this.contexts.push(decision.additionalContext);

    if (decision.permission === 'deny') {
      this.terminal = { ...decision, blocking: true };
      return 'stop';
    }

    if (!decision.continueChain) {
      this.terminal = decision;
      return 'stop';
    }

    switch (decision.permission) {
      case 'ask':
        this.provisionalAsk ??= decision;
        break;
      case 'allow':
        this.allowSeen = true;
        this.allowReason = decision.reason || this.allowReason;
        if (decision.updatedPayload && Object.keys(decision.updatedPayload).length > 0) {
          this.runningPayload = decision.updatedPayload;
        }
        break;
      case 'unspecified':
        if (decision.reason) this.warnings.push(decision.reason);
        break;
    }
    return 'continue';
  }

  private composed(): Decision {
    if (this.provisionalAsk) {
      return { ...this.provisionalAsk, blocking: false, continueChain: true };
    }

    if (this.allowSeen) {
      return {
        permission: 'allow',
        blocking: false,
        reason: this.allowReason,
        continueChain: true,
        ...(this.runningPayload ? { updatedPayload: this.runningPayload } : {}),
      };
    }

    const fallback = defaultDecision(this.eventName);
    // Handlers ran but expressed no opinion: keep their warnings with the result
    if (fallback.permission === 'unspecified' && this.warnings.length > 0) {
      return { ...fallback, reason: this.warnings.join('; ') };
    }
    return fallback;
  }

  result(): Decision {
    const { updatedPayload, systemMessage: _own, additionalContext: _ownContext, ...base } =
      this.terminal ?? this.composed();

    const messages = this.options.verbose
      ? [...this.systemMessages, ...this.warnings]
      : this.systemMessages;
    const systemMessage = joinLines(messages);
    const additionalContext = joinLines(this.contexts);

    return {
      ...base,
      ...(base.permission === 'allow' && updatedPayload ? { updatedPayload } : {}),
      ...(systemMessage !== undefined ? { systemMessage } : {}),
      ...(additionalContext !== undefined ? { additionalContext } : {}),
    };
  }
}

/**
 * Fold a complete list of decisions. Decisions after a deny or stop are ignored.
 */
export function aggregate(
  event: Pick<HookEvent, 'eventName'>,
  decisions: readonly Decision[],
  options: FoldOptions = {}
): Decision {
  const fold = new DecisionFold(event.eventName, options);
  for (const decision of decisions) {
    if (fold.push(decision) === 'stop') {
      break;
    }
  }
  return fold.result();
}
