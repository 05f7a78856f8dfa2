/**
 * @fileoverview Rule storage and lookup
 *
 * RuleStore holds compiled rules grouped by event, in configuration order.
 * RuleMatcher answers which of them apply to an event.
 */

import type { HookEventName, HookRule } from '../types.js';
import { matchesAction } from './matcher.js';

export class RuleStore {
  private readonly byEvent = new Map<HookEventName, readonly HookRule[]>();
  private readonly rules: readonly HookRule[];

  constructor(rules: readonly HookRule[] = []) {
    this.rules = Object.freeze([...rules]);

    const grouped = new Map<HookEventName, HookRule[]>();
    for (const rule of this.rules) {
      const list = grouped.get(rule.eventName) ?? [];
      list.push(rule);
      grouped.set(rule.eventName, list);
    }
    for (const [eventName, list] of grouped) {
      this.byEvent.set(eventName, Object.freeze(list));
    }
  }

  /**
   * Rules configured for an event, in configuration order
   */
  rulesFor(eventName: HookEventName): readonly HookRule[] {
    return this.byEvent.get(eventName) ?? [];
  }

  size(): number {
    return this.rules.length;
  }
}

export class RuleMatcher {
  constructor(private readonly store: RuleStore) {}

  /**
   * Rules whose event and matcher apply, in configuration order.
   * An empty list means the event's default decision stands.
   */
  match(eventName: HookEventName, actionName?: string): HookRule[] {
    return this.store
      .rulesFor(eventName)
      .filter(rule => matchesAction(rule.matcher, actionName));
  }
}
