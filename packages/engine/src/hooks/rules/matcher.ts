/**
 * @fileoverview Action matcher compilation
 *
 * Matcher patterns are compiled once at load time:
 * - ''            → Any (matches every event, with or without an action name)
 * - 'Bash'        → Exact, case-sensitive
 * - 'Edit|Write'  → Alternation of exact names
 * - '*', 'mcp__*' → Wildcard (glob with * and ?, anchored)
 * - 'regex:^Re'   → Regex (explicit)
 * - 'Notebook.*'  → Regex (any other regex syntax)
 *
 * Every variant except Any requires a non-empty action name.
 */

export type ActionMatcher =
  | { readonly kind: 'any' }
  | { readonly kind: 'exact'; readonly value: string }
  | { readonly kind: 'alternation'; readonly values: ReadonlySet<string> }
  | { readonly kind: 'wildcard'; readonly glob: string; readonly pattern: RegExp }
  | { readonly kind: 'regex'; readonly pattern: RegExp };

export class MatcherSyntaxError extends Error {
  constructor(
    readonly pattern: string,
    message: string
  ) {
    super(`Invalid matcher "${pattern}": ${message}`);
    this.name = 'MatcherSyntaxError';
  }
}

const REGEX_PREFIX = 'regex:';
const NAME = /^[\w-]+$/;
const GLOB = /^[\w\-*?]+$/;

function compileRegex(pattern: string, source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    throw new MatcherSyntaxError(pattern, error instanceof Error ? error.message : String(error));
  }
}

function globToRegExp(glob: string): RegExp {
  // GLOB admits only word characters and '-' besides the wildcards
  const body = glob.replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${body}$`);
}

/**
 * @throws MatcherSyntaxError when a regex pattern does not compile
 */
export function compileMatcher(pattern: string): ActionMatcher {
  const trimmed = pattern.trim();

  if (trimmed === '') {
    return { kind: 'any' };
  }

  if (trimmed.startsWith(REGEX_PREFIX)) {
    const source = trimmed.slice(REGEX_PREFIX.length);
    if (source === '') {
      throw new MatcherSyntaxError(pattern, 'empty regular expression');
    }
    return { kind: 'regex', pattern: compileRegex(pattern, source) };
  }

  if (NAME.test(trimmed)) {
    return { kind: 'exact', value: trimmed };
  }

  const alternatives = trimmed.split('|').map(part => part.trim());
  if (alternatives.length > 1 && alternatives.every(part => NAME.test(part))) {
    return { kind: 'alternation', values: new Set(alternatives) };
  }

  if (GLOB.test(trimmed)) {
    return { kind: 'wildcard', glob: trimmed, pattern: globToRegExp(trimmed) };
  }

  return { kind: 'regex', pattern: compileRegex(pattern, trimmed) };
}

export function matchesAction(matcher: ActionMatcher, actionName: string | undefined): boolean {
  if (matcher.kind === 'any') {
    return true;
  }

  if (actionName === undefined || actionName === '') {
    return false;
  }

  switch (matcher.kind) {
    case 'exact':
      return matcher.value === actionName;
    case 'alternation':
      return matcher.values.has(actionName);
    case 'wildcard':
    case 'regex':
      return matcher.pattern.test(actionName);
  }
}
