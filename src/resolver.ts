import { matchesRule } from './matcher.js';
import { renderPatterns } from './render.js';
import type { ExecutionContext, Rule, RuleSet } from './types.js';

export const DEFAULT_TAG = 'main';

export function matchesTag(rule: Rule, tag: string | undefined): boolean {
  if (rule.tags.length === 0) {
    return tag === undefined || tag === DEFAULT_TAG;
  }
  return tag !== undefined && rule.tags.includes(tag);
}

/**
 * Returns the first rule for the tag whose patterns accept the path, or null.
 * With a context, templated patterns are rendered before matching.
 */
export function resolveRule(
  ruleSet: Pick<RuleSet, 'rules'>,
  path: string,
  tag: string | undefined,
  context?: ExecutionContext,
): Rule | null {
  return (
    ruleSet.rules.find((rule) => {
      if (!matchesTag(rule, tag)) {
        return false;
      }
      return matchesRule(context ? renderPatterns(rule, context) : rule, path);
    }) ?? null
  );
}
