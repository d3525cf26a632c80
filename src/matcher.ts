import type { Rule } from './types.js';

export type PatternKind = 'glob' | 'regex';

const globCache = new Map<string, RegExp>();
const regexCache = new Map<string, RegExp>();

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

function translateBracket(pattern: string, start: number): { source: string; end: number } | null {
  let end = start;
  if (pattern[end] === '!') {
    end += 1;
  }
  if (pattern[end] === ']') {
    end += 1;
  }
  while (end < pattern.length && pattern[end] !== ']') {
    end += 1;
  }
  if (end >= pattern.length) {
    return null;
  }
  let body = pattern.slice(start, end);
  const negated = body.startsWith('!');
  if (negated) {
    body = body.slice(1);
  }
  body = body.replace(/[\\\][^]/g, '\\$&');
  return { source: `[${negated ? '^' : ''}${body}]`, end: end + 1 };
}

/**
 * Translates a shell-style pattern into an anchored expression over the whole
 * path. `*` and `?` also match `/`; `[...]` and `[!...]` are character
 * classes; everything else is literal.
 */
export function compileGlob(pattern: string): RegExp {
  let glob = globCache.get(pattern);
  if (glob) {
    return glob;
  }

  let source = '';
  let i = 0;
  while (i < pattern.length) {
    const char = pattern[i];
    i += 1;
    if (char === '*') {
      while (pattern[i] === '*') {
        i += 1;
      }
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      const bracket = translateBracket(pattern, i);
      if (bracket) {
        source += bracket.source;
        i = bracket.end;
      } else {
        source += '\\[';
      }
    } else {
      source += char.replace(REGEX_SPECIAL, '\\$&');
    }
  }

  glob = new RegExp(`^${source}$`, 's');
  globCache.set(pattern, glob);
  return glob;
}

export function compileRegex(pattern: string): RegExp {
  let regex = regexCache.get(pattern);
  if (!regex) {
    regex = new RegExp(pattern, 'i');
    regexCache.set(pattern, regex);
  }
  return regex;
}

export function compilePattern(pattern: string, kind: PatternKind): RegExp {
  return kind === 'glob' ? compileGlob(pattern) : compileRegex(pattern);
}

export function matchesPatterns(
  path: string,
  include: readonly string[],
  exclude: readonly string[],
  kind: PatternKind,
): boolean {
  if (include.length === 0) {
    return false;
  }
  if (!include.some((pattern) => compilePattern(pattern, kind).test(path))) {
    return false;
  }
  return !exclude.some((pattern) => compilePattern(pattern, kind).test(path));
}

export type RulePatterns = Pick<
  Rule,
  'pathMatch' | 'pathMatchExclude' | 'pathRegex' | 'pathRegexExclude'
>;

export function matchesRule(rule: RulePatterns, path: string): boolean {
  return (
    matchesPatterns(path, rule.pathMatch, rule.pathMatchExclude, 'glob') ||
    matchesPatterns(path, rule.pathRegex, rule.pathRegexExclude, 'regex')
  );
}
