import { describe, expect, it } from 'vitest';
import { matchesPatterns, matchesRule } from '../src/matcher.js';
import { makeRule } from './helpers.js';

describe('matchesPatterns', () => {
  it('lets a glob star cross directory separators', () => {
    expect(matchesPatterns('/home/dev/project/src/app.py', ['*.py'], [], 'glob')).toBe(true);
    expect(matchesPatterns('/home/dev/project/src/app.pyc', ['*.py'], [], 'glob')).toBe(false);
  });

  it('matches when any include pattern matches', () => {
    expect(matchesPatterns('/docs/readme.md', ['*.txt', '*.md'], [], 'glob')).toBe(true);
  });

  it('rejects paths matched by an exclude pattern', () => {
    expect(matchesPatterns('/p/tests/test_app.py', ['*.py'], ['*/test_*.py'], 'glob')).toBe(false);
    expect(matchesPatterns('/p/src/app.py', ['*.py'], ['*/test_*.py'], 'glob')).toBe(true);
  });

  it('never matches with an empty include list', () => {
    expect(matchesPatterns('/p/app.py', [], [], 'glob')).toBe(false);
    expect(matchesPatterns('/p/app.py', [], [], 'regex')).toBe(false);
  });

  it('searches regular expressions anywhere in the path, ignoring case', () => {
    expect(matchesPatterns('/p/README.MD', ['\\.md$'], [], 'regex')).toBe(true);
    expect(matchesPatterns('/p/src/app.py', ['src/'], [], 'regex')).toBe(true);
    expect(matchesPatterns('/p/src/app.py', ['^src/'], [], 'regex')).toBe(false);
  });

  it('applies regex excludes', () => {
    expect(matchesPatterns('/p/vendor/lib.js', ['\\.js$'], ['/vendor/'], 'regex')).toBe(false);
  });

  it('treats parentheses, braces and a leading bang as literal text', () => {
    expect(matchesPatterns('/a/b (copy).py', ['*/b (copy).py'], [], 'glob')).toBe(true);
    expect(matchesPatterns('/a/notes.txt', ['!*.py'], [], 'glob')).toBe(false);
    expect(matchesPatterns('/a/!x.py', ['*!*.py'], [], 'glob')).toBe(true);
    expect(matchesPatterns('/a/main.c', ['*.{c,h}'], [], 'glob')).toBe(false);
    expect(matchesPatterns('/a/main.{c,h}', ['*.{c,h}'], [], 'glob')).toBe(true);
    expect(matchesPatterns('/a/x+y.py', ['*/x+y.py'], [], 'glob')).toBe(true);
  });

  it('supports character classes and single-character wildcards', () => {
    expect(matchesPatterns('/src/a1.py', ['*/a[0-9].py'], [], 'glob')).toBe(true);
    expect(matchesPatterns('/src/ab.py', ['*/a[!0-9].py'], [], 'glob')).toBe(true);
    expect(matchesPatterns('/src/a1.py', ['*/a[!0-9].py'], [], 'glob')).toBe(false);
    expect(matchesPatterns('/src/a1.py', ['/src/a?.py'], [], 'glob')).toBe(true);
    expect(matchesPatterns('/src/a[1.py', ['*[1.py'], [], 'glob')).toBe(true);
  });

  it('matches globs case-sensitively over the whole path', () => {
    expect(matchesPatterns('/src/APP.PY', ['*.py'], [], 'glob')).toBe(false);
    expect(matchesPatterns('/src/app.py', ['src/*.py'], [], 'glob')).toBe(false);
  });
});

describe('matchesRule', () => {
  it('accepts a path matched by either family', () => {
    const rule = makeRule({ pathMatch: ['*.txt'], pathRegex: ['\\.py$'] });
    expect(matchesRule(rule, '/a/b.py')).toBe(true);
    expect(matchesRule(rule, '/a/b.txt')).toBe(true);
    expect(matchesRule(rule, '/a/b.rs')).toBe(false);
  });

  it('keeps the excludes of one family out of the other', () => {
    const rule = makeRule({
      pathMatch: ['*.py'],
      pathMatchExclude: ['*/skip/*'],
      pathRegex: ['skip'],
    });
    expect(matchesRule(rule, '/a/skip/x.py')).toBe(true);

    const globOnly = makeRule({ pathMatch: ['*.py'], pathMatchExclude: ['*/skip/*'] });
    expect(matchesRule(globOnly, '/a/skip/x.py')).toBe(false);
  });
});
