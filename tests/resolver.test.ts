import { describe, expect, it } from 'vitest';
import { DEFAULT_TAG, matchesTag, resolveRule } from '../src/resolver.js';
import { makeRule } from './helpers.js';

describe('matchesTag', () => {
  it('treats tag-less rules as the default tag', () => {
    const rule = makeRule();
    expect(matchesTag(rule, undefined)).toBe(true);
    expect(matchesTag(rule, DEFAULT_TAG)).toBe(true);
    expect(matchesTag(rule, 'lint')).toBe(false);
  });

  it('requires a listed tag for tagged rules', () => {
    const rule = makeRule({ tags: ['lint', 'format'] });
    expect(matchesTag(rule, 'format')).toBe(true);
    expect(matchesTag(rule, undefined)).toBe(false);
    expect(matchesTag(rule, DEFAULT_TAG)).toBe(false);
  });
});

describe('resolveRule', () => {
  const python = makeRule({ pathMatch: ['*.py'], commands: ['python {{ file }}'], index: 0 });
  const anything = makeRule({ pathMatch: ['*'], commands: ['cat {{ file }}'], index: 1 });

  it('returns the first rule that matches', () => {
    expect(resolveRule({ rules: [python, anything] }, '/p/app.py', undefined)).toBe(python);
    expect(resolveRule({ rules: [python, anything] }, '/p/app.rs', undefined)).toBe(anything);
  });

  it('follows rule order when several rules match', () => {
    expect(resolveRule({ rules: [anything, python] }, '/p/app.py', undefined)).toBe(anything);
  });

  it('ignores the position of rules that do not match', () => {
    const rust = makeRule({ pathMatch: ['*.rs'], commands: ['cargo run'], index: 2 });
    expect(resolveRule({ rules: [rust, python, anything] }, '/p/app.py', undefined)).toBe(python);
    expect(resolveRule({ rules: [python, rust, anything] }, '/p/app.py', undefined)).toBe(python);
  });

  it('returns null when nothing matches', () => {
    expect(resolveRule({ rules: [python] }, '/p/app.rs', undefined)).toBeNull();
    expect(resolveRule({ rules: [] }, '/p/app.py', undefined)).toBeNull();
  });

  it('matches templated patterns when given an execution context', () => {
    const local = makeRule({ pathMatch: ['{{ cwd }}/notes.txt'], commands: ['cat {{ file }}'] });
    const context = { file: '/home/u/notes.txt', cwd: '/home/u', env: {} };

    expect(resolveRule({ rules: [local] }, '/home/u/notes.txt', undefined, context)).toBe(local);
    expect(resolveRule({ rules: [local] }, '/srv/notes.txt', undefined, context)).toBeNull();
  });

  it('only considers rules carrying the requested tag', () => {
    const lint = makeRule({ pathMatch: ['*.py'], tags: ['lint'], commands: ['ruff {{ file }}'] });
    const rules = [python, lint];
    expect(resolveRule({ rules }, '/p/app.py', 'lint')).toBe(lint);
    expect(resolveRule({ rules }, '/p/app.py', 'main')).toBe(python);
    expect(resolveRule({ rules }, '/p/app.py', 'format')).toBeNull();
  });
});
