import { promises as fs } from 'node:fs';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { TemplateError } from '../src/errors.js';
import { renderPatterns, renderRule } from '../src/render.js';
import type { ExecutionContext } from '../src/types.js';
import { makeRule, withTempDir } from './helpers.js';

const defaults = { shellDefault: false, timeout: undefined };

function contextFor(file: string, cwd = '/work'): ExecutionContext {
  return { file, cwd, env: { HOME: '/home/dev' } };
}

describe('renderRule', () => {
  it('renders a shell command line', () => {
    const rule = makeRule({ shell: true, commands: ['bash {{ file | quote }}'] });

    const rendered = renderRule(rule, contextFor('/tmp/a b.sh'), defaults);

    expect(rendered.shell).toBe(true);
    expect(rendered.commands).toEqual([{ kind: 'shell', line: "bash '/tmp/a b.sh'" }]);
  });

  it('renders an argument vector from a list', () => {
    const rule = makeRule({ commands: [['python', '{{ file }}']] });

    const rendered = renderRule(rule, contextFor('/tmp/x.py'), defaults);

    expect(rendered.shell).toBe(false);
    expect(rendered.commands).toEqual([{ kind: 'argv', argv: ['python', '/tmp/x.py'] }]);
  });

  it('splits a string command when the shell is off', () => {
    const rule = makeRule({ commands: ['python -u {{ file | quote }}'] });

    const rendered = renderRule(rule, contextFor('/tmp/a b.py'), defaults);

    expect(rendered.commands).toEqual([{ kind: 'argv', argv: ['python', '-u', '/tmp/a b.py'] }]);
  });

  it('joins a list into a quoted line when the shell is on', () => {
    const rule = makeRule({ commands: [['echo', '{{ file }}']] });

    const rendered = renderRule(rule, contextFor('/tmp/a b'), { shellDefault: true, timeout: undefined });

    expect(rendered.commands).toEqual([{ kind: 'shell', line: "echo '/tmp/a b'" }]);
  });

  it('lets the rule override the default shell mode', () => {
    const rule = makeRule({ shell: false, commands: ['ls {{ cwd }}'] });

    const rendered = renderRule(rule, contextFor('/tmp/x'), { shellDefault: true, timeout: undefined });

    expect(rendered.commands).toEqual([{ kind: 'argv', argv: ['ls', '/work'] }]);
  });

  it('expands a token that evaluates to a list into several arguments', async () => {
    await withTempDir(async (dir) => {
      const script = path.join(dir, 'job');
      await fs.writeFile(script, '#!/usr/bin/env python3 -u\n');
      const rule = makeRule({ commands: [['{{ file | shebang_list }}', '{{ file }}']] });

      const rendered = renderRule(rule, contextFor(script), defaults);

      expect(rendered.commands).toEqual([
        { kind: 'argv', argv: ['/usr/bin/env', 'python3', '-u', script] },
      ]);
    });
  });

  it('renders every command of a list in order', () => {
    const rule = makeRule({
      commands: ['cc -c {{ file | basename }}', ['ls', '-l']],
    });

    const rendered = renderRule(rule, contextFor('/src/main.c'), defaults);

    expect(rendered.commands).toEqual([
      { kind: 'argv', argv: ['cc', '-c', 'main.c'] },
      { kind: 'argv', argv: ['ls', '-l'] },
    ]);
  });

  it('gives the same result when rendered twice', () => {
    const rule = makeRule({ commands: ['python {{ file | quote }}'], cwd: '{{ file | dirname }}' });
    const context = contextFor('/tmp/proj/a b.py');

    expect(renderRule(rule, context, defaults)).toEqual(renderRule(rule, context, defaults));
  });

  it('resolves the working directory', () => {
    const context = contextFor('/srv/project/src/app.py', '/home/dev');

    expect(renderRule(makeRule(), context, defaults).cwd).toBe('/home/dev');
    expect(renderRule(makeRule({ cwd: '' }), context, defaults).cwd).toBe('/home/dev');
    expect(renderRule(makeRule({ cwd: 'build' }), context, defaults).cwd).toBe(
      '/srv/project/build',
    );
    expect(renderRule(makeRule({ cwd: '{{ file | dirname }}' }), context, defaults).cwd).toBe(
      '/srv/project/src',
    );
  });

  it('takes the rule timeout before the global one', () => {
    const context = contextFor('/tmp/x');

    expect(renderRule(makeRule(), context, { shellDefault: false, timeout: 5 }).timeoutSeconds).toBe(5);
    expect(
      renderRule(makeRule({ timeout: 2 }), context, { shellDefault: false, timeout: 5 })
        .timeoutSeconds,
    ).toBe(2);
    expect(
      renderRule(makeRule({ timeout: 0 }), context, { shellDefault: false, timeout: 5 })
        .timeoutSeconds,
    ).toBeUndefined();
  });

  it('rejects an empty command', () => {
    const rule = makeRule({ commands: ["{{ '' }}"] });

    expect(() => renderRule(rule, contextFor('/tmp/x'), defaults)).toThrow(
      "the command is empty (in '{{ '' }}')",
    );
  });

  it('rejects a command line with unbalanced quotes', () => {
    const rule = makeRule({ commands: ["echo '{{ file }}"] });

    expect(() => renderRule(rule, contextFor('/tmp/x'), defaults)).toThrow(TemplateError);
    expect(() => renderRule(rule, contextFor('/tmp/x'), defaults)).toThrow(
      "malformed command: no closing quotation in: echo '/tmp/x (in 'echo '{{ file }}')",
    );
  });

  it('gives commands the rule working directory as cwd', () => {
    const rule = makeRule({ cwd: '/tmp', commands: [['echo', '{{ cwd }}']] });

    const rendered = renderRule(rule, contextFor('/home/u/a.txt', '/home/u'), defaults);

    expect(rendered.cwd).toBe('/tmp');
    expect(rendered.commands).toEqual([{ kind: 'argv', argv: ['echo', '/tmp'] }]);
  });

  it('renders the rule working directory against the invocation directory', () => {
    const rule = makeRule({ cwd: '{{ cwd }}/build', commands: [['echo', '{{ cwd }}']] });

    const rendered = renderRule(rule, contextFor('/home/u/a.txt', '/home/u'), defaults);

    expect(rendered.commands).toEqual([{ kind: 'argv', argv: ['echo', '/home/u/build'] }]);
  });

  it('resolves output files against the invocation directory', () => {
    const rule = makeRule({ cwd: '/tmp', stdout: 'logs/{{ file | basename }}.out', stderr: '' });

    const rendered = renderRule(rule, contextFor('/home/u/a.txt', '/home/u'), defaults);

    expect(rendered.stdout).toBe('/home/u/logs/a.txt.out');
    expect(rendered.stderr).toBeUndefined();
  });
});

describe('renderPatterns', () => {
  it('renders templated patterns with the rule working directory as cwd', () => {
    const rule = makeRule({
      cwd: '/srv/project/tools',
      pathMatch: ['{{ cwd | dirname }}/file4.bash'],
      pathRegex: ['\\.sh$'],
    });

    const patterns = renderPatterns(rule, contextFor('/srv/project/file4.bash', '/home/u'));

    expect(patterns.pathMatch).toEqual(['/srv/project/file4.bash']);
    expect(patterns.pathRegex).toEqual(['\\.sh$']);
  });

  it('returns a rule without templates unchanged', () => {
    const rule = makeRule({ pathMatch: ['*.py'] });

    expect(renderPatterns(rule, contextFor('/tmp/x.py'))).toBe(rule);
  });

  it('rejects a pattern that renders to an invalid expression', () => {
    const rule = makeRule({ pathRegex: ['{{ "(" }}'] });

    expect(() => renderPatterns(rule, contextFor('/tmp/x'))).toThrow(TemplateError);
    expect(() => renderPatterns(rule, contextFor('/tmp/x'))).toThrow(/^invalid pattern '\(': /);
  });
});
