import path from 'node:path';
import { TemplateError } from './errors.js';
import { compilePattern, type PatternKind, type RulePatterns } from './matcher.js';
import { joinCommand, splitCommandLine } from './shell-words.js';
import {
  compileTemplate,
  evaluateSoleExpression,
  renderCompiled,
  renderTemplate,
  type TemplateScope,
} from './template.js';
import { buildTemplateContext } from './template-context.js';
import type {
  CommandSpec,
  ExecutionContext,
  RenderedCommand,
  RenderedRule,
  ResolvedOptions,
  Rule,
} from './types.js';

export type RenderOptions = Pick<ResolvedOptions, 'shellDefault' | 'timeout'>;

export function effectiveShell(rule: Rule, shellDefault: boolean): boolean {
  return rule.shell ?? shellDefault;
}

function renderToken(token: string, scope: TemplateScope): string[] {
  const compiled = compileTemplate(token);
  const sole = evaluateSoleExpression(compiled, scope);
  if (sole === undefined) {
    return [renderCompiled(compiled, scope)];
  }
  if (typeof sole === 'string') {
    return [sole];
  }
  if (Array.isArray(sole)) {
    return sole.map((item) => {
      if (typeof item !== 'string') {
        throw new TemplateError('a command token list may only contain strings', token);
      }
      return item;
    });
  }
  throw new TemplateError('a command token cannot be a mapping', token);
}

function renderCommand(source: CommandSpec, scope: TemplateScope, shell: boolean): RenderedCommand {
  let argv: string[];
  if (typeof source === 'string') {
    const line = renderTemplate(source, scope);
    if (shell) {
      return { kind: 'shell', line };
    }
    try {
      argv = splitCommandLine(line);
    } catch (error) {
      throw new TemplateError(`malformed command: ${(error as Error).message}`, source, {
        cause: error,
      });
    }
  } else {
    argv = source.flatMap((token) => renderToken(token, scope));
    if (shell) {
      return { kind: 'shell', line: joinCommand(argv) };
    }
  }
  if (argv.length === 0 || argv[0].length === 0) {
    throw new TemplateError(
      'the command is empty',
      typeof source === 'string' ? source : JSON.stringify(source),
    );
  }
  return { kind: 'argv', argv };
}

export function renderCommands(
  rule: Rule,
  scope: TemplateScope,
  shell: boolean,
): RenderedCommand[] {
  return rule.commands.map((source) => renderCommand(source, scope, shell));
}

export function renderWorkingDirectory(
  rule: Rule,
  scope: TemplateScope,
  context: ExecutionContext,
): string {
  if (rule.cwd === undefined) {
    return context.cwd;
  }
  const rendered = renderTemplate(rule.cwd, scope);
  if (rendered.length === 0) {
    return context.cwd;
  }
  return path.resolve(path.dirname(rule.source), rendered);
}

/**
 * Template scope of a rule: `cwd` is the rule's working directory, which is
 * itself rendered against the invocation directory.
 */
export function ruleScope(
  rule: Rule,
  context: ExecutionContext,
): { cwd: string; scope: TemplateScope } {
  const cwd = renderWorkingDirectory(rule, buildTemplateContext(context), context);
  return { cwd, scope: buildTemplateContext({ ...context, cwd }) };
}

function hasTemplate(patterns: readonly string[]): boolean {
  return patterns.some((pattern) => pattern.includes('{{'));
}

function renderPatternList(
  patterns: readonly string[],
  kind: PatternKind,
  scope: TemplateScope,
): string[] {
  return patterns.map((pattern) => {
    const rendered = renderTemplate(pattern, scope);
    try {
      compilePattern(rendered, kind);
    } catch (error) {
      throw new TemplateError(
        `invalid pattern '${rendered}': ${(error as Error).message}`,
        pattern,
        { cause: error },
      );
    }
    return rendered;
  });
}

/** Renders the match patterns of a rule; rules without templates come back unchanged. */
export function renderPatterns(rule: Rule, context: ExecutionContext): RulePatterns {
  const fields = [rule.pathMatch, rule.pathMatchExclude, rule.pathRegex, rule.pathRegexExclude];
  if (!fields.some(hasTemplate)) {
    return rule;
  }
  const { scope } = ruleScope(rule, context);
  return {
    pathMatch: renderPatternList(rule.pathMatch, 'glob', scope),
    pathMatchExclude: renderPatternList(rule.pathMatchExclude, 'glob', scope),
    pathRegex: renderPatternList(rule.pathRegex, 'regex', scope),
    pathRegexExclude: renderPatternList(rule.pathRegexExclude, 'regex', scope),
  };
}

function renderOutputPath(
  template: string | undefined,
  scope: TemplateScope,
  context: ExecutionContext,
): string | undefined {
  if (template === undefined) {
    return undefined;
  }
  const rendered = renderTemplate(template, scope);
  return rendered.length === 0 ? undefined : path.resolve(context.cwd, rendered);
}

export function renderRule(
  rule: Rule,
  context: ExecutionContext,
  options: RenderOptions,
): RenderedRule {
  const { cwd, scope } = ruleScope(rule, context);
  const shell = effectiveShell(rule, options.shellDefault);
  const timeout = rule.timeout ?? options.timeout;
  return {
    rule,
    cwd,
    shell,
    timeoutSeconds: timeout && timeout > 0 ? timeout : undefined,
    stdout: renderOutputPath(rule.stdout, scope, context),
    stderr: renderOutputPath(rule.stderr, scope, context),
    commands: renderCommands(rule, scope, shell),
  };
}
