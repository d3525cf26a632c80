import path from 'node:path';
import { loadRuleSet, resolveOptions, type LoadRuleSetOptions } from './config.js';
import { renderRule } from './render.js';
import { resolveRule } from './resolver.js';
import { runCommands, type RunCommandsOptions } from './runner.js';
import type {
  ExecutionContext,
  ExecutionResult,
  RenderedRule,
  Rule,
  RuleSet,
  RuleSetOptions,
} from './types.js';

export interface ExecuteOptions
  extends Omit<
    RunCommandsOptions,
    | 'cwd'
    | 'env'
    | 'shellPath'
    | 'timeoutSeconds'
    | 'confirmAfterSeconds'
    | 'stdoutFile'
    | 'stderrFile'
  > {
  ruleSetOptions?: Readonly<RuleSetOptions>;
  onRendered?: (rendered: RenderedRule) => void;
}

export interface ContextInput {
  tag?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ResolveOptions extends ContextInput, LoadRuleSetOptions {}

export interface Resolution {
  context: ExecutionContext;
  ruleSet: RuleSet;
  rule: Rule | null;
}

export type ResolveAndRunOutcome =
  | (Resolution & { status: 'no-match'; rule: null })
  | (Resolution & { status: 'executed'; rule: Rule; result: ExecutionResult });

function snapshotEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const snapshot: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      snapshot[key] = value;
    }
  }
  return snapshot;
}

export function createExecutionContext(
  targetPath: string,
  input: ContextInput = {},
): ExecutionContext {
  const cwd = path.resolve(input.cwd ?? process.cwd());
  return Object.freeze({
    file: path.resolve(cwd, targetPath),
    tag: input.tag,
    cwd,
    env: Object.freeze(snapshotEnv(input.env ?? process.env)),
  });
}

export async function execute(
  rule: Rule,
  context: ExecutionContext,
  options: ExecuteOptions = {},
): Promise<ExecutionResult> {
  const { ruleSetOptions, onRendered, ...runOptions } = options;
  const resolved = resolveOptions(ruleSetOptions ?? {}, context.env);
  const rendered = renderRule(rule, context, resolved);
  onRendered?.(rendered);
  return runCommands(rendered.commands, {
    ...runOptions,
    cwd: rendered.cwd,
    env: { ...context.env },
    shellPath: resolved.shell,
    timeoutSeconds: rendered.timeoutSeconds,
    confirmAfterSeconds: resolved.confirmAfterTimeout,
    stdoutFile: rendered.stdout,
    stderrFile: rendered.stderr,
  });
}

export async function resolveTarget(
  targetPath: string,
  options: ResolveOptions = {},
): Promise<Resolution> {
  const context = createExecutionContext(targetPath, options);
  const ruleSet = await loadRuleSet(context.file, options);
  return { context, ruleSet, rule: resolveRule(ruleSet, context.file, context.tag, context) };
}

export async function resolveAndRun(
  targetPath: string,
  options: ResolveOptions & ExecuteOptions = {},
): Promise<ResolveAndRunOutcome> {
  const { context, ruleSet, rule } = await resolveTarget(targetPath, options);
  if (!rule) {
    return { status: 'no-match', context, ruleSet, rule: null };
  }
  const result = await execute(rule, context, {
    ...options,
    ruleSetOptions: ruleSet.options,
  });
  return { status: 'executed', context, ruleSet, rule, result };
}
