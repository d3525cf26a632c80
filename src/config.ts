import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { AccessError, ConfigError } from './errors.js';
import { formatIssues, RuleSetFileSchema, type RawAction, type RawRuleSetOptions } from './schema.js';
import type { ResolvedOptions, Rule, RuleSet, RuleSetOptions } from './types.js';

export const RULE_SET_FILENAMES = ['.pathrun.yaml', '.pathrun.yml'] as const;

const DEFAULT_SHELL = '/bin/sh';

export interface RuleSetFragment {
  filePath: string;
  rules: Rule[];
  options: RuleSetOptions;
}

export interface LoadRuleSetOptions {
  homeDir?: string;
  isAllowed?: (directory: string) => boolean | Promise<boolean>;
}

export function userConfigDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.config', 'pathrun');
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function findRuleSetFile(directory: string): Promise<string | null> {
  for (const filename of RULE_SET_FILENAMES) {
    const filePath = path.join(directory, filename);
    if (await isFile(filePath)) {
      return filePath;
    }
  }
  return null;
}

async function startDirectory(targetPath: string): Promise<string> {
  const resolved = path.resolve(targetPath);
  // the walk follows symlinks into the real file's tree
  const real = await fs.realpath(resolved).catch(() => null);
  if (real) {
    const stat = await fs.stat(real);
    return stat.isDirectory() ? real : path.dirname(real);
  }
  // a target that does not exist yet still selects rules by its parent
  const parent = path.dirname(resolved);
  return fs.realpath(parent).catch(() => parent);
}

export function ancestorDirectories(directory: string): string[] {
  const directories: string[] = [];
  let current = path.resolve(directory);
  for (;;) {
    directories.push(current);
    const parent = path.dirname(current);
    if (parent === current) {
      return directories;
    }
    current = parent;
  }
}

function toOptions(raw: RawRuleSetOptions | undefined): RuleSetOptions {
  if (!raw) {
    return {};
  }
  return {
    shell: raw.shell,
    verbose: raw.verbose,
    debug: raw.debug,
    confirmAfterTimeout: raw.confirm_after_timeout,
    timeout: raw.timeout,
    shellDefault: raw.shell_default,
    last: raw.last,
  };
}

function normalizeRule(action: RawAction, source: string, index: number): Rule {
  const commands =
    action.list_commands ?? (action.command === undefined ? [] : [action.command]);
  return {
    pathMatch: action.path_match,
    pathRegex: action.path_regex,
    pathMatchExclude: action.path_match_exclude,
    pathRegexExclude: action.path_regex_exclude,
    tags: action.tags,
    shell: action.shell,
    cwd: action.cwd,
    timeout: action.timeout,
    stdout: action.stdout,
    stderr: action.stderr,
    comment: action.comment ?? '',
    commands,
    source,
    index,
  };
}

export function parseRuleSet(raw: unknown, filePath: string): RuleSetFragment {
  const parsed = RuleSetFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid rule set: ${formatIssues(parsed.error)}`, filePath);
  }
  return {
    filePath,
    rules: parsed.data.actions.map((action, index) => normalizeRule(action, filePath, index)),
    options: toOptions(parsed.data.options),
  };
}

export async function loadRuleSetFile(filePath: string): Promise<RuleSetFragment> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`unable to read the file: ${(error as Error).message}`, filePath, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(`malformed YAML: ${(error as Error).message}`, filePath, {
      cause: error,
    });
  }
  // an empty file holds no rules
  return parseRuleSet(document ?? {}, filePath);
}

function copyOption<K extends keyof RuleSetOptions>(
  target: RuleSetOptions,
  source: RuleSetOptions,
  key: K,
): void {
  const value = source[key];
  if (value !== undefined) {
    target[key] = value;
  }
}

const OPTION_KEYS = [
  'shell',
  'verbose',
  'debug',
  'confirmAfterTimeout',
  'timeout',
  'shellDefault',
  'last',
] as const satisfies readonly (keyof RuleSetOptions)[];

export function mergeOptions(closer: RuleSetOptions, farther: RuleSetOptions): RuleSetOptions {
  const merged: RuleSetOptions = {};
  for (const key of OPTION_KEYS) {
    copyOption(merged, farther, key);
    copyOption(merged, closer, key);
  }
  return merged;
}

/** Fragments are ordered closest to the target first. */
export function mergeRuleSets(fragments: readonly RuleSetFragment[]): RuleSet {
  let options: RuleSetOptions = {};
  for (const fragment of [...fragments].reverse()) {
    options = mergeOptions(fragment.options, options);
  }
  return Object.freeze({
    rules: Object.freeze(fragments.flatMap((fragment) => fragment.rules)),
    options: Object.freeze(options),
    files: Object.freeze(fragments.map((fragment) => fragment.filePath)),
  });
}

export async function loadRuleSet(
  targetPath: string,
  options: LoadRuleSetOptions = {},
): Promise<RuleSet> {
  const isAllowed = options.isAllowed ?? (() => true);
  const fragments: RuleSetFragment[] = [];
  const seen = new Set<string>();

  const visit = async (directory: string): Promise<boolean> => {
    const filePath = await findRuleSetFile(directory);
    if (!filePath || seen.has(filePath)) {
      return true;
    }
    if (!(await isAllowed(directory))) {
      throw new AccessError(directory);
    }
    seen.add(filePath);
    const fragment = await loadRuleSetFile(filePath);
    fragments.push(fragment);
    return fragment.options.last !== true;
  };

  const start = await startDirectory(targetPath);
  let keepWalking = true;
  for (const directory of ancestorDirectories(start)) {
    keepWalking = await visit(directory);
    if (!keepWalking) {
      break;
    }
  }
  if (keepWalking) {
    await visit(userConfigDir(options.homeDir));
  }

  return mergeRuleSets(fragments);
}

export function resolveOptions(
  options: Readonly<RuleSetOptions>,
  env: Readonly<Record<string, string>> = {},
): ResolvedOptions {
  const envShell = env.SHELL;
  return {
    shell: options.shell ?? (envShell && envShell.length > 0 ? envShell : DEFAULT_SHELL),
    verbose: options.verbose === true || options.debug === true,
    debug: options.debug === true,
    confirmAfterTimeout:
      options.confirmAfterTimeout && options.confirmAfterTimeout > 0
        ? options.confirmAfterTimeout
        : undefined,
    timeout: options.timeout && options.timeout > 0 ? options.timeout : undefined,
    shellDefault: options.shellDefault === true,
  };
}
