import { accessSync, closeSync, constants, openSync, readSync, realpathSync, statSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CommandNotFoundError, TemplateError } from './errors.js';
import { joinCommand, quoteArgument, splitCommandLine } from './shell-words.js';
import type { TemplateFilter, TemplateScope, TemplateValue } from './template.js';
import type { ExecutionContext } from './types.js';

const SHEBANG_READ_BYTES = 4096;

function expectString(filter: string, value: TemplateValue): string {
  if (typeof value !== 'string') {
    throw new TemplateError(`${filter}: expected a string`);
  }
  return value;
}

function expectStringList(filter: string, value: TemplateValue): string[] {
  if (!Array.isArray(value)) {
    throw new TemplateError(`${filter}: expected a list`);
  }
  return value.map((item) => expectString(filter, item));
}

function homeDirectory(env: Readonly<Record<string, string>>): string {
  const home = env.HOME;
  return home && home.length > 0 ? home : os.homedir();
}

function expandUser(value: string, env: Readonly<Record<string, string>>): string {
  if (value === '~') {
    return homeDirectory(env);
  }
  if (value.startsWith(`~${path.sep}`) || value.startsWith('~/')) {
    return path.join(homeDirectory(env), value.slice(2));
  }
  return value;
}

function expandVars(value: string, env: Readonly<Record<string, string>>): string {
  return value.replace(
    /\$(?:([A-Za-z_][A-Za-z0-9_]*)|\{([^}]+)\})/g,
    (match: string, bare: string | undefined, braced: string | undefined) => {
      const name = bare ?? braced ?? '';
      return Object.hasOwn(env, name) ? env[name] : match;
    },
  );
}

function isExecutableFile(candidate: string): boolean {
  try {
    accessSync(candidate, constants.X_OK);
    return statSync(candidate).isFile();
  } catch {
    return false;
  }
}

export function findExecutable(
  command: string,
  searchPath: string,
  cwd: string,
): string | null {
  if (command.length === 0) {
    return null;
  }
  if (command.includes('/') || command.includes(path.sep)) {
    const candidate = path.resolve(cwd, command);
    return isExecutableFile(candidate) ? candidate : null;
  }
  for (const directory of searchPath.split(path.delimiter)) {
    if (directory.length === 0) {
      continue;
    }
    const candidate = path.join(directory, command);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

export function readShebang(filePath: string): string {
  let head = '';
  try {
    const fd = openSync(filePath, 'r');
    try {
      const buffer = Buffer.alloc(SHEBANG_READ_BYTES);
      const bytesRead = readSync(fd, buffer, 0, SHEBANG_READ_BYTES, 0);
      head = buffer.subarray(0, bytesRead).toString('utf8');
    } finally {
      closeSync(fd);
    }
  } catch (error) {
    throw new TemplateError(`shebang: unable to read '${filePath}': ${(error as Error).message}`);
  }
  const firstLine = head.split('\n', 1)[0].trimStart();
  if (!firstLine.startsWith('#!')) {
    throw new TemplateError(`shebang: there is no shebang in the file '${filePath}'`);
  }
  return firstLine.slice(2).trim();
}

function pureFilters(context: ExecutionContext): Record<string, TemplateFilter> {
  return {
    quote: (value) => {
      if (Array.isArray(value)) {
        return expectStringList('quote', value).map(quoteArgument);
      }
      return quoteArgument(expectString('quote', value));
    },
    basename: (value) => path.basename(expectString('basename', value)),
    dirname: (value) => path.dirname(expectString('dirname', value)),
    abspath: (value) => path.resolve(context.cwd, expectString('abspath', value)),
    joinpath: (value) => path.join(...expectStringList('joinpath', value)),
    joincmd: (value) => joinCommand(expectStringList('joincmd', value)),
    splitcmd: (value) => splitCommandLine(expectString('splitcmd', value)),
    expanduser: (value) => expandUser(expectString('expanduser', value), context.env),
    expandvars: (value) => expandVars(expectString('expandvars', value), context.env),
  };
}

// These read the filesystem; every other filter is a pure function of its input.
function filesystemFilters(context: ExecutionContext): Record<string, TemplateFilter> {
  return {
    realpath: (value) => realpathSync(path.resolve(context.cwd, expectString('realpath', value))),
    shebang: (value) => readShebang(expectString('shebang', value)),
    shebang_list: (value) => splitCommandLine(readShebang(expectString('shebang_list', value))),
    shebang_quote: (value) =>
      joinCommand(splitCommandLine(readShebang(expectString('shebang_quote', value)))),
    which: (value) => {
      const command = expectString('which', value);
      const searchPath = context.env.PATH ?? '';
      const resolved = findExecutable(command, searchPath, context.cwd);
      if (!resolved) {
        throw new CommandNotFoundError(command, searchPath);
      }
      return resolved;
    },
  };
}

export function buildTemplateContext(context: ExecutionContext): TemplateScope {
  return {
    variables: {
      file: context.file,
      cwd: context.cwd,
      env: { ...context.env },
      pathsep: path.sep,
    },
    filters: { ...pureFilters(context), ...filesystemFilters(context) },
  };
}
