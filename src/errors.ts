import type { CommandResult, ExecutionResult } from './types.js';

export class PathRunError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PathRunError';
  }
}

export class ConfigError extends PathRunError {
  readonly filePath?: string;

  constructor(message: string, filePath?: string, options?: { cause?: unknown }) {
    super(filePath ? `${filePath}: ${message}` : message, options);
    this.name = 'ConfigError';
    this.filePath = filePath;
  }
}

export class AccessError extends PathRunError {
  readonly directory: string;

  constructor(directory: string) {
    super(
      `The directory '${directory}' is not allowed to provide rule sets. ` +
        "Allow it, or one of its parents, with '--allow-dir'.",
    );
    this.name = 'AccessError';
    this.directory = directory;
  }
}

export class TemplateError extends PathRunError {
  readonly template?: string;

  constructor(message: string, template?: string, options?: { cause?: unknown }) {
    super(template === undefined ? message : `${message} (in '${template}')`, options);
    this.name = 'TemplateError';
    this.template = template;
  }
}

export class CommandNotFoundError extends TemplateError {
  readonly command: string;

  constructor(command: string, searchPath: string) {
    super(`which: command not found: '${command}' (PATH: ${searchPath})`);
    this.name = 'CommandNotFoundError';
    this.command = command;
  }
}

export class ExecutionError extends PathRunError {
  readonly result: ExecutionResult;
  readonly failure: CommandResult | null;

  constructor(message: string, result: ExecutionResult, failure: CommandResult | null) {
    super(message);
    this.name = 'ExecutionError';
    this.result = result;
    this.failure = failure;
  }
}

function describeFailure(failure: CommandResult): string {
  switch (failure.outcome) {
    case 'timed-out':
      return 'timed out';
    case 'declined':
      return 'was stopped after the confirmation was declined';
    case 'interrupted':
      return 'was interrupted';
    case 'spawn-failed':
      return `could not be started: ${failure.error ?? 'unknown error'}`;
    default:
      return failure.signal
        ? `was terminated by ${failure.signal}`
        : `returned ${failure.exitCode ?? 'null'}`;
  }
}

export function executionErrorFrom(result: ExecutionResult): ExecutionError | null {
  if (result.success) {
    return null;
  }
  const failure =
    result.firstFailureIndex === null
      ? null
      : (result.results[result.firstFailureIndex] ?? null);
  if (!failure) {
    const message = result.interrupted
      ? 'Execution was interrupted before the next command started.'
      : 'Execution failed without a command result.';
    return new ExecutionError(message, result, null);
  }
  return new ExecutionError(
    `Command ${failure.index + 1} ${describeFailure(failure)}.`,
    result,
    failure,
  );
}
