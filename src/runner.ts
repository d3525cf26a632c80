import { spawn, type ChildProcess } from 'node:child_process';
import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { PathRunError } from './errors.js';
import type {
  CommandOutcome,
  CommandResult,
  ExecutionResult,
  RenderedCommand,
} from './types.js';

const DEFAULT_SHELL = '/bin/sh';
const MAX_TIMER_MS = 2 ** 31 - 1;
const INTERRUPT_GRACE_MS = 2000;
// Each command leads its own process group so that stopping it also stops
// whatever it started.
const OWN_PROCESS_GROUP = process.platform !== 'win32';

export type CommandState =
  | 'running'
  | 'awaiting-confirmation'
  | 'completed'
  | 'timed-out'
  | 'declined'
  | 'interrupted';

export interface ConfirmRequest {
  command: RenderedCommand;
  index: number;
  elapsedMs: number;
  /** Aborted when the command ends before an answer arrives. */
  signal: AbortSignal;
}

export type Confirm = (request: ConfirmRequest) => Promise<boolean>;

export interface RunCommandsOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  shellPath?: string;
  timeoutSeconds?: number;
  confirmAfterSeconds?: number;
  confirm?: Confirm;
  signal?: AbortSignal;
  stdio?: 'inherit' | 'pipe';
  stdoutFile?: string;
  stderrFile?: string;
  onCommandStart?: (command: RenderedCommand, index: number) => void;
  onCommandOutput?: (command: RenderedCommand, stream: 'stdout' | 'stderr', text: string) => void;
  onCommandComplete?: (result: CommandResult) => void;
  onStateChange?: (index: number, state: CommandState) => void;
}

function resolveShell(options: RunCommandsOptions): string {
  if (typeof options.shellPath === 'string' && options.shellPath.length > 0) {
    return options.shellPath;
  }
  const envShell = (options.env ?? process.env).SHELL;
  return envShell && envShell.length > 0 ? envShell : DEFAULT_SHELL;
}

interface Timer {
  cancel(): void;
}

// setTimeout fires at once past 2^31-1 ms, so long delays are chained.
function startTimer(delayMs: number, callback: () => void): Timer {
  let handle: NodeJS.Timeout | undefined;
  const arm = (remaining: number) => {
    handle = setTimeout(() => {
      if (remaining > MAX_TIMER_MS) {
        arm(remaining - MAX_TIMER_MS);
      } else {
        callback();
      }
    }, Math.min(remaining, MAX_TIMER_MS));
  };
  arm(delayMs);
  return { cancel: () => clearTimeout(handle) };
}

function signalTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (OWN_PROCESS_GROUP && child.pid !== undefined) {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ESRCH') {
        return;
      }
    }
  }
  child.kill(signal);
}

interface OutputFiles {
  stdout?: number;
  stderr?: number;
  close(): Promise<void>;
}

async function openOutputFiles(options: RunCommandsOptions): Promise<OutputFiles> {
  const handles: FileHandle[] = [];
  const open = async (filePath: string): Promise<number> => {
    try {
      const handle = await fs.open(filePath, 'w');
      handles.push(handle);
      return handle.fd;
    } catch (error) {
      await Promise.all(handles.map((handle) => handle.close()));
      throw new PathRunError(`unable to open '${filePath}': ${(error as Error).message}`, {
        cause: error,
      });
    }
  };

  const stdout = options.stdoutFile ? await open(options.stdoutFile) : undefined;
  let stderr: number | undefined;
  if (options.stderrFile) {
    stderr =
      options.stderrFile === options.stdoutFile && stdout !== undefined
        ? stdout
        : await open(options.stderrFile);
  }
  return {
    stdout,
    stderr,
    close: async () => {
      await Promise.all(handles.map((handle) => handle.close()));
    },
  };
}

function toMilliseconds(seconds: number | undefined): number | undefined {
  return seconds !== undefined && seconds > 0 ? Math.round(seconds * 1000) : undefined;
}

function outcomeOf(state: CommandState, spawnFailed: boolean): CommandOutcome {
  switch (state) {
    case 'timed-out':
    case 'declined':
    case 'interrupted':
      return state;
    default:
      return spawnFailed ? 'spawn-failed' : 'completed';
  }
}

/**
 * Runs one command through the states
 * running -> completed | timed-out | awaiting-confirmation,
 * awaiting-confirmation -> running (accepted) | declined.
 * An abort signal moves any live state to interrupted.
 */
function runCommand(
  command: RenderedCommand,
  index: number,
  options: RunCommandsOptions,
  outputs: OutputFiles,
): Promise<CommandResult> {
  const start = Date.now();
  const timeoutMs = toMilliseconds(options.timeoutSeconds);
  const confirmAfterMs = toMilliseconds(options.confirmAfterSeconds);
  const confirm = options.confirm;
  const stdioMode = options.stdio ?? 'inherit';
  const stdio: [typeof stdioMode, number | typeof stdioMode, number | typeof stdioMode] = [
    stdioMode,
    outputs.stdout ?? stdioMode,
    outputs.stderr ?? stdioMode,
  ];

  return new Promise((resolve) => {
    options.onCommandStart?.(command, index);

    let state: CommandState = 'running';
    let stdout = '';
    let stderr = '';
    let error: string | undefined;
    let spawnFailed = false;
    let resolved = false;
    let timeoutTimer: Timer | undefined;
    let confirmTimer: Timer | undefined;
    let killTimer: Timer | undefined;
    let prompt: AbortController | undefined;

    const child =
      command.kind === 'shell'
        ? spawn(command.line, {
            shell: resolveShell(options),
            cwd: options.cwd,
            env: options.env,
            stdio,
            detached: OWN_PROCESS_GROUP,
          })
        : spawn(command.argv[0], command.argv.slice(1), {
            cwd: options.cwd,
            env: options.env,
            stdio,
            detached: OWN_PROCESS_GROUP,
          });

    const transition = (next: CommandState) => {
      state = next;
      options.onStateChange?.(index, next);
    };

    const isLive = () => state === 'running' || state === 'awaiting-confirmation';

    const terminate = (next: 'timed-out' | 'declined' | 'interrupted') => {
      if (!isLive()) {
        return;
      }
      transition(next);
      if (next === 'interrupted') {
        // an interrupt reaches the command as SIGINT first
        signalTree(child, 'SIGINT');
        killTimer = startTimer(INTERRUPT_GRACE_MS, () => signalTree(child, 'SIGKILL'));
      } else {
        signalTree(child, 'SIGKILL');
      }
    };

    const onAbort = () => terminate('interrupted');

    const finalize = (exitCode: number | null, signal: NodeJS.Signals | null) => {
      if (resolved) {
        return;
      }
      resolved = true;
      timeoutTimer?.cancel();
      confirmTimer?.cancel();
      killTimer?.cancel();
      prompt?.abort();
      options.signal?.removeEventListener('abort', onAbort);
      if (isLive()) {
        transition('completed');
      }
      const outcome = outcomeOf(state, spawnFailed);
      const result: CommandResult = {
        index,
        command,
        outcome,
        passed: outcome === 'completed' && exitCode === 0,
        exitCode,
        signal,
        durationMs: Date.now() - start,
        timedOut: outcome === 'timed-out',
        declined: outcome === 'declined',
        stdout,
        stderr,
        error,
      };
      options.onCommandComplete?.(result);
      resolve(result);
    };

    const awaitConfirmation = async (askConfirm: Confirm) => {
      transition('awaiting-confirmation');
      prompt = new AbortController();
      let accepted = false;
      try {
        accepted = await askConfirm({
          command,
          index,
          elapsedMs: Date.now() - start,
          signal: prompt.signal,
        });
      } catch (confirmError) {
        error = `confirmation failed: ${(confirmError as Error).message}`;
      }
      prompt = undefined;
      if (state !== 'awaiting-confirmation') {
        return;
      }
      if (accepted) {
        transition('running');
        scheduleConfirmation();
      } else {
        terminate('declined');
      }
    };

    function scheduleConfirmation(): void {
      if (confirmAfterMs === undefined || !confirm) {
        return;
      }
      const elapsed = Date.now() - start;
      if (timeoutMs !== undefined && elapsed + confirmAfterMs >= timeoutMs) {
        return;
      }
      confirmTimer = startTimer(confirmAfterMs, () => {
        if (state === 'running') {
          void awaitConfirmation(confirm);
        }
      });
    }

    if (timeoutMs !== undefined) {
      timeoutTimer = startTimer(timeoutMs, () => terminate('timed-out'));
    }
    scheduleConfirmation();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) {
      onAbort();
    }

    child.stdout?.on('data', (chunk: Buffer) => {
      const text = chunk.toString();
      stdout += text;
      options.onCommandOutput?.(command, 'stdout', text);
    });

    child.stderr?.on('data', (chunk: Buffer) => {
      const text = chunk.toString();
      stderr += text;
      options.onCommandOutput?.(command, 'stderr', text);
    });

    child.on('error', (spawnError) => {
      spawnFailed = true;
      error = spawnError.message;
      finalize(null, null);
    });

    // A descendant that left the process group can hold the pipes open, so a
    // terminated command is settled on exit rather than on close.
    child.on('exit', (code, signal) => {
      if (!isLive()) {
        finalize(code, signal);
      }
    });

    child.on('close', (code, signal) => {
      finalize(code, signal);
    });
  });
}

export async function runCommands(
  commands: readonly RenderedCommand[],
  options: RunCommandsOptions = {},
): Promise<ExecutionResult> {
  const results: CommandResult[] = [];
  const start = Date.now();
  let firstFailureIndex: number | null = null;
  let interrupted = false;

  const outputs = await openOutputFiles(options);
  try {
    for (const [index, command] of commands.entries()) {
      if (options.signal?.aborted) {
        interrupted = true;
        firstFailureIndex = index;
        break;
      }

      const result = await runCommand(command, index, options, outputs);
      results.push(result);

      if (!result.passed) {
        firstFailureIndex = index;
        interrupted = result.outcome === 'interrupted';
        break;
      }
    }
  } finally {
    await outputs.close();
  }

  return {
    success: firstFailureIndex === null,
    results,
    firstFailureIndex,
    interrupted,
    totalDurationMs: Date.now() - start,
  };
}
