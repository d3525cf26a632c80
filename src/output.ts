import os from 'node:os';
import path from 'node:path';
import pc from 'picocolors';
import type { RunCommandsOptions } from './runner.js';
import { joinCommand } from './shell-words.js';
import type {
  CommandResult,
  ExecutionResult,
  RenderedCommand,
  RenderedRule,
  ResolvedOptions,
  RuleSet,
} from './types.js';

type Colors = ReturnType<typeof pc.createColors>;

export interface ReporterOptions {
  verbose?: boolean;
  debug?: boolean;
  color?: boolean;
  write?: (line: string) => void;
}

export function homeToTilde(filePath: string, homeDir: string = os.homedir()): string {
  const home = `${homeDir}${path.sep}`;
  if (`${filePath}${path.sep}`.startsWith(home)) {
    return `~${path.sep}${filePath.slice(home.length)}`;
  }
  return filePath;
}

export function formatCommand(command: RenderedCommand): string {
  const text = command.kind === 'shell' ? command.line : joinCommand(command.argv);
  return text.replace(/\n/g, '\\n');
}

function describeResult(result: CommandResult): string {
  switch (result.outcome) {
    case 'timed-out':
      return 'timed out';
    case 'declined':
      return 'declined';
    case 'interrupted':
      return 'interrupted';
    case 'spawn-failed':
      return result.error ?? 'failed to start';
    default:
      return result.signal ? `signal ${result.signal}` : `exit ${result.exitCode ?? 'null'}`;
  }
}

export function formatResultLine(result: CommandResult, color = false): string {
  const colors = pc.createColors(color);
  const symbol = result.passed ? colors.green('✓') : colors.red('✗');
  const details = result.passed
    ? `${result.durationMs}ms`
    : `${describeResult(result)}, ${result.durationMs}ms`;
  return `${symbol} ${formatCommand(result.command)} (${details})`;
}

export function formatSummary(result: ExecutionResult, color = false): string {
  const colors = pc.createColors(color);
  const lines = result.results.map((entry) => formatResultLine(entry, color));
  if (result.success) {
    lines.push(colors.green('[SUCCESS] All commands were successful.'));
  } else if (result.interrupted) {
    lines.push(colors.red('[FAILURE] Interrupted.'));
  } else {
    lines.push(colors.red('[FAILURE] A command failed.'));
  }
  return lines.join('\n');
}

function prefixed(colors: Colors, prefix: string, text: string): string {
  return `${colors.green(prefix)} ${text}`;
}

export function formatRuleInfo(
  rendered: RenderedRule,
  ruleSet: RuleSet,
  options: Pick<ResolvedOptions, 'shell' | 'verbose' | 'debug'>,
  color = false,
): string[] {
  const colors = pc.createColors(color);
  const lines: string[] = [];

  if (options.verbose) {
    lines.push(prefixed(colors, '[INFO]', 'Rule sets loaded from:'));
    for (const file of ruleSet.files) {
      lines.push(`  ${homeToTilde(file)}`);
    }
    lines.push(prefixed(colors, '[INFO]', `Rule: ${homeToTilde(rendered.rule.source)} #${rendered.rule.index + 1}`));
    if (rendered.shell) {
      lines.push(prefixed(colors, '[SHELL]', options.shell));
    }
  }
  if (options.debug) {
    lines.push(prefixed(colors, '[DEBUG]', `Merged options: ${JSON.stringify(ruleSet.options)}`));
    lines.push(prefixed(colors, '[DEBUG]', `Rendered commands: ${JSON.stringify(rendered.commands)}`));
  }

  lines.push(prefixed(colors, '[WORKING DIR]', homeToTilde(rendered.cwd)));
  if (rendered.timeoutSeconds !== undefined) {
    lines.push(prefixed(colors, '[TIMEOUT]', `${rendered.timeoutSeconds} seconds`));
  }
  if (rendered.stdout !== undefined) {
    lines.push(prefixed(colors, '[STDOUT]', homeToTilde(rendered.stdout)));
  }
  if (rendered.stderr !== undefined) {
    lines.push(prefixed(colors, '[STDERR]', homeToTilde(rendered.stderr)));
  }
  if (rendered.commands.length === 1) {
    lines.push(prefixed(colors, '[COMMAND]', formatCommand(rendered.commands[0])));
  } else {
    lines.push(prefixed(colors, '[COMMANDS]', 'List of commands:'));
    for (const command of rendered.commands) {
      lines.push(`  ${formatCommand(command)}`);
    }
  }
  if (rendered.rule.comment) {
    lines.push(prefixed(colors, '[COMMENT]', rendered.rule.comment));
  }
  return lines;
}

export function createConsoleReporter(
  options: ReporterOptions = {},
): Pick<RunCommandsOptions, 'onCommandStart' | 'onCommandComplete' | 'onStateChange'> {
  const colors = pc.createColors(options.color ?? Boolean(process.stderr.isTTY));
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  return {
    onCommandStart: (command) => {
      write(prefixed(colors, '[RUN]', formatCommand(command)));
    },
    onStateChange: (_index, state) => {
      if (options.debug) {
        write(colors.gray(`[STATE] ${state}`));
      }
    },
    onCommandComplete: (result) => {
      if (result.passed) {
        if (options.verbose) {
          write(colors.gray(`[DONE] ${result.durationMs}ms`));
        }
        return;
      }
      write(colors.red(`[FAILURE] ${formatCommand(result.command)}`));
      write(colors.red(`[EXIT-CODE] ${describeResult(result)}`));
    },
  };
}
