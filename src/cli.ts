#!/usr/bin/env node
import { promises as fs } from 'node:fs';
import path from 'node:path';
import * as p from '@clack/prompts';
import { Command } from 'commander';
import pc from 'picocolors';
import { AllowedPaths, createAccessCheck, permissionsFilePath } from './allowed-paths.js';
import { resolveOptions, RULE_SET_FILENAMES } from './config.js';
import { executionErrorFrom, PathRunError } from './errors.js';
import {
  createConsoleReporter,
  formatCommand,
  formatRuleInfo,
  homeToTilde,
} from './output.js';
import { resolveTarget } from './pathrun.js';
import { renderRule } from './render.js';
import { DEFAULT_TAG } from './resolver.js';
import { runCommands, type Confirm } from './runner.js';

interface CliOptions {
  tag: string;
  confirmBefore: boolean;
  list: boolean;
  allowDir: boolean;
  dryRun: boolean;
}

const color = Boolean(process.stderr.isTTY);
const colors = pc.createColors(color);

function writeLine(line: string): void {
  process.stderr.write(`${line}\n`);
}

function writeError(message: string): void {
  writeLine(colors.red(`Error: ${message}`));
}

const confirmContinue: Confirm = async ({ command, elapsedMs, signal }) => {
  // the signal closes the prompt when the command ends first
  const answer = await p.confirm({
    message: `Still running after ${Math.round(elapsedMs / 1000)}s: ${formatCommand(command)}. Keep waiting?`,
    signal,
  });
  return !p.isCancel(answer) && answer;
};

async function allowDirectories(files: string[], allowed: AllowedPaths): Promise<number> {
  const filePath = permissionsFilePath();
  for (const file of files) {
    const directory = path.resolve(file);
    const stat = await fs.stat(directory).catch(() => null);
    if (!stat?.isDirectory()) {
      writeError(`The path you provided is not a directory: ${directory}`);
      return 1;
    }
    allowed.add(directory, true);
    console.log(`The directory has been permanently added to the allow list: ${directory}`);
  }
  await allowed.save(filePath);
  return 0;
}

async function runFile(
  file: string,
  options: CliOptions,
  isAllowed: (directory: string) => boolean,
  state: { confirmed: boolean },
): Promise<number> {
  const { context, ruleSet, rule } = await resolveTarget(file, { tag: options.tag, isAllowed });

  if (options.list) {
    for (const ruleSetFile of ruleSet.files) {
      console.log(ruleSetFile);
    }
    return 0;
  }

  if (ruleSet.files.length === 0) {
    writeError(
      `none of the rule-set files (${RULE_SET_FILENAMES.join(', ')}) were found ` +
        `in the parent directories of ${homeToTilde(context.file)}`,
    );
    return 1;
  }

  if (!rule) {
    writeError(
      `the file '${homeToTilde(context.file)}' does not match any '${options.tag}' rule ` +
        `in: ${ruleSet.files.map((ruleSetFile) => homeToTilde(ruleSetFile)).join(', ')}`,
    );
    return 1;
  }

  const resolved = resolveOptions(ruleSet.options, context.env);
  const rendered = renderRule(rule, context, resolved);
  for (const line of formatRuleInfo(rendered, ruleSet, resolved, color)) {
    writeLine(line);
  }

  if (options.dryRun) {
    return 0;
  }

  if (options.confirmBefore && !state.confirmed) {
    const answer = await p.confirm({ message: 'Do you want to execute the command?' });
    if (p.isCancel(answer) || !answer) {
      return 1;
    }
    state.confirmed = true;
  }

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);
  try {
    const result = await runCommands(rendered.commands, {
      cwd: rendered.cwd,
      env: { ...context.env },
      shellPath: resolved.shell,
      timeoutSeconds: rendered.timeoutSeconds,
      confirmAfterSeconds: resolved.confirmAfterTimeout,
      stdoutFile: rendered.stdout,
      stderrFile: rendered.stderr,
      confirm: confirmContinue,
      signal: controller.signal,
      stdio: 'inherit',
      ...createConsoleReporter({ verbose: resolved.verbose, debug: resolved.debug, color }),
    });

    const failure = executionErrorFrom(result);
    if (failure) {
      writeError(failure.message);
      return 1;
    }
    writeLine(colors.green('[SUCCESS] All commands were successful.'));
    return 0;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

async function run(files: string[], options: CliOptions): Promise<number> {
  const allowed = new AllowedPaths();
  await allowed.load(permissionsFilePath());

  if (options.allowDir) {
    return allowDirectories(files, allowed);
  }

  const isAllowed = createAccessCheck(allowed);
  const state = { confirmed: false };
  for (const file of files) {
    const code = await runFile(file, options, isAllowed, state);
    if (code !== 0) {
      return code;
    }
  }
  return 0;
}

const program = new Command('pathrun')
  .description('Run the command that the nearest rule set associates with a file.')
  .usage('[options] <files...>')
  .argument('<files...>', 'Paths to the files.')
  .option('-t, --tag <tag>', 'Execute the action associated with this tag.', DEFAULT_TAG)
  .option('-b, --confirm-before', 'Confirm before executing the action.', false)
  .option('-l, --list', 'List the rule-set files that have been found.', false)
  .option(
    '-d, --allow-dir',
    'Allow rule sets in the provided directory and its subdirectories permanently.',
    false,
  )
  .option('-n, --dry-run', 'Show the resolved command without running it.', false)
  .action(async (files: string[], options: CliOptions) => {
    try {
      process.exitCode = await run(files, options);
    } catch (error) {
      if (error instanceof PathRunError) {
        writeError(error.message);
        process.exitCode = 1;
        return;
      }
      throw error;
    }
  });

async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
