export type CommandSpec = string | readonly string[];

export interface Rule {
  pathMatch: readonly string[];
  pathRegex: readonly string[];
  pathMatchExclude: readonly string[];
  pathRegexExclude: readonly string[];
  tags: readonly string[];
  shell?: boolean;
  cwd?: string;
  timeout?: number;
  stdout?: string;
  stderr?: string;
  comment: string;
  commands: readonly CommandSpec[];
  source: string;
  index: number;
}

export interface RuleSetOptions {
  shell?: string;
  verbose?: boolean;
  debug?: boolean;
  confirmAfterTimeout?: number;
  timeout?: number;
  shellDefault?: boolean;
  last?: boolean;
}

export interface ResolvedOptions {
  shell: string;
  verbose: boolean;
  debug: boolean;
  confirmAfterTimeout?: number;
  timeout?: number;
  shellDefault: boolean;
}

export interface RuleSet {
  readonly rules: readonly Rule[];
  readonly options: Readonly<RuleSetOptions>;
  readonly files: readonly string[];
}

export interface ExecutionContext {
  readonly file: string;
  readonly tag?: string;
  readonly cwd: string;
  readonly env: Readonly<Record<string, string>>;
}

export type RenderedCommand =
  | { kind: 'shell'; line: string }
  | { kind: 'argv'; argv: readonly string[] };

export interface RenderedRule {
  rule: Rule;
  cwd: string;
  shell: boolean;
  timeoutSeconds?: number;
  stdout?: string;
  stderr?: string;
  commands: RenderedCommand[];
}

export type CommandOutcome =
  | 'completed'
  | 'timed-out'
  | 'declined'
  | 'interrupted'
  | 'spawn-failed';

export interface CommandResult {
  index: number;
  command: RenderedCommand;
  outcome: CommandOutcome;
  passed: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  durationMs: number;
  timedOut: boolean;
  declined: boolean;
  stdout: string;
  stderr: string;
  error?: string;
}

export interface ExecutionResult {
  success: boolean;
  results: CommandResult[];
  firstFailureIndex: number | null;
  interrupted: boolean;
  totalDurationMs: number;
}
