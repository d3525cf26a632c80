export {
  execute,
  resolveAndRun,
  resolveTarget,
  createExecutionContext,
} from './pathrun.js';
export {
  loadRuleSet,
  loadRuleSetFile,
  parseRuleSet,
  mergeRuleSets,
  mergeOptions,
  resolveOptions,
  findRuleSetFile,
  userConfigDir,
  RULE_SET_FILENAMES,
} from './config.js';
export { resolveRule, matchesTag, DEFAULT_TAG } from './resolver.js';
export { compileGlob, compilePattern, matchesPatterns, matchesRule } from './matcher.js';
export {
  renderRule,
  renderCommands,
  renderPatterns,
  renderWorkingDirectory,
  ruleScope,
} from './render.js';
export { buildTemplateContext } from './template-context.js';
export { renderTemplate } from './template.js';
export { runCommands } from './runner.js';
export { quoteArgument, joinCommand, splitCommandLine } from './shell-words.js';
export { AllowedPaths, createAccessCheck, permissionsFilePath } from './allowed-paths.js';
export {
  PathRunError,
  ConfigError,
  AccessError,
  TemplateError,
  CommandNotFoundError,
  ExecutionError,
  executionErrorFrom,
} from './errors.js';
export { formatSummary, formatResultLine, formatCommand } from './output.js';
export type { PatternKind, RulePatterns } from './matcher.js';
export type { LoadRuleSetOptions, RuleSetFragment } from './config.js';
export type { ExecuteOptions, ResolveOptions, Resolution, ResolveAndRunOutcome } from './pathrun.js';
export type { RunCommandsOptions, Confirm, ConfirmRequest, CommandState } from './runner.js';
export type { TemplateScope, TemplateValue, TemplateFilter } from './template.js';
export type {
  Rule,
  RuleSet,
  RuleSetOptions,
  ResolvedOptions,
  CommandSpec,
  ExecutionContext,
  ExecutionResult,
  CommandResult,
  CommandOutcome,
  RenderedCommand,
  RenderedRule,
} from './types.js';
