import { z } from 'zod';
import { compilePattern, type PatternKind } from './matcher.js';

const stringList = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => {
    if (value === undefined) {
      return [];
    }
    return typeof value === 'string' ? [value] : value;
  });

const PATTERN_FIELDS = [
  ['path_match', 'glob'],
  ['path_match_exclude', 'glob'],
  ['path_regex', 'regex'],
  ['path_regex_exclude', 'regex'],
] as const satisfies readonly (readonly [string, PatternKind])[];

export const CommandSpecSchema = z.union([z.string(), z.array(z.string()).min(1)]);

export const RuleSetOptionsSchema = z
  .object({
    shell: z.string().min(1).optional(),
    verbose: z.boolean().optional(),
    debug: z.boolean().optional(),
    confirm_after_timeout: z.number().nonnegative().optional(),
    timeout: z.number().nonnegative().optional(),
    shell_default: z.boolean().optional(),
    last: z.boolean().optional(),
  })
  .strict();

export const ActionSchema = z
  .object({
    path_match: stringList,
    path_regex: stringList,
    path_match_exclude: stringList,
    path_regex_exclude: stringList,
    tags: stringList,
    shell: z.boolean().optional(),
    cwd: z.string().optional(),
    timeout: z.number().nonnegative().optional(),
    comment: z.string().optional(),
    stdout: z.string().optional(),
    stderr: z.string().optional(),
    command: CommandSpecSchema.optional(),
    list_commands: z.array(CommandSpecSchema).min(1).optional(),
  })
  .strict()
  .superRefine((action, ctx) => {
    if (action.command !== undefined && action.list_commands !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "the keys 'command' and 'list_commands' cannot both be defined",
      });
    }
    if (action.command === undefined && action.list_commands === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "one of 'command' or 'list_commands' is required",
      });
    }
    if (action.path_match.length === 0 && action.path_regex.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "at least one of 'path_match' or 'path_regex' is required",
      });
    }
    for (const [key, kind] of PATTERN_FIELDS) {
      action[key].forEach((pattern, index) => {
        // templated patterns are checked once rendered
        if (pattern.includes('{{')) {
          return;
        }
        try {
          compilePattern(pattern, kind);
        } catch (error) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key, index],
            message: `invalid pattern '${pattern}': ${(error as Error).message}`,
          });
        }
      });
    }
  });

export const RuleSetFileSchema = z
  .object({
    options: RuleSetOptionsSchema.optional(),
    actions: z.array(ActionSchema).default([]),
  })
  .strict();

export type RawAction = z.infer<typeof ActionSchema>;
export type RawRuleSetOptions = z.infer<typeof RuleSetOptionsSchema>;
export type RuleSetFile = z.infer<typeof RuleSetFileSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
}
