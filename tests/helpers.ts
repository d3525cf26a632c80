import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Rule } from '../src/types.js';

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const created = await fs.mkdtemp(path.join(os.tmpdir(), 'pathrun-'));
  const dir = await fs.realpath(created);
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

export function makeRule(overrides: Partial<Rule> = {}): Rule {
  return {
    pathMatch: [],
    pathRegex: [],
    pathMatchExclude: [],
    pathRegexExclude: [],
    tags: [],
    comment: '',
    commands: ['true'],
    source: '/srv/project/.pathrun.yaml',
    index: 0,
    ...overrides,
  };
}

export const node = process.execPath;

export function nodeArgv(code: string): string[] {
  return [node, '-e', code];
}
