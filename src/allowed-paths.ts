import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { userConfigDir } from './config.js';
import { ConfigError } from './errors.js';
import { formatIssues } from './schema.js';

export const PERMISSIONS_FILENAME = 'permissions.yml';

const PermissionsFileSchema = z.object({
  permanently_allowed: z.array(z.string()).default([]),
});

export function permissionsFilePath(homeDir?: string): string {
  return path.join(userConfigDir(homeDir), PERMISSIONS_FILENAME);
}

function isWithin(candidate: string, parent: string): boolean {
  const relative = path.relative(parent, candidate);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

export class AllowedPaths {
  private readonly temporary = new Set<string>();
  private readonly permanent = new Set<string>();

  add(directory: string, permanent: boolean): void {
    const resolved = path.resolve(directory);
    if (permanent) {
      this.permanent.add(resolved);
      this.temporary.delete(resolved);
    } else {
      this.temporary.add(resolved);
      this.permanent.delete(resolved);
    }
  }

  remove(directory: string): void {
    const resolved = path.resolve(directory);
    this.permanent.delete(resolved);
    this.temporary.delete(resolved);
  }

  all(): string[] {
    return [...new Set([...this.temporary, ...this.permanent])].sort();
  }

  isAllowed(directory: string): boolean {
    const resolved = path.resolve(directory);
    return this.all().some((allowed) => isWithin(resolved, allowed));
  }

  loadFromString(raw: string, source = '(string)'): void {
    let document: unknown;
    try {
      document = parseYaml(raw);
    } catch (error) {
      throw new ConfigError(`malformed YAML: ${(error as Error).message}`, source, {
        cause: error,
      });
    }
    const parsed = PermissionsFileSchema.safeParse(document ?? {});
    if (!parsed.success) {
      throw new ConfigError(`invalid permissions file: ${formatIssues(parsed.error)}`, source);
    }
    this.permanent.clear();
    for (const directory of parsed.data.permanently_allowed) {
      this.permanent.add(path.resolve(directory));
    }
  }

  async load(filePath: string): Promise<boolean> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw new ConfigError(`unable to read the file: ${(error as Error).message}`, filePath, {
        cause: error,
      });
    }
    this.loadFromString(raw, filePath);
    return true;
  }

  dump(): string {
    return stringifyYaml({ permanently_allowed: [...this.permanent].sort() });
  }

  async save(filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, this.dump(), 'utf8');
  }
}

/**
 * Builds the authorization check used while loading rule sets. The pathrun
 * configuration directory is always trusted.
 */
export function createAccessCheck(
  allowed: AllowedPaths,
  homeDir?: string,
): (directory: string) => boolean {
  const configDir = userConfigDir(homeDir);
  return (directory) => isWithin(path.resolve(directory), configDir) || allowed.isAllowed(directory);
}
