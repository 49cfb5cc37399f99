import * as os from 'os';
import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Directory name for skillroute configuration (user and project level)
 */
export const SKILLROUTE_DIR = '.skillroute';

export function getUserConfigDir(): string {
  return path.join(os.homedir(), SKILLROUTE_DIR);
}

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Find project root by looking for a .git or .skillroute directory
 */
export async function findProjectRoot(cwd: string): Promise<string> {
  let current = path.resolve(cwd);
  const root = path.parse(current).root;

  while (current !== root) {
    if (await pathExists(path.join(current, '.git'))) {
      return current;
    }

    if (await pathExists(path.join(current, SKILLROUTE_DIR))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return path.resolve(cwd);
}

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}
