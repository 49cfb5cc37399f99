/**
 * Shared test utilities for config tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { SKILLROUTE_DIR } from '../utils/path-utils.js';

export interface TestProject {
  tempDir: string;
  projectDir: string;
  /** Stand-in for ~/.skillroute */
  userDir: string;
  cleanup: () => Promise<void>;
}

/**
 * Create a test project with temp directory and git marker
 */
export async function createTestProject(prefix = 'skillroute-config-'): Promise<TestProject> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const projectDir = path.join(tempDir, 'project');
  const userDir = path.join(tempDir, 'home', SKILLROUTE_DIR);

  await fs.mkdir(path.join(projectDir, '.git'), { recursive: true });

  return {
    tempDir,
    projectDir,
    userDir,
    cleanup: async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    },
  };
}

/**
 * Write JSON settings into a .skillroute-style directory
 */
export async function writeSettings(
  dir: string,
  settings: Record<string, unknown>,
  local = false
): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, local ? 'settings.local.json' : 'settings.json');
  await fs.writeFile(filePath, JSON.stringify(settings));
  return filePath;
}

export function projectConfigDir(projectDir: string): string {
  return path.join(projectDir, SKILLROUTE_DIR);
}
