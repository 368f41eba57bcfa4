/**
 * Temporary Workspace for isolated tests
 * Creates temporary directory for each test
 */

import { mkdtemp, rm, readFile, writeFile, mkdir, readdir } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { existsSync } from 'fs';

export interface TempWorkspace {
  /** Workspace root directory */
  root: string;
  /** Absolute path inside the workspace */
  path: (relativePath: string) => string;
  /** Cleanup workspace */
  cleanup: () => Promise<void>;
  /** Check file existence */
  exists: (relativePath: string) => boolean;
  /** Read file */
  readFile: (relativePath: string) => Promise<string>;
  /** Write file, creating parent directories */
  writeFile: (relativePath: string, content: string) => Promise<void>;
  /** Read and parse a JSON file */
  readJson: (relativePath: string) => Promise<unknown>;
  /** List files in directory (sorted) */
  listDir: (relativePath: string) => Promise<string[]>;
}

/**
 * Creates temporary workspace for test
 */
export async function createTempWorkspace(prefix = 'architect-test-'): Promise<TempWorkspace> {
  const root = await mkdtemp(join(tmpdir(), prefix));

  const workspace: TempWorkspace = {
    root,

    path(relativePath: string) {
      return join(root, relativePath);
    },

    async cleanup() {
      await rm(root, { recursive: true, force: true });
    },

    exists(relativePath: string) {
      return existsSync(join(root, relativePath));
    },

    async readFile(relativePath: string) {
      return readFile(join(root, relativePath), 'utf-8');
    },

    async writeFile(relativePath: string, content: string) {
      const filePath = join(root, relativePath);
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content, 'utf-8');
    },

    async readJson(relativePath: string): Promise<unknown> {
      const content = await workspace.readFile(relativePath);
      return JSON.parse(content);
    },

    async listDir(relativePath: string) {
      const dirPath = join(root, relativePath);
      if (!existsSync(dirPath)) {
        return [];
      }
      return (await readdir(dirPath)).sort();
    },
  };

  return workspace;
}
