/**
 * Temp Workspace Utilities
 *
 * Temporary directories for tests that read config and workflow files.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export interface TempWorkspace {
  /** Absolute path to workspace root */
  path: string;

  /** Absolute path of a file in the workspace */
  filePath(relativePath: string): string;

  /** Write a file, creating parent directories */
  writeFile(relativePath: string, content: string): Promise<string>;

  /** Remove the workspace */
  cleanup(): Promise<void>;
}

export async function createTempWorkspace(files: Record<string, string> = {}): Promise<TempWorkspace> {
  const path = await mkdtemp(join(tmpdir(), 'relay-test-'));

  const workspace: TempWorkspace = {
    path,

    filePath(relativePath: string): string {
      return join(path, relativePath);
    },

    async writeFile(relativePath: string, content: string): Promise<string> {
      const fullPath = join(path, relativePath);
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, content);
      return fullPath;
    },

    async cleanup(): Promise<void> {
      await rm(path, { recursive: true, force: true });
    },
  };

  for (const [relativePath, content] of Object.entries(files)) {
    await workspace.writeFile(relativePath, content);
  }

  return workspace;
}
