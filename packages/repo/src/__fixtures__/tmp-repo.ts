import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

export interface TmpRepo {
  root: string;
  write(files: Record<string, string>): Promise<void>;
  path(relative: string): string;
  cleanup(): Promise<void>;
}

/**
 * Creates a throwaway directory tree under the OS temp dir.
 */
export async function createTmpRepo(prefix: string): Promise<TmpRepo> {
  const root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), `contextpack-${prefix}-`)));
  return {
    root,
    async write(files) {
      for (const [filePath, content] of Object.entries(files)) {
        const fullPath = path.join(root, filePath);
        await fs.mkdir(path.dirname(fullPath), { recursive: true });
        await fs.writeFile(fullPath, content);
      }
    },
    path(relative) {
      return path.join(root, relative);
    },
    async cleanup() {
      await fs.rm(root, { recursive: true, force: true });
    },
  };
}
