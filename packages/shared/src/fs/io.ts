import { promises as fs } from 'fs';
import { basename, dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir, remove } from 'fs-extra';

/**
 * Writes `content` to a sibling temp file, then renames it over `target`, so a
 * reader never sees a half-written bundle. Missing parent directories are
 * created. The temp file is removed when the rename fails.
 */
export async function atomicWrite(target: string, content: string | Buffer): Promise<void> {
  const dir = dirname(target);
  await ensureDir(dir);

  const tempPath = await tmpName({ dir, prefix: `.${basename(target)}-` });
  await fs.writeFile(tempPath, content);
  try {
    await fs.rename(tempPath, target);
  } catch (error) {
    await remove(tempPath);
    throw error;
  }
}
