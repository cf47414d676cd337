import nodeFs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import { objectHash } from 'ohash';
import type { RepoSnapshot, RepoFileMeta, ScanOptions } from './types';
import { isBinaryFile, ALWAYS_IGNORED, DEFAULT_IGNORES, IGNORE_FILES } from './utils';

export * from './types';
export {
  isBinaryFile,
  readTextOrEmpty,
  scanExcludes,
  ALWAYS_IGNORED,
  DEFAULT_IGNORES,
  IGNORE_FILES,
} from './utils';

type Fs = typeof nodeFs;

export class RepoScanner {
  private fs: Fs;
  private scanCache: Map<string, RepoSnapshot> = new Map();

  constructor(fs: Fs = nodeFs) {
    this.fs = fs;
  }

  async scan(root: string, options: ScanOptions = {}): Promise<RepoSnapshot> {
    const cacheKey = objectHash({ root, options });
    const cached = this.scanCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const ig = ignore();

    // 1. Version-control metadata is never part of the tree
    ig.add(ALWAYS_IGNORED);

    // 2. Editor and tool clutter plus .gitignore/.contextpackignore from the scanned root
    if (options.respectIgnoreFiles ?? true) {
      ig.add(DEFAULT_IGNORES);
      for (const ignoreFile of IGNORE_FILES) {
        try {
          ig.add(await this.fs.readFile(path.join(root, ignoreFile), 'utf-8'));
        } catch {
          // missing ignore files are fine
        }
      }
    }

    // 3. Add caller excludes (build-artifact and vendor dirs among them)
    if (options.excludes && options.excludes.length > 0) {
      ig.add(options.excludes);
    }

    const extensions = options.extensions?.map((e) => e.replace(/^\./, '').toLowerCase());
    const files: RepoFileMeta[] = [];

    const walk = async (dir: string, relativeDir: string) => {
      let entries;
      try {
        entries = await this.fs.readdir(dir, { withFileTypes: true });
      } catch {
        // Access denied or deleted during scan
        return;
      }

      for (const entry of entries) {
        const entryName = entry.name;
        const entryRelativePath = relativeDir ? `${relativeDir}/${entryName}` : entryName;

        if (entry.isDirectory()) {
          // For directories, append slash to match directory patterns in ignore
          if (ig.ignores(entryRelativePath + '/')) continue;

          await walk(path.join(dir, entryName), entryRelativePath);
        } else if (entry.isFile()) {
          if (ig.ignores(entryRelativePath)) continue;

          const ext = path.extname(entryName).slice(1).toLowerCase();
          if (extensions && !extensions.includes(ext)) continue;

          const absPath = path.join(dir, entryName);
          let stats;
          try {
            stats = await this.fs.stat(absPath);
          } catch {
            continue;
          }

          files.push({
            path: entryRelativePath,
            absPath,
            sizeBytes: stats.size,
            ext,
            isText: !(await isBinaryFile(absPath, this.fs)),
          });
        }
      }
    };

    await walk(root, '');

    // Deterministic order independent of readdir order
    files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    const snapshot: RepoSnapshot = {
      root,
      files,
    };

    this.scanCache.set(cacheKey, snapshot);

    return snapshot;
  }
}
